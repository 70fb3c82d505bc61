import { html } from "hono/html";
import { layout, type HtmlContent } from "./layout";

export type HomePageProps = {
  banners: string[];
  selected: string;
  text: string;
  result: string;
};

export function homePage(props: HomePageProps): HtmlContent {
  const options = props.banners.map((banner) =>
    banner === props.selected
      ? html`<option value="${banner}" selected>${banner}</option>`
      : html`<option value="${banner}">${banner}</option>`
  );
  const result = props.result ? html`<pre class="result">${props.result}</pre>` : "";

  return layout(
    "ASCII Art Generator",
    html`<main>
      <h1>ASCII Art Generator</h1>
      <form method="post" action="/ascii-art">
        <label for="text">Text</label>
        <textarea id="text" name="text" rows="4" required>${props.text}</textarea>
        <label for="banner">Banner</label>
        <select id="banner" name="banner">
          ${options}
        </select>
        <button type="submit">Generate</button>
      </form>
      ${result}
    </main>`
  );
}
