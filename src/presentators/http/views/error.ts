import { html } from "hono/html";
import { layout, type HtmlContent } from "./layout";

export function errorPage(status: number, message: string): HtmlContent {
  return layout(
    `Error ${status}`,
    html`<main class="error">
      <h1>${status}</h1>
      <p>${message}</p>
      <a href="/">Back to the generator</a>
    </main>`
  );
}
