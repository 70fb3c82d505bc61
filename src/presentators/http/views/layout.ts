import { html } from "hono/html";
import type { HtmlEscapedString } from "hono/utils/html";

export type HtmlContent = HtmlEscapedString | Promise<HtmlEscapedString>;

export function layout(title: string, body: HtmlContent): HtmlContent {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title}</title>
    <link rel="stylesheet" href="/style.css" />
  </head>
  <body>
    ${body}
  </body>
</html>`;
}
