/**
 * Markdown → HTML, in two wrappings:
 *
 * - standalone: full document for the browser, typesets math with MathJax.
 * - preview: script-free document for hosts that can't run external scripts.
 *
 * Both share the same body fragment and visual rules.
 */

import { Marked } from "marked";
import { RenderError } from "./errors.js";
import type { RenderedHtml } from "./types.js";

export const MATHJAX_URL = "https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-mml-chtml.js";

// $…$ and \(…\) inline, $$…$$ and \[…\] display.
const MATHJAX_CONFIG = String.raw`window.MathJax = {
    tex: {
        inlineMath: [['$', '$'], ['\\(', '\\)']],
        displayMath: [['$$', '$$'], ['\\[', '\\]']],
        processEscapes: true
    },
    svg: {
        fontCache: 'global'
    }
};`;

const SHARED_STYLES = [
  "pre { background-color: #f5f5f5; padding: 10px; border-radius: 5px; }",
  "code { font-family: monospace; }",
  "img { max-width: 100%; }",
  "table { border-collapse: collapse; width: 100%; }",
  "th, td { border: 1px solid #ddd; padding: 8px; }",
];

const STANDALONE_STYLES = [
  "body { font-family: Arial, sans-serif; line-height: 1.6; padding: 20px; }",
  ...SHARED_STYLES,
  "th { background-color: #f2f2f2; }",
].join("\n");

const PREVIEW_STYLES = [
  "body { font-family: Arial, sans-serif; line-height: 1.6; }",
  ...SHARED_STYLES,
].join("\n");

// Tables via GFM; fenced code blocks are built in.
const markedInstance = new Marked({ gfm: true, breaks: false });

export function markdownToFragment(markdown: string): string {
  let html: string | Promise<string>;
  try {
    html = markedInstance.parse(markdown, { async: false });
  } catch (err) {
    throw new RenderError(`Markdown conversion failed: ${String(err)}`, { cause: err });
  }
  if (typeof html !== "string") {
    throw new RenderError("Markdown conversion unexpectedly returned a promise");
  }
  return html;
}

export function wrapStandalone(fragment: string): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    // Config must be in place before the async loader runs.
    `<script>\n${MATHJAX_CONFIG}\n</script>`,
    `<script type="text/javascript" id="MathJax-script" async src="${MATHJAX_URL}"></script>`,
    `<style>\n${STANDALONE_STYLES}\n</style>`,
    "</head>",
    "<body>",
    fragment,
    "</body>",
    "</html>",
  ].join("\n");
}

export function wrapPreview(fragment: string): string {
  return [
    "<html><head>",
    '<meta charset="utf-8">',
    `<style>\n${PREVIEW_STYLES}\n</style>`,
    "</head><body>",
    fragment,
    "</body></html>",
  ].join("\n");
}

export function renderHtml(markdown: string): RenderedHtml {
  const fragment = markdownToFragment(markdown);
  return {
    standalone: wrapStandalone(fragment),
    preview: wrapPreview(fragment),
  };
}
