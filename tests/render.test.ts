/**
 * Tests for renderHtml(). Both wrappings share one body fragment.
 */

import { describe, it, expect } from "vitest";
import { MATHJAX_URL, markdownToFragment, renderHtml } from "../src/core/render.js";

describe("renderHtml", () => {
  it("standalone has the heading and the MathJax script", () => {
    const { standalone } = renderHtml("# Title");
    expect(standalone).toContain("<h1>Title</h1>");
    expect(standalone).toContain(MATHJAX_URL);
  });

  it("preview has the heading but no MathJax script", () => {
    const { preview } = renderHtml("# Title");
    expect(preview).toContain("<h1>Title</h1>");
    expect(preview).not.toContain(MATHJAX_URL);
    expect(preview).not.toContain("<script");
  });

  it("standalone is a full document", () => {
    const { standalone } = renderHtml("text");
    expect(standalone.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(standalone.endsWith("</html>")).toBe(true);
  });

  it("configures inline and display math delimiters with escapes", () => {
    const { standalone } = renderHtml("$x$");
    expect(standalone).toContain(String.raw`inlineMath: [['$', '$'], ['\\(', '\\)']]`);
    expect(standalone).toContain(String.raw`displayMath: [['$$', '$$'], ['\\[', '\\]']]`);
    expect(standalone).toContain("processEscapes: true");
  });

  it("loads MathJax asynchronously after its config", () => {
    const { standalone } = renderHtml("text");
    const config = standalone.indexOf("window.MathJax");
    const loader = standalone.indexOf(`async src="${MATHJAX_URL}"`);
    expect(config).toBeGreaterThan(-1);
    expect(loader).toBeGreaterThan(config);
  });

  it("applies the same visual rules to both variants", () => {
    const { standalone, preview } = renderHtml("text");
    for (const html of [standalone, preview]) {
      expect(html).toContain("pre { background-color: #f5f5f5; padding: 10px; border-radius: 5px; }");
      expect(html).toContain("img { max-width: 100%; }");
      expect(html).toContain("table { border-collapse: collapse; width: 100%; }");
      expect(html).toContain("th, td { border: 1px solid #ddd; padding: 8px; }");
    }
  });

  it("wraps the same body fragment in both variants", () => {
    const md = "Some *emphasis* here.";
    const fragment = markdownToFragment(md);
    const { standalone, preview } = renderHtml(md);
    expect(standalone).toContain(fragment);
    expect(preview).toContain(fragment);
  });

  it("is deterministic", () => {
    expect(renderHtml("# A\n\ntext")).toEqual(renderHtml("# A\n\ntext"));
  });
});

describe("markdownToFragment", () => {
  it("renders GFM tables", () => {
    const html = markdownToFragment("| a | b |\n|---|---|\n| 1 | 2 |");
    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
    expect(html).toContain("<th>a</th>");
  });

  it("renders fenced code blocks with a language class", () => {
    const html = markdownToFragment("```js\nconst x = 1;\n```");
    expect(html).toContain('<code class="language-js">');
    expect(html).toContain("const x = 1;");
  });

  it("keeps inline data-URI images", () => {
    const html = markdownToFragment("![fig1](data:image/png;base64,AAAA)");
    expect(html).toContain('src="data:image/png;base64,AAAA"');
    expect(html).toContain('alt="fig1"');
  });
});
