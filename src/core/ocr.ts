/**
 * Orchestrates: PDF bytes → OCR service → assembled Markdown → HTML.
 */

import type { OcrProvider, OcrUpload, StatusListener } from "./providers/base.js";
import type { RenderedHtml } from "./types.js";
import { assembleMarkdown } from "./assemble.js";
import { renderHtml } from "./render.js";

export interface PipelineOutput {
  markdown: string;
  html: RenderedHtml;
  pageCount: number;
}

export async function convertPdf(
  file: OcrUpload,
  provider: OcrProvider,
  onStatus: StatusListener = () => {}
): Promise<PipelineOutput> {
  onStatus("Uploading PDF file...");
  const response = await provider.process(file, onStatus);

  onStatus("Preparing markdown...");
  const markdown = assembleMarkdown(response.pages);
  const html = renderHtml(markdown);

  onStatus("Conversion completed");
  return { markdown, html, pageCount: response.pages.length };
}
