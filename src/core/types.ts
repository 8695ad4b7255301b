/** One image embedded in an OCR'd page. `imageBase64` is raw base64, no `data:` prefix. */
export interface PageImage {
  id: string;
  imageBase64: string;
}

export interface OcrPage {
  /** Zero-based page index as reported by the service. */
  index: number;
  markdown: string;
  images: PageImage[];
}

/** Pages are kept in document order. */
export interface DocumentResponse {
  pages: OcrPage[];
}

export interface RenderedHtml {
  /** Full document with MathJax, for the browser. */
  standalone: string;
  /** Script-free document for in-process preview. */
  preview: string;
}

export interface ConversionResult {
  sourcePath: string;
  markdown: string;
  html: RenderedHtml;
  pageCount: number;
}
