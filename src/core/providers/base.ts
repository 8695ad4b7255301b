import type { DocumentResponse } from "../types.js";

export interface OcrUpload {
  /** Name the file is uploaded under. */
  fileName: string;
  content: Uint8Array;
}

/** Receives human-readable progress lines. */
export type StatusListener = (message: string) => void;

/** A remote document-understanding service: PDF bytes in, per-page Markdown out. */
export interface OcrProvider {
  /** `onStatus` hears about steps after the upload, e.g. "Processing with OCR...". */
  process(file: OcrUpload, onStatus?: StatusListener): Promise<DocumentResponse>;
}

const DATA_URI_PREFIX = /^data:[^;,]*;base64,/;

/** Strip a `data:<mime>;base64,` prefix if the service already added one. */
export function stripDataUriPrefix(payload: string): string {
  return payload.replace(DATA_URI_PREFIX, "");
}
