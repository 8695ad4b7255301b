import { Mistral } from "@mistralai/mistralai";
import type { OcrProvider, OcrUpload, StatusListener } from "./base.js";
import { stripDataUriPrefix } from "./base.js";
import type { DocumentResponse, OcrPage, PageImage } from "../types.js";
import {
  AuthenticationError,
  ProcessingError,
  RemoteError,
  TransferError,
  errorMessage,
} from "../errors.js";

export const DEFAULT_OCR_MODEL = "mistral-ocr-latest";

type SdkOcrResponse = Awaited<ReturnType<Mistral["ocr"]["process"]>>;
type SdkOcrPage = SdkOcrResponse["pages"][number];

export type OcrStep = "upload" | "signed-url" | "ocr";

export class MistralProvider implements OcrProvider {
  private client: Mistral;
  private model: string;
  private signedUrlExpiryHours: number;

  constructor(apiKey: string, model = DEFAULT_OCR_MODEL, signedUrlExpiryHours = 1) {
    this.client = new Mistral({ apiKey });
    this.model = model;
    this.signedUrlExpiryHours = signedUrlExpiryHours;
  }

  /**
   * Upload → signed URL → OCR, one attempt each. The first failing step
   * decides the error class.
   */
  async process(file: OcrUpload, onStatus: StatusListener = () => {}): Promise<DocumentResponse> {
    const uploaded = await this.step("upload", () =>
      this.client.files.upload({
        file: { fileName: file.fileName, content: file.content },
        purpose: "ocr",
      })
    );

    onStatus("Processing with OCR...");
    const signed = await this.step("signed-url", () =>
      this.client.files.getSignedUrl({
        fileId: uploaded.id,
        expiry: this.signedUrlExpiryHours,
      })
    );

    const response = await this.step("ocr", () =>
      this.client.ocr.process({
        model: this.model,
        document: { type: "document_url", documentUrl: signed.url },
        includeImageBase64: true,
      })
    );

    return { pages: response.pages.map(toOcrPage) };
  }

  private async step<T>(step: OcrStep, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw classifyError(step, err);
    }
  }
}

function toOcrPage(page: SdkOcrPage): OcrPage {
  const images: PageImage[] = [];
  for (const img of page.images) {
    if (!img.imageBase64) continue;
    images.push({ id: img.id, imageBase64: stripDataUriPrefix(img.imageBase64) });
  }
  return { index: page.index, markdown: page.markdown, images };
}

function statusCodeOf(err: unknown): number | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    typeof err.statusCode === "number"
  ) {
    return err.statusCode;
  }
  return undefined;
}

/** Map an SDK or network failure at `step` onto the remote error taxonomy. Exported for testing. */
export function classifyError(step: OcrStep, err: unknown): RemoteError {
  if (err instanceof RemoteError) return err;

  const message = errorMessage(err);
  const status = statusCodeOf(err);
  if (status === 401 || status === 403) {
    return new AuthenticationError(`API key rejected: ${message}`, { cause: err });
  }

  switch (step) {
    case "upload":
      return new TransferError(`Upload failed: ${message}`, { cause: err });
    case "signed-url":
      return new TransferError(`Could not obtain signed URL: ${message}`, { cause: err });
    case "ocr":
      return new ProcessingError(`OCR processing failed: ${message}`, { cause: err });
  }
}
