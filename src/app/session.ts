/**
 * Owns the latest conversion result and the actions a front end offers on
 * it: copy, save, open in browser.
 *
 * One conversion runs at a time. Its result is handed back as the resolved
 * value of convert() and kept here until the next conversion replaces it; a
 * failed conversion leaves the previous result in place.
 */

import { randomUUID } from "node:crypto";
import { readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, extname, join } from "node:path";
import { pathToFileURL } from "node:url";
import { convertPdf } from "../core/ocr.js";
import type { OcrProvider } from "../core/providers/base.js";
import type { ConversionResult } from "../core/types.js";
import {
  InputValidationError,
  LocalIOError,
  RemoteError,
  RenderError,
  errorMessage,
} from "../core/errors.js";
import type { AppSettings } from "./settings.js";

export interface Notifier {
  /** Transient progress line. */
  status(message: string): void;
  /** Something the user should see, not an error. */
  info(message: string): void;
}

export interface Clipboard {
  write(text: string): Promise<void>;
}

/** Opens a URL with the platform's default handler. */
export type UrlOpener = (url: string) => Promise<unknown>;

export type ProviderFactory = (apiKey: string, settings: AppSettings) => OcrProvider;

export interface SessionDeps {
  settings: AppSettings;
  createProvider: ProviderFactory;
  notifier: Notifier;
  clipboard: Clipboard;
  openUrl: UrlOpener;
  /** Where preview files are written. Defaults to the OS temp directory. */
  tempDir?: string;
}

export interface PreviewFile {
  path: string;
  /** Settles once the file has been removed (or removal was given up on). */
  removed: Promise<void>;
}

export class ConversionSession {
  private deps: SessionDeps;
  private result: ConversionResult | null = null;
  private running = false;
  /** Pending preview-file deletions, keyed by path. */
  private cleanups = new Map<string, { timer: ReturnType<typeof setTimeout>; run: () => Promise<void> }>();

  constructor(deps: SessionDeps) {
    this.deps = deps;
  }

  get latest(): ConversionResult | null {
    return this.result;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async convert(pdfPath: string, apiKey: string): Promise<ConversionResult> {
    const key = apiKey.trim();
    if (!key) throw new InputValidationError("Please enter your Mistral API key");
    if (!pdfPath) throw new InputValidationError("Please select a PDF file");
    if (this.running) throw new InputValidationError("A conversion is already running");

    this.running = true;
    const { notifier, settings } = this.deps;
    notifier.status("Converting PDF to Markdown...");
    try {
      const content = await readPdf(pdfPath);
      const provider = this.deps.createProvider(key, settings);
      const output = await convertPdf(
        { fileName: fileStem(pdfPath), content },
        provider,
        (message) => notifier.status(message)
      );
      this.result = { sourcePath: pdfPath, ...output };
      return this.result;
    } catch (err) {
      notifier.status(`Error: ${errorMessage(err)}`);
      throw asKnownError(err);
    } finally {
      this.running = false;
    }
  }

  async copyToClipboard(): Promise<boolean> {
    if (!this.result) {
      this.deps.notifier.info("No markdown content to copy");
      return false;
    }
    await this.deps.clipboard.write(this.result.markdown);
    this.deps.notifier.status("Markdown copied to clipboard");
    return true;
  }

  /** Write the Markdown as UTF-8. Defaults to `<pdf stem>.md` beside the PDF. */
  async saveMarkdown(targetPath?: string): Promise<string | null> {
    if (!this.result) {
      this.deps.notifier.info("No markdown content to save");
      return null;
    }
    const path = targetPath ?? defaultOutputPath(this.result.sourcePath);
    try {
      await writeFile(path, this.result.markdown, "utf8");
    } catch (err) {
      throw new LocalIOError(`Failed to save file: ${errorMessage(err)}`, path, { cause: err });
    }
    this.deps.notifier.status(`Markdown saved to ${path}`);
    return path;
  }

  /** Write the standalone HTML to a path of the caller's choosing. */
  async saveHtml(targetPath: string): Promise<string | null> {
    if (!this.result) {
      this.deps.notifier.info("No content to save");
      return null;
    }
    try {
      await writeFile(targetPath, this.result.html.standalone, "utf8");
    } catch (err) {
      throw new LocalIOError(`Failed to save file: ${errorMessage(err)}`, targetPath, { cause: err });
    }
    this.deps.notifier.status(`HTML saved to ${targetPath}`);
    return targetPath;
  }

  /**
   * Write the standalone HTML to a temp file, open it, and delete it after
   * `previewCleanupDelayMs`. If the browser cannot be opened the file is
   * deleted at once.
   */
  async openInBrowser(): Promise<PreviewFile | null> {
    if (!this.result) {
      this.deps.notifier.info("No content to preview");
      return null;
    }

    const path = join(this.deps.tempDir ?? tmpdir(), `pdf-ocr-md-${randomUUID()}.html`);
    try {
      await writeFile(path, this.result.html.standalone, "utf8");
    } catch (err) {
      throw new LocalIOError(`Failed to write preview file: ${errorMessage(err)}`, path, { cause: err });
    }

    try {
      await this.deps.openUrl(pathToFileURL(path).href);
    } catch (err) {
      // Nothing will read the file now.
      await removeQuietly(path);
      throw new LocalIOError(`Could not open browser: ${errorMessage(err)}`, path, { cause: err });
    }
    this.deps.notifier.status("Opened preview in browser");

    return { path, removed: this.scheduleCleanup(path) };
  }

  /** Delete every pending preview file now. */
  async dispose(): Promise<void> {
    const pending = [...this.cleanups.values()];
    for (const { timer } of pending) clearTimeout(timer);
    await Promise.all(pending.map(({ run }) => run()));
  }

  private scheduleCleanup(path: string): Promise<void> {
    return new Promise<void>((resolve) => {
      const run = async () => {
        this.cleanups.delete(path);
        await removeQuietly(path);
        resolve();
      };
      const timer = setTimeout(() => void run(), this.deps.settings.previewCleanupDelayMs);
      this.cleanups.set(path, { timer, run });
    });
  }
}

// ── Pure exported functions ──────────────────────────────────────────────────

/** File name without directory or extension, e.g. "/a/report.pdf" → "report". */
export function fileStem(path: string): string {
  return basename(path, extname(path));
}

export function defaultOutputPath(pdfPath: string): string {
  return join(dirname(pdfPath), `${fileStem(pdfPath)}.md`);
}

async function readPdf(pdfPath: string): Promise<Uint8Array> {
  const info = await stat(pdfPath).catch(() => null);
  if (!info?.isFile()) throw new InputValidationError("Invalid PDF file path");

  try {
    return new Uint8Array(await readFile(pdfPath));
  } catch (err) {
    throw new LocalIOError(`Could not read PDF: ${errorMessage(err)}`, pdfPath, { cause: err });
  }
}

/** Errors from our own code pass through; anything else came from the remote side. */
function asKnownError(err: unknown): Error {
  if (
    err instanceof InputValidationError ||
    err instanceof RemoteError ||
    err instanceof LocalIOError ||
    err instanceof RenderError
  ) {
    return err;
  }
  return new RemoteError(errorMessage(err), { cause: err });
}

async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (err) {
    // Best effort; the OS cleans its temp dir eventually.
    console.warn(`[pdf-ocr-md] Could not remove preview file ${path}:`, errorMessage(err));
  }
}
