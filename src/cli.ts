#!/usr/bin/env node
/**
 * PDF → Markdown via Mistral OCR.
 *
 * Markdown goes to stdout (or a file); status messages go to stderr.
 *
 * Usage:
 *   pdf-ocr-md convert path/to/file.pdf
 *   pdf-ocr-md convert path/to/file.pdf -o out.md --open
 *   pdf-ocr-md convert path/to/file.pdf --save --copy
 *   pdf-ocr-md save-key <key>
 *   pdf-ocr-md config-path
 *
 * Environment variables:
 *   MISTRAL_API_KEY     overrides the stored key
 *   MISTRAL_OCR_MODEL   default: mistral-ocr-latest
 *   PDF_OCR_MD_CONFIG   full path of the config file
 */

import { parseCliArgs, UsageError, type CliCommand } from "./app/args.js";
import { saveConfig } from "./app/config-store.js";
import { loadSettings, resolveConfigPath } from "./app/settings.js";
import { ConversionSession } from "./app/session.js";
import { openInDefaultHandler, stderrNotifier, systemClipboard } from "./app/platform.js";
import { MistralProvider } from "./core/providers/mistral.js";
import { errorMessage } from "./core/errors.js";

const USAGE = `\
Usage:
  pdf-ocr-md convert <file.pdf> [-o <out.md> | --save] [--html <out.html>] [--copy] [--open] [--api-key <key>]
  pdf-ocr-md save-key <key>
  pdf-ocr-md config-path`;

function fail(err: unknown): never {
  console.error(`Error: ${errorMessage(err)}`);
  if (process.env.DEBUG) console.error("[pdf-ocr-md]", err);
  process.exit(1);
}

// ── Settings ──────────────────────────────────────────────────────────────────

const configPath = resolveConfigPath();

// ── Commands ──────────────────────────────────────────────────────────────────

async function runConvert(command: Extract<CliCommand, { kind: "convert" }>): Promise<void> {
  const settings = await loadSettings(configPath);
  const session = new ConversionSession({
    settings,
    createProvider: (apiKey, s) => new MistralProvider(apiKey, s.model, s.signedUrlExpiryHours),
    notifier: stderrNotifier,
    clipboard: systemClipboard,
    openUrl: openInDefaultHandler,
  });

  const result = await session.convert(command.pdfPath, command.apiKey ?? settings.apiKey);
  console.error(`  ${result.pageCount} page(s) converted`);

  if (command.output !== undefined) await session.saveMarkdown(command.output);
  else if (command.save) await session.saveMarkdown();
  else process.stdout.write(`${result.markdown}\n`);

  if (command.html !== undefined) await session.saveHtml(command.html);
  if (command.copy) await session.copyToClipboard();
  if (command.open) {
    const preview = await session.openInBrowser();
    // Stay alive until the browser has had time to load the temp file.
    if (preview) await preview.removed;
  }
}

async function runSaveKey(apiKey: string): Promise<void> {
  await saveConfig(configPath, { apiKey });
  console.error(`API key saved to ${configPath}`);
}

// ── Main ──────────────────────────────────────────────────────────────────────

let command: CliCommand;
try {
  command = parseCliArgs(process.argv.slice(2));
} catch (err) {
  if (!(err instanceof UsageError)) throw err;
  console.error(err.message);
  console.error(USAGE);
  process.exit(2);
}

try {
  switch (command.kind) {
    case "help":
      console.log(USAGE);
      break;
    case "config-path":
      console.log(configPath);
      break;
    case "save-key":
      await runSaveKey(command.apiKey);
      break;
    case "convert":
      await runConvert(command);
      break;
  }
} catch (err) {
  fail(err);
}
