/**
 * Integration check: runs a local PDF through the CLI against the live
 * Mistral API and asserts the Markdown is non-empty text. Does NOT validate
 * quality, just that upload, signed URL and OCR work end-to-end.
 *
 * Needs MISTRAL_API_KEY (or a saved key). MISTRAL_OCR_MODEL is honoured.
 *
 * Usage:
 *   MISTRAL_API_KEY=... npm run check-ocr -- path/to/sample.pdf
 */

import { existsSync } from "node:fs";
import { spawnSync } from "node:child_process";

function fail(msg: string): never {
  console.error(`FAIL: ${msg}`);
  process.exit(1);
}

const pdfPath = process.argv[2];
if (!pdfPath) fail("Usage: npm run check-ocr -- <file.pdf>");
if (!existsSync(pdfPath)) fail(`No such file: ${pdfPath}`);

console.error(`Running OCR on ${pdfPath} via cli.ts …`);
const result = spawnSync(
  "node_modules/.bin/tsx",
  ["src/cli.ts", "convert", pdfPath],
  { encoding: "utf8", env: process.env, stdio: ["ignore", "pipe", "pipe"] },
);

if (result.stderr) process.stderr.write(result.stderr);
if (result.error) fail(`Failed to spawn cli.ts: ${result.error.message}`);
if (result.status !== 0) fail(`cli.ts exited with status ${result.status}`);

const output = result.stdout;
if (output.trim().length === 0) fail("OCR result is empty");
if (!/[a-zA-Z]{3,}/.test(output)) fail("OCR result contains no readable words");
if (/!\[[^\]\n]*\]\(\)/.test(output)) console.error("  note: unresolved image placeholders remain");

console.error(`  ${output.length} characters returned`);
console.error("PASS");
