/**
 * Persists the API key as `{"api_key": "…"}`. A missing file just means no
 * key yet; anything else that goes wrong is a ConfigError for the caller to
 * report as a warning.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ConfigError, errorMessage } from "../core/errors.js";

export interface StoredConfig {
  apiKey: string;
}

export interface LoadedConfig extends StoredConfig {
  /** False when no file existed yet. */
  found: boolean;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export async function loadConfig(path: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Could not read config: ${errorMessage(err)}`, path, { cause: err });
    }
    // First run: make sure the directory is there for the first save.
    try {
      await mkdir(dirname(path), { recursive: true });
    } catch (mkdirErr) {
      throw new ConfigError(
        `Could not create config directory: ${errorMessage(mkdirErr)}`,
        path,
        { cause: mkdirErr }
      );
    }
    return { apiKey: "", found: false };
  }

  return { ...parseConfig(text, path), found: true };
}

/** Validate the file's shape. Exported for testing. */
export function parseConfig(text: string, path: string): StoredConfig {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON: ${errorMessage(err)}`, path, { cause: err });
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError("Config must be a JSON object", path);
  }
  if (!("api_key" in data) || data.api_key === undefined) return { apiKey: "" };
  if (typeof data.api_key !== "string") {
    throw new ConfigError('Config field "api_key" must be a string', path);
  }
  return { apiKey: data.api_key };
}

export async function saveConfig(path: string, config: StoredConfig): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ api_key: config.apiKey }), "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to save API key: ${errorMessage(err)}`, path, { cause: err });
  }
}
