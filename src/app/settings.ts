import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_OCR_MODEL } from "../core/providers/mistral.js";
import { ConfigError } from "../core/errors.js";
import { loadConfig } from "./config-store.js";

export const APP_NAME = "pdf-ocr-md";

export interface AppSettings {
  /** Mistral API key. Empty until the user supplies one. */
  apiKey: string;
  /** OCR model name sent with each request. */
  model: string;
  /** Lifetime of the signed retrieval URL for the uploaded PDF, in hours. */
  signedUrlExpiryHours: number;
  /** How long the browser preview file lives before it is deleted. */
  previewCleanupDelayMs: number;
}

export const DEFAULT_SETTINGS: AppSettings = {
  apiKey: "",
  model: DEFAULT_OCR_MODEL,
  signedUrlExpiryHours: 1,
  previewCleanupDelayMs: 30_000,
};

/**
 * Where the persisted `{"api_key": …}` lives.
 * `PDF_OCR_MD_CONFIG` overrides the whole path.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home = homedir()
): string {
  if (env.PDF_OCR_MD_CONFIG) return env.PDF_OCR_MD_CONFIG;

  let base: string;
  if (platform === "win32") {
    base = env.APPDATA || join(home, "AppData", "Roaming");
  } else if (platform === "darwin") {
    base = join(home, "Library", "Application Support");
  } else {
    base = env.XDG_CONFIG_HOME || join(home, ".config");
  }
  return join(base, APP_NAME, "config.json");
}

/** Environment variables win over the stored key and the defaults. */
export function applyEnvOverrides(
  settings: AppSettings,
  env: NodeJS.ProcessEnv = process.env
): AppSettings {
  return {
    ...settings,
    apiKey: env.MISTRAL_API_KEY || settings.apiKey,
    model: env.MISTRAL_OCR_MODEL || settings.model,
  };
}

export interface SettingsLog {
  info(message: string): void;
  warn(message: string): void;
}

const consoleLog: SettingsLog = {
  info: (message) => console.error(message),
  warn: (message) => console.warn(message),
};

/**
 * Stored key + defaults + environment. A config file that cannot be read or
 * parsed is reported through `log.warn` and treated as holding no key.
 */
export async function loadSettings(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
  log: SettingsLog = consoleLog
): Promise<AppSettings> {
  let apiKey = "";
  try {
    const loaded = await loadConfig(configPath);
    apiKey = loaded.apiKey;
    if (!loaded.found) log.info(`No config file found. Will create at: ${configPath}`);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    log.warn(`Warning: could not load configuration from ${err.path}\n  ${err.message}`);
  }
  return applyEnvOverrides(Object.assign({}, DEFAULT_SETTINGS, { apiKey }), env);
}
