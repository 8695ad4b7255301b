/** Desktop collaborators backed by the user's OS. */

import clipboard from "clipboardy";
import open from "open";
import type { Clipboard, Notifier, UrlOpener } from "./session.js";

export const systemClipboard: Clipboard = {
  write: (text) => clipboard.write(text),
};

export const openInDefaultHandler: UrlOpener = (url) => open(url);

/** Status and info lines go to stderr so stdout stays clean for Markdown. */
export const stderrNotifier: Notifier = {
  status: (message) => console.error(message),
  info: (message) => console.error(message),
};
