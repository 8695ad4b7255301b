/**
 * Turns a multi-page OCR response into one Markdown document.
 *
 * Each page may reference its own embedded images with an empty-target
 * image link, `![img-0.jpeg]()`. Those placeholders are swapped for inline
 * data URIs; anything else is passed through untouched.
 */

import type { OcrPage } from "./types.js";

export const PAGE_SEPARATOR = "\n\n";

/**
 * Replace every literal `![id]()` whose id is in `images` with an inline PNG
 * data URI. Placeholders for unknown ids are left as they are.
 */
export function replaceImagePlaceholders(
  markdown: string,
  images: ReadonlyMap<string, string>
): string {
  let result = markdown;
  for (const [id, payload] of images) {
    // Literal match: ids may contain brackets, `$` or newlines.
    result = result.split(`![${id}]()`).join(`![${id}](data:image/png;base64,${payload})`);
  }
  return result;
}

/** Resolve each page's placeholders against that page's images and join in page order. */
export function assembleMarkdown(pages: readonly OcrPage[]): string {
  return pages
    .map((page) => {
      const images = new Map<string, string>();
      // Later duplicates overwrite earlier ones.
      for (const img of page.images) images.set(img.id, img.imageBase64);
      return replaceImagePlaceholders(page.markdown, images);
    })
    .join(PAGE_SEPARATOR);
}
