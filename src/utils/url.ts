/**
 * Returns the final `/`-delimited segment of a reference, e.g. `a.png` for
 * `https://x/img/a.png`. Query strings are kept as part of the segment.
 */
export function basename(reference: string): string {
  const segments = reference.split("/");
  return segments[segments.length - 1];
}

/**
 * Builds the archive entry name for the image at `index` in the source list.
 */
export function imageEntryName(index: number, reference: string): string {
  return `${index}-${basename(reference)}`;
}

/**
 * Resolves an image `src` attribute against the page it was found on.
 * Empty values stay empty so they can be rejected later; values that cannot be
 * resolved are returned unchanged.
 */
export function resolveSource(src: string, pageUrl: string): string {
  const trimmed = src.trim();
  if (!trimmed) {
    return "";
  }
  try {
    return new URL(trimmed, pageUrl).href;
  } catch {
    return trimmed;
  }
}
