/**
 * Response sanitizer. Strips reasoning markup and normalizes whitespace in
 * raw model output before it is stored or shown to other advisors.
 */

export const REASONING_OPEN = '<think>';
export const REASONING_CLOSE = '</think>';

/**
 * Remove every `<think>…</think>` block. An unterminated block runs to the end
 * of the text; a stray close marker is dropped on its own. Repeats until no
 * marker is left, since removing one block can splice two fragments into a
 * new marker.
 */
export function stripReasoning(text: string): string {
  let out = text;
  for (;;) {
    const open = out.indexOf(REASONING_OPEN);
    if (open !== -1) {
      const close = out.indexOf(REASONING_CLOSE, open + REASONING_OPEN.length);
      out =
        close === -1
          ? out.slice(0, open)
          : out.slice(0, open) + out.slice(close + REASONING_CLOSE.length);
      continue;
    }
    const stray = out.indexOf(REASONING_CLOSE);
    if (stray !== -1) {
      out = out.slice(0, stray) + out.slice(stray + REASONING_CLOSE.length);
      continue;
    }
    return out;
  }
}

/**
 * Clean raw model output. Total and idempotent.
 */
export function cleanResponse(raw: string): string {
  return stripReasoning(raw.replace(/\r\n?/g, '\n'))
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
