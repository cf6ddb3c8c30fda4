const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split text into lines without their terminators. A trailing line break does
 * not produce a final empty line, and the empty string has no lines.
 *
 * @example
 * ```ts
 * splitLines("a\nb\n"); // ["a", "b"]
 * splitLines("a\n\nb"); // ["a", "", "b"]
 * ```
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Split text into lines, each keeping its own terminator. Joining the result
 * gives back the input.
 *
 * @example
 * ```ts
 * splitLinesKeepEnds("a\nb"); // ["a\n", "b"]
 * ```
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

/** First line of `text` (without terminator), or "" for empty text. */
export function firstLine(text: string): string {
  return splitLines(text)[0] ?? "";
}

/** Short quoted preview of `text` for diagnostics. */
export function snippet(text: string, max = 64): string {
  const preview = text.length <= max ? text : `${text.slice(0, max)} ...`;
  return JSON.stringify(preview);
}
