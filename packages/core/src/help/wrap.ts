/**
 * Greedy word wrapping for help text
 */

const COMBINING_MARK = /\p{Mn}/u;

/**
 * Columns taken by `text`: one per code point, none for combining marks
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    if (!COMBINING_MARK.test(ch)) width++;
  }
  return width;
}

/**
 * Pad `text` with spaces to `width` columns
 */
export function padDisplay(text: string, width: number): string {
  return text + " ".repeat(Math.max(0, width - displayWidth(text)));
}

/**
 * Wrap each line of `text` to at most `width` columns
 *
 * Words are never broken; a word longer than `width` sits on its own line.
 */
export function wrapText(text: string, width: number): string {
  if (width <= 0) return text;

  return text
    .split("\n")
    .map((line) => wrapLine(line, width))
    .join("\n");
}

function wrapLine(line: string, width: number): string {
  const words = line.split(/\s+/).filter(Boolean);
  const out: string[] = [];
  let current = "";

  for (const word of words) {
    if (current === "") {
      current = word;
    } else if (displayWidth(current) + 1 + displayWidth(word) <= width) {
      current += ` ${word}`;
    } else {
      out.push(current);
      current = word;
    }
  }
  out.push(current);

  return out.join("\n");
}
