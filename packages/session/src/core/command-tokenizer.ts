/**
 * Tokenizer for reliable command text.
 *
 * Whitespace separates arguments, double quotes group them, and `//` or
 * `/* ... *\/` start comments that run to the end of the text or the
 * closing marker.
 *
 * @module core/command-tokenizer
 */

const MAX_TOKENS = 1024;

function isSpace(code: number): boolean {
  return code <= 0x20;
}

export function tokenizeCommand(text: string): string[] {
  const tokens: string[] = [];
  let i = 0;

  while (i < text.length && tokens.length < MAX_TOKENS) {
    while (i < text.length && isSpace(text.charCodeAt(i))) {
      i++;
    }
    if (i >= text.length) {
      break;
    }

    if (text.startsWith("//", i)) {
      break;
    }
    if (text.startsWith("/*", i)) {
      const end = text.indexOf("*/", i + 2);
      if (end < 0) {
        break;
      }
      i = end + 2;
      continue;
    }

    if (text[i] === '"') {
      const end = text.indexOf('"', i + 1);
      if (end < 0) {
        tokens.push(text.slice(i + 1));
        break;
      }
      tokens.push(text.slice(i + 1, end));
      i = end + 1;
      continue;
    }

    const start = i;
    while (
      i < text.length &&
      !isSpace(text.charCodeAt(i)) &&
      text[i] !== '"' &&
      !text.startsWith("//", i) &&
      !text.startsWith("/*", i)
    ) {
      i++;
    }
    tokens.push(text.slice(start, i));
  }

  return tokens;
}

/**
 * Replace characters that would let an argument inject further commands.
 */
export function sanitizeArgs(args: readonly string[]): string[] {
  return args.map((arg) => arg.replace(/[\n\r;]/g, " "));
}
