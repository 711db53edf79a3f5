/**
 * Splits a command line the way a POSIX shell splits words: whitespace
 * separates, single quotes are literal, double quotes allow `\"` and `\\`,
 * and a backslash outside quotes escapes the next character.
 *
 * @throws {SyntaxError} on an unterminated quote.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && (line[i + 1] === '"' || line[i + 1] === "\\")) {
        word += line.charAt(++i);
      } else {
        word += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === "\\" && i + 1 < line.length) {
      word += line.charAt(++i);
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(word);
      word = "";
      inWord = false;
    } else {
      word += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new SyntaxError(`Unterminated ${quote} in command line: ${line}`);
  }
  if (inWord) words.push(word);
  return words;
}
