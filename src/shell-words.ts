import { UsageError } from './errors.js';

/**
 * Split a command-line string into words the way a POSIX shell would,
 * without expanding anything: whitespace separates words, single quotes are
 * literal, double quotes allow `\"` and `\\`, and a bare backslash escapes
 * the next character.
 *
 *   splitShellWords(`--option sandbox false -j "4"`)
 *   // ['--option', 'sandbox', 'false', '-j', '4']
 */
export function splitShellWords(input: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (input[i + 1] === '"' || input[i + 1] === '\\')) {
        current += input[++i];
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\') {
      if (i + 1 < input.length) current += input[++i];
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote !== null) {
    throw new UsageError(`unterminated ${quote} quote in: ${input}`);
  }
  if (inWord) words.push(current);

  return words;
}
