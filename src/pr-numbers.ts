import { UsageError } from './errors.js';
import { parsePRUrl } from './url-parser.js';

/** `a-b` at the start of a token; anything after the second number is ignored */
const RANGE_REGEX = /^(\d+)-(\d+)/;

const NUMBER_REGEX = /^\d+$/;

/**
 * Turn the `pr` command's operands into PR numbers.
 *
 * - `123` is taken as is.
 * - `a-b` expands to a, a+1, ..., b-1. The upper bound is excluded.
 * - A nixpkgs pull request URL yields its number.
 *
 * Order and duplicates are kept; ranges expand in place. Any other token is a
 * UsageError, raised before a single PR is looked at.
 */
export function parsePRNumbers(tokens: readonly string[]): number[] {
  const prs: number[] = [];

  for (const token of tokens) {
    const range = token.match(RANGE_REGEX);
    if (range) {
      const low = parseInt(range[1], 10);
      const high = parseInt(range[2], 10);
      for (let pr = low; pr < high; pr++) {
        prs.push(pr);
      }
      continue;
    }

    if (NUMBER_REGEX.test(token)) {
      prs.push(parseInt(token, 10));
      continue;
    }

    const fromUrl = parsePRUrl(token);
    if (fromUrl !== null) {
      prs.push(fromUrl);
      continue;
    }

    throw new UsageError(`expected number, got ${token}`);
  }

  return prs;
}
