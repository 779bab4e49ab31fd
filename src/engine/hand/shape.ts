import { InvalidShapePatternError } from "../../errors";
import { SUITS, type Hand, type Suit } from "./hand";

/**
 * One comma-separated term of a shape pattern: a length range, optionally
 * restricted to a set of suits.
 */
export interface ShapeTerm {
  suits: readonly Suit[];
  min: number;
  max: number;
}

const TERM_PATTERN = /^([SHDC]*)(\d{1,2})(?:(\+)|-(\d{1,2})?)?$/;

/**
 * Parse a shape pattern.
 *
 *   "5,3,3,2"      any 5332
 *   "5,3"          exactly 5 in one suit and 3 in another
 *   "5+,3-"        a suit of 5 or more and another of 3 or fewer
 *   "5-6,S3,C3,1-2" 5332 or 6331 with exactly 3 spades and 3 clubs
 *   "CD5,4,2,2"    five clubs or five diamonds, 422 in the rest
 */
export function parseShape(pattern: string): ShapeTerm[] {
  const parts = pattern.split(",").map((p) => p.trim().toUpperCase());
  if (parts.length > SUITS.length) {
    throw new InvalidShapePatternError(pattern, "more than four terms");
  }

  return parts.map((part) => {
    const match = TERM_PATTERN.exec(part);
    if (!match) throw new InvalidShapePatternError(pattern, `bad term '${part}'`);

    const [, suitLetters, low, plus, high] = match;
    const suits = SUITS.filter((s) => suitLetters.includes(s));
    let min = Number(low);
    let max = min;
    if (plus) max = 13;
    else if (high !== undefined) max = Number(high);
    else if (part.endsWith("-")) min = 0;

    if (max > 13 || min > max) {
      throw new InvalidShapePatternError(pattern, `bad range in '${part}'`);
    }
    return { suits, min, max };
  });
}

function* permutations<T>(items: readonly T[]): Generator<T[]> {
  if (items.length <= 1) {
    yield [...items];
    return;
  }
  for (let i = 0; i < items.length; i++) {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) {
      yield [items[i], ...tail];
    }
  }
}

/**
 * Whether the terms can be given to distinct suits so that every term holds.
 */
export function matchesShape(hand: Hand, terms: readonly ShapeTerm[]): boolean {
  for (const order of permutations(SUITS)) {
    const fits = terms.every((term, i) => {
      const suit = order[i];
      const length = hand[suit].length;
      if (term.suits.length > 0 && !term.suits.includes(suit)) return false;
      return length >= term.min && length <= term.max;
    });
    if (fits) return true;
  }
  return false;
}

export function shapeMatches(hand: Hand, pattern: string): boolean {
  return matchesShape(hand, parseShape(pattern));
}
