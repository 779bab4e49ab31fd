import { InvalidHandError } from "../../errors";

export type Suit = "S" | "H" | "D" | "C";

export type Rank =
  | "A" | "K" | "Q" | "J" | "T"
  | "9" | "8" | "7" | "6" | "5" | "4" | "3" | "2"
  | "x";

/** Fixed suit order of a written hand. */
export const SUITS: readonly Suit[] = ["S", "H", "D", "C"];

export const RANKS: readonly Rank[] = [
  "A", "K", "Q", "J", "T", "9", "8", "7", "6", "5", "4", "3", "2", "x",
];

export type Hand = Readonly<Record<Suit, readonly Rank[]>>;

/** A hand either already parsed or in its written form. */
export type HandInput = Hand | string;

const VOID = "-";

const RANK_SET: ReadonlySet<string> = new Set(RANKS);

function isRank(value: string): value is Rank {
  return RANK_SET.has(value);
}

/**
 * Parse a written hand such as "AQ3 AK3 J2 AQ652": spades, hearts, diamonds
 * and clubs separated by whitespace, "x" for any small card, "-" for a void.
 */
export function parseHand(text: string): Hand {
  const groups = text.trim().split(/\s+/);
  if (groups.length !== SUITS.length) {
    throw new InvalidHandError(text, `expected 4 suits, got ${groups.length}`);
  }

  const holdings = groups.map((group) => parseHolding(text, group));
  const total = holdings.reduce((sum, h) => sum + h.length, 0);
  if (total !== 13) {
    throw new InvalidHandError(text, `expected 13 cards, got ${total}`);
  }

  return {
    S: holdings[0],
    H: holdings[1],
    D: holdings[2],
    C: holdings[3],
  };
}

function parseHolding(text: string, group: string): Rank[] {
  if (group === VOID) return [];

  const ranks: Rank[] = [];
  for (const char of group.replace(/10/g, "T")) {
    const upper = char.toUpperCase();
    const rank = upper === "X" ? "x" : upper;
    if (!isRank(rank)) {
      throw new InvalidHandError(text, `unknown rank '${char}'`);
    }
    if (rank !== "x" && ranks.includes(rank)) {
      throw new InvalidHandError(text, `duplicate rank '${rank}'`);
    }
    ranks.push(rank);
  }
  return ranks;
}

export function toHand(input: HandInput): Hand {
  return typeof input === "string" ? parseHand(input) : input;
}

export function formatHand(hand: Hand): string {
  return SUITS.map((suit) => (hand[suit].length ? hand[suit].join("") : VOID)).join(" ");
}
