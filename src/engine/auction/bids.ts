import { BidSpaceExhaustedError, InvalidBidError } from "../../errors";

export type Level = 1 | 2 | 3 | 4 | 5 | 6 | 7;
export type Strain = "C" | "D" | "H" | "S" | "N";

export type ContractBid = `${Level}${Strain}`;
export type Bid = "P" | ContractBid;

export const LEVELS: readonly Level[] = [1, 2, 3, 4, 5, 6, 7];

/** Strains in ascending rank order. */
export const STRAINS: readonly Strain[] = ["C", "D", "H", "S", "N"];

/** Every contract bid, lowest first. */
export const CONTRACT_BIDS: readonly ContractBid[] = LEVELS.flatMap((level) =>
  STRAINS.map((strain) => `${level}${strain}` as const),
);

const BID_PATTERN = /^([1-7])(C|D|H|S|N|NT)$/;

const CONTRACT_BID_SET: ReadonlySet<string> = new Set(CONTRACT_BIDS);

export function isContractBid(value: string): value is ContractBid {
  return CONTRACT_BID_SET.has(value);
}

export function isBid(value: string): value is Bid {
  return value === "P" || isContractBid(value);
}

/**
 * Normalize user-facing bid text ("pass", "2NT", "4s") to a Bid.
 */
export function parseBid(text: string): Bid {
  const normalized = text.trim().toUpperCase();
  if (normalized === "P" || normalized === "PASS") return "P";

  const match = BID_PATTERN.exec(normalized);
  if (!match) throw new InvalidBidError(text);

  const strain = match[2] === "NT" ? "N" : match[2];
  const bid = `${match[1]}${strain}`;
  if (!isContractBid(bid)) throw new InvalidBidError(text);
  return bid;
}

export function levelOf(bid: ContractBid): Level {
  return LEVELS[Math.floor(bidIndex(bid) / STRAINS.length)];
}

export function strainOf(bid: ContractBid): Strain {
  return STRAINS[bidIndex(bid) % STRAINS.length];
}

export function bidIndex(bid: ContractBid): number {
  return CONTRACT_BIDS.indexOf(bid);
}

export function makeBid(level: Level, strain: Strain): ContractBid {
  return CONTRACT_BIDS[LEVELS.indexOf(level) * STRAINS.length + STRAINS.indexOf(strain)];
}

/** Negative when a ranks below b. */
export function compareBids(a: ContractBid, b: ContractBid): number {
  return bidIndex(a) - bidIndex(b);
}

export function nextBid(bid: ContractBid): ContractBid {
  return stepsAbove(bid, 1);
}

export function stepsAbove(bid: ContractBid, steps: number): ContractBid {
  const target = CONTRACT_BIDS[bidIndex(bid) + steps];
  if (target === undefined) throw new BidSpaceExhaustedError(bid);
  return target;
}

export function isNoTrump(bid: ContractBid): boolean {
  return strainOf(bid) === "N";
}
