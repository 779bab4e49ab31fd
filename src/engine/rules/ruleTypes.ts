import type { Bid } from "../auction/bids";

/**
 * Declarative form of one criterion: the registered name, its parameters,
 * and nested criteria for combinators such as "or".
 */
export interface CriterionSpec {
  name: string;
  params?: Readonly<Record<string, unknown>>;
  children?: readonly CriterionSpec[];
}

/**
 * A candidate bid in the system tree.
 * All criteria must hold for the node to be chosen.
 */
export interface BidNode {
  /** Bid this node makes, e.g. "2N", "3N" */
  bid: Bid;

  criteria: readonly CriterionSpec[];

  /** Candidate replies once this bid is made, in priority order */
  responses?: readonly BidNode[];

  /** Convention that takes over the auction after this bid */
  handoff?: string;

  /** Human-readable explanation */
  explanation?: string;
}

export interface BiddingSystem {
  name: string;
  description?: string;

  /** Opening bids, in priority order */
  openings: readonly BidNode[];
}
