import { MissingCriteriaError } from "../../errors";
import type { AuctionState } from "../auction/auctionState";
import type { Hand } from "../hand/hand";
import type { CriteriaRegistry } from "./criteria";
import type { BidNode } from "./ruleTypes";

/**
 * Check whether a single node's criteria all hold for the hand and auction.
 * A node without criteria would always match, so it is rejected outright.
 */
export function ruleMatches(
  node: BidNode,
  hand: Hand,
  auction: AuctionState,
  registry: CriteriaRegistry,
): boolean {
  if (node.criteria.length === 0) {
    throw new MissingCriteriaError(node.bid, auction.bids.join(" ") || "(opening)");
  }
  return registry.check(node.criteria, hand, auction);
}

/**
 * Return the first matching node. Declaration order is the priority.
 */
export function evaluateRules(
  nodes: readonly BidNode[],
  hand: Hand,
  auction: AuctionState,
  registry: CriteriaRegistry,
): BidNode | null {
  return nodes.find((node) => ruleMatches(node, hand, auction, registry)) ?? null;
}
