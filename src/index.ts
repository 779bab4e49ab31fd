import { readEngineConfig } from "./config";
import { Bidder, createHandoffRegistry, type BidderOptions } from "./engine/bidder";
import { createCriteriaRegistry } from "./engine/rules/criteria";
import { parseSystem } from "./engine/rules/loadSystem";
import type { BiddingSystem } from "./engine/rules/ruleTypes";
import referenceSystem from "./engine/rules/systems/confi.json";
import { createConsoleLogger } from "./logger";

export interface CreateBidderOptions extends BidderOptions {
  /** Defaults to the bundled strong notrump / CONFI system */
  system?: unknown;
  env?: NodeJS.ProcessEnv;
}

/**
 * Build a bidder from the environment, the default registries and a system.
 * Explicit options take precedence over the environment.
 */
export function createBidder(options: CreateBidderOptions = {}): Bidder {
  const config = readEngineConfig(options.env);
  const criteria = options.criteria ?? createCriteriaRegistry();
  const handoffs = options.handoffs ?? createHandoffRegistry();
  const system: BiddingSystem = parseSystem(options.system ?? referenceSystem, { criteria, handoffs });

  return new Bidder(system, {
    criteria,
    handoffs,
    dealer: options.dealer ?? config.dealer,
    logger: options.logger ?? createConsoleLogger(config.debug),
  });
}

export { Bidder, createHandoffRegistry } from "./engine/bidder";
export type { BidderOptions } from "./engine/bidder";
export { AuctionState, commitBid, partnerOf, SEATS } from "./engine/auction/auctionState";
export type { ActiveSeat, Seat } from "./engine/auction/auctionState";
export { compareBids, nextBid, parseBid, CONTRACT_BIDS } from "./engine/auction/bids";
export type { Bid, ContractBid, Level, Strain } from "./engine/auction/bids";
export { parseHand, formatHand, SUITS } from "./engine/hand/hand";
export type { Hand, HandInput, Rank, Suit } from "./engine/hand/hand";
export { computeHandFacts, evaluateControls, evaluateHcp, makeEvaluator } from "./engine/hand/handFacts";
export type { HandFacts } from "./engine/hand/handFacts";
export { parseShape, shapeMatches } from "./engine/hand/shape";
export { CriteriaRegistry, createCriteriaRegistry, defineCriterion } from "./engine/rules/criteria";
export type { Combinator, Criterion } from "./engine/rules/criteria";
export { loadSystemFile, parseSystem } from "./engine/rules/loadSystem";
export type { BidNode, BiddingSystem, CriterionSpec } from "./engine/rules/ruleTypes";
export { HandoffRegistry } from "./engine/handoffs/handoffTypes";
export type { Handoff, HandoffContext, Partnership } from "./engine/handoffs/handoffTypes";
export { confiHandoff } from "./engine/handoffs/confi";
export { readEngineConfig } from "./config";
export type { EngineConfig } from "./config";
export { createConsoleLogger, silentLogger } from "./logger";
export type { BidLogger } from "./logger";
export * from "./errors";
