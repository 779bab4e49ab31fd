import { InvalidStateError } from "../errors";
import { silentLogger, type BidLogger } from "../logger";
import {
  AuctionState,
  commitBid,
  isActiveSeat,
  passForOpponents,
  type Seat,
} from "./auction/auctionState";
import type { Bid } from "./auction/bids";
import { toHand, type HandInput } from "./hand/hand";
import { computeHandFacts } from "./hand/handFacts";
import { confiHandoff } from "./handoffs/confi";
import { HandoffRegistry, type Partnership } from "./handoffs/handoffTypes";
import { createCriteriaRegistry, type CriteriaRegistry } from "./rules/criteria";
import { evaluateRules } from "./rules/evaluateRules";
import type { BidNode, BiddingSystem } from "./rules/ruleTypes";

export interface BidderOptions {
  criteria?: CriteriaRegistry;
  handoffs?: HandoffRegistry;
  dealer?: Seat;
  logger?: BidLogger;
}

export function createHandoffRegistry(): HandoffRegistry {
  return new HandoffRegistry().register(confiHandoff);
}

/**
 * Walks a bidding system tree for North and South. East and West always
 * pass. Each turn the first node whose criteria hold is bid; a node naming a
 * hand-off hands the auction to that convention. When no node applies the
 * auction is passed out.
 */
export class Bidder {
  readonly system: BiddingSystem;
  readonly criteria: CriteriaRegistry;
  readonly handoffs: HandoffRegistry;
  readonly dealer: Seat;
  private readonly logger: BidLogger;

  constructor(system: BiddingSystem, options: BidderOptions = {}) {
    this.system = system;
    this.criteria = (options.criteria ?? createCriteriaRegistry()).freeze();
    this.handoffs = (options.handoffs ?? createHandoffRegistry()).freeze();
    this.dealer = options.dealer ?? "N";
    this.logger = options.logger ?? silentLogger;
  }

  bid(north: HandInput, south: HandInput): Bid[] {
    const hands: Partnership = { N: toHand(north), S: toHand(south) };
    const state = new AuctionState(this.dealer);
    let candidates: readonly BidNode[] | undefined = this.system.openings;

    passForOpponents(state);
    while (!state.completed()) {
      if (!candidates || candidates.length === 0) {
        // Fully traversed the tree.
        state.allPass();
        break;
      }

      const seat = state.nextToBid;
      if (!isActiveSeat(seat)) {
        throw new InvalidStateError(`Expected N or S to bid, not ${seat}`);
      }

      const node = evaluateRules(candidates, hands[seat], state, this.criteria);
      if (!node) {
        this.logger.debug(`${seat}: no rule matches`, computeHandFacts(hands[seat]));
        state.allPass();
        break;
      }

      this.logger.debug(`${seat}: ${node.bid}`, node.explanation ?? "");
      commitBid(state, node.bid);

      if (node.handoff) {
        this.logger.debug(`${seat}: hand-off to ${node.handoff}`);
        this.handoffs.run(node.handoff, hands, state, { logger: this.logger });
        passForOpponents(state);
        if (state.completed() && node.responses?.length) {
          this.logger.warn(`${node.handoff} finished the auction; responses to ${node.bid} are unreachable`);
        }
      }
      candidates = node.responses;
    }

    return [...state.bids];
  }
}
