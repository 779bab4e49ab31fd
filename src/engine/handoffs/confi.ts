import { InvalidStateError, NoSignoffAvailableError } from "../../errors";
import type { BidLogger } from "../../logger";
import {
  commitBid,
  isActiveSeat,
  partnerOf,
  type ActiveSeat,
  type AuctionState,
} from "../auction/auctionState";
import {
  CONTRACT_BIDS,
  bidIndex,
  isNoTrump,
  levelOf,
  makeBid,
  nextBid,
  stepsAbove,
  strainOf,
  type ContractBid,
} from "../auction/bids";
import { SUITS, type Suit } from "../hand/hand";
import { evaluateControls } from "../hand/handFacts";
import type { Handoff, Partnership } from "./handoffTypes";
import { createSignalState, type SignalKind, type SignalState } from "./signals";

/**
 * CONFI: control-showing slam exploration after a strong notrump.
 *
 * The opener shows controls in steps. With enough combined controls the pair
 * bids four-card suits up the line, then five-card suits, then three-card
 * support, until a fit is found (bid six of it) or the room runs out (sign
 * off in notrump).
 */

export type ConfiPhase =
  | "controlStep"
  | "sufficiencyCheck"
  | "minimumCorrection"
  | "longSuitCheck"
  | "fitSearch"
  | "suitCascade"
  | "signoff"
  | "done";

/** Controls the opener is assumed to hold before showing any. */
export const EXPECTED_MINIMUM_CONTROLS = 6;
export const SLAM_CONTROLS = 10;
/** Bar the responder applies once the opener admits a shortfall. */
export const CORRECTED_SLAM_CONTROLS = 11;

const SLAM_LEVEL = 6;
const MAX_SCAN = 4;

/** Partner's flag to read and the length needed opposite it, in priority order. */
const FIT_CHECKS: readonly [SignalKind, number][] = [
  ["showedFour", 4],
  ["showedFive", 3],
  ["showedThree", 5],
];

export interface ConfiContext {
  hands: Partnership;
  state: AuctionState;
  opener: ActiveSeat;
  openerControls: number;
  responderControls: number;
  openerHasRebid: boolean;
  signals: SignalState;
  logger: BidLogger;
}

export function createConfiContext(
  hands: Partnership,
  state: AuctionState,
  logger: BidLogger,
): ConfiContext {
  const opener = seatToBid(state);
  return {
    hands,
    state,
    opener,
    openerControls: evaluateControls(hands[opener]),
    responderControls: evaluateControls(hands[partnerOf(opener)]),
    openerHasRebid: false,
    signals: createSignalState(),
    logger,
  };
}

function seatToBid(state: AuctionState): ActiveSeat {
  const seat = state.nextToBid;
  if (!isActiveSeat(seat)) {
    throw new InvalidStateError(`CONFI expects N or S to bid, not ${seat}`);
  }
  return seat;
}

function currentBid(state: AuctionState): ContractBid {
  const bid = state.highestBid();
  if (bid === null) throw new InvalidStateError("CONFI needs an opened auction");
  return bid;
}

function suitOf(bid: ContractBid): Suit {
  const strain = strainOf(bid);
  if (strain === "N") throw new InvalidStateError(`${bid} is not a suit bid`);
  return strain;
}

function creditedOpenerControls(ctx: ConfiContext): number {
  return Math.max(ctx.openerControls, EXPECTED_MINIMUM_CONTROLS);
}

/** The cheapest notrump bid at or above `from`. */
export function cheapestNoTrump(from: ContractBid): ContractBid {
  const bid = CONTRACT_BIDS.slice(bidIndex(from)).find(isNoTrump);
  if (bid === undefined) throw new NoSignoffAvailableError(from);
  return bid;
}

/**
 * Up to four suit bids above `from`, skipping notrump and stopping short of
 * the six level.
 */
export function candidateSuitBids(from: ContractBid): ContractBid[] {
  const candidates: ContractBid[] = [];
  let bid = from;
  for (let i = 0; i < MAX_SCAN; i++) {
    bid = nextBid(bid);
    if (isNoTrump(bid)) bid = nextBid(bid);
    if (levelOf(bid) >= SLAM_LEVEL) break;
    candidates.push(bid);
  }
  return candidates;
}

function bidSlam(ctx: ConfiContext, suit: Suit): ConfiPhase {
  ctx.logger.debug("CONFI slam", suit);
  ctx.state.addBid(makeBid(SLAM_LEVEL, suit));
  ctx.state.allPass();
  return "done";
}

/** Pass out a notrump contract, or bid the cheapest notrump and pass out. */
function signOffAndPassOut(ctx: ConfiContext): ConfiPhase {
  const bid = currentBid(ctx.state);
  if (!isNoTrump(bid)) ctx.state.addBid(cheapestNoTrump(bid));
  ctx.state.allPass();
  return "done";
}

function controlStep(ctx: ConfiContext): ConfiPhase {
  const steps = Math.max(ctx.openerControls - EXPECTED_MINIMUM_CONTROLS, 0) + 1;
  commitBid(ctx.state, stepsAbove(currentBid(ctx.state), steps));
  return "sufficiencyCheck";
}

function sufficiencyCheck(ctx: ConfiContext): ConfiPhase {
  if (creditedOpenerControls(ctx) + ctx.responderControls < SLAM_CONTROLS) {
    return signOffAndPassOut(ctx);
  }
  return "minimumCorrection";
}

function minimumCorrection(ctx: ConfiContext): ConfiPhase {
  if (seatToBid(ctx.state) !== ctx.opener || ctx.openerHasRebid) return "longSuitCheck";
  ctx.openerHasRebid = true;

  if (ctx.openerControls >= EXPECTED_MINIMUM_CONTROLS) return "longSuitCheck";

  const bid = currentBid(ctx.state);
  if (isNoTrump(bid)) {
    ctx.state.allPass();
    return "done";
  }
  commitBid(ctx.state, cheapestNoTrump(bid));

  // Responder continues only with a control to spare.
  if (creditedOpenerControls(ctx) + ctx.responderControls < CORRECTED_SLAM_CONTROLS) {
    ctx.state.allPass();
    return "done";
  }
  return "longSuitCheck";
}

function longSuitCheck(ctx: ConfiContext): ConfiPhase {
  const seat = seatToBid(ctx.state);
  if (seat !== ctx.opener) return "fitSearch";

  const longSuit = SUITS.find((suit) => ctx.hands[seat][suit].length >= 6);
  return longSuit ? bidSlam(ctx, longSuit) : "fitSearch";
}

function fitSearch(ctx: ConfiContext): ConfiPhase {
  const seat = seatToBid(ctx.state);
  const hand = ctx.hands[seat];
  const theirs = ctx.signals[partnerOf(seat)];

  for (const [kind, length] of FIT_CHECKS) {
    const fit = SUITS.find((suit) => theirs[kind][suit] && hand[suit].length >= length);
    if (fit) return bidSlam(ctx, fit);
  }
  return "suitCascade";
}

function showFourCardSuit(ctx: ConfiContext, seat: ActiveSeat): boolean {
  const mine = ctx.signals[seat];
  const theirs = ctx.signals[partnerOf(seat)];

  for (const bid of candidateSuitBids(currentBid(ctx.state))) {
    const suit = suitOf(bid);
    if (ctx.hands[seat][suit].length < 4) {
      mine.deniedFour[suit] = true;
      continue;
    }
    if (theirs.deniedFour[suit] || mine.showedFour[suit]) continue;

    mine.showedFour[suit] = true;
    commitBid(ctx.state, bid);
    return true;
  }
  return false;
}

function showFiveCardSuit(ctx: ConfiContext, seat: ActiveSeat): boolean {
  const mine = ctx.signals[seat];

  for (const bid of candidateSuitBids(currentBid(ctx.state))) {
    const suit = suitOf(bid);
    if (ctx.hands[seat][suit].length < 5 || mine.showedFive[suit]) continue;

    mine.showedFive[suit] = true;
    commitBid(ctx.state, bid);
    return true;
  }
  return false;
}

/** Three-card support for a suit partner showed, without raising the level. */
function showThreeCardSupport(ctx: ConfiContext, seat: ActiveSeat): boolean {
  const mine = ctx.signals[seat];
  const theirs = ctx.signals[partnerOf(seat)];
  const current = currentBid(ctx.state);

  for (const bid of candidateSuitBids(current)) {
    if (levelOf(bid) > levelOf(current)) break;

    const suit = suitOf(bid);
    if (ctx.hands[seat][suit].length < 3 || mine.showedThree[suit]) continue;
    if (!theirs.showedFour[suit]) continue;

    mine.showedThree[suit] = true;
    commitBid(ctx.state, bid);
    return true;
  }
  return false;
}

function suitCascade(ctx: ConfiContext): ConfiPhase {
  const seat = seatToBid(ctx.state);
  const shown =
    showFourCardSuit(ctx, seat) ||
    showFiveCardSuit(ctx, seat) ||
    showThreeCardSupport(ctx, seat);
  return shown ? "minimumCorrection" : "signoff";
}

function signoff(ctx: ConfiContext): ConfiPhase {
  const bid = currentBid(ctx.state);
  if (isNoTrump(bid)) {
    ctx.state.allPass();
    return "done";
  }
  commitBid(ctx.state, cheapestNoTrump(bid));
  return "minimumCorrection";
}

export const CONFI_PHASES: Record<Exclude<ConfiPhase, "done">, (ctx: ConfiContext) => ConfiPhase> = {
  controlStep,
  sufficiencyCheck,
  minimumCorrection,
  longSuitCheck,
  fitSearch,
  suitCascade,
  signoff,
};

/**
 * Step through phases until the convention finishes the auction.
 */
export function runConfiPhases(ctx: ConfiContext, start: ConfiPhase = "controlStep"): void {
  let phase = start;
  while (phase !== "done") {
    if (ctx.state.completed()) return;
    ctx.logger.debug(`CONFI ${phase}`, ctx.state.nextToBid, ctx.state.bids.join(" "));
    phase = CONFI_PHASES[phase](ctx);
  }
}

export const confiHandoff: Handoff = {
  name: "confi",
  run(hands, state, { logger }) {
    runConfiPhases(createConfiContext(hands, state, logger));
  },
};
