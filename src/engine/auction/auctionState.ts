import { AuctionAlreadyOverError, InsufficientBidError } from "../../errors";
import { compareBids, type Bid, type ContractBid } from "./bids";

export type Seat = "N" | "E" | "S" | "W";

/** The partnership that bids; the other two seats always pass. */
export type ActiveSeat = "N" | "S";

export const SEATS: readonly Seat[] = ["N", "E", "S", "W"];

export function isActiveSeat(seat: Seat): seat is ActiveSeat {
  return seat === "N" || seat === "S";
}

export function partnerOf(seat: ActiveSeat): ActiveSeat {
  return seat === "N" ? "S" : "N";
}

/**
 * Bid history for one bidding run, plus whose turn it is and whether the
 * auction is over.
 */
export class AuctionState {
  readonly dealer: Seat;
  private readonly history: Bid[] = [];

  constructor(dealer: Seat = "N") {
    this.dealer = dealer;
  }

  get bids(): readonly Bid[] {
    return this.history;
  }

  get nextToBid(): Seat {
    const start = SEATS.indexOf(this.dealer);
    return SEATS[(start + this.history.length) % SEATS.length];
  }

  addBid(bid: Bid): void {
    if (this.completed()) throw new AuctionAlreadyOverError(bid);

    if (bid !== "P") {
      const highest = this.highestBid();
      if (highest !== null && compareBids(bid, highest) <= 0) {
        throw new InsufficientBidError(bid, highest);
      }
    }

    this.history.push(bid);
  }

  /** Whether anybody has made a non-pass bid. */
  hasOpened(): boolean {
    return this.history.some((b) => b !== "P");
  }

  /**
   * Four initial passes, or three consecutive passes after an opening.
   */
  completed(): boolean {
    if (!this.hasOpened()) return this.history.length === 4;
    if (this.history.length < 4) return false;
    return this.history.slice(-3).every((b) => b === "P");
  }

  /** Completes the auction by forcing every remaining seat to pass. */
  allPass(): void {
    while (!this.completed()) {
      this.addBid("P");
    }
  }

  highestBid(): ContractBid | null {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const bid = this.history[i];
      if (bid !== "P") return bid;
    }
    return null;
  }

  finalContract(): ContractBid | null {
    if (!this.completed()) return null;
    return this.highestBid();
  }
}

/**
 * Add a bid, then the passes of the inactive seats that follow it.
 */
export function commitBid(state: AuctionState, bid: Bid): void {
  state.addBid(bid);
  passForOpponents(state);
}

export function passForOpponents(state: AuctionState): void {
  while (!state.completed() && !isActiveSeat(state.nextToBid)) {
    state.addBid("P");
  }
}
