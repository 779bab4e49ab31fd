import {
  DuplicateRegistrationError,
  RegistryFrozenError,
  UnknownHandoffError,
} from "../../errors";
import type { BidLogger } from "../../logger";
import type { ActiveSeat, AuctionState } from "../auction/auctionState";
import type { Hand } from "../hand/hand";

export type Partnership = Readonly<Record<ActiveSeat, Hand>>;

export interface HandoffContext {
  logger: BidLogger;
}

/**
 * A multi-round convention that takes over the auction from the bid tree.
 * It bids directly into the live state and may finish the auction.
 */
export interface Handoff {
  readonly name: string;
  run(hands: Partnership, state: AuctionState, context: HandoffContext): void;
}

export class HandoffRegistry {
  private readonly handoffs = new Map<string, Handoff>();
  private frozen = false;

  register(handoff: Handoff): this {
    const key = handoff.name.toLowerCase();
    if (this.frozen) throw new RegistryFrozenError("hand-off", key);
    if (this.handoffs.has(key)) throw new DuplicateRegistrationError("HandOff", key);
    this.handoffs.set(key, handoff);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.handoffs.has(name.toLowerCase());
  }

  get(name: string): Handoff {
    const handoff = this.handoffs.get(name.toLowerCase());
    if (!handoff) throw new UnknownHandoffError(name);
    return handoff;
  }

  run(name: string, hands: Partnership, state: AuctionState, context: HandoffContext): void {
    this.get(name).run(hands, state, context);
  }
}
