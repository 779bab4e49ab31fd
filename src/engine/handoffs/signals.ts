import type { ActiveSeat } from "../auction/auctionState";
import type { Suit } from "../hand/hand";

export type SuitFlags = Record<Suit, boolean>;

/** What one seat has told partner about its suits during a convention. */
export interface SeatSignals {
  deniedFour: SuitFlags;
  showedFour: SuitFlags;
  showedFive: SuitFlags;
  showedThree: SuitFlags;
}

export type SignalState = Record<ActiveSeat, SeatSignals>;

export type SignalKind = keyof SeatSignals;

function noSuits(): SuitFlags {
  return { S: false, H: false, D: false, C: false };
}

function emptySeatSignals(): SeatSignals {
  return {
    deniedFour: noSuits(),
    showedFour: noSuits(),
    showedFive: noSuits(),
    showedThree: noSuits(),
  };
}

export function createSignalState(): SignalState {
  return { N: emptySeatSignals(), S: emptySeatSignals() };
}
