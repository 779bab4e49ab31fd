import { SEATS, type Seat } from "./engine/auction/auctionState";

export interface EngineConfig {
  dealer: Seat;
  debug: boolean;
}

export const DEFAULT_CONFIG: EngineConfig = {
  dealer: "N",
  debug: false,
};

function isSeat(value: string): value is Seat {
  return (SEATS as readonly string[]).includes(value);
}

/**
 * Read engine settings from the environment.
 *
 *   BIDDING_DEALER  N | E | S | W (default N)
 *   BIDDING_DEBUG   1 or true to trace each decision
 */
export function readEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const dealer = env.BIDDING_DEALER?.trim().toUpperCase() ?? "";
  const debug = env.BIDDING_DEBUG?.trim().toLowerCase() ?? "";

  return {
    dealer: isSeat(dealer) ? dealer : DEFAULT_CONFIG.dealer,
    debug: debug === "1" || debug === "true",
  };
}
