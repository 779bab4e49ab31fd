export type EngineErrorKind = "configuration" | "invariant" | "input";

/**
 * Base class for every error the engine raises. `kind` separates a broken
 * bidding system from a logic defect and from bad caller input.
 */
export class BiddingEngineError extends Error {
  readonly kind: EngineErrorKind;
  details?: unknown;

  constructor(kind: EngineErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = "BiddingEngineError";
    this.kind = kind;
    this.details = details;
  }
}

// Configuration errors

export class DuplicateRegistrationError extends BiddingEngineError {
  constructor(registry: string, name: string) {
    super("configuration", `${registry} '${name}' already registered`);
    this.name = "DuplicateRegistrationError";
  }
}

export class RegistryFrozenError extends BiddingEngineError {
  constructor(registry: string, name: string) {
    super("configuration", `Cannot register '${name}': ${registry} registry is frozen`);
    this.name = "RegistryFrozenError";
  }
}

export class UnknownCriterionError extends BiddingEngineError {
  constructor(name: string) {
    super("configuration", `Unknown criterion '${name}'`);
    this.name = "UnknownCriterionError";
  }
}

export class UnknownHandoffError extends BiddingEngineError {
  constructor(name: string) {
    super("configuration", `Unknown hand-off '${name}'`);
    this.name = "UnknownHandoffError";
  }
}

export class MissingCriteriaError extends BiddingEngineError {
  constructor(bid: string, path: string) {
    super("configuration", `No criteria found for bid ${bid} at ${path}`);
    this.name = "MissingCriteriaError";
  }
}

export class InvalidCriterionParamsError extends BiddingEngineError {
  constructor(name: string, details?: unknown) {
    super("configuration", `Invalid parameters for criterion '${name}'`, details);
    this.name = "InvalidCriterionParamsError";
  }
}

export class InvalidShapePatternError extends BiddingEngineError {
  constructor(pattern: string, reason: string) {
    super("configuration", `Invalid shape pattern '${pattern}': ${reason}`);
    this.name = "InvalidShapePatternError";
  }
}

export class InvalidSystemError extends BiddingEngineError {
  constructor(reason: string, details?: unknown) {
    super("configuration", `Invalid bidding system: ${reason}`, details);
    this.name = "InvalidSystemError";
  }
}

// Invariant violations

export class InvalidStateError extends BiddingEngineError {
  constructor(message: string) {
    super("invariant", message);
    this.name = "InvalidStateError";
  }
}

export class AuctionAlreadyOverError extends InvalidStateError {
  constructor(bid: string) {
    super(`Auction is already over, cannot add ${bid}`);
    this.name = "AuctionAlreadyOverError";
  }
}

export class InsufficientBidError extends InvalidStateError {
  constructor(bid: string, highest: string) {
    super(`Bid ${bid} is not higher than ${highest}`);
    this.name = "InsufficientBidError";
  }
}

export class BidSpaceExhaustedError extends BiddingEngineError {
  constructor(bid: string) {
    super("invariant", `No bid above ${bid}`);
    this.name = "BidSpaceExhaustedError";
  }
}

export class NoSignoffAvailableError extends BiddingEngineError {
  constructor(from: string) {
    super("invariant", `No notrump sign-off available from ${from}`);
    this.name = "NoSignoffAvailableError";
  }
}

// Input errors

export class InvalidHandError extends BiddingEngineError {
  constructor(text: string, reason: string) {
    super("input", `Invalid hand '${text}': ${reason}`);
    this.name = "InvalidHandError";
  }
}

export class InvalidBidError extends BiddingEngineError {
  constructor(text: string) {
    super("input", `Invalid bid '${text}'`);
    this.name = "InvalidBidError";
  }
}
