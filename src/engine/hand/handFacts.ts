import { SUITS, type Hand, type Rank, type Suit } from "./hand";
import { shapeMatches } from "./shape";

export type RankWeights = Partial<Record<Rank, number>>;

export interface HandFacts {
  hcp: number;
  controls: number;
  suitLengths: Record<Suit, number>;
  shape: string;
  balanced: boolean;
  longestSuit: Suit;
}

const HCP_VALUES: RankWeights = {
  A: 4,
  K: 3,
  Q: 2,
  J: 1
};

const CONTROL_VALUES: RankWeights = {
  A: 2,
  K: 1
};

const BALANCED_SHAPES = ["4,3,3,3", "4,4,3,2", "5,3,3,2"];

/**
 * Build an evaluator that sums a per-rank weight over every card of a hand.
 * Ranks missing from the table count zero.
 */
export function makeEvaluator(weights: RankWeights): (hand: Hand) => number {
  return (hand) => {
    let points = 0;
    for (const suit of SUITS) {
      for (const rank of hand[suit]) {
        points += weights[rank] ?? 0;
      }
    }
    return points;
  };
}

export const evaluateHcp = makeEvaluator(HCP_VALUES);
export const evaluateControls = makeEvaluator(CONTROL_VALUES);

export function suitLengths(hand: Hand): Record<Suit, number> {
  return {
    S: hand.S.length,
    H: hand.H.length,
    D: hand.D.length,
    C: hand.C.length
  };
}

export function isBalanced(hand: Hand): boolean {
  return BALANCED_SHAPES.some((shape) => shapeMatches(hand, shape));
}

export function computeHandFacts(hand: Hand): HandFacts {
  const lengths = suitLengths(hand);

  const sortedCounts = Object.values(lengths).sort((a, b) => b - a);

  // Ties go to the higher-ranking suit.
  const longestSuit = SUITS.reduce((best, suit) =>
    lengths[suit] > lengths[best] ? suit : best
  );

  return {
    hcp: evaluateHcp(hand),
    controls: evaluateControls(hand),
    suitLengths: lengths,
    shape: sortedCounts.join("-"),
    balanced: isBalanced(hand),
    longestSuit
  };
}
