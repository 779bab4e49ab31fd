import { z } from "zod";
import {
  DuplicateRegistrationError,
  InvalidCriterionParamsError,
  RegistryFrozenError,
  UnknownCriterionError,
} from "../../errors";
import type { AuctionState } from "../auction/auctionState";
import type { Hand } from "../hand/hand";
import { evaluateHcp, isBalanced } from "../hand/handFacts";
import { parseShape, shapeMatches } from "../hand/shape";
import type { CriterionSpec } from "./ruleTypes";

export type Combinator = "all" | "any";

/**
 * A named, stateless predicate over a hand and the auction so far.
 */
export interface Criterion {
  readonly name: string;

  /** Throws when the spec's parameters or children are unusable. */
  validate(spec: CriterionSpec, registry: CriteriaRegistry): void;

  apply(spec: CriterionSpec, hand: Hand, state: AuctionState, registry: CriteriaRegistry): boolean;
}

export interface CriterionContext {
  hand: Hand;
  state: AuctionState;
  children: readonly CriterionSpec[];
  registry: CriteriaRegistry;
}

function parseParams<S extends z.ZodTypeAny>(name: string, schema: S, spec: CriterionSpec): z.output<S> {
  const result = schema.safeParse(spec.params ?? {});
  if (!result.success) {
    throw new InvalidCriterionParamsError(name, result.error.issues);
  }
  return result.data;
}

/**
 * Define a criterion whose parameters are checked by a zod schema.
 */
export function defineCriterion<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  test: (params: z.output<S>, ctx: CriterionContext) => boolean,
  validateChildren = false,
): Criterion {
  return {
    name,
    validate(spec, registry) {
      parseParams(name, schema, spec);
      if (validateChildren) {
        for (const child of spec.children ?? []) registry.validate(child);
      } else if (spec.children?.length) {
        throw new InvalidCriterionParamsError(name, "criterion takes no children");
      }
    },
    apply(spec, hand, state, registry) {
      const params = parseParams(name, schema, spec);
      return test(params, { hand, state, children: spec.children ?? [], registry });
    },
  };
}

/**
 * Registry of criteria by name. Built once, frozen, then shared read-only
 * by every bidding run.
 */
export class CriteriaRegistry {
  private readonly criteria = new Map<string, Criterion>();
  private frozen = false;

  register(criterion: Criterion): this {
    const key = criterion.name.toLowerCase();
    if (this.frozen) throw new RegistryFrozenError("criteria", key);
    if (this.criteria.has(key)) throw new DuplicateRegistrationError("Criteria", key);
    this.criteria.set(key, criterion);
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
    return this.criteria.has(name.toLowerCase());
  }

  get(name: string): Criterion {
    const criterion = this.criteria.get(name.toLowerCase());
    if (!criterion) throw new UnknownCriterionError(name);
    return criterion;
  }

  validate(spec: CriterionSpec): void {
    this.get(spec.name).validate(spec, this);
  }

  /**
   * Evaluate every spec against the hand and auction, reduced with AND
   * ("all") or OR ("any").
   */
  check(
    specs: readonly CriterionSpec[],
    hand: Hand,
    state: AuctionState,
    combinator: Combinator = "all",
  ): boolean {
    const holds = (spec: CriterionSpec) => this.get(spec.name).apply(spec, hand, state, this);
    return combinator === "all" ? specs.every(holds) : specs.some(holds);
  }
}

const noParams = z.object({}).strict();

export const openingCriterion = defineCriterion("opening", noParams, (_, { state }) => !state.hasOpened());

export const shapeCriterion = defineCriterion(
  "shape",
  z.object({
    pattern: z.string().min(1).superRefine((pattern, ctx) => {
      try {
        parseShape(pattern);
      } catch (err) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
      }
    }),
  }),
  ({ pattern }, { hand }) => shapeMatches(hand, pattern),
);

export const balancedCriterion = defineCriterion("balanced", noParams, (_, { hand }) => isBalanced(hand));

export const hcpCriterion = defineCriterion(
  "hcp",
  z
    .object({
      min: z.number().int().min(0).max(40).default(0),
      max: z.number().int().min(0).max(40).default(40),
    })
    .strict()
    .refine(({ min, max }) => min <= max, { message: "min must not exceed max" }),
  ({ min, max }, { hand }) => {
    const hcp = evaluateHcp(hand);
    return hcp >= min && hcp <= max;
  },
);

export const orCriterion = defineCriterion(
  "or",
  noParams,
  (_, { hand, state, children, registry }) => registry.check(children, hand, state, "any"),
  true,
);

export const BUILTIN_CRITERIA: readonly Criterion[] = [
  openingCriterion,
  shapeCriterion,
  balancedCriterion,
  hcpCriterion,
  orCriterion,
];

/** A registry holding the built-in criteria, left open for custom ones. */
export function createCriteriaRegistry(extra: readonly Criterion[] = []): CriteriaRegistry {
  const registry = new CriteriaRegistry();
  for (const criterion of [...BUILTIN_CRITERIA, ...extra]) registry.register(criterion);
  return registry;
}
