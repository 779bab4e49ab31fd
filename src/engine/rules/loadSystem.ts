import { readFileSync } from "node:fs";
import { z } from "zod";
import { InvalidSystemError, MissingCriteriaError, UnknownHandoffError } from "../../errors";
import { isBid, type Bid } from "../auction/bids";
import type { HandoffRegistry } from "../handoffs/handoffTypes";
import type { CriteriaRegistry } from "./criteria";
import type { BidNode, BiddingSystem, CriterionSpec } from "./ruleTypes";

export interface SystemRegistries {
  criteria: CriteriaRegistry;
  handoffs: HandoffRegistry;
}

const criterionSchema: z.ZodType<CriterionSpec> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    params: z.record(z.unknown()).optional(),
    children: z.array(criterionSchema).optional(),
  }),
);

const bidSchema = z
  .string()
  .refine((value): value is Bid => isBid(value), { message: "not a bid" });

/** Shape of a node before its bid text is checked. */
interface BidNodeInput {
  bid: string;
  criteria: CriterionSpec[];
  responses?: BidNodeInput[];
  handoff?: string;
  explanation?: string;
}

const bidNodeSchema: z.ZodType<BidNode, z.ZodTypeDef, BidNodeInput> = z.lazy(() =>
  z.object({
    bid: bidSchema,
    criteria: z.array(criterionSchema),
    responses: z.array(bidNodeSchema).optional(),
    handoff: z.string().min(1).optional(),
    explanation: z.string().optional(),
  }),
);

const systemSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  openings: z.array(bidNodeSchema),
});

function checkNodes(nodes: readonly BidNode[], path: string[], registries: SystemRegistries): void {
  for (const node of nodes) {
    const here = [...path, node.bid];
    if (node.criteria.length === 0) {
      throw new MissingCriteriaError(node.bid, here.join(" "));
    }
    for (const spec of node.criteria) registries.criteria.validate(spec);
    if (node.handoff !== undefined && !registries.handoffs.has(node.handoff)) {
      throw new UnknownHandoffError(node.handoff);
    }
    checkNodes(node.responses ?? [], here, registries);
  }
}

/**
 * Validate a declarative bidding system: its structure first, then every
 * criterion and hand-off name against the registries it will run with.
 */
export function parseSystem(json: unknown, registries: SystemRegistries): BiddingSystem {
  const result = systemSchema.safeParse(json);
  if (!result.success) {
    throw new InvalidSystemError("schema mismatch", result.error.issues);
  }
  checkNodes(result.data.openings, [], registries);
  return result.data;
}

export function loadSystemFile(path: string, registries: SystemRegistries): BiddingSystem {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new InvalidSystemError(`cannot read ${path}`, err);
  }
  return parseSystem(json, registries);
}
