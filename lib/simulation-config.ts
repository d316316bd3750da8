import { z } from "zod";

import { QUALITY_TIERS, type QualityTier } from "./ingredients";
import type { QualityBudget } from "./quality-budget";
import { formatZodIssues } from "./validation";

export type SimulationConfig = {
  seed: number;
  ingredientCount: number;
  budget: QualityBudget;
};

export const DEFAULT_INGREDIENT_COUNT = 10;
const MAX_INGREDIENT_COUNT = 1000;
const MAX_SEED = 0xffffffff;

const FLAG_ALIASES: Record<string, "seed" | "ingredients" | "budget"> = {
  "--seed": "seed",
  "--ingredients": "ingredients",
  "--budget": "budget",
};

function blankToUndefined(value: unknown): unknown {
  if (typeof value === "string" && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const budgetAmountSchema = z.preprocess(blankToUndefined, z.coerce.number().finite().min(0).default(0));

const simulationConfigSchema = z.object({
  seed: z.preprocess(
    blankToUndefined,
    z.coerce
      .number()
      .int()
      .min(0)
      .max(MAX_SEED)
      .default(() => Date.now() >>> 0)
  ),
  ingredientCount: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).max(MAX_INGREDIENT_COUNT).default(DEFAULT_INGREDIENT_COUNT)
  ),
  budget: z.object({
    normal: budgetAmountSchema,
    premium: budgetAmountSchema,
    legendary: budgetAmountSchema,
  }),
});

export class SimulationConfigError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super(`invalid simulation config: ${details.join("; ")}`);
    this.name = "SimulationConfigError";
    this.details = details;
  }
}

function isQualityTier(value: string): value is QualityTier {
  return QUALITY_TIERS.some((tier) => tier === value);
}

/** Parses `normal=5,premium=3` into per-tier strings. */
export function parseBudgetAssignments(raw: string): Partial<Record<QualityTier, string>> {
  const amounts: Partial<Record<QualityTier, string>> = {};
  for (const chunk of raw.split(",")) {
    const trimmed = chunk.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.indexOf("=");
    if (separator < 0) {
      throw new SimulationConfigError([`budget: missing amount in '${trimmed}'`]);
    }
    const tierRaw = trimmed.slice(0, separator).trim();
    const tier = tierRaw.toLowerCase();
    if (!isQualityTier(tier)) {
      throw new SimulationConfigError([`budget: unknown quality tier '${tierRaw}'`]);
    }
    amounts[tier] = trimmed.slice(separator + 1).trim();
  }
  return amounts;
}

function parseFlags(argv: readonly string[]): Partial<Record<"seed" | "ingredients" | "budget", string>> {
  const flags: Partial<Record<"seed" | "ingredients" | "budget", string>> = {};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const [flag, inlineValue] = arg.split("=", 2);
    const key = FLAG_ALIASES[flag];
    if (!key) {
      throw new SimulationConfigError([`unknown argument '${arg}'`]);
    }
    if (inlineValue !== undefined) {
      flags[key] = arg.slice(flag.length + 1);
      continue;
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new SimulationConfigError([`missing value for ${flag}`]);
    }
    flags[key] = value;
    index += 1;
  }
  return flags;
}

export function loadSimulationConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): SimulationConfig {
  const flags = parseFlags(argv);
  const budgetFlags = flags.budget !== undefined ? parseBudgetAssignments(flags.budget) : {};

  const parsed = simulationConfigSchema.safeParse({
    seed: flags.seed ?? env.POTION_SEED,
    ingredientCount: flags.ingredients ?? env.POTION_INGREDIENT_COUNT,
    budget: {
      normal: budgetFlags.normal ?? env.POTION_BUDGET_NORMAL,
      premium: budgetFlags.premium ?? env.POTION_BUDGET_PREMIUM,
      legendary: budgetFlags.legendary ?? env.POTION_BUDGET_LEGENDARY,
    },
  });
  if (!parsed.success) {
    throw new SimulationConfigError(formatZodIssues(parsed.error));
  }
  return parsed.data;
}
