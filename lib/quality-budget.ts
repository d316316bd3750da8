import { QUALITY_TIERS, type QualityTier } from "./ingredients";

export type QualityBudget = Record<QualityTier, number>;

export class QualityBudgetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QualityBudgetError";
  }
}

function assertAmount(tier: QualityTier, amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new QualityBudgetError(`budget amount for ${tier} must be a non-negative finite number, got ${amount}`);
  }
}

export function createQualityBudget(initial: Partial<QualityBudget> = {}): QualityBudget {
  const budget: QualityBudget = { normal: 0, premium: 0, legendary: 0 };
  for (const tier of QUALITY_TIERS) {
    const amount = initial[tier] ?? 0;
    assertAmount(tier, amount);
    budget[tier] = amount;
  }
  return budget;
}

export function fundQualityBudget(budget: QualityBudget, tier: QualityTier, amount: number): QualityBudget {
  assertAmount(tier, amount);
  budget[tier] += amount;
  return budget;
}

export function canAfford(budget: QualityBudget, tier: QualityTier, cost: number): boolean {
  return budget[tier] >= cost;
}

export function trySpend(budget: QualityBudget, tier: QualityTier, cost: number): boolean {
  if (cost < 0 || !canAfford(budget, tier, cost)) {
    return false;
  }
  budget[tier] -= cost;
  return true;
}

export function totalBudget(budget: QualityBudget): number {
  return QUALITY_TIERS.reduce((sum, tier) => sum + budget[tier], 0);
}
