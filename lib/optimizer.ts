import { ingredientCost, ingredientDisplayName, type Ingredient } from "./ingredients";
import type { IngredientInventory } from "./inventory";
import type { PotionGraph } from "./potion-graph";
import { brewPotion, type BrewResult, type Potion, type PotionRegistry } from "./potions";
import { createQualityBudget, trySpend, type QualityBudget } from "./quality-budget";
import type { RandomSource } from "./random";
import type { PotionKind } from "./recipes";

export type ConsumedIngredient = {
  potionKind: PotionKind;
  requirement: Ingredient;
  ingredient: Ingredient;
  cost: number;
};

export type AllocationEvent =
  | ({ type: "consumed"; remainingBudget: number } & ConsumedIngredient)
  | ({ type: "skipped"; remainingBudget: number } & ConsumedIngredient);

export type OptimizeOptions = {
  budget?: Partial<QualityBudget>;
  random?: RandomSource;
  registry?: PotionRegistry;
  onEvent?: (event: AllocationEvent) => void;
};

export type OptimizationResult = {
  potions: Potion[];
  consumed: ConsumedIngredient[];
  budget: QualityBudget;
};

export function pickRandomPotion(graph: PotionGraph, random: RandomSource, registry?: PotionRegistry): BrewResult {
  const node = random.chooseUniform(graph.potionNodes());
  return brewPotion(node.kind, { random, registry });
}

/**
 * Greedy pass over potions in topological order. Each requirement consumes the
 * in-stock instances of the same kind and quality that its tier budget can
 * still pay for. The budget starts from `options.budget` (all zero when
 * omitted) and is never topped up here, so an unfunded pass removes nothing.
 */
export function optimizePotions(
  graph: PotionGraph,
  inventory: IngredientInventory,
  options: OptimizeOptions = {}
): OptimizationResult {
  const budget = createQualityBudget(options.budget);
  const potions: Potion[] = [];
  const consumed: ConsumedIngredient[] = [];

  for (const node of graph.topologicalOrder()) {
    if (node.type !== "potion") {
      continue;
    }
    const { potion } = brewPotion(node.kind, { random: options.random, registry: options.registry });

    for (const successor of graph.successors(node.id)) {
      if (successor.type !== "requirement") {
        continue;
      }
      const requirement = successor.requirement;
      const candidates = inventory
        .list(ingredientDisplayName(requirement.kind))
        .filter((ingredient) => ingredient.quality === requirement.quality);

      for (const ingredient of candidates) {
        const cost = ingredientCost(ingredient);
        const entry: ConsumedIngredient = { potionKind: node.kind, requirement, ingredient, cost };
        if (trySpend(budget, ingredient.quality, cost)) {
          inventory.remove(ingredient);
          consumed.push(entry);
          options.onEvent?.({ type: "consumed", remainingBudget: budget[ingredient.quality], ...entry });
        } else {
          options.onEvent?.({ type: "skipped", remainingBudget: budget[ingredient.quality], ...entry });
        }
      }
    }

    potions.push(potion);
  }

  return { potions, consumed, budget };
}
