import { describe, expect, it } from "vitest";

import { createIngredient, ingredientCost, type Ingredient } from "./ingredients";
import { IngredientInventory } from "./inventory";
import { optimizePotions, pickRandomPotion, type AllocationEvent } from "./optimizer";
import { buildPotionGraph } from "./potion-graph";
import { PotionRegistry } from "./potions";
import { createRandomSource, createSeededRandom } from "./random";
import { getRecipe, potionKinds } from "./recipes";

function stockedInventory(): IngredientInventory {
  const inventory = new IngredientInventory();
  inventory.add(createIngredient("herb", 3, "normal"));
  inventory.add(createIngredient("herb", 2, "normal"));
  inventory.add(createIngredient("mushroom", 1, "premium"));
  inventory.add(createIngredient("root", 2, "legendary"));
  return inventory;
}

describe("pickRandomPotion", () => {
  it("brews the chosen potion kind with its recipe ingredients", () => {
    const registry = new PotionRegistry();
    const { potion, ingredients } = pickRandomPotion(buildPotionGraph(), createRandomSource(() => 0.5), registry);

    expect(potion.kind).toBe("invisibility");
    expect(potion.extraPower).toBe(3);
    expect(ingredients).toEqual(getRecipe("invisibility").ingredients);
    expect(registry.countByKind()).toEqual({ healing: 0, invisibility: 1, strength: 0 });
  });
});

describe("optimizePotions", () => {
  it("produces potions but consumes nothing with an unfunded budget", () => {
    const inventory = stockedInventory();
    const before = inventory.report();
    const result = optimizePotions(buildPotionGraph(), inventory);

    expect(result.potions.map((potion) => potion.kind)).toEqual(["healing", "invisibility", "strength"]);
    expect(result.consumed).toEqual([]);
    expect(result.budget).toEqual({ normal: 0, premium: 0, legendary: 0 });
    expect(inventory.report()).toEqual(before);
    expect(inventory.totalCount()).toBe(4);
  });

  it("reports unaffordable stock as skipped", () => {
    const events: AllocationEvent[] = [];
    const inventory = new IngredientInventory();
    inventory.add(createIngredient("herb", 3, "normal"));
    optimizePotions(buildPotionGraph(), inventory, { onEvent: (event) => events.push(event) });

    expect(events).toEqual([
      {
        type: "skipped",
        potionKind: "healing",
        requirement: createIngredient("herb", 3, "normal"),
        ingredient: createIngredient("herb", 3, "normal"),
        cost: 3,
        remainingBudget: 0,
      },
    ]);
  });

  it("consumes matching stock the funded budget can pay for", () => {
    const inventory = stockedInventory();
    const budget = { normal: 5, premium: 5, legendary: 5 };
    const result = optimizePotions(buildPotionGraph(), inventory, { budget });

    expect(result.consumed.map((entry) => [entry.potionKind, entry.ingredient, entry.cost])).toEqual([
      ["healing", createIngredient("herb", 3, "normal"), 3],
      ["healing", createIngredient("herb", 2, "normal"), 2],
      ["strength", createIngredient("mushroom", 1, "premium"), 3],
    ]);
    expect(result.budget).toEqual({ normal: 0, premium: 2, legendary: 5 });
    expect(inventory.report()).toEqual([{ name: "Root", count: 1 }]);
    expect(budget).toEqual({ normal: 5, premium: 5, legendary: 5 });
  });

  it("removes an affordable match from seeded random stock", () => {
    const random = createSeededRandom(42);
    const inventory = new IngredientInventory();
    const generated: Ingredient[] = [];
    for (let index = 0; index < 10; index += 1) {
      generated.push(inventory.generateRandom(random));
    }
    const required = new Set(
      potionKinds().flatMap((kind) =>
        getRecipe(kind).ingredients.map((requirement) => `${requirement.kind}:${requirement.quality}`)
      )
    );
    const result = optimizePotions(buildPotionGraph(), inventory, {
      budget: { normal: 5, premium: 5, legendary: 5 },
    });

    expect(result.consumed.length).toBeGreaterThanOrEqual(1);
    for (const entry of result.consumed) {
      expect(required.has(`${entry.ingredient.kind}:${entry.ingredient.quality}`)).toBe(true);
      expect(ingredientCost(entry.ingredient)).toBeLessThanOrEqual(5);
    }
    expect(inventory.totalCount()).toBe(generated.length - result.consumed.length);
    for (const tier of ["normal", "premium", "legendary"] as const) {
      expect(result.budget[tier]).toBeGreaterThanOrEqual(0);
    }
  });

  it("records one brewed potion per kind in the registry", () => {
    const registry = new PotionRegistry();
    optimizePotions(buildPotionGraph(), new IngredientInventory(), { registry });
    expect(registry.countByKind()).toEqual({ healing: 1, invisibility: 1, strength: 1 });
    expect(registry.activePotions().map((potion) => potion.id)).toEqual([1, 2, 3]);
  });
});
