import {
  createIngredient,
  ingredientDisplayName,
  ingredientsEqual,
  INGREDIENT_KINDS,
  MAX_RANDOM_QUANTITY,
  MIN_RANDOM_QUANTITY,
  QUALITY_TIERS,
  type Ingredient,
} from "./ingredients";
import type { RandomSource } from "./random";

export type InventoryReportRow = {
  name: string;
  count: number;
};

export type InventoryEvent =
  | { type: "added"; ingredient: Ingredient }
  | { type: "removed"; ingredient: Ingredient }
  | { type: "missing"; ingredient: Ingredient; message: string };

export type IngredientInventoryOptions = {
  onEvent?: (event: InventoryEvent) => void;
};

/**
 * Ingredient stock keyed by display name. Each name keeps its instances in the
 * order they were added; structurally equal instances are interchangeable.
 */
export class IngredientInventory {
  private readonly stock = new Map<string, Ingredient[]>();
  private readonly onEvent?: (event: InventoryEvent) => void;

  constructor(options: IngredientInventoryOptions = {}) {
    this.onEvent = options.onEvent;
  }

  add(ingredient: Ingredient): void {
    const name = ingredientDisplayName(ingredient.kind);
    const entries = this.stock.get(name);
    if (entries) {
      entries.push(ingredient);
    } else {
      this.stock.set(name, [ingredient]);
    }
    this.onEvent?.({ type: "added", ingredient });
  }

  remove(ingredient: Ingredient): boolean {
    const name = ingredientDisplayName(ingredient.kind);
    const entries = this.stock.get(name);
    const index = entries ? entries.findIndex((entry) => ingredientsEqual(entry, ingredient)) : -1;
    if (!entries || index < 0) {
      this.onEvent?.({
        type: "missing",
        ingredient,
        message: `no ${name} matching ${ingredient.quantity} ${ingredient.quality} in stock`,
      });
      return false;
    }

    entries.splice(index, 1);
    if (entries.length === 0) {
      this.stock.delete(name);
    }
    this.onEvent?.({ type: "removed", ingredient });
    return true;
  }

  generateRandom(random: RandomSource): Ingredient {
    const kind = random.chooseUniform(INGREDIENT_KINDS);
    const quantity = random.uniformInt(MIN_RANDOM_QUANTITY, MAX_RANDOM_QUANTITY);
    const quality = random.chooseUniform(QUALITY_TIERS);
    const ingredient = createIngredient(kind, quantity, quality);
    this.add(ingredient);
    return ingredient;
  }

  list(name: string): Ingredient[] {
    return [...(this.stock.get(name) || [])];
  }

  entries(): [string, Ingredient[]][] {
    return Array.from(this.stock.entries()).map(([name, ingredients]): [string, Ingredient[]] => [name, [...ingredients]]);
  }

  count(name: string): number {
    return this.stock.get(name)?.length || 0;
  }

  totalCount(): number {
    let total = 0;
    for (const entries of this.stock.values()) {
      total += entries.length;
    }
    return total;
  }

  report(): InventoryReportRow[] {
    return Array.from(this.stock.entries())
      .filter(([, entries]) => entries.length > 0)
      .map(([name, entries]) => ({ name, count: entries.length }));
  }
}
