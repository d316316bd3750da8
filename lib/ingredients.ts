export const INGREDIENT_KINDS = ["herb", "mushroom", "root"] as const;
export const QUALITY_TIERS = ["normal", "premium", "legendary"] as const;

export type IngredientKind = (typeof INGREDIENT_KINDS)[number];
export type QualityTier = (typeof QUALITY_TIERS)[number];

export type Ingredient = Readonly<{
  kind: IngredientKind;
  quantity: number;
  quality: QualityTier;
}>;

export const QUALITY_UNIT_COSTS: Readonly<Record<QualityTier, number>> = {
  normal: 1,
  premium: 3,
  legendary: 5,
};

const INGREDIENT_DISPLAY_NAMES: Record<IngredientKind, string> = {
  herb: "Herb",
  mushroom: "Mushroom",
  root: "Root",
};

export const MIN_RANDOM_QUANTITY = 1;
export const MAX_RANDOM_QUANTITY = 5;

export class IngredientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IngredientError";
  }
}

export function createIngredient(kind: IngredientKind, quantity: number, quality: QualityTier): Ingredient {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new IngredientError(`ingredient quantity must be a positive integer, got ${quantity}`);
  }
  return Object.freeze({ kind, quantity, quality });
}

export function ingredientDisplayName(kind: IngredientKind): string {
  return INGREDIENT_DISPLAY_NAMES[kind];
}

export function ingredientCost(ingredient: Ingredient): number {
  return ingredient.quantity * QUALITY_UNIT_COSTS[ingredient.quality];
}

export function ingredientsEqual(a: Ingredient, b: Ingredient): boolean {
  return a.kind === b.kind && a.quantity === b.quantity && a.quality === b.quality;
}

export function ingredientKey(ingredient: Ingredient): string {
  return `${ingredient.kind}:${ingredient.quantity}:${ingredient.quality}`;
}

export function describeIngredient(ingredient: Ingredient): string {
  return `${ingredient.quantity} ${ingredient.quality} ${ingredientDisplayName(ingredient.kind)}`;
}
