import { z } from "zod";

import recipesData from "../data/potion-recipes.json";
import { createIngredient, ingredientKey, INGREDIENT_KINDS, QUALITY_TIERS, type Ingredient } from "./ingredients";
import { formatZodIssues } from "./validation";

export const POTION_KINDS = ["healing", "invisibility", "strength"] as const;

export type PotionKind = (typeof POTION_KINDS)[number];

export type PowerDistribution = {
  mean: number;
  lag: number;
};

export type Recipe = {
  displayName: string;
  ingredients: readonly Ingredient[];
  extraPower: PowerDistribution;
  powerBonus: number;
};

export type RecipeBook = Record<PotionKind, Recipe>;

const requirementSchema = z.object({
  kind: z.enum(INGREDIENT_KINDS),
  quantity: z.number().int().positive(),
  quality: z.enum(QUALITY_TIERS),
});

const recipeSchema = z
  .object({
    displayName: z.string().trim().min(1),
    ingredients: z.array(requirementSchema).min(1, "recipe needs at least one ingredient"),
    extraPower: z.object({
      mean: z.number().finite().positive(),
      lag: z.number().int().min(0),
    }),
    powerBonus: z.number().int().default(0),
  })
  .superRefine((recipe, ctx) => {
    const seen = new Set<string>();
    recipe.ingredients.forEach((requirement, index) => {
      const key = ingredientKey(requirement);
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["ingredients", index],
          message: `duplicate requirement ${key}`,
        });
      }
      seen.add(key);
    });
  });

const recipeBookSchema = z.object({
  healing: recipeSchema,
  invisibility: recipeSchema,
  strength: recipeSchema,
});

export class RecipeDataError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super(`invalid potion recipe data: ${details.join("; ")}`);
    this.name = "RecipeDataError";
    this.details = details;
  }
}

export function parseRecipeBook(raw: unknown): RecipeBook {
  const parsed = recipeBookSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecipeDataError(formatZodIssues(parsed.error));
  }

  return {
    healing: toRecipe(parsed.data.healing),
    invisibility: toRecipe(parsed.data.invisibility),
    strength: toRecipe(parsed.data.strength),
  };
}

function toRecipe(entry: z.infer<typeof recipeSchema>): Recipe {
  return {
    displayName: entry.displayName,
    ingredients: Object.freeze(
      entry.ingredients.map((requirement) => createIngredient(requirement.kind, requirement.quantity, requirement.quality))
    ),
    extraPower: { ...entry.extraPower },
    powerBonus: entry.powerBonus,
  };
}

export const recipes: RecipeBook = parseRecipeBook(recipesData);

export function getRecipe(kind: PotionKind): Recipe {
  return recipes[kind];
}

export function potionKinds(): PotionKind[] {
  return [...POTION_KINDS];
}

export function isPotionKind(value: string): value is PotionKind {
  return POTION_KINDS.some((kind) => kind === value);
}
