import { createIngredient, type Ingredient } from "./ingredients";
import { getRecipe, type PotionKind } from "./recipes";
import type { RandomSource } from "./random";

export type Potion = Readonly<{
  id: number;
  kind: PotionKind;
  displayName: string;
  extraPower: number;
}>;

export type BrewResult = {
  potion: Potion;
  ingredients: Ingredient[];
};

export type BrewOptions = {
  random?: RandomSource;
  registry?: PotionRegistry;
};

/** Potions brewed during one simulation run, with a per-kind tally. */
export class PotionRegistry {
  private readonly potions: Potion[] = [];
  private readonly tally: Record<PotionKind, number> = emptyTally();
  private lastId = 0;

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  record(potion: Potion): void {
    this.potions.push(potion);
    this.tally[potion.kind] += 1;
  }

  activePotions(): readonly Potion[] {
    return [...this.potions];
  }

  countByKind(): Record<PotionKind, number> {
    return { ...this.tally };
  }

  get size(): number {
    return this.potions.length;
  }
}

function emptyTally(): Record<PotionKind, number> {
  return { healing: 0, invisibility: 0, strength: 0 };
}

// Without a random source the extra-power draw is skipped and stays at zero.
// Ids come from the registry; a potion brewed without one gets id 0.
export function brewPotion(kind: PotionKind, options: BrewOptions = {}): BrewResult {
  const recipe = getRecipe(kind);
  const extraPower = options.random ? options.random.poisson(recipe.extraPower.mean, recipe.extraPower.lag) : 0;
  const potion: Potion = Object.freeze({
    id: options.registry ? options.registry.nextId() : 0,
    kind,
    displayName: recipe.displayName,
    extraPower,
  });
  options.registry?.record(potion);

  return {
    potion,
    ingredients: recipe.ingredients.map((requirement) =>
      createIngredient(requirement.kind, requirement.quantity, requirement.quality)
    ),
  };
}

export function potionPower(potion: Potion): number {
  return potion.extraPower + getRecipe(potion.kind).powerBonus;
}
