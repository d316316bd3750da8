import { describe, expect, it } from "vitest";

import {
  createIngredient,
  describeIngredient,
  IngredientError,
  ingredientCost,
  ingredientKey,
  ingredientsEqual,
} from "./ingredients";

describe("ingredientCost", () => {
  it("multiplies quantity by the quality unit cost", () => {
    expect(ingredientCost(createIngredient("herb", 1, "premium"))).toBe(3);
    expect(ingredientCost(createIngredient("herb", 2, "premium"))).toBe(6);
    expect(ingredientCost(createIngredient("root", 4, "normal"))).toBe(4);
    expect(ingredientCost(createIngredient("mushroom", 3, "legendary"))).toBe(15);
  });
});

describe("createIngredient", () => {
  it("rejects quantities that are not positive integers", () => {
    expect(() => createIngredient("herb", 0, "normal")).toThrow(IngredientError);
    expect(() => createIngredient("herb", 1.5, "normal")).toThrow(IngredientError);
  });

  it("returns frozen values", () => {
    expect(Object.isFrozen(createIngredient("root", 1, "normal"))).toBe(true);
  });
});

describe("ingredient identity", () => {
  it("compares by kind, quantity and quality", () => {
    const herb = createIngredient("herb", 3, "normal");
    expect(ingredientsEqual(herb, createIngredient("herb", 3, "normal"))).toBe(true);
    expect(ingredientsEqual(herb, createIngredient("herb", 3, "premium"))).toBe(false);
    expect(ingredientsEqual(herb, createIngredient("root", 3, "normal"))).toBe(false);
    expect(ingredientKey(herb)).toBe("herb:3:normal");
  });

  it("describes ingredients for display", () => {
    expect(describeIngredient(createIngredient("mushroom", 2, "legendary"))).toBe("2 legendary Mushroom");
  });
});
