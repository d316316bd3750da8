import type { Ingredient } from "./ingredients";
import { IngredientInventory, type InventoryEvent, type InventoryReportRow } from "./inventory";
import { optimizePotions, pickRandomPotion, type AllocationEvent, type OptimizationResult } from "./optimizer";
import { buildPotionGraph, describePotionGraph, type PotionGraph } from "./potion-graph";
import { PotionRegistry, type BrewResult } from "./potions";
import { createSeededRandom, type RandomSource } from "./random";
import type { PotionKind } from "./recipes";
import type { SimulationConfig } from "./simulation-config";

export type SimulationPhase = "graph" | "brew" | "stock" | "optimize";

export type SimulationHooks = {
  onPhase?: (phase: SimulationPhase) => void;
  onInventoryEvent?: (event: InventoryEvent) => void;
  onAllocationEvent?: (event: AllocationEvent) => void;
};

export type SimulationReport = {
  seed: number;
  graph: PotionGraph;
  graphLines: string[];
  generatedPotion: BrewResult;
  generatedIngredients: Ingredient[];
  inventoryBefore: InventoryReportRow[];
  inventoryAfter: InventoryReportRow[];
  optimization: OptimizationResult;
  brewedByKind: Record<PotionKind, number>;
};

/**
 * One end-to-end run: build the graph, brew a random potion, stock the
 * inventory with random ingredients, then run the allocation pass with the
 * configured budget. Every run owns its own registry, inventory and budget.
 */
export function runBrewSimulation(
  config: SimulationConfig,
  hooks: SimulationHooks = {},
  random: RandomSource = createSeededRandom(config.seed)
): SimulationReport {
  const registry = new PotionRegistry();

  hooks.onPhase?.("graph");
  const graph = buildPotionGraph();

  hooks.onPhase?.("brew");
  const generatedPotion = pickRandomPotion(graph, random, registry);

  hooks.onPhase?.("stock");
  const inventory = new IngredientInventory({ onEvent: hooks.onInventoryEvent });
  const generatedIngredients: Ingredient[] = [];
  for (let index = 0; index < config.ingredientCount; index += 1) {
    generatedIngredients.push(inventory.generateRandom(random));
  }
  const inventoryBefore = inventory.report();

  hooks.onPhase?.("optimize");
  const optimization = optimizePotions(graph, inventory, {
    budget: config.budget,
    random,
    registry,
    onEvent: hooks.onAllocationEvent,
  });

  return {
    seed: config.seed,
    graph,
    graphLines: describePotionGraph(graph),
    generatedPotion,
    generatedIngredients,
    inventoryBefore,
    inventoryAfter: inventory.report(),
    optimization,
    brewedByKind: registry.countByKind(),
  };
}
