import { describeIngredient } from "../lib/ingredients";
import { potionPower } from "../lib/potions";
import { runBrewSimulation, type SimulationPhase } from "../lib/simulation";
import { loadSimulationConfig, SimulationConfigError } from "../lib/simulation-config";

const PHASE_MESSAGES: Record<SimulationPhase, string> = {
  graph: "Building potion graph...",
  brew: "Brewing a random potion...",
  stock: "Generating ingredients...",
  optimize: "Optimizing potion creation...",
};

async function main(): Promise<void> {
  const config = loadSimulationConfig();
  console.log(
    `Seed ${config.seed}, ${config.ingredientCount} ingredients, budget normal=${config.budget.normal} premium=${config.budget.premium} legendary=${config.budget.legendary}`
  );

  const report = runBrewSimulation(config, {
    onPhase: (phase) => console.log(PHASE_MESSAGES[phase]),
    onInventoryEvent: (event) => {
      if (event.type === "added") {
        console.log(`Generated ingredient: ${describeIngredient(event.ingredient)}`);
      } else if (event.type === "missing") {
        console.warn(`Inventory warning: ${event.message}`);
      }
    },
    onAllocationEvent: (event) => {
      if (event.type === "consumed") {
        console.log(
          `Consumed ${describeIngredient(event.ingredient)} for ${event.potionKind} (cost ${event.cost}, ${event.ingredient.quality} budget left ${event.remainingBudget})`
        );
      }
    },
  });

  for (const line of report.graphLines) {
    console.log(line);
  }

  const { potion, ingredients } = report.generatedPotion;
  console.log(`Generated ${potion.displayName} with power ${potionPower(potion)}. Ingredients:`);
  for (const ingredient of ingredients) {
    console.log(`- ${describeIngredient(ingredient)}`);
  }

  console.log("Inventory:");
  for (const row of report.inventoryBefore) {
    console.log(`- ${row.name}: ${row.count}`);
  }

  console.log("Optimized potion creation:");
  for (const optimized of report.optimization.potions) {
    console.log(`- ${optimized.displayName} (power ${potionPower(optimized)})`);
  }
  if (report.optimization.consumed.length === 0) {
    console.log("No ingredients consumed: the quality budget was not funded enough for any matching stock.");
  }

  console.log("Inventory after optimization:");
  for (const row of report.inventoryAfter) {
    console.log(`- ${row.name}: ${row.count}`);
  }
}

void main().catch((error) => {
  if (error instanceof SimulationConfigError) {
    console.error("Invalid configuration:");
    for (const detail of error.details) {
      console.error(`- ${detail}`);
    }
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Simulation failed: ${message}`);
  }
  process.exit(1);
});
