import { describeIngredient, ingredientKey, type Ingredient } from "./ingredients";
import { getRecipe, potionKinds, type PotionKind } from "./recipes";

export type PotionNode = {
  id: string;
  type: "potion";
  kind: PotionKind;
  label: string;
};

export type RequirementNode = {
  id: string;
  type: "requirement";
  requirement: Ingredient;
  label: string;
};

export type PotionGraphNode = PotionNode | RequirementNode;

export type PotionGraphEdge = {
  from: string;
  to: string;
};

export class PotionGraphCycleError extends Error {
  readonly nodeIds: string[];

  constructor(nodeIds: string[]) {
    super(`potion graph has a cycle through: ${nodeIds.join(", ")}`);
    this.name = "PotionGraphCycleError";
    this.nodeIds = nodeIds;
  }
}

export class PotionGraphEdgeError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super(`cannot add edge ${from} -> ${to}: unknown node`);
    this.name = "PotionGraphEdgeError";
    this.from = from;
    this.to = to;
  }
}

export function potionNodeId(kind: PotionKind): string {
  return `potion:${kind}`;
}

export function requirementNodeId(requirement: Ingredient): string {
  return `ingredient:${ingredientKey(requirement)}`;
}

export class PotionGraph {
  private readonly nodesById = new Map<string, PotionGraphNode>();
  private readonly outgoing = new Map<string, string[]>();
  private readonly incoming = new Map<string, string[]>();

  addNode(node: PotionGraphNode): void {
    if (this.nodesById.has(node.id)) {
      return;
    }
    this.nodesById.set(node.id, node);
    this.outgoing.set(node.id, []);
    this.incoming.set(node.id, []);
  }

  addEdge(from: string, to: string): void {
    const targets = this.outgoing.get(from);
    const sources = this.incoming.get(to);
    if (!targets || !sources) {
      throw new PotionGraphEdgeError(from, to);
    }
    if (targets.includes(to)) {
      return;
    }
    targets.push(to);
    sources.push(from);
  }

  nodes(): PotionGraphNode[] {
    return Array.from(this.nodesById.values());
  }

  potionNodes(): PotionNode[] {
    return this.nodes().filter((node): node is PotionNode => node.type === "potion");
  }

  requirementNodes(): RequirementNode[] {
    return this.nodes().filter((node): node is RequirementNode => node.type === "requirement");
  }

  edges(): PotionGraphEdge[] {
    const edges: PotionGraphEdge[] = [];
    for (const [from, targets] of this.outgoing) {
      for (const to of targets) {
        edges.push({ from, to });
      }
    }
    return edges;
  }

  successors(id: string): PotionGraphNode[] {
    return this.resolve(this.outgoing.get(id) || []);
  }

  predecessors(id: string): PotionGraphNode[] {
    return this.resolve(this.incoming.get(id) || []);
  }

  get nodeCount(): number {
    return this.nodesById.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.outgoing.values()) {
      count += targets.length;
    }
    return count;
  }

  /**
   * Kahn's algorithm. Nodes that become ready at the same time keep insertion
   * order, so the result is stable for a given build sequence.
   */
  topologicalOrder(): PotionGraphNode[] {
    const inDegree = new Map<string, number>();
    for (const [id, sources] of this.incoming) {
      inDegree.set(id, sources.length);
    }

    const queue = Array.from(inDegree.entries())
      .filter(([, degree]) => degree === 0)
      .map(([id]) => id);
    const order: PotionGraphNode[] = [];

    for (let index = 0; index < queue.length; index += 1) {
      const id = queue[index];
      const node = this.nodesById.get(id);
      if (node) {
        order.push(node);
      }
      for (const target of this.outgoing.get(id) || []) {
        const remaining = (inDegree.get(target) || 0) - 1;
        inDegree.set(target, remaining);
        if (remaining === 0) {
          queue.push(target);
        }
      }
    }

    if (order.length < this.nodesById.size) {
      const stuck = Array.from(inDegree.entries())
        .filter(([, degree]) => degree > 0)
        .map(([id]) => id);
      throw new PotionGraphCycleError(stuck);
    }
    return order;
  }

  private resolve(ids: string[]): PotionGraphNode[] {
    const nodes: PotionGraphNode[] = [];
    for (const id of ids) {
      const node = this.nodesById.get(id);
      if (node) {
        nodes.push(node);
      }
    }
    return nodes;
  }
}

export function buildPotionGraph(kinds: readonly PotionKind[] = potionKinds()): PotionGraph {
  const graph = new PotionGraph();
  for (const kind of kinds) {
    graph.addNode({
      id: potionNodeId(kind),
      type: "potion",
      kind,
      label: getRecipe(kind).displayName,
    });
  }

  for (const kind of kinds) {
    for (const requirement of getRecipe(kind).ingredients) {
      const id = requirementNodeId(requirement);
      graph.addNode({
        id,
        type: "requirement",
        requirement,
        label: describeIngredient(requirement),
      });
      graph.addEdge(potionNodeId(kind), id);
    }
  }

  return graph;
}

export function describePotionGraph(graph: PotionGraph): string[] {
  const potions = graph.potionNodes();
  const lines = [
    `${potions.length} potions, ${graph.requirementNodes().length} ingredient requirements, ${graph.edgeCount} edges`,
  ];
  for (const node of potions) {
    const requirements = graph.successors(node.id).map((successor) => successor.label);
    lines.push(`${node.label} -> ${requirements.join(", ")}`);
  }
  return lines;
}
