import { ValidationError } from "./errors";
import { DirectedGraph } from "./graph";
import { createNode } from "./node";
import type { Rng } from "./rng";
import type { ChainParams, IdeologyNode } from "./types";

export function assertChainParams(params: ChainParams): void {
  const { nodeCount, biasRange } = params;
  if (!Number.isInteger(nodeCount) || nodeCount < 2) {
    throw new ValidationError("nodeCount", `must be an integer of at least 2, got ${nodeCount}`);
  }
  if (!(biasRange.min > 0) || !(biasRange.max >= biasRange.min) || !Number.isFinite(biasRange.max)) {
    throw new ValidationError("biasRange", `expected 0 < min <= max, got [${biasRange.min}, ${biasRange.max}]`);
  }
}

/** Chain 0 -> 1 -> ... -> nodeCount-1 with random ideology and bias per node. */
export function generateChain(rng: Rng, params: ChainParams): DirectedGraph<IdeologyNode> {
  assertChainParams(params);
  const { nodeCount, biasRange } = params;
  const graph = new DirectedGraph<IdeologyNode>();

  for (let id = 0; id < nodeCount; id += 1) {
    const biasMultiplier = rng.uniform(biasRange.min, biasRange.max);
    const ideologyScore = rng.next();
    graph.addNode(id, createNode({ id, ideologyScore, biasMultiplier }));
    if (id > 0) graph.addEdge(id - 1, id);
  }

  return graph;
}
