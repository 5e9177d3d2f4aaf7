import { createNode, DirectedGraph } from "@core";
import type { IdeologyNode } from "@core";

/** Chain 0 -> 1 -> ... from [ideologyScore, biasMultiplier] pairs. */
export function chainOf(specs: Array<[number, number]>): DirectedGraph<IdeologyNode> {
  const graph = new DirectedGraph<IdeologyNode>();
  specs.forEach(([ideologyScore, biasMultiplier], id) => {
    graph.addNode(id, createNode({ id, ideologyScore, biasMultiplier }));
    if (id > 0) graph.addEdge(id - 1, id);
  });
  return graph;
}
