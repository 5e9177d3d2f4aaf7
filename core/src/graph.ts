import { NoPathError, ValidationError } from "./errors";
import type { GraphEdge, NodeId } from "./types";

/**
 * Directed graph keyed by node id. Holds structure and per-node attributes
 * only; simulation output is never written back into it.
 */
export class DirectedGraph<A> {
  private readonly attributes = new Map<NodeId, A>();
  private readonly adjacency = new Map<NodeId, NodeId[]>();

  get size(): number {
    return this.attributes.size;
  }

  addNode(id: NodeId, attributes: A): void {
    if (this.attributes.has(id)) {
      throw new ValidationError("id", `duplicate node ${String(id)}`);
    }
    this.attributes.set(id, attributes);
    this.adjacency.set(id, []);
  }

  addEdge(fromId: NodeId, toId: NodeId): void {
    const successors = this.requireSuccessors(fromId);
    this.requireNode(toId);
    if (!successors.includes(toId)) successors.push(toId);
  }

  hasNode(id: NodeId): boolean {
    return this.attributes.has(id);
  }

  getNode(id: NodeId): A {
    return this.requireNode(id);
  }

  nodes(): A[] {
    return Array.from(this.attributes.values());
  }

  edges(): GraphEdge[] {
    const edges: GraphEdge[] = [];
    this.adjacency.forEach((targets, source) => {
      targets.forEach((target) => edges.push({ source, target }));
    });
    return edges;
  }

  successors(id: NodeId): NodeId[] {
    return [...this.requireSuccessors(id)];
  }

  /** Unweighted BFS; ties go to the edge added first. */
  shortestPath(sourceId: NodeId, targetId: NodeId): NodeId[] {
    this.requireNode(sourceId);
    this.requireNode(targetId);
    if (sourceId === targetId) return [sourceId];

    const previous = new Map<NodeId, NodeId>();
    const visited = new Set<NodeId>([sourceId]);
    const queue: NodeId[] = [sourceId];

    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const next of this.adjacency.get(current) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        previous.set(next, current);
        if (next === targetId) return this.unwind(previous, sourceId, targetId);
        queue.push(next);
      }
    }

    throw new NoPathError(sourceId, targetId);
  }

  private unwind(previous: Map<NodeId, NodeId>, sourceId: NodeId, targetId: NodeId): NodeId[] {
    const path: NodeId[] = [targetId];
    let cursor = targetId;
    while (cursor !== sourceId) {
      const step = previous.get(cursor);
      if (step === undefined) throw new NoPathError(sourceId, targetId);
      path.push(step);
      cursor = step;
    }
    return path.reverse();
  }

  private requireNode(id: NodeId): A {
    const node = this.attributes.get(id);
    if (node === undefined) {
      throw new ValidationError("id", `unknown node ${String(id)}`);
    }
    return node;
  }

  private requireSuccessors(id: NodeId): NodeId[] {
    const successors = this.adjacency.get(id);
    if (successors === undefined) {
      throw new ValidationError("id", `unknown node ${String(id)}`);
    }
    return successors;
  }
}
