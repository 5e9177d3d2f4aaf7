import type { DirectedGraph } from "./graph";
import { assertSensitivity, transform } from "./node";
import {
  CarriedValue,
  IdeologyNode,
  NodeId,
  PropagationResult,
  PropagationRun,
  TransmissionState
} from "./types";

function isSaturated(value: number): boolean {
  return value === 0 || value === 1;
}

/**
 * Walk the shortest path from source to target, letting every node except the
 * target transform the message once.
 *
 * Hop 0 is the source acting on its own value and is never reported. A message
 * that lands exactly on 0 or 1 is saturated: the hop that got it there is
 * still reported, then the walk stops.
 */
export function propagate(
  graph: DirectedGraph<IdeologyNode>,
  sourceId: NodeId,
  targetId: NodeId,
  sensitivity: number
): PropagationRun {
  assertSensitivity(sensitivity);
  const path = graph.shortestPath(sourceId, targetId);
  const pathLength = path.length;

  const initialMessageIdeology = graph.getNode(sourceId).ideologyScore;
  let message = initialMessageIdeology;
  let fidelityDrift = 0;
  let plausibilityDrift = 0;
  let state: TransmissionState = TransmissionState.Continuing;
  let haltedAtHop: number | null = null;

  const results: PropagationResult[] = [];
  const carried: CarriedValue[] = [];

  for (let hop = 0; hop < path.length - 1; hop += 1) {
    const node = graph.getNode(path[hop]);
    const before = message;
    const after = transform(node, before, sensitivity);
    message = after;

    if (isSaturated(after)) {
      state = TransmissionState.Saturated;
      haltedAtHop = hop;
    }

    carried.push({ source: path[hop], target: path[hop + 1], messageIdeology: after });

    if (hop > 0) {
      const nodeDrift = after - before;
      fidelityDrift += Math.abs(nodeDrift);
      plausibilityDrift += nodeDrift;

      results.push({
        hop,
        nodeId: node.id,
        pathLength,
        initialMessageIdeology,
        nodeIdeology: node.ideologyScore,
        sensitivity,
        biasMultiplier: node.biasMultiplier,
        messageIdeologyBefore: before,
        messageIdeologyAfter: after,
        fidelityDrift,
        plausibilityDrift,
        transmissionSuccess: state === TransmissionState.Continuing,
        state
      });
    }

    if (state === TransmissionState.Saturated) break;
  }

  return {
    path,
    initialMessageIdeology,
    finalMessageIdeology: message,
    state,
    haltedAtHop,
    results,
    carried
  };
}
