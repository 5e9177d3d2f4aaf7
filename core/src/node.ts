import { ValidationError } from "./errors";
import { clamp01 } from "./rng";
import type { IdeologyNode, NodeSpec } from "./types";

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

export function assertSensitivity(sensitivity: number): void {
  if (!Number.isFinite(sensitivity) || sensitivity <= 0) {
    throw new ValidationError("sensitivity", `must be a positive number, got ${sensitivity}`);
  }
}

export function createNode(spec: NodeSpec): IdeologyNode {
  if (!isUnitInterval(spec.ideologyScore)) {
    throw new ValidationError("ideologyScore", `must be within [0, 1], got ${spec.ideologyScore}`);
  }
  if (!Number.isFinite(spec.biasMultiplier) || spec.biasMultiplier <= 0) {
    throw new ValidationError("biasMultiplier", `must be a positive number, got ${spec.biasMultiplier}`);
  }
  return Object.freeze({
    id: spec.id,
    ideologyScore: spec.ideologyScore,
    biasMultiplier: spec.biasMultiplier
  });
}

/**
 * Pull the message toward the node by bias * sensitivity * gap². The step
 * size ignores where the node sits, so a large gap can carry the message past
 * the node's own score. Only the result is clamped.
 */
export function transform(node: IdeologyNode, incomingIdeology: number, sensitivity: number): number {
  if (!isUnitInterval(incomingIdeology)) {
    throw new ValidationError("incomingIdeology", `must be within [0, 1], got ${incomingIdeology}`);
  }
  assertSensitivity(sensitivity);

  const delta = Math.abs(node.ideologyScore - incomingIdeology);
  const drift = node.biasMultiplier * sensitivity * delta * delta;
  const outgoing = node.ideologyScore > incomingIdeology ? incomingIdeology + drift : incomingIdeology - drift;
  return clamp01(outgoing);
}
