export type NodeId = string | number;

export interface IdeologyNode {
  readonly id: NodeId;
  readonly ideologyScore: number;
  readonly biasMultiplier: number;
}

export interface NodeSpec {
  id: NodeId;
  ideologyScore: number;
  biasMultiplier: number;
}

export interface GraphEdge {
  source: NodeId;
  target: NodeId;
}

export const TransmissionState = {
  Continuing: "continuing",
  Saturated: "saturated"
} as const;

export type TransmissionState = (typeof TransmissionState)[keyof typeof TransmissionState];

export interface PropagationResult {
  hop: number;
  nodeId: NodeId;
  pathLength: number;
  initialMessageIdeology: number;
  nodeIdeology: number;
  sensitivity: number;
  biasMultiplier: number;
  messageIdeologyBefore: number;
  messageIdeologyAfter: number;
  fidelityDrift: number;
  plausibilityDrift: number;
  transmissionSuccess: boolean;
  state: TransmissionState;
}

export interface CarriedValue {
  source: NodeId;
  target: NodeId;
  messageIdeology: number;
}

export interface PropagationRun {
  path: NodeId[];
  initialMessageIdeology: number;
  finalMessageIdeology: number;
  state: TransmissionState;
  /** Hop index that saturated the message, or null when the target was reached. */
  haltedAtHop: number | null;
  results: PropagationResult[];
  carried: CarriedValue[];
}

export interface BiasRange {
  min: number;
  max: number;
}

export interface ChainParams {
  nodeCount: number;
  biasRange: BiasRange;
}

export interface SweepConfig {
  seed: number;
  nodeCounts: number[];
  sensitivities: number[];
  biasRange: BiasRange;
}

export interface RunParams extends ChainParams {
  runId: number;
  seed: number;
  sensitivity: number;
}

export interface SweepRun {
  params: RunParams;
  nodes: IdeologyNode[];
  propagation: PropagationRun;
}

export interface SweepFailure {
  runId: number;
  params: RunParams;
  message: string;
}

export interface SweepOutput {
  config: SweepConfig;
  runs: SweepRun[];
  failures: SweepFailure[];
}

export interface Preset {
  name: string;
  description: string;
  sweep: SweepConfig;
}
