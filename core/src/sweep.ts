import { NoPathError } from "./errors";
import { generateChain } from "./generator";
import type { DirectedGraph } from "./graph";
import { propagate } from "./propagation";
import { createRng, deriveSeed, type Rng } from "./rng";
import type { IdeologyNode, RunParams, SweepConfig, SweepFailure, SweepOutput, SweepRun } from "./types";

export type GraphBuilder = (rng: Rng, params: RunParams) => DirectedGraph<IdeologyNode>;

export interface RunSweepOptions {
  buildGraph?: GraphBuilder;
}

export function planRuns(config: SweepConfig): RunParams[] {
  const plan: RunParams[] = [];
  config.nodeCounts.forEach((nodeCount) => {
    config.sensitivities.forEach((sensitivity) => {
      const runId = plan.length;
      plan.push({
        runId,
        seed: deriveSeed(config.seed, runId),
        nodeCount,
        sensitivity,
        biasRange: { ...config.biasRange }
      });
    });
  });
  return plan;
}

/** One run from node 0 to the last node; throws NoPathError when they are disconnected. */
export function runChain(params: RunParams, buildGraph: GraphBuilder = generateChain): SweepRun {
  const graph = buildGraph(createRng(params.seed), params);
  const propagation = propagate(graph, 0, params.nodeCount - 1, params.sensitivity);
  return { params, nodes: graph.nodes(), propagation };
}

export function runSweep(config: SweepConfig, options: RunSweepOptions = {}): SweepOutput {
  const buildGraph = options.buildGraph ?? generateChain;
  const runs: SweepRun[] = [];
  const failures: SweepFailure[] = [];

  planRuns(config).forEach((params) => {
    try {
      runs.push(runChain(params, buildGraph));
    } catch (error) {
      if (!(error instanceof NoPathError)) throw error;
      failures.push({ runId: params.runId, params, message: error.message });
    }
  });

  return { config, runs, failures };
}
