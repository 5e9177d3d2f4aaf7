export * from "./types";
export * from "./errors";
export { clamp01, createRng, deriveSeed } from "./rng";
export type { Rng } from "./rng";
export { DirectedGraph } from "./graph";
export { createNode, transform } from "./node";
export { propagate } from "./propagation";
export { assertChainParams, generateChain } from "./generator";
export { planRuns, runChain, runSweep } from "./sweep";
export type { GraphBuilder, RunSweepOptions } from "./sweep";
export { REPORT_HEADER, formatReport, formatReportLine, formatSignificant } from "./report";
export { fingerprint, reportHash, stableStringify } from "./hash";
export { parsePreset, parseSweepConfig, presetSchema, sweepConfigSchema } from "./config";
