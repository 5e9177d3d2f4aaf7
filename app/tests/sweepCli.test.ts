import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
  createNode,
  DirectedGraph,
  formatReport,
  REPORT_HEADER,
  reportHash,
  runSweep,
  type GraphBuilder,
  type IdeologyNode
} from "@core";
import { loadPreset, parseArgs, runCli, UsageError } from "../../scripts/sweepCli";
import baselineSpec from "../../specs/baseline.json";

const disconnected: GraphBuilder = (rng, params) => {
  const graph = new DirectedGraph<IdeologyNode>();
  for (let id = 0; id < params.nodeCount; id += 1) {
    graph.addNode(id, createNode({ id, ideologyScore: rng.next(), biasMultiplier: 1 }));
  }
  return graph;
};

function capture(buildGraph?: GraphBuilder) {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    io: { stdout: (text: string) => out.push(text), stderr: (line: string) => err.push(line), buildGraph }
  };
}

describe("parseArgs", () => {
  it("defaults to the baseline preset", () => {
    expect(parseArgs([])).toEqual({ preset: "baseline", hash: false });
  });

  it("reads separate and inline values", () => {
    expect(parseArgs(["--preset", "polarizing", "--seed=9", "--hash"])).toEqual({
      preset: "polarizing",
      seed: 9,
      hash: true
    });
  });

  it("keeps everything after the first = in an inline value", () => {
    expect(parseArgs(["--out=/tmp/runs/out=1.csv"]).out).toBe("/tmp/runs/out=1.csv");
    expect(parseArgs(["--preset=a=b=c"]).preset).toBe("a=b=c");
  });

  it("rejects a flag with no value", () => {
    expect(() => parseArgs(["--out"])).toThrow("--out needs a value");
    expect(() => parseArgs(["--preset", "--hash"])).toThrow("--preset needs a value");
  });

  it("rejects unknown flags and bad seeds", () => {
    expect(() => parseArgs(["--bogus"])).toThrow(UsageError);
    expect(() => parseArgs(["--bogus=1"])).toThrow("unknown argument: --bogus=1");
    expect(() => parseArgs(["--seed", "-3"])).toThrow("--seed must be a non-negative integer");
  });
});

describe("loadPreset", () => {
  it("finds a preset by name", () => {
    expect(loadPreset("polarizing").name).toBe("polarizing");
  });

  it("reads a preset from a path", () => {
    const path = fileURLToPath(new URL("../../specs/long-chain.json", import.meta.url));
    expect(loadPreset(path).name).toBe("long-chain");
  });

  it("fails for a missing preset", () => {
    expect(() => loadPreset("no-such-preset")).toThrow("preset not found: no-such-preset");
  });
});

describe("runCli", () => {
  it("prints the report for the chosen seed and its hash", () => {
    const { out, err, io } = capture();
    const expected = formatReport(runSweep({ ...loadPreset("baseline").sweep, seed: 7 }));

    expect(runCli(["--seed=7", "--hash"], io)).toBe(0);
    expect(out).toEqual([expected]);
    expect(err).toEqual([`report hash: ${reportHash(expected)}`]);
  });

  it("logs skipped runs and keeps going", () => {
    const { out, err, io } = capture(disconnected);

    expect(runCli([], io)).toBe(0);
    expect(err).toHaveLength(baselineSpec.sweep.nodeCounts.length * baselineSpec.sweep.sensitivities.length);
    expect(err[0]).toBe("run 0 skipped: no directed path from 0 to 2");
    expect(err[4]).toBe("run 4 skipped: no directed path from 0 to 4");
    expect(out).toEqual([`${REPORT_HEADER}\n`]);
  });

  it("exits with 1 on invalid arguments", () => {
    const { out, err, io } = capture();
    expect(runCli(["--bogus"], io)).toBe(1);
    expect(err).toEqual(["sweep: unknown argument: --bogus"]);
    expect(out).toEqual([]);
  });

  it("exits with 1 on an unknown preset", () => {
    const { err, io } = capture();
    expect(runCli(["--preset", "nope"], io)).toBe(1);
    expect(err).toEqual(["sweep: preset not found: nope"]);
  });

  it("exits with 1 when the preset file is not a valid preset", () => {
    const { err, io } = capture();
    const path = fileURLToPath(new URL("../../package.json", import.meta.url));
    expect(runCli(["--preset", path], io)).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith("sweep: preset: ")).toBe(true);
  });
});
