import { describe, expect, it } from "vitest";
import { fingerprint, formatReport, reportHash, runSweep, type SweepConfig } from "@core";

const config: SweepConfig = {
  seed: 42,
  nodeCounts: [3, 5, 7, 10],
  sensitivities: [0.5, 1.0, 1.5, 2.0],
  biasRange: { min: 0.5, max: 3.0 }
};

describe("sweep determinism", () => {
  it("produces identical reports for the same seed and config", () => {
    const first = formatReport(runSweep(config));
    const second = formatReport(runSweep(config));

    expect(first).toBe(second);
    expect(reportHash(first)).toEqual(reportHash(second));
  });

  it("produces identical run data for the same seed and config", () => {
    const first = runSweep(config);
    const second = runSweep(config);

    expect(fingerprint(first.runs)).toEqual(fingerprint(second.runs));
    expect(first.runs).toEqual(second.runs);
  });

  it("changes the report for different seeds", () => {
    const first = formatReport(runSweep({ ...config, seed: 10 }));
    const second = formatReport(runSweep({ ...config, seed: 11 }));

    expect(reportHash(first)).not.toEqual(reportHash(second));
  });
});
