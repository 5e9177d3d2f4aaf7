import { describe, expect, it } from "vitest";
import {
  formatReport,
  formatReportLine,
  formatSignificant,
  propagate,
  REPORT_HEADER,
  TransmissionState
} from "@core";
import type { PropagationResult, SweepOutput } from "@core";
import { chainOf } from "./helpers";

describe("formatSignificant", () => {
  it("trims trailing zeros in fixed notation", () => {
    expect(formatSignificant(0.49, 5)).toBe("0.49");
    expect(formatSignificant(2.5, 5)).toBe("2.5");
    expect(formatSignificant(-0.123456789, 5)).toBe("-0.12346");
    expect(formatSignificant(12345, 5)).toBe("12345");
    expect(formatSignificant(-0.0003, 5)).toBe("-0.0003");
  });

  it("switches to exponent notation for very small and large magnitudes", () => {
    expect(formatSignificant(0.0000125, 5)).toBe("1.25e-05");
    expect(formatSignificant(123456, 5)).toBe("1.2346e+05");
  });

  it("renders zero plainly", () => {
    expect(formatSignificant(0, 5)).toBe("0");
  });
});

describe("report", () => {
  it("starts with the header", () => {
    expect(REPORT_HEADER).toBe(
      "Run ID, Node ID, Path Length, Initial Message Ideology, Node Ideology, Sensitivity, Bias Multiplier, " +
        "Message Ideology Before, Message Ideology After, Fidelity Drift, Plausibility Drift, Transmission Success"
    );
  });

  it("formats each field with its own precision", () => {
    const result: PropagationResult = {
      hop: 2,
      nodeId: 4,
      pathLength: 7,
      initialMessageIdeology: 0.123456,
      nodeIdeology: 0.9,
      sensitivity: 1.5,
      biasMultiplier: 2.5,
      messageIdeologyBefore: 0.25,
      messageIdeologyAfter: 0.75,
      fidelityDrift: 1.2,
      plausibilityDrift: -0.0003,
      transmissionSuccess: false,
      state: TransmissionState.Saturated
    };
    expect(formatReportLine(3, result)).toBe(
      "3, 4, 7, 0.12346, 0.90000, 1.5, 2.50, 0.25000, 0.75000, 1.20000, -0.0003, false"
    );
  });

  it("prints sensitivity as the plain number it holds", () => {
    const result: PropagationResult = {
      hop: 1,
      nodeId: 1,
      pathLength: 3,
      initialMessageIdeology: 0.5,
      nodeIdeology: 0.5,
      sensitivity: 1.0,
      biasMultiplier: 1,
      messageIdeologyBefore: 0.5,
      messageIdeologyAfter: 0.5,
      fidelityDrift: 0,
      plausibilityDrift: 0,
      transmissionSuccess: true,
      state: TransmissionState.Continuing
    };
    expect(formatReportLine(0, result).split(", ")[5]).toBe("1");
    expect(formatReportLine(0, { ...result, sensitivity: 0.5 }).split(", ")[5]).toBe("0.5");
  });

  it("writes one line per emitted hop across runs", () => {
    const propagation = propagate(
      chainOf([
        [0.2, 1],
        [0.9, 1],
        [0.5, 1]
      ]),
      0,
      2,
      1
    );
    const params = { runId: 0, seed: 1, nodeCount: 3, sensitivity: 1, biasRange: { min: 1, max: 1 } };
    const output: SweepOutput = {
      config: { seed: 1, nodeCounts: [3], sensitivities: [1], biasRange: { min: 1, max: 1 } },
      runs: [{ params, nodes: [], propagation }],
      failures: []
    };

    expect(formatReport(output)).toBe(
      `${REPORT_HEADER}\n0, 1, 3, 0.20000, 0.90000, 1, 1.00, 0.20000, 0.69000, 0.49000, 0.49, true\n`
    );
  });

  it("prints only the header for an empty sweep", () => {
    const output: SweepOutput = {
      config: { seed: 1, nodeCounts: [2], sensitivities: [1], biasRange: { min: 1, max: 1 } },
      runs: [],
      failures: []
    };
    expect(formatReport(output)).toBe(`${REPORT_HEADER}\n`);
  });
});
