import type { PropagationResult, SweepOutput } from "./types";

export const REPORT_HEADER = [
  "Run ID",
  "Node ID",
  "Path Length",
  "Initial Message Ideology",
  "Node Ideology",
  "Sensitivity",
  "Bias Multiplier",
  "Message Ideology Before",
  "Message Ideology After",
  "Fidelity Drift",
  "Plausibility Drift",
  "Transmission Success"
].join(", ");

function stripZeros(digits: string): string {
  return digits.includes(".") ? digits.replace(/0+$/, "").replace(/\.$/, "") : digits;
}

/** printf-style %g: `digits` significant digits, exponent form outside 1e-4 .. 10^digits. */
export function formatSignificant(value: number, digits: number): string {
  if (value === 0) return "0";
  if (!Number.isFinite(value)) return String(value);

  const [mantissa, exponentText] = value.toExponential(digits - 1).split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= digits) {
    const sign = exponent < 0 ? "-" : "+";
    return `${stripZeros(mantissa)}e${sign}${Math.abs(exponent).toString().padStart(2, "0")}`;
  }
  return stripZeros(value.toFixed(digits - 1 - exponent));
}

/**
 * Sensitivity is printed with String(), so a configured 1.0 reads "1": the
 * config holds numbers, not their source text.
 */
export function formatReportLine(runId: number, result: PropagationResult): string {
  return [
    String(runId),
    String(result.nodeId),
    String(result.pathLength),
    result.initialMessageIdeology.toFixed(5),
    result.nodeIdeology.toFixed(5),
    String(result.sensitivity),
    result.biasMultiplier.toFixed(2),
    result.messageIdeologyBefore.toFixed(5),
    result.messageIdeologyAfter.toFixed(5),
    result.fidelityDrift.toFixed(5),
    formatSignificant(result.plausibilityDrift, 5),
    String(result.transmissionSuccess)
  ].join(", ");
}

export function formatReport(output: SweepOutput): string {
  const lines = [REPORT_HEADER];
  output.runs.forEach((run) => {
    run.propagation.results.forEach((result) => {
      lines.push(formatReportLine(run.params.runId, result));
    });
  });
  return `${lines.join("\n")}\n`;
}
