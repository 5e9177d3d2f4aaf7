import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { formatReport, parsePreset, reportHash, runSweep, SimulationError } from "../core/src/index";
import type { GraphBuilder, Preset } from "../core/src/index";

export const SPECS_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "specs");

export interface CliArgs {
  preset: string;
  seed?: number;
  out?: string;
  hash: boolean;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (line: string) => void;
  buildGraph?: GraphBuilder;
}

export class UsageError extends Error {}

function splitFlag(token: string): [string, string | undefined] {
  const eq = token.indexOf("=");
  if (!token.startsWith("--") || eq === -1) return [token, undefined];
  return [token.slice(0, eq), token.slice(eq + 1)];
}

export function parseArgs(rawArgs: string[]): CliArgs {
  const args: CliArgs = { preset: "baseline", hash: false };

  for (let i = 0; i < rawArgs.length; i += 1) {
    const token = rawArgs[i];
    const [flag, inline] = splitFlag(token);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const value = rawArgs[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`${flag} needs a value`);
      i += 1;
      return value;
    };

    if (flag === "--preset") {
      args.preset = takeValue();
    } else if (flag === "--seed") {
      const seed = Number(takeValue());
      if (!Number.isInteger(seed) || seed < 0) throw new UsageError("--seed must be a non-negative integer");
      args.seed = seed;
    } else if (flag === "--out") {
      args.out = takeValue();
    } else if (flag === "--hash") {
      args.hash = true;
    } else {
      throw new UsageError(`unknown argument: ${token}`);
    }
  }

  return args;
}

/** A bare name is looked up in specs/; anything else is read as a file path. */
export function loadPreset(nameOrPath: string, specsDir: string = SPECS_DIR): Preset {
  const named = join(specsDir, `${nameOrPath}.json`);
  const file = existsSync(named) ? named : resolve(nameOrPath);
  if (!existsSync(file)) throw new UsageError(`preset not found: ${nameOrPath}`);
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  return parsePreset(raw);
}

export function runCli(rawArgs: string[], io: CliIo): number {
  try {
    const args = parseArgs(rawArgs);
    const preset = loadPreset(args.preset);
    const config = args.seed === undefined ? preset.sweep : { ...preset.sweep, seed: args.seed };

    const output = runSweep(config, { buildGraph: io.buildGraph });
    output.failures.forEach((failure) => {
      io.stderr(`run ${failure.runId} skipped: ${failure.message}`);
    });

    const report = formatReport(output);
    if (args.out) {
      writeFileSync(args.out, report, "utf8");
      io.stderr(`wrote ${output.runs.length} runs to ${args.out}`);
    } else {
      io.stdout(report);
    }

    if (args.hash) {
      io.stderr(`report hash: ${reportHash(report)}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError || error instanceof SimulationError || error instanceof SyntaxError) {
      io.stderr(`sweep: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
