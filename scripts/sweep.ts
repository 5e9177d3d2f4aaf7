#!/usr/bin/env tsx
/**
 * Run a parameter sweep and print the per-hop report.
 *
 * Usage:
 *   tsx scripts/sweep.ts [--preset <name|path>] [--seed <n>] [--out <file>] [--hash]
 *
 * --preset takes a preset name from specs/ (default: baseline) or a path to a
 * preset JSON file. --seed overrides the preset's seed.
 */

import { runCli } from "./sweepCli";

process.exitCode = runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(text),
  stderr: (line) => console.error(line)
});
