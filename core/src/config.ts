import { z } from "zod";
import { ValidationError } from "./errors";
import type { Preset, SweepConfig } from "./types";

export const sweepConfigSchema = z
  .object({
    seed: z.number().int().nonnegative(),
    nodeCounts: z.array(z.number().int().min(2)).nonempty(),
    sensitivities: z.array(z.number().positive().finite()).nonempty(),
    biasRange: z.object({
      min: z.number().positive().finite(),
      max: z.number().positive().finite()
    })
  })
  .refine((config) => config.biasRange.min <= config.biasRange.max, {
    message: "min must not exceed max",
    path: ["biasRange"]
  });

export const presetSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  sweep: sweepConfigSchema
});

function toValidationError(field: string, error: z.ZodError): ValidationError {
  const details = error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"} ${issue.message}`)
    .join("; ");
  return new ValidationError(field, details);
}

export function parseSweepConfig(input: unknown): SweepConfig {
  const parsed = sweepConfigSchema.safeParse(input);
  if (!parsed.success) throw toValidationError("sweep", parsed.error);
  return parsed.data;
}

export function parsePreset(input: unknown): Preset {
  const parsed = presetSchema.safeParse(input);
  if (!parsed.success) throw toValidationError("preset", parsed.error);
  return parsed.data;
}
