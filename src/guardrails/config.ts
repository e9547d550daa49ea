import { readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";

export const GuardrailFileSchema = z.object({
  version: z.string().optional(),
  red_flag_patterns: z.array(z.string().trim().min(1)),
  escalation_message: z.string().min(1).default("Please seek professional medical care."),
  prompt_injection_refusal: z
    .string()
    .min(1)
    .default("I can't comply with that request. I will answer based only on allowed policy summaries."),
});

export type GuardrailFile = z.infer<typeof GuardrailFileSchema>;

export function resolveConfigPath(path: string): string {
  return isAbsolute(path) ? path : join(process.cwd(), path);
}

/**
 * Read and validate the guardrail file. Any failure is a startup
 * ConfigurationError.
 */
export function loadGuardrailFile(path: string): GuardrailFile {
  const fullPath = resolveConfigPath(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Guardrail file could not be read: ${reason}`, ["guardrails.path"]);
  }

  const parsed = GuardrailFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError("Guardrail file failed validation", issues);
  }

  log.info({ config_path: fullPath, red_flag_patterns: parsed.data.red_flag_patterns.length }, "Loaded guardrail configuration");
  return parsed.data;
}
