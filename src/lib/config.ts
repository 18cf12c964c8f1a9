import { z } from "zod";

const positiveInteger = (name: string, fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) => Number.parseInt(value, 10))
    .refine((value) => Number.isInteger(value) && value > 0, {
      message: `${name} must be a positive integer`,
    });

const configSchema = z.object({
  RECONCILE_SESSION_TTL_MINUTES: positiveInteger("RECONCILE_SESSION_TTL_MINUTES", "120"),
  RECONCILE_MAX_FINDINGS: positiveInteger("RECONCILE_MAX_FINDINGS", "500"),
});

export type ReconcileConfig = {
  sessionTtlMs: number;
  maxFindings: number;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): ReconcileConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const formatted = result.error.errors
      .map((err) => `${err.path.join(".")}: ${err.message}`)
      .join("\n");

    throw new Error(`Configuration validation failed:\n${formatted}`);
  }

  return {
    sessionTtlMs: result.data.RECONCILE_SESSION_TTL_MINUTES * 60 * 1000,
    maxFindings: result.data.RECONCILE_MAX_FINDINGS,
  };
}
