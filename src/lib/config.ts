import { z } from "zod";

/**
 * Engine configuration schema with validation
 */
const configSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  // Terms requested from each auxiliary sequence when building classification state
  termCount: z.number().int().min(1).default(200),
  // Working-array size of the admissible-term generator
  sequenceLimit: z.number().int().min(2).default(1000),

  m3a5MaxIterations: z.number().int().min(1).default(100),
});

export type Config = z.infer<typeof configSchema>;

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return Number(value);
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env["ORBIT_LOG_LEVEL"] || undefined,
    termCount: parseOptionalInt(env["ORBIT_TERM_COUNT"]),
    sequenceLimit: parseOptionalInt(env["ORBIT_SEQUENCE_LIMIT"]),
    m3a5MaxIterations: parseOptionalInt(env["ORBIT_M3A5_MAX_ITERATIONS"]),
  });
}

export const config: Config = loadConfig();
