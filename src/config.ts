import { z } from "zod";
import { ConfigError } from "./rcon/errors";
import type { RCONConfig } from "./rcon/types";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 25575;
export const DEFAULT_PASSWORD = "test";
export const DEFAULT_TIMEOUT_SECONDS = 10.0;

// Node timers cap out at 2^31-1 ms and fire after 1ms beyond that
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;
const MAX_TIMEOUT_SECONDS = MAX_TIMEOUT_MS / 1000;

export interface ConfigFlags {
  host?: string;
  port?: string;
  password?: string;
  timeout?: string;
  verbose?: boolean;
}

const PortSchema = z.coerce
  .number({ invalid_type_error: "port must be a number" })
  .int("port must be an integer")
  .min(1, "port must be between 1 and 65535")
  .max(65535, "port must be between 1 and 65535");

export const RCONConfigSchema = z.object({
  host: z.string().min(1, "host cannot be empty"),
  port: PortSchema,
  password: z.string(),
  timeoutMs: z
    .number()
    .finite("timeout must be a finite number")
    .min(1, "timeout must be at least 1ms")
    .max(MAX_TIMEOUT_MS, `timeout must be at most ${MAX_TIMEOUT_MS}ms`),
  verbose: z.boolean().optional(),
});

const ConfigInputSchema = z
  .object({
    host: z.string().min(1, "host cannot be empty"),
    port: PortSchema,
    password: z.string(),
    timeout: z.coerce
      .number({ invalid_type_error: "timeout must be a number of seconds" })
      .positive("timeout must be positive")
      .finite("timeout must be a finite number")
      .max(MAX_TIMEOUT_SECONDS, `timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds`),
    verbose: z.boolean(),
  })
  .transform(({ timeout, ...rest }): RCONConfig => ({
    ...rest,
    timeoutMs: Math.round(timeout * 1000),
  }))
  .pipe(RCONConfigSchema);

/**
 * Layers connection settings: explicit flag, then environment variable,
 * then built-in default. The timeout has no environment variable.
 */
export function resolveRCONConfig(
  flags: ConfigFlags,
  env: Record<string, string | undefined> = process.env
): RCONConfig {
  const result = ConfigInputSchema.safeParse({
    host: flags.host ?? env.RCON_HOST ?? DEFAULT_HOST,
    port: flags.port ?? env.RCON_PORT ?? DEFAULT_PORT,
    password: flags.password ?? env.RCON_PASSWORD ?? DEFAULT_PASSWORD,
    timeout: flags.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    verbose: flags.verbose ?? false,
  });

  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

export function validateRCONConfig(config: RCONConfig): void {
  const result = RCONConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}
