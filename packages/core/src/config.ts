import { z } from "zod";
import { ConfigurationError } from "./errors";

export const logLevelSchema = z.enum([
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

export type LogLevel = z.infer<typeof logLevelSchema>;

export const urlValidationSchema = z.object({
  allowPrivateIPs: z.boolean().optional(),
  allowLocalhost: z.boolean().optional(),
  allowedProtocols: z.array(z.string()).optional(),
  disableValidation: z.boolean().optional(),
});

/**
 * Settings shared by every request a Service creates.
 */
export const serviceConfigSchema = z.object({
  /** Per-attempt timeout handed to the transport, in milliseconds. */
  timeoutMs: z.number().int().positive().default(20_000),
  /** Log a full request/response dump after every execution. */
  debug: z.boolean().default(false),
  urlValidation: urlValidationSchema.default({}),
});

export type ServiceConfigInput = z.input<typeof serviceConfigSchema>;
export type ServiceConfig = z.output<typeof serviceConfigSchema>;

export const loggerEnvSchema = z.object({
  STEPWIRE_LOG_LEVEL: logLevelSchema.default("warn"),
});

export type LoggerEnv = z.infer<typeof loggerEnvSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
}

export function resolveServiceConfig(
  input: ServiceConfigInput = {}
): ServiceConfig {
  const parsed = serviceConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid service configuration: ${describeIssues(parsed.error)}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export function validateLoggerEnv(
  env: Record<string, string | undefined>
): LoggerEnv {
  const parsed = loggerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid logger environment: ${describeIssues(parsed.error)}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}
