// Server configuration from the environment (after dotenv has loaded .env)
import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  /** object_info JSON describing every node class the host offers. */
  CATALOG_PATH: z.string().min(1),
  /** Initial session workflow: compact text, or native JSON when it ends in .json. */
  WORKFLOW_PATH: z.string().min(1).optional(),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

/**
 * Validate the environment. Throws with every offending variable listed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${problems.join('; ')}`);
  }
  return result.data;
}
