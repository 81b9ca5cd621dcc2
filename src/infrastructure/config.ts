import { z } from 'zod';
import { DEFAULT_SLACK_API_BASE_URL } from './slack/web-api-client.js';

/**
 * Runtime configuration, read from the process environment.
 */
export interface RelayConfig {
  /** App-level token for `apps.connections.open` and the socket. */
  appToken: string;
  /** Bot token for `chat.getPermalink` / `chat.postMessage`. */
  botToken: string;
  apiBaseUrl: string;
  debugReconnects: boolean;
  logLevel: string;
  /** Health endpoint is served only when a port is given. */
  healthPort: number | null;
  host: string;
}

export class ConfigError extends Error {
  readonly variables: readonly string[];

  constructor(message: string, variables: readonly string[]) {
    super(message);
    this.name = 'ConfigError';
    this.variables = variables;
  }
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  SLACK_APP_TOKEN: z.string({ required_error: 'is required' }).min(1, 'is required'),
  SLACK_OAUTH_TOKEN: z.string({ required_error: 'is required' }).min(1, 'is required'),
  SLACK_API_BASE_URL: z.string().url().default(DEFAULT_SLACK_API_BASE_URL),
  SLACK_DEBUG_RECONNECTS: booleanFlag.default('true'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOST: z.string().min(1).default('0.0.0.0'),
});

/**
 * Validates the environment and returns the relay configuration.
 *
 * Both Slack tokens are required. Every invalid or missing variable is
 * reported in a single ConfigError.
 */
export function loadRelayConfig(
  env: Record<string, string | undefined> = process.env,
): RelayConfig {
  // Empty strings count as unset for optional variables.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues
      .map((issue) => `${String(issue.path[0])} ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`, variables);
  }

  const data = parsed.data;
  return {
    appToken: data.SLACK_APP_TOKEN,
    botToken: data.SLACK_OAUTH_TOKEN,
    apiBaseUrl: data.SLACK_API_BASE_URL,
    debugReconnects: data.SLACK_DEBUG_RECONNECTS,
    logLevel: data.LOG_LEVEL,
    healthPort: data.HEALTH_PORT ?? null,
    host: data.HOST,
  };
}
