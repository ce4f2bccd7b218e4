import { ConfigurationError, zodIssues } from 'layered-app-kit';
import * as z from 'zod';

export interface ApiConfig {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  /** How long fetched copies stay in local storage */
  readonly cacheTtlMs: number;
}

const apiEnvSchema = z.object({
  API_BASE_URL: z.string().url().default('http://localhost:8080/api'),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),
});

/**
 * @throws ConfigurationError when a variable is set to something unusable
 */
export function apiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = apiEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = zodIssues(parsed.error);
    const names = Object.keys(issues).join(', ');
    throw new ConfigurationError(`Invalid API environment: ${names}`, issues);
  }

  return {
    baseUrl: parsed.data.API_BASE_URL,
    timeoutMs: parsed.data.API_TIMEOUT_MS,
    cacheTtlMs: parsed.data.CACHE_TTL_MS,
  };
}
