import { ConfigurationError } from '../errors';
import { appConfigSchema, type AppConfig } from '../schemas/config.schema';

/**
 * Validate environment variables into an AppConfig
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = appConfigSchema.safeParse(env);

  if (!parsed.success) {
    const invalid = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${invalid.join('; ')}`, { invalid });
  }

  return parsed.data;
}
