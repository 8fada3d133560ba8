import { assertEnvironment, isProduction, loadEnvironment } from '@moodlens/platform-core';
import { CHECKIN_ENV_VARS, getLogger, loadCheckInConfig } from './config/service-config';
import { ServiceFactory, type CheckInServiceRegistry, type ServiceOverrides } from './infrastructure/composition/ServiceFactory';

const logger = getLogger('checkin-service-bootstrap');

export interface BootstrapOptions extends ServiceOverrides {
  envPath?: string;
}

/**
 * Load .env, validate the environment and wire the services
 */
export async function bootstrapCheckInService(options: BootstrapOptions = {}): Promise<CheckInServiceRegistry> {
  const { envPath, ...overrides } = options;
  const env = overrides.env ?? process.env;

  if (!overrides.env) {
    loadEnvironment(envPath);
  }

  const required = CHECKIN_ENV_VARS.map(entry =>
    entry.name === 'GEMINI_API_KEY' && isProduction(env) ? { ...entry, required: true } : entry
  );
  assertEnvironment(required, env);

  const config = loadCheckInConfig(env);
  const registry = await ServiceFactory.create(config, { ...overrides, env });

  logger.info('Check-in service ready', {
    model: config.gemini.model,
    database: config.database.dataDir,
    offlineClassifier: !config.gemini.apiKey,
  });

  return registry;
}
