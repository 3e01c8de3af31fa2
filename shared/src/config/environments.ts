import type { EnvironmentConfig, EnvironmentName } from '../types/environment.js';

export const testConfig: EnvironmentConfig = {
  environment: 'test',
  passwordPolicy: 'simple',
  language: 'en',
};

export const devConfig: EnvironmentConfig = {
  environment: 'dev',
  passwordPolicy: 'default',
  language: 'en',
};

export const prodConfig: EnvironmentConfig = {
  environment: 'prod',
  passwordPolicy: 'default',
  language: 'en',
};

const configs: Record<EnvironmentName, EnvironmentConfig> = {
  test: testConfig,
  dev: devConfig,
  prod: prodConfig,
};

function isEnvironmentName(env: string): env is EnvironmentName {
  return Object.hasOwn(configs, env);
}

export function getEnvironmentConfig(env: string): EnvironmentConfig {
  if (!isEnvironmentName(env)) {
    throw new Error(`Unknown environment: ${env}. Valid: test, dev, prod`);
  }
  return configs[env];
}
