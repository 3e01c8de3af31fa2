import type { Language, PasswordPolicyName } from './password.js';

export type EnvironmentName = 'test' | 'dev' | 'prod';

export interface EnvironmentConfig {
  environment: EnvironmentName;
  passwordPolicy: PasswordPolicyName;
  language: Language;
}
