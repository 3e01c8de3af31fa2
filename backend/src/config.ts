import {
  getEnvironmentConfig,
  parsePasswordPolicyName,
  PASSWORD_POLICIES,
  resolveLanguage,
  type EnvironmentConfig,
  type Language,
  type PasswordPolicyName,
  type PasswordValidator,
} from '@passcheck/shared';

const env = process.env.ENVIRONMENT || 'dev';

export const config: EnvironmentConfig = getEnvironmentConfig(env);

// PASSWORD_POLICY and PASSWORD_LANGUAGE override the environment defaults
export const passwordPolicy: PasswordPolicyName = parsePasswordPolicyName(
  process.env.PASSWORD_POLICY || config.passwordPolicy,
);

export const passwordValidator: PasswordValidator = PASSWORD_POLICIES[passwordPolicy];

export const defaultLanguage: Language = resolveLanguage(process.env.PASSWORD_LANGUAGE, config.language);
