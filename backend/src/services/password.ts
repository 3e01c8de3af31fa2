import {
  DEFAULT_LANGUAGE,
  describeValidationError,
  type ErrorDescriber,
  type Language,
  type PasswordValidator,
  type ValidationError,
  type ValidationErrorKind,
} from '@passcheck/shared';

export type PasswordCheckOutcome =
  | { valid: true }
  | { valid: false; code: ValidationErrorKind; error: ValidationError; message: string };

export interface PasswordService {
  check(password: string, language?: Language): PasswordCheckOutcome;
}

export interface PasswordServiceOptions {
  /** Language used when the caller does not ask for one. */
  language?: Language;
  describe?: ErrorDescriber;
}

/**
 * Binds a validator and a message renderer together. Which validator is
 * active is decided by whoever calls this, usually from environment config.
 */
export function createPasswordService(
  validator: PasswordValidator,
  options: PasswordServiceOptions = {},
): PasswordService {
  const defaultLanguage = options.language ?? DEFAULT_LANGUAGE;
  const describe = options.describe ?? describeValidationError;

  return {
    check(password: string, language: Language = defaultLanguage): PasswordCheckOutcome {
      const result = validator.validate(password);
      if (result.valid) return { valid: true };
      return {
        valid: false,
        code: result.error.kind,
        error: result.error,
        message: describe(result.error, language),
      };
    },
  };
}
