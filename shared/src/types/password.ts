export type ValidationError =
  | { kind: 'tooShort'; minLength: number }
  | { kind: 'tooLong'; maxLength: number }
  | { kind: 'missingUppercase' }
  | { kind: 'missingLowercase' }
  | { kind: 'missingDigit' }
  | { kind: 'missingSpecialCharacter' };

export type ValidationErrorKind = ValidationError['kind'];

export type PasswordValidationResult =
  | { valid: true }
  | { valid: false; error: ValidationError };

export type PasswordRule = (password: string) => PasswordValidationResult;

export interface PasswordValidator {
  readonly validate: PasswordRule;
}

export type PasswordPolicyName = 'simple' | 'default';

export type Language = 'en' | 'nl';

export type ErrorDescriber = (error: ValidationError, language: Language) => string;

export interface PasswordCheckRequest {
  password: string;
  language?: string;
}

export interface PasswordCheckResponse {
  valid: true;
}
