import type {
  PasswordPolicyName,
  PasswordRule,
  PasswordValidationResult,
  PasswordValidator,
  ValidationError,
} from '../types/password.js';

export const SIMPLE_MIN_LENGTH = 4;
export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 64;
export const SPECIAL_CHARACTERS = '!&^%$#@()/';

const PASSED: PasswordValidationResult = Object.freeze({ valid: true });

export function pass(): PasswordValidationResult {
  return PASSED;
}

export function fail(error: ValidationError): PasswordValidationResult {
  return { valid: false, error };
}

/**
 * Wraps a rule function as a validator. The rule must be pure: it returns
 * `pass()` or `fail(...)` and anything it throws propagates to the caller.
 */
export function createValidator(rule: PasswordRule): PasswordValidator {
  return Object.freeze({ validate: rule });
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Length in user-perceived characters, so "é" written as e + combining
 * accent, or an emoji with skin-tone modifier, counts once.
 *
 * Counting stops at `limit + 1`, so an oversized input is only segmented
 * up to the bound.
 */
export function countCharacters(password: string, limit = Number.POSITIVE_INFINITY): number {
  let count = 0;
  for (const _segment of graphemes.segment(password)) {
    if (++count > limit) break;
  }
  return count;
}

function containsCharCode(password: string, matches: (code: number) => boolean): boolean {
  for (let i = 0; i < password.length; i++) {
    if (matches(password.charCodeAt(i))) return true;
  }
  return false;
}

const isAsciiUppercase = (code: number) => code >= 0x41 && code <= 0x5a;
const isAsciiLowercase = (code: number) => code >= 0x61 && code <= 0x7a;
const isAsciiDigit = (code: number) => code >= 0x30 && code <= 0x39;
const isSpecialCharacter = (code: number) => SPECIAL_CHARACTERS.includes(String.fromCharCode(code));

export const simpleValidator: PasswordValidator = createValidator((password) => {
  if (countCharacters(password, SIMPLE_MIN_LENGTH) < SIMPLE_MIN_LENGTH) {
    return fail({ kind: 'tooShort', minLength: SIMPLE_MIN_LENGTH });
  }
  return pass();
});

export const defaultValidator: PasswordValidator = createValidator((password) => {
  const length = countCharacters(password, PASSWORD_MAX_LENGTH);
  if (length < PASSWORD_MIN_LENGTH) {
    return fail({ kind: 'tooShort', minLength: PASSWORD_MIN_LENGTH });
  }
  if (length > PASSWORD_MAX_LENGTH) {
    return fail({ kind: 'tooLong', maxLength: PASSWORD_MAX_LENGTH });
  }
  if (!containsCharCode(password, isAsciiUppercase)) {
    return fail({ kind: 'missingUppercase' });
  }
  if (!containsCharCode(password, isAsciiLowercase)) {
    return fail({ kind: 'missingLowercase' });
  }
  if (!containsCharCode(password, isAsciiDigit)) {
    return fail({ kind: 'missingDigit' });
  }
  if (!containsCharCode(password, isSpecialCharacter)) {
    return fail({ kind: 'missingSpecialCharacter' });
  }
  return pass();
});

export const PASSWORD_POLICIES: Readonly<Record<PasswordPolicyName, PasswordValidator>> = Object.freeze({
  simple: simpleValidator,
  default: defaultValidator,
});

export function isPasswordPolicyName(name: string): name is PasswordPolicyName {
  return Object.hasOwn(PASSWORD_POLICIES, name);
}

export function parsePasswordPolicyName(name: string): PasswordPolicyName {
  if (!isPasswordPolicyName(name)) {
    throw new Error(`Unknown password policy: ${name}. Valid: simple, default`);
  }
  return name;
}

export function getPasswordValidator(name: string): PasswordValidator {
  return PASSWORD_POLICIES[parsePasswordPolicyName(name)];
}

export function isSameValidationError(a: ValidationError, b: ValidationError): boolean {
  switch (a.kind) {
    case 'tooShort':
      return b.kind === 'tooShort' && a.minLength === b.minLength;
    case 'tooLong':
      return b.kind === 'tooLong' && a.maxLength === b.maxLength;
    default:
      return a.kind === b.kind;
  }
}
