import type { Language, ValidationError } from '../types/password.js';
import { SPECIAL_CHARACTERS } from './password-policy.js';

export const SUPPORTED_LANGUAGES: readonly Language[] = ['en', 'nl'];

export const DEFAULT_LANGUAGE: Language = 'en';

type Translations = Record<Language, string>;

function translations(error: ValidationError): Translations {
  switch (error.kind) {
    case 'tooShort':
      return {
        en: `Password must be at least ${error.minLength} characters long.`,
        nl: `Wachtwoord moet minstens ${error.minLength} tekens lang zijn.`,
      };
    case 'tooLong':
      return {
        en: `Password must be no more than ${error.maxLength} characters long.`,
        nl: `Wachtwoord mag maximaal ${error.maxLength} tekens lang zijn.`,
      };
    case 'missingUppercase':
      return {
        en: 'Password must contain at least one uppercase letter.',
        nl: 'Wachtwoord moet minstens één hoofdletter bevatten.',
      };
    case 'missingLowercase':
      return {
        en: 'Password must contain at least one lowercase letter.',
        nl: 'Wachtwoord moet minstens één kleine letter bevatten.',
      };
    case 'missingDigit':
      return {
        en: 'Password must contain at least one digit.',
        nl: 'Wachtwoord moet minstens één cijfer bevatten.',
      };
    case 'missingSpecialCharacter':
      return {
        en: `Password must contain at least one special character (e.g., ${SPECIAL_CHARACTERS}).`,
        nl: `Wachtwoord moet minstens één speciaal teken bevatten (bijv. ${SPECIAL_CHARACTERS}).`,
      };
    default: {
      const unhandled: never = error;
      throw new Error(`Unhandled validation error: ${JSON.stringify(unhandled)}`);
    }
  }
}

/** Supported language for a tag such as `nl`, `NL` or `nl-BE`, if any. */
export function matchLanguage(tag: string | undefined): Language | undefined {
  if (!tag) return undefined;
  const primary = tag.trim().split(/[-_]/)[0].toLowerCase();
  return SUPPORTED_LANGUAGES.find((language) => language === primary);
}

/**
 * Unsupported or missing tags render in `fallback` rather than failing, so a
 * caller forwarding an arbitrary locale always gets a message back.
 */
export function resolveLanguage(tag: string | undefined, fallback: Language = DEFAULT_LANGUAGE): Language {
  return matchLanguage(tag) ?? fallback;
}

export function describeValidationError(error: ValidationError, language: string = DEFAULT_LANGUAGE): string {
  return translations(error)[resolveLanguage(language)];
}
