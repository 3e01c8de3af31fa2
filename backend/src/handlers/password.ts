import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { API_PATHS, ERRORS, matchLanguage, type PasswordCheckResponse } from '@passcheck/shared';
import { success, error } from '../utils/response.js';
import { getHeader, languageFromAcceptHeader } from '../utils/language.js';
import { createPasswordService } from '../services/password.js';
import { defaultLanguage, passwordValidator } from '../config.js';

const passwordService = createPasswordService(passwordValidator, { language: defaultLanguage });

function parseBody(event: APIGatewayProxyEvent): { body: Record<string, unknown> } | { parseError: APIGatewayProxyResult } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(event.body || '{}');
  } catch {
    return { parseError: error(ERRORS.INVALID_JSON, 400) };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { parseError: error(ERRORS.INVALID_BODY, 400) };
  }
  return { body: Object.fromEntries(Object.entries(parsed)) };
}

export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  const path = event.path;
  const method = event.httpMethod;

  try {
    // POST /password/validate
    if (path === API_PATHS.PASSWORD_VALIDATE && method === 'POST') {
      return handleValidate(event);
    }

    return error(ERRORS.NOT_FOUND, 404);
  } catch (err) {
    console.error('Password handler error:', err);
    return error(ERRORS.INTERNAL, 500);
  }
}

function handleValidate(event: APIGatewayProxyEvent): APIGatewayProxyResult {
  const parsed = parseBody(event);
  if ('parseError' in parsed) return parsed.parseError;

  const { password, language } = parsed.body;
  if (typeof password !== 'string') {
    return error(ERRORS.PASSWORD_REQUIRED, 400);
  }

  // An explicit body language wins over Accept-Language; both fall back to config
  const requested =
    (typeof language === 'string' ? matchLanguage(language) : undefined) ??
    languageFromAcceptHeader(getHeader(event, 'Accept-Language'));

  const result = passwordService.check(password, requested);
  if (!result.valid) {
    return error(ERRORS.PASSWORD_REJECTED, 400, [result.message], result.code);
  }

  const response: PasswordCheckResponse = { valid: true };
  return success(response);
}
