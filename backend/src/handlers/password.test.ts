import { describe, it, expect, vi, beforeEach } from 'vitest';
import { API_PATHS, ERRORS } from '@passcheck/shared';

vi.mock('../config.js', async () => {
  const { defaultValidator } = await import('@passcheck/shared');
  return {
    config: { environment: 'dev', passwordPolicy: 'default', language: 'en' },
    passwordPolicy: 'default',
    passwordValidator: defaultValidator,
    defaultLanguage: 'en',
  };
});

import { handler } from './password.js';
import type { APIGatewayProxyEvent } from 'aws-lambda';

function makeEvent(
  path: string,
  method: string,
  body?: object | string,
  headers: Record<string, string> = {},
): APIGatewayProxyEvent {
  return {
    path,
    httpMethod: method,
    headers,
    body: body === undefined ? null : typeof body === 'string' ? body : JSON.stringify(body),
    multiValueHeaders: {},
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    pathParameters: null,
    stageVariables: null,
    requestContext: {} as APIGatewayProxyEvent['requestContext'],
    resource: path,
    isBase64Encoded: false,
  };
}

// ── Routing ───────────────────────────────────────────────────────────────────

describe('routing', () => {
  it('returns 404 for an unknown path', async () => {
    const res = await handler(makeEvent('/password/unknown', 'POST', { password: 'x' }));
    expect(res.statusCode).toBe(404);
    expect(JSON.parse(res.body).error).toBe(ERRORS.NOT_FOUND);
  });

  it('returns 404 for the wrong method', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'GET'));
    expect(res.statusCode).toBe(404);
  });
});

// ── POST /password/validate ───────────────────────────────────────────────────

describe('POST /password/validate', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('returns 200 for a valid password', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'MySecurePass123!' }));
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ success: true, data: { valid: true } });
  });

  it('returns 400 with the failing rule and message', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'Password123' }));
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body)).toEqual({
      error: ERRORS.PASSWORD_REJECTED,
      statusCode: 400,
      code: 'missingSpecialCharacter',
      details: ['Password must contain at least one special character (e.g., !&^%$#@()/).'],
    });
  });

  it('reports the too-short rule for an empty password', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: '' }));
    const body = JSON.parse(res.body);
    expect(body.code).toBe('tooShort');
    expect(body.details).toEqual(['Password must be at least 8 characters long.']);
  });

  it('rejects a password of about a megabyte as too long', async () => {
    const res = await handler(
      makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'Aa1!'.repeat(262_144) }),
    );
    expect(res.statusCode).toBe(400);
    const body = JSON.parse(res.body);
    expect(body.code).toBe('tooLong');
    expect(body.details).toEqual(['Password must be no more than 64 characters long.']);
  });

  it('renders in the language given in the body', async () => {
    const res = await handler(
      makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'password123!', language: 'nl' }),
    );
    expect(JSON.parse(res.body).details).toEqual(['Wachtwoord moet minstens één hoofdletter bevatten.']);
  });

  it('renders in the language negotiated from Accept-Language', async () => {
    const res = await handler(
      makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'PASSWORD123!' }, { 'Accept-Language': 'nl-BE,nl;q=0.9' }),
    );
    expect(JSON.parse(res.body).details).toEqual(['Wachtwoord moet minstens één kleine letter bevatten.']);
  });

  it('prefers the body language over Accept-Language', async () => {
    const res = await handler(
      makeEvent(
        API_PATHS.PASSWORD_VALIDATE,
        'POST',
        { password: 'Password!', language: 'en' },
        { 'accept-language': 'nl' },
      ),
    );
    expect(JSON.parse(res.body).details).toEqual(['Password must contain at least one digit.']);
  });

  it('falls back to the configured language for unsupported requests', async () => {
    const res = await handler(
      makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'Password!', language: 'fr' }, { 'Accept-Language': 'de' }),
    );
    expect(JSON.parse(res.body).details).toEqual(['Password must contain at least one digit.']);
  });

  it('returns 400 for invalid JSON', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', '{not json'));
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe(ERRORS.INVALID_JSON);
  });

  it('returns 400 for a non-object body', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', '["MySecurePass123!"]'));
    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).error).toBe(ERRORS.INVALID_BODY);
  });

  it('returns 400 when the password is missing or not a string', async () => {
    for (const body of [{}, { password: 12345678 }, undefined]) {
      const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', body));
      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body).error).toBe(ERRORS.PASSWORD_REQUIRED);
    }
  });

  it('returns 500 and logs when something unexpected throws', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const event = makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'MySecurePass123!' });
    Object.defineProperty(event, 'headers', {
      get() {
        throw new Error('headers unavailable');
      },
    });

    const res = await handler(event);

    expect(res.statusCode).toBe(500);
    expect(JSON.parse(res.body).error).toBe(ERRORS.INTERNAL);
    expect(consoleError).toHaveBeenCalledWith('Password handler error:', expect.any(Error));
  });

  it('includes CORS headers', async () => {
    const res = await handler(makeEvent(API_PATHS.PASSWORD_VALIDATE, 'POST', { password: 'MySecurePass123!' }));
    expect(res.headers?.['Access-Control-Allow-Origin']).toBe('*');
  });
});
