import type { APIGatewayProxyResult } from 'aws-lambda';
import type { ApiError } from '@passcheck/shared';

function corsHeaders() {
  return {
    'Access-Control-Allow-Origin': process.env.FRONTEND_ORIGIN ?? '*',
    'Access-Control-Allow-Headers': 'Content-Type,Accept-Language',
    'Access-Control-Allow-Methods': 'GET,POST',
  };
}

export function success<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify({ success: true, data }),
  };
}

export function error(message: string, statusCode = 400, details?: string[], code?: string): APIGatewayProxyResult {
  const body: ApiError = { error: message, statusCode };
  if (code) body.code = code;
  if (details) body.details = details;
  return {
    statusCode,
    headers: corsHeaders(),
    body: JSON.stringify(body),
  };
}
