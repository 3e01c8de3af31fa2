import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { success } from '../utils/response.js';
import { config, defaultLanguage, passwordPolicy } from '../config.js';

export async function handler(_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  return success({
    status: 'ok',
    environment: config.environment,
    passwordPolicy,
    language: defaultLanguage,
    timestamp: new Date().toISOString(),
  });
}
