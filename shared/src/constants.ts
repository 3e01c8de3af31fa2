// API path prefixes
export const API_PATHS = {
  HEALTH: '/health',
  PASSWORD_VALIDATE: '/password/validate',
} as const;

// Error messages
export const ERRORS = {
  INVALID_JSON: 'Invalid JSON',
  INVALID_BODY: 'Invalid request body',
  PASSWORD_REQUIRED: 'Password is required',
  PASSWORD_REJECTED: 'Password does not meet requirements',
  NOT_FOUND: 'Not found',
  INTERNAL: 'Internal server error',
} as const;
