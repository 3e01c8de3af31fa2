export * from './constants.js';
export * from './config/environments.js';
export * from './config/password-policy.js';
export * from './config/password-messages.js';
export type * from './types/api.js';
export type * from './types/environment.js';
export type * from './types/password.js';
