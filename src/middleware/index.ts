export * from './error.middleware.js';
export * from './raw-body.js';
