export * from './base-error.js';
export * from './validation.error.js';
export * from './not-found.error.js';
export * from './conflict.error.js';
export * from './persistence.error.js';
export * from './reference-data.error.js';
export * from './signature.error.js';
