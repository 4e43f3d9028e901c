export * from './message.types.js';
export * from './classification.types.js';
export * from './routing.types.js';
export * from './booking.types.js';
export * from './reference.types.js';
export * from './conversation.types.js';
export * from './llm.types.js';
