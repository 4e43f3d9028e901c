export * from './controllers/health.controller.js';
export * from './controllers/webhook.controller.js';
export { default as webhookRoutes } from './routes/webhook.routes.js';
export { default as devRoutes } from './routes/dev.routes.js';
export { default as apiRouter } from './routes/index.js';
