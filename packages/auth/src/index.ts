// Schemas
export * from './schemas/index.js';

// Errors
export * from './errors.js';

// Services
export * from './services/eve-sso-service.js';
