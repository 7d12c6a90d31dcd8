export * from './service-account.js';
