export * from './managed-certificate.js';
