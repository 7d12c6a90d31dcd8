export * from './namespace.js';
