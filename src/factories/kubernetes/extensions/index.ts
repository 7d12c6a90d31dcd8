export * from './custom-resource-definition.js';
