export * from './cluster.js';
export * from './database.js';
export * from './identity.js';
export * from './network.js';
