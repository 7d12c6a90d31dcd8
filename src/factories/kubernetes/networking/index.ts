export * from './ingress.js';
export * from './network-policy-config.js';
