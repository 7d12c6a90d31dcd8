export * from './operator-deployment.js';
export * from './workload-instance.js';
