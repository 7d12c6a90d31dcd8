/**
 * Kubernetes module exports
 */

export { type ClusterBindingOptions, kubernetesClusterBinding } from './cluster-binding.js';
export {
  createKubeConfig,
  createKubernetesClients,
  type KubernetesClientConfig,
  type KubernetesClients,
  kubeConfigFromCredentials,
  type NamespaceFinalizeClient,
  type WorkloadObjectClient,
} from './client-provider.js';
export {
  formatKubernetesError,
  getErrorStatusCode,
  getStatusBody,
  isConflictError,
  isNotFoundError,
  isRetryableError,
  KubernetesApiCallError,
  type KubernetesStatusBody,
} from './errors.js';
export { evaluateObjectReadiness, getField, type ObjectReadiness } from './readiness.js';
export {
  describeObject,
  FIELD_MANAGER,
  isKubernetesManifest,
  type KubernetesManifest,
  KubernetesWorkloadApi,
  manifestsFromInputs,
} from './workload-api.js';
