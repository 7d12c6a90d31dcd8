/**
 * Per-kind readiness of Kubernetes objects
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import { isRecord } from '../dependencies/type-guards.js';
import type { ObservedPhase } from '../types/backend.js';

export interface ObjectReadiness {
  phase: ObservedPhase;
  message?: string | undefined;
  /** Extra outputs the object reports once ready */
  outputs?: Record<string, unknown> | undefined;
}

/**
 * Kinds that are usable as soon as they exist
 */
const IMMEDIATELY_READY_KINDS = new Set([
  'ConfigMap',
  'Secret',
  'ServiceAccount',
  'Service',
  'NetworkPolicy',
  'Role',
  'RoleBinding',
  'ClusterRole',
  'ClusterRoleBinding',
  'BackendConfig',
  'FrontendConfig',
]);

/**
 * Read a nested field without assuming the object's shape
 */
export function getField(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

interface Condition {
  type: string;
  status: string;
  reason?: string | undefined;
  message?: string | undefined;
}

function getConditions(object: unknown): Condition[] {
  const conditions = getField(object, 'status', 'conditions');
  if (!Array.isArray(conditions)) {
    return [];
  }
  const result: Condition[] = [];
  for (const entry of conditions) {
    const type = getField(entry, 'type');
    const status = getField(entry, 'status');
    if (typeof type === 'string' && typeof status === 'string') {
      const reason = getField(entry, 'reason');
      const message = getField(entry, 'message');
      result.push({
        type,
        status,
        reason: typeof reason === 'string' ? reason : undefined,
        message: typeof message === 'string' ? message : undefined,
      });
    }
  }
  return result;
}

function conditionMessage(condition: Condition): string {
  return condition.message ?? condition.reason ?? `${condition.type}=${condition.status}`;
}

function evaluateNamespace(object: KubernetesObject): ObjectReadiness {
  const phase = getField(object, 'status', 'phase');
  if (phase === 'Terminating') {
    return { phase: 'terminating', message: 'namespace is terminating' };
  }
  return phase === 'Active'
    ? { phase: 'ready' }
    : { phase: 'pending', message: `namespace phase is ${String(phase ?? 'unknown')}` };
}

function evaluateCustomResourceDefinition(object: KubernetesObject): ObjectReadiness {
  const established = getConditions(object).find((condition) => condition.type === 'Established');
  if (established?.status === 'True') {
    return { phase: 'ready' };
  }
  return {
    phase: 'pending',
    message: established ? conditionMessage(established) : 'CRD is not established yet',
  };
}

function evaluateReplicated(object: KubernetesObject): ObjectReadiness {
  const desiredField = getField(object, 'spec', 'replicas');
  const desired = typeof desiredField === 'number' ? desiredField : 1;
  const readyField = getField(object, 'status', 'readyReplicas');
  const ready = typeof readyField === 'number' ? readyField : 0;

  const failure = getConditions(object).find(
    (condition) =>
      condition.type === 'Progressing' &&
      condition.status === 'False' &&
      condition.reason === 'ProgressDeadlineExceeded'
  );
  if (failure) {
    return { phase: 'failed', message: conditionMessage(failure) };
  }

  return ready >= desired
    ? { phase: 'ready', outputs: { readyReplicas: ready } }
    : { phase: 'pending', message: `${ready}/${desired} replicas ready` };
}

function evaluateIngress(object: KubernetesObject): ObjectReadiness {
  const ingress = getField(object, 'status', 'loadBalancer', 'ingress');
  if (Array.isArray(ingress)) {
    for (const entry of ingress) {
      const address = getField(entry, 'ip') ?? getField(entry, 'hostname');
      if (typeof address === 'string' && address.length > 0) {
        return { phase: 'ready', outputs: { address } };
      }
    }
  }
  return { phase: 'pending', message: 'load balancer address not assigned yet' };
}

function evaluateManagedCertificate(object: KubernetesObject): ObjectReadiness {
  const status = getField(object, 'status', 'certificateStatus');
  if (status === 'Active') {
    return { phase: 'ready' };
  }
  if (status === 'Failed' || status === 'ProvisioningFailedPermanently') {
    return { phase: 'failed', message: `certificate status is ${status}` };
  }
  return { phase: 'pending', message: `certificate status is ${String(status ?? 'unknown')}` };
}

function evaluateGeneric(object: KubernetesObject): ObjectReadiness {
  const status = getField(object, 'status');
  if (!isRecord(status)) {
    return { phase: 'pending', message: 'no status reported yet' };
  }

  const conditions = getConditions(object);
  const readyCondition =
    conditions.find((condition) => condition.type === 'Ready') ??
    conditions.find((condition) => condition.type === 'Available');
  if (readyCondition) {
    return readyCondition.status === 'True'
      ? { phase: 'ready' }
      : { phase: 'pending', message: conditionMessage(readyCondition) };
  }

  // A status without conditions counts as reconciled
  return { phase: 'ready' };
}

/**
 * Readiness of one object as the API server reports it
 */
export function evaluateObjectReadiness(object: KubernetesObject): ObjectReadiness {
  if (object.metadata?.deletionTimestamp) {
    return { phase: 'terminating', message: `${object.kind ?? 'object'} is being deleted` };
  }

  const kind = object.kind ?? '';
  if (IMMEDIATELY_READY_KINDS.has(kind)) {
    return { phase: 'ready' };
  }

  switch (kind) {
    case 'Namespace':
      return evaluateNamespace(object);
    case 'CustomResourceDefinition':
      return evaluateCustomResourceDefinition(object);
    case 'Deployment':
    case 'StatefulSet':
      return evaluateReplicated(object);
    case 'Ingress':
      return evaluateIngress(object);
    case 'ManagedCertificate':
      return evaluateManagedCertificate(object);
    default:
      return evaluateGeneric(object);
  }
}
