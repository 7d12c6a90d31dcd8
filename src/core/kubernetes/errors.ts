/**
 * Kubernetes Error Handling Utilities
 *
 * Classifies errors thrown by @kubernetes/client-node. The 1.x client throws
 * `ApiException` (status in `code`, the response body as a JSON string);
 * older shapes carry `statusCode`, `response.statusCode` or a parsed body.
 */

import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Status object the API server returns with a failed request
 */
export interface KubernetesStatusBody {
  code?: number | undefined;
  message?: string | undefined;
  reason?: string | undefined;
  details?: unknown;
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function numberField(value: object, key: string): number | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * The error's response body as a Status object, parsing a JSON string body
 */
export function getStatusBody(error: unknown): KubernetesStatusBody | undefined {
  if (!isObject(error)) {
    return undefined;
  }

  let body: unknown = Reflect.get(error, 'body');
  if (typeof body === 'string') {
    const text = body;
    try {
      body = JSON.parse(text);
    } catch {
      return { message: text };
    }
  }
  if (!isObject(body)) {
    return undefined;
  }

  return {
    code: numberField(body, 'code'),
    message: stringField(body, 'message'),
    reason: stringField(body, 'reason'),
    details: Reflect.get(body, 'details'),
  };
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await api.read(resource);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // gone
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isObject(error)) {
    return undefined;
  }

  const code = numberField(error, 'code');
  if (code !== undefined) {
    return code;
  }

  const statusCode = numberField(error, 'statusCode');
  if (statusCode !== undefined) {
    return statusCode;
  }

  const response: unknown = Reflect.get(error, 'response');
  if (isObject(response)) {
    const responseStatus = numberField(response, 'statusCode') ?? numberField(response, 'status');
    if (responseStatus !== undefined) {
      return responseStatus;
    }
  }

  const bodyCode = getStatusBody(error)?.code;
  if (bodyCode !== undefined) {
    return bodyCode;
  }

  logger.debug('Could not extract status code from error', {
    errorType: typeof error,
    errorKeys: Object.keys(error),
  });
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * A create hit an existing object, or optimistic locking failed
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

const RETRYABLE_STATUS_CODES = [408, 429, 500, 502, 503, 504];

/**
 * Temporary failures: throttling, server errors, dropped connections
 */
export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode !== undefined && RETRYABLE_STATUS_CODES.includes(statusCode)) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('econnrefused') ||
      message.includes('enotfound') ||
      message.includes('etimedout') ||
      message.includes('socket hang up') ||
      message.includes('connection reset')
    ) {
      return true;
    }
    if (error instanceof TypeError && message.includes('fetch')) {
      return true;
    }
    if (error.name === 'AbortError') {
      return true;
    }
  }

  return false;
}

/**
 * Format a Kubernetes API error into one line
 *
 * @example
 * ```typescript
 * formatKubernetesError(error);
 * // "Kubernetes API error (404): NotFound: namespaces \"identity\" not found"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (!isObject(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const body = getStatusBody(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (body?.reason) {
    parts.push(body.reason);
  }
  const message = body?.message ?? stringField(error, 'message');
  if (message) {
    parts.push(message);
  }

  return parts.join(': ');
}

/**
 * Error wrapping a failed Kubernetes API call with a readable message
 */
export class KubernetesApiCallError extends Error {
  readonly statusCode: number | undefined;

  constructor(operation: string, cause: unknown) {
    super(`${operation}: ${formatKubernetesError(cause)}`);
    this.name = 'KubernetesApiCallError';
    this.statusCode = getErrorStatusCode(cause);
    this.cause = cause;
  }
}
