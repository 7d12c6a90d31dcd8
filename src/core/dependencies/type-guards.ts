/**
 * Type guards for embedded references
 */

import { OUTPUT_REFERENCE_BRAND, OUTPUT_TEMPLATE_BRAND } from '../constants/brands.js';
import type { OutputReference, OutputTemplate } from '../types/resource.js';

export function isOutputReference(value: unknown): value is OutputReference {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    Reflect.get(value, OUTPUT_REFERENCE_BRAND) === true &&
    typeof Reflect.get(value, 'nodeId') === 'string' &&
    typeof Reflect.get(value, 'attribute') === 'string'
  );
}

export function isOutputTemplate(value: unknown): value is OutputTemplate {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    Reflect.get(value, OUTPUT_TEMPLATE_BRAND) === true &&
    Array.isArray(Reflect.get(value, 'strings')) &&
    Array.isArray(Reflect.get(value, 'references'))
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect every reference embedded in a value, at any depth
 */
export function collectReferences(value: unknown): OutputReference[] {
  const refs: OutputReference[] = [];

  const traverse = (current: unknown): void => {
    if (current === null || current === undefined) {
      return;
    }
    if (isOutputReference(current)) {
      refs.push(current);
    } else if (isOutputTemplate(current)) {
      refs.push(...current.references);
    } else if (Array.isArray(current)) {
      for (const item of current) {
        traverse(item);
      }
    } else if (isRecord(current)) {
      for (const item of Object.values(current)) {
        traverse(item);
      }
    }
  };

  traverse(value);
  return refs;
}
