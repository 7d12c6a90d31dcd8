/**
 * Constructors for embedded output references
 */

import { OUTPUT_REFERENCE_BRAND, OUTPUT_TEMPLATE_BRAND } from '../constants/brands.js';
import type { OutputReference, OutputTemplate } from '../types/resource.js';

/**
 * Reference an output attribute of another node
 *
 * @example
 * ```typescript
 * const host = ref<string>('primary-db', 'privateIp');
 * ```
 */
export function ref<T = unknown>(nodeId: string, attribute: string): OutputReference<T> {
  return {
    [OUTPUT_REFERENCE_BRAND]: true,
    nodeId,
    attribute,
  };
}

/**
 * Tagged template that keeps references unresolved until apply time
 *
 * @example
 * ```typescript
 * const url = template`postgres://${ref('primary-db', 'privateIp')}:5432/app`;
 * ```
 */
export function template(
  strings: TemplateStringsArray,
  ...references: OutputReference[]
): OutputTemplate {
  return {
    [OUTPUT_TEMPLATE_BRAND]: true,
    strings: Array.from(strings),
    references,
  };
}
