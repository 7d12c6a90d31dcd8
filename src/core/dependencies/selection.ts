import { getComponentLogger } from '../logging/index.js';
import type { ResourceNode } from '../types/resource.js';

const logger = getComponentLogger('node-selection');

/**
 * Drop disabled nodes. `dependsOn` entries that name a dropped node are
 * removed as well; references to one still fail planning.
 */
export function selectEnabled(nodes: readonly ResourceNode[]): ResourceNode[] {
  const disabled = new Set(nodes.filter((node) => node.enabled === false).map((node) => node.id));
  if (disabled.size > 0) {
    logger.info('Disabled nodes left out of the plan', { nodes: [...disabled].sort() });
  }
  return nodes
    .filter((node) => !disabled.has(node.id))
    .map((node) =>
      node.dependsOn.some((id) => disabled.has(id))
        ? { ...node, dependsOn: node.dependsOn.filter((id) => !disabled.has(id)) }
        : node
    );
}
