/**
 * State file persistence
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { type } from 'arktype';
import { formatArktypeError, ValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { NodeStatus, ResourceKind, Stage } from '../types/resource.js';
import type { StateDocument } from '../types/state.js';
import { StateStore } from './store.js';

const logger = getComponentLogger('state-persistence');

export const StateDocumentSchema = type({
  version: '1',
  records: type({
    id: 'string > 0',
    kind: type.enumerated(...Object.values(ResourceKind)),
    stage: type.enumerated(...Object.values(Stage)),
    status: type.enumerated(...Object.values(NodeStatus)),
    'backendId?': 'string',
    outputs: 'Record<string, unknown>',
    inputs: 'Record<string, unknown>',
    'fingerprint?': 'string',
    'lastError?': {
      code: 'string',
      message: 'string',
    },
    updatedAt: 'string',
  }).array(),
});

export function parseStateDocument(value: unknown): StateDocument {
  const result = StateDocumentSchema(value);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, 'state document');
  }
  return result;
}

/**
 * Load a store from a state file; a missing file yields an empty store
 */
export async function loadStateFile(path: string): Promise<StateStore> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug('No state file, starting empty', { path });
      return new StateStore();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `State file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'state document',
      undefined,
      ['Restore the file from a backup or delete it to start from empty state']
    );
  }

  const document = parseStateDocument(parsed);
  logger.debug('State file loaded', { path, records: document.records.length });
  return StateStore.fromDocument(document);
}

/**
 * Write the store to a state file, replacing it atomically
 */
export async function saveStateFile(path: string, store: StateStore): Promise<void> {
  const document = store.toDocument();
  const temporary = `${path}.tmp`;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(temporary, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
  await rename(temporary, path);
  logger.debug('State file saved', { path, records: document.records.length });
}
