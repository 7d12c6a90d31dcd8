import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../../src/core/errors.js';
import { createGrantBackend, databaseGrantBinding } from '../../../src/core/grants/index.js';
import { ref } from '../../../src/core/references/index.js';
import type { BackendRef } from '../../../src/core/types/backend.js';
import { FakeGrants } from '../../utils/fake-backends.js';

const edge = { principal: 'identity-server', target: 'identity', privilege: 'ALL PRIVILEGES' };
const noDiff = { added: [], removed: [], changed: [] };

function grantRef(inputs: Record<string, unknown>): BackendRef {
  return { nodeId: 'grant', kind: 'DatabaseGrant', backendId: 'unused', inputs };
}

describe('createGrantBackend', () => {
  it('should issue the grant and report the edge', async () => {
    const grants = new FakeGrants();

    const result = await createGrantBackend(grants).create({ nodeId: 'grant', kind: 'DatabaseGrant', inputs: edge });

    expect(grants.granted).toEqual(['identity-server:identity:ALL PRIVILEGES']);
    expect(result).toEqual({ backendId: 'identity-server:identity:ALL PRIVILEGES', outputs: edge });
  });

  it('should require principal, target and privilege', async () => {
    await expect(
      createGrantBackend(new FakeGrants()).create({
        nodeId: 'grant',
        kind: 'DatabaseGrant',
        inputs: { principal: 'identity-server', target: 'identity' },
      })
    ).rejects.toThrow(new ValidationError("Grant 'grant' needs a non-empty string 'privilege'", 'grant'));
  });

  it('should report grants ready as soon as they exist', async () => {
    await expect(createGrantBackend(new FakeGrants()).get(grantRef(edge))).resolves.toEqual({
      phase: 'ready',
      outputs: edge,
    });
  });

  it('should revoke the previous edge when the principal changes', async () => {
    const grants = new FakeGrants();

    await createGrantBackend(grants).update(grantRef(edge), { ...edge, principal: 'identity-migrations' }, noDiff);

    expect(grants.revoked).toEqual(['identity-server:identity:ALL PRIVILEGES']);
    expect(grants.granted).toEqual(['identity-migrations:identity:ALL PRIVILEGES']);
  });

  it('should re-grant without revoking when the edge is the same', async () => {
    const grants = new FakeGrants();

    await createGrantBackend(grants).update(grantRef(edge), edge, noDiff);

    expect(grants.revoked).toEqual([]);
    expect(grants.granted).toEqual(['identity-server:identity:ALL PRIVILEGES']);
  });

  it('should revoke on delete', async () => {
    const grants = new FakeGrants();
    await createGrantBackend(grants).delete(grantRef(edge));
    expect(grants.revoked).toEqual(['identity-server:identity:ALL PRIVILEGES']);
  });

  it('should leave the grant in place when the interface cannot revoke', async () => {
    const granted: string[] = [];
    const backend = createGrantBackend({
      grant: async (principal, target, privilege) => {
        granted.push(`${principal}:${target}:${privilege}`);
      },
    });

    await expect(backend.delete(grantRef(edge))).resolves.toBeUndefined();
    expect(granted).toEqual([]);
  });
});

describe('databaseGrantBinding', () => {
  it('should connect a grant backend from the source values', async () => {
    const grants = new FakeGrants();
    const connections: Array<Readonly<Record<string, unknown>>> = [];
    const binding = databaseGrantBinding({
      name: 'postgres',
      inputs: { host: ref('instance', 'privateIp') },
      connect: (values) => {
        connections.push(values);
        return grants;
      },
    });

    const backend = await binding.connect({ host: '10.1.0.3' });
    await backend.create({ nodeId: 'grant', kind: 'DatabaseGrant', inputs: edge });

    expect(connections).toEqual([{ host: '10.1.0.3' }]);
    expect(grants.granted).toEqual(['identity-server:identity:ALL PRIVILEGES']);
  });
});
