/**
 * Classguard Core: Decision Logging Tests
 *
 *   LOG-1: every denial is recorded before AccessDeniedError is thrown
 *   LOG-2: permitted operations are recorded only with logPermits
 *   LOG-3: probes (`in`, duck typing) record nothing
 *   LOG-4: without a sink nothing is recorded
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { encapsulate } from '../src/augmentation/encapsulate.js';
import { configureEngine, getEngineConfig, resetEngineConfig } from '../src/configuration/engine-config.js';
import { member } from '../src/descriptors/declarations.js';
import { AccessDeniedError } from '../src/errors.js';
import { instanceOf } from '../src/interfaces/instance-of.js';
import { defineInterface } from '../src/interfaces/interface.js';
import type { AccessDecisionLog } from '../src/types/decision.js';
import { DecisionOutcome } from '../src/types/decision.js';

interface VaultShape {
  secret: unknown;
  label: unknown;
}

const Vault = encapsulate<VaultShape>({
  name: 'Vault',
  members: {
    secret: member.private({ default: 'test-secret' }),
    label: member.variable({ default: 'vault' }),
  },
});

let entries: AccessDecisionLog[] = [];

beforeEach(() => {
  entries = [];
  configureEngine({
    logSink: { append: (entry) => entries.push(entry) },
    clock: () => '2026-01-01T00:00:00.000Z',
  });
});

afterEach(() => {
  resetEngineConfig();
});

describe('decision logging', () => {
  it('LOG-1: records a denial with all fields', () => {
    const vault = Vault.create();
    expect(() => vault.secret).toThrow(AccessDeniedError);
    expect(entries).toEqual([
      {
        class_id: Vault.id,
        class_name: 'Vault',
        member: 'secret',
        declaring_class_id: Vault.id,
        operation: 'read',
        view: 'instance',
        context: null,
        outcome: DecisionOutcome.Deny,
        rule: 'private',
        timestamp: '2026-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('LOG-1: records undeclared denials without a declaring class', () => {
    const vault = Vault.create();
    expect(() => Reflect.set(vault, 'extra', 1)).toThrow(AccessDeniedError);
    expect(entries).toHaveLength(1);
    expect(entries[0]?.declaring_class_id).toBeNull();
    expect(entries[0]?.rule).toBe('undeclared');
    expect(entries[0]?.operation).toBe('write');
  });

  it('LOG-1: records the class view', () => {
    const Ledger = encapsulate({ name: 'Ledger', members: { total: member.variable() } });
    expect(() => Reflect.get(Ledger.statics, 'total')).toThrow(AccessDeniedError);
    expect(entries[0]?.view).toBe('class');
    expect(entries[0]?.rule).toBe('scope');
  });

  it('LOG-2: leaves permitted operations out by default', () => {
    const vault = Vault.create();
    expect(vault.label).toBe('vault');
    expect(entries).toEqual([]);
  });

  it('LOG-2: records permitted operations with logPermits', () => {
    configureEngine({ logPermits: true });
    const vault = Vault.create();
    vault.label = 'renamed';
    expect(entries).toHaveLength(1);
    expect(entries[0]?.outcome).toBe(DecisionOutcome.Allow);
    expect(entries[0]?.rule).toBeNull();
    expect(entries[0]?.operation).toBe('write');
  });

  it('LOG-3: records nothing for probes', () => {
    const vault = Vault.create();
    const Secretive = defineInterface('Secretive', { members: { secret: member.variable() } });
    expect('secret' in vault).toBe(false);
    expect(instanceOf(vault, Secretive)).toBe(false);
    expect(entries).toEqual([]);
  });

  it('LOG-4: records nothing once the sink is detached', () => {
    configureEngine({ logSink: undefined });
    const vault = Vault.create();
    expect(() => vault.secret).toThrow(AccessDeniedError);
    expect(entries).toEqual([]);
    expect(getEngineConfig().logger.enabled).toBe(false);
  });

  it('aborts the operation when the sink throws', () => {
    configureEngine({
      logSink: {
        append: () => {
          throw new Error('disk full');
        },
      },
    });
    const vault = Vault.create();
    expect(() => vault.secret).toThrow('disk full');
  });
});
