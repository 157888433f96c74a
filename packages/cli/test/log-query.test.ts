/**
 * Classguard CLI: Log Query Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { DecisionOutcome } from '@classguard/core';
import type { DecisionEvent } from '@classguard/runtime-host';
import { parseLimit, parseOutcome, selectEvents } from '../src/commands/log.js';

function event(id: string, outcome: DecisionOutcome): DecisionEvent {
  return {
    event_id: id,
    class_id: 'Apple#1',
    class_name: 'Apple',
    member: 'weight',
    declaring_class_id: 'Apple#1',
    operation: 'read',
    view: 'instance',
    context: null,
    outcome,
    rule: outcome === DecisionOutcome.Deny ? 'private' : null,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

const events = [
  event('A', DecisionOutcome.Deny),
  event('B', DecisionOutcome.Allow),
  event('C', DecisionOutcome.Deny),
  event('D', DecisionOutcome.Deny),
];

describe('parseOutcome', () => {
  it('accepts Allow and Deny', () => {
    expect(parseOutcome('Allow')).toBe(DecisionOutcome.Allow);
    expect(parseOutcome('Deny')).toBe(DecisionOutcome.Deny);
  });

  it('rejects anything else', () => {
    expect(() => parseOutcome('deny')).toThrow(InvalidArgumentError);
    expect(() => parseOutcome('Permit')).toThrow('Expected Allow or Deny.');
  });
});

describe('parseLimit', () => {
  it('accepts positive integers', () => {
    expect(parseLimit('5')).toBe(5);
  });

  it('rejects zero, fractions and words', () => {
    expect(() => parseLimit('0')).toThrow(InvalidArgumentError);
    expect(() => parseLimit('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseLimit('many')).toThrow('Expected a positive integer.');
  });
});

describe('selectEvents', () => {
  it('keeps everything up to the limit', () => {
    expect(selectEvents(events, { limit: 100 }).map((e) => e.event_id)).toEqual(['A', 'B', 'C', 'D']);
  });

  it('filters by outcome', () => {
    expect(selectEvents(events, { outcome: DecisionOutcome.Allow, limit: 100 }).map((e) => e.event_id)).toEqual([
      'B',
    ]);
  });

  it('keeps the most recent entries', () => {
    expect(selectEvents(events, { outcome: DecisionOutcome.Deny, limit: 2 }).map((e) => e.event_id)).toEqual([
      'C',
      'D',
    ]);
  });
});
