/**
 * Classguard Core: Call Context Tests
 *
 *   CTX-1: a receiver that leaves its method is an external handle
 *   CTX-2: class code reaches private and protected members of peer objects
 *   CTX-3: the context is restored when a method returns or throws
 */

import { describe, it, expect } from 'vitest';
import { currentContext } from '../src/augmentation/call-context.js';
import { encapsulate } from '../src/augmentation/encapsulate.js';
import { member } from '../src/descriptors/declarations.js';
import { AccessDeniedError } from '../src/errors.js';
import { Types } from '../src/validation/type-tags.js';

interface QuinceShape {
  weight: unknown;
  self(): QuinceShape;
  setWeight(weight: unknown): QuinceShape;
  sameWeight(other: QuinceShape): boolean;
  tagPeer(other: QuinceShape, note: unknown): void;
  readPeerTag(other: QuinceShape): unknown;
  contextId(): unknown;
  fail(): void;
  mass(): unknown;
}

interface RipeQuinceShape extends QuinceShape {
  sameMass(other: QuinceShape): boolean;
}

interface MedlarShape {
  peek(quince: QuinceShape): unknown;
}

const stashed: QuinceShape[] = [];

const Quince = encapsulate<QuinceShape, [weight: unknown]>({
  name: 'Quince',
  members: {
    weight: member.private({ type: Types.number }),
    self: member.method(function (this: QuinceShape) {
      return this;
    }),
    setWeight: member.method(function (this: QuinceShape, weight: unknown) {
      this.weight = weight;
      return this;
    }),
    sameWeight: member.method(function (this: QuinceShape, other: QuinceShape) {
      return this.weight === other.weight;
    }),
    tagPeer: member.method(function (this: QuinceShape, other: Record<string, unknown>, note: unknown) {
      other.note = note;
    }),
    readPeerTag: member.method(function (this: QuinceShape, other: Record<string, unknown>) {
      return other.note;
    }),
    contextId: member.method(function (this: QuinceShape) {
      return currentContext();
    }),
    fail: member.method(function (this: QuinceShape) {
      throw new RangeError(`bad weight ${String(this.weight)}`);
    }),
    mass: member.protected(
      member.method(function (this: QuinceShape) {
        return this.weight;
      }),
    ),
  },
  init(weight) {
    this.weight = weight;
    stashed.push(this);
  },
});

const RipeQuince = encapsulate<RipeQuinceShape, [weight: unknown]>({
  name: 'RipeQuince',
  extends: Quince,
  members: {
    sameMass: member.method(function (this: RipeQuinceShape, other: QuinceShape) {
      return this.mass() === other.mass();
    }),
  },
});

const Medlar = encapsulate<MedlarShape>({
  name: 'Medlar',
  members: {
    peek: member.method(function (this: MedlarShape, quince: QuinceShape) {
      return quince.weight;
    }),
  },
});

describe('escaping receivers', () => {
  it('CTX-1: returns the same handle the caller holds', () => {
    const quince = Quince.create(2);
    expect(quince.self()).toBe(quince);
  });

  it('CTX-1: denies external reads through a returned this', () => {
    const quince = Quince.create(2);
    expect(() => quince.self().weight).toThrow(AccessDeniedError);
    expect(() => quince.self().weight).toThrow("Cannot read private member 'Quince.weight' outside 'Quince'.");
  });

  it('CTX-1: denies external writes through a fluent setter before validating', () => {
    const quince = Quince.create(2);
    expect(() => {
      quince.setWeight(3).weight = 'x';
    }).toThrow("Cannot write private member 'Quince.weight' outside 'Quince'.");
    expect(quince.sameWeight(Quince.create(3))).toBe(true);
  });

  it('CTX-1: denies access through a receiver stored by the initializer', () => {
    Quince.create(7);
    const leaked = stashed.at(-1);
    expect(leaked).toBeDefined();
    expect(() => leaked?.weight).toThrow(AccessDeniedError);
  });
});

describe('peer access from class code', () => {
  it('CTX-2: reads a private member of another object of the same class', () => {
    expect(Quince.create(2).sameWeight(Quince.create(2))).toBe(true);
    expect(Quince.create(2).sameWeight(Quince.create(5))).toBe(false);
  });

  it('CTX-2: reaches a private member of a subclass instance from the declaring class', () => {
    expect(Quince.create(4).sameWeight(RipeQuince.create(4))).toBe(true);
  });

  it('CTX-2: calls a protected lineage method on a peer from a subclass', () => {
    expect(RipeQuince.create(3).sameMass(Quince.create(3))).toBe(true);
    expect(RipeQuince.create(3).sameMass(Quince.create(1))).toBe(false);
  });

  it('CTX-2: writes and reads undeclared attributes on a peer', () => {
    const writer = Quince.create(1);
    const peer = Quince.create(2);
    writer.tagPeer(peer, 'seen');
    expect(peer.readPeerTag(peer)).toBe('seen');
    expect(() => Reflect.get(peer, 'note')).toThrow(AccessDeniedError);
  });

  it('CTX-2: still denies a private member to an unrelated class', () => {
    const medlar = Medlar.create();
    expect(() => medlar.peek(Quince.create(2))).toThrow(
      "Cannot read private member 'Quince.weight' outside 'Quince'.",
    );
  });
});

describe('context stack', () => {
  it('CTX-3: is external outside class code', () => {
    expect(currentContext()).toBeNull();
  });

  it('CTX-3: names the declaring class while a method runs', () => {
    expect(Quince.create(1).contextId()).toBe(Quince.id);
    expect(RipeQuince.create(1).contextId()).toBe(Quince.id);
  });

  it('CTX-3: pops the context when a method throws', () => {
    const quince = Quince.create(2);
    expect(() => quince.fail()).toThrow('bad weight 2');
    expect(currentContext()).toBeNull();
    expect(() => quince.weight).toThrow(AccessDeniedError);
  });

  it('CTX-3: pops the context when an initializer throws', () => {
    expect(() => Quince.create('heavy')).toThrow("Invalid value for 'weight': cannot coerce to number.");
    expect(currentContext()).toBeNull();
  });
});
