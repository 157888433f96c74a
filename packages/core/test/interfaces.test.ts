/**
 * Classguard Core: Interface & Conformance Tests
 *
 *   IFC-1: requirements are the public members of an interface and its ancestors
 *   IFC-2: `implements` is checked when the class is defined
 *   IFC-3: instanceOf() is structural by default
 *   IFC-4: instanceOf(..., false) requires an explicit declaration
 *   IFC-5: classes and interfaces act as type constraints
 */

import { describe, it, expect } from 'vitest';
import { encapsulate } from '../src/augmentation/encapsulate.js';
import { member } from '../src/descriptors/declarations.js';
import { DefinitionError, InvalidValueError } from '../src/errors.js';
import type { ConformanceTarget } from '../src/interfaces/instance-of.js';
import { instanceOf } from '../src/interfaces/instance-of.js';
import { conformsTo, defineInterface, isInterface } from '../src/index.js';

const Fruit = defineInterface('Fruit', {
  members: {
    getColor: member.abstract(0),
    weight: member.variable(),
  },
});

const Ripe = defineInterface('Ripe', {
  extends: [Fruit],
  members: {
    ripen: member.abstract(1),
  },
});

interface PearShape {
  weight: unknown;
  getColor(): unknown;
}

const Pear = encapsulate<PearShape>({
  name: 'Pear',
  implements: [Fruit],
  members: {
    weight: member.variable({ default: 3 }),
    getColor: member.method(() => 'yellow'),
  },
});

describe('defineInterface', () => {
  it('IFC-1: collects inherited and own requirements', () => {
    expect([...Ripe.requiredMembers.keys()]).toEqual(['getColor', 'weight', 'ripen']);
    expect(Ripe.requiredMembers.get('ripen')).toEqual({
      name: 'ripen',
      kind: 'method',
      arity: 1,
      declaredBy: 'Ripe',
    });
    expect(Ripe.requiredMembers.get('weight')).toEqual({
      name: 'weight',
      kind: 'property',
      arity: null,
      declaredBy: 'Fruit',
    });
  });

  it('IFC-1: leaves non-public members out', () => {
    const Hidden = defineInterface('Hidden', {
      members: {
        secret: member.private(),
        visible: member.method(() => 1),
      },
    });
    expect([...Hidden.requiredMembers.keys()]).toEqual(['visible']);
  });

  it('tells interfaces from classes', () => {
    expect(isInterface(Fruit)).toBe(true);
    expect(isInterface(Pear)).toBe(false);
  });

  it('rejects an empty name', () => {
    expect(() => defineInterface('')).toThrow(DefinitionError);
  });
});

describe('implements', () => {
  it('IFC-2: rejects a class missing a member', () => {
    expect(() =>
      encapsulate({ name: 'Rock', implements: [Fruit], members: { weight: member.variable() } }),
    ).toThrow("Class 'Rock' does not implement 'Fruit': missing member 'getColor'.");
  });

  it('IFC-2: rejects a method with too few parameters', () => {
    expect(() =>
      encapsulate({
        name: 'Lazy',
        implements: [Ripe],
        members: {
          getColor: member.method(() => 'green'),
          weight: member.variable(),
          ripen: member.method(() => undefined),
        },
      }),
    ).toThrow("Class 'Lazy' does not implement 'Ripe': method 'ripen' must accept 1 parameter(s).");
  });

  it('IFC-2: accepts a variadic method for any required parameter count', () => {
    const Runner = defineInterface('Runner', { members: { run: member.abstract(2) } });
    const Task = encapsulate({
      name: 'Task',
      implements: [Runner],
      members: {
        run: member.method((...args: unknown[]) => args.length, { variadic: true }),
      },
    });
    expect(Task.descriptor.implementedInterfaces.has(Runner.id)).toBe(true);
  });

  it('IFC-2: counts rest parameters only when the method is declared variadic', () => {
    const Runner = defineInterface('StrictRunner', { members: { run: member.abstract(2) } });
    expect(() =>
      encapsulate({
        name: 'RestTask',
        implements: [Runner],
        members: { run: member.method((...args: unknown[]) => args.length) },
      }),
    ).toThrow("Class 'RestTask' does not implement 'StrictRunner': method 'run' must accept 2 parameter(s).");
  });

  it('IFC-2: accepts a method whose arity is given explicitly', () => {
    const Runner = defineInterface('PairRunner', { members: { run: member.abstract(2) } });
    const Task = encapsulate({
      name: 'PairTask',
      implements: [Runner],
      members: {
        run: member.method((...args: unknown[]) => args.length, { arity: 2 }),
      },
    });
    expect(Task.descriptor.implementedInterfaces.has(Runner.id)).toBe(true);
  });

  it('IFC-2: rejects a method where a property is required', () => {
    expect(() =>
      encapsulate({
        name: 'Odd',
        implements: [Fruit],
        members: {
          getColor: member.method(() => 'blue'),
          weight: member.method(() => 1),
        },
      }),
    ).toThrow("Class 'Odd' does not implement 'Fruit': member 'weight' must be a property.");
  });

  it('IFC-2: accepts requirements met by inherited and abstract members', () => {
    const Base = encapsulate({
      name: 'FruitBase',
      abstract: true,
      members: { weight: member.variable(), getColor: member.abstract(0) },
    });
    const Derived = encapsulate({ name: 'FruitDerived', extends: Base, implements: [Fruit] });
    expect(Derived.descriptor.implementedInterfaces.has(Fruit.id)).toBe(true);
  });
});

describe('instanceOf', () => {
  it('IFC-3: matches conforming instances structurally', () => {
    expect(instanceOf(Pear.create(), Fruit)).toBe(true);
    expect(instanceOf(Pear.create(), Ripe)).toBe(false);
  });

  it('IFC-3: exposes the structural check on interface descriptors', () => {
    expect(conformsTo(Pear.create(), Fruit.descriptor)).toBe(true);
    expect(conformsTo({ weight: 1 }, Fruit.descriptor)).toBe(false);
  });

  it('IFC-3: treats non-public members as absent', () => {
    const Secretive = encapsulate({
      name: 'Secretive',
      implements: [Fruit],
      members: { weight: member.private(), getColor: member.method(() => 'grey') },
    });
    const value = Secretive.create();
    expect(instanceOf(value, Fruit)).toBe(false);
    expect(instanceOf(value, Fruit, false)).toBe(true);
  });

  it('IFC-3: checks plain objects by their properties', () => {
    expect(instanceOf({ weight: 1, getColor: () => 'red' }, Fruit)).toBe(true);
    expect(instanceOf({ weight: 1, getColor: 'red' }, Fruit)).toBe(false);
    expect(instanceOf({ getColor: () => 'red' }, Fruit)).toBe(false);
    expect(instanceOf(42, Fruit)).toBe(false);
  });

  it('IFC-4: requires an explicit declaration when not duck typed', () => {
    const Lookalike = encapsulate({
      name: 'Lookalike',
      members: { weight: member.variable(), getColor: member.method(() => 'pink') },
    });
    expect(instanceOf(Lookalike.create(), Fruit)).toBe(true);
    expect(instanceOf(Lookalike.create(), Fruit, false)).toBe(false);
    expect(instanceOf({ weight: 1, getColor: () => 'red' }, Fruit, false)).toBe(false);
  });

  it('IFC-4: follows class and interface inheritance', () => {
    const Plum = encapsulate({
      name: 'Plum',
      implements: [Ripe],
      members: {
        weight: member.variable(),
        getColor: member.method(() => 'purple'),
        ripen: member.method((days: unknown) => days),
      },
    });
    const SmallPlum = encapsulate({ name: 'SmallPlum', extends: Plum });
    expect(instanceOf(SmallPlum.create(), Fruit, false)).toBe(true);
    expect(instanceOf(SmallPlum.create(), Ripe, false)).toBe(true);
  });

  it('matches class lineage', () => {
    const Nashi = encapsulate({ name: 'Nashi', extends: Pear });
    expect(instanceOf(Nashi.create(), Pear)).toBe(true);
    expect(instanceOf(Pear.create(), Nashi)).toBe(false);
    expect(instanceOf({ weight: 3 }, Pear)).toBe(false);
  });

  it('rejects a target that is neither a class nor an interface', () => {
    const bogus: ConformanceTarget = JSON.parse('{}');
    expect(() => instanceOf({}, bogus)).toThrow(TypeError);
  });
});

describe('type constraints', () => {
  const Basket = encapsulate<{ item: unknown; pear: unknown }>({
    name: 'Basket',
    members: {
      item: member.variable({ type: Fruit }),
      pear: member.variable({ type: Pear }),
    },
  });

  it('IFC-5: accepts conforming values for an interface type', () => {
    const basket = Basket.create();
    const fig = { weight: 1, getColor: () => 'purple' };
    basket.item = fig;
    expect(basket.item).toBe(fig);
    expect(() => {
      basket.item = { weight: 1 };
    }).toThrow("Invalid value for 'item': expected Fruit.");
  });

  it('IFC-5: accepts instances of the class and its subclasses for a class type', () => {
    const basket = Basket.create();
    const Asian = encapsulate({ name: 'AsianPear', extends: Pear });
    const pear = Asian.create();
    basket.pear = pear;
    expect(basket.pear).toBe(pear);
    expect(() => {
      basket.pear = { weight: 3, getColor: () => 'yellow' };
    }).toThrow(InvalidValueError);
  });
});
