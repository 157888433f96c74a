/**
 * Classguard Core: Apple Scenarios
 *
 * End-to-end behaviour through encapsulate(), create() and handles:
 *
 *   Apple        private weight (number), protected getWeight/setWeight,
 *                initializer stores the weight through setWeight
 *   PublicApple  exposes the weight through public methods
 *   GreenApple   adds the constant color 'green'
 */

import { describe, it, expect } from 'vitest';
import { encapsulate } from '../src/augmentation/encapsulate.js';
import { member } from '../src/descriptors/declarations.js';
import { AccessDeniedError, InvalidValueError } from '../src/errors.js';
import { Types } from '../src/validation/type-tags.js';

interface AppleShape {
  weight: unknown;
  getWeight(): unknown;
  setWeight(weight: unknown): void;
}

interface PublicAppleShape extends AppleShape {
  describeWeight(): unknown;
  updateWeight(weight: unknown): void;
}

interface GreenAppleShape extends AppleShape {
  color: unknown;
}

const Apple = encapsulate<AppleShape, [weight: unknown]>({
  name: 'Apple',
  members: {
    weight: member.private({ type: Types.number }),
    getWeight: member.protected(
      member.method(function (this: AppleShape) {
        return this.weight;
      }),
    ),
    setWeight: member.protected(
      member.method(function (this: AppleShape, weight: unknown) {
        this.weight = weight;
      }),
    ),
  },
  init(weight) {
    this.setWeight(weight);
  },
});

const PublicApple = encapsulate<PublicAppleShape, [weight: unknown]>({
  name: 'PublicApple',
  extends: Apple,
  members: {
    describeWeight: member.method(function (this: PublicAppleShape) {
      return this.getWeight();
    }),
    updateWeight: member.method(function (this: PublicAppleShape, weight: unknown) {
      this.setWeight(weight);
    }),
  },
});

const GreenApple = encapsulate<GreenAppleShape, [weight: unknown], { color: unknown }>({
  name: 'GreenApple',
  extends: Apple,
  members: {
    color: member.constant('green'),
  },
});

describe('Apple: private and protected members', () => {
  it('rejects a weight that cannot be coerced to a number', () => {
    expect(() => Apple.create('two')).toThrow(InvalidValueError);
    expect(() => Apple.create('two')).toThrow("Invalid value for 'weight': cannot coerce to number.");
  });

  it('coerces a numeric string weight', () => {
    const apple = PublicApple.create('2.5');
    expect(apple.describeWeight()).toBe(2.5);
  });

  it('denies external reads of the private weight', () => {
    const apple = Apple.create(2);
    expect(() => apple.weight).toThrow(AccessDeniedError);
    expect(() => apple.weight).toThrow("Cannot read private member 'Apple.weight' outside 'Apple'.");
  });

  it('denies external writes of the private weight and keeps the value', () => {
    const apple = PublicApple.create(2);
    expect(() => {
      apple.weight = 3;
    }).toThrow(AccessDeniedError);
    expect(apple.describeWeight()).toBe(2);
  });

  it('denies external calls of protected methods', () => {
    const apple = Apple.create(2);
    expect(() => apple.getWeight()).toThrow(
      "Cannot read protected member 'Apple.getWeight' outside the 'Apple' lineage.",
    );
  });

  it('lets a subclass method reach protected members of its parent', () => {
    const apple = PublicApple.create(2);
    expect(apple.describeWeight()).toBe(2);
  });

  it('keeps a failed write from changing the stored weight', () => {
    const apple = PublicApple.create(4);
    expect(() => apple.updateWeight('heavy')).toThrow(InvalidValueError);
    expect(apple.describeWeight()).toBe(4);
    apple.updateWeight('5');
    expect(apple.describeWeight()).toBe(5);
  });
});

describe('GreenApple: constants', () => {
  it('reads the constant from the class and from instances', () => {
    expect(GreenApple.statics.color).toBe('green');
    expect(GreenApple.create(1).color).toBe('green');
  });

  it('refuses to override the constant on an instance', () => {
    const apple = GreenApple.create(1);
    expect(() => {
      apple.color = 'red';
    }).toThrow("Cannot override constant 'GreenApple.color'.");
    expect(apple.color).toBe('green');
  });

  it('refuses to override the constant on the class', () => {
    expect(() => {
      GreenApple.statics.color = 'red';
    }).toThrow(AccessDeniedError);
    expect(GreenApple.statics.color).toBe('green');
  });

  it('refuses to delete the constant', () => {
    const apple = GreenApple.create(1);
    expect(() => Reflect.deleteProperty(apple, 'color')).toThrow("Cannot delete constant 'GreenApple.color'.");
  });
});
