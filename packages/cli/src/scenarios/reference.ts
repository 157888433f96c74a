/**
 * Reference scenarios: the object-model rules, one scenario per rule family.
 *
 * Classes are defined when buildReferenceScenarios() is called, so every
 * call works on fresh classes and importing this module registers nothing.
 */

import {
  Types,
  defineInterface,
  encapsulate,
  instanceOf,
  member,
} from '@classguard/core';
import type { Scenario } from './runner.js';

interface AppleShape {
  weight: unknown;
  getWeight(): unknown;
  setWeight(weight: unknown): void;
}

interface PublicAppleShape extends AppleShape {
  describeWeight(): unknown;
}

interface GreenAppleShape extends AppleShape {
  color: unknown;
}

interface Colored {
  getColor(): unknown;
}

function created(_handle: object): string {
  return 'created';
}

function defineApples() {
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
    },
  });

  const GreenApple = encapsulate<GreenAppleShape, [weight: unknown], { color: unknown }>({
    name: 'GreenApple',
    extends: Apple,
    members: { color: member.constant('green') },
  });

  return { Apple, PublicApple, GreenApple };
}

function visibilityScenario(): Scenario {
  const { Apple, PublicApple } = defineApples();
  const apple = PublicApple.create(2);
  return {
    id: 'apple-visibility',
    title: 'Private weight behind protected accessors',
    steps: [
      { label: 'subclass method reads the weight', expect: 'returns', run: () => apple.describeWeight() },
      { label: 'external read of private weight', expect: 'raises', run: () => apple.weight },
      { label: 'external call of protected getWeight', expect: 'raises', run: () => apple.getWeight() },
      { label: "Apple.create('two')", expect: 'raises', run: () => created(Apple.create('two')) },
      { label: "Apple.create('2.5') coerces", expect: 'returns', run: () => PublicApple.create('2.5').describeWeight() },
    ],
  };
}

function constantScenario(): Scenario {
  const { GreenApple } = defineApples();
  const apple = GreenApple.create(1);
  return {
    id: 'green-apple-constant',
    title: 'Constant colour',
    steps: [
      { label: 'class-level read of color', expect: 'returns', run: () => GreenApple.statics.color },
      {
        label: "instance write color = 'red'",
        expect: 'raises',
        run: () => {
          apple.color = 'red';
        },
      },
      {
        label: "class-level write color = 'red'",
        expect: 'raises',
        run: () => {
          GreenApple.statics.color = 'red';
        },
      },
      { label: 'color after failed writes', expect: 'returns', run: () => apple.color },
    ],
  };
}

function abstractScenario(): Scenario {
  const AbstractApple = encapsulate<Colored>({
    name: 'AbstractApple',
    abstract: true,
    members: { getColor: member.abstract(0) },
  });
  const PlainApple = encapsulate<Colored>({ name: 'PlainApple', extends: AbstractApple });
  const RedApple = encapsulate<Colored>({
    name: 'RedApple',
    extends: AbstractApple,
    members: { getColor: member.method(() => 'red') },
  });
  return {
    id: 'abstract-color',
    title: 'Abstract colour',
    steps: [
      { label: 'AbstractApple.create()', expect: 'raises', run: () => created(AbstractApple.create()) },
      { label: 'inherited abstract getColor()', expect: 'raises', run: () => PlainApple.create().getColor() },
      { label: 'overridden getColor()', expect: 'returns', run: () => RedApple.create().getColor() },
    ],
  };
}

function finalScenario(): Scenario {
  const FinalApple = encapsulate<{ variety: unknown }>({
    name: 'FinalApple',
    final: true,
    members: { variety: member.constant('heirloom') },
  });
  return {
    id: 'final-class',
    title: 'Final class',
    steps: [
      { label: 'FinalApple.create()', expect: 'returns', run: () => FinalApple.create().variety },
      {
        label: 'subclass FinalApple',
        expect: 'raises',
        run: () => encapsulate({ name: 'CrabApple', extends: FinalApple }).name,
      },
    ],
  };
}

function interfaceScenario(): Scenario {
  const Fruit = defineInterface('Fruit', {
    members: { getColor: member.abstract(0), weight: member.variable() },
  });
  const Pear = encapsulate<{ weight: unknown; getColor(): unknown }>({
    name: 'Pear',
    implements: [Fruit],
    members: {
      weight: member.variable({ default: 3 }),
      getColor: member.method(() => 'yellow'),
    },
  });
  const lookalike = { weight: 1, getColor: () => 'red' };
  return {
    id: 'interface-conformance',
    title: 'Interface conformance',
    steps: [
      { label: 'Pear instance is a Fruit', expect: 'returns', run: () => instanceOf(Pear.create(), Fruit) },
      { label: 'plain object is a Fruit (duck typed)', expect: 'returns', run: () => instanceOf(lookalike, Fruit) },
      {
        label: 'plain object is a Fruit (exact)',
        expect: 'returns',
        run: () => instanceOf(lookalike, Fruit, false),
      },
      {
        label: 'class missing getColor implements Fruit',
        expect: 'raises',
        run: () =>
          encapsulate({ name: 'Stone', implements: [Fruit], members: { weight: member.variable() } }).name,
      },
    ],
  };
}

export function buildReferenceScenarios(): Scenario[] {
  return [visibilityScenario(), constantScenario(), abstractScenario(), finalScenario(), interfaceScenario()];
}
