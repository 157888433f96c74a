/**
 * Classguard Core: Class Augmentation
 *
 * encapsulate() compiles a class definition, runs the definition-time
 * checks and admits the class to the registry:
 *
 *   const Apple = encapsulate<AppleShape, [weight: number]>({
 *     name: 'Apple',
 *     members: {
 *       weight: member.private({ type: Types.number }),
 *       getWeight: member.public(member.method(function (this: AppleShape) { return this.weight; })),
 *     },
 *     init(weight) { this.weight = weight; },
 *   });
 *
 *   const apple = Apple.create(2);
 *
 * Definition order:
 *   1. name and flags        (abstract + final is rejected)
 *   2. parent                (must be augmented, must not be final)
 *   3. own members           (compileMembers)
 *   4. final methods kept    (no redeclaration of an inherited final method)
 *   5. interfaces            (checkImplements against the effective table)
 *   6. class-level values    (static defaults and declared constants committed)
 *   7. admission             (registry)
 *
 * Any failure raises DefinitionError and nothing is admitted.
 */

import { compileMembers } from '../descriptors/compiler.js';
import type { MemberTable } from '../descriptors/compiler.js';
import {
  assertDefinable,
  assertExtendable,
  assertFinalMembersKept,
  assertInstantiable,
} from '../enforcement/enforcer.js';
import { DefinitionError } from '../errors.js';
import { checkImplements } from '../interfaces/conformance.js';
import type { InterfaceHandle } from '../interfaces/interface.js';
import type { ClassRecord, InitInvoker } from '../registry/registry.js';
import { createOwnerState, registry } from '../registry/registry.js';
import type { ClassDescriptor } from '../types/class.js';
import type { MemberDescriptor, TypeConstraint } from '../types/member.js';
import { Mutability, Scope } from '../types/member.js';
import { classOwner, handleFor, instanceClassOf, instantiate } from './handles.js';

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

/**
 * A class definition.
 *
 * `S` is the shape callers see through handles, `A` the initializer's
 * parameters. Neither is checked against `members`; they describe the
 * handles for the benefit of callers.
 */
export interface ClassDefinition<S extends object, A extends unknown[]> {
  readonly name: string;
  readonly extends?: AnyAugmentedClass;
  readonly abstract?: boolean;
  readonly final?: boolean;
  readonly implements?: ReadonlyArray<InterfaceHandle>;
  readonly members?: MemberTable;
  /** Runs on each new instance with a receiver bound to this class. */
  readonly init?: (this: S, ...args: A) => void;
}

// ---------------------------------------------------------------------------
// Augmented Class
// ---------------------------------------------------------------------------

export type AnyAugmentedClass = AugmentedClass<object, never[], object>;

const augmented = new WeakMap<ClassRecord, AnyAugmentedClass>();

// Handles are Proxies. Their shape is what the definition's type
// arguments declare; the member table enforces the rest at run time.
function shape<T extends object>(handle: object): T {
  return handle as T;
}

/**
 * Handle to an admitted class.
 *
 * Also a TypeConstraint: a variable typed with an augmented class accepts
 * instances of that class and its subclasses.
 */
export class AugmentedClass<
  S extends object = Record<string, unknown>,
  A extends unknown[] = unknown[],
  St extends object = Record<string, unknown>,
> implements TypeConstraint {
  constructor(private readonly record: ClassRecord) {}

  get id(): string {
    return this.record.descriptor.classId;
  }

  get name(): string {
    return this.record.descriptor.name;
  }

  get typeName(): string {
    return this.record.descriptor.name;
  }

  get descriptor(): ClassDescriptor {
    return this.record.descriptor;
  }

  get parent(): AnyAugmentedClass | null {
    return this.record.parent === null ? null : (augmented.get(this.record.parent) ?? null);
  }

  /** The class-level view: static members and declared constant values. */
  get statics(): St {
    return shape<St>(handleFor(classOwner(this.record)));
  }

  /**
   * @throws {AbstractInstantiationError} If the class is abstract
   */
  create(...args: A): S {
    assertInstantiable(this.record.descriptor);
    return shape<S>(instantiate(this.record, args));
  }

  /** True for instances of this class or a subclass. */
  matches(value: unknown): boolean {
    const cls = instanceClassOf(value);
    return cls !== null && registry.isSameOrAncestor(this.id, cls.descriptor.classId);
  }
}

// ---------------------------------------------------------------------------
// encapsulate()
// ---------------------------------------------------------------------------

/** Returns an augmented class unchanged. */
export function encapsulate<S extends object, A extends unknown[], St extends object>(
  target: AugmentedClass<S, A, St>,
): AugmentedClass<S, A, St>;
/**
 * Compile and admit a class definition.
 *
 * @throws {DefinitionError} If the definition is rejected
 */
export function encapsulate<
  S extends object = Record<string, unknown>,
  A extends unknown[] = unknown[],
  St extends object = Record<string, unknown>,
>(definition: ClassDefinition<S, A>): AugmentedClass<S, A, St>;
export function encapsulate<S extends object, A extends unknown[], St extends object>(
  target: ClassDefinition<S, A> | AugmentedClass<S, A, St>,
): AugmentedClass<S, A, St> {
  if (target instanceof AugmentedClass) {
    return target;
  }
  const record = compileClass(target);
  const cls = new AugmentedClass<S, A, St>(record);
  augmented.set(record, cls);
  return cls;
}

function compileClass<S extends object, A extends unknown[]>(definition: ClassDefinition<S, A>): ClassRecord {
  const name = definition.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new DefinitionError('Malformed class definition: name must be a non-empty string.');
  }
  const isAbstract = definition.abstract ?? false;
  const isFinal = definition.final ?? false;
  assertDefinable(name, isAbstract, isFinal);

  const parent = resolveParent(name, definition.extends);
  assertExtendable(parent?.descriptor ?? null, name);

  const classId = registry.nextId(name);
  const own = compileMembers(classId, name, definition.members);
  const inherited: ReadonlyMap<string, MemberDescriptor> = parent?.effective ?? new Map();
  assertFinalMembersKept(inherited, own, name, (id) => registry.className(id));

  const effective = new Map(inherited);
  for (const [memberName, descriptor] of own) {
    effective.set(memberName, descriptor);
  }

  const interfaces = definition.implements ?? [];
  checkImplements(name, effective, interfaces);

  const descriptor: ClassDescriptor = Object.freeze({
    classId,
    name,
    parentClassId: parent?.descriptor.classId ?? null,
    members: own,
    isAbstract,
    isFinal,
    implementedInterfaces: new Set(interfaces.map((i) => i.id)),
  });

  const record: ClassRecord = {
    ...createOwnerState(),
    descriptor,
    parent,
    effective,
    init: initInvoker(definition.init),
  };

  for (const member of own.values()) {
    const classLevel = member.scope === Scope.Static || member.mutability === Mutability.Constant;
    if (classLevel && member.hasDefault) {
      record.store.set(member.name, member.defaultValue);
      if (member.mutability === Mutability.Constant) {
        record.committed.add(member.name);
      }
    }
  }

  registry.admitClass(record);
  return record;
}

function resolveParent(name: string, parent: AnyAugmentedClass | undefined): ClassRecord | null {
  if (parent === undefined) {
    return null;
  }
  if (!(parent instanceof AugmentedClass)) {
    throw new DefinitionError(`Class '${name}' can only extend an augmented class.`);
  }
  return registry.requireClass(parent.id);
}

function initInvoker<S extends object, A extends unknown[]>(
  init: ((this: S, ...args: A) => void) | undefined,
): InitInvoker | null {
  if (init === undefined) {
    return null;
  }
  return (receiver, args) => {
    Reflect.apply(init, receiver, args);
  };
}
