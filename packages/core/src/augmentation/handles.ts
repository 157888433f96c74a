/**
 * Classguard Core: Handles
 *
 * Augmented objects are never handed out directly. Callers hold handles:
 * one Proxy per owner (an instance, or a class for its static view).
 *
 * A handle carries no context of its own. Each operation is checked against
 * the class whose code is running (see call-context.ts): a method runs in
 * the class that declared it, and so does an initializer. The same handle
 * therefore reads a private member from inside its class and is refused
 * everywhere else, whichever object the class code reaches it through.
 *
 * Operation flow (get, set, delete):
 *   effective member table → AccessGate → validation (writes) → store
 *
 * Stores: instance-scope values live on the instance. Static values and
 * class-level constant values live on the class that declared the member.
 * Undeclared names live in the owner's ordinary attributes.
 */

import { AccessGate } from '../access/gate.js';
import { isMemberDeclaration } from '../descriptors/declarations.js';
import { assertConcrete } from '../enforcement/enforcer.js';
import { AbstractMemberError, DefinitionError, NotFoundError } from '../errors.js';
import type { BoundMethod, ClassRecord, InstanceRecord, OwnerState } from '../registry/registry.js';
import { createOwnerState, registry } from '../registry/registry.js';
import type { AccessContext, AccessOperation, AccessRequest, AccessView } from '../types/decision.js';
import { EXTERNAL_CONTEXT } from '../types/decision.js';
import type { MemberDescriptor } from '../types/member.js';
import { Mutability, Scope } from '../types/member.js';
import { validate } from '../validation/engine.js';
import { currentContext, runInContext } from './call-context.js';

// ---------------------------------------------------------------------------
// Owners
// ---------------------------------------------------------------------------

export interface Owner {
  readonly view: AccessView;
  /** The instance's class, or the class itself for the class view. */
  readonly cls: ClassRecord;
  readonly state: OwnerState;
}

const gate = new AccessGate(registry);
const owners = new WeakMap<object, Owner>();
let instanceSequence = 0;

/**
 * Names the host runtime probes on arbitrary objects (promise resolution,
 * JSON.stringify, inspection). Undeclared reads of these answer undefined
 * instead of raising NotFoundError.
 */
const HOST_PROBES: ReadonlySet<string> = new Set(['then', 'toJSON', 'inspect', 'nodeType', 'asymmetricMatch', '$$typeof']);

export function classOwner(cls: ClassRecord): Owner {
  return { view: 'class', cls, state: cls };
}

function instanceOwner(instance: InstanceRecord): Owner {
  return { view: 'instance', cls: instance.cls, state: instance };
}

export function ownerOf(value: unknown): Owner | undefined {
  return typeof value === 'object' && value !== null ? owners.get(value) : undefined;
}

/** The class of an instance handle; null for anything else. */
export function instanceClassOf(value: unknown): ClassRecord | null {
  const owner = ownerOf(value);
  return owner !== undefined && owner.view === 'instance' ? owner.cls : null;
}

/** The owner's handle, created on first use. */
export function handleFor(owner: Owner): object {
  if (owner.state.handle !== null) {
    return owner.state.handle;
  }
  const handle = new Proxy({}, traps(owner));
  owner.state.handle = handle;
  owners.set(handle, owner);
  return handle;
}

function traps(owner: Owner): ProxyHandler<object> {
  const className = owner.cls.descriptor.name;
  return {
    get: (_target, key) => (typeof key === 'symbol' ? undefined : readMember(owner, key, currentContext())),
    set: (_target, key, value) => {
      if (typeof key === 'symbol') {
        throw new DefinitionError(`Cannot set symbol-keyed property on '${className}'.`);
      }
      writeMember(owner, key, value, currentContext());
      return true;
    },
    deleteProperty: (_target, key) => {
      if (typeof key === 'string') {
        deleteMember(owner, key, currentContext());
      }
      return true;
    },
    has: (_target, key) => typeof key === 'string' && visibleNames(owner, currentContext(), true).includes(key),
    ownKeys: () => visibleNames(owner, currentContext(), false),
    getOwnPropertyDescriptor: (_target, key) => {
      const context = currentContext();
      if (typeof key !== 'string' || !visibleNames(owner, context, false).includes(key)) {
        return undefined;
      }
      return { value: readMember(owner, key, context), writable: true, enumerable: true, configurable: true };
    },
    defineProperty: (_target, key) => {
      throw new DefinitionError(`Cannot define property '${String(key)}' on '${className}'; assign it instead.`);
    },
    setPrototypeOf: () => {
      throw new DefinitionError(`Cannot change the prototype of '${className}'.`);
    },
  };
}

// ---------------------------------------------------------------------------
// Instantiation
// ---------------------------------------------------------------------------

/**
 * Create an instance of `cls` and return its handle.
 *
 * Constants already committed on their declaring class are snapshotted
 * onto the instance first, then the nearest initializer in the lineage runs
 * in the context of the class that defined it. If the initializer throws,
 * the instance is discarded.
 */
export function instantiate(cls: ClassRecord, args: ReadonlyArray<unknown>): object {
  instanceSequence += 1;
  const instance: InstanceRecord = {
    ...createOwnerState(),
    instanceId: `${cls.descriptor.name}@${instanceSequence}`,
    cls,
  };

  for (const descriptor of cls.effective.values()) {
    if (descriptor.scope !== Scope.Instance || descriptor.mutability !== Mutability.Constant) {
      continue;
    }
    const declaring = registry.requireClass(descriptor.owningClassId);
    if (declaring.committed.has(descriptor.name)) {
      instance.store.set(descriptor.name, declaring.store.get(descriptor.name));
      instance.committed.add(descriptor.name);
    }
  }

  const owner = instanceOwner(instance);
  runInitializer(owner, cls, args);
  return handleFor(owner);
}

function runInitializer(owner: Owner, from: ClassRecord | null, args: ReadonlyArray<unknown>): void {
  for (let r = from; r !== null; r = r.parent) {
    const init = r.init;
    if (init !== null) {
      const receiver = handleFor(owner);
      runInContext(r.descriptor.classId, () => init(receiver, args));
      return;
    }
  }
}

/**
 * Call the implementation of `name` that the running class inherits,
 * skipping its own override. Must be called from class code, with `self`
 * an object of that class. `'init'` runs the ancestor initializer.
 *
 * @throws {TypeError} If no class code is running, `self` is not an object of the running class, or `name` is not a method
 * @throws {NotFoundError} If no ancestor declares `name`
 */
export function invokeSuper(self: object, name: string, ...args: unknown[]): unknown {
  const context = currentContext();
  const owner = ownerOf(self);
  if (context === null || owner === undefined || !registry.isSameOrAncestor(context, owner.cls.descriptor.classId)) {
    throw new TypeError('invokeSuper() must be called from a class method with an object of that class.');
  }
  const current = registry.requireClass(context);
  const parent = current.parent;

  if (name === 'init') {
    runInitializer(owner, parent, args);
    return undefined;
  }
  if (parent === null) {
    throw new NotFoundError(name, current.descriptor.name);
  }
  const descriptor = parent.effective.get(name);
  if (descriptor === undefined) {
    throw new NotFoundError(name, parent.descriptor.name);
  }
  const method = readDeclared(owner, descriptor, context);
  if (typeof method !== 'function') {
    throw new TypeError(`'${parent.descriptor.name}.${name}' is not a method.`);
  }
  return Reflect.apply(method, undefined, args);
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

function cellOf(owner: Owner, descriptor: MemberDescriptor): OwnerState {
  if (descriptor.scope === Scope.Static || owner.view === 'class') {
    return registry.requireClass(descriptor.owningClassId);
  }
  return owner.state;
}

function request(
  owner: Owner,
  descriptor: MemberDescriptor | null,
  memberName: string,
  context: AccessContext,
  operation: AccessOperation,
): AccessRequest {
  const committed = descriptor !== null && cellOf(owner, descriptor).committed.has(memberName);
  return {
    descriptor,
    memberName,
    ownerClassId: owner.cls.descriptor.classId,
    context,
    operation,
    view: owner.view,
    committed,
  };
}

export function readMember(owner: Owner, name: string, context: AccessContext): unknown {
  const descriptor = owner.cls.effective.get(name);
  if (descriptor !== undefined) {
    return readDeclared(owner, descriptor, context);
  }
  if (owner.state.attributes.has(name)) {
    gate.enforce(request(owner, null, name, context, 'read'));
    return owner.state.attributes.get(name);
  }
  if (HOST_PROBES.has(name) || name in Object.prototype) {
    const inherited: unknown = Reflect.get(Object.prototype, name);
    return inherited;
  }
  throw new NotFoundError(name, owner.cls.descriptor.name);
}

function readDeclared(owner: Owner, descriptor: MemberDescriptor, context: AccessContext): unknown {
  gate.enforce(request(owner, descriptor, descriptor.name, context, 'read'));
  assertConcrete(descriptor, registry.className(descriptor.owningClassId));
  if (descriptor.mutability === Mutability.Method) {
    return bindMethod(owner, descriptor);
  }
  const cell = cellOf(owner, descriptor);
  if (cell.store.has(descriptor.name)) {
    return cell.store.get(descriptor.name);
  }
  return descriptor.hasDefault ? descriptor.defaultValue : undefined;
}

export function writeMember(owner: Owner, name: string, value: unknown, context: AccessContext): void {
  if (isMemberDeclaration(value)) {
    throw new DefinitionError(
      `Cannot declare member '${name}' on '${owner.cls.descriptor.name}' after the class is defined.`,
    );
  }
  const descriptor = owner.cls.effective.get(name);
  if (descriptor === undefined) {
    gate.enforce(request(owner, null, name, context, 'write'));
    owner.state.attributes.set(name, value);
    return;
  }

  gate.enforce(request(owner, descriptor, name, context, 'write'));
  const accepted = validate(descriptor, value);
  const cell = cellOf(owner, descriptor);
  cell.store.set(name, accepted);
  if (descriptor.mutability === Mutability.Constant) {
    cell.committed.add(name);
  }
}

export function deleteMember(owner: Owner, name: string, context: AccessContext): void {
  const descriptor = owner.cls.effective.get(name);
  if (descriptor === undefined) {
    if (!owner.state.attributes.has(name)) {
      throw new NotFoundError(name, owner.cls.descriptor.name);
    }
    gate.enforce(request(owner, null, name, context, 'delete'));
    owner.state.attributes.delete(name);
    return;
  }

  gate.enforce(request(owner, descriptor, name, context, 'delete'));
  cellOf(owner, descriptor).store.delete(name);
}

/**
 * Bind a method to its owner's handle. Each call runs in the context of
 * the class that declared the method; static methods receive the class
 * view. Bound functions are cached per owner so repeated reads return the
 * same function.
 */
function bindMethod(owner: Owner, descriptor: MemberDescriptor): BoundMethod {
  const key = `${descriptor.owningClassId}:${descriptor.name}`;
  const cached = owner.state.bound.get(key);
  if (cached !== undefined) {
    return cached;
  }
  const body = descriptor.body;
  if (body === null) {
    throw new AbstractMemberError(descriptor.name, registry.className(descriptor.owningClassId));
  }
  const receiver = handleFor(descriptor.scope === Scope.Static ? classOwner(owner.cls) : owner);
  const bound: BoundMethod = (...args) =>
    runInContext(descriptor.owningClassId, () => Reflect.apply(body, receiver, args));
  owner.state.bound.set(key, bound);
  return bound;
}

// ---------------------------------------------------------------------------
// Probes
// ---------------------------------------------------------------------------

/**
 * Names readable through the given context. Abstract members are left
 * out; so are methods unless asked for.
 */
function visibleNames(owner: Owner, context: AccessContext, withMethods: boolean): string[] {
  const names: string[] = [];
  for (const descriptor of owner.cls.effective.values()) {
    if (descriptor.isAbstract || (!withMethods && descriptor.mutability === Mutability.Method)) {
      continue;
    }
    if (gate.permits(request(owner, descriptor, descriptor.name, context, 'read'))) {
      names.push(descriptor.name);
    }
  }
  for (const name of owner.state.attributes.keys()) {
    if (gate.permits(request(owner, null, name, context, 'read'))) {
      names.push(name);
    }
  }
  return names;
}

export type ProbedKind = 'method' | 'property';

/**
 * What an external caller finds under `name` on `value`, or null if
 * nothing is reachable.
 *
 * Handles are probed from the external context whatever code is running,
 * so a private or protected member counts as absent. Other objects
 * are probed by ordinary property lookup. Never logs, never throws.
 */
export function probeMember(value: unknown, name: string): ProbedKind | null {
  const owner = ownerOf(value);
  if (owner === undefined) {
    return probePlain(value, name);
  }
  const descriptor = owner.cls.effective.get(name);
  if (descriptor === undefined || descriptor.isAbstract) {
    return null;
  }
  if (!gate.permits(request(owner, descriptor, name, EXTERNAL_CONTEXT, 'read'))) {
    return null;
  }
  return descriptor.mutability === Mutability.Method ? 'method' : 'property';
}

function probePlain(value: unknown, name: string): ProbedKind | null {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return null;
  }
  if (!(name in value)) {
    return null;
  }
  const found: unknown = Reflect.get(value, name);
  return typeof found === 'function' ? 'method' : 'property';
}
