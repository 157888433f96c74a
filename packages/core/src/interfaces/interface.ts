/**
 * Classguard Core: Interfaces
 *
 * An interface is a named set of required public members. It has no
 * storage and no create(): it is only ever checked against.
 *
 *   const Fruit = defineInterface('Fruit', {
 *     members: {
 *       getColor: member.abstract(0),
 *       weight: member.variable(),
 *     },
 *   });
 *
 * Methods (member.method, member.abstract) become method requirements
 * keyed by parameter count; data members become property requirements.
 * Non-public members are not required. An interface requires everything
 * its ancestors require; a redeclared name takes the derived signature.
 */

import { compileMembers } from '../descriptors/compiler.js';
import type { MemberTable } from '../descriptors/compiler.js';
import { DefinitionError } from '../errors.js';
import { probeMember } from '../augmentation/handles.js';
import { registry } from '../registry/registry.js';
import type { InterfaceDescriptor, RequiredMember } from '../types/class.js';
import type { TypeConstraint } from '../types/member.js';
import { Mutability, Visibility } from '../types/member.js';

export interface InterfaceDefinition {
  readonly extends?: ReadonlyArray<InterfaceHandle>;
  readonly members?: MemberTable;
}

/**
 * Handle to a registered interface.
 *
 * As a TypeConstraint it matches any value that conforms structurally.
 */
export class InterfaceHandle implements TypeConstraint {
  constructor(readonly descriptor: InterfaceDescriptor) {}

  get id(): string {
    return this.descriptor.interfaceId;
  }

  get name(): string {
    return this.descriptor.name;
  }

  get typeName(): string {
    return this.descriptor.name;
  }

  get requiredMembers(): ReadonlyMap<string, RequiredMember> {
    return this.descriptor.requiredMembers;
  }

  matches(value: unknown): boolean {
    return conformsTo(value, this.descriptor);
  }
}

export function isInterface(value: unknown): value is InterfaceHandle {
  return value instanceof InterfaceHandle;
}

/**
 * Define and register an interface.
 *
 * @throws {DefinitionError} On a malformed definition or a non-interface parent
 */
export function defineInterface(name: string, definition: InterfaceDefinition = {}): InterfaceHandle {
  if (typeof name !== 'string' || name.length === 0) {
    throw new DefinitionError('Malformed interface definition: name must be a non-empty string.');
  }
  const parents = definition.extends ?? [];
  for (const parent of parents) {
    if (!isInterface(parent)) {
      throw new DefinitionError(`Interface '${name}' can only extend interfaces.`);
    }
  }

  const interfaceId = registry.nextId(name);
  const own = compileMembers(interfaceId, name, definition.members);

  const required = new Map<string, RequiredMember>();
  for (const parent of parents) {
    for (const [memberName, requirement] of parent.requiredMembers) {
      required.set(memberName, requirement);
    }
  }
  for (const descriptor of own.values()) {
    if (descriptor.visibility !== Visibility.Public) {
      continue;
    }
    const isMethod = descriptor.mutability === Mutability.Method;
    const requirement: RequiredMember = {
      name: descriptor.name,
      kind: isMethod ? 'method' : 'property',
      arity: isMethod ? (descriptor.arity ?? 0) : null,
      declaredBy: name,
    };
    required.set(descriptor.name, Object.freeze(requirement));
  }

  const descriptor: InterfaceDescriptor = Object.freeze({
    interfaceId,
    name,
    parentInterfaceIds: new Set(parents.map((p) => p.id)),
    requiredMembers: required,
  });
  registry.admitInterface(descriptor);
  return new InterfaceHandle(descriptor);
}

/**
 * Structural conformance: every required member is reachable by an
 * external caller, and every required method is callable.
 */
export function conformsTo(value: unknown, descriptor: InterfaceDescriptor): boolean {
  for (const requirement of descriptor.requiredMembers.values()) {
    const found = probeMember(value, requirement.name);
    if (found === null || (requirement.kind === 'method' && found !== 'method')) {
      return false;
    }
  }
  return true;
}
