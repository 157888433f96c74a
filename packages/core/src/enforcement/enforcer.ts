/**
 * Classguard Core: Abstract/Final Enforcer
 *
 * Definition-time checks (raise DefinitionError before a class is
 * admitted):
 * - a final class has no subclasses
 * - a final method is never redeclared by a subclass
 * - a class is not both abstract and final
 *
 * Access-time checks:
 * - an abstract class is never instantiated
 * - an abstract member raises when it is reached (lazily, not at
 *   instantiation: a concrete subclass may leave abstract members
 *   unimplemented and still be created)
 */

import { AbstractInstantiationError, AbstractMemberError, DefinitionError } from '../errors.js';
import type { AnyAugmentedClass } from '../augmentation/encapsulate.js';
import type { ClassDescriptor } from '../types/class.js';
import type { MemberDescriptor } from '../types/member.js';

export function assertDefinable(name: string, isAbstract: boolean, isFinal: boolean): void {
  if (isAbstract && isFinal) {
    throw new DefinitionError(`Class '${name}' cannot be both abstract and final.`);
  }
}

/**
 * @throws {DefinitionError} If `parent` is final
 */
export function assertExtendable(parent: ClassDescriptor | null, childName: string): void {
  if (parent !== null && parent.isFinal) {
    throw new DefinitionError(`Class '${childName}' cannot subclass final class '${parent.name}'.`);
  }
}

/**
 * @throws {DefinitionError} If `own` redeclares a member that is final in `inherited`
 */
export function assertFinalMembersKept(
  inherited: ReadonlyMap<string, MemberDescriptor>,
  own: ReadonlyMap<string, MemberDescriptor>,
  childName: string,
  parentName: (classId: string) => string,
): void {
  for (const name of own.keys()) {
    const previous = inherited.get(name);
    if (previous !== undefined && previous.isFinal) {
      throw new DefinitionError(
        `Class '${childName}' cannot override final method '${parentName(previous.owningClassId)}.${name}'.`,
      );
    }
  }
}

/**
 * @throws {AbstractInstantiationError} If the class is abstract
 */
export function assertInstantiable(descriptor: ClassDescriptor): void {
  if (descriptor.isAbstract) {
    throw new AbstractInstantiationError(descriptor.name);
  }
}

/**
 * @throws {AbstractMemberError} If the member has no implementation
 */
export function assertConcrete(descriptor: MemberDescriptor, declaringClass: string): void {
  if (descriptor.isAbstract) {
    throw new AbstractMemberError(descriptor.name, declaringClass);
  }
}

// ---------------------------------------------------------------------------
// Predicates
// ---------------------------------------------------------------------------

export function isAbstract(cls: AnyAugmentedClass): boolean {
  return cls.descriptor.isAbstract;
}

export function isFinal(cls: AnyAugmentedClass): boolean {
  return cls.descriptor.isFinal;
}
