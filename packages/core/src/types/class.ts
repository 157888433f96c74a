/**
 * Classguard Core: Class and Interface Descriptor Types
 *
 * A ClassDescriptor is the closed member table of one augmented class plus
 * its class-level flags. An InterfaceDescriptor is the set of members a
 * conforming class or object must expose.
 *
 * Both are created once at definition time and frozen. Only member *values*
 * change afterwards, never descriptors.
 */

import type { MemberDescriptor } from './member.js';

// ---------------------------------------------------------------------------
// Class Descriptor
// ---------------------------------------------------------------------------

/**
 * Compiled form of a class definition.
 *
 * Invariant: no admitted descriptor has a final parent. Finality is checked
 * before the descriptor enters the class registry.
 */
export interface ClassDescriptor {
  readonly classId: string;
  readonly name: string;
  readonly parentClassId: string | null;
  /** Members declared by this class only. Inherited members are not copied. */
  readonly members: ReadonlyMap<string, MemberDescriptor>;
  readonly isAbstract: boolean;
  readonly isFinal: boolean;
  /** Interfaces named in this class's `implements` list. */
  readonly implementedInterfaces: ReadonlySet<string>;
}

// ---------------------------------------------------------------------------
// Interface Descriptor
// ---------------------------------------------------------------------------

/** Whether a required member must be callable or merely present. */
export type RequiredMemberKind = 'method' | 'property';

/**
 * Minimal signature of a required interface member.
 *
 * Methods are keyed by parameter count, not parameter types: structural
 * conformance never imposes type identity on parameters.
 */
export interface RequiredMember {
  readonly name: string;
  readonly kind: RequiredMemberKind;
  /** Null for properties. */
  readonly arity: number | null;
  /** Interface that first declared the requirement. */
  readonly declaredBy: string;
}

/**
 * Compiled form of an interface definition.
 *
 * `requiredMembers` is the union of the interface's own public members and
 * every ancestor's requirements.
 */
export interface InterfaceDescriptor {
  readonly interfaceId: string;
  readonly name: string;
  readonly parentInterfaceIds: ReadonlySet<string>;
  readonly requiredMembers: ReadonlyMap<string, RequiredMember>;
}
