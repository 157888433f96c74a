/**
 * Classguard Core: Class Registry
 *
 * The authoritative record of every admitted class and interface.
 *
 * Registry invariants:
 * - A record is admitted once, after all definition-time checks pass
 * - Descriptors never change after admission
 * - Ids are unique for the life of the process
 *
 * Class records also carry the class-level storage cells: the shared store
 * for static members and class-level constant values, the set of committed
 * constants, and ordinary class attributes.
 */

import type { ClassDescriptor, InterfaceDescriptor } from '../types/class.js';
import type { MemberDescriptor } from '../types/member.js';

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/** A bound method as handed to callers. */
export type BoundMethod = (...args: unknown[]) => unknown;

/** Runs an initializer with the given receiver. */
export type InitInvoker = (receiver: object, args: ReadonlyArray<unknown>) => void;

/**
 * The mutable storage of one owner (a class, or an instance).
 *
 * `handle` is the owner's proxy once created; `bound` caches bound methods
 * so repeated reads return the same function.
 */
export interface OwnerState {
  readonly store: Map<string, unknown>;
  readonly committed: Set<string>;
  readonly attributes: Map<string, unknown>;
  handle: object | null;
  readonly bound: Map<string, BoundMethod>;
}

export interface ClassRecord extends OwnerState {
  readonly descriptor: ClassDescriptor;
  readonly parent: ClassRecord | null;
  /** Own and inherited members, most-derived declaration wins. */
  readonly effective: ReadonlyMap<string, MemberDescriptor>;
  readonly init: InitInvoker | null;
}

export interface InstanceRecord extends OwnerState {
  readonly instanceId: string;
  readonly cls: ClassRecord;
}

export function createOwnerState(): OwnerState {
  return {
    store: new Map(),
    committed: new Set(),
    attributes: new Map(),
    handle: null,
    bound: new Map(),
  };
}

// ---------------------------------------------------------------------------
// Lineage
// ---------------------------------------------------------------------------

/**
 * Inheritance queries the access resolver needs. Kept narrow so the
 * resolver can be exercised against a fixed lineage in isolation.
 */
export interface Lineage {
  /** True if `ancestorId` is `classId` or one of its ancestors. */
  isSameOrAncestor(ancestorId: string, classId: string): boolean;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ClassRegistry implements Lineage {
  private readonly classes: Map<string, ClassRecord> = new Map();
  private readonly interfaces: Map<string, InterfaceDescriptor> = new Map();
  private sequence = 0;

  /** Allocate a process-unique id for a class or interface named `name`. */
  nextId(name: string): string {
    this.sequence += 1;
    return `${name}#${this.sequence}`;
  }

  /**
   * Admit a compiled class record.
   *
   * @throws {Error} If the class id is already registered
   */
  admitClass(record: ClassRecord): void {
    const id = record.descriptor.classId;
    if (this.classes.has(id)) {
      throw new Error(`Class already registered: ${id}`);
    }
    this.classes.set(id, record);
  }

  admitInterface(descriptor: InterfaceDescriptor): void {
    if (this.interfaces.has(descriptor.interfaceId)) {
      throw new Error(`Interface already registered: ${descriptor.interfaceId}`);
    }
    this.interfaces.set(descriptor.interfaceId, descriptor);
  }

  getClass(classId: string): ClassRecord | undefined {
    return this.classes.get(classId);
  }

  /**
   * @throws {Error} If no class is registered under the id
   */
  requireClass(classId: string): ClassRecord {
    const record = this.classes.get(classId);
    if (record === undefined) {
      throw new Error(`Class not registered: ${classId}`);
    }
    return record;
  }

  getInterface(interfaceId: string): InterfaceDescriptor | undefined {
    return this.interfaces.get(interfaceId);
  }

  /** Human-readable name for a class id. Unknown ids are returned unchanged. */
  className(classId: string): string {
    return this.classes.get(classId)?.descriptor.name ?? classId;
  }

  /** The class and its ancestors, most-derived first. */
  lineage(classId: string): ReadonlyArray<ClassRecord> {
    const chain: ClassRecord[] = [];
    for (let r = this.classes.get(classId) ?? null; r !== null; r = r.parent) {
      chain.push(r);
    }
    return chain;
  }

  isSameOrAncestor(ancestorId: string, classId: string): boolean {
    return this.lineage(classId).some((r) => r.descriptor.classId === ancestorId);
  }

  /** True if `interfaceId` is `targetId` or derives from it. */
  interfaceExtends(interfaceId: string, targetId: string): boolean {
    if (interfaceId === targetId) {
      return true;
    }
    const descriptor = this.interfaces.get(interfaceId);
    if (descriptor === undefined) {
      return false;
    }
    for (const parentId of descriptor.parentInterfaceIds) {
      if (this.interfaceExtends(parentId, targetId)) {
        return true;
      }
    }
    return false;
  }
}

/** The process-wide registry every augmented class is admitted to. */
export const registry = new ClassRegistry();
