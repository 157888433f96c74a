/**
 * Classguard Core: instanceOf
 *
 * Membership tests for augmented classes and interfaces.
 *
 *   instanceOf(apple, Apple)          lineage membership
 *   instanceOf(apple, Fruit)          structural (duck typed)
 *   instanceOf(apple, Fruit, false)   explicit: the class or an ancestor
 *                                     lists Fruit, or an interface derived
 *                                     from it, in `implements`
 */

import { AugmentedClass } from '../augmentation/encapsulate.js';
import type { AnyAugmentedClass } from '../augmentation/encapsulate.js';
import { instanceClassOf } from '../augmentation/handles.js';
import { registry } from '../registry/registry.js';
import type { InterfaceHandle } from './interface.js';
import { conformsTo, isInterface } from './interface.js';

export type ConformanceTarget = AnyAugmentedClass | InterfaceHandle;

/**
 * @throws {TypeError} If `target` is neither an augmented class nor an interface
 */
export function instanceOf(value: unknown, target: ConformanceTarget, duckTyped = true): boolean {
  if (isInterface(target)) {
    return duckTyped ? conformsTo(value, target.descriptor) : declares(value, target.id);
  }
  if (target instanceof AugmentedClass) {
    return target.matches(value);
  }
  throw new TypeError('instanceOf() expects an augmented class or an interface.');
}

function declares(value: unknown, interfaceId: string): boolean {
  const cls = instanceClassOf(value);
  if (cls === null) {
    return false;
  }
  return registry
    .lineage(cls.descriptor.classId)
    .some((r) => [...r.descriptor.implementedInterfaces].some((id) => registry.interfaceExtends(id, interfaceId)));
}
