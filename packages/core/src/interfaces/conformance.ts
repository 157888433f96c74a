/**
 * Classguard Core: Explicit Conformance
 *
 * Checks a class's `implements` list when the class is defined. Each
 * requirement of each interface must be met by the class's own or
 * inherited members:
 * - the name exists
 * - methods are met by methods and properties by data members
 * - a method accepts at least the required number of parameters (a
 *   variadic method accepts any number)
 *
 * Abstract methods meet method requirements; visibility is not checked.
 */

import { DefinitionError } from '../errors.js';
import type { MemberDescriptor } from '../types/member.js';
import { Mutability } from '../types/member.js';
import type { InterfaceHandle } from './interface.js';
import { isInterface } from './interface.js';

/**
 * @throws {DefinitionError} Naming the interface and the first unmet requirement
 */
export function checkImplements(
  className: string,
  effective: ReadonlyMap<string, MemberDescriptor>,
  interfaces: ReadonlyArray<InterfaceHandle>,
): void {
  for (const iface of interfaces) {
    if (!isInterface(iface)) {
      throw new DefinitionError(`Class '${className}' can only implement interfaces.`);
    }
    const fail = (detail: string): DefinitionError =>
      new DefinitionError(`Class '${className}' does not implement '${iface.name}': ${detail}.`);

    for (const requirement of iface.requiredMembers.values()) {
      const found = effective.get(requirement.name);
      if (found === undefined) {
        throw fail(`missing member '${requirement.name}'`);
      }
      const isMethod = found.mutability === Mutability.Method;
      if (requirement.kind === 'method') {
        if (!isMethod) {
          throw fail(`member '${requirement.name}' must be a method`);
        }
        const needed = requirement.arity ?? 0;
        if (!found.variadic && (found.arity ?? 0) < needed) {
          throw fail(`method '${requirement.name}' must accept ${needed} parameter(s)`);
        }
      } else if (isMethod) {
        throw fail(`member '${requirement.name}' must be a property`);
      }
    }
  }
}
