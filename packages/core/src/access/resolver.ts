/**
 * Classguard Core: Access Resolver
 *
 * Decides whether one attribute operation is permitted. Pure: it reads the
 * request and the class lineage and nothing else.
 *
 * Rule order (first denial wins):
 *   1. Undeclared names: allowed only from a class in the owner's lineage.
 *   2. Scope: the class view reaches static members and constants only.
 *   3. Visibility: private needs the owning class; protected needs a class
 *      that is the owner, an ancestor, or a descendant. Delete counts as
 *      a write.
 *   4. Mutability: methods are read-only; constants refuse delete always
 *      and writes once committed.
 */

import type { AccessDecision, AccessRequest, DenyRule } from '../types/decision.js';
import { DecisionOutcome } from '../types/decision.js';
import type { MemberDescriptor } from '../types/member.js';
import { Mutability, Scope, Visibility } from '../types/member.js';
import type { Lineage } from '../registry/registry.js';

const ALLOW: AccessDecision = Object.freeze({ outcome: DecisionOutcome.Allow, rule: null });

function deny(rule: DenyRule): AccessDecision {
  return { outcome: DecisionOutcome.Deny, rule };
}

export class AccessResolver {
  constructor(private readonly lineage: Lineage) {}

  check(request: AccessRequest): AccessDecision {
    const { descriptor, context } = request;

    if (descriptor === null) {
      return context !== null && this.lineage.isSameOrAncestor(context, request.ownerClassId)
        ? ALLOW
        : deny('undeclared');
    }

    if (request.view === 'class' && !reachableFromClass(descriptor)) {
      return deny('scope');
    }

    switch (descriptor.visibility) {
      case Visibility.Private:
        if (context !== descriptor.owningClassId) return deny('private');
        break;
      case Visibility.Protected:
        if (!this.related(context, descriptor.owningClassId)) return deny('protected');
        break;
      case Visibility.Public:
        break;
    }

    switch (descriptor.mutability) {
      case Mutability.Method:
        return request.operation === 'read' ? ALLOW : deny('method');
      case Mutability.Constant:
        if (request.operation === 'delete') return deny('constant');
        if (request.operation === 'write' && request.committed) return deny('constant');
        return ALLOW;
      case Mutability.Variable:
        return ALLOW;
    }
  }

  private related(context: string | null, owningClassId: string): boolean {
    if (context === null) {
      return false;
    }
    return (
      this.lineage.isSameOrAncestor(context, owningClassId) ||
      this.lineage.isSameOrAncestor(owningClassId, context)
    );
  }
}

/** Static members, and constants (which also hold one class-level value). */
function reachableFromClass(descriptor: MemberDescriptor): boolean {
  return descriptor.scope === Scope.Static || descriptor.mutability === Mutability.Constant;
}
