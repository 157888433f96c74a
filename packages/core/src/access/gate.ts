/**
 * Classguard Core: Access Gate
 *
 * The enforcement boundary every attribute operation on an augmented
 * object passes through.
 *
 * Gate contract:
 * - Asks the AccessResolver for a decision
 * - Records the decision with the configured DecisionLogger (every Deny;
 *   Allow only when `logPermits` is set)
 * - Throws AccessDeniedError on Deny, after the entry is recorded
 *
 * permits() answers the same question without logging or throwing. It
 * serves probes (`in`, key enumeration, duck typing) that must not leave
 * a trail of denials.
 */

import { AccessDeniedError } from '../errors.js';
import { getEngineConfig } from '../configuration/engine-config.js';
import type { ClassRegistry } from '../registry/registry.js';
import type { AccessDecision, AccessDecisionLog, AccessRequest } from '../types/decision.js';
import { DecisionOutcome } from '../types/decision.js';
import { AccessResolver } from './resolver.js';

export class AccessGate {
  private readonly resolver: AccessResolver;

  constructor(private readonly registry: ClassRegistry) {
    this.resolver = new AccessResolver(registry);
  }

  /**
   * @throws {AccessDeniedError} When the resolver denies the request
   */
  enforce(request: AccessRequest): void {
    const decision = this.resolver.check(request);
    const { logger, logPermits, clock } = getEngineConfig();

    if (logger.enabled && (decision.outcome === DecisionOutcome.Deny || logPermits)) {
      logger.record(this.entry(request, decision, clock()));
    }

    if (decision.outcome === DecisionOutcome.Deny) {
      const declaringClassId = request.descriptor?.owningClassId ?? request.ownerClassId;
      throw new AccessDeniedError(
        request.memberName,
        this.registry.className(declaringClassId),
        decision.rule,
        request.operation,
        request.context,
      );
    }
  }

  permits(request: AccessRequest): boolean {
    return this.resolver.check(request).outcome === DecisionOutcome.Allow;
  }

  private entry(request: AccessRequest, decision: AccessDecision, timestamp: string): AccessDecisionLog {
    return {
      class_id: request.ownerClassId,
      class_name: this.registry.className(request.ownerClassId),
      member: request.memberName,
      declaring_class_id: request.descriptor?.owningClassId ?? null,
      operation: request.operation,
      view: request.view,
      context: request.context,
      outcome: decision.outcome,
      rule: decision.rule,
      timestamp,
    };
  }
}
