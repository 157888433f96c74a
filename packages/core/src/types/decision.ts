/**
 * Classguard Core: Access Decision Types
 *
 * Defines the inputs and outputs of the access resolver and the log entry
 * produced for each decision.
 *
 * Every denial names the rule that triggered it, so the error surfaced to
 * the caller is specific.
 */

import type { MemberDescriptor } from './member.js';

// ---------------------------------------------------------------------------
// Access Context
// ---------------------------------------------------------------------------

/**
 * The class whose code is performing an attribute operation, or null when
 * the operation originates outside every class.
 *
 * It is taken from the call-context stack: the class the running method
 * was declared on (where the code is lexically bound), never the
 * runtime class of the receiver.
 */
export type AccessContext = string | null;

/** The context of code that is not bound to any class. */
export const EXTERNAL_CONTEXT: AccessContext = null;

// ---------------------------------------------------------------------------
// Decision Outcome
// ---------------------------------------------------------------------------

export enum DecisionOutcome {
  Allow = 'Allow',
  Deny = 'Deny',
}

export type AccessOperation = 'read' | 'write' | 'delete';

/**
 * Which owner an operation addresses: an instance, or the class itself
 * (static members and class-level constant values).
 */
export type AccessView = 'instance' | 'class';

/**
 * The rule behind a denial.
 *
 * - `private`    context is not the owning class
 * - `protected`  context is outside the owning class's ancestors and descendants
 * - `constant`   write after commit, or any delete of a constant
 * - `method`     write or delete of a method
 * - `undeclared` undeclared name touched from outside the owner's lineage
 * - `scope`      instance member touched through the class view
 */
export type DenyRule = 'private' | 'protected' | 'constant' | 'method' | 'undeclared' | 'scope';

/**
 * The result of one resolver check. `rule` is null exactly when the
 * outcome is Allow.
 */
export type AccessDecision =
  | { readonly outcome: DecisionOutcome.Allow; readonly rule: null }
  | { readonly outcome: DecisionOutcome.Deny; readonly rule: DenyRule };

// ---------------------------------------------------------------------------
// Access Request
// ---------------------------------------------------------------------------

/**
 * Everything the resolver needs to decide one operation.
 *
 * `descriptor` is null for undeclared names; `ownerClassId` is then the
 * class of the instance (or the class itself for the class view), used to
 * decide whether the context lies within the owner's lineage.
 */
export interface AccessRequest {
  readonly descriptor: MemberDescriptor | null;
  readonly memberName: string;
  readonly ownerClassId: string;
  readonly context: AccessContext;
  readonly operation: AccessOperation;
  readonly view: AccessView;
  /** Whether a constant already holds its committed value on this owner. */
  readonly committed: boolean;
}

// ---------------------------------------------------------------------------
// Decision Log Entry
// ---------------------------------------------------------------------------

/**
 * A structured record of one access decision.
 *
 * All fields are required. `rule` is null for Allow entries.
 */
export interface AccessDecisionLog {
  /** Class of the owner the operation addressed. */
  readonly class_id: string;
  readonly class_name: string;
  readonly member: string;
  /** Class that declared the member, or null for undeclared names. */
  readonly declaring_class_id: string | null;
  readonly operation: AccessOperation;
  readonly view: AccessView;
  readonly context: AccessContext;
  readonly outcome: DecisionOutcome;
  readonly rule: DenyRule | null;
  /** ISO 8601 timestamp of the decision. */
  readonly timestamp: string;
}
