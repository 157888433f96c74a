/**
 * Classguard Core: Type Exports
 *
 * Re-exports all core types from a single entry point.
 * No logic lives in this file.
 */

export type { MemberDescriptor, MethodBody, TypeConstraint, Validator } from './member.js';
export { Mutability, Scope, Visibility } from './member.js';

export type {
  ClassDescriptor,
  InterfaceDescriptor,
  RequiredMember,
  RequiredMemberKind,
} from './class.js';

export type {
  AccessContext,
  AccessDecision,
  AccessDecisionLog,
  AccessOperation,
  AccessRequest,
  AccessView,
  DenyRule,
} from './decision.js';
export { DecisionOutcome, EXTERNAL_CONTEXT } from './decision.js';
