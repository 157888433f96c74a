/**
 * Classguard Core: Type & Validation Engine
 *
 * Validates, and where unambiguous coerces, a candidate value against a
 * member descriptor's declared types and validator.
 *
 * Algorithm:
 *   1. No declared types: the candidate passes the type stage unchanged.
 *   2. The candidate matches any declared type: accepted unchanged.
 *   3. Exactly one declared type with a coercer: one coercion attempt. The
 *      coerced value must itself match the type.
 *   4. Otherwise (several types, or no coercer): rejected. Coercion is only
 *      attempted when the target type is unambiguous.
 *   5. The validator, if any, runs on the accepted value. Falsy rejects.
 *
 * validate() never writes. Callers store the returned value only after it
 * returns, so a failure leaves the owner's stored value untouched.
 */

import { InvalidValueError } from '../errors.js';
import type { MemberDescriptor, TypeConstraint } from '../types/member.js';

/** The descriptor fields the engine reads. */
export type ValidationTarget = Pick<MemberDescriptor, 'name' | 'declaredTypes' | 'validator'>;

/**
 * Validate a candidate value for a member.
 *
 * @returns The accepted value: the candidate itself, or its coercion
 * @throws {InvalidValueError} On type mismatch, failed coercion, or validator rejection
 */
export function validate(target: ValidationTarget, candidate: unknown): unknown {
  const value = checkTypes(target, candidate);
  if (target.validator !== null) {
    let verdict: unknown;
    try {
      verdict = target.validator(value);
    } catch (err: unknown) {
      throw new InvalidValueError(target.name, 'validator threw', { cause: err });
    }
    if (!verdict) {
      throw new InvalidValueError(target.name, 'rejected by validator');
    }
  }
  return value;
}

function checkTypes(target: ValidationTarget, candidate: unknown): unknown {
  const types = target.declaredTypes;
  if (types.length === 0) {
    return candidate;
  }
  if (types.some((t) => t.matches(candidate))) {
    return candidate;
  }
  const [only] = types;
  if (types.length > 1 || only === undefined) {
    throw new InvalidValueError(target.name, `expected one of ${typeNames(types)}`);
  }
  return coerce(target.name, only, candidate);
}

function coerce(memberName: string, type: TypeConstraint, candidate: unknown): unknown {
  if (type.coerce === undefined) {
    throw new InvalidValueError(memberName, `expected ${type.typeName}`);
  }
  let coerced: unknown;
  try {
    coerced = type.coerce(candidate);
  } catch (err: unknown) {
    // A coercer failing for any reason is a coercion failure.
    throw new InvalidValueError(memberName, `cannot coerce to ${type.typeName}`, { cause: err });
  }
  if (!type.matches(coerced)) {
    throw new InvalidValueError(memberName, `cannot coerce to ${type.typeName}`);
  }
  return coerced;
}

function typeNames(types: ReadonlyArray<TypeConstraint>): string {
  return types.map((t) => t.typeName).join(' | ');
}
