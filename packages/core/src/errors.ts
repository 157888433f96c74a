/**
 * Classguard Core: Error Types
 *
 * Every engine failure is one of the classes below. None is retried
 * internally; the engine performs no I/O and has no transient failures.
 *
 * Definition-time errors are raised while a class or interface is being
 * compiled. Access-time errors are raised at the offending operation and
 * leave the owner's stored values unchanged.
 */

import type { AccessContext, AccessOperation, DenyRule } from './types/decision.js';

/** Stable machine-readable codes, one per error class. */
export type ClassguardErrorCode =
  | 'E_DEFINITION'
  | 'E_ACCESS_DENIED'
  | 'E_ABSTRACT_INSTANTIATION'
  | 'E_ABSTRACT_MEMBER'
  | 'E_INVALID_VALUE'
  | 'E_NOT_FOUND';

/**
 * Base class of all engine errors.
 */
export abstract class ClassguardError extends Error {
  abstract readonly code: ClassguardErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A class or interface definition was rejected: duplicate member, missing
 * interface member, subclass of a final class, override of a final method,
 * or a malformed declaration.
 */
export class DefinitionError extends ClassguardError {
  readonly code = 'E_DEFINITION';
}

/**
 * A visibility, mutability or scope rule denied an attribute operation.
 */
export class AccessDeniedError extends ClassguardError {
  readonly code = 'E_ACCESS_DENIED';

  constructor(
    readonly memberName: string,
    /** Name of the class that declared the member, or of the owner for undeclared names. */
    readonly declaringClass: string,
    readonly rule: DenyRule,
    readonly operation: AccessOperation,
    readonly context: AccessContext,
  ) {
    super(describeDenial(memberName, declaringClass, rule, operation));
  }
}

/** An abstract class was instantiated. */
export class AbstractInstantiationError extends ClassguardError {
  readonly code = 'E_ABSTRACT_INSTANTIATION';

  constructor(readonly className: string) {
    super(`Cannot instantiate abstract class '${className}'.`);
  }
}

/** A member that still resolves to an abstract descriptor was accessed. */
export class AbstractMemberError extends ClassguardError {
  readonly code = 'E_ABSTRACT_MEMBER';

  constructor(
    readonly memberName: string,
    readonly declaringClass: string,
  ) {
    super(`Cannot call abstract method '${memberName}' declared by '${declaringClass}'.`);
  }
}

/** A write failed type checking, coercion or validation. */
export class InvalidValueError extends ClassguardError {
  readonly code = 'E_INVALID_VALUE';

  constructor(
    readonly memberName: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid value for '${memberName}': ${reason}.`, options);
  }
}

/** No descriptor and no ordinary attribute exists under the name. */
export class NotFoundError extends ClassguardError {
  readonly code = 'E_NOT_FOUND';

  constructor(
    readonly memberName: string,
    readonly className: string,
  ) {
    super(`'${className}' object has no attribute '${memberName}'.`);
  }
}

function describeDenial(
  memberName: string,
  declaringClass: string,
  rule: DenyRule,
  operation: AccessOperation,
): string {
  switch (rule) {
    case 'private':
      return `Cannot ${operation} private member '${declaringClass}.${memberName}' outside '${declaringClass}'.`;
    case 'protected':
      return `Cannot ${operation} protected member '${declaringClass}.${memberName}' outside the '${declaringClass}' lineage.`;
    case 'constant':
      return operation === 'delete'
        ? `Cannot delete constant '${declaringClass}.${memberName}'.`
        : `Cannot override constant '${declaringClass}.${memberName}'.`;
    case 'method':
      return `Cannot ${operation} method '${declaringClass}.${memberName}' as data.`;
    case 'undeclared':
      return `Cannot ${operation} undeclared attribute '${memberName}' of '${declaringClass}' from outside its class.`;
    case 'scope':
      return `Instance member '${declaringClass}.${memberName}' cannot be accessed from the class scope.`;
  }
}
