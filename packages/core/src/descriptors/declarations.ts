/**
 * Classguard Core: Member Declarations
 *
 * The declaration surface used inside class and interface bodies:
 *
 *   members: {
 *     weight:    member.private({ type: Types.number }),
 *     getWeight: member.protected(member.method(function (this: Apple) { ... })),
 *     color:     member.constant('green'),
 *     getColor:  member.abstract(0),
 *     count:     member.static({ type: Types.integer, default: 0 }),
 *   }
 *
 * A MemberDeclaration is an inert value. It becomes a MemberDescriptor only
 * when its class is compiled (see compiler.ts), which binds it to an owner.
 * Modifiers return new declarations; they never mutate their input.
 */

import { DefinitionError } from '../errors.js';
import type { MethodBody, TypeConstraint, Validator } from '../types/member.js';
import { Mutability, Scope, Visibility } from '../types/member.js';

// ---------------------------------------------------------------------------
// Declaration Record
// ---------------------------------------------------------------------------

/** Owner-free fields of a member descriptor. */
export interface DeclarationSpec {
  readonly visibility: Visibility;
  readonly scope: Scope;
  readonly mutability: Mutability;
  readonly declaredTypes: ReadonlyArray<TypeConstraint>;
  readonly validator: Validator | null;
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly body: MethodBody | null;
  readonly arity: number | null;
  readonly variadic: boolean;
  readonly isAbstract: boolean;
  readonly isFinal: boolean;
}

/**
 * An uncompiled member declaration.
 */
export class MemberDeclaration {
  readonly spec: DeclarationSpec;

  constructor(spec: DeclarationSpec) {
    this.spec = Object.freeze({ ...spec });
  }

  /** Return a copy with some fields replaced. */
  with(changes: Partial<DeclarationSpec>): MemberDeclaration {
    return new MemberDeclaration({ ...this.spec, ...changes });
  }
}

export function isMemberDeclaration(value: unknown): value is MemberDeclaration {
  return value instanceof MemberDeclaration;
}

// ---------------------------------------------------------------------------
// Builder Inputs
// ---------------------------------------------------------------------------

/**
 * Options for a variable declaration.
 *
 * `type` may name several constraints; coercion is then never attempted.
 * Presence of the `default` key (even with value undefined) declares a default.
 */
export interface VariableOptions {
  readonly type?: TypeConstraint | ReadonlyArray<TypeConstraint>;
  readonly default?: unknown;
  readonly validate?: Validator;
}

/**
 * What the visibility and scope modifiers accept: variable options, a bare
 * type constraint (shorthand for `{ type }`), or an existing declaration to
 * re-tag.
 */
export type DeclarationInput = VariableOptions | TypeConstraint | MemberDeclaration;

function isTypeConstraint(value: unknown): value is TypeConstraint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'typeName' in value &&
    'matches' in value &&
    typeof value.matches === 'function'
  );
}

function variableDeclaration(options: VariableOptions): MemberDeclaration {
  const raw = options.type;
  const declaredTypes: ReadonlyArray<TypeConstraint> =
    raw === undefined ? [] : isTypeConstraint(raw) ? [raw] : [...raw];
  for (const t of declaredTypes) {
    if (!isTypeConstraint(t)) {
      throw new DefinitionError('Malformed declaration: type entries must be type constraints.');
    }
  }
  if (options.validate !== undefined && typeof options.validate !== 'function') {
    throw new DefinitionError('Malformed declaration: validate must be a function.');
  }
  return new MemberDeclaration({
    visibility: Visibility.Public,
    scope: Scope.Instance,
    mutability: Mutability.Variable,
    declaredTypes,
    validator: options.validate ?? null,
    hasDefault: 'default' in options,
    defaultValue: options.default,
    body: null,
    arity: null,
    variadic: false,
    isAbstract: false,
    isFinal: false,
  });
}

function toDeclaration(input: DeclarationInput | undefined): MemberDeclaration {
  if (input === undefined) {
    return variableDeclaration({});
  }
  if (isMemberDeclaration(input)) {
    return input;
  }
  if (isTypeConstraint(input)) {
    return variableDeclaration({ type: input });
  }
  return variableDeclaration(input);
}

/**
 * `arity` overrides the body's declared parameter count. A `variadic`
 * method accepts any number of arguments beyond it, as a rest parameter
 * does (rest parameters are not counted by `Function.length`).
 */
export interface MethodOptions {
  readonly arity?: number;
  readonly variadic?: boolean;
}

function methodDeclaration(body: MethodBody, options: MethodOptions = {}): MemberDeclaration {
  if (typeof body !== 'function') {
    throw new DefinitionError('Malformed declaration: method body must be a function.');
  }
  const arity = options.arity ?? body.length;
  if (!Number.isInteger(arity) || arity < 0) {
    throw new DefinitionError('Malformed declaration: method arity must be a non-negative integer.');
  }
  return new MemberDeclaration({
    visibility: Visibility.Public,
    scope: Scope.Instance,
    mutability: Mutability.Method,
    declaredTypes: [],
    validator: null,
    hasDefault: false,
    defaultValue: undefined,
    body,
    arity,
    variadic: options.variadic ?? false,
    isAbstract: false,
    isFinal: false,
  });
}

function withVisibility(visibility: Visibility) {
  return (input?: DeclarationInput): MemberDeclaration => toDeclaration(input).with({ visibility });
}

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

/**
 * Member declaration builders.
 *
 * `public`, `protected` and `private` build a variable of that visibility,
 * or re-tag the visibility of a given declaration. `static` moves a
 * declaration (a variable by default) to class-level storage.
 */
export const member = {
  /** A public instance variable. */
  variable(options: VariableOptions | TypeConstraint = {}): MemberDeclaration {
    return toDeclaration(options);
  },

  public: withVisibility(Visibility.Public),
  protected: withVisibility(Visibility.Protected),
  private: withVisibility(Visibility.Private),

  static(input?: DeclarationInput): MemberDeclaration {
    return toDeclaration(input).with({ scope: Scope.Static });
  },

  /**
   * A public constant. With a value, the value is committed on the class
   * at definition time and on each instance at creation. Without one, each
   * owner accepts exactly one initializing write.
   */
  constant(...value: [] | [unknown]): MemberDeclaration {
    return new MemberDeclaration({
      visibility: Visibility.Public,
      scope: Scope.Instance,
      mutability: Mutability.Constant,
      declaredTypes: [],
      validator: null,
      hasDefault: value.length === 1,
      defaultValue: value.length === 1 ? value[0] : undefined,
      body: null,
      arity: null,
      variadic: false,
      isAbstract: false,
      isFinal: false,
    });
  },

  /** A public method. Its arity is the body's declared parameter count unless given. */
  method(body: MethodBody, options?: MethodOptions): MemberDeclaration {
    return methodDeclaration(body, options);
  },

  /**
   * An abstract method: a name and parameter count with no body.
   * Given a method declaration, keeps its visibility and arity and drops the body.
   */
  abstract(arityOrMethod: number | MemberDeclaration = 0): MemberDeclaration {
    if (isMemberDeclaration(arityOrMethod)) {
      if (arityOrMethod.spec.mutability !== Mutability.Method) {
        throw new DefinitionError('Malformed declaration: only methods can be abstract.');
      }
      return arityOrMethod.with({ body: null, isAbstract: true, isFinal: false });
    }
    if (!Number.isInteger(arityOrMethod) || arityOrMethod < 0) {
      throw new DefinitionError('Malformed declaration: abstract arity must be a non-negative integer.');
    }
    return methodDeclaration(() => undefined).with({
      body: null,
      arity: arityOrMethod,
      isAbstract: true,
    });
  },

  /** A method that subclasses may not redeclare. */
  final(method: MemberDeclaration): MemberDeclaration {
    if (method.spec.mutability !== Mutability.Method || method.spec.isAbstract) {
      throw new DefinitionError('Malformed declaration: only concrete methods can be final.');
    }
    return method.with({ isFinal: true });
  },
} as const;
