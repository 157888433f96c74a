/**
 * Classguard Core: Member Types
 *
 * Defines the three classification axes of a class member (visibility,
 * storage scope, mutability) and the immutable MemberDescriptor record the
 * augmentation layer consults on every attribute operation.
 *
 * A descriptor is created once, when a class definition is compiled, and is
 * frozen. Its owning class never changes: a subclass that redeclares a name
 * receives a new descriptor that shadows the parent's.
 */

// ---------------------------------------------------------------------------
// Classification Axes
// ---------------------------------------------------------------------------

/**
 * Who may touch a member.
 *
 * Exactly one value per member. Undeclared visibility is Public.
 */
export enum Visibility {
  /** Any caller, including code outside every class. */
  Public = 'public',
  /** The owning class and its ancestors and descendants. */
  Protected = 'protected',
  /** The owning class only. Subclasses are denied. */
  Private = 'private',
}

/**
 * Where a member's value lives.
 */
export enum Scope {
  /** One value per instance. */
  Instance = 'instance',
  /** One value shared by the owning class and all instances of its lineage. */
  Static = 'static',
}

/**
 * How a member's value may change.
 */
export enum Mutability {
  /** Freely reassignable, subject to type and validator checks. */
  Variable = 'variable',
  /** Committed exactly once per owner (class or instance). */
  Constant = 'constant',
  /** Executable; never settable or deletable as data. */
  Method = 'method',
}

// ---------------------------------------------------------------------------
// Type Constraints and Validators
// ---------------------------------------------------------------------------

/**
 * A runtime type that a variable may declare.
 *
 * Implemented by the built-in tags in `Types`, by augmented classes
 * (lineage membership) and by interfaces (structural conformance).
 * `coerce` is optional: constraints without it are never coerced to.
 * A coercer signals failure by throwing.
 */
export interface TypeConstraint {
  readonly typeName: string;
  matches(value: unknown): boolean;
  coerce?(value: unknown): unknown;
}

/** A predicate applied after the type check. A falsy result rejects the value. */
export type Validator = (value: unknown) => unknown;

/**
 * The stored form of a method body.
 *
 * `never` parameters make every function assignable here; bodies are only
 * ever invoked through Reflect.apply on their owner's handle.
 */
export type MethodBody = (this: never, ...args: never[]) => unknown;

// ---------------------------------------------------------------------------
// Member Descriptor
// ---------------------------------------------------------------------------

/**
 * Compiled metadata for one class member.
 *
 * Invariants:
 * - `declaredTypes` and `validator` are both applied when both are present,
 *   type check first.
 * - `owningClassId` is fixed at creation.
 * - `body` is null for data members and for abstract methods.
 * - `arity` is null for data members.
 */
export interface MemberDescriptor {
  readonly name: string;
  readonly visibility: Visibility;
  readonly scope: Scope;
  readonly mutability: Mutability;
  readonly declaredTypes: ReadonlyArray<TypeConstraint>;
  readonly validator: Validator | null;
  /** Whether a default (variables) or declared value (constants) was given. */
  readonly hasDefault: boolean;
  readonly defaultValue: unknown;
  readonly owningClassId: string;
  readonly body: MethodBody | null;
  readonly arity: number | null;
  /** Accepts any number of arguments beyond `arity`. */
  readonly variadic: boolean;
  readonly isAbstract: boolean;
  /** Final methods cannot be redeclared by a subclass. */
  readonly isFinal: boolean;
}
