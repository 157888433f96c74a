/**
 * Classguard Core: Member Compiler
 *
 * Turns a member table of declarations into the frozen descriptors of one
 * class or interface. Runs once per definition.
 *
 * Compilation rejects (DefinitionError):
 * - a name declared twice in the same table
 * - an empty name, or a value that is not a member declaration
 * - a variable default that fails its own declared types or validator
 *
 * A default that is accepted after coercion is stored in coerced form.
 */

import { DefinitionError, InvalidValueError } from '../errors.js';
import type { MemberDescriptor } from '../types/member.js';
import { Mutability } from '../types/member.js';
import { validate } from '../validation/engine.js';
import type { MemberDeclaration } from './declarations.js';
import { isMemberDeclaration } from './declarations.js';

/** One `[name, declaration]` pair. */
export type MemberEntry = readonly [string, MemberDeclaration];

/**
 * Members of a definition body.
 *
 * The record form is the common case. The entry-list form exists because
 * an object literal cannot hold a duplicate key: only entries can express
 * (and so be rejected for) a name declared twice.
 */
export type MemberTable = Readonly<Record<string, MemberDeclaration>> | ReadonlyArray<MemberEntry>;

function isEntryList(table: MemberTable): table is ReadonlyArray<MemberEntry> {
  return Array.isArray(table);
}

function entriesOf(table: MemberTable): ReadonlyArray<readonly [string, unknown]> {
  return isEntryList(table) ? table : Object.entries(table);
}

/**
 * Compile a member table for the class or interface `ownerId`.
 *
 * @param ownerName - Used in error messages
 * @returns Descriptors in declaration order
 * @throws {DefinitionError} On a duplicate, malformed or invalid declaration
 */
export function compileMembers(
  ownerId: string,
  ownerName: string,
  table: MemberTable | undefined,
): ReadonlyMap<string, MemberDescriptor> {
  const compiled = new Map<string, MemberDescriptor>();
  if (table === undefined) {
    return compiled;
  }

  for (const [name, declaration] of entriesOf(table)) {
    if (typeof name !== 'string' || name.length === 0) {
      throw new DefinitionError(`Malformed member table of '${ownerName}': member names must be non-empty strings.`);
    }
    if (!isMemberDeclaration(declaration)) {
      throw new DefinitionError(
        `Malformed member '${ownerName}.${name}': expected a member declaration (member.variable, member.method, ...).`,
      );
    }
    if (compiled.has(name)) {
      throw new DefinitionError(`Duplicate member '${name}' in '${ownerName}'.`);
    }
    compiled.set(name, compileOne(ownerId, ownerName, name, declaration));
  }
  return compiled;
}

function compileOne(
  ownerId: string,
  ownerName: string,
  name: string,
  declaration: MemberDeclaration,
): MemberDescriptor {
  const spec = declaration.spec;
  let defaultValue = spec.defaultValue;

  if (spec.mutability === Mutability.Variable && spec.hasDefault) {
    try {
      defaultValue = validate({ name, declaredTypes: spec.declaredTypes, validator: spec.validator }, spec.defaultValue);
    } catch (err: unknown) {
      if (err instanceof InvalidValueError) {
        throw new DefinitionError(`Default of '${ownerName}.${name}' is invalid: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  return Object.freeze({
    name,
    visibility: spec.visibility,
    scope: spec.scope,
    mutability: spec.mutability,
    declaredTypes: Object.freeze([...spec.declaredTypes]),
    validator: spec.validator,
    hasDefault: spec.hasDefault,
    defaultValue,
    owningClassId: ownerId,
    body: spec.body,
    arity: spec.arity,
    variadic: spec.variadic,
    isAbstract: spec.isAbstract,
    isFinal: spec.isFinal,
  });
}
