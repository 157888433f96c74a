/**
 * @classguard/core
 *
 * Object-model enforcement engine: member descriptors, type and validation
 * engine, access resolver and gate, class augmentation, abstract/final
 * enforcement, interfaces and conformance, decision logging.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:net or any other I/O API. Log persistence is injected through
 * configureEngine({ logSink }); concrete sinks live in
 * @classguard/runtime-host.
 */

// Types
export type {
  AccessContext,
  AccessDecision,
  AccessDecisionLog,
  AccessOperation,
  AccessRequest,
  AccessView,
  ClassDescriptor,
  DenyRule,
  InterfaceDescriptor,
  MemberDescriptor,
  MethodBody,
  RequiredMember,
  RequiredMemberKind,
  TypeConstraint,
  Validator,
} from './types/index.js';
export { DecisionOutcome, EXTERNAL_CONTEXT, Mutability, Scope, Visibility } from './types/index.js';

// Errors
export type { ClassguardErrorCode } from './errors.js';
export {
  AbstractInstantiationError,
  AbstractMemberError,
  AccessDeniedError,
  ClassguardError,
  DefinitionError,
  InvalidValueError,
  NotFoundError,
} from './errors.js';

// Declarations and descriptors
export type { DeclarationInput, DeclarationSpec, MethodOptions, VariableOptions } from './descriptors/declarations.js';
export { MemberDeclaration, member } from './descriptors/declarations.js';
export type { MemberEntry, MemberTable } from './descriptors/compiler.js';
export { compileMembers } from './descriptors/compiler.js';

// Validation
export type { ValidationTarget } from './validation/engine.js';
export { validate } from './validation/engine.js';
export type { HostConstructor } from './validation/type-tags.js';
export { Types } from './validation/type-tags.js';

// Access control
export { AccessResolver } from './access/resolver.js';
export type { Lineage } from './registry/registry.js';

// Classes
export type { AnyAugmentedClass, ClassDefinition } from './augmentation/encapsulate.js';
export { AugmentedClass, encapsulate } from './augmentation/encapsulate.js';
export { invokeSuper } from './augmentation/handles.js';
export { isAbstract, isFinal } from './enforcement/enforcer.js';

// Interfaces
export type { InterfaceDefinition } from './interfaces/interface.js';
export { InterfaceHandle, conformsTo, defineInterface, isInterface } from './interfaces/interface.js';
export type { ConformanceTarget } from './interfaces/instance-of.js';
export { instanceOf } from './interfaces/instance-of.js';

// Logging and configuration
export type { LogSink } from './logging/log-sink.js';
export { DecisionLogger } from './logging/decision-log.js';
export type { EngineConfig, EngineOptions } from './configuration/engine-config.js';
export { configureEngine, getEngineConfig, resetEngineConfig } from './configuration/engine-config.js';
