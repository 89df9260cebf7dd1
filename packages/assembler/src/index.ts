export { Parser } from './core/parser.js';
export type { ParseOutcome } from './core/parser.js';
export { CORE_NAMESPACE, CoreElement } from './core/core-language.js';

export { HandlerRegistry, HandlerSnapshot } from './registry/handler-registry.js';
export type { HandlerRegistration } from './registry/handler-registry.js';
export { isNamespaceHandler } from './registry/namespace-handler.js';
export type { NamespaceHandler } from './registry/namespace-handler.js';
export { StaticHandlerRegistry } from './registry/static-handler-registry.js';
export type { HandlerDeclaration } from './registry/static-handler-registry.js';
export { NamespaceHandlerFor } from './decorators/namespace-handler-for.js';
export type { NamespaceHandlerOptions } from './decorators/namespace-handler-for.js';

export type { ParserContext } from './core/parser-context.js';
export { ComponentDefinitionRegistry } from './core/definition-registry.js';
export { ComponentGraph } from './core/component-graph.js';
export { InterceptorRegistry } from './core/interceptor-registry.js';
export type { Interceptor } from './core/interceptor-registry.js';
export { ModuleClassSpace, checkClassSpace, classNameOf } from './core/class-space.js';
export type { ClassRef, ClassSpace, CompatibilityReport } from './core/class-space.js';

// Metadata
export { createMetadata, isMetadataKind } from './metadata/factory.js';
export { DEFAULT_ID_PREFIX, IdGenerator } from './metadata/id-generator.js';
export {
  MutableCollectionMetadata,
  MutableComponentMetadata,
  MutableNullMetadata,
  MutableRefMetadata,
  MutableValueMetadata,
  isMutableComponent,
  isMutableMetadata,
  sealMetadata,
} from './metadata/metadata.js';
export type {
  ArgumentMetadata,
  CollectionClass,
  CollectionMetadata,
  ComponentMetadata,
  Metadata,
  MetadataKind,
  MutableMetadata,
  MutableMetadataByKind,
  NullMetadata,
  RefMetadata,
  ValueMetadata,
} from './metadata/metadata.js';

// Document model
export { attribute, element, text } from './document/builder.js';
export {
  XMLNS_NAMESPACE,
  childElements,
  describeNode,
  formatLocation,
  getAttribute,
  textContent,
} from './document/nodes.js';
export type {
  DecorationNode,
  DocumentAttribute,
  DocumentElement,
  DocumentNode,
  DocumentText,
  SourceLocation,
} from './document/nodes.js';

export { Activation, EnvironmentEntry, Lifecycle, NOT_FOUND, found } from './types/types.js';
export type {
  ActivationType,
  BackingModule,
  Constructor,
  EnvironmentEntryName,
  IncompatibleDecorationPolicy,
  InvocationMode,
  LifecycleType,
  Lookup,
  ParseOptions,
  ParserConfig,
} from './types/types.js';

// Logging
export { JsonLineLogger, noopLogger } from './logging/structured-logger.js';
export type {
  LogLevel,
  StructuredLogEvent,
  StructuredLogger,
} from './logging/structured-logger.js';

// Errors
export {
  DuplicateIdentifierError,
  HandlerInvocationError,
  IncompatibleHandlerError,
  InvalidHandlerRegistrationError,
  InvalidParserConfigError,
  MalformedDeclarationError,
  ParseError,
  ParseSessionClosedError,
  SealedMetadataError,
  UnresolvedNamespaceError,
} from './errors/errors.js';
export type { ClassConflict, NodeReference, ParseErrorCode } from './errors/errors.js';
