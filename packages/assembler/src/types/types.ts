import type { ClassSpace } from '../core/class-space.js';
import type { StructuredLogger } from '../logging/structured-logger.js';
import type { HandlerRegistry } from '../registry/handler-registry.js';

/**
 * Generic constructor signature used for class references and handler classes.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Result of a lookup that may legitimately find nothing.
 *
 * "Not found" is an ordinary outcome (an unregistered namespace, an environment
 * entry that a dry parse does not provide) and is never reported through
 * `undefined` or an exception.
 */
export type Lookup<T> = { readonly found: true; readonly value: T } | { readonly found: false };

export const NOT_FOUND: Lookup<never> = Object.freeze({ found: false });

export function found<T>(value: T): Lookup<T> {
  return { found: true, value };
}

/**
 * Lifecycles understood by the instantiation runtime.
 *
 * The document's `scope` attribute takes one of these values; the runtime
 * decides what each means for instance caching.
 *
 * @example
 * ```typescript
 * const service = context.createMetadata('component');
 * service.scope = Lifecycle.Transient;
 * ```
 */
export const Lifecycle = {
  /** Single instance per container (default) */
  Singleton: 'singleton',
  /** Instance per logical scope */
  Scoped: 'scoped',
  /** Fresh instance for every lookup */
  Transient: 'transient',
} as const;

export type LifecycleType = (typeof Lifecycle)[keyof typeof Lifecycle];
export type Lifecycle = LifecycleType;

export function isLifecycle(value: unknown): value is LifecycleType {
  return value === 'singleton' || value === 'scoped' || value === 'transient';
}

/**
 * When the runtime materializes a singleton component.
 */
export const Activation = {
  Eager: 'eager',
  Lazy: 'lazy',
} as const;

export type ActivationType = (typeof Activation)[keyof typeof Activation];
export type Activation = ActivationType;

export function isActivation(value: unknown): value is ActivationType {
  return value === 'eager' || value === 'lazy';
}

/**
 * Which handler entry point the dispatcher called.
 */
export type InvocationMode = 'parse' | 'decorate';

/**
 * What to do when a decorating handler is incompatible with the class space
 * of the module being parsed.
 *
 * - 'error' (default): abort the whole document with IncompatibleHandlerError.
 * - 'skip': leave the enclosing component untouched and continue.
 *
 * Stand-alone and inline declarations always abort; there is nothing to fall
 * back to when the handler that would produce the component cannot run.
 */
export type IncompatibleDecorationPolicy = 'error' | 'skip';

/**
 * Names of the environment entries the parser itself supplies to handlers.
 * Hosts add their own through {@link BackingModule.entries}.
 *
 * None of them exist during a dry parse.
 */
export const EnvironmentEntry = {
  /** The {@link BackingModule} itself */
  Module: 'moduleHandle',
} as const;

export type EnvironmentEntryName = (typeof EnvironmentEntry)[keyof typeof EnvironmentEntry];

/**
 * The deployed module a document belongs to.
 *
 * Parsing without one is a dry parse: class-space checks are skipped and
 * environment entries are absent.
 */
export interface BackingModule {
  /** Name used in diagnostics */
  readonly name: string;
  /** Classes visible to the module */
  readonly classSpace: ClassSpace;
  /**
   * Host-supplied entries, keyed by {@link EnvironmentEntry} names or any
   * other name the host agrees on with its handlers.
   */
  readonly entries?: Readonly<Record<string, unknown>>;
}

/**
 * Per-document options for {@link Parser.parseDocument}.
 */
export interface ParseOptions {
  /** Backing module; omit for a dry parse */
  module?: BackingModule;
  /** Document name used in error locations when nodes carry none */
  sourceName?: string;
}

/**
 * Parser configuration passed to the constructor.
 */
export interface ParserConfig {
  /**
   * Registry the parser resolves namespace handlers from.
   *
   * Each parse takes a snapshot of it, so later registrations only affect
   * later parses.
   */
  registry: HandlerRegistry;

  /**
   * Namespace URI of the core component language.
   *
   * @default CORE_NAMESPACE
   */
  coreNamespace?: string;

  /**
   * Policy for decorations whose handler fails the class-space check.
   *
   * @default 'error'
   */
  incompatibleDecorations?: IncompatibleDecorationPolicy;

  /**
   * Prefix of identifiers minted by `generateId()`.
   *
   * @default '.component-'
   */
  idPrefix?: string;

  /**
   * Structured logger for registration, dispatch and parse events.
   *
   * @default noopLogger
   */
  logger?: StructuredLogger;

  /**
   * Optional hook invoked after each handler call.
   *
   * Receives the namespace, the entry point used and the call duration in
   * nanoseconds. Called for failing calls too.
   */
  onHandlerInvoke?: (namespace: string, mode: InvocationMode, durationNs: number) => void;
}
