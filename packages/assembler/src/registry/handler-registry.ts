/*
 * HandlerRegistry
 * ---------------
 * Maps namespace URIs to the namespace handler currently responsible for them.
 *
 * Consistency model
 *  - The binding table is an immutable Map replaced wholesale on every
 *    register/unregister (copy-on-write). A reader holds either the old table
 *    or the new one, never a half-applied registration.
 *  - Each parse session works on a HandlerSnapshot taken when it starts. A
 *    registration made while a document is being parsed (even by one of its
 *    own handlers) only affects parses that start afterwards.
 *  - Last registration wins: binding a namespace again supersedes the previous
 *    handler for later snapshots.
 */
import {
  checkClassSpace,
  type ClassRef,
  type ClassSpace,
  type CompatibilityReport,
} from '../core/class-space.js';
import { InvalidHandlerRegistrationError, UnresolvedNamespaceError } from '../errors/errors.js';
import { noopLogger, type StructuredLogger } from '../logging/structured-logger.js';
import { found, NOT_FOUND, type Lookup } from '../types/types.js';
import { isNamespaceHandler, type NamespaceHandler } from './namespace-handler.js';
import { StaticHandlerRegistry } from './static-handler-registry.js';

const LOGGER_NAME = 'handler-registry';

/**
 * One namespace bound to one handler.
 */
export interface HandlerRegistration {
  readonly namespace: string;
  readonly handler: NamespaceHandler;
  /**
   * Classes checked against a module's class space before the handler runs.
   * undefined means the handler asked for no checks.
   */
  readonly managedClasses: ReadonlySet<ClassRef> | undefined;
}

/**
 * Frozen view of the registry used by a single parse session.
 */
export class HandlerSnapshot {
  constructor(private readonly bindings: ReadonlyMap<string, HandlerRegistration>) {}

  lookup(namespace: string): Lookup<NamespaceHandler> {
    const registration = this.bindings.get(namespace);
    return registration === undefined ? NOT_FOUND : found(registration.handler);
  }

  getRegistration(namespace: string): Lookup<HandlerRegistration> {
    const registration = this.bindings.get(namespace);
    return registration === undefined ? NOT_FOUND : found(registration);
  }

  get namespaces(): string[] {
    return Array.from(this.bindings.keys());
  }
}

export class HandlerRegistry {
  private bindings: ReadonlyMap<string, HandlerRegistration> = new Map();

  constructor(private readonly logger: StructuredLogger = noopLogger) {}

  /**
   * Bind one or more namespaces to a handler.
   *
   * @param namespaces - namespace URI or URIs
   * @param handler - the handler implementation
   * @param managedClasses - classes to check against module class spaces;
   *   defaults to `handler.getManagedClasses()`
   *
   * @throws InvalidHandlerRegistrationError on an empty namespace or a value
   *   that is not a namespace handler
   */
  register(
    namespaces: string | Iterable<string>,
    handler: NamespaceHandler,
    managedClasses?: Iterable<ClassRef>
  ): void {
    if (!isNamespaceHandler(handler)) {
      throw new InvalidHandlerRegistrationError('The registered value is not a namespace handler.');
    }
    const list = typeof namespaces === 'string' ? [namespaces] : Array.from(namespaces);
    if (list.length === 0) {
      throw new InvalidHandlerRegistrationError('At least one namespace is required.');
    }
    for (let i = 0; i < list.length; i++) {
      const ns = list[i];
      if (typeof ns !== 'string' || ns.trim() === '') {
        throw new InvalidHandlerRegistrationError(
          `namespaces[${i}] must be a non-empty namespace URI, got ${JSON.stringify(ns)}`
        );
      }
    }

    const managed = freezeClasses(managedClasses ?? handler.getManagedClasses());
    const next = new Map(this.bindings);
    for (const namespace of list) {
      const previous = next.get(namespace);
      next.set(namespace, Object.freeze({ namespace, handler, managedClasses: managed }));
      if (previous !== undefined && previous.handler !== handler) {
        this.logger.log({
          level: 'info',
          name: LOGGER_NAME,
          event: 'handler.superseded',
          data: { namespace },
        });
      }
      this.logger.log({
        level: 'debug',
        name: LOGGER_NAME,
        event: 'handler.registered',
        data: { namespace, managedClasses: managed ? managed.size : null },
      });
    }
    this.bindings = next;
  }

  /**
   * Register a handler whose class is decorated with `@NamespaceHandlerFor()`.
   *
   * @throws InvalidHandlerRegistrationError if the class carries no declaration
   */
  registerDeclared(handler: NamespaceHandler): void {
    const declaration = StaticHandlerRegistry.getDeclaration(handler.constructor);
    if (declaration === undefined) {
      throw new InvalidHandlerRegistrationError(
        `Class ${handler.constructor.name} is not decorated with @NamespaceHandlerFor().`
      );
    }
    this.register(declaration.namespaces, handler, declaration.managedClasses);
  }

  /**
   * Remove the binding for a namespace (e.g. when its module is unloaded).
   *
   * @returns true if a binding was removed
   */
  unregister(namespace: string): boolean {
    if (!this.bindings.has(namespace)) return false;
    const next = new Map(this.bindings);
    next.delete(namespace);
    this.bindings = next;
    this.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'handler.unregistered',
      data: { namespace },
    });
    return true;
  }

  /**
   * Remove every binding of a handler.
   *
   * @returns the namespaces that were unbound
   */
  unregisterHandler(handler: NamespaceHandler): string[] {
    const removed: string[] = [];
    for (const [namespace, registration] of this.bindings) {
      if (registration.handler === handler) removed.push(namespace);
    }
    for (const namespace of removed) this.unregister(namespace);
    return removed;
  }

  lookup(namespace: string): Lookup<NamespaceHandler> {
    return this.snapshot().lookup(namespace);
  }

  get namespaces(): string[] {
    return Array.from(this.bindings.keys());
  }

  snapshot(): HandlerSnapshot {
    return new HandlerSnapshot(this.bindings);
  }

  /**
   * Check a handler against a class space.
   *
   * Uses the managed classes the handler was registered with, or the ones it
   * declares itself when it is not registered.
   */
  isCompatible(handler: NamespaceHandler, classSpace: ClassSpace): boolean {
    return this.checkCompatibility(handler, classSpace).compatible;
  }

  checkCompatibility(handler: NamespaceHandler, classSpace: ClassSpace): CompatibilityReport {
    for (const registration of this.bindings.values()) {
      if (registration.handler === handler) {
        return checkClassSpace(registration.managedClasses, classSpace);
      }
    }
    return checkClassSpace(freezeClasses(handler.getManagedClasses()), classSpace);
  }

  /**
   * Schema location for a namespace.
   *
   * @returns undefined when the handler needs no validation for it
   * @throws UnresolvedNamespaceError when no handler is registered
   */
  getSchemaLocation(namespace: string): URL | undefined {
    const registration = this.bindings.get(namespace);
    if (registration === undefined) {
      throw new UnresolvedNamespaceError(namespace, { description: `xmlns="${namespace}"` });
    }
    return registration.handler.getSchemaLocation(namespace);
  }

  /**
   * Schema locations for every namespace a document uses.
   *
   * Namespaces whose handler needs no validation are omitted.
   *
   * @throws UnresolvedNamespaceError for the first namespace without a handler
   */
  getSchemaLocations(namespaces: Iterable<string>): Map<string, URL> {
    const out = new Map<string, URL>();
    for (const namespace of namespaces) {
      const url = this.getSchemaLocation(namespace);
      if (url !== undefined) out.set(namespace, url);
    }
    return out;
  }
}

function freezeClasses(classes: Iterable<ClassRef> | undefined): ReadonlySet<ClassRef> | undefined {
  return classes === undefined ? undefined : new Set(classes);
}
