/*
 * ExtensionDispatcher
 * -------------------
 * Routes every node outside the core namespace to its handler.
 *
 * Three call sites:
 *  - parseStandalone: a foreign element among the top-level declarations; the
 *    handler must produce a component, which joins the arena.
 *  - parseInline: a foreign element in a value position; any metadata goes.
 *  - decorate: a foreign element or attribute inside a <component>; the
 *    handler edits the component or returns a replacement.
 *
 * Before a handler runs, its managed classes are checked against the
 * module's class space (once per namespace per session). A dry parse skips the
 * check. An incompatible handler is never invoked.
 */
import {
  describeNode,
  getAttribute,
  type DecorationNode,
  type DocumentElement,
} from '../document/nodes.js';
import {
  HandlerInvocationError,
  IncompatibleHandlerError,
  MalformedDeclarationError,
  ParseError,
  UnresolvedNamespaceError,
} from '../errors/errors.js';
import { isMetadataKind } from '../metadata/factory.js';
import {
  isMutableComponent,
  type Metadata,
  type MutableComponentMetadata,
} from '../metadata/metadata.js';
import type { HandlerRegistration } from '../registry/handler-registry.js';
import type { InvocationMode } from '../types/types.js';
import { checkClassSpace, type CompatibilityReport } from './class-space.js';
import type { ComponentSlot } from './component-graph.js';
import type { ParseSession } from './parse-session.js';
import { nowMs, toNs } from './timing.js';

const LOGGER_NAME = 'dispatcher';

/**
 * The component a decoration applies to. `component` is rebound when a
 * handler returns a replacement, so later decorations see the new instance.
 */
export interface DecorationTarget {
  component: MutableComponentMetadata;
  /** Arena slot of a top-level component; undefined for inline components */
  readonly slot?: ComponentSlot;
}

export class ExtensionDispatcher {
  /** Compatibility verdict per namespace */
  private readonly verdicts = new Map<string, CompatibilityReport>();

  /** Namespaces whose skipped check a dry parse already logged */
  private readonly dryNamespaces = new Set<string>();

  constructor(private readonly session: ParseSession) {}

  /**
   * Parse a top-level foreign declaration into a registered component.
   */
  parseStandalone(element: DocumentElement): MutableComponentMetadata {
    const result = this.parseWithHandler(element);
    if (!isMutableComponent(result)) {
      throw new MalformedDeclarationError(
        `The handler for '${element.namespace}' returned ${kindOf(result)}; a top-level ` +
          "declaration must produce metadata created with context.createMetadata('component').",
        this.session.reference(element)
      );
    }
    if (result.id === '') result.id = getAttribute(element, 'id') ?? this.session.ids.next();
    this.session.ids.reserve(result.id);
    this.session.arena.add(result, this.session.reference(element));
    return result;
  }

  /**
   * Parse a foreign element found where a value is expected.
   */
  parseInline(element: DocumentElement): Metadata {
    const result = this.parseWithHandler(element);
    if (!isMetadata(result)) {
      throw new MalformedDeclarationError(
        `The handler for '${element.namespace}' returned ${kindOf(result)} instead of metadata.`,
        this.session.reference(element)
      );
    }
    return result;
  }

  /**
   * Apply one decoration to the target component.
   *
   * Under the 'skip' policy an incompatible handler leaves the target as it
   * is.
   */
  decorate(node: DecorationNode, target: DecorationTarget): void {
    const registration = this.resolve(node);
    if (!this.checkCompatible(registration, node, 'decorate')) return;

    const session = this.session;
    const current = target.component;
    const context = session.createContext(node, current);
    const result: unknown = this.invoke(registration.namespace, 'decorate', node, () =>
      registration.handler.decorate(node, current, context)
    );
    if (result === current) {
      if (target.slot !== undefined) session.arena.reindex(target.slot, session.reference(node));
      session.ids.reserve(current.id);
      return;
    }
    if (!isMutableComponent(result)) {
      throw new MalformedDeclarationError(
        `The handler for '${registration.namespace}' returned ${kindOf(result)} from ` +
          'decorate(); it must return the component it was given or a replacement component.',
        session.reference(node)
      );
    }

    if (result.id === '') result.id = current.id;
    const moved = session.interceptors.carryForward(current, result);
    if (target.slot !== undefined) {
      session.arena.replace(target.slot, result, session.reference(node));
    }
    session.ids.reserve(result.id);
    target.component = result;

    session.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'component.replaced',
      data: {
        namespace: registration.namespace,
        from: current.id,
        to: result.id,
        interceptors: moved,
      },
    });
  }

  private parseWithHandler(element: DocumentElement): unknown {
    const registration = this.resolve(element);
    this.checkCompatible(registration, element, 'parse');
    const context = this.session.createContext(element, undefined);
    return this.invoke(registration.namespace, 'parse', element, () =>
      registration.handler.parse(element, context)
    );
  }

  private resolve(node: DecorationNode): HandlerRegistration {
    const namespace = node.namespace;
    if (namespace === undefined) {
      throw new MalformedDeclarationError(
        'Unqualified nodes belong to the core language.',
        this.session.reference(node)
      );
    }
    const lookup = this.session.handlers.getRegistration(namespace);
    if (!lookup.found) {
      throw new UnresolvedNamespaceError(namespace, this.session.reference(node));
    }
    return lookup.value;
  }

  /**
   * @returns false when the decoration is to be skipped
   * @throws IncompatibleHandlerError unless the 'skip' policy applies
   */
  private checkCompatible(
    registration: HandlerRegistration,
    node: DecorationNode,
    mode: InvocationMode
  ): boolean {
    const session = this.session;
    const module = session.module;
    const namespace = registration.namespace;

    if (module === undefined) {
      if (!this.dryNamespaces.has(namespace)) {
        this.dryNamespaces.add(namespace);
        session.logger.log({
          level: 'debug',
          name: LOGGER_NAME,
          event: 'compatibility.skipped',
          data: { namespace, reason: 'dry-parse' },
        });
      }
      return true;
    }

    let report = this.verdicts.get(namespace);
    if (report === undefined) {
      report = checkClassSpace(registration.managedClasses, module.classSpace);
      this.verdicts.set(namespace, report);
    }
    if (report.compatible) return true;

    if (mode === 'decorate' && session.settings.incompatibleDecorations === 'skip') {
      session.logger.log({
        level: 'warn',
        name: LOGGER_NAME,
        event: 'decoration.skipped',
        data: {
          namespace,
          node: describeNode(node),
          classSpace: module.classSpace.name,
          conflicts: report.conflicts.map((c) => c.className),
        },
      });
      return false;
    }
    throw new IncompatibleHandlerError(
      namespace,
      module.classSpace.name,
      report.conflicts,
      session.reference(node)
    );
  }

  /**
   * Call into a handler with instrumentation. Parse errors pass through as
   * they are; anything else is wrapped with the node that triggered it.
   */
  private invoke<T>(
    namespace: string,
    mode: InvocationMode,
    node: DecorationNode,
    call: () => T
  ): T {
    const session = this.session;
    session.logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'dispatch.invoke',
      data: { namespace, mode, node: describeNode(node) },
    });

    const start = nowMs();
    let result: T;
    try {
      result = call();
    } catch (error) {
      this.report(namespace, mode, start);
      if (error instanceof ParseError) throw error;
      throw new HandlerInvocationError(namespace, mode, session.reference(node), error);
    }
    this.report(namespace, mode, start);
    return result;
  }

  /**
   * Feed the instrumentation hook. A failing hook is logged and never replaces
   * the outcome of the handler call.
   */
  private report(namespace: string, mode: InvocationMode, start: number): void {
    const hook = this.session.settings.onHandlerInvoke;
    if (!hook) return;
    try {
      hook(namespace, mode, toNs(nowMs() - start));
    } catch (error) {
      this.session.logger.log({
        level: 'warn',
        name: LOGGER_NAME,
        event: 'hook.failed',
        data: {
          namespace,
          mode,
          message: error instanceof Error ? error.message : String(error),
        },
      });
    }
  }
}

function isMetadata(value: unknown): value is Metadata {
  return (
    typeof value === 'object' && value !== null && 'kind' in value && isMetadataKind(value.kind)
  );
}

function kindOf(value: unknown): string {
  if (isMetadata(value)) return `${value.kind} metadata`;
  return value === null ? 'null' : typeof value;
}
