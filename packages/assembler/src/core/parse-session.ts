/*
 * ParseSession
 * ------------
 * Everything that lives exactly as long as one parseDocument() call:
 *  - the handler snapshot taken when the parse started
 *  - the component arena and the id generator
 *  - the interceptor bindings
 *  - the document defaults read from the root element
 *
 * Nothing here is shared between documents, so concurrent parses on one
 * Parser never observe each other's components or ids.
 */
import type { DecorationNode, DocumentNode } from '../document/nodes.js';
import { referenceOf, type NodeReference } from '../errors/errors.js';
import { createMetadata } from '../metadata/factory.js';
import { IdGenerator } from '../metadata/id-generator.js';
import type {
  ComponentMetadata,
  MetadataKind,
  MutableMetadataByKind,
} from '../metadata/metadata.js';
import type { StructuredLogger } from '../logging/structured-logger.js';
import type { HandlerSnapshot } from '../registry/handler-registry.js';
import {
  Activation,
  EnvironmentEntry,
  Lifecycle,
  type ActivationType,
  type BackingModule,
  type IncompatibleDecorationPolicy,
  type LifecycleType,
  type ParseOptions,
  type ParserConfig,
} from '../types/types.js';
import { ComponentArena, type ComponentGraph } from './component-graph.js';
import { CoreElementParser } from './core-element-parser.js';
import { ComponentDefinitionRegistry } from './definition-registry.js';
import { ExtensionDispatcher } from './extension-dispatcher.js';
import { InterceptorRegistry } from './interceptor-registry.js';
import { SessionParserContext, type ParserContext } from './parser-context.js';

/**
 * Validated, frozen parser configuration.
 */
export interface ParserSettings {
  readonly coreNamespace: string;
  readonly incompatibleDecorations: IncompatibleDecorationPolicy;
  readonly idPrefix: string;
  readonly logger: StructuredLogger;
  readonly onHandlerInvoke: ParserConfig['onHandlerInvoke'];
}

export interface DocumentDefaults {
  scope: LifecycleType;
  activation: ActivationType;
}

export class ParseSession {
  readonly module: BackingModule | undefined;
  readonly sourceName: string | undefined;
  readonly arena: ComponentArena;
  readonly ids: IdGenerator;
  readonly interceptors = new InterceptorRegistry();
  readonly definitions: ComponentDefinitionRegistry;
  readonly dispatcher: ExtensionDispatcher;
  readonly walker: CoreElementParser;
  readonly defaults: DocumentDefaults = {
    scope: Lifecycle.Singleton,
    activation: Activation.Eager,
  };

  private closed = false;

  /**
   * @param declaredIds - every id the document declares, reserved so that
   *   generated ids never collide with a later declaration
   */
  constructor(
    readonly settings: ParserSettings,
    readonly handlers: HandlerSnapshot,
    options: ParseOptions,
    declaredIds: Iterable<string>
  ) {
    this.module = options.module;
    this.sourceName = options.sourceName;

    const environment = environmentOf(this.module);
    const reserved = new Set(environment.keys());
    this.arena = new ComponentArena(reserved);
    this.ids = new IdGenerator(settings.idPrefix, [...reserved, ...declaredIds]);
    this.definitions = new ComponentDefinitionRegistry(this.arena, this.interceptors, environment);
    this.dispatcher = new ExtensionDispatcher(this);
    this.walker = new CoreElementParser(this);
  }

  get isDryParse(): boolean {
    return this.module === undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get logger(): StructuredLogger {
    return this.settings.logger;
  }

  isCore(node: { readonly namespace?: string }): boolean {
    return node.namespace === undefined || node.namespace === this.settings.coreNamespace;
  }

  createMetadata<K extends MetadataKind>(kind: K): MutableMetadataByKind[K] {
    return createMetadata(kind);
  }

  createContext(node: DecorationNode, enclosing: ComponentMetadata | undefined): ParserContext {
    return new SessionParserContext(this, node, enclosing);
  }

  reference(node: DocumentNode): NodeReference {
    return referenceOf(node, this.sourceName);
  }

  /**
   * Seal the arena into the finished graph and close the session.
   */
  publish(): ComponentGraph {
    try {
      return this.arena.publish(this.interceptors.snapshot());
    } finally {
      this.close();
    }
  }

  close(): void {
    this.closed = true;
  }
}

function environmentOf(module: BackingModule | undefined): ReadonlyMap<string, unknown> {
  const environment = new Map<string, unknown>();
  if (module === undefined) return environment;
  for (const [name, value] of Object.entries(module.entries ?? {})) environment.set(name, value);
  environment.set(EnvironmentEntry.Module, module);
  return environment;
}
