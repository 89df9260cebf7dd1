import type { DecorationNode, DocumentElement } from '../document/nodes.js';
import { MalformedDeclarationError, ParseSessionClosedError } from '../errors/errors.js';
import { isMetadataKind } from '../metadata/factory.js';
import type {
  ComponentMetadata,
  Metadata,
  MetadataKind,
  MutableMetadataByKind,
} from '../metadata/metadata.js';
import type { ActivationType, LifecycleType } from '../types/types.js';
import type { ComponentDefinitionRegistry } from './definition-registry.js';
import type { ParseSession } from './parse-session.js';

/**
 * Capabilities handed to every namespace handler call.
 */
export interface ParserContext {
  /** The element or attribute the handler was invoked for */
  readonly sourceNode: DecorationNode;

  /** The component being decorated; undefined for parse() calls */
  readonly enclosingComponent: ComponentMetadata | undefined;

  /**
   * Create a fresh mutable metadata node of the given kind.
   */
  createMetadata<K extends MetadataKind>(kind: K): MutableMetadataByKind[K];

  /**
   * A component id unique within this document.
   */
  generateId(): string;

  /**
   * Parse a nested element with the engine's own dispatch: core value
   * elements are handled by the core language, foreign ones by their handler.
   */
  parseElement(element: DocumentElement): Metadata;

  getComponentDefinitionRegistry(): ComponentDefinitionRegistry;

  getDefaultScope(): LifecycleType;

  getDefaultActivation(): ActivationType;

  /** Document name given to parseDocument(), if any */
  getSourceName(): string | undefined;

  /** True when parsing without a backing module */
  isDryParse(): boolean;
}

/**
 * ParserContext bound to one parse session and one handler call.
 *
 * @internal Created by the extension dispatcher; handlers only see the
 * interface.
 */
export class SessionParserContext implements ParserContext {
  constructor(
    private readonly session: ParseSession,
    readonly sourceNode: DecorationNode,
    readonly enclosingComponent: ComponentMetadata | undefined
  ) {}

  createMetadata<K extends MetadataKind>(kind: K): MutableMetadataByKind[K] {
    this.assertOpen();
    if (!isMetadataKind(kind)) {
      throw new MalformedDeclarationError(
        `Unknown metadata kind ${JSON.stringify(kind)}.`,
        this.session.reference(this.sourceNode)
      );
    }
    return this.session.createMetadata(kind);
  }

  generateId(): string {
    this.assertOpen();
    return this.session.ids.next();
  }

  parseElement(element: DocumentElement): Metadata {
    this.assertOpen();
    return this.session.walker.parseValueElement(element);
  }

  getComponentDefinitionRegistry(): ComponentDefinitionRegistry {
    this.assertOpen();
    return this.session.definitions;
  }

  getDefaultScope(): LifecycleType {
    return this.session.defaults.scope;
  }

  getDefaultActivation(): ActivationType {
    return this.session.defaults.activation;
  }

  getSourceName(): string | undefined {
    return this.session.sourceName;
  }

  isDryParse(): boolean {
    return this.session.isDryParse;
  }

  private assertOpen(): void {
    if (this.session.isClosed) throw new ParseSessionClosedError();
  }
}
