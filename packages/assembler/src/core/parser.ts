import { getAttribute, type DocumentElement } from '../document/nodes.js';
import { InvalidParserConfigError, ParseError } from '../errors/errors.js';
import { noopLogger } from '../logging/structured-logger.js';
import { DEFAULT_ID_PREFIX } from '../metadata/id-generator.js';
import { HandlerRegistry } from '../registry/handler-registry.js';
import type { ParseOptions, ParserConfig } from '../types/types.js';
import type { ComponentGraph } from './component-graph.js';
import { CORE_NAMESPACE, isMarkupAttribute } from './core-language.js';
import { ParseSession, type ParserSettings } from './parse-session.js';
import { nowMs } from './timing.js';

const LOGGER_NAME = 'parser';

export type ParseOutcome =
  | { readonly ok: true; readonly graph: ComponentGraph }
  | { readonly ok: false; readonly error: ParseError };

/**
 * Turns component documents into metadata graphs, dispatching every
 * non-core namespace to the handler registered for it.
 *
 * A Parser holds no per-document state; every call runs in its own session
 * against a snapshot of the registry, so one instance serves any number of
 * documents, including concurrently.
 *
 * @example
 * ```typescript
 * const registry = new HandlerRegistry();
 * registry.register('urn:weft:cache', new CacheHandler());
 *
 * const parser = new Parser({ registry });
 * const graph = parser.parseDocument(root, { module, sourceName: 'app.xml' });
 * graph.get('regionCache');
 * ```
 */
export class Parser {
  private readonly settings: ParserSettings;
  private readonly registry: HandlerRegistry;

  constructor(config: ParserConfig) {
    this.settings = validateConfig(config);
    this.registry = config.registry;
  }

  get coreNamespace(): string {
    return this.settings.coreNamespace;
  }

  /**
   * Parse one document into a sealed component graph.
   *
   * Omitting `options.module` makes this a dry parse: handler compatibility
   * is not checked and handlers find no environment entries.
   *
   * @throws ParseError subclasses; the whole document is rejected
   */
  parseDocument(root: DocumentElement, options: ParseOptions = {}): ComponentGraph {
    validateOptions(options);
    const logger = this.settings.logger;
    const session = new ParseSession(
      this.settings,
      this.registry.snapshot(),
      options,
      collectDeclaredIds(root, this.settings.coreNamespace)
    );

    const start = nowMs();
    try {
      session.walker.parseDocument(root);
      const graph = session.publish();
      logger.log({
        level: 'info',
        name: LOGGER_NAME,
        event: 'parse.completed',
        data: {
          source: options.sourceName ?? null,
          components: graph.size,
          dryParse: session.isDryParse,
          durationMs: nowMs() - start,
        },
      });
      return graph;
    } catch (error) {
      session.close();
      logger.log({
        level: 'error',
        name: LOGGER_NAME,
        event: 'parse.failed',
        data: {
          source: options.sourceName ?? null,
          code: error instanceof ParseError ? error.code : null,
          message: error instanceof Error ? error.message : String(error),
        },
      });
      throw error;
    }
  }

  /**
   * Like {@link parseDocument}, reporting parse errors as a value.
   *
   * Errors that are not parse errors (a broken configuration, a bug) still
   * throw.
   */
  tryParseDocument(root: DocumentElement, options: ParseOptions = {}): ParseOutcome {
    try {
      return { ok: true, graph: this.parseDocument(root, options) };
    } catch (error) {
      if (error instanceof ParseError) return { ok: false, error };
      throw error;
    }
  }

  /**
   * Non-core namespaces used by a document, in order of first appearance.
   */
  getNamespaces(root: DocumentElement): string[] {
    const core = this.settings.coreNamespace;
    const seen = new Set<string>();
    const visit = (element: DocumentElement): void => {
      if (element.namespace !== undefined && element.namespace !== core) {
        seen.add(element.namespace);
      }
      for (const attr of element.attributes) {
        if (attr.namespace !== undefined && attr.namespace !== core && !isMarkupAttribute(attr)) {
          seen.add(attr.namespace);
        }
      }
      for (const child of element.children) if (child.kind === 'element') visit(child);
    };
    visit(root);
    return Array.from(seen);
  }

  /**
   * Schema locations the host should validate the document against.
   *
   * @throws UnresolvedNamespaceError for a namespace without a handler
   */
  getSchemaLocations(root: DocumentElement): Map<string, URL> {
    return this.registry.getSchemaLocations(this.getNamespaces(root));
  }
}

function validateConfig(config: ParserConfig): ParserSettings {
  if (!config || typeof config !== 'object') {
    throw new InvalidParserConfigError('a configuration object is required');
  }
  if (!(config.registry instanceof HandlerRegistry)) {
    throw new InvalidParserConfigError("'registry' must be a HandlerRegistry");
  }

  const coreNamespace = config.coreNamespace ?? CORE_NAMESPACE;
  if (typeof coreNamespace !== 'string' || coreNamespace.trim() === '') {
    throw new InvalidParserConfigError("'coreNamespace' must be a non-empty namespace URI");
  }
  if (config.registry.namespaces.includes(coreNamespace)) {
    throw new InvalidParserConfigError(
      `a handler is registered for the core namespace '${coreNamespace}'`
    );
  }

  const incompatibleDecorations = config.incompatibleDecorations ?? 'error';
  if (incompatibleDecorations !== 'error' && incompatibleDecorations !== 'skip') {
    const got = JSON.stringify(incompatibleDecorations);
    throw new InvalidParserConfigError(
      `'incompatibleDecorations' must be 'error' or 'skip', got ${got}`
    );
  }

  const idPrefix = config.idPrefix ?? DEFAULT_ID_PREFIX;
  if (typeof idPrefix !== 'string' || idPrefix === '') {
    throw new InvalidParserConfigError("'idPrefix' must be a non-empty string");
  }

  const logger = config.logger ?? noopLogger;
  if (typeof logger.log !== 'function') {
    throw new InvalidParserConfigError("'logger' must implement log()");
  }

  const onHandlerInvoke = config.onHandlerInvoke;
  if (onHandlerInvoke !== undefined && typeof onHandlerInvoke !== 'function') {
    throw new InvalidParserConfigError("'onHandlerInvoke' must be a function");
  }

  return Object.freeze({
    coreNamespace,
    incompatibleDecorations,
    idPrefix,
    logger,
    onHandlerInvoke,
  });
}

function validateOptions(options: ParseOptions): void {
  const module = options.module;
  if (module !== undefined && typeof module.classSpace?.resolveClass !== 'function') {
    throw new InvalidParserConfigError("'module.classSpace' must implement resolveClass()");
  }
}

/**
 * Every `id` attribute in the document, core or foreign, read the way the
 * core walker reads it: unqualified first, then in the core namespace.
 */
function collectDeclaredIds(root: DocumentElement, coreNamespace: string): string[] {
  const ids: string[] = [];
  const visit = (element: DocumentElement): void => {
    const id = getAttribute(element, 'id') ?? getAttribute(element, 'id', coreNamespace);
    if (id !== undefined && id !== '') ids.push(id);
    for (const child of element.children) if (child.kind === 'element') visit(child);
  };
  visit(root);
  return ids;
}
