import type { ClassRef } from '../core/class-space.js';
import type { ParserContext } from '../core/parser-context.js';
import type { DecorationNode, DocumentElement } from '../document/nodes.js';
import type { Metadata, MutableComponentMetadata } from '../metadata/metadata.js';

/**
 * Processor for elements and attributes outside the core language.
 *
 * When the parser meets a node from a foreign namespace it resolves the handler
 * registered for that namespace, checks that the handler is compatible with the
 * class space of the module being parsed, and then:
 *  - calls {@link parse} for a stand-alone declaration (a child of the document
 *    root) or a custom element in a value position;
 *  - calls {@link decorate} for an element or attribute attached to a core
 *    component, passing that component.
 *
 * Recommended behaviour:
 *  - Create metadata through `context.createMetadata(kind)` and ids through
 *    `context.generateId()`.
 *  - Edit the component passed to `decorate` in place rather than returning a
 *    new one. A replacement takes over the component's graph slot and its
 *    interceptor bindings, but anything else that captured the old instance
 *    keeps seeing it.
 *  - Do not assume the environment entries (`moduleHandle` and whatever the
 *    host supplies) exist: a dry parse, without a backing module, has none.
 *
 * @example
 * ```typescript
 * class CacheHandler implements NamespaceHandler {
 *   getSchemaLocation() {
 *     return new URL('https://schemas.example.com/cache.xsd');
 *   }
 *   getManagedClasses() {
 *     return new Set([CacheRegion]);
 *   }
 *   parse(element, context) {
 *     const region = context.createMetadata('component');
 *     region.className = 'CacheRegion';
 *     return region;
 *   }
 *   decorate(node, component) {
 *     component.addDependsOn('cacheManager');
 *     return component;
 *   }
 * }
 * ```
 */
export interface NamespaceHandler {
  /**
   * Where the schema for a namespace can be retrieved.
   *
   * @returns undefined when the namespace needs no validation
   */
  getSchemaLocation(namespace: string): URL | undefined;

  /**
   * Classes that must be identical between the handler and every module it
   * serves.
   *
   * @returns undefined when no compatibility checks are to be performed
   */
  getManagedClasses(): ReadonlySet<ClassRef> | undefined;

  /**
   * Parse a stand-alone component (or an inline custom value).
   *
   * Top-level results must be component metadata.
   */
  parse(element: DocumentElement, context: ParserContext): Metadata;

  /**
   * Augment the enclosing component.
   *
   * @returns the component to use from now on: usually `component` itself
   */
  decorate(
    node: DecorationNode,
    component: MutableComponentMetadata,
    context: ParserContext
  ): MutableComponentMetadata;
}

/**
 * Runtime check for the handler capability set.
 */
export function isNamespaceHandler(x: unknown): x is NamespaceHandler {
  return (
    typeof x === 'object' &&
    x !== null &&
    'parse' in x &&
    typeof x.parse === 'function' &&
    'decorate' in x &&
    typeof x.decorate === 'function' &&
    'getSchemaLocation' in x &&
    typeof x.getSchemaLocation === 'function' &&
    'getManagedClasses' in x &&
    typeof x.getManagedClasses === 'function'
  );
}
