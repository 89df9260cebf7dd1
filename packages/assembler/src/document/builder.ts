import type {
  DocumentAttribute,
  DocumentElement,
  DocumentText,
  SourceLocation,
} from './nodes.js';

export type AttributeInit = Readonly<Record<string, string>> | readonly DocumentAttribute[];
export type ChildInit = DocumentElement | DocumentText | string;

/**
 * Build an attribute node.
 *
 * @example
 * ```typescript
 * attribute('urn:tx', 'policy', 'required');
 * ```
 */
export function attribute(
  namespace: string | undefined,
  localName: string,
  value: string,
  location?: SourceLocation
): DocumentAttribute {
  return Object.freeze({ kind: 'attribute', namespace, localName, value, location });
}

export function text(value: string): DocumentText {
  return Object.freeze({ kind: 'text', value });
}

/**
 * Build an element node.
 *
 * A record of attributes produces unqualified attributes; pass an array of
 * {@link attribute} nodes for namespaced ones. String children become text.
 *
 * @example
 * ```typescript
 * const CORE = 'http://weft.dev/schema/components/v1';
 *
 * const doc = element(CORE, 'components', {}, [
 *   element(CORE, 'component', { id: 'clock', class: 'SystemClock' }, [
 *     element(CORE, 'property', { name: 'zone', value: 'UTC' }),
 *   ]),
 * ]);
 * ```
 */
export function element(
  namespace: string | undefined,
  localName: string,
  attributes: AttributeInit = {},
  children: readonly ChildInit[] = [],
  location?: SourceLocation
): DocumentElement {
  const attrs: DocumentAttribute[] = isAttributeList(attributes)
    ? [...attributes]
    : Object.entries(attributes).map(([name, value]) => attribute(undefined, name, value));

  return Object.freeze({
    kind: 'element',
    namespace,
    localName,
    attributes: Object.freeze(attrs),
    children: Object.freeze(children.map((c) => (typeof c === 'string' ? text(c) : c))),
    location,
  });
}

function isAttributeList(value: AttributeInit): value is readonly DocumentAttribute[] {
  return Array.isArray(value);
}
