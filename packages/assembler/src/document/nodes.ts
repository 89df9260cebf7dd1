/*
 * Document model
 * --------------
 * The shape of the tree produced by the markup tokenizer / DOM builder, which
 * lives outside this package. The assembler only reads these nodes; it never
 * edits the document.
 *
 * Names are namespace-qualified: `namespace` is the resolved URI (prefixes are
 * the builder's business) and `localName` the unprefixed name. Attributes with
 * no namespace belong to the element that carries them.
 */

/** Namespace URI of `xmlns` / `xmlns:prefix` declarations, which are not content. */
export const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

export interface SourceLocation {
  readonly source?: string;
  readonly line: number;
  readonly column: number;
}

export interface DocumentAttribute {
  readonly kind: 'attribute';
  readonly namespace?: string;
  readonly localName: string;
  readonly value: string;
  readonly location?: SourceLocation;
}

export interface DocumentText {
  readonly kind: 'text';
  readonly value: string;
  readonly location?: SourceLocation;
}

export interface DocumentElement {
  readonly kind: 'element';
  readonly namespace?: string;
  readonly localName: string;
  readonly attributes: readonly DocumentAttribute[];
  readonly children: readonly (DocumentElement | DocumentText)[];
  readonly location?: SourceLocation;
}

/**
 * Anything a namespace handler can be asked to decorate with: a nested element
 * or an attribute on the enclosing component's element.
 */
export type DecorationNode = DocumentElement | DocumentAttribute;

export type DocumentNode = DocumentElement | DocumentAttribute | DocumentText;

/**
 * Read an unqualified attribute (or one in the given namespace).
 */
export function getAttribute(
  element: DocumentElement,
  localName: string,
  namespace?: string
): string | undefined {
  for (const attr of element.attributes) {
    if (attr.localName === localName && attr.namespace === namespace) return attr.value;
  }
  return undefined;
}

export function childElements(element: DocumentElement): DocumentElement[] {
  const out: DocumentElement[] = [];
  for (const child of element.children) if (child.kind === 'element') out.push(child);
  return out;
}

/**
 * Concatenated text of the element's direct text children.
 */
export function textContent(element: DocumentElement): string {
  let text = '';
  for (const child of element.children) if (child.kind === 'text') text += child.value;
  return text;
}

/**
 * Short, stable description of a node for error messages and logs,
 * e.g. `<{urn:cache}region>` or `@{urn:tx}policy`.
 */
export function describeNode(node: DocumentNode): string {
  if (node.kind === 'text') return '#text';
  const name = node.namespace ? `{${node.namespace}}${node.localName}` : node.localName;
  return node.kind === 'element' ? `<${name}>` : `@${name}`;
}

export function formatLocation(location: SourceLocation | undefined): string | undefined {
  if (!location) return undefined;
  const prefix = location.source ? `${location.source}:` : '';
  return `${prefix}${location.line}:${location.column}`;
}
