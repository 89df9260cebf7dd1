/*
 * Core component language
 * -----------------------
 * The vocabulary the assembler understands without any namespace handler:
 *
 *   <components default-scope? default-activation?>
 *     <component id? class? scope? activation? depends-on? init-method?
 *                destroy-method? factory-method? factory-ref?>
 *       <argument index? type? value? ref?> value-element? </argument>
 *       <property name value? ref?> value-element? </property>
 *     </component>
 *   </components>
 *
 * Value elements: <value type?>text</value>, <ref component-id/>, <null/>,
 * <list|set|array value-type?>value-element*</…>, and an inline <component>.
 *
 * Elements with no namespace are core. Everything in another namespace is
 * dispatched to its handler.
 */
import { XMLNS_NAMESPACE, type DocumentAttribute } from '../document/nodes.js';

export const CORE_NAMESPACE = 'http://weft.dev/schema/components/v1';

export const CoreElement = {
  Components: 'components',
  Component: 'component',
  Argument: 'argument',
  Property: 'property',
  Value: 'value',
  Ref: 'ref',
  Null: 'null',
  List: 'list',
  Set: 'set',
  Array: 'array',
} as const;

export const ROOT_ATTRIBUTES: ReadonlySet<string> = new Set([
  'default-scope',
  'default-activation',
]);

export const COMPONENT_ATTRIBUTES: ReadonlySet<string> = new Set([
  'id',
  'class',
  'scope',
  'activation',
  'depends-on',
  'init-method',
  'destroy-method',
  'factory-method',
  'factory-ref',
]);

export const ARGUMENT_ATTRIBUTES: ReadonlySet<string> = new Set(['index', 'type', 'value', 'ref']);
export const PROPERTY_ATTRIBUTES: ReadonlySet<string> = new Set(['name', 'value', 'ref']);
export const VALUE_ATTRIBUTES: ReadonlySet<string> = new Set(['type']);
export const REF_ATTRIBUTES: ReadonlySet<string> = new Set(['component-id']);
export const COLLECTION_ATTRIBUTES: ReadonlySet<string> = new Set(['value-type']);
export const NO_ATTRIBUTES: ReadonlySet<string> = new Set();

/** Namespaces of attributes that belong to the markup, not to the document's content */
const MARKUP_NAMESPACES: ReadonlySet<string> = new Set([
  XMLNS_NAMESPACE,
  'http://www.w3.org/XML/1998/namespace',
  'http://www.w3.org/2001/XMLSchema-instance',
]);

/**
 * Namespace declarations, xml:* and xsi:* attributes.
 */
export function isMarkupAttribute(attr: DocumentAttribute): boolean {
  if (attr.namespace === undefined) {
    return attr.localName === 'xmlns' || attr.localName.startsWith('xmlns:');
  }
  return MARKUP_NAMESPACES.has(attr.namespace);
}

/** Split a depends-on list: ids separated by commas and/or whitespace */
export function splitIdList(value: string): string[] {
  return value.split(/[\s,]+/).filter((id) => id !== '');
}
