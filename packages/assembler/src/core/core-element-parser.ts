import {
  childElements,
  describeNode,
  getAttribute,
  textContent,
  type DocumentElement,
  type DocumentText,
} from '../document/nodes.js';
import { MalformedDeclarationError } from '../errors/errors.js';
import type {
  CollectionClass,
  Metadata,
  MutableCollectionMetadata,
  MutableComponentMetadata,
} from '../metadata/metadata.js';
import { isActivation, isLifecycle } from '../types/types.js';
import {
  ARGUMENT_ATTRIBUTES,
  COLLECTION_ATTRIBUTES,
  COMPONENT_ATTRIBUTES,
  CoreElement,
  isMarkupAttribute,
  NO_ATTRIBUTES,
  PROPERTY_ATTRIBUTES,
  REF_ATTRIBUTES,
  ROOT_ATTRIBUTES,
  splitIdList,
  VALUE_ATTRIBUTES,
} from './core-language.js';
import type { DecorationTarget } from './extension-dispatcher.js';
import type { ParseSession } from './parse-session.js';

/**
 * Walks the core component language and hands every foreign node to the
 * dispatcher at the point where it appears.
 */
export class CoreElementParser {
  constructor(private readonly session: ParseSession) {}

  /**
   * Parse the `<components>` root and every top-level declaration in
   * document order.
   */
  parseDocument(root: DocumentElement): void {
    const session = this.session;
    if (!session.isCore(root) || root.localName !== CoreElement.Components) {
      const expected = `<${CoreElement.Components}> in '${session.settings.coreNamespace}'`;
      throw this.malformed(root, `The document root must be ${expected}.`);
    }
    this.checkAttributes(root, ROOT_ATTRIBUTES);

    const scope = this.attr(root, 'default-scope');
    if (scope !== undefined) {
      if (!isLifecycle(scope)) throw this.malformed(root, `Unknown default-scope '${scope}'.`);
      session.defaults.scope = scope;
    }
    const activation = this.attr(root, 'default-activation');
    if (activation !== undefined) {
      if (!isActivation(activation)) {
        throw this.malformed(root, `Unknown default-activation '${activation}'.`);
      }
      session.defaults.activation = activation;
    }

    for (const child of root.children) {
      if (child.kind === 'text') {
        this.assertBlank(child);
      } else if (!session.isCore(child)) {
        session.dispatcher.parseStandalone(child);
      } else if (child.localName === CoreElement.Component) {
        this.parseComponent(child, true);
      } else {
        throw this.malformed(child, `<${child.localName}> cannot be declared at the top level.`);
      }
    }
  }

  /**
   * Parse a value element: a core value or a foreign element, which the
   * dispatcher parses inline.
   */
  parseValueElement(element: DocumentElement): Metadata {
    const session = this.session;
    if (!session.isCore(element)) return session.dispatcher.parseInline(element);

    switch (element.localName) {
      case CoreElement.Value: {
        this.checkAttributes(element, VALUE_ATTRIBUTES);
        const nested = childElements(element)[0];
        if (nested !== undefined) throw this.malformed(nested, '<value> holds text only.');
        const value = session.createMetadata('value');
        value.value = textContent(element);
        value.type = this.attr(element, 'type');
        return value;
      }
      case CoreElement.Ref: {
        this.checkAttributes(element, REF_ATTRIBUTES);
        this.assertEmpty(element);
        const ref = session.createMetadata('ref');
        ref.componentId = this.required(element, 'component-id');
        return ref;
      }
      case CoreElement.Null: {
        this.checkAttributes(element, NO_ATTRIBUTES);
        this.assertEmpty(element);
        return session.createMetadata('null');
      }
      case CoreElement.List:
        return this.parseCollection(element, session.createMetadata('collection'), 'list');
      case CoreElement.Set:
        return this.parseCollection(element, session.createMetadata('collection'), 'set');
      case CoreElement.Array:
        return this.parseCollection(element, session.createMetadata('collection'), 'array');
      case CoreElement.Component:
        return this.parseComponent(element, false);
      default:
        throw this.malformed(element, `<${element.localName}> is not a value element.`);
    }
  }

  /**
   * Parse a `<component>` element, top-level or inline.
   *
   * A top-level component joins the arena before its decorations run, so
   * decorating handlers already find it in the definition registry.
   *
   * @returns the final instance, which differs from the one created here when
   *   a decorating handler replaced it
   */
  private parseComponent(element: DocumentElement, topLevel: boolean): MutableComponentMetadata {
    const session = this.session;
    this.checkAttributes(element, COMPONENT_ATTRIBUTES, true);

    const component = session.createMetadata('component');
    const id = this.attr(element, 'id');
    if (id === '') throw this.malformed(element, 'A component id cannot be empty.');
    component.id = id ?? session.ids.next();
    component.className = this.attr(element, 'class');

    const scope = this.attr(element, 'scope') ?? session.defaults.scope;
    if (!isLifecycle(scope)) throw this.malformed(element, `Unknown scope '${scope}'.`);
    component.scope = scope;

    const activation = this.attr(element, 'activation') ?? session.defaults.activation;
    if (!isActivation(activation)) {
      throw this.malformed(element, `Unknown activation '${activation}'.`);
    }
    component.activation = activation;

    const dependsOn = this.attr(element, 'depends-on');
    if (dependsOn !== undefined) {
      for (const dependency of splitIdList(dependsOn)) component.addDependsOn(dependency);
    }
    component.initMethod = this.attr(element, 'init-method');
    component.destroyMethod = this.attr(element, 'destroy-method');
    component.factoryMethod = this.attr(element, 'factory-method');
    const factoryRef = this.attr(element, 'factory-ref');
    if (factoryRef !== undefined) {
      const ref = session.createMetadata('ref');
      ref.componentId = factoryRef;
      component.factoryComponent = ref;
    }

    const target: DecorationTarget = {
      component,
      slot: topLevel ? session.arena.add(component, session.reference(element)) : undefined,
    };

    for (const attr of element.attributes) {
      if (!isMarkupAttribute(attr) && !session.isCore(attr)) {
        session.dispatcher.decorate(attr, target);
      }
    }

    const properties = new Set<string>();
    let indexed = 0;
    let positional = 0;
    for (const child of element.children) {
      if (child.kind === 'text') {
        this.assertBlank(child);
      } else if (!session.isCore(child)) {
        session.dispatcher.decorate(child, target);
      } else if (child.localName === CoreElement.Argument) {
        if (this.parseArgument(child, target.component)) indexed++;
        else positional++;
        if (indexed > 0 && positional > 0) {
          throw this.malformed(
            child,
            'Either every argument of a component declares an index or none does.'
          );
        }
      } else if (child.localName === CoreElement.Property) {
        const name = this.parseProperty(child, target.component);
        if (properties.has(name)) {
          throw this.malformed(child, `Property '${name}' is set more than once.`);
        }
        properties.add(name);
      } else {
        throw this.malformed(child, `<${child.localName}> is not allowed inside <component>.`);
      }
    }

    return target.component;
  }

  /**
   * @returns whether the argument declared an index
   */
  private parseArgument(element: DocumentElement, component: MutableComponentMetadata): boolean {
    this.checkAttributes(element, ARGUMENT_ATTRIBUTES);
    const indexText = this.attr(element, 'index');
    let index: number | undefined;
    if (indexText !== undefined) {
      if (!/^\d+$/.test(indexText)) {
        throw this.malformed(
          element,
          `Argument index must be a non-negative integer, got '${indexText}'.`
        );
      }
      index = Number(indexText);
    }
    const value = this.parseInjectedValue(element);
    if (!component.addArgument({ index, type: this.attr(element, 'type'), value })) {
      throw this.malformed(element, `Argument index ${index} is used more than once.`);
    }
    return index !== undefined;
  }

  /**
   * @returns the property name
   */
  private parseProperty(element: DocumentElement, component: MutableComponentMetadata): string {
    this.checkAttributes(element, PROPERTY_ATTRIBUTES);
    const name = this.required(element, 'name');
    component.setProperty(name, this.parseInjectedValue(element));
    return name;
  }

  /**
   * Value of an <argument> or <property>: exactly one of the `value`
   * attribute, the `ref` attribute, or a single nested value element.
   */
  private parseInjectedValue(element: DocumentElement): Metadata {
    const session = this.session;
    const value = this.attr(element, 'value');
    const ref = this.attr(element, 'ref');
    const nested = childElements(element);
    for (const child of element.children) if (child.kind === 'text') this.assertBlank(child);

    const sources = (value !== undefined ? 1 : 0) + (ref !== undefined ? 1 : 0) + nested.length;
    if (sources !== 1) {
      throw this.malformed(
        element,
        `<${element.localName}> needs exactly one of a 'value' attribute, a 'ref' attribute ` +
          'or a nested value element.'
      );
    }
    if (value !== undefined) {
      const metadata = session.createMetadata('value');
      metadata.value = value;
      return metadata;
    }
    if (ref !== undefined) {
      const metadata = session.createMetadata('ref');
      metadata.componentId = ref;
      return metadata;
    }
    const [child] = nested;
    if (child === undefined) throw this.malformed(element, 'Missing value.');
    return this.parseValueElement(child);
  }

  private parseCollection(
    element: DocumentElement,
    collection: MutableCollectionMetadata,
    collectionClass: CollectionClass
  ): MutableCollectionMetadata {
    this.checkAttributes(element, COLLECTION_ATTRIBUTES);
    collection.collectionClass = collectionClass;
    collection.valueType = this.attr(element, 'value-type');
    for (const child of element.children) {
      if (child.kind === 'text') this.assertBlank(child);
      else collection.addValue(this.parseValueElement(child));
    }
    return collection;
  }

  /**
   * Reject unknown core attributes, and foreign ones unless the element is a
   * component (where they are decorations).
   */
  private checkAttributes(
    element: DocumentElement,
    allowed: ReadonlySet<string>,
    decorations = false
  ): void {
    for (const attr of element.attributes) {
      if (isMarkupAttribute(attr)) continue;
      if (this.session.isCore(attr)) {
        if (!allowed.has(attr.localName)) {
          throw this.malformed(
            element,
            `Unknown attribute '${attr.localName}' on <${element.localName}>.`
          );
        }
      } else if (!decorations) {
        throw this.malformed(
          element,
          `Attribute ${describeNode(attr)} cannot decorate <${element.localName}>; ` +
            'decoration attributes are only allowed on <component>.'
        );
      }
    }
  }

  private attr(element: DocumentElement, name: string): string | undefined {
    const core = this.session.settings.coreNamespace;
    return getAttribute(element, name) ?? getAttribute(element, name, core);
  }

  private required(element: DocumentElement, name: string): string {
    const value = this.attr(element, name);
    if (value === undefined || value === '') {
      throw this.malformed(element, `<${element.localName}> requires a '${name}' attribute.`);
    }
    return value;
  }

  private assertEmpty(element: DocumentElement): void {
    for (const child of element.children) {
      if (child.kind === 'element') {
        throw this.malformed(child, `<${element.localName}> cannot have content.`);
      }
      this.assertBlank(child);
    }
  }

  private assertBlank(text: DocumentText): void {
    if (text.value.trim() !== '') throw this.malformed(text, 'Unexpected text content.');
  }

  private malformed(
    node: DocumentElement | DocumentText,
    reason: string
  ): MalformedDeclarationError {
    return new MalformedDeclarationError(reason, this.session.reference(node));
  }
}
