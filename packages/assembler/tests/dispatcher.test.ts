import { describe, expect, it, vi } from 'vitest';

import { ModuleClassSpace } from '../src/core/class-space.js';
import { CORE_NAMESPACE } from '../src/core/core-language.js';
import type { Interceptor } from '../src/core/interceptor-registry.js';
import type { ParserContext } from '../src/core/parser-context.js';
import { Parser } from '../src/core/parser.js';
import { attribute, element } from '../src/document/builder.js';
import {
  childElements,
  describeNode,
  type DecorationNode,
  type DocumentAttribute,
  type DocumentElement,
} from '../src/document/nodes.js';
import {
  DuplicateIdentifierError,
  HandlerInvocationError,
  IncompatibleHandlerError,
  MalformedDeclarationError,
  ParseSessionClosedError,
  referenceOf,
  UnresolvedNamespaceError,
} from '../src/errors/errors.js';
import type { StructuredLogEvent } from '../src/logging/structured-logger.js';
import type { MutableComponentMetadata } from '../src/metadata/metadata.js';
import { HandlerRegistry } from '../src/registry/handler-registry.js';
import type { NamespaceHandler } from '../src/registry/namespace-handler.js';
import { EnvironmentEntry, type BackingModule, type ParserConfig } from '../src/types/types.js';

const EXT = 'urn:test:ext';
const ATTR = 'urn:test:attr';

class Region {}

const ForeignRegion = (() => {
  class Region {}
  return Region;
})();

type Child = DocumentElement | string;

const core = (
  name: string,
  attrs: Readonly<Record<string, string>> | DocumentAttribute[] = {},
  children: Child[] = []
) => element(CORE_NAMESPACE, name, attrs, children);

const doc = (...children: Child[]) => core('components', {}, children);

const handler = (overrides: Partial<NamespaceHandler> = {}): NamespaceHandler => ({
  getSchemaLocation: () => undefined,
  getManagedClasses: () => undefined,
  parse: (_element, context) => context.createMetadata('component'),
  decorate: (_node, component) => component,
  ...overrides,
});

const module = (entries?: Record<string, unknown>): BackingModule => ({
  name: 'app',
  classSpace: new ModuleClassSpace('app', [Region]),
  entries,
});

const setup = (handlers: Record<string, NamespaceHandler>, config: Partial<ParserConfig> = {}) => {
  const events: StructuredLogEvent[] = [];
  const registry = new HandlerRegistry();
  for (const [namespace, h] of Object.entries(handlers)) registry.register(namespace, h);
  const parser = new Parser({
    registry,
    logger: { log: (event) => events.push(event) },
    ...config,
  });
  return { parser, registry, events };
};

/** Decorator that turns an attribute into a property of the same name */
const attributeAsProperty = (
  node: DecorationNode,
  component: MutableComponentMetadata,
  context: ParserContext
) => {
  if (node.kind === 'attribute') {
    const value = context.createMetadata('value');
    value.value = node.value;
    component.setProperty(node.localName, value);
  }
  return component;
};

describe('decoration', () => {
  it('decorates a component in place from a custom attribute', () => {
    const decorate = vi.fn<NamespaceHandler['decorate']>(attributeAsProperty);
    const { parser } = setup({ [ATTR]: handler({ decorate }) });

    const graph = parser.parseDocument(
      doc(core('component', [attribute(undefined, 'id', 'svc'), attribute(ATTR, 'foo', 'bar')]))
    );

    expect(decorate).toHaveBeenCalledTimes(1);
    expect(graph.size).toBe(1);
    expect(graph.ids()).toEqual(['svc']);
    expect(graph.get('svc')?.getProperty('foo')).toMatchObject({ kind: 'value', value: 'bar' });
  });

  it('decorates from custom child elements in document order', () => {
    const seen: string[] = [];
    const { parser } = setup({
      [EXT]: handler({
        decorate: (node, component) => {
          seen.push(`${describeNode(node)}:${component.properties.size}`);
          return component;
        },
      }),
    });

    parser.parseDocument(
      doc(
        core('component', { id: 'svc' }, [
          element(EXT, 'first'),
          core('property', { name: 'x', value: '1' }),
          element(EXT, 'second'),
        ])
      )
    );

    expect(seen).toEqual([`<{${EXT}}first>:0`, `<{${EXT}}second>:1`]);
  });

  it('passes the decorated node, component and registry to the handler', () => {
    let observed:
      | { source: DecorationNode; enclosing: unknown; names: string[]; hasLater: boolean }
      | undefined;
    let received: MutableComponentMetadata | undefined;
    const { parser } = setup({
      [ATTR]: handler({
        decorate: (node, component, context) => {
          const registry = context.getComponentDefinitionRegistry();
          observed = {
            source: context.sourceNode,
            enclosing: context.enclosingComponent,
            names: registry.getComponentDefinitionNames(),
            hasLater: registry.containsComponentDefinition('later'),
          };
          expect(node).toBe(context.sourceNode);
          expect(registry.getComponentDefinition('first')).toMatchObject({
            found: true,
            value: { id: 'first' },
          });
          received = component;
          return component;
        },
      }),
    });
    const marker = attribute(ATTR, 'mark', 'on');

    const graph = parser.parseDocument(
      doc(
        core('component', { id: 'first' }),
        core('component', [attribute(undefined, 'id', 'second'), marker]),
        core('component', { id: 'later' })
      )
    );

    expect(observed).toEqual({
      source: marker,
      enclosing: graph.get('second'),
      names: ['first', 'second'],
      hasLater: false,
    });
    expect(received).toBe(graph.get('second'));
  });

  it('decorates inline components', () => {
    const { parser } = setup({ [ATTR]: handler({ decorate: attributeAsProperty }) });

    const graph = parser.parseDocument(
      doc(
        core('component', { id: 'outer' }, [
          core('property', { name: 'inner' }, [
            core('component', [attribute(ATTR, 'colour', 'blue')]),
          ]),
        ])
      )
    );

    const inner = graph.get('outer')?.getProperty('inner');
    expect(inner).toMatchObject({ kind: 'component', id: '.component-1' });
    expect(graph.size).toBe(1);
  });

  it('rejects decoration attributes on the document root', () => {
    const decorate = vi.fn<NamespaceHandler['decorate']>((_node, component) => component);
    const { parser } = setup({ [ATTR]: handler({ decorate }) });
    const root = core('components', [attribute(ATTR, 'foo', 'bar')]);

    expect(() => parser.parseDocument(root)).toThrow(MalformedDeclarationError);
    expect(() => parser.parseDocument(root)).toThrow(
      'decoration attributes are only allowed on <component>'
    );
    expect(decorate).not.toHaveBeenCalled();
  });

  it('rejects decoration attributes on other core elements', () => {
    const { parser } = setup({ [ATTR]: handler() });
    const root = doc(
      core('component', {}, [
        core('property', [attribute(undefined, 'name', 'x'), attribute(ATTR, 'foo', 'bar')], [
          core('null'),
        ]),
      ])
    );

    expect(() => parser.parseDocument(root)).toThrow(
      `Attribute @{${ATTR}}foo cannot decorate <property>`
    );
  });

  it('rejects a decorate() result that is not a component', () => {
    const { parser } = setup({
      [ATTR]: handler({
        decorate: (_node, _component, context) => context.createMetadata('value') as never,
      }),
    });

    expect(() =>
      parser.parseDocument(doc(core('component', [attribute(ATTR, 'foo', 'bar')])))
    ).toThrow('returned value metadata from decorate()');
  });
});

describe('replacement', () => {
  it('carries interceptors forward to a replacement instance', () => {
    const tx: Interceptor = { getRank: () => 10 };
    let replacement: MutableComponentMetadata | undefined;
    const laterSaw: MutableComponentMetadata[] = [];

    const { parser, events } = setup({
      'urn:test:tx': handler({
        decorate: (_node, component, context) => {
          context.getComponentDefinitionRegistry().registerInterceptorWithComponent(component, tx);
          return component;
        },
      }),
      'urn:test:proxy': handler({
        decorate: (_node, _component, context) => {
          replacement = context.createMetadata('component');
          replacement.className = 'Proxy';
          return replacement;
        },
      }),
      'urn:test:late': handler({
        decorate: (_node, component, context) => {
          laterSaw.push(component);
          expect(context.getComponentDefinitionRegistry().getInterceptors(component)).toEqual([tx]);
          return component;
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(
        core('component', { id: 'svc', class: 'Service' }, [
          element('urn:test:tx', 'required'),
          element('urn:test:proxy', 'wrap'),
          element('urn:test:late', 'mark'),
        ])
      )
    );

    expect(replacement).toBeDefined();
    expect(graph.get('svc')).toBe(replacement);
    expect(graph.get('svc')?.className).toBe('Proxy');
    expect(laterSaw).toEqual([replacement]);
    expect(graph.getInterceptors('svc')).toEqual([tx]);
    expect(graph.size).toBe(1);
    expect(events.find((e) => e.event === 'component.replaced')).toEqual({
      level: 'debug',
      name: 'dispatcher',
      event: 'component.replaced',
      data: { namespace: 'urn:test:proxy', from: 'svc', to: 'svc', interceptors: 1 },
    });
  });

  it('re-indexes a replacement that changes the id', () => {
    const { parser } = setup({
      [EXT]: handler({
        decorate: (_node, _component, context) => {
          const renamed = context.createMetadata('component');
          renamed.id = 'renamed';
          return renamed;
        },
      }),
    });

    const graph = parser.parseDocument(doc(core('component', { id: 'svc' }, [element(EXT, 'x')])));
    expect(graph.ids()).toEqual(['renamed']);
    expect(graph.has('svc')).toBe(false);
  });

  it('rejects a replacement that takes another component id', () => {
    const { parser } = setup({
      [EXT]: handler({
        decorate: (_node, _component, context) => {
          const clash = context.createMetadata('component');
          clash.id = 'taken';
          return clash;
        },
      }),
    });

    expect(() =>
      parser.parseDocument(
        doc(
          core('component', { id: 'taken' }),
          core('component', { id: 'svc' }, [element(EXT, 'x')])
        )
      )
    ).toThrow(DuplicateIdentifierError);
  });
});

describe('in-place renames', () => {
  it('rejects a component renamed onto another component id', () => {
    const { parser } = setup({
      [EXT]: handler({
        decorate: (_node, component) => {
          component.id = 'a';
          return component;
        },
      }),
    });

    const outcome = parser.tryParseDocument(
      doc(
        core('component', { id: 'a', class: 'A' }),
        core('component', { id: 'b', class: 'B' }, [element(EXT, 'rename')])
      )
    );
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(DuplicateIdentifierError);
    expect(outcome.error).toMatchObject({ id: 'a', node: { description: `<{${EXT}}rename>` } });
  });

  it('indexes a component under its new id', () => {
    let seen: unknown;
    const { parser } = setup({
      [EXT]: handler({
        decorate: (_node, component) => {
          component.id = 'renamed';
          return component;
        },
      }),
      [ATTR]: handler({
        decorate: (_node, component, context) => {
          const registry = context.getComponentDefinitionRegistry();
          seen = [
            registry.containsComponentDefinition('svc'),
            registry.getComponentDefinitionNames(),
          ];
          return component;
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(core('component', { id: 'svc', class: 'B' }, [element(EXT, 'x'), element(ATTR, 'y')]))
    );
    expect(seen).toEqual([false, ['renamed']]);
    expect(graph.ids()).toEqual(['renamed']);
    expect(graph.get('renamed')?.className).toBe('B');
  });
});

describe('stand-alone declarations', () => {
  it('registers the component a handler parses', () => {
    const { parser } = setup({
      [EXT]: handler({
        parse: (el, context) => {
          const component = context.createMetadata('component');
          component.className = el.localName;
          if (el.localName === 'named') component.id = 'explicit';
          return component;
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(
        element(EXT, 'named'),
        element(EXT, 'fromAttribute', { id: 'attr-id' }),
        element(EXT, 'anonymous'),
        core('component', { id: 'plain' })
      )
    );

    expect(graph.ids()).toEqual(['explicit', 'attr-id', '.component-1', 'plain']);
    expect(graph.get('.component-1')?.className).toBe('anonymous');
  });

  it('rejects two stand-alone declarations of the same id', () => {
    const parse = vi.fn<NamespaceHandler['parse']>((_el, context) =>
      context.createMetadata('component')
    );
    const { parser } = setup({ [EXT]: handler({ parse }) });
    const root = doc(element(EXT, 'region', { id: 'x' }), element(EXT, 'region', { id: 'x' }));

    const outcome = parser.tryParseDocument(root);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(DuplicateIdentifierError);
    expect(outcome.error).toMatchObject({ id: 'x', code: 'DuplicateIdentifier' });
    expect(parse).toHaveBeenCalledTimes(2);
  });

  it('rejects a stand-alone result that is not a component', () => {
    const { parser } = setup({
      [EXT]: handler({ parse: (_el, context) => context.createMetadata('value') }),
    });

    expect(() => parser.parseDocument(doc(element(EXT, 'thing')))).toThrow(
      `The handler for '${EXT}' returned value metadata; a top-level declaration must produce`
    );
  });
});

describe('inline values', () => {
  it('parses custom elements in value positions', () => {
    const { parser } = setup({
      [EXT]: handler({
        parse: (el, context) => {
          const pair = context.createMetadata('collection');
          for (const child of childElements(el)) pair.addValue(context.parseElement(child));
          return pair;
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(
        core('component', { id: 'svc' }, [
          core('property', { name: 'pair' }, [
            element(EXT, 'pair', {}, [core('value', {}, ['a']), core('null')]),
          ]),
          core('argument', {}, [element(EXT, 'pair')]),
        ])
      )
    );

    const svc = graph.get('svc');
    expect(svc?.getProperty('pair')).toMatchObject({
      kind: 'collection',
      values: [{ kind: 'value', value: 'a' }, { kind: 'null' }],
    });
    expect(svc?.arguments[0]?.value).toMatchObject({ kind: 'collection', values: [] });
  });

  it('rejects an inline result that is not metadata', () => {
    const { parser } = setup({ [EXT]: handler({ parse: () => ({}) as never }) });
    const root = doc(
      core('component', {}, [core('property', { name: 'p' }, [element(EXT, 'x')])])
    );

    expect(() => parser.parseDocument(root)).toThrow('returned object instead of metadata');
  });
});

describe('namespace resolution and failures', () => {
  it('rejects a namespace without a handler', () => {
    const { parser } = setup({});
    const root = doc(element('urn:test:missing', 'thing', {}, [], { line: 4, column: 3 }));

    const outcome = parser.tryParseDocument(root, { sourceName: 'app.xml' });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(UnresolvedNamespaceError);
    expect(outcome.error).toMatchObject({
      code: 'UnresolvedNamespace',
      namespace: 'urn:test:missing',
      node: { description: '<{urn:test:missing}thing>', source: 'app.xml' },
    });
    expect(outcome.error.message).toContain('<{urn:test:missing}thing> at 4:3');
  });

  it('wraps handler failures with the node and the cause', () => {
    const boom = new Error('boom');
    const { parser } = setup({
      [EXT]: handler({
        parse: () => {
          throw boom;
        },
      }),
    });

    const outcome = parser.tryParseDocument(doc(element(EXT, 'thing')));
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(HandlerInvocationError);
    expect(outcome.error).toMatchObject({
      code: 'HandlerInvocationFailure',
      namespace: EXT,
      mode: 'parse',
      node: { description: `<{${EXT}}thing>` },
    });
    expect(outcome.error.cause).toBe(boom);
    expect(outcome.error.message).toContain('Reason: boom');
  });

  it('passes parse errors raised by a handler through unchanged', () => {
    const { parser } = setup({
      [EXT]: handler({
        parse: (el) => {
          throw new MalformedDeclarationError('size is required', referenceOf(el));
        },
      }),
    });

    expect(() => parser.parseDocument(doc(element(EXT, 'cache')))).toThrow(
      MalformedDeclarationError
    );
  });

  it('reports every handler call to the instrumentation hook', () => {
    const onHandlerInvoke = vi.fn();
    const { parser } = setup(
      {
        [ATTR]: handler({ decorate: attributeAsProperty }),
        [EXT]: handler({
          decorate: () => {
            throw new Error('nope');
          },
        }),
      },
      { onHandlerInvoke }
    );

    parser.parseDocument(doc(core('component', [attribute(ATTR, 'a', '1')])));
    expect(onHandlerInvoke).toHaveBeenCalledWith(ATTR, 'decorate', expect.any(Number));

    expect(() =>
      parser.parseDocument(doc(core('component', {}, [element(EXT, 'x')])))
    ).toThrow(HandlerInvocationError);
    expect(onHandlerInvoke).toHaveBeenLastCalledWith(EXT, 'decorate', expect.any(Number));
    expect(onHandlerInvoke).toHaveBeenCalledTimes(2);
  });

  it('keeps the handler failure when the instrumentation hook throws', () => {
    const boom = new Error('boom');
    const onHandlerInvoke = vi.fn(() => {
      throw new Error('hook broke');
    });
    const { parser, events } = setup(
      {
        [EXT]: handler({
          parse: () => {
            throw boom;
          },
        }),
      },
      { onHandlerInvoke }
    );

    const outcome = parser.tryParseDocument(doc(element(EXT, 'thing')));
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(HandlerInvocationError);
    expect(outcome.error.cause).toBe(boom);
    expect(onHandlerInvoke).toHaveBeenCalledTimes(1);
    expect(events.filter((e) => e.event === 'hook.failed')).toEqual([
      {
        level: 'warn',
        name: 'dispatcher',
        event: 'hook.failed',
        data: { namespace: EXT, mode: 'parse', message: 'hook broke' },
      },
    ]);
  });

  it('completes the parse when the instrumentation hook throws', () => {
    const { parser } = setup(
      { [EXT]: handler() },
      {
        onHandlerInvoke: () => {
          throw new Error('hook broke');
        },
      }
    );

    expect(parser.parseDocument(doc(element(EXT, 'thing', { id: 't' }))).ids()).toEqual(['t']);
  });

  it('logs each handler call at debug level', () => {
    const { parser, events } = setup({ [EXT]: handler() });
    parser.parseDocument(doc(element(EXT, 'thing', { id: 't' })));

    expect(events.filter((e) => e.event === 'dispatch.invoke')).toEqual([
      {
        level: 'debug',
        name: 'dispatcher',
        event: 'dispatch.invoke',
        data: { namespace: EXT, mode: 'parse', node: `<{${EXT}}thing>` },
      },
    ]);
  });
});

describe('class-space compatibility', () => {
  it('never invokes an incompatible handler', () => {
    const decorate = vi.fn<NamespaceHandler['decorate']>((_node, component) => component);
    const { parser } = setup({
      [ATTR]: handler({ decorate, getManagedClasses: () => new Set([ForeignRegion]) }),
    });
    const root = doc(core('component', [attribute(ATTR, 'foo', 'bar')]));

    const outcome = parser.tryParseDocument(root, { module: module() });
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(IncompatibleHandlerError);
    expect(outcome.error).toMatchObject({
      code: 'IncompatibleHandler',
      namespace: ATTR,
      classSpace: 'app',
      conflicts: [{ className: 'Region', handlerClass: ForeignRegion, moduleClass: Region }],
    });
    expect(decorate).not.toHaveBeenCalled();
  });

  it('runs compatible handlers against a module', () => {
    const { parser } = setup({
      [ATTR]: handler({
        decorate: attributeAsProperty,
        getManagedClasses: () => new Set([Region]),
      }),
    });

    const graph = parser.parseDocument(
      doc(core('component', [attribute(undefined, 'id', 'svc'), attribute(ATTR, 'foo', 'bar')])),
      { module: module() }
    );
    expect(graph.get('svc')?.getProperty('foo')).toMatchObject({ value: 'bar' });
  });

  it('skips incompatible decorations under the skip policy', () => {
    const decorate = vi.fn<NamespaceHandler['decorate']>(attributeAsProperty);
    const { parser, events } = setup(
      { [ATTR]: handler({ decorate, getManagedClasses: () => new Set([ForeignRegion]) }) },
      { incompatibleDecorations: 'skip' }
    );

    const graph = parser.parseDocument(
      doc(core('component', [attribute(undefined, 'id', 'svc'), attribute(ATTR, 'foo', 'bar')])),
      { module: module() }
    );

    expect(decorate).not.toHaveBeenCalled();
    expect(graph.get('svc')?.properties.size).toBe(0);
    expect(events.find((e) => e.event === 'decoration.skipped')).toEqual({
      level: 'warn',
      name: 'dispatcher',
      event: 'decoration.skipped',
      data: {
        namespace: ATTR,
        node: `@{${ATTR}}foo`,
        classSpace: 'app',
        conflicts: ['Region'],
      },
    });
  });

  it('still rejects incompatible stand-alone declarations under the skip policy', () => {
    const { parser } = setup(
      { [EXT]: handler({ getManagedClasses: () => new Set([ForeignRegion]) }) },
      { incompatibleDecorations: 'skip' }
    );

    expect(() =>
      parser.parseDocument(doc(element(EXT, 'thing')), { module: module() })
    ).toThrow(IncompatibleHandlerError);
  });
});

describe('dry parse', () => {
  it('skips compatibility checks and offers no environment entries', () => {
    let probe: { dry: boolean; handle: unknown; names: string[] } | undefined;
    const { parser, events } = setup({
      [EXT]: handler({
        getManagedClasses: () => new Set([ForeignRegion]),
        parse: (_el, context) => {
          const registry = context.getComponentDefinitionRegistry();
          probe = {
            dry: context.isDryParse(),
            handle: registry.getEnvironmentEntry('moduleHandle'),
            names: registry.getEnvironmentEntryNames(),
          };
          return context.createMetadata('component');
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(element(EXT, 'thing', { id: 't' }), core('component', { id: 'moduleHandle' }))
    );

    expect(graph.ids()).toEqual(['t', 'moduleHandle']);
    expect(probe).toEqual({ dry: true, handle: { found: false }, names: [] });
    expect(events.filter((e) => e.event === 'compatibility.skipped')).toEqual([
      {
        level: 'debug',
        name: 'dispatcher',
        event: 'compatibility.skipped',
        data: { namespace: EXT, reason: 'dry-parse' },
      },
    ]);
  });

  it('exposes environment entries when a module backs the parse', () => {
    const host = { services: 'placeholder' };
    const backing = module({ hostServices: host });
    let probe: Record<string, unknown> | undefined;
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => {
          const registry = context.getComponentDefinitionRegistry();
          probe = {
            dry: context.isDryParse(),
            handle: registry.getEnvironmentEntry(EnvironmentEntry.Module),
            context: registry.getEnvironmentEntry('hostServices'),
            container: registry.getEnvironmentEntry('componentContainer'),
            names: registry.getEnvironmentEntryNames(),
          };
          return context.createMetadata('component');
        },
      }),
    });

    parser.parseDocument(doc(element(EXT, 'thing')), { module: backing });

    expect(probe).toEqual({
      dry: false,
      handle: { found: true, value: backing },
      context: { found: true, value: host },
      container: { found: false },
      names: ['hostServices', 'moduleHandle'],
    });
  });

  it('reserves environment entry names as component ids', () => {
    const { parser } = setup({});
    expect(() =>
      parser.parseDocument(doc(core('component', { id: 'moduleHandle' })), { module: module() })
    ).toThrow(DuplicateIdentifierError);
  });
});

describe('parser context', () => {
  it('reports document defaults and the source name', () => {
    let seen: unknown;
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => {
          seen = {
            scope: context.getDefaultScope(),
            activation: context.getDefaultActivation(),
            source: context.getSourceName(),
            enclosing: context.enclosingComponent,
          };
          return context.createMetadata('component');
        },
      }),
    });

    parser.parseDocument(
      core('components', { 'default-scope': 'scoped', 'default-activation': 'lazy' }, [
        element(EXT, 'thing'),
      ]),
      { sourceName: 'app.xml' }
    );

    expect(seen).toEqual({
      scope: 'scoped',
      activation: 'lazy',
      source: 'app.xml',
      enclosing: undefined,
    });
  });

  it('generates ids that avoid every id declared in the document', () => {
    const generated: string[] = [];
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => {
          generated.push(context.generateId(), context.generateId());
          return context.createMetadata('component');
        },
      }),
    });

    const graph = parser.parseDocument(
      doc(element(EXT, 'thing'), core('component', { id: '.component-2' }))
    );

    expect(generated).toEqual(['.component-1', '.component-3']);
    expect(graph.ids()).toEqual(['.component-4', '.component-2']);
  });

  it('rejects unknown metadata kinds', () => {
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => context.createMetadata('environment' as never),
      }),
    });

    expect(() => parser.parseDocument(doc(element(EXT, 'thing')))).toThrow(
      'Unknown metadata kind "environment".'
    );
  });

  it('cannot be used after the parse completes', () => {
    let kept: ParserContext | undefined;
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => {
          kept = context;
          return context.createMetadata('component');
        },
      }),
    });

    parser.parseDocument(doc(element(EXT, 'thing')));

    expect(kept).toBeDefined();
    expect(() => kept?.generateId()).toThrow(ParseSessionClosedError);
    expect(() => kept?.createMetadata('value')).toThrow(ParseSessionClosedError);
  });
});

describe('registry snapshots', () => {
  it('ignores registrations made while a document is being parsed', () => {
    const late = handler();
    const registry = new HandlerRegistry();
    registry.register(
      EXT,
      handler({
        parse: (_el, context) => {
          registry.register('urn:test:late', late);
          return context.createMetadata('component');
        },
      })
    );
    const parser = new Parser({ registry });
    const root = doc(
      element(EXT, 'first', { id: 'a' }),
      element('urn:test:late', 'x', { id: 'b' })
    );

    expect(() => parser.parseDocument(root)).toThrow(UnresolvedNamespaceError);
    expect(parser.parseDocument(root).ids()).toEqual(['a', 'b']);
  });

  it('keeps components of separate documents apart', () => {
    const names: string[][] = [];
    const { parser } = setup({
      [EXT]: handler({
        parse: (_el, context) => {
          names.push(context.getComponentDefinitionRegistry().getComponentDefinitionNames());
          return context.createMetadata('component');
        },
      }),
    });

    parser.parseDocument(doc(core('component', { id: 'one' }), element(EXT, 'x')));
    parser.parseDocument(doc(core('component', { id: 'two' }), element(EXT, 'x')));

    expect(names).toEqual([['one'], ['two']]);
  });
});
