/**
 * Parse Throughput Benchmark
 *
 * Scenarios:
 * 1. Core-only document (no dispatch)
 * 2. Attribute decorations on every component
 * 3. Decorations that replace the component
 * 4. Stand-alone foreign declarations
 * 5. Same document, dry parse
 */

import { Bench } from 'tinybench';
import {
  CORE_NAMESPACE,
  HandlerRegistry,
  ModuleClassSpace,
  Parser,
  attribute,
  element,
  type DecorationNode,
  type DocumentElement,
  type MutableComponentMetadata,
  type NamespaceHandler,
  type ParserContext,
} from '../src/index.js';

// ==================== Test Setup ====================

const TX = 'urn:bench:tx';
const CACHE = 'urn:bench:cache';

class CacheRegion {}

const txHandler: NamespaceHandler = {
  getSchemaLocation: () => undefined,
  getManagedClasses: () => undefined,
  parse: (_element, context) => context.createMetadata('null'),
  decorate: (_node: DecorationNode, component: MutableComponentMetadata) => {
    component.addDependsOn('txManager');
    return component;
  },
};

const cacheHandler: NamespaceHandler = {
  getSchemaLocation: () => new URL('https://schemas.example.com/cache.xsd'),
  getManagedClasses: () => new Set([CacheRegion]),
  parse: (_element: DocumentElement, context: ParserContext) => {
    const region = context.createMetadata('component');
    region.className = 'CacheRegion';
    return region;
  },
  decorate: (_node, component, context) => {
    const proxy = context.createMetadata('component');
    proxy.className = 'CacheProxy';
    proxy.addDependsOn(component.id);
    return proxy;
  },
};

const registry = new HandlerRegistry();
registry.register(TX, txHandler);
registry.register(CACHE, cacheHandler);

const parser = new Parser({ registry });
const module = {
  name: 'bench',
  classSpace: new ModuleClassSpace('bench', [CacheRegion]),
};

const SIZE = 200;

const components = (decorate: (i: number) => DocumentElement[] | undefined) =>
  element(
    CORE_NAMESPACE,
    'components',
    {},
    Array.from({ length: SIZE }, (_, i) => {
      const children = [
        element(CORE_NAMESPACE, 'property', { name: 'index', value: String(i) }),
        ...(decorate(i) ?? []),
      ];
      return element(
        CORE_NAMESPACE,
        'component',
        [
          attribute(undefined, 'id', `svc${i}`),
          attribute(undefined, 'class', 'Service'),
          ...(i % 2 === 0 ? [attribute(TX, 'policy', 'required')] : []),
        ],
        children
      );
    })
  );

const coreOnly = element(
  CORE_NAMESPACE,
  'components',
  {},
  Array.from({ length: SIZE }, (_, i) =>
    element(CORE_NAMESPACE, 'component', { id: `svc${i}`, class: 'Service' }, [
      element(CORE_NAMESPACE, 'property', { name: 'index', value: String(i) }),
    ])
  )
);
const decorated = components(() => undefined);
const replaced = components((i) => (i % 4 === 0 ? [element(CACHE, 'cached')] : undefined));
const standalone = element(
  CORE_NAMESPACE,
  'components',
  {},
  Array.from({ length: SIZE }, (_, i) => element(CACHE, 'region', { id: `region${i}` }))
);

// ==================== Benchmark ====================

const bench = new Bench({
  name: 'Parse Throughput',
  time: 1000,
  iterations: 10,
  warmupIterations: 5,
});

bench.add('core only', () => {
  if (parser.parseDocument(coreOnly, { module }).size !== SIZE) throw new Error('Invalid');
});

bench.add('attribute decorations', () => {
  if (parser.parseDocument(decorated, { module }).size !== SIZE) throw new Error('Invalid');
});

bench.add('replacing decorations', () => {
  if (parser.parseDocument(replaced, { module }).size !== SIZE) throw new Error('Invalid');
});

bench.add('stand-alone declarations', () => {
  if (parser.parseDocument(standalone, { module }).size !== SIZE) throw new Error('Invalid');
});

bench.add('dry parse', () => {
  if (parser.parseDocument(replaced).size !== SIZE) throw new Error('Invalid');
});

// ==================== Run Benchmark ====================

await bench.run();

console.log('\n' + '='.repeat(80));
console.log(`Parse Throughput Results (${SIZE} components per document)`);
console.log('='.repeat(80) + '\n');

console.table(
  bench.tasks.map((task) => ({
    'Test Case': task.name,
    'ops/sec': task.result?.period
      ? `${(1000 / task.result.period).toLocaleString('en-US', { maximumFractionDigits: 0 })}`
      : 'N/A',
    'avg (ms)': task.result?.period ? task.result.period.toFixed(4) : 'N/A',
    'per component (µs)': task.result?.period
      ? ((task.result.period * 1000) / SIZE).toFixed(2)
      : 'N/A',
  }))
);
