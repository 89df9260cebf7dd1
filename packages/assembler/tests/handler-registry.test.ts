import { describe, expect, it } from 'vitest';

import { ModuleClassSpace } from '../src/core/class-space.js';
import {
  InvalidHandlerRegistrationError,
  UnresolvedNamespaceError,
} from '../src/errors/errors.js';
import type { StructuredLogEvent } from '../src/logging/structured-logger.js';
import { HandlerRegistry } from '../src/registry/handler-registry.js';
import {
  isNamespaceHandler,
  type NamespaceHandler,
} from '../src/registry/namespace-handler.js';

const CACHE = 'urn:test:cache';
const TX = 'urn:test:tx';

class Region {}

const handler = (overrides: Partial<NamespaceHandler> = {}): NamespaceHandler => ({
  getSchemaLocation: () => undefined,
  getManagedClasses: () => undefined,
  parse: (_element, context) => context.createMetadata('component'),
  decorate: (_node, component) => component,
  ...overrides,
});

const capture = () => {
  const events: StructuredLogEvent[] = [];
  return { events, logger: { log: (event: StructuredLogEvent) => events.push(event) } };
};

describe('HandlerRegistry', () => {
  it('resolves registered namespaces', () => {
    const registry = new HandlerRegistry();
    const cache = handler();
    registry.register(CACHE, cache);

    expect(registry.lookup(CACHE)).toEqual({ found: true, value: cache });
    expect(registry.lookup(TX)).toEqual({ found: false });
    expect(registry.namespaces).toEqual([CACHE]);
  });

  it('binds one handler to several namespaces', () => {
    const registry = new HandlerRegistry();
    const both = handler();
    registry.register([CACHE, TX], both);
    expect(registry.namespaces).toEqual([CACHE, TX]);
    expect(registry.lookup(TX)).toEqual({ found: true, value: both });
  });

  it('lets the last registration win', () => {
    const { events, logger } = capture();
    const registry = new HandlerRegistry(logger);
    const first = handler();
    const second = handler();
    registry.register(CACHE, first);
    registry.register(CACHE, second);

    expect(registry.lookup(CACHE)).toEqual({ found: true, value: second });
    expect(events.filter((e) => e.event === 'handler.superseded')).toEqual([
      {
        level: 'info',
        name: 'handler-registry',
        event: 'handler.superseded',
        data: { namespace: CACHE },
      },
    ]);
  });

  it('keeps snapshots isolated from later registrations', () => {
    const registry = new HandlerRegistry();
    const first = handler();
    registry.register(CACHE, first);
    const snapshot = registry.snapshot();

    registry.register(CACHE, handler());
    registry.register(TX, handler());
    registry.unregister(CACHE);

    expect(snapshot.lookup(CACHE)).toEqual({ found: true, value: first });
    expect(snapshot.lookup(TX)).toEqual({ found: false });
    expect(snapshot.namespaces).toEqual([CACHE]);
  });

  it('unregisters namespaces and handlers', () => {
    const registry = new HandlerRegistry();
    const shared = handler();
    const other = handler();
    registry.register([CACHE, TX], shared);
    registry.register('urn:test:other', other);

    expect(registry.unregister('urn:test:missing')).toBe(false);
    expect(registry.unregisterHandler(shared)).toEqual([CACHE, TX]);
    expect(registry.namespaces).toEqual(['urn:test:other']);
    expect(registry.unregister('urn:test:other')).toBe(true);
    expect(registry.namespaces).toEqual([]);
  });

  it('validates registrations', () => {
    const registry = new HandlerRegistry();
    expect(() => registry.register('', handler())).toThrow(InvalidHandlerRegistrationError);
    expect(() => registry.register([], handler())).toThrow(InvalidHandlerRegistrationError);
    expect(() => registry.register([CACHE, '  '], handler())).toThrow('namespaces[1]');
    const notAHandler = { parse: () => undefined };
    const broken = Object.assign(handler(), { decorate: undefined });
    expect(() => registry.register(CACHE, broken)).toThrow(InvalidHandlerRegistrationError);
    expect(isNamespaceHandler(notAHandler)).toBe(false);
    expect(registry.namespaces).toEqual([]);
  });

  it('records managed classes from the handler or the registration', () => {
    const registry = new HandlerRegistry();
    registry.register(CACHE, handler({ getManagedClasses: () => new Set([Region]) }));
    registry.register(TX, handler(), [Region]);
    registry.register('urn:test:none', handler());

    const snapshot = registry.snapshot();
    const cache = snapshot.getRegistration(CACHE);
    const tx = snapshot.getRegistration(TX);
    const none = snapshot.getRegistration('urn:test:none');
    expect(cache.found && Array.from(cache.value.managedClasses ?? [])).toEqual([Region]);
    expect(tx.found && Array.from(tx.value.managedClasses ?? [])).toEqual([Region]);
    expect(none.found && none.value.managedClasses).toBeUndefined();
  });

  it('checks compatibility against a class space', () => {
    const registry = new HandlerRegistry();
    const OtherRegion = (() => {
      class Region {}
      return Region;
    })();
    const registered = handler();
    registry.register(CACHE, registered, [Region]);
    const unregistered = handler({ getManagedClasses: () => new Set([OtherRegion]) });

    const space = new ModuleClassSpace('app', [Region]);
    expect(registry.isCompatible(registered, space)).toBe(true);
    expect(registry.isCompatible(unregistered, space)).toBe(false);
    expect(registry.checkCompatibility(unregistered, space)).toEqual({
      compatible: false,
      conflicts: [{ className: 'Region', handlerClass: OtherRegion, moduleClass: Region }],
    });
  });

  it('reports schema locations', () => {
    const registry = new HandlerRegistry();
    const url = new URL('https://schemas.example.test/cache.xsd');
    registry.register(CACHE, handler({ getSchemaLocation: () => url }));
    registry.register(TX, handler());

    expect(registry.getSchemaLocation(CACHE)).toBe(url);
    expect(registry.getSchemaLocation(TX)).toBeUndefined();
    expect(registry.getSchemaLocations([CACHE, TX])).toEqual(new Map([[CACHE, url]]));
    expect(() => registry.getSchemaLocation('urn:test:missing')).toThrow(UnresolvedNamespaceError);
  });

  it('logs registrations at debug level', () => {
    const { events, logger } = capture();
    const registry = new HandlerRegistry(logger);
    registry.register(CACHE, handler(), [Region]);
    registry.unregister(CACHE);

    expect(events).toEqual([
      {
        level: 'debug',
        name: 'handler-registry',
        event: 'handler.registered',
        data: { namespace: CACHE, managedClasses: 1 },
      },
      {
        level: 'debug',
        name: 'handler-registry',
        event: 'handler.unregistered',
        data: { namespace: CACHE },
      },
    ]);
  });
});
