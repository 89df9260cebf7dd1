import {
  MutableCollectionMetadata,
  MutableComponentMetadata,
  MutableNullMetadata,
  MutableRefMetadata,
  MutableValueMetadata,
  type MetadataKind,
  type MutableMetadataByKind,
} from './metadata.js';

const FACTORIES: { [K in MetadataKind]: () => MutableMetadataByKind[K] } = {
  component: () => new MutableComponentMetadata(),
  value: () => new MutableValueMetadata(),
  ref: () => new MutableRefMetadata(),
  collection: () => new MutableCollectionMetadata(),
  null: () => new MutableNullMetadata(),
};

export function isMetadataKind(kind: unknown): kind is MetadataKind {
  return typeof kind === 'string' && Object.prototype.hasOwnProperty.call(FACTORIES, kind);
}

/**
 * Create a fresh, unattached mutable metadata node.
 *
 * This is the only supported way to construct metadata: it guarantees every
 * node exposes the mutable interface other handlers rely on.
 *
 * @example
 * ```typescript
 * const cache = createMetadata('component');
 * cache.className = 'RegionCache';
 * const size = createMetadata('value');
 * size.value = '512';
 * cache.setProperty('size', size);
 * ```
 */
export function createMetadata<K extends MetadataKind>(kind: K): MutableMetadataByKind[K] {
  const factory: () => MutableMetadataByKind[K] = FACTORIES[kind];
  return factory();
}
