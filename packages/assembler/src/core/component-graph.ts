/*
 * ComponentArena / ComponentGraph
 * -------------------------------
 * The arena is the session-owned store of top-level components:
 *  - slot index -> canonical MutableComponentMetadata
 *  - component id -> slot index
 *
 * Handlers and the walker address a component by its slot, so replacing a
 * node (a decorator returning a new instance) is a single slot rebind; nothing
 * else in the graph points at the node directly.
 *
 * publish() seals every node and produces the immutable ComponentGraph handed
 * to the runtime. The arena itself is discarded with the session.
 */
import { DuplicateIdentifierError, type NodeReference } from '../errors/errors.js';
import type { ComponentMetadata, MutableComponentMetadata } from '../metadata/metadata.js';
import type { Interceptor } from './interceptor-registry.js';

/**
 * Branded slot index into a {@link ComponentArena}.
 */
export type ComponentSlot = number & { __brand: 'ComponentSlot' };

type ArenaRecord = {
  node: MutableComponentMetadata;
  declaredAt: NodeReference;
  /** Id the slot is indexed under; lags behind node.id after an in-place rename */
  indexedId: string;
};

export class ComponentArena {
  /** Primary storage: slot -> record */
  private readonly slots: ArenaRecord[] = [];

  /** Id index: component id -> slot */
  private readonly index = new Map<string, ComponentSlot>();

  /**
   * @param reserved - ids that belong to the environment and cannot be declared
   */
  constructor(private readonly reserved: ReadonlySet<string> = new Set()) {}

  get size(): number {
    return this.slots.length;
  }

  /**
   * Register a top-level component.
   *
   * @throws DuplicateIdentifierError if the id is already taken
   */
  add(node: MutableComponentMetadata, declaredAt: NodeReference): ComponentSlot {
    this.assertAvailable(node.id, declaredAt);
    const slot = this.slots.length as ComponentSlot;
    this.slots.push({ node, declaredAt, indexedId: node.id });
    this.index.set(node.id, slot);
    return slot;
  }

  /**
   * Rebind a slot to a new node.
   *
   * If the replacement carries a different id the index follows it.
   *
   * @throws DuplicateIdentifierError if the new id belongs to another slot
   */
  replace(slot: ComponentSlot, node: MutableComponentMetadata, at: NodeReference): void {
    const record = this.record(slot);
    record.node = node;
    this.reindex(slot, at);
  }

  /**
   * Follow a component whose id was edited in place.
   *
   * @throws DuplicateIdentifierError if the new id belongs to another slot
   */
  reindex(slot: ComponentSlot, at: NodeReference): void {
    const record = this.record(slot);
    const id = record.node.id;
    if (id === record.indexedId) return;
    this.assertAvailable(id, at);
    this.index.delete(record.indexedId);
    this.index.set(id, slot);
    record.indexedId = id;
  }

  at(slot: ComponentSlot): MutableComponentMetadata {
    return this.record(slot).node;
  }

  slotOf(id: string): ComponentSlot | undefined {
    return this.index.get(id);
  }

  get(id: string): MutableComponentMetadata | undefined {
    const slot = this.index.get(id);
    return slot === undefined ? undefined : this.at(slot);
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /**
   * Ids of registered components in declaration order.
   */
  ids(): string[] {
    return this.slots.map((r) => r.node.id);
  }

  /**
   * Seal every component and build the runtime's read-only view.
   *
   * Ids are checked again here: a handler holding a component from the
   * definition registry may have renamed it outside any decoration.
   *
   * @throws DuplicateIdentifierError if two components ended up with one id
   */
  publish(interceptors: ReadonlyMap<ComponentMetadata, readonly Interceptor[]>): ComponentGraph {
    const components = new Map<string, ComponentMetadata>();
    const declared = new Map<string, NodeReference>();
    for (const { node, declaredAt } of this.slots) {
      const first = declared.get(node.id);
      if (first !== undefined) throw new DuplicateIdentifierError(node.id, declaredAt, first);
      if (this.reserved.has(node.id)) throw new DuplicateIdentifierError(node.id, declaredAt);
      declared.set(node.id, declaredAt);
      components.set(node.id, node);
    }
    for (const { node } of this.slots) node.seal();
    return new ComponentGraph(components, interceptors);
  }

  private record(slot: ComponentSlot): ArenaRecord {
    const record = this.slots[slot];
    if (record === undefined) throw new RangeError(`Unknown component slot ${slot}`);
    return record;
  }

  private assertAvailable(id: string, at: NodeReference): void {
    const existing = this.index.get(id);
    if (existing !== undefined) {
      throw new DuplicateIdentifierError(id, at, this.slots[existing]?.declaredAt);
    }
    if (this.reserved.has(id)) throw new DuplicateIdentifierError(id, at);
  }
}

/**
 * Finished metadata graph, keyed by component id.
 *
 * Immutable: nodes are sealed and the graph exposes no mutators.
 */
export class ComponentGraph {
  constructor(
    private readonly components: ReadonlyMap<string, ComponentMetadata>,
    private readonly interceptors: ReadonlyMap<ComponentMetadata, readonly Interceptor[]>
  ) {}

  get size(): number {
    return this.components.size;
  }

  get(id: string): ComponentMetadata | undefined {
    return this.components.get(id);
  }

  has(id: string): boolean {
    return this.components.has(id);
  }

  /**
   * Ids in declaration order.
   */
  ids(): string[] {
    return Array.from(this.components.keys());
  }

  *[Symbol.iterator](): IterableIterator<ComponentMetadata> {
    yield* this.components.values();
  }

  /**
   * Interceptors bound to a component (by instance or id), highest rank first.
   */
  getInterceptors(component: ComponentMetadata | string): readonly Interceptor[] {
    const node = typeof component === 'string' ? this.components.get(component) : component;
    if (node === undefined) return [];
    return this.interceptors.get(node) ?? [];
  }
}
