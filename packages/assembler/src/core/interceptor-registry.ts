import type { ComponentMetadata } from '../metadata/metadata.js';

/**
 * Call interceptor the runtime wraps around a component's methods.
 *
 * The assembler only records which interceptors belong to which component;
 * the hooks are executed by the runtime.
 */
export interface Interceptor {
  /** Higher ranks run first; ties keep registration order */
  getRank(): number;
  preCall?(component: ComponentMetadata, method: string, args: readonly unknown[]): unknown;
  postCallWithReturn?(
    component: ComponentMetadata,
    method: string,
    returnValue: unknown,
    preCallToken: unknown
  ): void;
  postCallWithException?(
    component: ComponentMetadata,
    method: string,
    error: unknown,
    preCallToken: unknown
  ): void;
}

/**
 * Interceptor bindings keyed by component identity.
 *
 * Keys are node instances, not ids: when a decorating handler returns a new
 * component in place of the one it received, bindings held by the old
 * instance stay behind until {@link carryForward} moves them.
 */
export class InterceptorRegistry {
  private readonly bindings = new Map<ComponentMetadata, Interceptor[]>();

  register(component: ComponentMetadata, interceptor: Interceptor): void {
    const list = this.bindings.get(component);
    if (list === undefined) {
      this.bindings.set(component, [interceptor]);
    } else if (!list.includes(interceptor)) {
      list.push(interceptor);
    }
  }

  get(component: ComponentMetadata): readonly Interceptor[] {
    return this.bindings.get(component) ?? [];
  }

  /**
   * Re-key the bindings of `from` onto `to`.
   *
   * Interceptors the handler already registered against `to` are kept once,
   * ahead of the carried ones.
   *
   * @returns number of interceptors moved
   */
  carryForward(from: ComponentMetadata, to: ComponentMetadata): number {
    if (from === to) return 0;
    const carried = this.bindings.get(from);
    if (carried === undefined) return 0;
    this.bindings.delete(from);

    let moved = 0;
    for (const interceptor of carried) {
      const before = this.get(to).length;
      this.register(to, interceptor);
      if (this.get(to).length > before) moved++;
    }
    return moved;
  }

  /**
   * Frozen copy of all bindings, ordered by descending rank.
   */
  snapshot(): ReadonlyMap<ComponentMetadata, readonly Interceptor[]> {
    const out = new Map<ComponentMetadata, readonly Interceptor[]>();
    for (const [component, list] of this.bindings) {
      const ordered = list
        .map((interceptor, order) => ({ interceptor, order, rank: interceptor.getRank() }))
        .sort((a, b) => b.rank - a.rank || a.order - b.order)
        .map((entry) => entry.interceptor);
      out.set(component, Object.freeze(ordered));
    }
    return out;
  }
}
