import type { ComponentMetadata, MutableComponentMetadata } from '../metadata/metadata.js';
import { found, NOT_FOUND, type Lookup } from '../types/types.js';
import type { ComponentArena } from './component-graph.js';
import type { Interceptor, InterceptorRegistry } from './interceptor-registry.js';

/**
 * Handler-facing view of the components declared so far in one document.
 *
 * Only sees the session it was created for: components of other documents,
 * parsed before or concurrently, are never visible. Environment entries come
 * from the backing module and are absent during a dry parse.
 */
export class ComponentDefinitionRegistry {
  constructor(
    private readonly arena: ComponentArena,
    private readonly interceptors: InterceptorRegistry,
    private readonly environment: ReadonlyMap<string, unknown>
  ) {}

  /**
   * Current node of a top-level component declared earlier in the document,
   * including any decoration applied to it so far.
   */
  getComponentDefinition(id: string): Lookup<MutableComponentMetadata> {
    const node = this.arena.get(id);
    return node === undefined ? NOT_FOUND : found(node);
  }

  containsComponentDefinition(id: string): boolean {
    return this.arena.has(id);
  }

  getComponentDefinitionNames(): string[] {
    return this.arena.ids();
  }

  /**
   * Look up an entry supplied by the backing module (see EnvironmentEntry).
   *
   * @returns `{ found: false }` during a dry parse or for unknown names
   */
  getEnvironmentEntry(name: string): Lookup<unknown> {
    return this.environment.has(name) ? found(this.environment.get(name)) : NOT_FOUND;
  }

  getEnvironmentEntryNames(): string[] {
    return Array.from(this.environment.keys());
  }

  registerInterceptorWithComponent(component: ComponentMetadata, interceptor: Interceptor): void {
    this.interceptors.register(component, interceptor);
  }

  getInterceptors(component: ComponentMetadata): readonly Interceptor[] {
    return this.interceptors.get(component);
  }
}
