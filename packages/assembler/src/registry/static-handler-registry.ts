import type { ClassRef } from '../core/class-space.js';

/**
 * Namespaces and managed classes declared on a handler class with
 * `@NamespaceHandlerFor()`.
 */
export interface HandlerDeclaration {
  readonly namespaces: readonly string[];
  /** undefined: fall back to the instance's getManagedClasses() */
  readonly managedClasses?: readonly ClassRef[];
}

/**
 * Declarations keyed by handler class.
 *
 * WeakMap so that unloading a module's handler classes releases them.
 */
type DeclarationBag = {
  declarations: WeakMap<object, HandlerDeclaration>;
};

/**
 * Global symbol for storing the declaration bag on globalThis.
 *
 * Keeps a single bag per process even if this module is bundled more than
 * once, so a handler class declared in one bundle is found by a registry from
 * another.
 */
const GLOBAL_SYMBOL: unique symbol = Symbol.for('weft.staticHandlerRegistry');

type GlobalWithBag = typeof globalThis & { [GLOBAL_SYMBOL]?: DeclarationBag };

function ensureBag(): DeclarationBag {
  const g: GlobalWithBag = globalThis;
  let bag = g[GLOBAL_SYMBOL];
  if (bag === undefined) {
    bag = { declarations: new WeakMap() };
    g[GLOBAL_SYMBOL] = bag;
  }
  return bag;
}

/**
 * Process-wide store of handler declarations collected by the decorator at
 * module load time and read back by HandlerRegistry.registerDeclared().
 */
export class StaticHandlerRegistry {
  /**
   * Record a declaration. Re-declaring a class (hot reload) replaces it.
   */
  static declare(target: object, declaration: HandlerDeclaration): void {
    ensureBag().declarations.set(target, declaration);
  }

  static getDeclaration(target: object): HandlerDeclaration | undefined {
    return ensureBag().declarations.get(target);
  }

  /**
   * ⚠️ For test environments only.
   */
  static resetForTests(): void {
    ensureBag().declarations = new WeakMap();
  }
}
