import type { ClassRef } from '../core/class-space.js';
import {
  StaticHandlerRegistry,
  type HandlerDeclaration,
} from '../registry/static-handler-registry.js';

/**
 * Environment check for production mode.
 * Skips declaration freezing in production.
 */
const isProd = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

export interface NamespaceHandlerOptions {
  /** Namespace URI or URIs the handler interprets */
  namespaces: string | readonly string[];
  /**
   * Classes to check against module class spaces. When omitted the registry
   * asks the instance's getManagedClasses().
   */
  managedClasses?: readonly ClassRef[];
}

/**
 * Declares the namespaces a handler class serves.
 *
 * The declaration is recorded at module load time; an instance is bound with
 * `registry.registerDeclared(new Handler())`, the way a module-discovery
 * collaborator would publish it.
 *
 * @example
 * ```typescript
 * @NamespaceHandlerFor({ namespaces: 'urn:weft:cache', managedClasses: [CacheRegion] })
 * class CacheHandler implements NamespaceHandler { ... }
 *
 * registry.registerDeclared(new CacheHandler());
 * ```
 */
export function NamespaceHandlerFor(options: NamespaceHandlerOptions): ClassDecorator {
  const namespaces =
    typeof options?.namespaces === 'string' ? [options.namespaces] : options?.namespaces;
  if (!namespaces || namespaces.length === 0 || namespaces.some((ns) => !ns)) {
    throw new Error(
      '@NamespaceHandlerFor() requires at least one namespace URI. ' +
        "Pass e.g. { namespaces: 'urn:example:cache' }."
    );
  }

  return (target) => {
    const declaration: HandlerDeclaration = {
      namespaces: [...namespaces],
      managedClasses: options.managedClasses ? [...options.managedClasses] : undefined,
    };

    if (!isProd) Object.freeze(declaration);

    StaticHandlerRegistry.declare(target, declaration);
  };
}
