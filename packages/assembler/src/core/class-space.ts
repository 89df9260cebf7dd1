/*
 * Class spaces
 * ------------
 * A class space is the set of classes a deployed module can see. Two modules
 * may each ship a class with the same name and shape; metadata built against
 * one of them must never be instantiated against the other.
 *
 * A ClassRef is the class object itself, so identity comparison (`===`) is the
 * compatibility test: resolving a class by name in the module's space must
 * yield the very object the handler was built against.
 */
import type { ClassConflict } from '../errors/errors.js';
import type { Constructor } from '../types/types.js';

export type ClassRef = Constructor;

export interface ClassSpace {
  /** Name used in diagnostics */
  readonly name: string;
  /**
   * Resolve a class by name.
   *
   * @returns undefined when the class is not visible in this space
   */
  resolveClass(className: string): ClassRef | undefined;
}

/**
 * Class space backed by an explicit name → class table.
 *
 * @example
 * ```typescript
 * const space = new ModuleClassSpace('billing', [Invoice, LedgerEntry]);
 * space.resolveClass('Invoice'); // → Invoice
 * ```
 */
export class ModuleClassSpace implements ClassSpace {
  private readonly classes = new Map<string, ClassRef>();

  constructor(
    readonly name: string,
    classes: Iterable<ClassRef> | Readonly<Record<string, ClassRef>> = []
  ) {
    if (isIterable(classes)) {
      for (const ref of classes) this.classes.set(classNameOf(ref), ref);
    } else {
      for (const [className, ref] of Object.entries(classes)) this.classes.set(className, ref);
    }
  }

  resolveClass(className: string): ClassRef | undefined {
    return this.classes.get(className);
  }
}

/**
 * Name under which a managed class is looked up in a class space.
 */
export function classNameOf(ref: ClassRef): string {
  return ref.name;
}

export type CompatibilityReport =
  | { readonly compatible: true }
  | { readonly compatible: false; readonly conflicts: readonly ClassConflict[] };

const COMPATIBLE: CompatibilityReport = Object.freeze({ compatible: true });

/**
 * Compare a handler's managed classes against a class space.
 *
 * A managed class the space cannot resolve is not a conflict: the module cannot
 * see that class, so it cannot hand the runtime a different copy of it.
 * `undefined` managed classes mean the handler asked for no checks.
 */
export function checkClassSpace(
  managedClasses: ReadonlySet<ClassRef> | undefined,
  classSpace: ClassSpace
): CompatibilityReport {
  if (managedClasses === undefined || managedClasses.size === 0) return COMPATIBLE;

  const conflicts: ClassConflict[] = [];
  for (const handlerClass of managedClasses) {
    const className = classNameOf(handlerClass);
    const moduleClass = classSpace.resolveClass(className);
    if (moduleClass !== undefined && moduleClass !== handlerClass) {
      conflicts.push({ className, handlerClass, moduleClass });
    }
  }
  return conflicts.length === 0 ? COMPATIBLE : { compatible: false, conflicts };
}

function isIterable(value: unknown): value is Iterable<ClassRef> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}
