/*
 * Metadata model
 * --------------
 * Read-only views (interfaces) handed to the runtime, and the mutable classes
 * behind them that handlers edit during a parse.
 *
 * Every node the engine produces is an instance of one of the Mutable* classes
 * below, created through createMetadata(); a handler that receives a
 * ComponentMetadata during decoration can therefore edit it in place instead of
 * returning a replacement. When the parse completes the graph is sealed: any
 * later mutation throws SealedMetadataError.
 */
import { SealedMetadataError } from '../errors/errors.js';
import { Activation, Lifecycle, type ActivationType, type LifecycleType } from '../types/types.js';

export type MetadataKind = 'component' | 'value' | 'ref' | 'collection' | 'null';

/**
 * Root of everything the parser can produce.
 */
export interface Metadata {
  readonly kind: MetadataKind;
}

export interface ValueMetadata extends Metadata {
  readonly kind: 'value';
  /** Raw string value; conversion is the runtime's job */
  readonly value: string;
  /** Optional target type name */
  readonly type?: string;
}

export interface RefMetadata extends Metadata {
  readonly kind: 'ref';
  /** Id of the referenced top-level component */
  readonly componentId: string;
}

export interface NullMetadata extends Metadata {
  readonly kind: 'null';
}

export type CollectionClass = 'list' | 'set' | 'array';

export interface CollectionMetadata extends Metadata {
  readonly kind: 'collection';
  readonly collectionClass: CollectionClass;
  readonly valueType?: string;
  readonly values: readonly Metadata[];
}

/**
 * Constructor or factory-method argument.
 *
 * `index` is the explicit position when the document gives one; otherwise
 * declaration order applies.
 */
export interface ArgumentMetadata {
  readonly index?: number;
  readonly type?: string;
  readonly value: Metadata;
}

export interface ComponentMetadata extends Metadata {
  readonly kind: 'component';
  readonly id: string;
  readonly scope: LifecycleType;
  readonly activation: ActivationType;
  readonly className?: string;
  readonly dependsOn: readonly string[];
  readonly initMethod?: string;
  readonly destroyMethod?: string;
  readonly factoryMethod?: string;
  readonly factoryComponent?: Metadata;
  /** Properties in first-declaration order */
  readonly properties: ReadonlyMap<string, Metadata>;
  readonly arguments: readonly ArgumentMetadata[];
  getProperty(name: string): Metadata | undefined;
}

abstract class MutableNode {
  private sealed = false;

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Freeze this node (and, for containers, everything under it).
   *
   * @internal Called by the engine when the graph is published.
   */
  seal(): void {
    this.sealed = true;
  }

  protected assertMutable(): void {
    if (this.sealed) throw new SealedMetadataError(this.describe());
  }

  protected abstract describe(): string;
}

export class MutableValueMetadata extends MutableNode implements ValueMetadata {
  readonly kind = 'value';
  private _value = '';
  private _type?: string;

  get value(): string {
    return this._value;
  }

  set value(value: string) {
    this.assertMutable();
    this._value = value;
  }

  get type(): string | undefined {
    return this._type;
  }

  set type(type: string | undefined) {
    this.assertMutable();
    this._type = type;
  }

  protected describe(): string {
    return `value '${this._value}'`;
  }
}

export class MutableRefMetadata extends MutableNode implements RefMetadata {
  readonly kind = 'ref';
  private _componentId = '';

  get componentId(): string {
    return this._componentId;
  }

  set componentId(id: string) {
    this.assertMutable();
    this._componentId = id;
  }

  protected describe(): string {
    return `ref '${this._componentId}'`;
  }
}

export class MutableNullMetadata extends MutableNode implements NullMetadata {
  readonly kind = 'null';

  protected describe(): string {
    return 'null';
  }
}

export class MutableCollectionMetadata extends MutableNode implements CollectionMetadata {
  readonly kind = 'collection';
  private _collectionClass: CollectionClass = 'list';
  private _valueType?: string;
  private readonly _values: Metadata[] = [];

  get collectionClass(): CollectionClass {
    return this._collectionClass;
  }

  set collectionClass(value: CollectionClass) {
    this.assertMutable();
    this._collectionClass = value;
  }

  get valueType(): string | undefined {
    return this._valueType;
  }

  set valueType(value: string | undefined) {
    this.assertMutable();
    this._valueType = value;
  }

  get values(): readonly Metadata[] {
    return this._values;
  }

  addValue(value: Metadata): void {
    this.assertMutable();
    this._values.push(value);
  }

  removeValue(value: Metadata): boolean {
    this.assertMutable();
    const i = this._values.indexOf(value);
    if (i < 0) return false;
    this._values.splice(i, 1);
    return true;
  }

  override seal(): void {
    if (this.isSealed) return;
    super.seal();
    for (const v of this._values) sealMetadata(v);
  }

  protected describe(): string {
    return `${this._collectionClass} collection`;
  }
}

/**
 * Editable component node.
 *
 * Property writes are idempotent per name: the last write wins and the
 * property keeps the position of its first declaration. Arguments keep their
 * declaration order.
 */
export class MutableComponentMetadata extends MutableNode implements ComponentMetadata {
  readonly kind = 'component';
  private _id = '';
  private _scope: LifecycleType = Lifecycle.Singleton;
  private _activation: ActivationType = Activation.Eager;
  private _className?: string;
  private _initMethod?: string;
  private _destroyMethod?: string;
  private _factoryMethod?: string;
  private _factoryComponent?: Metadata;
  private readonly _dependsOn: string[] = [];
  private readonly _properties = new Map<string, Metadata>();
  private readonly _arguments: ArgumentMetadata[] = [];

  get id(): string {
    return this._id;
  }

  set id(id: string) {
    this.assertMutable();
    this._id = id;
  }

  get scope(): LifecycleType {
    return this._scope;
  }

  set scope(scope: LifecycleType) {
    this.assertMutable();
    this._scope = scope;
  }

  get activation(): ActivationType {
    return this._activation;
  }

  set activation(activation: ActivationType) {
    this.assertMutable();
    this._activation = activation;
  }

  get className(): string | undefined {
    return this._className;
  }

  set className(name: string | undefined) {
    this.assertMutable();
    this._className = name;
  }

  get initMethod(): string | undefined {
    return this._initMethod;
  }

  set initMethod(name: string | undefined) {
    this.assertMutable();
    this._initMethod = name;
  }

  get destroyMethod(): string | undefined {
    return this._destroyMethod;
  }

  set destroyMethod(name: string | undefined) {
    this.assertMutable();
    this._destroyMethod = name;
  }

  get factoryMethod(): string | undefined {
    return this._factoryMethod;
  }

  set factoryMethod(name: string | undefined) {
    this.assertMutable();
    this._factoryMethod = name;
  }

  get factoryComponent(): Metadata | undefined {
    return this._factoryComponent;
  }

  set factoryComponent(value: Metadata | undefined) {
    this.assertMutable();
    this._factoryComponent = value;
  }

  get dependsOn(): readonly string[] {
    return this._dependsOn;
  }

  addDependsOn(id: string): void {
    this.assertMutable();
    if (!this._dependsOn.includes(id)) this._dependsOn.push(id);
  }

  removeDependsOn(id: string): void {
    this.assertMutable();
    const i = this._dependsOn.indexOf(id);
    if (i >= 0) this._dependsOn.splice(i, 1);
  }

  get properties(): ReadonlyMap<string, Metadata> {
    return this._properties;
  }

  getProperty(name: string): Metadata | undefined {
    return this._properties.get(name);
  }

  setProperty(name: string, value: Metadata): void {
    this.assertMutable();
    // Map.set on an existing key keeps its insertion position.
    this._properties.set(name, value);
  }

  removeProperty(name: string): boolean {
    this.assertMutable();
    return this._properties.delete(name);
  }

  get arguments(): readonly ArgumentMetadata[] {
    return this._arguments;
  }

  /**
   * Append an argument.
   *
   * @returns false when `index` is already used by another argument
   */
  addArgument(argument: ArgumentMetadata): boolean {
    this.assertMutable();
    if (argument.index !== undefined && this._arguments.some((a) => a.index === argument.index)) {
      return false;
    }
    this._arguments.push(Object.freeze({ ...argument }));
    return true;
  }

  removeArgument(argument: ArgumentMetadata): boolean {
    this.assertMutable();
    const i = this._arguments.indexOf(argument);
    if (i < 0) return false;
    this._arguments.splice(i, 1);
    return true;
  }

  override seal(): void {
    if (this.isSealed) return;
    super.seal();
    if (this._factoryComponent) sealMetadata(this._factoryComponent);
    for (const value of this._properties.values()) sealMetadata(value);
    for (const arg of this._arguments) sealMetadata(arg.value);
  }

  protected describe(): string {
    return `component '${this._id}'`;
  }
}

export type MutableMetadata =
  | MutableComponentMetadata
  | MutableValueMetadata
  | MutableRefMetadata
  | MutableCollectionMetadata
  | MutableNullMetadata;

export interface MutableMetadataByKind {
  component: MutableComponentMetadata;
  value: MutableValueMetadata;
  ref: MutableRefMetadata;
  collection: MutableCollectionMetadata;
  null: MutableNullMetadata;
}

export function isMutableMetadata(value: unknown): value is MutableMetadata {
  return value instanceof MutableNode;
}

export function isMutableComponent(value: unknown): value is MutableComponentMetadata {
  return value instanceof MutableComponentMetadata;
}

/**
 * Seal a node if it is one of ours. Foreign Metadata implementations are left
 * as they are.
 */
export function sealMetadata(node: Metadata): void {
  if (node instanceof MutableNode) node.seal();
}
