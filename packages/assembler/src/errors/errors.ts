import {
  describeNode,
  formatLocation,
  type DocumentNode,
  type SourceLocation,
} from '../document/nodes.js';
import type { InvocationMode } from '../types/types.js';

const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

export type ParseErrorCode =
  | 'UnresolvedNamespace'
  | 'IncompatibleHandler'
  | 'DuplicateIdentifier'
  | 'HandlerInvocationFailure'
  | 'MalformedDeclaration';

/**
 * Where in the document a parse error was raised.
 */
export interface NodeReference {
  /** Output of {@link describeNode}, e.g. `<{urn:cache}region>` */
  readonly description: string;
  readonly location?: SourceLocation;
  /** Document name, for nodes the tokenizer gave no location */
  readonly source?: string;
}

export function referenceOf(node: DocumentNode, source?: string): NodeReference {
  return { description: describeNode(node), location: node.location, source };
}

const at = (ref: NodeReference): string => {
  const loc = formatLocation(ref.location) ?? ref.source;
  return loc ? `${ref.description} at ${loc}` : ref.description;
};

/**
 * Base class of every error that aborts a parse session.
 *
 * The session is discarded when one of these is thrown; no part of the graph
 * reaches the runtime.
 */
export abstract class ParseError extends Error {
  abstract readonly code: ParseErrorCode;

  constructor(
    message: string,
    public readonly node: NodeReference,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class UnresolvedNamespaceError extends ParseError {
  readonly code = 'UnresolvedNamespace';

  constructor(
    public readonly namespace: string,
    node: NodeReference
  ) {
    const dev = [
      `No namespace handler is registered for '${namespace}'.`,
      '',
      `Found while parsing ${at(node)}.`,
      '',
      'An unrecognized namespace almost always means an extension module is missing.',
      '',
      'To fix this:',
      `  1. Deploy the module that provides a handler for '${namespace}'`,
      `  2. Register it: registry.register('${namespace}', handler)`,
      '  3. Check the namespace URI in the document for typos',
    ];
    super(format(`No namespace handler for '${namespace}' (${at(node)}).`, dev), node);
    this.name = 'UnresolvedNamespaceError';
  }
}

/**
 * A managed class of the handler resolves to a different class in the
 * module's class space.
 */
export interface ClassConflict {
  readonly className: string;
  readonly handlerClass: unknown;
  readonly moduleClass: unknown;
}

export class IncompatibleHandlerError extends ParseError {
  readonly code = 'IncompatibleHandler';

  constructor(
    public readonly namespace: string,
    public readonly classSpace: string,
    public readonly conflicts: readonly ClassConflict[],
    node: NodeReference
  ) {
    const names = conflicts.map((c) => c.className);
    const dev = [
      `Namespace handler for '${namespace}' is incompatible with class space '${classSpace}'.`,
      '',
      `Found while parsing ${at(node)}.`,
      '',
      'These managed classes resolve to a different class in the module than in the handler:',
      ...names.map((n) => `  - ${n}`),
      '',
      'Metadata built against the wrong class would corrupt instantiation, so the handler',
      'was not invoked.',
      '',
      'To fix this:',
      '  1. Make the module and the handler share one copy of these classes',
      '  2. Or register a handler built against the module’s copy',
    ];
    super(
      format(
        `Handler for '${namespace}' is incompatible with '${classSpace}': ${names.join(', ')}.`,
        dev
      ),
      node
    );
    this.name = 'IncompatibleHandlerError';
  }
}

export class DuplicateIdentifierError extends ParseError {
  readonly code = 'DuplicateIdentifier';

  constructor(
    public readonly id: string,
    node: NodeReference,
    public readonly existing?: NodeReference
  ) {
    const dev = [
      `Component id '${id}' is already declared.`,
      '',
      `Duplicate declaration: ${at(node)}`,
      ...(existing ? [`First declaration:     ${at(existing)}`] : []),
      '',
      'Component ids must be unique across the whole document.',
      'Handlers that need fresh ids should call context.generateId().',
    ];
    super(format(`Duplicate component id '${id}' (${at(node)}).`, dev), node);
    this.name = 'DuplicateIdentifierError';
  }
}

export class HandlerInvocationError extends ParseError {
  readonly code = 'HandlerInvocationFailure';

  constructor(
    public readonly namespace: string,
    public readonly mode: InvocationMode,
    node: NodeReference,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const dev = [
      `Namespace handler for '${namespace}' failed in ${mode}().`,
      '',
      `Node: ${at(node)}`,
      `Reason: ${reason}`,
      '',
      "See 'cause' for the original error.",
    ];
    super(format(`Handler for '${namespace}' failed in ${mode}() (${at(node)}).`, dev), node, {
      cause,
    });
    this.name = 'HandlerInvocationError';
  }
}

export class MalformedDeclarationError extends ParseError {
  readonly code = 'MalformedDeclaration';

  constructor(
    public readonly reason: string,
    node: NodeReference
  ) {
    const dev = [`Malformed declaration ${at(node)}`, '', `  ${reason}`];
    super(format(`Malformed declaration ${at(node)}: ${reason}`, dev), node);
    this.name = 'MalformedDeclarationError';
  }
}

export class InvalidParserConfigError extends Error {
  constructor(public readonly reason: string) {
    const dev = ['Invalid parser configuration', '', `Invalid parser configuration: ${reason}`];
    super(format(`Invalid parser configuration: ${reason}`, dev));
    this.name = 'InvalidParserConfigError';
  }
}

export class InvalidHandlerRegistrationError extends Error {
  constructor(public readonly reason: string) {
    const dev = [
      'Invalid namespace handler registration',
      '',
      reason,
      '',
      'A handler must implement parse(), decorate(), getSchemaLocation() and',
      'getManagedClasses(), and be bound to at least one non-empty namespace URI.',
    ];
    super(format(`Invalid namespace handler registration: ${reason}`, dev));
    this.name = 'InvalidHandlerRegistrationError';
  }
}

/**
 * Raised when metadata is edited after its graph was published.
 */
export class SealedMetadataError extends Error {
  constructor(public readonly description: string) {
    const dev = [
      `Metadata ${description} is sealed.`,
      '',
      'The graph was handed to the runtime when the parse completed. Handlers must not',
      'keep references to metadata beyond the parse pass that gave them out.',
    ];
    super(format(`Metadata ${description} is sealed.`, dev));
    this.name = 'SealedMetadataError';
  }
}

/**
 * Raised when a handler keeps a parser context and uses it after the parse
 * that created it has finished.
 */
export class ParseSessionClosedError extends Error {
  constructor() {
    const dev = [
      'Parse session closed',
      '',
      'This parser context belongs to a parse that has already completed or failed.',
      'Contexts are only valid during the handler call they were passed to.',
    ];
    super(format('Parser context used after its parse session closed.', dev));
    this.name = 'ParseSessionClosedError';
  }
}
