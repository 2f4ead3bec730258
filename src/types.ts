/**
 * graphql-dsl
 *
 * Graph Model
 *
 * The parsed form of a graph: closed tagged variants for object identifiers
 * and argument values, parameter specs, and graph nodes. Every encoder
 * matches on `kind`; the surface syntax in `graph.ts` is parsed into these
 * types exactly once.
 */

/**
 * A bare token rendered as its literal text (enum values, `true`, `null`).
 */
export interface TokenValue {
  readonly kind: 'token';
  readonly text: string;
}

/**
 * A reference to an operation variable, rendered as `$name`.
 */
export interface VariableValue {
  readonly kind: 'variable';
  readonly name: string;
}

/**
 * One `key:value` entry of a nested input object.
 */
export interface ObjectField {
  readonly name: string;
  readonly value: ArgumentValue;
}

/**
 * A nested input object. Field names are unique and keep insertion order.
 */
export interface ObjectValue {
  readonly kind: 'object';
  readonly fields: readonly ObjectField[];
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

/**
 * A whole graph embedded as an argument value.
 */
export interface SubQueryValue {
  readonly kind: 'subquery';
  readonly graph: GraphNode;
}

/**
 * A field name with an alias. Only `name` is rendered; the alias is dropped.
 */
export interface AliasIdentifier {
  readonly kind: 'alias';
  readonly name: string;
  readonly alias: string;
}

export type ArgumentValue =
  | TokenValue
  | VariableValue
  | ObjectValue
  | StringValue
  | NumberValue
  | SubQueryValue;

export type ObjectIdentifier = TokenValue | StringValue | NumberValue | AliasIdentifier;

/**
 * A field argument: `name:value`.
 */
export interface Argument {
  readonly name: string;
  readonly value: ArgumentValue;
}

/**
 * Declaration of an operation variable: `$name:Type!=default`.
 */
export interface ParameterSpec {
  readonly name: string;
  readonly type: string;
  /** Rendered as a trailing `!` */
  readonly required: boolean;
  /** Rendered after `=` when present */
  readonly defaultValue?: ArgumentValue;
}

/**
 * Out-of-band modifiers of a node. Each one is emitted only when present.
 */
export interface NodeMetadata {
  /** Operation name, always rendered quoted */
  readonly name?: string;
  readonly arguments?: readonly Argument[];
  readonly parameters?: readonly ParameterSpec[];
}

/**
 * One field or object of a query, with its metadata and child fields.
 */
export interface GraphNode {
  readonly kind: 'node';
  readonly object: ObjectIdentifier;
  readonly metadata: NodeMetadata;
  readonly fields: readonly GraphNode[];
}

export function token(text: string): TokenValue {
  return { kind: 'token', text };
}

export function variable(name: string): VariableValue {
  return { kind: 'variable', name };
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function numberValue(value: number): NumberValue {
  return { kind: 'number', value };
}

export function alias(name: string, aliasName: string): AliasIdentifier {
  return { kind: 'alias', name, alias: aliasName };
}

export function subQuery(graph: GraphNode): SubQueryValue {
  return { kind: 'subquery', graph };
}

/**
 * Type guard for parsed graph nodes.
 *
 * @example
 * ```typescript
 * const node = isGraphNode(input) ? input : parseGraph(input);
 * ```
 */
export function isGraphNode(value: unknown): value is GraphNode {
  return isRecord(value) && value.kind === 'node' && Array.isArray(value.fields);
}

/**
 * Type guard for parsed argument values. Checks the payload of each variant,
 * so a plain input object that merely has a `kind` key is not mistaken for one.
 */
export function isArgumentValue(value: unknown): value is ArgumentValue {
  if (!isRecord(value)) return false;
  switch (value.kind) {
    case 'token':
      return typeof value.text === 'string';
    case 'variable':
      return typeof value.name === 'string';
    case 'object':
      return Array.isArray(value.fields);
    case 'string':
      return typeof value.value === 'string';
    case 'number':
      return typeof value.value === 'number';
    case 'subquery':
      return isGraphNode(value.graph);
    default:
      return false;
  }
}

export function isTokenValue(value: unknown): value is TokenValue {
  return isRecord(value) && value.kind === 'token' && typeof value.text === 'string';
}

export function isAliasIdentifier(value: unknown): value is AliasIdentifier {
  return (
    isRecord(value) &&
    value.kind === 'alias' &&
    typeof value.name === 'string' &&
    typeof value.alias === 'string'
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
