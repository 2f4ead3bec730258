/**
 * graphql-dsl
 *
 * Query Builder Module
 *
 * Encodes graphs into GraphQL text. This is the core functionality of the
 * package: every other entry point ends up in {@link encode}.
 *
 * The emitted text carries no insignificant whitespace. Segments of a node
 * are always emitted in the same order and are left out entirely when their
 * data is absent:
 *
 * ```text
 * object [ "name"] [(arguments)] [(parameters)] [{fields}]
 * ```
 */

import { type GraphInput, parseGraph } from './graph.js';
import type {
  Argument,
  ArgumentValue,
  GraphNode,
  ObjectIdentifier,
  ParameterSpec,
} from './types.js';

/**
 * Encodes a graph into GraphQL text.
 *
 * @param graph - Surface syntax or an already-parsed node
 * @returns The encoded text
 * @throws {MalformedGraphError} If the graph contains an unencodable shape
 *
 * @example
 * ```typescript
 * encode('viewer'); // 'viewer'
 * encode(['viewer', 'login']); // 'viewer{login}'
 * encode([ARGUMENTS, { id: 1 }, 'user', 'name']); // 'user(id:1){name}'
 * ```
 */
export function encode(graph: GraphInput): string {
  return encodeNode(parseGraph(graph));
}

/**
 * Encodes a parsed node and, recursively, its child fields.
 */
export function encodeNode(node: GraphNode): string {
  const { metadata } = node;
  let text = encodeObjectIdentifier(node.object);

  if (metadata.name !== undefined) {
    text += ` "${metadata.name}"`;
  }

  if (metadata.arguments) {
    text += `(${metadata.arguments.map(encodeArgument).join(',')})`;
  }

  if (metadata.parameters) {
    text += `(${metadata.parameters.map(encodeParameterSpec).join(',')})`;
  }

  if (node.fields.length > 0) {
    text += `{${node.fields.map(encodeNode).join(' ')}}`;
  }

  return text;
}

/**
 * Renders the head of a node. Strings are not quoted here, unlike string
 * argument values. An alias renders as its primary name only.
 */
export function encodeObjectIdentifier(identifier: ObjectIdentifier): string {
  switch (identifier.kind) {
    case 'token':
      return identifier.text;
    case 'string':
      return identifier.value;
    case 'number':
      return String(identifier.value);
    case 'alias':
      return identifier.name;
  }
}

/**
 * Renders an argument as `name:value`.
 */
export function encodeArgument(argument: Argument): string {
  return `${argument.name}:${encodeArgumentValue(argument.value)}`;
}

/**
 * Renders an argument value.
 *
 * Strings are wrapped in double quotes as they are: embedded quotes and
 * backslashes are not escaped. Numbers use `String(n)`, so very large or very
 * small values come out in exponent form (`1e+21`, `1e-7`); GraphQL's parser
 * rejects the `e+` form.
 */
export function encodeArgumentValue(value: ArgumentValue): string {
  switch (value.kind) {
    case 'token':
      return value.text;
    case 'variable':
      return `$${value.name}`;
    case 'object':
      return `{${value.fields.map(encodeArgument).join(',')}}`;
    case 'string':
      return `"${value.value}"`;
    case 'number':
      return String(value.value);
    case 'subquery':
      return encodeNode(value.graph);
  }
}

/**
 * Renders an operation variable declaration: `$name:Type`, then `!` when
 * required, then `=default` when a default is given.
 *
 * @example
 * ```typescript
 * encodeParameterSpec({
 *   name: 'first',
 *   type: 'Int',
 *   required: false,
 *   defaultValue: numberValue(10),
 * });
 * // '$first:Int=10'
 * ```
 */
export function encodeParameterSpec(spec: ParameterSpec): string {
  let text = `$${spec.name}:${spec.type}`;
  if (spec.required) text += '!';
  if (spec.defaultValue !== undefined) text += `=${encodeArgumentValue(spec.defaultValue)}`;
  return text;
}
