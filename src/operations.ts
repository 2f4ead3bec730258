/**
 * graphql-dsl
 *
 * Operations Module
 *
 * `query` and `mutation` wrap a graph under the operation keyword, attach the
 * operation name and variable declarations, and encode the result.
 */

import { encodeNode } from './builder.js';
import { MalformedOperationError } from './errors.js';
import { type GraphInput, type RawParameterSpec, parseGraph, parseParameterSpec } from './graph.js';
import type { NodeMetadata, ParameterSpec } from './types.js';
import { token } from './types.js';

export type OperationType = 'query' | 'mutation';

/**
 * The optional first argument of an operation: `[name]` or `[name, parameters]`.
 */
export type OperationHeader =
  | readonly [string]
  | readonly [string, readonly (RawParameterSpec | ParameterSpec)[]];

/**
 * Encodes a query operation.
 *
 * @throws {MalformedOperationError} If the call shape is not one of the three below
 * @throws {MalformedGraphError} If the graph cannot be encoded
 *
 * @example
 * ```typescript
 * query(['viewer', 'login']);
 * // 'query{viewer{login}}'
 *
 * query(['Viewer'], ['viewer', 'login']);
 * // 'query "Viewer"{viewer{login}}'
 *
 * query(
 *   ['Repo', [['owner', 'String', true]]],
 *   [ARGUMENTS, { owner: variable('owner') }, 'repository', 'name'],
 * );
 * // 'query "Repo"($owner:String!){repository(owner:$owner){name}}'
 * ```
 */
export function query(graph: GraphInput): string;
export function query(header: OperationHeader, graph: GraphInput): string;
export function query(...args: GraphInput[]): string {
  return encodeOperation('query', args);
}

/**
 * Encodes a mutation operation. Accepts the same call shapes as {@link query}.
 *
 * @example
 * ```typescript
 * mutation(
 *   ['Star', [['id', 'ID', true]]],
 *   [ARGUMENTS, { input: { starrableId: variable('id') } }, 'addStar', ['starrable', 'id']],
 * );
 * // 'mutation "Star"($id:ID!){addStar(input:{starrableId:$id}){starrable{id}}}'
 * ```
 */
export function mutation(graph: GraphInput): string;
export function mutation(header: OperationHeader, graph: GraphInput): string;
export function mutation(...args: GraphInput[]): string {
  return encodeOperation('mutation', args);
}

function encodeOperation(operation: OperationType, args: readonly GraphInput[]): string {
  if (args.length === 1) {
    return encodeNode({
      kind: 'node',
      object: token(operation),
      metadata: {},
      fields: [parseGraph(args[0])],
    });
  }

  if (args.length === 2) {
    const [header, graph] = args;
    return encodeNode({
      kind: 'node',
      object: token(operation),
      metadata: parseHeader(operation, header),
      fields: [parseGraph(graph)],
    });
  }

  throw new MalformedOperationError(
    `${operation} expects (graph), ([name], graph) or ([name, parameters], graph); got ${args.length} arguments`,
    operation,
  );
}

function parseHeader(operation: OperationType, header: unknown): NodeMetadata {
  if (!Array.isArray(header) || typeof header[0] !== 'string') {
    throw new MalformedOperationError(
      `${operation} header must be [name] or [name, parameters]`,
      operation,
    );
  }

  if (header.length === 1) {
    return { name: header[0] };
  }

  const parameters: unknown = header[1];
  if (header.length === 2 && Array.isArray(parameters)) {
    return { name: header[0], parameters: parameters.map(parseParameterSpec) };
  }

  throw new MalformedOperationError(
    `${operation} header must be [name] or [name, parameters]`,
    operation,
  );
}
