/**
 * graphql-dsl
 *
 * Response Simplifier Module
 *
 * Collapses the connection idiom of paginated GraphQL responses. An entry
 * whose value holds nothing but an `edges` list is replaced by the list of
 * the edges' `node` values.
 *
 * @example
 * ```typescript
 * simplifyResponseEdges({
 *   repositories: { edges: [{ node: { name: 'a' } }, { node: { name: 'b' } }] },
 * });
 * // { repositories: [{ name: 'a' }, { name: 'b' }] }
 * ```
 */

import { isRecord } from './types.js';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

interface Edge extends JsonObject {
  readonly node: JsonValue;
}

/**
 * Removes every `edges`/`node` wrapper from a response tree.
 *
 * Scalars are returned unchanged, arrays and objects are rebuilt with their
 * order kept. A wrapper only collapses when it is the value of an object
 * entry and `edges` is its only key; edges may carry other keys such as
 * `cursor`, which are dropped. A wrapper at the root is left in place.
 *
 * @param tree - A decoded response (usually the `data` member)
 * @returns A new tree; the input is not modified
 */
export function simplifyResponseEdges(tree: JsonValue): JsonValue {
  if (isJsonArray(tree)) {
    return tree.map(simplifyResponseEdges);
  }

  if (!isJsonObject(tree)) {
    return tree;
  }

  // fromEntries defines own properties, so a "__proto__" key is copied
  return Object.fromEntries(
    Object.entries(tree).map(([key, value]): [string, JsonValue] => [key, simplifyEntry(value)]),
  );
}

function simplifyEntry(value: JsonValue): JsonValue {
  const nodes = unwrapEdges(value);
  if (nodes) return nodes.map(simplifyResponseEdges);
  if (isJsonArray(value) || isJsonObject(value)) return simplifyResponseEdges(value);
  return value;
}

/**
 * Returns the `node` values of a wrapper, or undefined when `value` is not one.
 */
function unwrapEdges(value: JsonValue): JsonValue[] | undefined {
  if (!isJsonObject(value)) return undefined;

  const keys = Object.keys(value);
  if (keys.length !== 1 || keys[0] !== 'edges') return undefined;

  const edges = value.edges;
  if (!isJsonArray(edges)) return undefined;

  const nodes: JsonValue[] = [];
  for (const edge of edges) {
    if (!isEdge(edge)) return undefined;
    nodes.push(edge.node);
  }
  return nodes;
}

function isEdge(value: JsonValue): value is Edge {
  return isJsonObject(value) && Object.prototype.hasOwnProperty.call(value, 'node');
}

function isJsonArray(value: JsonValue): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return isRecord(value);
}
