/**
 * graphql-dsl
 *
 * Graph Surface Syntax
 *
 * Callers describe a query as nested arrays: the head of an array is the
 * object identifier, the remaining positional elements are its child fields,
 * and reserved tags (`ARGUMENTS`, `OPERATION_NAME`, `OPERATION_PARAMS`) may be
 * placed anywhere in the array, each followed by its value. This module
 * splits that syntax into metadata and positional elements and parses it into
 * the typed model of `types.ts`.
 *
 * @example
 * ```typescript
 * const graph = ['user', ARGUMENTS, { id: 1 }, 'name', ['friends', 'name']];
 * parseGraph(graph).fields.length; // 2
 * ```
 */

import { MalformedGraphError } from './errors.js';
import {
  type AliasIdentifier,
  type Argument,
  type ArgumentValue,
  type GraphNode,
  type NodeMetadata,
  type ObjectField,
  type ObjectIdentifier,
  type ParameterSpec,
  type TokenValue,
  isAliasIdentifier,
  isArgumentValue,
  isGraphNode,
  isRecord,
  isTokenValue,
  numberValue,
  stringValue,
  subQuery,
  token,
  variable,
} from './types.js';

export const OPERATION_NAME = Symbol('operation-name');
export const OPERATION_PARAMS = Symbol('operation-params');
export const ARGUMENTS = Symbol('arguments');

/** Marks a `[VARIABLE, name]` pair as a variable reference. */
export const VARIABLE = Symbol('variable');

export type MetadataTag = typeof OPERATION_NAME | typeof OPERATION_PARAMS | typeof ARGUMENTS;

export type RawAtom = string | number | TokenValue | AliasIdentifier;

export type RawVariableRef = readonly [typeof VARIABLE, string];

export type RawInputField = readonly [string, RawArgumentValue];

/**
 * Input object written as a plain object. Integer-like keys come first in
 * property order; use the `[key, value]` pair-list form when the exact order
 * of fields matters.
 */
export interface RawInputObject {
  readonly [name: string]: RawArgumentValue;
}

export type RawArgumentValue =
  | ArgumentValue
  | GraphNode
  | string
  | number
  | boolean
  | null
  | RawVariableRef
  | RawInputObject
  | readonly RawInputField[];

export type RawArguments = RawInputObject | readonly RawInputField[];

/**
 * `[name, type]`, `[name, type, required]` or `[name, type, null, default]`.
 */
export type RawParameterSpec =
  | readonly [string, string]
  | readonly [string, string, boolean]
  | readonly [string, string, null, RawArgumentValue];

export type RawElement =
  | GraphInput
  | MetadataTag
  | RawArguments
  | readonly (RawParameterSpec | ParameterSpec)[];

export type RawGraph = RawAtom | readonly RawElement[];

/** Anything `encode` accepts: surface syntax or an already-parsed node. */
export type GraphInput = RawGraph | GraphNode;

/**
 * Metadata and positional elements of one node.
 */
export interface ExtractedGraph {
  metadata: Map<MetadataTag, unknown>;
  graph: unknown[];
}

export function isMetadataTag(value: unknown): value is MetadataTag {
  return value === OPERATION_NAME || value === OPERATION_PARAMS || value === ARGUMENTS;
}

/**
 * Splits a node into its metadata and its positional graph.
 *
 * An atom yields no metadata and a single-element graph. A compound is
 * scanned left to right; each reserved tag takes the next element as its
 * value (the last one wins when a tag repeats) and every other element is
 * kept in its original relative order.
 *
 * @throws {MalformedGraphError} If a tag is the last element of the array
 */
export function extractMetadata(node: unknown): ExtractedGraph {
  const metadata = new Map<MetadataTag, unknown>();

  if (!Array.isArray(node)) {
    return { metadata, graph: [node] };
  }

  const graph: unknown[] = [];
  for (let i = 0; i < node.length; i++) {
    const element: unknown = node[i];
    if (isMetadataTag(element)) {
      if (i + 1 >= node.length) {
        throw new MalformedGraphError(`Metadata tag ${element.toString()} has no value`, node);
      }
      metadata.set(element, node[i + 1]);
      i++;
    } else {
      graph.push(element);
    }
  }

  return { metadata, graph };
}

/**
 * Parses the surface syntax into a {@link GraphNode}. Parsed nodes are
 * returned as they are.
 *
 * @throws {MalformedGraphError} If any part of the graph has no known shape
 */
export function parseGraph(input: GraphInput): GraphNode {
  return parseNode(input);
}

function parseNode(input: unknown): GraphNode {
  if (isGraphNode(input)) return input;

  const { metadata, graph } = extractMetadata(input);
  if (graph.length === 0) {
    throw new MalformedGraphError('Graph node has no object identifier', input);
  }

  const [head, ...children] = graph;
  return {
    kind: 'node',
    object: parseObjectIdentifier(head),
    metadata: parseMetadata(metadata),
    fields: children.map(parseNode),
  };
}

/**
 * Parses the head of a node.
 *
 * @throws {MalformedGraphError} If the head is not an atom
 */
export function parseObjectIdentifier(value: unknown): ObjectIdentifier {
  if (typeof value === 'string') return stringValue(value);
  if (typeof value === 'number') return numberValue(parseFiniteNumber(value));
  if (isTokenValue(value) || isAliasIdentifier(value)) return value;
  throw new MalformedGraphError(
    `Unencodable object identifier: ${describeValue(value)}`,
    value,
  );
}

function parseMetadata(metadata: Map<MetadataTag, unknown>): NodeMetadata {
  const result: {
    name?: string;
    arguments?: Argument[];
    parameters?: ParameterSpec[];
  } = {};

  if (metadata.has(OPERATION_NAME)) {
    const name = metadata.get(OPERATION_NAME);
    if (typeof name !== 'string') {
      throw new MalformedGraphError(
        `Operation name must be a string, got ${describeValue(name)}`,
        name,
      );
    }
    result.name = name;
  }

  if (metadata.has(ARGUMENTS)) {
    result.arguments = parseInputFields(metadata.get(ARGUMENTS));
  }

  if (metadata.has(OPERATION_PARAMS)) {
    const params = metadata.get(OPERATION_PARAMS);
    if (!Array.isArray(params)) {
      throw new MalformedGraphError(
        'Operation parameters must be an array of parameter specs',
        params,
      );
    }
    result.parameters = params.map(parseParameterSpec);
  }

  return result;
}

/**
 * Parses a `key -> value` collection, given as a plain object or as an array
 * of `[key, value]` pairs, keeping insertion order.
 *
 * @throws {MalformedGraphError} On a non-pair entry or a repeated key
 */
export function parseInputFields(value: unknown): ObjectField[] {
  const entries: (readonly [unknown, unknown])[] = [];

  if (Array.isArray(value)) {
    for (const entry of value) {
      if (!Array.isArray(entry) || entry.length !== 2) {
        throw new MalformedGraphError(
          `Input entries must be [key, value] pairs, got ${describeValue(entry)}`,
          entry,
        );
      }
      entries.push([entry[0], entry[1]]);
    }
  } else if (isRecord(value)) {
    entries.push(...Object.entries(value));
  } else {
    throw new MalformedGraphError(`Expected input fields, got ${describeValue(value)}`, value);
  }

  const seen = new Set<string>();
  return entries.map(([key, fieldValue]) => {
    if (typeof key !== 'string') {
      throw new MalformedGraphError(`Input key must be a string, got ${describeValue(key)}`, key);
    }
    if (seen.has(key)) {
      throw new MalformedGraphError(`Duplicate input key: ${key}`, value);
    }
    seen.add(key);
    return { name: key, value: parseArgumentValue(fieldValue) };
  });
}

/**
 * Parses one argument value. The first matching shape wins:
 *
 * 1. a bare token (`token('X')`, `true`, `false`, `null`)
 * 2. a variable reference (`variable('id')` or `[VARIABLE, 'id']`)
 * 3. any other compound: a nested input object
 * 4. a string
 * 5. a number
 * 6. a graph node, embedded as a sub-query
 *
 * Values already in parsed form are returned unchanged.
 *
 * @throws {MalformedGraphError} If the value matches none of these
 */
export function parseArgumentValue(value: unknown): ArgumentValue {
  if (isArgumentValue(value)) return value;
  if (typeof value === 'boolean') return token(String(value));
  if (value === null) return token('null');
  if (isVariableRef(value)) return variable(value[1]);
  if (Array.isArray(value) || (isRecord(value) && !isGraphNode(value))) {
    return { kind: 'object', fields: parseInputFields(value) };
  }
  if (typeof value === 'string') return stringValue(value);
  if (typeof value === 'number') return numberValue(parseFiniteNumber(value));
  if (isGraphNode(value)) return subQuery(value);
  throw new MalformedGraphError(`Unencodable argument value: ${describeValue(value)}`, value);
}

/**
 * Parses a parameter spec. The shape decides the meaning, never the values:
 * a 3-element spec is `[name, type, required]` with no default, and a
 * 4-element spec is `[name, type, _, default]` with no required flag.
 *
 * @throws {MalformedGraphError} On any other arity or a non-string name or type
 */
export function parseParameterSpec(value: unknown): ParameterSpec {
  if (isRecord(value) && typeof value.name === 'string' && typeof value.type === 'string') {
    return {
      name: value.name,
      type: value.type,
      required: value.required === true,
      ...(value.defaultValue === undefined
        ? {}
        : { defaultValue: parseArgumentValue(value.defaultValue) }),
    };
  }

  if (!Array.isArray(value) || value.length < 2 || value.length > 4) {
    throw new MalformedGraphError(`Unreadable parameter spec: ${describeValue(value)}`, value);
  }

  const [name, type] = value;
  if (typeof name !== 'string' || typeof type !== 'string') {
    throw new MalformedGraphError('Parameter name and type must be strings', value);
  }

  if (value.length === 4) {
    return { name, type, required: false, defaultValue: parseArgumentValue(value[3]) };
  }
  return { name, type, required: value.length === 3 && Boolean(value[2]) };
}

function isVariableRef(value: unknown): value is RawVariableRef {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value[0] === VARIABLE &&
    typeof value[1] === 'string'
  );
}

function parseFiniteNumber(value: number): number {
  if (!Number.isFinite(value)) {
    throw new MalformedGraphError(`Cannot encode non-finite number ${value}`, value);
  }
  return value;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array of ${value.length}`;
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}
