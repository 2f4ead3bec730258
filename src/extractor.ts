/**
 * graphql-dsl
 *
 * Resolver Bridge Module
 *
 * Turns the selection a resolver received into a graph, so a server can
 * forward exactly the requested fields to an upstream GraphQL service.
 * Uses graphql-parse-resolve-info for reliable AST parsing.
 */

import type { GraphQLResolveInfo } from 'graphql';
import {
  type FieldsByTypeName,
  parseResolveInfo,
  type ResolveTree,
} from 'graphql-parse-resolve-info';
import { type RawArguments, parseInputFields } from './graph.js';
import type { GraphNode, NodeMetadata, ObjectIdentifier } from './types.js';
import { alias, stringValue } from './types.js';

/**
 * Options for building a graph from resolver info.
 */
export interface ExtractionOptions {
  /** Maximum depth of child fields to keep (default: 10) */
  maxDepth?: number;
  /** Fields to leave out */
  excludeFields?: string[];
  /** Whether to keep __typename fields (default: false) */
  includeTypename?: boolean;
  /** Arguments to attach to the root node, e.g. `{ id: variable('id') }` */
  rootArguments?: RawArguments;
}

type ResolvedOptions = Required<Omit<ExtractionOptions, 'rootArguments'>>;

const DEFAULT_OPTIONS: ResolvedOptions = {
  maxDepth: 10,
  excludeFields: [],
  includeTypename: false,
};

/**
 * Builds a graph from a GraphQL resolver's info argument.
 *
 * Client arguments are not copied: they arrive as resolved values, with
 * enums already turned into their internal values. Pass the upstream
 * arguments through `rootArguments` instead. Fields selected on several
 * types of an abstract field are merged, first occurrence first.
 *
 * @param info - The GraphQL resolver info object
 * @param options - Extraction options
 * @returns The graph, or null when the info could not be parsed
 *
 * @example
 * ```typescript
 * const resolver = async (parent, args, context, info) => {
 *   const graph = graphFromResolveInfo(info, { rootArguments: { id: variable('id') } });
 *   const text = query(['User', [['id', 'ID', true]]], graph);
 * };
 * ```
 */
export function graphFromResolveInfo(
  info: GraphQLResolveInfo,
  options: ExtractionOptions = {},
): GraphNode | null {
  const { rootArguments, ...rest } = options;
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...rest };

  const parsed = parseResolveInfo(info);
  if (!parsed || !isResolveTree(parsed)) {
    return null;
  }

  const metadata: NodeMetadata =
    rootArguments === undefined ? {} : { arguments: parseInputFields(rootArguments) };

  return {
    kind: 'node',
    object: identifierFor(parsed),
    metadata,
    fields: convertFieldsByTypeName(parsed.fieldsByTypeName, 1, opts),
  };
}

function convertFieldsByTypeName(
  fieldsByTypeName: FieldsByTypeName,
  depth: number,
  options: ResolvedOptions,
): GraphNode[] {
  if (depth > options.maxDepth) return [];

  const fields = new Map<string, GraphNode>();

  for (const typeFields of Object.values(fieldsByTypeName)) {
    for (const [key, fieldTree] of Object.entries(typeFields)) {
      if (fields.has(key)) continue;
      if (fieldTree.name === '__typename' && !options.includeTypename) continue;
      if (options.excludeFields.includes(fieldTree.name)) continue;

      fields.set(key, {
        kind: 'node',
        object: identifierFor(fieldTree),
        metadata: {},
        fields: convertFieldsByTypeName(fieldTree.fieldsByTypeName, depth + 1, options),
      });
    }
  }

  return [...fields.values()];
}

function identifierFor(tree: ResolveTree): ObjectIdentifier {
  return tree.alias && tree.alias !== tree.name
    ? alias(tree.name, tree.alias)
    : stringValue(tree.name);
}

function isResolveTree(value: ResolveTree | FieldsByTypeName): value is ResolveTree {
  return typeof value.name === 'string' && typeof value.fieldsByTypeName === 'object';
}
