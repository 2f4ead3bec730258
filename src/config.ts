/**
 * graphql-dsl
 *
 * Configuration Module
 *
 * Validation limits for graphs: depth, field count and blocked fields. The
 * library keeps no global configuration; options are passed per call and
 * resolved against the defaults below.
 */

import { encodeObjectIdentifier } from './builder.js';
import { ConfigurationError, MalformedGraphError, QueryValidationError } from './errors.js';
import { type GraphInput, parseGraph } from './graph.js';
import type { GraphNode } from './types.js';

/**
 * Options for validating a graph.
 */
export interface ValidationOptions {
  /** Maximum depth of nested fields, the root counting as 1 (default: 10) */
  maxDepth: number;
  /** Maximum number of nodes, the root included (default: 100) */
  maxFields: number;
  /** Field names that must not appear anywhere in the graph */
  blockedFields: string[];
}

/**
 * Result of graph validation.
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export const DEFAULT_VALIDATION_OPTIONS: Readonly<ValidationOptions> = {
  maxDepth: 10,
  maxFields: 100,
  blockedFields: [],
};

/**
 * Merges options with the defaults after checking them.
 *
 * @throws {ConfigurationError} If any option value is invalid
 *
 * @example
 * ```typescript
 * resolveValidationOptions({ maxDepth: 5 });
 * // { maxDepth: 5, maxFields: 100, blockedFields: [] }
 * ```
 */
export function resolveValidationOptions(
  options: Partial<ValidationOptions> = {},
): ValidationOptions {
  if (
    options.maxDepth !== undefined &&
    (!Number.isInteger(options.maxDepth) || options.maxDepth < 1)
  ) {
    throw new ConfigurationError('maxDepth must be a positive integer', 'maxDepth');
  }
  if (
    options.maxFields !== undefined &&
    (!Number.isInteger(options.maxFields) || options.maxFields < 1)
  ) {
    throw new ConfigurationError('maxFields must be a positive integer', 'maxFields');
  }
  if (options.blockedFields !== undefined && !Array.isArray(options.blockedFields)) {
    throw new ConfigurationError('blockedFields must be an array', 'blockedFields');
  }

  return {
    maxDepth: options.maxDepth ?? DEFAULT_VALIDATION_OPTIONS.maxDepth,
    maxFields: options.maxFields ?? DEFAULT_VALIDATION_OPTIONS.maxFields,
    blockedFields: [...(options.blockedFields ?? DEFAULT_VALIDATION_OPTIONS.blockedFields)],
  };
}

/**
 * Validates a graph before it is encoded.
 *
 * Checks for:
 * - a shape that cannot be encoded
 * - depth exceeding maxDepth
 * - node count exceeding maxFields
 * - blocked field names (case-insensitive)
 *
 * Sub-queries embedded in argument values are not counted.
 *
 * @example
 * ```typescript
 * const result = validateGraph(['user', 'name', 'password'], { blockedFields: ['password'] });
 * // { valid: false, errors: ['Graph contains blocked fields: password'] }
 * ```
 *
 * @see {@link assertValid} for throwing validation errors
 */
export function validateGraph(
  graph: GraphInput,
  options: Partial<ValidationOptions> = {},
): ValidationResult {
  const { maxDepth, maxFields, blockedFields } = resolveValidationOptions(options);
  const blockedLower = new Set(blockedFields.map((f) => f.toLowerCase()));

  let node: GraphNode;
  try {
    node = parseGraph(graph);
  } catch (error) {
    if (error instanceof MalformedGraphError) {
      return { valid: false, errors: [error.message] };
    }
    throw error;
  }

  let totalFields = 0;
  let maxDepthFound = 0;
  const blockedFound: string[] = [];

  function traverse(current: GraphNode, depth: number): void {
    totalFields++;
    if (depth > maxDepthFound) maxDepthFound = depth;

    const name = encodeObjectIdentifier(current.object);
    if (blockedLower.has(name.toLowerCase())) {
      blockedFound.push(name);
    }

    for (const field of current.fields) {
      traverse(field, depth + 1);
    }
  }

  traverse(node, 1);

  const errors: string[] = [];
  if (maxDepthFound > maxDepth) {
    errors.push(`Graph depth ${maxDepthFound} exceeds maximum of ${maxDepth}`);
  }
  if (totalFields > maxFields) {
    errors.push(`Graph has ${totalFields} fields, exceeding maximum of ${maxFields}`);
  }
  if (blockedFound.length > 0) {
    errors.push(`Graph contains blocked fields: ${blockedFound.join(', ')}`);
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a graph and throws if validation fails.
 *
 * @throws {QueryValidationError} If validation fails, with the individual messages in `errors`
 *
 * @example
 * ```typescript
 * assertValid(graph, { maxDepth: 4 });
 * const text = encode(graph);
 * ```
 */
export function assertValid(graph: GraphInput, options: Partial<ValidationOptions> = {}): void {
  const result = validateGraph(graph, options);
  if (!result.valid) {
    throw new QueryValidationError(
      `Graph validation failed: ${result.errors.join('; ')}`,
      result.errors,
    );
  }
}
