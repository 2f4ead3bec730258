/**
 * graphql-dsl
 *
 * Syntax Check Module
 *
 * Parses encoded text with the reference GraphQL parser, so callers can check
 * an operation before handing it to a transport.
 *
 * Operation names are encoded quoted (`query "Viewer"{...}`), which the
 * reference parser rejects; unnamed operations parse.
 *
 * @example
 * ```typescript
 * const result = validateQuerySyntax(query(['viewer', 'login']));
 * if (!result.valid) {
 *   console.error('Syntax errors:', result.errors);
 * }
 * ```
 */

import { type DocumentNode, GraphQLError, parse } from 'graphql';
import { QueryValidationError } from './errors.js';

/**
 * Result of query syntax validation.
 */
export interface SyntaxValidationResult {
  /** Whether the text is a syntactically valid GraphQL document */
  valid: boolean;
  /** The parsed AST if valid, undefined otherwise */
  ast?: DocumentNode;
  /** Error messages if invalid */
  errors: string[];
}

/**
 * Validates the syntax of GraphQL text.
 *
 * @param text - Encoded operation text
 * @returns Validation result with the AST or the parser's errors
 */
export function validateQuerySyntax(text: string): SyntaxValidationResult {
  try {
    return { valid: true, ast: parse(text), errors: [] };
  } catch (error) {
    if (error instanceof GraphQLError) {
      return { valid: false, errors: [error.message] };
    }
    throw error;
  }
}

/**
 * Parses GraphQL text, throwing on syntax errors.
 *
 * @param text - Encoded operation text
 * @param context - Optional label included in the error message
 * @throws {QueryValidationError} With code `SYNTAX_ERROR` if parsing fails
 *
 * @example
 * ```typescript
 * const ast = parseQueryOrThrow(query(graph), 'RepositoryLoader');
 * ```
 */
export function parseQueryOrThrow(text: string, context?: string): DocumentNode {
  const result = validateQuerySyntax(text);

  if (!result.valid || result.ast === undefined) {
    const contextStr = context ? ` (${context})` : '';
    throw new QueryValidationError(
      `GraphQL syntax error${contextStr}: ${result.errors.join(', ')}`,
      result.errors,
      'SYNTAX_ERROR',
    );
  }

  return result.ast;
}
