/**
 * graphql-dsl
 *
 * Custom Error Classes
 *
 * Provides specialized error types for malformed graphs, malformed operation
 * calls, graph validation and option issues.
 */

/**
 * Error thrown when a graph node or argument value matches no known shape.
 *
 * This is a caller error: the graph was built incorrectly and has no textual
 * form. It is raised while parsing the surface syntax, before any text is
 * produced.
 *
 * @example
 * ```typescript
 * try {
 *   encode([ARGUMENTS]);
 * } catch (error) {
 *   if (error instanceof MalformedGraphError) {
 *     console.error('Bad graph:', error.message, error.value);
 *   }
 * }
 * ```
 */
export class MalformedGraphError extends Error {
  public readonly value: unknown;
  public readonly code: string;

  constructor(message: string, value?: unknown, code = 'MALFORMED_GRAPH') {
    super(message);
    this.name = 'MalformedGraphError';
    this.value = value;
    this.code = code;
    Object.setPrototypeOf(this, MalformedGraphError.prototype);
  }
}

/**
 * Error thrown when `query` or `mutation` receive an unsupported call shape.
 *
 * @see {@link query}
 * @see {@link mutation}
 */
export class MalformedOperationError extends Error {
  public readonly operation: string;
  public readonly code: string;

  constructor(message: string, operation: string, code = 'MALFORMED_OPERATION') {
    super(message);
    this.name = 'MalformedOperationError';
    this.operation = operation;
    this.code = code;
    Object.setPrototypeOf(this, MalformedOperationError.prototype);
  }
}

/**
 * Error thrown when graph validation fails.
 *
 * This error is thrown by {@link assertValid} when a graph exceeds the depth
 * or field limits or contains blocked fields, and by
 * {@link parseQueryOrThrow} when encoded text does not parse.
 *
 * @example
 * ```typescript
 * try {
 *   assertValid(graph, { maxDepth: 3 });
 * } catch (error) {
 *   if (error instanceof QueryValidationError) {
 *     console.error('Validation failed:', error.errors);
 *   }
 * }
 * ```
 *
 * @see {@link validateGraph} for non-throwing validation
 */
export class QueryValidationError extends Error {
  public readonly errors: string[];
  public readonly code: string;

  constructor(message: string, errors: string[] = [], code = 'QUERY_VALIDATION_ERROR') {
    super(message);
    this.name = 'QueryValidationError';
    this.errors = errors;
    this.code = code;
    Object.setPrototypeOf(this, QueryValidationError.prototype);
  }
}

/**
 * Error thrown when option values are invalid.
 *
 * @example
 * ```typescript
 * try {
 *   validateGraph(graph, { maxDepth: -1 }); // Invalid!
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error('Invalid option:', error.configKey);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  public readonly configKey: string;
  public readonly code: string;

  constructor(message: string, configKey: string, code = 'CONFIGURATION_ERROR') {
    super(message);
    this.name = 'ConfigurationError';
    this.configKey = configKey;
    this.code = code;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
