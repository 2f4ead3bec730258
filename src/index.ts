/**
 * graphql-dsl
 *
 * Encodes nested, symbolic descriptions of GraphQL queries and mutations
 * into wire text, and flattens `edges`/`node` pagination wrappers out of
 * the responses.
 *
 * The core workflow:
 * 1. Describe the operation as a graph: nested arrays whose head is the
 *    field name, with `ARGUMENTS`, `OPERATION_NAME` and `OPERATION_PARAMS`
 *    tags placed anywhere in them
 * 2. Encode it with query(), mutation() or encode()
 * 3. Send the text with any transport, then pass the response data to
 *    simplifyResponseEdges()
 *
 * @example
 * ```typescript
 * import { ARGUMENTS, query, simplifyResponseEdges, variable } from 'graphql-dsl';
 *
 * const text = query(
 *   ['Repos', [['owner', 'String', true], ['first', 'Int', null, 10]]],
 *   [
 *     ARGUMENTS, { login: variable('owner') },
 *     'user',
 *     [ARGUMENTS, { first: variable('first') }, 'repositories', ['edges', ['node', 'name']]],
 *   ],
 * );
 * // query "Repos"($owner:String!,$first:Int=10){user(login:$owner){repositories(first:$first){edges{node{name}}}}}
 *
 * const data = simplifyResponseEdges(response.data);
 * // { user: { repositories: [{ name: 'a' }, { name: 'b' }] } }
 * ```
 */

// === Graph Model ===
export type {
  AliasIdentifier,
  Argument,
  ArgumentValue,
  GraphNode,
  NodeMetadata,
  NumberValue,
  ObjectField,
  ObjectIdentifier,
  ObjectValue,
  ParameterSpec,
  StringValue,
  SubQueryValue,
  TokenValue,
  VariableValue,
} from './types.js';
export {
  alias,
  isArgumentValue,
  isGraphNode,
  numberValue,
  stringValue,
  subQuery,
  token,
  variable,
} from './types.js';

// === Surface Syntax ===
export type {
  ExtractedGraph,
  GraphInput,
  MetadataTag,
  RawArgumentValue,
  RawArguments,
  RawAtom,
  RawElement,
  RawGraph,
  RawInputField,
  RawInputObject,
  RawParameterSpec,
  RawVariableRef,
} from './graph.js';
export {
  ARGUMENTS,
  OPERATION_NAME,
  OPERATION_PARAMS,
  VARIABLE,
  extractMetadata,
  parseArgumentValue,
  parseGraph,
  parseParameterSpec,
} from './graph.js';

// === Encoding ===
export {
  encode,
  encodeArgument,
  encodeArgumentValue,
  encodeNode,
  encodeObjectIdentifier,
  encodeParameterSpec,
} from './builder.js';
export type { OperationHeader, OperationType } from './operations.js';
export { mutation, query } from './operations.js';

// === Response Simplification ===
export type { JsonObject, JsonPrimitive, JsonValue } from './simplify.js';
export { simplifyResponseEdges } from './simplify.js';

// === Validation ===
export type { ValidationOptions, ValidationResult } from './config.js';
export {
  DEFAULT_VALIDATION_OPTIONS,
  assertValid,
  resolveValidationOptions,
  validateGraph,
} from './config.js';
export type { SyntaxValidationResult } from './syntax.js';
export { parseQueryOrThrow, validateQuerySyntax } from './syntax.js';

// === Resolver Bridge ===
export type { ExtractionOptions } from './extractor.js';
export { graphFromResolveInfo } from './extractor.js';

// === Errors ===
export {
  ConfigurationError,
  MalformedGraphError,
  MalformedOperationError,
  QueryValidationError,
} from './errors.js';
