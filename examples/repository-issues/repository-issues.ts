/**
 * Repository issues example.
 *
 * Builds a paginated issues query for a repository, then validates the
 * simplified response with zod so callers work with typed, flat lists.
 */

import * as z from 'zod';
import {
  ARGUMENTS,
  type GraphInput,
  type JsonValue,
  query,
  simplifyResponseEdges,
  token,
  variable,
} from '../../src/index.js';

export const IssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  labels: z.array(z.object({ name: z.string() })),
});

export type Issue = z.infer<typeof IssueSchema>;

export const RepositoryIssuesSchema = z.object({
  repository: z.object({
    name: z.string(),
    issues: z.array(IssueSchema),
  }),
});

export type RepositoryIssues = z.infer<typeof RepositoryIssuesSchema>;

/**
 * The selection for one page of open issues, newest first.
 */
export const repositoryIssuesGraph: GraphInput = [
  ARGUMENTS,
  { owner: variable('owner'), name: variable('name') },
  'repository',
  'name',
  [
    ARGUMENTS,
    {
      first: variable('first'),
      states: token('OPEN'),
      orderBy: { field: token('CREATED_AT'), direction: token('DESC') },
    },
    'issues',
    [
      'edges',
      ['node', 'number', 'title', [ARGUMENTS, { first: 5 }, 'labels', ['edges', ['node', 'name']]]],
    ],
  ],
];

export function buildRepositoryIssuesQuery(): string {
  return query(
    [
      'RepositoryIssues',
      [
        ['owner', 'String', true],
        ['name', 'String', true],
        ['first', 'Int', null, 20],
      ],
    ],
    repositoryIssuesGraph,
  );
}

/**
 * Flattens the connections of a response and checks its shape.
 *
 * @throws {z.ZodError} If the response does not match the selection
 */
export function parseRepositoryIssues(data: JsonValue): RepositoryIssues {
  return RepositoryIssuesSchema.parse(simplifyResponseEdges(data));
}
