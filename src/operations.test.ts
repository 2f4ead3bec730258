/**
 * Unit tests for the operations module.
 */

import { describe, expect, it } from 'vitest';
import { MalformedGraphError, MalformedOperationError } from './errors.js';
import { ARGUMENTS, type GraphInput, parseGraph } from './graph.js';
import { mutation, query } from './operations.js';
import { variable } from './types.js';

describe('Operations Module', () => {
  describe('query', () => {
    it('should encode an unnamed query', () => {
      expect(query(['viewer', 'login'])).toBe('query{viewer{login}}');
    });

    it('should encode a named query', () => {
      expect(query(['Viewer'], ['viewer', 'login'])).toBe('query "Viewer"{viewer{login}}');
    });

    it('should encode a named query with parameters', () => {
      const graph: GraphInput = [
        ARGUMENTS,
        { owner: variable('owner'), name: variable('name') },
        'repository',
        'id',
        'stargazerCount',
      ];

      expect(query(['Repo', [['owner', 'String', true], ['name', 'String', true]]], graph)).toBe(
        'query "Repo"($owner:String!,$name:String!){repository(owner:$owner,name:$name){id stargazerCount}}',
      );
    });

    it('should encode parameter defaults', () => {
      const graph: GraphInput = [ARGUMENTS, { first: variable('first') }, 'issues', 'totalCount'];

      expect(query(['Issues', [['first', 'Int', null, 20]]], graph)).toBe(
        'query "Issues"($first:Int=20){issues(first:$first){totalCount}}',
      );
    });

    it('should accept an empty parameter list', () => {
      expect(query(['Empty', []], 'viewer')).toBe('query "Empty"(){viewer}');
    });

    it('should accept a parsed graph', () => {
      expect(query(parseGraph(['viewer', 'login']))).toBe('query{viewer{login}}');
    });

    it('should throw for an unsupported call shape', () => {
      const call = query as (...args: unknown[]) => string;

      expect(() => call()).toThrow(MalformedOperationError);
      expect(() => call(['A'], 'viewer', 'extra')).toThrow(MalformedOperationError);
      expect(() => call('A', 'viewer')).toThrow(MalformedOperationError);
      expect(() => call(['A', [], 'extra'], 'viewer')).toThrow(MalformedOperationError);
      expect(() => call(['A', 'not-params'], 'viewer')).toThrow(MalformedOperationError);
    });

    it('should report the operation on the error', () => {
      const call = query as (...args: unknown[]) => string;

      expect(() => call()).toThrow(
        'query expects (graph), ([name], graph) or ([name, parameters], graph); got 0 arguments',
      );
      try {
        call(5, 'viewer');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedOperationError);
        if (error instanceof MalformedOperationError) {
          expect(error.operation).toBe('query');
          expect(error.code).toBe('MALFORMED_OPERATION');
        }
      }
    });

    it('should pass graph errors through', () => {
      expect(() => query([ARGUMENTS, { id: 1 }])).toThrow(MalformedGraphError);
    });
  });

  describe('mutation', () => {
    it('should encode an unnamed mutation', () => {
      expect(mutation([ARGUMENTS, { id: 1 }, 'deleteIssue', 'ok'])).toBe(
        'mutation{deleteIssue(id:1){ok}}',
      );
    });

    it('should encode a mutation with an input object', () => {
      const graph: GraphInput = [
        ARGUMENTS,
        { input: { starrableId: variable('id') } },
        'addStar',
        ['starrable', 'id'],
      ];

      expect(mutation(['Star', [['id', 'ID', true]]], graph)).toBe(
        'mutation "Star"($id:ID!){addStar(input:{starrableId:$id}){starrable{id}}}',
      );
    });

    it('should name mutation on malformed calls', () => {
      const call = mutation as (...args: unknown[]) => string;

      expect(() => call(['A'], 'x', 'y')).toThrow(/^mutation expects/);
    });
  });
});
