/**
 * Unit tests for the config module.
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_VALIDATION_OPTIONS,
  assertValid,
  resolveValidationOptions,
  validateGraph,
} from './config.js';
import { ConfigurationError, QueryValidationError } from './errors.js';
import { ARGUMENTS, type GraphInput, parseGraph } from './graph.js';
import { alias, subQuery } from './types.js';

describe('Config Module', () => {
  describe('resolveValidationOptions', () => {
    it('should return the defaults', () => {
      expect(resolveValidationOptions()).toEqual(DEFAULT_VALIDATION_OPTIONS);
    });

    it('should merge overrides with the defaults', () => {
      expect(resolveValidationOptions({ maxDepth: 3, blockedFields: ['secret'] })).toEqual({
        maxDepth: 3,
        maxFields: 100,
        blockedFields: ['secret'],
      });
    });

    it('should throw for invalid maxDepth', () => {
      expect(() => resolveValidationOptions({ maxDepth: 0 })).toThrow(ConfigurationError);
      expect(() => resolveValidationOptions({ maxDepth: 1.5 })).toThrow(ConfigurationError);
    });

    it('should throw for invalid maxFields', () => {
      expect(() => resolveValidationOptions({ maxFields: -1 })).toThrow(ConfigurationError);
    });

    it('should throw for invalid blockedFields type', () => {
      expect(() => resolveValidationOptions({ blockedFields: 'secret' as never })).toThrow(
        ConfigurationError,
      );
    });

    it('should report the offending key', () => {
      try {
        resolveValidationOptions({ maxFields: 0 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.configKey).toBe('maxFields');
          expect(error.message).toBe('maxFields must be a positive integer');
        }
      }
    });
  });

  describe('validateGraph', () => {
    const graph: GraphInput = ['viewer', 'login', ['repositories', ['nodes', 'name', 'secret']]];

    it('should pass a graph within the limits', () => {
      expect(validateGraph(graph)).toEqual({ valid: true, errors: [] });
    });

    it('should report excessive depth', () => {
      expect(validateGraph(graph, { maxDepth: 3 })).toEqual({
        valid: false,
        errors: ['Graph depth 4 exceeds maximum of 3'],
      });
    });

    it('should report excessive field counts', () => {
      expect(validateGraph(graph, { maxFields: 5 })).toEqual({
        valid: false,
        errors: ['Graph has 6 fields, exceeding maximum of 5'],
      });
    });

    it('should report blocked fields case-insensitively', () => {
      expect(validateGraph(graph, { blockedFields: ['SECRET', 'Login'] })).toEqual({
        valid: false,
        errors: ['Graph contains blocked fields: login, secret'],
      });
    });

    it('should check aliased fields by their primary name', () => {
      const aliased: GraphInput = ['viewer', alias('secret', 'hidden')];

      expect(validateGraph(aliased, { blockedFields: ['secret'] }).valid).toBe(false);
    });

    it('should not count sub-queries inside arguments', () => {
      const withSubQuery: GraphInput = [
        ARGUMENTS,
        { filter: subQuery(parseGraph(['secret', 'id'])) },
        'search',
        'count',
      ];

      expect(validateGraph(withSubQuery, { blockedFields: ['secret'], maxFields: 2 })).toEqual({
        valid: true,
        errors: [],
      });
    });

    it('should report malformed graphs', () => {
      expect(validateGraph([ARGUMENTS, { id: 1 }])).toEqual({
        valid: false,
        errors: ['Graph node has no object identifier'],
      });
    });

    it('should throw for invalid options', () => {
      expect(() => validateGraph(graph, { maxDepth: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('assertValid', () => {
    it('should not throw for a valid graph', () => {
      expect(() => assertValid(['viewer', 'login'])).not.toThrow();
    });

    it('should throw QueryValidationError with every message', () => {
      try {
        assertValid(['a', ['b', ['c', 'password']]], { maxDepth: 2, blockedFields: ['password'] });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(QueryValidationError);
        if (error instanceof QueryValidationError) {
          expect(error.errors).toEqual([
            'Graph depth 4 exceeds maximum of 2',
            'Graph contains blocked fields: password',
          ]);
          expect(error.message).toBe(
            'Graph validation failed: Graph depth 4 exceeds maximum of 2; Graph contains blocked fields: password',
          );
        }
      }
    });
  });
});
