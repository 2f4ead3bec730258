/**
 * Unit tests for the errors module.
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  MalformedGraphError,
  MalformedOperationError,
  QueryValidationError,
} from './errors.js';

describe('MalformedGraphError', () => {
  it('should create error with message and value', () => {
    const value = ['bad'];
    const error = new MalformedGraphError('Unencodable', value);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MalformedGraphError);
    expect(error.name).toBe('MalformedGraphError');
    expect(error.message).toBe('Unencodable');
    expect(error.value).toBe(value);
    expect(error.code).toBe('MALFORMED_GRAPH');
  });

  it('should accept custom error code', () => {
    expect(new MalformedGraphError('x', null, 'BAD_HEAD').code).toBe('BAD_HEAD');
  });
});

describe('MalformedOperationError', () => {
  it('should create error with message and operation', () => {
    const error = new MalformedOperationError('Bad call', 'mutation');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(MalformedOperationError);
    expect(error.name).toBe('MalformedOperationError');
    expect(error.operation).toBe('mutation');
    expect(error.code).toBe('MALFORMED_OPERATION');
  });
});

describe('QueryValidationError', () => {
  it('should create error with message and errors array', () => {
    const error = new QueryValidationError('Validation failed', ['Error 1', 'Error 2']);

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(QueryValidationError);
    expect(error.name).toBe('QueryValidationError');
    expect(error.message).toBe('Validation failed');
    expect(error.errors).toEqual(['Error 1', 'Error 2']);
    expect(error.code).toBe('QUERY_VALIDATION_ERROR');
  });

  it('should accept custom error code', () => {
    const error = new QueryValidationError('Depth exceeded', ['Too deep'], 'DEPTH_EXCEEDED');

    expect(error.code).toBe('DEPTH_EXCEEDED');
  });

  it('should be catchable as Error', () => {
    expect(() => {
      throw new QueryValidationError('Test', []);
    }).toThrow(Error);
  });
});

describe('ConfigurationError', () => {
  it('should create error with message and config key', () => {
    const error = new ConfigurationError('Invalid config', 'maxDepth');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.name).toBe('ConfigurationError');
    expect(error.message).toBe('Invalid config');
    expect(error.configKey).toBe('maxDepth');
    expect(error.code).toBe('CONFIGURATION_ERROR');
  });
});
