import { describe, it, expect } from 'vitest';
import {
  BackendFailureError,
  createToolErrorResult,
  describeFailure,
  ERROR_DESCRIPTIONS,
  errorMessage,
  type ErrorKind,
} from '../../src/errors.js';

describe('errors', () => {
  describe('describeFailure', () => {
    it('has a description for every failure kind', () => {
      const kinds: ErrorKind[] = [
        'BackendUnavailable',
        'Timeout',
        'ContentFiltered',
        'MalformedResponse',
        'ToolExecutionFailed',
        'RecursionLimitExceeded',
        'AllTiersExhausted',
      ];

      expect(Object.keys(ERROR_DESCRIPTIONS).sort()).toEqual([...kinds].sort());
      expect(describeFailure('Timeout')).toBe('The assistant took too long to respond.');
    });
  });

  describe('BackendFailureError', () => {
    it('carries its kind in the structured data', () => {
      const error = new BackendFailureError('MalformedResponse', 'empty response');

      expect(error.kind).toBe('MalformedResponse');
      expect(error.toJSON()).toEqual({
        code: 'BACKEND_FAILURE',
        message: 'empty response',
        data: { kind: 'MalformedResponse' },
      });
    });
  });

  describe('createToolErrorResult', () => {
    it('prefixes the failing tool and fills in a blank message', () => {
      expect(createToolErrorResult('disk full', 'addTaskToList')).toEqual({
        text: "Tool 'addTaskToList' failed: disk full",
        isError: true,
      });
      expect(createToolErrorResult('  ')).toEqual({ text: 'unknown error', isError: true });
    });
  });

  describe('errorMessage', () => {
    it('reads messages from errors and strings', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('Unknown error');
    });
  });
});
