import { describe, it, expect } from 'vitest';
import { parseEnvironment } from '../src/boundaries/env-parser';
import { ValidationError } from '../src/errors/index';

describe('Environment Parser', () => {
  it('uses defaults when nothing is set', () => {
    expect(parseEnvironment({})).toEqual({ SYNCJOB_OUTPUT: 'line', SYNCJOB_VERBOSE: false });
  });

  it('ignores unrelated variables', () => {
    expect(parseEnvironment({ HOME: '/home/test', SYNCJOB_OUTPUT: 'json' })).toEqual({
      SYNCJOB_OUTPUT: 'json',
      SYNCJOB_VERBOSE: false,
    });
  });

  it.each([
    ['1', true],
    ['true', true],
    ['yes', true],
    ['0', false],
    ['no', false],
  ])('reads SYNCJOB_VERBOSE=%s as %s', (value, expected) => {
    expect(parseEnvironment({ SYNCJOB_VERBOSE: value }).SYNCJOB_VERBOSE).toBe(expected);
  });

  it('throws a ValidationError for unknown values', () => {
    expect(() => parseEnvironment({ SYNCJOB_VERBOSE: 'maybe' })).toThrow(ValidationError);
    expect(() => parseEnvironment({ SYNCJOB_OUTPUT: 'xml' })).toThrow(/^Invalid environment variables: SYNCJOB_OUTPUT: /);
  });
});
