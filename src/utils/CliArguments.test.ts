/**
 * @fileoverview Tests for command-line parsing
 */

import { describe, it, expect } from '@jest/globals';
import { parseCliArguments, validateCliOptions } from './CliArguments';

const argv = (...flags: string[]): string[] => ['node', 'dist/index.js', ...flags];

describe('parseCliArguments', () => {
  it('should return only the debug flag when nothing is passed', () => {
    expect(parseCliArguments(argv())).toEqual({
      port: undefined,
      host: undefined,
      dataDir: undefined,
      recognitionUrl: undefined,
      debug: false
    });
  });

  it('should read every flag', () => {
    const options = parseCliArguments(argv(
      '--port=3001',
      '--host=127.0.0.1',
      '--data-dir=/tmp/ledger',
      '--recognition-url="http://localhost:8000"',
      '--debug'
    ));
    expect(options).toEqual({
      port: 3001,
      host: '127.0.0.1',
      dataDir: '/tmp/ledger',
      recognitionUrl: 'http://localhost:8000',
      debug: true
    });
  });

  it('should keep everything after the first "="', () => {
    const options = parseCliArguments(argv('--recognition-url=http://host/path?a=b'));
    expect(options.recognitionUrl).toBe('http://host/path?a=b');
  });

  it('should ignore a port that is not a number', () => {
    expect(parseCliArguments(argv('--port=abc')).port).toBeUndefined();
  });
});

describe('validateCliOptions', () => {
  it('should accept valid options', () => {
    expect(validateCliOptions({ port: 8080, recognitionUrl: 'https://example.test', debug: false })).toEqual({
      valid: true,
      errors: []
    });
  });

  it('should reject an out-of-range port', () => {
    expect(validateCliOptions({ port: 70000, debug: false }).errors).toEqual([
      'Port must be an integer between 1 and 65535'
    ]);
  });

  it('should reject recognition URLs that are not http(s)', () => {
    expect(validateCliOptions({ recognitionUrl: 'ftp://host', debug: false }).errors).toEqual([
      'Recognition URL must use http or https'
    ]);
    expect(validateCliOptions({ recognitionUrl: 'not a url', debug: false }).errors).toEqual([
      'Recognition URL is not a valid URL: not a url'
    ]);
  });
});
