import { describe, expect, test } from 'vitest';
import { isAllUppercase, splitCaseBoundaries, tokenize } from '../tokenizer.js';

describe('tokenize', () => {
  test.each([
    ['hello-world', ['hello', 'world'], 'kebab'],
    ['HELLO-WORLD', ['hello', 'world'], 'kebab'],
    ['hello_world', ['hello', 'world'], 'snake'],
    ['Hello_World', ['hello', 'world'], 'snake'],
    ['HELLO_WORLD', ['hello', 'world'], 'screamingSnake'],
    ['HelloWorld', ['hello', 'world'], 'pascal'],
    ['helloWorld', ['hello', 'world'], 'camel'],
    ['XMLParser', ['xml', 'parser'], 'pascal'],
    ['parseXMLDocument', ['parse', 'xml', 'document'], 'camel'],
    ['v2Api', ['v2', 'api'], 'camel'],
  ])('%s -> %j (%s)', (input, words, convention) => {
    const result = tokenize(input);
    expect(result.words).toEqual(words);
    expect(result.convention).toBe(convention);
    expect(result.source).toBe(input);
  });

  test('single words have no convention', () => {
    expect(tokenize('hello').convention).toBe('unknown');
    expect(tokenize('Foo').convention).toBe('unknown');
    expect(tokenize('FOO').convention).toBe('unknown');
    expect(tokenize('FOO').words).toEqual(['foo']);
  });

  test('empty segments are dropped', () => {
    expect(tokenize('foo-').words).toEqual(['foo']);
    expect(tokenize('foo-').convention).toBe('unknown');
    expect(tokenize('__init__').words).toEqual(['init']);
    expect(tokenize('--').words).toEqual([]);
  });

  test('empty input', () => {
    const result = tokenize('');
    expect(result.words).toEqual([]);
    expect(result.convention).toBe('unknown');
  });

  test('returns frozen object', () => {
    const result = tokenize('helloWorld');
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.words)).toBe(true);
  });
});

describe('splitCaseBoundaries', () => {
  test('splits at lowercase-to-uppercase transitions', () => {
    expect(splitCaseBoundaries('getHttpResponse')).toEqual(['get', 'http', 'response']);
  });

  test('keeps acronyms together', () => {
    expect(splitCaseBoundaries('HTTPServer')).toEqual(['http', 'server']);
    expect(splitCaseBoundaries('ID')).toEqual(['id']);
  });
});

describe('isAllUppercase', () => {
  test('ignores digits and separators', () => {
    expect(isAllUppercase('API_V2')).toBe(true);
    expect(isAllUppercase('Api_V2')).toBe(false);
    expect(isAllUppercase('123')).toBe(false);
  });
});
