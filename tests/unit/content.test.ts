import { describe, expect, test } from 'vitest';
import { BINARY_SNIFF_LENGTH, isBinaryContent, rewriteContent } from '../../src/copier/index.js';
import { ReplacementRuleSet } from '../../src/replace/index.js';

const rules = new ReplacementRuleSet([{ from: 'foo', to: 'bar' }]);

describe('isBinaryContent', () => {
  test('text is not binary', () => {
    expect(isBinaryContent(Buffer.from('const foo = 1;\n'))).toBe(false);
    expect(isBinaryContent(Buffer.from('héllo wörld'))).toBe(false);
    expect(isBinaryContent(Buffer.alloc(0))).toBe(false);
  });

  test('a NUL byte marks binary', () => {
    expect(isBinaryContent(Buffer.from([0x66, 0x00, 0x6f]))).toBe(true);
  });

  test('invalid UTF-8 marks binary', () => {
    expect(isBinaryContent(Buffer.from([0xff, 0xfe, 0x41]))).toBe(true);
  });

  test('only the leading bytes are sniffed for NUL', () => {
    const late = Buffer.alloc(BINARY_SNIFF_LENGTH + 10, 0x61);
    late[BINARY_SNIFF_LENGTH + 5] = 0;
    expect(isBinaryContent(late)).toBe(false);
  });
});

describe('rewriteContent', () => {
  test('rewrites text', () => {
    const result = rewriteContent(Buffer.from('foo Foo FOO'), rules);
    expect(result.binary).toBe(false);
    expect(result.changed).toBe(true);
    expect(result.content.toString('utf-8')).toBe('bar Bar BAR');
  });

  test('unchanged text keeps the original buffer', () => {
    const input = Buffer.from('nothing here');
    const result = rewriteContent(input, rules);
    expect(result.changed).toBe(false);
    expect(result.content).toBe(input);
  });

  test('binary content passes through byte for byte', () => {
    const input = Buffer.from([0x66, 0x6f, 0x6f, 0x00, 0xff]);
    const result = rewriteContent(input, rules);
    expect(result.binary).toBe(true);
    expect(result.changed).toBe(false);
    expect(Buffer.compare(result.content, input)).toBe(0);
  });
});
