import { describe, expect, test } from 'vitest';
import { InvalidRuleError } from '../../src/errors.js';
import { CASE_CONVENTIONS, render, tokenize } from '../../src/naming/index.js';
import { ReplacementRuleSet } from '../../src/replace/index.js';

function rules(...pairs: [string, string][]): ReplacementRuleSet {
  return new ReplacementRuleSet(pairs.map(([from, to]) => ({ from, to })));
}

describe('ReplacementRuleSet', () => {
  describe('apply', () => {
    test('applies rules in order to plain text', () => {
      expect(rules(['Hello', 'Hi'], ['World', 'Japan']).apply('Hello, World')).toBe('Hi, Japan');
    });

    test.each([
      ['HelloWorld', 'GoodMorning'],
      ['hello-world', 'good-morning'],
      ['helloWorld', 'goodMorning'],
      ['HELLO_WORLD', 'GOOD_MORNING'],
      ['hello_world', 'good_morning'],
    ])('rewrites %s as %s', (input, expected) => {
      expect(rules(['HelloWorld', 'GoodMorning']).apply(input)).toBe(expected);
    });

    test('maps every rendering of FROM to the same rendering of TO', () => {
      const pairs: [string, string][] = [
        ['HelloWorld', 'GoodMorning'],
        ['user-account', 'customer_profile'],
        ['HTTP_SERVER', 'webClient'],
      ];

      for (const [from, to] of pairs) {
        const ruleSet = rules([from, to]);
        for (const convention of CASE_CONVENTIONS) {
          const input = render(tokenize(from).words, convention);
          expect(ruleSet.apply(input)).toBe(render(tokenize(to).words, convention));
        }
      }
    });

    test('keeps the case of single-word matches', () => {
      const source = "import Foo from './foo';\nconst FOO = 1;\n";
      expect(rules(['foo', 'bar']).apply(source)).toBe("import Bar from './bar';\nconst BAR = 1;\n");
    });

    test('replaces inside larger identifiers', () => {
      expect(rules(['foo', 'qux']).apply('foobarbaz FooBar')).toBe('quxbarbaz QuxBar');
    });

    test('prefers the longest candidate at the same offset', () => {
      // 'hello-world-' (literal) and 'hello-world' (kebab rendering) both start at 0
      expect(rules(['hello-world-', 'a-b']).apply('hello-world-x hello-world.')).toBe('a-bx a-b.');
    });

    test('feeds each rule the output of the previous one', () => {
      expect(rules(['alpha', 'beta'], ['beta', 'gamma']).apply('alpha beta')).toBe('gamma gamma');
    });

    test('does not rescan its own replacement', () => {
      expect(rules(['foo', 'foofoo']).apply('foo')).toBe('foofoo');
    });

    test('writes a single-word literal match as TO verbatim', () => {
      const ruleSet = rules(['hello', 'goodMorning']);
      expect(ruleSet.apply('hello')).toBe('goodMorning');
      expect(ruleSet.apply('Hello')).toBe('GoodMorning');
      expect(ruleSet.apply('HELLO')).toBe('GOOD_MORNING');
    });

    test("uses TO's own convention for ambiguous non-literal matches", () => {
      const ruleSet = rules(['Hello', 'good-morning']);
      expect(ruleSet.apply('hello')).toBe('good-morning');
      expect(ruleSet.apply('Hello')).toBe('GoodMorning');
    });

    test('writes TO verbatim when FROM matches only as a literal', () => {
      const ruleSet = rules(['XMLParser', 'JsonReader']);
      expect(ruleSet.apply('new XMLParser()')).toBe('new JsonReader()');
      expect(ruleSet.apply('xml-parser')).toBe('json-reader');
    });

    test('deletes matches when TO is empty', () => {
      expect(rules(['foo', '']).apply('a foo b Foo')).toBe('a  b ');
    });

    test('leaves text untouched for a no-op rule', () => {
      const text = 'Foo foo FOO foo-bar FOO_BAR';
      expect(rules(['foo', 'foo']).apply(text)).toBe(text);
      expect(rules(['HelloWorld', 'HelloWorld']).apply('hello-world HELLO_WORLD')).toBe(
        'hello-world HELLO_WORLD',
      );
    });

    test('matches only the literal when case awareness is off', () => {
      const ruleSet = new ReplacementRuleSet([{ from: 'foo', to: 'bar' }], { caseAware: false });
      expect(ruleSet.apply('Foo foo FOO')).toBe('Foo bar FOO');
    });

    test('treats regex characters in FROM literally', () => {
      expect(rules(['a.b', 'c']).apply('a.b axb')).toBe('c axb');
    });
  });

  describe('applyToName', () => {
    test('rewrites each path component separately', () => {
      expect(rules(['foo', 'bar']).applyToName('foo/Foo-item.tsx')).toBe('bar/Bar-item.tsx');
    });

    test('handles backslash separators', () => {
      expect(rules(['foo', 'bar']).applyToName('foo\\foo.ts')).toBe('bar\\bar.ts');
    });

    test('leaves names untouched for a no-op rule', () => {
      expect(rules(['foo', 'foo']).applyToName('Foo-item.tsx')).toBe('Foo-item.tsx');
    });
  });

  describe('construction', () => {
    test('rejects an empty FROM', () => {
      expect(() => rules(['', 'bar'])).toThrow(InvalidRuleError);
      expect(() => rules(['', 'bar'])).toThrow('Empty FROM string is not allowed');
    });

    test('exposes rules in order', () => {
      const ruleSet = rules(['a', 'b'], ['c', 'd']);
      expect(ruleSet.size).toBe(2);
      expect(ruleSet.isEmpty()).toBe(false);
      expect(ruleSet.rules).toEqual([
        { from: 'a', to: 'b' },
        { from: 'c', to: 'd' },
      ]);
    });

    test('an empty set changes nothing', () => {
      const ruleSet = new ReplacementRuleSet([]);
      expect(ruleSet.isEmpty()).toBe(true);
      expect(ruleSet.apply('anything')).toBe('anything');
    });
  });
});
