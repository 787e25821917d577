import { describe, expect, test } from 'vitest';
import {
  completeFragment,
  completeFragmentDetailed,
  completeFragmentWithState,
  scanFragment
} from '../fragment-completion.js';
import { ConstructKind, INCOMPLETE_LINK_URL } from '../scanner/completion-scanner.js';

describe('Fragment completion: emphasis', () => {

  test('bold with a partial closer', () => {
    expect(completeFragment('**text*')).toBe('**text**');
  });

  test('opener carried in the prefix', () => {
    expect(completeFragment(' text**', { prefix: '**' })).toBe('**text**');
  });

  test('underscore strong with a partial closer', () => {
    expect(completeFragment('__x_')).toBe('__x__');
  });

  test('strikethrough with a partial closer', () => {
    expect(completeFragment('~~x~')).toBe('~~x~~');
  });

  test('strikethrough closed after a prefix', () => {
    expect(completeFragment('x~~', { prefix: '~~' })).toBe('~~x~~');
  });

  test('nested emphasis closes innermost first', () => {
    expect(completeFragment('This is *italic **bold')).toBe('This is *italic **bold***');
  });

  test('closed inner strong leaves the outer emphasis', () => {
    expect(completeFragment('This is *italic **bold** text')).toBe('This is *italic **bold** text*');
  });

  test('nested underscores', () => {
    expect(completeFragment('This is _italic __bold')).toBe('This is _italic __bold___');
  });

  test('strikethrough around emphasis', () => {
    expect(completeFragment('~~strike *bold')).toBe('~~strike *bold*~~');
  });

  test('intraword underscores stay literal', () => {
    expect(completeFragment('snake_case_name')).toBe('snake_case_name');
  });

  test('asterisks between spaces stay literal', () => {
    expect(completeFragment('2 * 3')).toBe('2 * 3');
  });

  test('escaped delimiter stays literal', () => {
    expect(completeFragment('\\*not emphasis')).toBe('\\*not emphasis');
  });

  test('insert and highlight pairs', () => {
    expect(completeFragment('++ins')).toBe('++ins++');
    expect(completeFragment('==mark')).toBe('==mark==');
  });

  test('pairs touching a word stay literal', () => {
    expect(completeFragment('C++17')).toBe('C++17');
    expect(completeFragment('x==1')).toBe('x==1');
  });

  test('shortcode underscores do not open emphasis', () => {
    expect(completeFragment('Streaming with :keyboard_shortcuts:')).toBe('Streaming with :keyboard_shortcuts:');
    expect(completeFragment(':smile_cat: and _x')).toBe(':smile_cat: and _x_');
  });
});

describe('Fragment completion: code and math', () => {

  test('code span keeps trailing whitespace after the closer', () => {
    expect(completeFragment('`code ')).toBe('`code` ');
  });

  test('delimiters inside a code span are literal', () => {
    expect(completeFragment('`a *b')).toBe('`a *b`');
  });

  test('backtick run ending the input is left alone', () => {
    expect(completeFragment('a `')).toBe('a `');
    expect(completeFragment('a ``')).toBe('a ``');
    expect(completeFragment('Run `npm`')).toBe('Run `npm`');
  });

  test('bare fence is left alone', () => {
    expect(completeFragment('```')).toBe('```');
  });

  test('partial closing fence is extended', () => {
    expect(completeFragment('```ts\nlet foo\n`')).toBe('```ts\nlet foo\n```');
  });

  test('fence with a body is closed on its own line', () => {
    expect(completeFragment('```ts\nlet foo')).toBe('```ts\nlet foo\n```');
    expect(completeFragment('~~~\ncode')).toBe('~~~\ncode\n~~~');
  });

  test('fence followed by blank lines', () => {
    const input = '```ruby\nclass Foo\n  def bar\n    :ok\n  end\n\n';
    expect(completeFragment(input)).toBe('```ruby\nclass Foo\n  def bar\n    :ok\n  end\n```\n');
  });

  test('fence inside a list item closes at the item indent', () => {
    expect(completeFragment('- ```js\nconst a')).toBe('- ```js\nconst a\n  ```');
  });

  test('fence inside a block quote keeps the quote marker', () => {
    expect(completeFragment('> ```\n> x')).toBe('> ```\n> x\n> ```');
  });

  test('display math on its own line', () => {
    expect(completeFragment('$$\n')).toBe('$$\n$$');
    expect(completeFragment('$$\nx = 1')).toBe('$$\nx = 1\n$$');
  });

  test('display math inside a line', () => {
    expect(completeFragment('$$E = mc^2')).toBe('$$E = mc^2$$');
  });

  test('inline math', () => {
    expect(completeFragment('The formula $a^2 + b^2')).toBe('The formula $a^2 + b^2$');
  });

  test('dollar before a digit is currency', () => {
    expect(completeFragment('$5 + $x')).toBe('$5 + $x$');
    expect(completeFragment('$5.00 and $10')).toBe('$5.00 and $10');
  });
});

describe('Fragment completion: links, lists and tables', () => {

  test('link label inside a list item', () => {
    expect(completeFragment('- [foo')).toBe(`- [foo](${INCOMPLETE_LINK_URL})`);
  });

  test('closed label without destination', () => {
    expect(completeFragment('[foo]')).toBe('[foo](mdex:incomplete-link)');
  });

  test('footnote reference', () => {
    expect(completeFragment('See [^1')).toBe('See [^1]');
  });

  test('destination with balanced parentheses', () => {
    expect(completeFragment('[wiki](https://en.wikipedia.org/wiki/Foo_(bar)'))
      .toBe('[wiki](https://en.wikipedia.org/wiki/Foo_(bar))');
  });

  test('image destination', () => {
    expect(completeFragment('![img](https://cdn.example.com/pic')).toBe('![img](https://cdn.example.com/pic)');
  });

  test('strikethrough in a list item', () => {
    expect(completeFragment('- ~~strike')).toBe('- ~~strike~~');
  });

  test('task markers are not link labels', () => {
    expect(completeFragment('- [')).toBe('- [');
    expect(completeFragment('- [x')).toBe('- [x');
    expect(completeFragment('- [x]')).toBe('- [x]');
    expect(completeFragment('- [x] Collect *n')).toBe('- [x] Collect *n*');
  });

  test('header row gets a separator row', () => {
    expect(completeFragment('| foo |\n')).toBe('| foo |\n| - |');
    expect(completeFragment('| foo | bar |\n')).toBe('| foo | bar |\n| - | - |');
  });

  test('escaped pipes are not column borders', () => {
    expect(completeFragment('| a \\| b | c |\n')).toBe('| a \\| b | c |\n| - | - |');
  });

  test('body rows get no separator', () => {
    expect(completeFragment('| a |\n| - |\n| b |\n')).toBe('| a |\n| - |\n| b |\n');
  });

  test('header row without a line break is left alone', () => {
    expect(completeFragment('| foo |')).toBe('| foo |');
  });
});

describe('Fragment completion: lines and whitespace', () => {

  test('empty and whitespace-only input', () => {
    expect(completeFragment('')).toBe('');
    expect(completeFragment('   ')).toBe('   ');
  });

  test('heading with trailing space is unchanged', () => {
    expect(completeFragment('# text ')).toBe('# text ');
  });

  test('blank line ends inline constructs', () => {
    expect(completeFragment('*a\n\nb')).toBe('*a\n\nb');
  });

  test('heading line ends inline constructs', () => {
    expect(completeFragment('# *a\nb')).toBe('# *a\nb');
  });

  test('insignificant leading whitespace is dropped', () => {
    expect(completeFragment('  hello *x')).toBe('hello *x*');
  });

  test('structural leading whitespace is kept', () => {
    expect(completeFragment('\n\n**x')).toBe('\n\n**x**');
    expect(completeFragment('    code')).toBe('    code');
    expect(completeFragment('  - item *x')).toBe('  - item *x*');
  });

  test('carriage return line endings', () => {
    expect(completeFragment('**a\r\n')).toBe('**a**\r\n');
  });

  test('completing twice changes nothing', () => {
    const samples = [
      '**text*',
      'This is *italic **bold',
      '~~strike *bold',
      '[foo]',
      '- [x] Collect *n',
      '$$\n',
      '| foo |\n',
      '```ts\nlet foo',
      '![img](https://cdn.example.com/pic',
      'a `',
      'a ``',
      'a `b'
    ];
    for (const sample of samples) {
      const once = completeFragment(sample);
      expect(completeFragment(once)).toBe(once);
    }
  });
});

describe('Fragment completion: details and state', () => {

  test('reports the appended suffix', () => {
    expect(completeFragmentDetailed('**bo')).toEqual({ completed: '**bo**', suffix: '**' });
    expect(completeFragmentDetailed('done')).toEqual({ completed: 'done', suffix: '' });
  });

  test('scan lists open constructs outermost first', () => {
    const result = scanFragment('**a [b');
    expect(result.open.map((construct) => construct.kind)).toEqual([ConstructKind.Delimiter, ConstructKind.LinkLabel]);
    expect(result.suffix).toBe('](mdex:incomplete-link)**');
    expect(result.fence).toBeUndefined();
  });

  test('escaped bang does not make an image label', () => {
    expect(scanFragment('![x').open).toEqual([{ kind: ConstructKind.LinkLabel, image: true, footnote: false }]);
    expect(scanFragment('\\![x').open).toEqual([{ kind: ConstructKind.LinkLabel, image: false, footnote: false }]);
    expect(scanFragment('\\\\![x').open).toEqual([{ kind: ConstructKind.LinkLabel, image: true, footnote: false }]);
  });

  test('scan reports an open fence', () => {
    const result = scanFragment('> ```ts\n> let a');
    expect(result.fence).toEqual({
      char: '`',
      length: 3,
      indent: 0,
      quoteDepth: 1,
      prefix: '> ',
      hasBody: true,
      partialClose: 0
    });
    expect(result.suffix).toBe('\n> ```');
    expect(result.suffixStartsLine).toBe(true);
  });

  test('unclosed openers carry into the next fragment', () => {
    const first = completeFragmentWithState('**bo');
    expect(first).toEqual({ completed: '**bo**', state: { lastUnclosed: '**' } });

    const second = completeFragmentWithState('ld** done', first.state);
    expect(second).toEqual({ completed: '**ld** done', state: {} });
  });

  test('code span carries over', () => {
    expect(completeFragmentWithState('`foo ')).toEqual({ completed: '`foo` ', state: { lastUnclosed: '`' } });
  });

  test('link labels do not carry over', () => {
    expect(completeFragmentWithState('[a')).toEqual({ completed: '[a](mdex:incomplete-link)', state: {} });
  });
});
