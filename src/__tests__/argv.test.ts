import { describe, it, expect } from 'vitest';
import { ConfigError, EvaluationError } from '../errors.js';
import type { Scope } from '../types.js';
import { buildArgv, buildShorthand } from '../utils/argv.js';
import { formatItem } from '../utils/format.js';

const scope: Scope = {
  form: {
    name: 'api',
    verbose: true,
    quiet: false,
    mode: 'auto',
    files: ['a.txt', 'b.txt', 'c.txt'],
    none: [],
    defines: [
      { name: 'A', value: '1' },
      { name: 'B', value: '2' }
    ]
  }
};

describe('buildArgv', () => {
  it('joins a list into one value', () => {
    expect(buildArgv([{ opt: '--langs', from: ['ru', 'en'], mode: 'join', joiner: ',' }], scope)).toEqual([
      '--langs',
      'ru,en'
    ]);
  });

  it('emits false_opt for a "false" string in flag mode', () => {
    expect(buildArgv([{ opt: '--switch', from: 'false', mode: 'flag', false_opt: '--no-switch' }], scope)).toEqual([
      '--no-switch'
    ]);
  });

  it('renders literal strings and keeps declaration order', () => {
    expect(buildArgv(['build', '${form.name}', { '--verbose': '${form.verbose}' }, 'tail'], scope)).toEqual([
      'build',
      'api',
      '--verbose',
      'tail'
    ]);
  });

  it('emits nothing for "auto", even with false_opt and an explicit mode', () => {
    expect(
      buildArgv([{ opt: '--color', from: '${form.mode}', mode: 'value', false_opt: '--no-color' }], scope)
    ).toEqual([]);
  });

  it('treats a "true" string as a flag whatever the mode', () => {
    expect(buildArgv([{ opt: '--color', from: 'true', mode: 'join' }], scope)).toEqual(['--color']);
  });

  it('repeats the option per list element in auto mode', () => {
    expect(buildArgv([{ opt: '-f', from: '${form.files}' }], scope)).toEqual([
      '-f',
      'a.txt',
      '-f',
      'b.txt',
      '-f',
      'c.txt'
    ]);
  });

  it('uses equals style', () => {
    expect(buildArgv([{ opt: '--name', from: '${form.name}', style: 'equals' }], scope)).toEqual(['--name=api']);
    expect(buildArgv([{ opt: '--f', from: '${form.files}', mode: 'join', style: 'equals' }], scope)).toEqual([
      '--f=a.txt,b.txt,c.txt'
    ]);
  });

  it('formats map items through a template', () => {
    expect(buildArgv([{ opt: '-D', from: '${form.defines}', template: '{name}={value}' }], scope)).toEqual([
      '-D',
      'A=1',
      '-D',
      'B=2'
    ]);
    expect(
      buildArgv([{ opt: '--defs', from: '${form.defines}', mode: 'join', joiner: ';', template: '{name}' }], scope)
    ).toEqual(['--defs', 'A;B']);
  });

  it('omits empty values unless told otherwise', () => {
    expect(buildArgv([{ opt: '-f', from: '${form.none}' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '--name', from: '', mode: 'value' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '--name', from: '', mode: 'value', omit_if_empty: false }], scope)).toEqual([
      '--name',
      ''
    ]);
  });

  it('handles boolean flags', () => {
    expect(buildArgv([{ opt: '-v', from: '${form.verbose}' }], scope)).toEqual(['-v']);
    expect(buildArgv([{ opt: '-q', from: '${form.quiet}' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '-q', from: '${form.quiet}', false_opt: '--loud' }], scope)).toEqual(['--loud']);
  });

  it('emits nothing in flag mode for values that are not booleans', () => {
    expect(buildArgv([{ opt: '--v', from: 0, mode: 'flag' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '--v', from: 'no', mode: 'flag', false_opt: '--no-v' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '--v', from: '${form.name}', mode: 'flag' }], scope)).toEqual([]);
  });

  it('skips options whose when guard is false', () => {
    expect(buildArgv([{ opt: '--name', from: '${form.name}', when: 'form.quiet' }], scope)).toEqual([]);
    expect(buildArgv([{ opt: '--name', from: '${form.name}', when: 'form.verbose' }], scope)).toEqual([
      '--name',
      'api'
    ]);
  });

  it('rejects malformed shorthand entries', () => {
    expect(() => buildArgv([{ '-a': '1', '-b': '2' }], scope)).toThrow(ConfigError);
  });
});

describe('buildShorthand', () => {
  it('counts values the same way for every input kind', () => {
    expect(buildShorthand('-x', true)).toEqual(['-x']);
    expect(buildShorthand('-x', false)).toEqual([]);
    expect(buildShorthand('-x', null)).toEqual([]);
    expect(buildShorthand('-x', '')).toEqual([]);
    expect(buildShorthand('-x', 5)).toEqual(['-x', '5']);
    expect(buildShorthand('-x', ['a', 'b'])).toEqual(['-x', 'a', '-x', 'b']);
  });
});

describe('formatItem', () => {
  it('substitutes positional and named fields', () => {
    expect(formatItem('<{}>', 'x')).toBe('<x>');
    expect(formatItem('{0}:{value}', 'x')).toBe('x:x');
    expect(formatItem('{name}', { name: 'n' })).toBe('n');
    expect(formatItem('{{literal}}', 'x')).toBe('{literal}');
  });

  it('fails on missing fields and stray braces', () => {
    expect(() => formatItem('{other}', { name: 'n' })).toThrow(EvaluationError);
    expect(() => formatItem('{name}', 'scalar')).toThrow(EvaluationError);
    expect(() => formatItem('oops}', 'x')).toThrow('Unbalanced brace in argv template: oops}');
  });
});
