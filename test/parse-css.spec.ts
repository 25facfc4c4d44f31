import {describe, it, expect, vi, afterEach} from 'vitest';
import {parseStylesheet, parseDeclarations, parseColor} from '../src/parse-css.js';
import {parse as parseSelector, specificity, stringify} from '../src/style-selector.js';
import {environment} from '../src/environment.js';
import {inherited, initial} from '../src/style.js';

describe('Declarations', function () {
  afterEach(function () {
    vi.restoreAllMocks();
  });

  it('parses lengths, colors and keywords', function () {
    expect(parseDeclarations('width: 10px; height: 50%; margin-top: 1.5em; color: red; white-space: pre')).toEqual({
      width: 10,
      height: {value: 50, unit: '%'},
      marginTop: {value: 1.5, unit: 'em'},
      color: {r: 255, g: 0, b: 0, a: 1},
      whiteSpace: 'pre'
    });
  });

  it('lets a later duplicate win', function () {
    expect(parseDeclarations('color: red; color: blue')).toEqual({color: {r: 0, g: 0, b: 255, a: 1}});
  });

  it('skips bad declarations one at a time', function () {
    const warn = vi.spyOn(environment, 'warn').mockImplementation(() => {});
    const style = parseDeclarations('width: 10px; colour: red; height: banana; margin-left 4px; padding-top: 2px');
    expect(style).toEqual({width: 10, paddingTop: 2});
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it('only allows zero without a unit', function () {
    vi.spyOn(environment, 'warn').mockImplementation(() => {});
    expect(parseDeclarations('margin-top: 0; margin-bottom: 5')).toEqual({marginTop: 0});
  });

  it('expands box shorthands', function () {
    expect(parseDeclarations('margin: 1px 2px 3px')).toEqual({
      marginTop: 1,
      marginRight: 2,
      marginBottom: 3,
      marginLeft: 2
    });

    expect(parseDeclarations('padding: 4px 0')).toEqual({
      paddingTop: 4,
      paddingRight: 0,
      paddingBottom: 4,
      paddingLeft: 0
    });
  });

  it('expands border and resets what it leaves out', function () {
    const style = parseDeclarations('border: 2px solid');
    expect(style.borderTopWidth).toBe(2);
    expect(style.borderLeftStyle).toBe('solid');
    expect(style.borderBottomColor).toBe(initial);
  });

  it('accepts inherit and initial everywhere', function () {
    const style = parseDeclarations('width: inherit; padding: initial');
    expect(style.width).toBe(inherited);
    expect(style.paddingTop).toBe(initial);
    expect(style.paddingLeft).toBe(initial);
  });

  it('ignores !important', function () {
    expect(parseDeclarations('color: lime !important')).toEqual({color: {r: 0, g: 255, b: 0, a: 1}});
  });

  it('maps display keywords', function () {
    expect(parseDeclarations('display: inline-block').display).toEqual({outer: 'inline', inner: 'flow-root'});
    expect(parseDeclarations('display: none').display).toEqual({outer: 'none', inner: 'none'});
  });

  it('reads font-size keywords and font families', function () {
    expect(parseDeclarations('font-size: large; font-family: "Noto Sans", serif')).toEqual({
      fontSize: 18,
      fontFamily: ['Noto Sans', 'serif']
    });
  });
});

describe('Colors', function () {
  it('parses hex notations', function () {
    expect(parseColor('#f00')).toEqual({r: 255, g: 0, b: 0, a: 1});
    expect(parseColor('#00ff0080')).toEqual({r: 0, g: 255, b: 0, a: 128 / 255});
  });

  it('parses rgb() and rgba()', function () {
    expect(parseColor('rgb(1, 2, 3)')).toEqual({r: 1, g: 2, b: 3, a: 1});
    expect(parseColor('rgba(10, 20, 30, 0.5)')).toEqual({r: 10, g: 20, b: 30, a: 0.5});
    expect(parseColor('rgb(100% 0% 0% / 25%)')).toEqual({r: 255, g: 0, b: 0, a: 0.25});
  });

  it('rejects junk', function () {
    expect(parseColor('#12')).toBeUndefined();
    expect(parseColor('rgb(1, 2)')).toBeUndefined();
    expect(parseColor('reddish')).toBeUndefined();
  });
});

describe('Stylesheets', function () {
  afterEach(function () {
    vi.restoreAllMocks();
  });

  it('makes one rule per selector in a list', function () {
    const rules = parseStylesheet('h1, .a > p { color: red }');
    expect(rules).toHaveLength(2);
    expect(rules.map(r => stringify(r.selector))).toEqual(['h1', '.a > p']);
    expect(rules[0].declarations).toBe(rules[1].declarations);
    expect(rules[1].order).toBe(rules[0].order + 1);
  });

  it('numbers rules across stylesheets', function () {
    const [a] = parseStylesheet('a {}');
    const [b] = parseStylesheet('b {}');
    expect(b.order).toBeGreaterThan(a.order);
  });

  it('strips comments and skips at-rules', function () {
    const rules = parseStylesheet(`
      /* heading */
      @import "x.css";
      @media screen { p { color: red } }
      p { /* inside */ color: blue }
    `);

    expect(rules).toHaveLength(1);
    expect(stringify(rules[0].selector)).toBe('p');
    expect(rules[0].declarations).toEqual({color: {r: 0, g: 0, b: 255, a: 1}});
  });

  it('drops rules with selectors it does not support', function () {
    const warn = vi.spyOn(environment, 'warn').mockImplementation(() => {});
    const rules = parseStylesheet('a:hover { color: red } b { color: blue }');
    expect(rules.map(r => stringify(r.selector))).toEqual(['b']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('recovers from a missing closing brace', function () {
    const rules = parseStylesheet('p { color: red');
    expect(rules).toHaveLength(1);
    expect(rules[0].declarations).toEqual({color: {r: 255, g: 0, b: 0, a: 1}});
  });

  it('computes specificity', function () {
    const [rule] = parseStylesheet('#a .b.c div span {}');
    expect(rule.specificity).toEqual([1, 2, 2]);
  });
});

describe('Selectors', function () {
  it('parses compounds and combinators', function () {
    expect(parseSelector('div.a > p b')).toEqual([[
      {type: 'tag', name: 'div'},
      {type: 'class', name: 'a'},
      {type: 'child'},
      {type: 'tag', name: 'p'},
      {type: 'descendant'},
      {type: 'tag', name: 'b'}
    ]]);
  });

  it('parses attribute selectors', function () {
    expect(parseSelector('[lang="en"]')).toEqual([[
      {type: 'attribute', name: 'lang', action: 'equals', value: 'en'}
    ]]);
  });

  it('throws on a dangling combinator', function () {
    expect(() => parseSelector('div >')).toThrow('dangling combinator');
  });

  it('counts ids, classes and tags', function () {
    const [selector] = parseSelector('ul li.x');
    expect(specificity(selector)).toEqual([0, 1, 2]);
  });
});
