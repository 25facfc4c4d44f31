import {describe, it, expect} from 'vitest';
import {parse} from '../src/parse-tree.js';
import {parseStylesheet} from '../src/parse-css.js';
import {RuleIndex, matches} from '../src/style-query.js';
import {resolveStyles} from '../src/style.js';
import {TextNode} from '../src/dom.js';

import type {Document, HTMLElement} from '../src/dom.js';

const red = {r: 255, g: 0, b: 0, a: 1};
const blue = {r: 0, g: 0, b: 255, a: 1};

function styled(html: string, css = '') {
  const document = parse(html);
  resolveStyles(document, new RuleIndex(parseStylesheet(css)));
  return document;
}

function get(document: Document, selector: string): HTMLElement {
  const el = document.query(selector);
  if (!el) throw new Error(`No element matches ${selector}`);
  return el;
}

describe('Selector matching', function () {
  const document = parse(`
    <div id="main" class="a b">
      <section><p class="a">x</p></section>
      <span lang="en"></span><em></em>
    </div>
  `);

  it('requires every part of a compound to match', function () {
    expect(matches(get(document, '#main'), '.a.b')).toBe(true);
    expect(matches(get(document, 'p'), '.a.b')).toBe(false);
    expect(matches(get(document, 'p'), 'p.a')).toBe(true);
  });

  it('walks ancestors for descendant combinators', function () {
    expect(matches(get(document, 'p'), 'div p')).toBe(true);
    expect(matches(get(document, 'p'), 'section p')).toBe(true);
    expect(matches(get(document, 'p'), 'span p')).toBe(false);
  });

  it('only looks at the parent for child combinators', function () {
    expect(matches(get(document, 'p'), 'div > p')).toBe(false);
    expect(matches(get(document, 'p'), 'section > p')).toBe(true);
  });

  it('matches siblings and attributes', function () {
    expect(matches(get(document, 'em'), 'span + em')).toBe(true);
    expect(matches(get(document, 'em'), 'section ~ em')).toBe(true);
    expect(matches(get(document, 'span'), '[lang=en]')).toBe(true);
    expect(matches(get(document, 'span'), '[lang=fr]')).toBe(false);
  });
});

describe('RuleIndex', function () {
  it('returns only the rules that match', function () {
    const index = new RuleIndex(parseStylesheet('p {} .a {} #main {} * {} .zzz {} section p {}'));
    const document = parse('<div id="main" class="a"><section><p class="a"></p></section></div>');
    const p = get(document, 'p');
    const matched = index.match(p).map(rule => rule.order).sort((a, b) => a - b);
    const all = index.match(get(document, '#main')).length;

    expect(matched).toHaveLength(4);
    expect(all).toBe(3);
    expect(index.size).toBe(6);
  });
});

describe('Cascade', function () {
  it('lets the more specific rule win regardless of order', function () {
    const html = '<div class="note">x</div>';
    expect(get(styled(html, 'div { color: red } .note { color: blue }'), 'div').style.color).toEqual(blue);
    expect(get(styled(html, '.note { color: blue } div { color: red }'), 'div').style.color).toEqual(blue);
  });

  it('lets the later rule win at equal specificity', function () {
    const html = '<p class="a b">x</p>';
    expect(get(styled(html, '.a { color: red } .b { color: blue }'), 'p').style.color).toEqual(blue);
    expect(get(styled(html, '.b { color: blue } .a { color: red }'), 'p').style.color).toEqual(red);
  });

  it('puts [style] above every rule', function () {
    const document = styled('<p id="x" style="color: blue">x</p>', '#x { color: red }');
    expect(get(document, 'p').style.color).toEqual(blue);
  });

  it('puts author rules above user agent styles', function () {
    const document = styled('<p>x</p>', 'p { margin-top: 3px }');
    expect(get(document, 'p').style.marginTop).toBe(3);
  });

  it('applies user agent styles', function () {
    const document = styled('<h1>x</h1><span>y</span><head><title>t</title></head>');
    const h1 = get(document, 'h1');
    expect(h1.style.display).toEqual({outer: 'block', inner: 'flow'});
    expect(h1.style.fontSize).toBe(32);
    expect(h1.style.fontWeight).toBe(700);
    expect(get(document, 'span').style.display).toEqual({outer: 'inline', inner: 'flow'});
    expect(get(document, 'head').style.display).toEqual({outer: 'none', inner: 'none'});
  });
});

describe('Inheritance', function () {
  it('inherits color but not width', function () {
    const document = styled('<div style="color: red; width: 50px"><p>x</p></div>');
    const p = get(document, 'p');
    expect(p.style.color).toEqual(red);
    expect(p.style.width).toBe('auto');
  });

  it('gives text the inherited properties of its parent', function () {
    const document = styled('<div style="color: red; background-color: blue">x</div>');
    const text = get(document, 'div').children[0];
    if (!(text instanceof TextNode)) throw new Error('Expected text');
    expect(text.style.color).toEqual(red);
    expect(text.style.backgroundColor).toEqual({r: 0, g: 0, b: 0, a: 0});
  });

  it('inherits on request', function () {
    const document = styled('<div style="width: 50px"><p style="width: inherit"></p></div>');
    expect(get(document, 'p').style.width).toBe(50);
  });

  it('resets to the initial value on request', function () {
    const document = styled('<div style="color: red"><p style="color: initial"></p></div>');
    expect(get(document, 'p').style.color).toEqual({r: 0, g: 0, b: 0, a: 1});
  });
});

describe('Computed values', function () {
  it('resolves em against the font size', function () {
    const document = styled('<div style="font-size: 20px"><p style="font-size: 2em; margin-top: 1em"></p></div>');
    const p = get(document, 'p');
    expect(p.style.fontSize).toBe(40);
    expect(p.style.marginTop).toBe(40);
  });

  it('resolves percentage font sizes against the parent', function () {
    const document = styled('<div style="font-size: 20px"><p style="font-size: 150%"></p></div>');
    expect(get(document, 'p').style.fontSize).toBe(30);
  });

  it('keeps percentage widths for layout', function () {
    const document = styled('<div style="width: 50%"></div>');
    expect(get(document, 'div').style.width).toEqual({value: 50, unit: '%'});
  });

  it('makes weights relative to the parent', function () {
    const document = styled('<div style="font-weight: 300"><b>x</b></div>');
    expect(get(document, 'b').style.fontWeight).toBe(400);
  });

  it('computes unitless line heights to a number', function () {
    const document = styled('<div style="font-size: 10px; line-height: 20px"><p style="line-height: 1.5"></p></div>');
    expect(get(document, 'div').style.lineHeight).toBe(20);
    expect(get(document, 'p').style.lineHeight).toEqual({value: 1.5, unit: null});
  });
});
