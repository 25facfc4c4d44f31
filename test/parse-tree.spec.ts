import {describe, it, expect, vi, afterEach} from 'vitest';
import {parse} from '../src/parse-tree.js';
import {Document, HTMLElement, TextNode, CommentNode, textContent} from '../src/dom.js';
import {environment} from '../src/environment.js';

import type {ChildNode} from '../src/dom.js';

function tags(children: ChildNode[]) {
  return children.filter(c => c instanceof HTMLElement).map(c => c.tagName);
}

function element(node: ChildNode | undefined) {
  if (!(node instanceof HTMLElement)) throw new Error('Expected an element');
  return node;
}

describe('Tree construction', function () {
  afterEach(function () {
    vi.restoreAllMocks();
  });

  it('closes <li> when another <li> starts', function () {
    const document = parse('<ul><li>a<li>b</ul>');
    const ul = element(document.children[0]);
    expect(ul.tagName).toBe('ul');
    expect(tags(ul.children)).toEqual(['li', 'li']);
    expect(ul.children.map(textContent)).toEqual(['a', 'b']);
  });

  it('closes <dt> and <dd> when either starts', function () {
    const document = parse('<dl><dt>x<dd>y<dt>z</dl>');
    const dl = element(document.children[0]);
    expect(tags(dl.children)).toEqual(['dt', 'dd', 'dt']);
    expect(dl.children.map(textContent)).toEqual(['x', 'y', 'z']);
  });

  it('closes cells and rows', function () {
    const document = parse('<table><tr><td>1<td>2<tr><td>3</table>');
    const table = element(document.children[0]);
    expect(tags(table.children)).toEqual(['tr', 'tr']);
    const [tr1, tr2] = table.children.map(element);
    expect(tags(tr1.children)).toEqual(['td', 'td']);
    expect(tags(tr2.children)).toEqual(['td']);
    expect(textContent(tr2)).toBe('3');
  });

  it('closes <p> before a block that cannot be inside it', function () {
    const document = parse('<p>a<p>b<h1>c</h1>');
    expect(tags(document.children)).toEqual(['p', 'p', 'h1']);
  });

  it('leaves <p> open for a <div>', function () {
    const document = parse('<p>a<div>b</div></p>');
    const p = element(document.children[0]);
    expect(tags(p.children)).toEqual(['div']);
  });

  it('drops end tags that close nothing, with a warning', function () {
    const warn = vi.spyOn(environment, 'warn').mockImplementation(() => {});
    const document = parse('<p>a</span>b</p>');
    const p = element(document.children[0]);
    expect(p.children).toHaveLength(1);
    expect(textContent(p)).toBe('ab');
    expect(warn).toHaveBeenCalledWith('Ignoring </span>: no <span> is open');
  });

  it('closes everything between an end tag and its element', function () {
    const document = parse('<div><span><b>x</div>y');
    expect(tags(document.children)).toEqual(['div']);
    const last = document.children[1];
    expect(last).toBeInstanceOf(TextNode);
    expect(textContent(document)).toBe('xy');
  });

  it('does not push void elements', function () {
    const document = parse('<p>a<br>b<img src=x>c</p>');
    const p = element(document.children[0]);
    expect(p.children.map(c => c instanceof HTMLElement ? c.tagName : textContent(c))).toEqual([
      'a', 'br', 'b', 'img', 'c'
    ]);
  });

  it('keeps comments in the tree', function () {
    const document = parse('a<!--b-->c');
    expect(document.children).toHaveLength(3);
    expect(document.children[1]).toBeInstanceOf(CommentNode);
    expect(textContent(document)).toBe('ac');
  });

  it('parses [style] into declarations', function () {
    const document = parse('<div style="width: 10px">');
    expect(element(document.children[0]).declaredStyle).toEqual({width: 10});
  });

  it('always produces a tree rooted at the document', function () {
    vi.spyOn(environment, 'warn').mockImplementation(() => {});

    const inputs = [
      '',
      '</html>',
      '<li>a<li>b',
      '<td><tr><td></table>',
      '<p><div><p></div></p>',
      '<a <b c="d>',
      '<!-- unterminated',
      '<ul><li><ul><li>x</ul></ul>'
    ];

    for (const input of inputs) {
      const document = parse(input);
      expect(document).toBeInstanceOf(Document);

      for (const el of document.elements()) {
        expect(el.ownerDocument()).toBe(document);
        for (const child of el.children) expect(child.parent).toBe(el);
      }
    }
  });

  it('records the url it was given', function () {
    const url = new URL('http://test.invalid/page.html');
    expect(parse('x', url).url).toBe(url);
  });
});

describe('Document', function () {
  it('finds the document element', function () {
    const document = parse('<!doctype html><html><body></body></html>');
    expect(document.documentElement?.tagName).toBe('html');
  });

  it('queries elements', function () {
    const document = parse('<div class="a"><p id="x"></p><p></p></div>');
    expect(document.query('#x')?.tagName).toBe('p');
    expect(document.queryAll('.a p')).toHaveLength(2);
  });

  it('prints the tree', function () {
    const document = parse('<div><p>a</p><!--c--></div>');
    expect(document.repr()).toBe([
      '#document',
      '  ◼ <div>',
      '    ◼ <p>',
      '      Ͳ "a"',
      '    <!-- c -->'
    ].join('\n'));
  });
});
