import {describe, it, expect} from 'vitest';
import {tokenize, decodeDocument} from '../src/parse-html.js';

import type {Token} from '../src/parse-html.js';

function tokens(html: string) {
  return [...tokenize(html)];
}

function simplify(token: Token) {
  if (token.type === 'startTag') {
    return {type: token.type, name: token.name, attrs: {...token.attrs}, selfClosing: token.selfClosing};
  }
  return token;
}

describe('Tokenizer', function () {
  it('tokenizes tags and text', function () {
    expect(tokens('<p>hi</p>').map(simplify)).toEqual([
      {type: 'startTag', name: 'p', attrs: {}, selfClosing: false},
      {type: 'text', content: 'hi'},
      {type: 'endTag', name: 'p'},
      {type: 'eof'}
    ]);
  });

  it('lowercases tag and attribute names', function () {
    const [token] = tokens('<DIV ID="a">');
    expect(simplify(token)).toEqual({type: 'startTag', name: 'div', attrs: {id: 'a'}, selfClosing: false});
  });

  it('discards the attributes of an end tag and keeps going', function () {
    expect(tokens('<div>a</div class="x">b').map(simplify)).toEqual([
      {type: 'startTag', name: 'div', attrs: {}, selfClosing: false},
      {type: 'text', content: 'a'},
      {type: 'endTag', name: 'div'},
      {type: 'text', content: 'b'},
      {type: 'eof'}
    ]);
  });

  it('ignores a self-closing slash on an end tag', function () {
    expect(tokens('</p/>x')).toEqual([
      {type: 'endTag', name: 'p'},
      {type: 'text', content: 'x'},
      {type: 'eof'}
    ]);
  });

  it('keeps the first of duplicate attributes', function () {
    const [token] = tokens('<a href="1" HREF="2" data-x=y checked>');
    expect(simplify(token)).toEqual({
      type: 'startTag',
      name: 'a',
      attrs: {href: '1', 'data-x': 'y', checked: ''},
      selfClosing: false
    });
  });

  it('flags self-closing start tags', function () {
    const [token] = tokens('<br/>');
    expect(simplify(token)).toEqual({type: 'startTag', name: 'br', attrs: {}, selfClosing: true});
  });

  it('decodes character references in text and attribute values', function () {
    expect(tokens('<a title="x &amp; y">a&lt;b</a>').map(simplify).slice(0, 2)).toEqual([
      {type: 'startTag', name: 'a', attrs: {title: 'x & y'}, selfClosing: false},
      {type: 'text', content: 'a<b'}
    ]);
  });

  it('reads comments and doctypes', function () {
    expect(tokens('<!DOCTYPE html><!-- note -->').map(simplify)).toEqual([
      {type: 'startTag', name: '!doctype', attrs: {html: ''}, selfClosing: false},
      {type: 'comment', content: ' note '},
      {type: 'eof'}
    ]);
  });

  it('treats a lone < as text', function () {
    expect(tokens('1 < 2')).toEqual([{type: 'text', content: '1 < 2'}, {type: 'eof'}]);
  });

  it('does not look for tags inside <style>', function () {
    expect(tokens('<style>a<b {}</style>').map(simplify)).toEqual([
      {type: 'startTag', name: 'style', attrs: {}, selfClosing: false},
      {type: 'text', content: 'a<b {}'},
      {type: 'endTag', name: 'style'},
      {type: 'eof'}
    ]);
  });

  it('leaves <script> on an end tag of any case', function () {
    expect(tokens('<SCRIPT>if (a < b) x();</ScRiPt >y').map(simplify)).toEqual([
      {type: 'startTag', name: 'script', attrs: {}, selfClosing: false},
      {type: 'text', content: 'if (a < b) x();'},
      {type: 'endTag', name: 'script'},
      {type: 'text', content: 'y'},
      {type: 'eof'}
    ]);
  });

  it('keeps character references and other end tags raw inside <script>', function () {
    expect(tokens('<script>a &amp; </b></scripts></script>').map(simplify)).toEqual([
      {type: 'startTag', name: 'script', attrs: {}, selfClosing: false},
      {type: 'text', content: 'a &amp; </b></scripts>'},
      {type: 'endTag', name: 'script'},
      {type: 'eof'}
    ]);
  });

  it('ends unterminated raw text at the end of input', function () {
    expect(tokens('<style>p {').map(simplify)).toEqual([
      {type: 'startTag', name: 'style', attrs: {}, selfClosing: false},
      {type: 'text', content: 'p {'},
      {type: 'eof'}
    ]);
  });

  it('emits a tag cut off by the end of input', function () {
    expect(tokens('<div class="x').map(simplify)).toEqual([
      {type: 'startTag', name: 'div', attrs: {class: 'x'}, selfClosing: false},
      {type: 'eof'}
    ]);
  });

  it('ends with exactly one eof', function () {
    for (const html of ['', '<', '</', '<!--', '<a b="', 'text', '<p>x</p']) {
      const all = tokens(html);
      expect(all.filter(t => t.type === 'eof')).toHaveLength(1);
      expect(all[all.length - 1]).toEqual({type: 'eof'});
    }
  });
});

describe('decodeDocument', function () {
  it('uses the charset of the content type', function () {
    const bytes = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);
    expect(decodeDocument(bytes, 'text/html; charset=iso-8859-1')).toBe('café');
  });

  it('defaults to UTF-8', function () {
    const bytes = new TextEncoder().encode('naïve');
    expect(decodeDocument(bytes)).toBe('naïve');
  });
});
