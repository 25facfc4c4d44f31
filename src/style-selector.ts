// css-what
//
// Copyright (c) Felix Böhm
// All rights reserved.
//
// Redistribution and use in source and binary forms, with or without
// modification, are permitted provided that the following conditions are met:
//
// Redistributions of source code must retain the above copyright notice, this
// list of conditions and the following disclaimer.
//
// Redistributions in binary form must reproduce the above copyright notice,
// this list of conditions and the following disclaimer in the documentation
// and/or other materials provided with the distribution.
//
// THIS IS PROVIDED BY THE COPYRIGHT HOLDERS AND CONTRIBUTORS "AS IS" AND ANY
// EXPRESS OR IMPLIED WARRANTIES, INCLUDING, BUT NOT LIMITED TO, THE IMPLIED
// WARRANTIES OF MERCHANTABILITY AND FITNESS FOR A PARTICULAR PURPOSE ARE
// DISCLAIMED. IN NO EVENT SHALL THE COPYRIGHT HOLDER OR CONTRIBUTORS BE LIABLE
// FOR ANY DIRECT, INDIRECT, INCIDENTAL, SPECIAL, EXEMPLARY, OR CONSEQUENTIAL
// DAMAGES (INCLUDING, BUT NOT LIMITED TO, PROCUREMENT OF SUBSTITUTE GOODS OR
// SERVICES; LOSS OF USE, DATA, OR PROFITS; OR BUSINESS INTERRUPTION) HOWEVER
// CAUSED AND ON ANY THEORY OF LIABILITY, WHETHER IN CONTRACT, STRICT
// LIABILITY, OR TORT (INCLUDING NEGLIGENCE OR OTHERWISE) ARISING IN ANY WAY
// OUT OF THE USE OF THIS, EVEN IF ADVISED OF THE POSSIBILITY OF SUCH DAMAGE.

// Selector parser. The shape of the output follows css-what: a selector list is
// an array of compound/complex selectors, each of which is a flat array of
// simple selectors and traversals, read left to right.

export interface TagSelector {
  type: 'tag';
  name: string;
}

export interface UniversalSelector {
  type: 'universal';
}

export interface ClassSelector {
  type: 'class';
  name: string;
}

export interface IdSelector {
  type: 'id';
  name: string;
}

export type AttributeAction = 'exists' | 'equals' | 'element';

export interface AttributeSelector {
  type: 'attribute';
  name: string;
  action: AttributeAction;
  value: string;
}

export type TraversalType = 'descendant' | 'child' | 'adjacent' | 'sibling';

export interface Traversal {
  type: TraversalType;
}

export type SimpleSelector =
  | TagSelector
  | UniversalSelector
  | ClassSelector
  | IdSelector
  | AttributeSelector;

export type Selector = SimpleSelector | Traversal;

export type Specificity = [ids: number, classes: number, tags: number];

export class SelectorSyntaxError extends Error {
  constructor(selector: string, message: string) {
    super(`Invalid selector "${selector}": ${message}`);
    this.name = 'SelectorSyntaxError';
  }
}

const traversals: Record<string, TraversalType> = {
  '>': 'child',
  '+': 'adjacent',
  '~': 'sibling'
};

const reName = /^(?:\\[\da-f]{1,6}\s?|\\.|[\w\-\u00b0-\uffff])+/i;
const reEscape = /\\([\da-f]{1,6}\s?|.)/gi;

function unescapeIdent(str: string) {
  return str.replace(reEscape, (_, escaped: string) => {
    const hex = escaped.trim();
    if (!/^[\da-f]+$/i.test(hex)) return escaped;
    const code = parseInt(hex, 16);
    return code > 0x10ffff ? '\ufffd' : String.fromCodePoint(code);
  });
}

function isWhitespace(c: string) {
  return c === ' ' || c === '\t' || c === '\n' || c === '\f' || c === '\r';
}

export function isTraversal(selector: Selector): selector is Traversal {
  return selector.type === 'descendant'
    || selector.type === 'child'
    || selector.type === 'adjacent'
    || selector.type === 'sibling';
}

/**
 * Parses a selector list. Throws a SelectorSyntaxError for anything outside of
 * the supported grammar (pseudo-classes, namespaces, etc) so that callers can
 * drop the whole rule.
 */
export function parse(selector: string): Selector[][] {
  const subselects: Selector[][] = [];
  let tokens: Selector[] = [];
  let i = 0;

  function readName() {
    const match = reName.exec(selector.slice(i));
    if (!match) throw new SelectorSyntaxError(selector, `expected a name at ${i}`);
    i += match[0].length;
    return unescapeIdent(match[0]);
  }

  function skipWhitespace() {
    while (i < selector.length && isWhitespace(selector[i])) i++;
  }

  function finalizeSubselector() {
    const last = tokens.at(-1);

    if (last && last.type === 'descendant') tokens.pop();

    if (!tokens.length) {
      throw new SelectorSyntaxError(selector, 'empty sub-selector');
    }

    const end = tokens.at(-1);
    if (end && isTraversal(end)) {
      throw new SelectorSyntaxError(selector, 'dangling combinator');
    }

    subselects.push(tokens);
    tokens = [];
  }

  skipWhitespace();

  while (i < selector.length) {
    const c = selector[i];

    if (isWhitespace(c)) {
      skipWhitespace();
      const last = tokens.at(-1);
      if (last && !isTraversal(last)) tokens.push({type: 'descendant'});
    } else if (c in traversals) {
      const last = tokens.at(-1);
      if (last && last.type === 'descendant') tokens.pop();
      const prev = tokens.at(-1);
      if (!prev || isTraversal(prev)) {
        throw new SelectorSyntaxError(selector, `unexpected "${c}"`);
      }
      tokens.push({type: traversals[c]});
      i++;
      skipWhitespace();
    } else if (c === ',') {
      finalizeSubselector();
      i++;
      skipWhitespace();
    } else if (c === '*') {
      tokens.push({type: 'universal'});
      i++;
    } else if (c === '.') {
      i++;
      tokens.push({type: 'class', name: readName()});
    } else if (c === '#') {
      i++;
      tokens.push({type: 'id', name: readName()});
    } else if (c === '[') {
      i++;
      skipWhitespace();
      const name = readName().toLowerCase();
      skipWhitespace();

      if (selector[i] === ']') {
        tokens.push({type: 'attribute', name, action: 'exists', value: ''});
      } else {
        let action: AttributeAction;

        if (selector[i] === '=') {
          action = 'equals';
          i++;
        } else if (selector.startsWith('~=', i)) {
          action = 'element';
          i += 2;
        } else {
          throw new SelectorSyntaxError(selector, `unsupported attribute operator at ${i}`);
        }

        skipWhitespace();

        let value;
        const quote = selector[i];

        if (quote === '"' || quote === "'") {
          const end = selector.indexOf(quote, i + 1);
          if (end < 0) throw new SelectorSyntaxError(selector, 'unterminated string');
          value = unescapeIdent(selector.slice(i + 1, end));
          i = end + 1;
        } else {
          value = readName();
        }

        skipWhitespace();
        if (selector[i] !== ']') throw new SelectorSyntaxError(selector, 'expected "]"');
        tokens.push({type: 'attribute', name, action, value});
      }

      i++;
    } else if (reName.test(selector.slice(i))) {
      tokens.push({type: 'tag', name: readName().toLowerCase()});
    } else {
      throw new SelectorSyntaxError(selector, `unexpected "${c}" at ${i}`);
    }
  }

  finalizeSubselector();

  return subselects;
}

/**
 * (ids, classes and attributes, tags) of a single complex selector
 */
export function specificity(selector: Selector[]): Specificity {
  const ret: Specificity = [0, 0, 0];

  for (const token of selector) {
    if (token.type === 'id') {
      ret[0] += 1;
    } else if (token.type === 'class' || token.type === 'attribute') {
      ret[1] += 1;
    } else if (token.type === 'tag') {
      ret[2] += 1;
    }
  }

  return ret;
}

export function compareSpecificity(a: Specificity, b: Specificity) {
  return a[0] - b[0] || a[1] - b[1] || a[2] - b[2];
}

export function stringify(selector: Selector[]): string {
  let ret = '';

  for (const token of selector) {
    switch (token.type) {
      case 'tag': ret += token.name; break;
      case 'universal': ret += '*'; break;
      case 'class': ret += '.' + token.name; break;
      case 'id': ret += '#' + token.name; break;
      case 'attribute':
        if (token.action === 'exists') {
          ret += `[${token.name}]`;
        } else {
          ret += `[${token.name}${token.action === 'element' ? '~=' : '='}${JSON.stringify(token.value)}]`;
        }
        break;
      case 'descendant': ret += ' '; break;
      case 'child': ret += ' > '; break;
      case 'adjacent': ret += ' + '; break;
      case 'sibling': ret += ' ~ '; break;
    }
  }

  return ret;
}
