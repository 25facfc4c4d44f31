// Adapted from fb55/css-select by Felix Böhm
//
// The MIT License (MIT)
//
// Copyright (c) 2016 Nik Coughlin
//
// Permission is hereby granted, free of charge, to any person obtaining a copy
// of this software and associated documentation files (the "Software"), to deal
// in the Software without restriction, including without limitation the rights
// to use, copy, modify, merge, publish, distribute, sublicense, and/or sell
// copies of the Software, and to permit persons to whom the Software is
// furnished to do so, subject to the following conditions:
//
// The above copyright notice and this permission notice shall be included in all
// copies or substantial portions of the Software.
//
// THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
// IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
// FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
// AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
// LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING FROM,
// OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE
// SOFTWARE.

// Selector matching compiled to closures, after css-select: each token of a
// complex selector wraps the function built from the tokens to its left, so
// the rightmost compound is tested against the element first and traversals
// walk outwards from there.

import {parse, isTraversal} from './style-selector.js';
import {HTMLElement} from './dom.js';

import type {Selector, SimpleSelector, Traversal} from './style-selector.js';
import type {Document} from './dom.js';

export type CompiledQuery = (elem: HTMLElement) => boolean;

function trueFunc() {
  return true;
}

function getParent(elem: HTMLElement) {
  return elem.parentElement;
}

function getSiblings(elem: HTMLElement) {
  const parent = elem.parent;
  if (!parent) return [elem];
  const ret: HTMLElement[] = [];
  for (const child of parent.children) if (child instanceof HTMLElement) ret.push(child);
  return ret;
}

function compileSimple(next: CompiledQuery, selector: SimpleSelector): CompiledQuery {
  switch (selector.type) {
    case 'tag': {
      const {name} = selector;
      return elem => elem.tagName === name && next(elem);
    }
    case 'universal':
      return next;
    case 'class': {
      const {name} = selector;
      return elem => elem.classList.includes(name) && next(elem);
    }
    case 'id': {
      const {name} = selector;
      return elem => elem.attrs.id === name && next(elem);
    }
    case 'attribute': {
      const {name, action, value} = selector;
      if (action === 'exists') {
        return elem => name in elem.attrs && next(elem);
      } else if (action === 'equals') {
        return elem => elem.attrs[name] === value && next(elem);
      } else {
        if (value === '' || /\s/.test(value)) return () => false;
        return elem => {
          const attr = elem.attrs[name];
          return attr !== undefined && attr.split(/\s+/).includes(value) && next(elem);
        };
      }
    }
  }
}

function compileTraversal(next: CompiledQuery, selector: Traversal): CompiledQuery {
  switch (selector.type) {
    case 'descendant':
      return elem => {
        let current: HTMLElement | null = elem;

        while ((current = getParent(current))) {
          if (next(current)) return true;
        }

        return false;
      };
    case 'child':
      return elem => {
        const parent = getParent(elem);
        return parent !== null && next(parent);
      };
    case 'sibling':
      return elem => {
        const siblings = getSiblings(elem);

        for (let i = 0; i < siblings.length; i++) {
          const currentSibling = siblings[i];
          if (elem === currentSibling) break;
          if (next(currentSibling)) return true;
        }

        return false;
      };
    case 'adjacent':
      return elem => {
        const siblings = getSiblings(elem);
        let lastElement;

        for (let i = 0; i < siblings.length; i++) {
          const currentSibling = siblings[i];
          if (elem === currentSibling) break;
          lastElement = currentSibling;
        }

        return !!lastElement && next(lastElement);
      };
  }
}

export function compileToken(token: Selector[]): CompiledQuery {
  return token.reduce<CompiledQuery>((previous, part) => {
    if (isTraversal(part)) {
      return compileTraversal(previous, part);
    } else {
      return compileSimple(previous, part);
    }
  }, trueFunc);
}

export function compile(selector: string): CompiledQuery {
  const tests = parse(selector).map(compileToken);
  if (tests.length === 1) return tests[0];
  return elem => tests.some(test => test(elem));
}

/**
 * True when the element matches the complex selector. Compound selectors
 * require every simple selector to pass on the same element.
 */
export function matches(elem: HTMLElement, selector: string | Selector[]) {
  const test = typeof selector === 'string' ? compile(selector) : compileToken(selector);
  return test(elem);
}

function* descendants(root: HTMLElement | Document) {
  const stack = root.children.slice().reverse();

  while (stack.length) {
    const node = stack.pop();
    if (node instanceof HTMLElement) {
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    }
  }
}

export function query(selector: string, root: HTMLElement | Document): HTMLElement | null {
  const test = compile(selector);
  for (const elem of descendants(root)) if (test(elem)) return elem;
  return null;
}

export function queryAll(selector: string, root: HTMLElement | Document): HTMLElement[] {
  const test = compile(selector);
  const ret: HTMLElement[] = [];
  for (const elem of descendants(root)) if (test(elem)) ret.push(elem);
  return ret;
}

interface IndexedRule<T> {
  rule: T;
  test: CompiledQuery;
}

/**
 * Buckets rules by the most selective part of their rightmost compound (id,
 * then class, then tag) so that an element only gets tested against rules that
 * could possibly match it.
 */
export class RuleIndex<T extends {selector: Selector[]}> {
  private byId: Map<string, IndexedRule<T>[]>;
  private byClass: Map<string, IndexedRule<T>[]>;
  private byTag: Map<string, IndexedRule<T>[]>;
  private universal: IndexedRule<T>[];
  public size: number;

  constructor(rules: Iterable<T> = []) {
    this.byId = new Map();
    this.byClass = new Map();
    this.byTag = new Map();
    this.universal = [];
    this.size = 0;
    for (const rule of rules) this.add(rule);
  }

  private bucket(map: Map<string, IndexedRule<T>[]>, key: string) {
    let list = map.get(key);
    if (!list) map.set(key, list = []);
    return list;
  }

  add(rule: T) {
    const entry = {rule, test: compileToken(rule.selector)};
    let id: string | undefined, cls: string | undefined, tag: string | undefined;

    for (let i = rule.selector.length - 1; i >= 0; i--) {
      const token = rule.selector[i];
      if (token.type === 'id') id = token.name;
      else if (token.type === 'class') cls ??= token.name;
      else if (token.type === 'tag') tag = token.name;
      else if (token.type !== 'attribute' && token.type !== 'universal') break;
    }

    if (id !== undefined) {
      this.bucket(this.byId, id).push(entry);
    } else if (cls !== undefined) {
      this.bucket(this.byClass, cls).push(entry);
    } else if (tag !== undefined) {
      this.bucket(this.byTag, tag).push(entry);
    } else {
      this.universal.push(entry);
    }

    this.size += 1;
  }

  /**
   * Rules whose selector matches the element, in no particular order
   */
  match(elem: HTMLElement): T[] {
    const ret: T[] = [];
    const candidates: IndexedRule<T>[][] = [this.universal];
    const id = elem.attrs.id;

    if (id !== undefined) {
      const list = this.byId.get(id);
      if (list) candidates.push(list);
    }

    for (const cls of new Set(elem.classList)) {
      const list = this.byClass.get(cls);
      if (list) candidates.push(list);
    }

    const list = this.byTag.get(elem.tagName);
    if (list) candidates.push(list);

    for (const list of candidates) {
      for (const {rule, test} of list) {
        if (test(elem)) ret.push(rule);
      }
    }

    return ret;
  }
}
