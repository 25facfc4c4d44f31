import {loggableText} from './util.js';
import {Style, DeclaredStyle, getOriginStyle, getRootStyle, EMPTY_STYLE} from './style.js';
import {query, queryAll} from './style-query.js';

import type {Attributes} from './parse-html.js';

export type ChildNode = HTMLElement | TextNode | CommentNode;

export type ParentNode = HTMLElement | Document;

export class TextNode {
  public id: string;
  public style: Style;
  public text: string;
  public parent: ParentNode | null;

  constructor(id: string, text: string, parent: ParentNode | null = null) {
    this.id = id;
    this.style = getOriginStyle();
    this.text = text;
    this.parent = parent;
  }

  repr(indent = 0) {
    return '  '.repeat(indent) + `Ͳ "${loggableText(this.text)}"`;
  }
}

/**
 * Comments stay in the tree so that the tree mirrors the markup, but they are
 * never styled or rendered.
 */
export class CommentNode {
  public id: string;
  public text: string;
  public parent: ParentNode | null;

  constructor(id: string, text: string, parent: ParentNode | null = null) {
    this.id = id;
    this.text = text;
    this.parent = parent;
  }

  repr(indent = 0) {
    return '  '.repeat(indent) + `<!-- ${loggableText(this.text)} -->`;
  }
}

export class HTMLElement {
  public id: string;
  public tagName: string;
  public style: Style;
  /** Declarations from the [style] attribute */
  public declaredStyle: DeclaredStyle;
  public parent: ParentNode | null;
  public attrs: Attributes;
  public children: ChildNode[];

  constructor(
    id: string,
    tagName: string,
    parent: ParentNode | null = null,
    attrs: Attributes = {},
    declaredStyle: DeclaredStyle = EMPTY_STYLE
  ) {
    this.id = id;
    this.tagName = tagName;
    this.style = getOriginStyle();
    this.declaredStyle = declaredStyle;
    this.parent = parent;
    this.attrs = attrs;
    this.children = [];
  }

  get classList(): string[] {
    const value = this.attrs.class;
    return value ? value.split(/[ \t\n\f\r]+/).filter(Boolean) : [];
  }

  /**
   * Closest element ancestor, skipping the document
   */
  get parentElement(): HTMLElement | null {
    return this.parent instanceof HTMLElement ? this.parent : null;
  }

  ownerDocument(): Document | null {
    let node: ParentNode | null = this.parent;
    while (node instanceof HTMLElement) node = node.parent;
    return node;
  }

  repr(indent = 0, styleProp?: keyof Style): string {
    const c = this.children.map(c => {
      return c instanceof HTMLElement ? c.repr(indent + 1, styleProp) : c.repr(indent + 1);
    }).join('\n');
    const style = styleProp ? ` ${styleProp}: ${JSON.stringify(this.style[styleProp])}` : '';
    const desc = `◼ <${this.tagName}>${style}`;
    return '  '.repeat(indent) + desc + (c ? '\n' + c : '');
  }

  query(selector: string): HTMLElement | null {
    return query(selector, this);
  }

  queryAll(selector: string): HTMLElement[] {
    return queryAll(selector, this);
  }
}

export class Document {
  public id: string;
  public style: Style;
  public children: ChildNode[];
  /**
   * Set by the navigator to the navigation that built this tree
   */
  public generation: number;
  public url: URL | null;

  constructor(id: string, url: URL | null = null) {
    this.id = id;
    this.style = getRootStyle();
    this.children = [];
    this.generation = 0;
    this.url = url;
  }

  get documentElement(): HTMLElement | null {
    for (const child of this.children) {
      if (child instanceof HTMLElement && child.tagName !== '!doctype') return child;
    }
    return null;
  }

  repr(indent = 0, styleProp?: keyof Style): string {
    const c = this.children.map(c => {
      return c instanceof HTMLElement ? c.repr(indent + 1, styleProp) : c.repr(indent + 1);
    }).join('\n');
    return '  '.repeat(indent) + '#document' + (c ? '\n' + c : '');
  }

  query(selector: string): HTMLElement | null {
    return query(selector, this);
  }

  queryAll(selector: string): HTMLElement[] {
    return queryAll(selector, this);
  }

  /**
   * All elements in tree order
   */
  *elements(): Generator<HTMLElement, void, undefined> {
    const stack: ChildNode[] = this.children.slice().reverse();

    while (stack.length) {
      const node = stack.pop();
      if (node instanceof HTMLElement) {
        yield node;
        for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
      }
    }
  }
}

/**
 * Concatenated text of every text node under `node`
 */
export function textContent(node: ParentNode | ChildNode): string {
  if (node instanceof TextNode) return node.text;
  if (node instanceof CommentNode) return '';
  return node.children.map(textContent).join('');
}
