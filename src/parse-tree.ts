import {tokenize} from './parse-html.js';
import {Document, HTMLElement, TextNode, CommentNode} from './dom.js';
import {parseDeclarations} from './parse-css.js';
import {EMPTY_STYLE} from './style.js';
import {environment} from './environment.js';
import {id} from './util.js';

import type {Token, StartTagToken} from './parse-html.js';

export const voidElements = new Set([
  '!doctype',
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr'
]);

const pCloser = new Set(['p', 'table', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6']);
const dtdd = new Set(['dt', 'dd']);
const tdth = new Set(['td', 'th']);

// Checked in order when a start tag is seen. Each rule pops the open elements
// listed under it if they are at the top of the stack, so later rules see the
// stack that earlier ones left behind.
const impliedEndTags: {openers: Set<string>, closes: string[]}[] = [
  {openers: pCloser, closes: ['p']},
  {openers: new Set(['li']), closes: ['li']},
  {openers: dtdd, closes: ['dt']},
  {openers: dtdd, closes: ['dd']},
  {openers: new Set(['tr']), closes: ['tr']},
  {openers: new Set(['tr']), closes: ['tr', 'td']},
  {openers: new Set(['tr']), closes: ['tr', 'th']},
  {openers: tdth, closes: ['td']},
  {openers: tdth, closes: ['th']}
];

function stackEndsWith(stack: HTMLElement[], tagNames: string[]) {
  if (stack.length < tagNames.length) return false;
  const offset = stack.length - tagNames.length;
  return tagNames.every((tagName, i) => stack[offset + i].tagName === tagName);
}

/**
 * Builds a document from markup (or already-tokenized markup). Never throws:
 * end tags that close nothing are dropped and elements left open at the end
 * are simply closed. Styles are not computed here; see resolveStyles.
 */
export function parse(input: string | Iterable<Token>, url: URL | null = null): Document {
  const document = new Document(id(), url);
  const stack: HTMLElement[] = [];
  const tokens = typeof input === 'string' ? tokenize(input) : input;

  function insertionPoint() {
    return stack.at(-1) ?? document;
  }

  function onStartTag(token: StartTagToken) {
    for (const {openers, closes} of impliedEndTags) {
      if (openers.has(token.name) && stackEndsWith(stack, closes)) {
        stack.length -= closes.length;
      }
    }

    const parent = insertionPoint();
    const declaredStyle = 'style' in token.attrs
      ? parseDeclarations(token.attrs.style)
      : EMPTY_STYLE;
    const element = new HTMLElement(id(), token.name, parent, token.attrs, declaredStyle);

    parent.children.push(element);
    if (!voidElements.has(token.name)) stack.push(element);
  }

  function onEndTag(name: string) {
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i].tagName === name) {
        stack.length = i;
        return;
      }
    }

    if (!voidElements.has(name)) {
      environment.warn(`Ignoring </${name}>: no <${name}> is open`);
    }
  }

  function onText(text: string) {
    const parent = insertionPoint();
    const last = parent.children.at(-1);

    if (last instanceof TextNode) {
      last.text += text;
    } else {
      parent.children.push(new TextNode(id(), text, parent));
    }
  }

  for (const token of tokens) {
    if (token.type === 'startTag') {
      onStartTag(token);
    } else if (token.type === 'endTag') {
      onEndTag(token.name);
    } else if (token.type === 'text') {
      onText(token.content);
    } else if (token.type === 'comment') {
      const parent = insertionPoint();
      parent.children.push(new CommentNode(id(), token.content, parent));
    } else {
      break;
    }
  }

  return document;
}
