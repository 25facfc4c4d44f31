// Adapted from fb55/htmlparser2 by Felix Böhm
//
// Copyright 2010, 2011, Chris Winberry <chris@winberry.net>. All rights reserved.
// Permission is hereby granted, free of charge, to any person obtaining a copy
// of this software and associated documentation files (the "Software"), to
// deal in the Software without restriction, including without limitation the
// rights to use, copy, modify, merge, publish, distribute, sublicense, and/or
// sell copies of the Software, and to permit persons to whom the Software is
// furnished to do so, subject to the following conditions:
//
// The above copyright notice and this permission notice shall be included in
// all copies or substantial portions of the Software.
//
// THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR
// IMPLIED, INCLUDING BUT NOT LIMITED TO THE WARRANTIES OF MERCHANTABILITY,
// FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE
// AUTHORS OR COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER
// LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR OTHERWISE, ARISING
// FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS
// IN THE SOFTWARE.

import {decodeHTML} from 'entities';
import {environment} from './environment.js';

const enum CharCodes {
  Tab = 0x9, // "\t"
  NewLine = 0xa, // "\n"
  FormFeed = 0xc, // "\f"
  CarriageReturn = 0xd, // "\r"
  Space = 0x20, // " "
  ExclamationMark = 0x21, // "!"
  DoubleQuote = 0x22, // '"'
  SingleQuote = 0x27, // "'"
  Dash = 0x2d, // "-"
  Slash = 0x2f, // "/"
  Lt = 0x3c, // "<"
  Eq = 0x3d, // "="
  Gt = 0x3e, // ">"
  Questionmark = 0x3f, // "?"
  UpperA = 0x41, // "A"
  LowerA = 0x61, // "a"
  UpperZ = 0x5a, // "Z"
  LowerZ = 0x7a, // "z"
}

/** All the states the tokenizer can be in. */
const enum State {
  Text = 1,
  BeforeTagName, // After <
  InTagName,
  BeforeClosingTagName, // After </
  InSelfClosingTag,

  // Attributes
  BeforeAttributeName,
  InAttributeName,
  AfterAttributeName,
  BeforeAttributeValue,
  InAttributeValueDq, // "
  InAttributeValueSq, // '
  InAttributeValueNq,

  // <!, <? and </ followed by junk
  BeforeDeclaration,
  InComment,
  InBogusComment,

  // <script> and <style> content
  InRawText
}

export function isWhitespace(c: number): boolean {
  return (
    c === CharCodes.Space ||
    c === CharCodes.NewLine ||
    c === CharCodes.Tab ||
    c === CharCodes.FormFeed ||
    c === CharCodes.CarriageReturn
  );
}

function isASCIIAlpha(c: number): boolean {
  return (
    (c >= CharCodes.LowerA && c <= CharCodes.LowerZ) ||
    (c >= CharCodes.UpperA && c <= CharCodes.UpperZ)
  );
}

const rawTextElements = new Set(['script', 'style']);

export type Attributes = Record<string, string>;

export interface StartTagToken {
  type: 'startTag';
  name: string;
  attrs: Attributes;
  selfClosing: boolean;
}

export interface EndTagToken {
  type: 'endTag';
  name: string;
}

export interface TextToken {
  type: 'text';
  content: string;
}

export interface CommentToken {
  type: 'comment';
  content: string;
}

export interface EofToken {
  type: 'eof';
}

export type Token = StartTagToken | EndTagToken | TextToken | CommentToken | EofToken;

function createAttributes(): Attributes {
  // no prototype so that attributes like "constructor" and "__proto__" are
  // plain entries
  return Object.create(null);
}

/**
 * Permissive HTML tokenizer. It never throws: anything it can't make sense of
 * comes out as text or a comment, and a tag cut off by the end of the input is
 * emitted with whatever was read of it.
 */
export class Tokenizer {
  private buffer: string;
  private state: State;
  private index: number;
  /** Where the text, name or value currently being read starts */
  private sectionStart: number;
  /** Position of the < that may be starting a tag */
  private tagStart: number;
  private queue: Token[];
  private ended: boolean;

  private tagName: string;
  private isEndTag: boolean;
  private selfClosing: boolean;
  private attrs: Attributes;
  private attrName: string;
  /** Set while inside <script> or <style> */
  private rawTextTag: string | null;

  constructor(input: string) {
    this.buffer = input;
    this.state = State.Text;
    this.index = 0;
    this.sectionStart = 0;
    this.tagStart = 0;
    this.queue = [];
    this.ended = false;
    this.tagName = '';
    this.isEndTag = false;
    this.selfClosing = false;
    this.attrs = createAttributes();
    this.attrName = '';
    this.rawTextTag = null;
  }

  next(): Token {
    while (!this.queue.length && !this.ended) {
      if (this.index >= this.buffer.length) {
        this.finish();
      } else {
        this.step(this.buffer.charCodeAt(this.index));
        this.index++;
      }
    }

    return this.queue.shift() ?? {type: 'eof'};
  }

  private step(c: number) {
    switch (this.state) {
      case State.Text: return this.stateText(c);
      case State.BeforeTagName: return this.stateBeforeTagName(c);
      case State.InTagName: return this.stateInTagName(c);
      case State.BeforeClosingTagName: return this.stateBeforeClosingTagName(c);
      case State.InSelfClosingTag: return this.stateInSelfClosingTag(c);
      case State.BeforeAttributeName: return this.stateBeforeAttributeName(c);
      case State.InAttributeName: return this.stateInAttributeName(c);
      case State.AfterAttributeName: return this.stateAfterAttributeName(c);
      case State.BeforeAttributeValue: return this.stateBeforeAttributeValue(c);
      case State.InAttributeValueDq: return this.stateInAttributeValueQuoted(c, CharCodes.DoubleQuote);
      case State.InAttributeValueSq: return this.stateInAttributeValueQuoted(c, CharCodes.SingleQuote);
      case State.InAttributeValueNq: return this.stateInAttributeValueNoQuotes(c);
      case State.BeforeDeclaration: return this.stateBeforeDeclaration(c);
      case State.InComment: return this.stateInComment();
      case State.InBogusComment: return this.stateInBogusComment();
      case State.InRawText: return this.stateInRawText();
    }
  }

  private stateText(c: number) {
    if (c === CharCodes.Lt) {
      this.tagStart = this.index;
      this.state = State.BeforeTagName;
    }
  }

  private stateBeforeTagName(c: number) {
    if (isASCIIAlpha(c)) {
      this.flushText(this.tagStart);
      this.beginTag(false);
      this.sectionStart = this.index;
      this.state = State.InTagName;
    } else if (c === CharCodes.Slash) {
      this.state = State.BeforeClosingTagName;
    } else if (c === CharCodes.ExclamationMark) {
      this.flushText(this.tagStart);
      this.sectionStart = this.index + 1;
      this.state = State.BeforeDeclaration;
    } else if (c === CharCodes.Questionmark) {
      this.flushText(this.tagStart);
      this.sectionStart = this.index + 1;
      this.state = State.InBogusComment;
    } else {
      // a lone < is just text
      this.state = State.Text;
      this.stateText(c);
    }
  }

  private stateBeforeClosingTagName(c: number) {
    if (isASCIIAlpha(c)) {
      this.flushText(this.tagStart);
      this.beginTag(true);
      this.sectionStart = this.index;
      this.state = State.InTagName;
    } else if (c === CharCodes.Gt) {
      // </> is dropped entirely
      this.flushText(this.tagStart);
      this.sectionStart = this.index + 1;
      this.state = State.Text;
    } else {
      this.flushText(this.tagStart);
      this.sectionStart = this.index;
      this.state = State.InBogusComment;
      this.stateInBogusComment();
    }
  }

  private stateInTagName(c: number) {
    if (isWhitespace(c) || c === CharCodes.Slash || c === CharCodes.Gt) {
      this.tagName = this.buffer.slice(this.sectionStart, this.index).toLowerCase();
      this.state = State.BeforeAttributeName;
      this.stateBeforeAttributeName(c);
    }
  }

  private stateInSelfClosingTag(c: number) {
    if (c === CharCodes.Gt) {
      this.selfClosing = true;
      this.emitTag();
    } else {
      this.state = State.BeforeAttributeName;
      this.stateBeforeAttributeName(c);
    }
  }

  private stateBeforeAttributeName(c: number) {
    if (c === CharCodes.Gt) {
      this.emitTag();
    } else if (c === CharCodes.Slash) {
      this.state = State.InSelfClosingTag;
    } else if (!isWhitespace(c)) {
      this.sectionStart = this.index;
      this.state = State.InAttributeName;
    }
  }

  private stateInAttributeName(c: number) {
    if (
      isWhitespace(c) ||
      c === CharCodes.Slash ||
      c === CharCodes.Gt ||
      c === CharCodes.Eq
    ) {
      this.attrName = this.buffer.slice(this.sectionStart, this.index).toLowerCase();
      this.state = State.AfterAttributeName;
      this.stateAfterAttributeName(c);
    }
  }

  private stateAfterAttributeName(c: number) {
    if (c === CharCodes.Eq) {
      this.state = State.BeforeAttributeValue;
    } else if (c === CharCodes.Slash || c === CharCodes.Gt) {
      this.addAttribute('');
      this.state = State.BeforeAttributeName;
      this.stateBeforeAttributeName(c);
    } else if (!isWhitespace(c)) {
      this.addAttribute('');
      this.sectionStart = this.index;
      this.state = State.InAttributeName;
    }
  }

  private stateBeforeAttributeValue(c: number) {
    if (c === CharCodes.DoubleQuote) {
      this.sectionStart = this.index + 1;
      this.state = State.InAttributeValueDq;
    } else if (c === CharCodes.SingleQuote) {
      this.sectionStart = this.index + 1;
      this.state = State.InAttributeValueSq;
    } else if (c === CharCodes.Gt) {
      this.addAttribute('');
      this.emitTag();
    } else if (!isWhitespace(c)) {
      this.sectionStart = this.index;
      this.state = State.InAttributeValueNq;
    }
  }

  private stateInAttributeValueQuoted(c: number, quote: number) {
    if (c === quote) {
      this.addAttribute(decodeHTML(this.buffer.slice(this.sectionStart, this.index)));
      this.state = State.BeforeAttributeName;
    }
  }

  private stateInAttributeValueNoQuotes(c: number) {
    if (isWhitespace(c) || c === CharCodes.Gt) {
      this.addAttribute(decodeHTML(this.buffer.slice(this.sectionStart, this.index)));
      this.state = State.BeforeAttributeName;
      this.stateBeforeAttributeName(c);
    }
  }

  private stateBeforeDeclaration(c: number) {
    if (c === CharCodes.Dash && this.buffer.charCodeAt(this.index + 1) === CharCodes.Dash) {
      this.index += 1;
      this.sectionStart = this.index + 1;
      this.state = State.InComment;
    } else if (this.buffer.slice(this.index, this.index + 7).toLowerCase() === 'doctype') {
      // <!doctype html> is a void element named "!doctype"
      this.beginTag(false);
      this.sectionStart = this.index - 1;
      this.state = State.InTagName;
    } else {
      this.state = State.InBogusComment;
      this.stateInBogusComment();
    }
  }

  private stateInComment() {
    const end = this.buffer.indexOf('-->', this.sectionStart);

    if (end < 0) {
      this.queue.push({type: 'comment', content: this.buffer.slice(this.sectionStart)});
      this.index = this.buffer.length;
      this.sectionStart = this.buffer.length;
    } else {
      this.queue.push({type: 'comment', content: this.buffer.slice(this.sectionStart, end)});
      this.index = end + 2;
      this.sectionStart = end + 3;
    }

    this.state = State.Text;
  }

  private stateInBogusComment() {
    const end = this.buffer.indexOf('>', this.sectionStart);

    if (end < 0) {
      this.queue.push({type: 'comment', content: this.buffer.slice(this.sectionStart)});
      this.index = this.buffer.length;
      this.sectionStart = this.buffer.length;
    } else {
      this.queue.push({type: 'comment', content: this.buffer.slice(this.sectionStart, end)});
      this.index = end;
      this.sectionStart = end + 1;
    }

    this.state = State.Text;
  }

  private stateInRawText() {
    const tagName = this.rawTextTag ?? '';
    let lt = this.buffer.indexOf('</', this.index);

    while (lt >= 0) {
      const nameEnd = lt + 2 + tagName.length;
      const name = this.buffer.slice(lt + 2, nameEnd).toLowerCase();
      const after = this.buffer.charCodeAt(nameEnd);

      if (
        name === tagName && (
          nameEnd >= this.buffer.length ||
          isWhitespace(after) ||
          after === CharCodes.Slash ||
          after === CharCodes.Gt
        )
      ) {
        break;
      }

      lt = this.buffer.indexOf('</', lt + 2);
    }

    if (lt < 0) {
      this.index = this.buffer.length - 1;
    } else {
      this.flushText(lt);
      this.rawTextTag = null;
      this.beginTag(true);
      this.sectionStart = lt + 2;
      this.index = lt + 1;
      this.state = State.InTagName;
    }
  }

  private beginTag(isEndTag: boolean) {
    this.isEndTag = isEndTag;
    this.tagName = '';
    this.selfClosing = false;
    this.attrs = createAttributes();
    this.attrName = '';
  }

  private addAttribute(value: string) {
    // first one wins
    if (!(this.attrName in this.attrs)) this.attrs[this.attrName] = value;
    this.attrName = '';
  }

  private emitTag() {
    if (this.isEndTag) {
      // attributes and the self-closing flag on end tags are meaningless
      this.queue.push({type: 'endTag', name: this.tagName});
      this.state = State.Text;
    } else {
      const token: StartTagToken = {
        type: 'startTag',
        name: this.tagName,
        attrs: this.attrs,
        selfClosing: this.selfClosing
      };

      this.queue.push(token);
      this.state = rawTextElements.has(this.tagName) ? State.InRawText : State.Text;
      if (this.state === State.InRawText) this.rawTextTag = this.tagName;
    }

    this.sectionStart = this.index + 1;
  }

  private flushText(end: number) {
    if (end > this.sectionStart) {
      const text = this.buffer.slice(this.sectionStart, end);
      const content = this.rawTextTag ? text : decodeHTML(text);
      this.queue.push({type: 'text', content});
    }

    this.sectionStart = end;
  }

  private finish() {
    const end = this.buffer.length;

    switch (this.state) {
      case State.Text:
      case State.BeforeTagName:
      case State.BeforeClosingTagName:
      case State.InRawText:
        this.flushText(end);
        break;
      case State.InTagName:
        this.tagName = this.buffer.slice(this.sectionStart, end).toLowerCase();
        this.emitTag();
        break;
      case State.InAttributeName:
        this.attrName = this.buffer.slice(this.sectionStart, end).toLowerCase();
        this.addAttribute('');
        this.emitTag();
        break;
      case State.AfterAttributeName:
      case State.BeforeAttributeValue:
        this.addAttribute('');
        this.emitTag();
        break;
      case State.InAttributeValueDq:
      case State.InAttributeValueSq:
      case State.InAttributeValueNq:
        this.addAttribute(decodeHTML(this.buffer.slice(this.sectionStart, end)));
        this.emitTag();
        break;
      case State.BeforeAttributeName:
      case State.InSelfClosingTag:
        this.emitTag();
        break;
      case State.BeforeDeclaration:
      case State.InComment:
      case State.InBogusComment:
        this.queue.push({type: 'comment', content: ''});
        break;
    }

    this.queue.push({type: 'eof'});
    this.ended = true;
  }
}

/**
 * Lazily tokenizes the whole input. The last token is always the only EOF.
 */
export function* tokenize(input: string): Generator<Token, void, undefined> {
  const tokenizer = new Tokenizer(input);
  let token: Token;

  do {
    token = tokenizer.next();
    yield token;
  } while (token.type !== 'eof');
}

/**
 * Turns the bytes of a response into a string using the charset parameter of
 * its content type, or UTF-8.
 */
export function decodeDocument(bytes: Uint8Array, contentType = 'text/html') {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  const charset = match ? match[1] : 'utf-8';
  let decoder;

  try {
    decoder = new TextDecoder(charset);
  } catch {
    environment.warn(`Unknown charset "${charset}", decoding as UTF-8`);
    decoder = new TextDecoder('utf-8');
  }

  return decoder.decode(bytes);
}
