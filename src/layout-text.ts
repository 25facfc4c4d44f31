import LineBreak from 'linebreak';
import {RenderItem} from './layout-box.js';
import {Logger, loggableText} from './util.js';

import type {RenderItemLogOptions} from './layout-box.js';
import type {Style, WhiteSpace} from './style.js';
import type {TextNode} from './dom.js';
import type {FontMetrics} from './text-font.js';
import type {BlockContainer, IfcInline, Inline, InlineLevel} from './layout-flow.js';

const objectReplacementCharacter = '\ufffc';

function isWsCollapsible(whiteSpace: WhiteSpace) {
  return whiteSpace === 'normal' || whiteSpace === 'nowrap' || whiteSpace === 'pre-line';
}

export function isSpaceOrTabOrNewline(c: string) {
  return c === ' ' || c === '\t' || c === '\n' || c === '\f';
}

function isSpaceOrTab(c: string) {
  return c === ' ' || c === '\t';
}

function isNewline(c: string) {
  return c === '\n';
}

/**
 * CRLF and lone CR become LF, as the HTML input stream preprocessing does
 */
export function normalizeNewlines(text: string) {
  return text.replace(/\r\n?/g, '\n');
}

export class Run extends RenderItem {
  public start: number;
  public end: number;
  public node: TextNode;

  constructor(start: number, end: number, style: Style, node: TextNode) {
    super(style);
    this.start = start;
    this.end = end;
    this.node = node;
  }

  get length() {
    return this.end - this.start;
  }

  get wsCollapsible() {
    return isWsCollapsible(this.style.whiteSpace);
  }

  isRun(): this is Run {
    return true;
  }

  getLogSymbol() {
    return 'Ͳ';
  }

  logName(log: Logger, options?: RenderItemLogOptions) {
    log.text(`${this.start},${this.end}`);
    if (options?.paragraphText) {
      log.text(` "${loggableText(options.paragraphText.slice(this.start, this.end))}"`);
    }
  }
}

/**
 * Rewrites the paragraph text of the inline formatting context according to
 * each run's white-space property and moves the offsets of runs and inlines to
 * match. Runs that end up empty are removed from the tree.
 */
export function collapseWhitespace(ifc: IfcInline) {
  const stack: (InlineLevel | {post: Inline})[] = ifc.children.slice().reverse();
  const parents: Inline[] = [ifc];
  const text = ifc.text;
  let str = '';
  let inWhitespace = false;

  while (stack.length) {
    const item = stack.pop();

    if (!item) {
      break;
    } else if ('post' in item) {
      item.post.end = str.length;
      parents.pop();
    } else if (item.isInline()) {
      item.start = str.length;
      parents.push(item);
      stack.push({post: item});
      for (let i = item.children.length - 1; i >= 0; --i) stack.push(item.children[i]);
    } else if (item.isRun()) {
      const whiteSpace = item.style.whiteSpace;
      const originalStart = item.start;
      const originalEnd = item.end;

      item.start = str.length;

      if (whiteSpace === 'normal' || whiteSpace === 'nowrap') {
        for (let i = originalStart; i < originalEnd; i++) {
          const isWhitespace = isSpaceOrTabOrNewline(text[i]);
          if (!inWhitespace || !isWhitespace) str += isWhitespace ? ' ' : text[i];
          inWhitespace = isWhitespace;
        }
      } else if (whiteSpace === 'pre-line') {
        for (let i = originalStart; i < originalEnd; i++) {
          if (isSpaceOrTabOrNewline(text[i])) {
            let j = i + 1;
            let hasNewline = isNewline(text[i]);

            for (; j < originalEnd && isSpaceOrTabOrNewline(text[j]); j++) {
              hasNewline = hasNewline || isNewline(text[j]);
            }

            for (; i < j; i++) {
              if (isNewline(text[i])) {
                str += '\n';
                inWhitespace = false;
              } else {
                if (!inWhitespace && !hasNewline) str += ' ';
                inWhitespace = true;
              }
            }

            i = j - 1;
          } else {
            str += text[i];
            inWhitespace = false;
          }
        }
      } else { // pre, pre-wrap
        inWhitespace = false;
        str += text.slice(originalStart, originalEnd);
      }

      item.end = str.length;

      if (item.length === 0) {
        const parent = parents.at(-1);
        const i = parent ? parent.children.indexOf(item) : -1;
        if (!parent || i < 0) throw new Error('Assertion failed');
        parent.children.splice(i, 1);
      }
    } else if (item.isBreak()) {
      str += '\n';
      inWhitespace = false;
    } else { // inline-block
      str += objectReplacementCharacter;
      inWhitespace = false;
    }
  }

  ifc.text = str;
  ifc.end = str.length;
}

export interface TextFragment {
  type: 'text';
  text: string;
  /** Offsets into the paragraph text */
  start: number;
  end: number;
  x: number;
  y: number;
  width: number;
  /** The inline box: line-height tall, centered on the glyphs */
  height: number;
  baseline: number;
  style: Style;
  node: TextNode;
}

export interface AtomicFragment {
  type: 'atomic';
  start: number;
  end: number;
  /** An inline-block; its border area is the fragment's geometry */
  box: BlockContainer;
}

export type Fragment = TextFragment | AtomicFragment;

/**
 * Coordinates are relative to the inline formatting context until the box
 * tree is absolutified after layout.
 */
export class Linebox {
  public blockOffset: number;
  public inlineOffset: number;
  public width: number;
  public ascender: number;
  public descender: number;
  public start: number;
  public end: number;
  public fragments: Fragment[];

  constructor(start: number, end: number) {
    this.blockOffset = 0;
    this.inlineOffset = 0;
    this.width = 0;
    this.ascender = 0;
    this.descender = 0;
    this.start = start;
    this.end = end;
    this.fragments = [];
  }

  get height() {
    return this.ascender + this.descender;
  }

  get baseline() {
    return this.blockOffset + this.ascender;
  }

  absolutify(x: number, y: number) {
    this.inlineOffset += x;
    this.blockOffset += y;

    for (const fragment of this.fragments) {
      if (fragment.type === 'text') {
        fragment.x += x;
        fragment.y += y;
        fragment.baseline += y;
      }
    }
  }

  repr(text: string, indent = 0) {
    const {width: w, height: h, inlineOffset: x, blockOffset: y} = this;
    const content = loggableText(text.slice(this.start, this.end));
    return '  '.repeat(indent) + `Linebox ${w}⨯${h} @${x},${y} "${content}"`;
  }
}

type IfcItem = {type: 'run', run: Run, parent: Inline}
  | {type: 'break', offset: number, parent: Inline}
  | {type: 'atomic', box: BlockContainer, offset: number, parent: Inline};

/**
 * The text between two adjacent break opportunities
 */
interface BreakUnit {
  start: number;
  end: number;
  width: number;
  /** width without the trailing whitespace that hangs at the end of a line */
  ink: number;
  /** width of the leading whitespace that is removed at the start of a line */
  lead: number;
  /** has something other than collapsible whitespace */
  contentful: boolean;
  /** ends with a forced break */
  required: boolean;
}

interface IfcContent {
  text: string;
  items: IfcItem[];
  /** sum of advances before each offset, one longer than the text */
  prefix: number[];
  collapsible: boolean[];
  hangs: boolean[];
  units: BreakUnit[];
}

interface LineRange {
  start: number;
  end: number;
}

function getItems(ifc: IfcInline) {
  const items: IfcItem[] = [];
  let offset = 0;

  function visit(parent: Inline) {
    for (const child of parent.children) {
      if (child.isRun()) {
        items.push({type: 'run', run: child, parent});
        offset = child.end;
      } else if (child.isBreak()) {
        items.push({type: 'break', offset, parent});
        offset += 1;
      } else if (child.isInline()) {
        visit(child);
      } else {
        items.push({type: 'atomic', box: child, offset, parent});
        offset += 1;
      }
    }
  }

  visit(ifc);

  return items;
}

function measureIfc(
  ifc: IfcInline,
  metrics: FontMetrics,
  atomicWidth: (box: BlockContainer) => number
): IfcContent {
  const text = ifc.text;
  const n = text.length;
  const items = getItems(ifc);
  const advances: number[] = new Array(n).fill(0);
  const collapsible: boolean[] = new Array(n).fill(false);
  const hangs: boolean[] = new Array(n).fill(false);
  const wraps: boolean[] = new Array(n).fill(true);
  const opportunities = new Set<number>();

  for (const item of items) {
    if (item.type === 'run') {
      const {run} = item;
      const measured = metrics.measure(run.style.getFontSpec(), text.slice(run.start, run.end));
      const whiteSpace = run.style.whiteSpace;
      const runWraps = run.style.wraps();

      for (let i = run.start; i < run.end; i++) {
        const c = text[i];
        if (isNewline(c)) {
          opportunities.add(i + 1);
        } else {
          advances[i] = measured.advances[i - run.start];
        }
        collapsible[i] = isSpaceOrTab(c) && isWsCollapsible(whiteSpace);
        hangs[i] = isSpaceOrTab(c) && whiteSpace !== 'pre';
        wraps[i] = runWraps;
      }
    } else if (item.type === 'break') {
      opportunities.add(item.offset + 1);
      wraps[item.offset] = item.parent.style.wraps();
    } else {
      advances[item.offset] = atomicWidth(item.box);
      wraps[item.offset] = item.parent.style.wraps();
      if (wraps[item.offset]) {
        if (item.offset > 0) opportunities.add(item.offset);
        opportunities.add(item.offset + 1);
      }
    }
  }

  const breaker = new LineBreak(text);
  let bk;

  while ((bk = breaker.nextBreak())) {
    if (bk.position > 0 && (bk.required || wraps[bk.position - 1])) {
      opportunities.add(bk.position);
    }
  }

  if (n > 0) opportunities.add(n);

  const prefix: number[] = [0];
  for (let i = 0; i < n; i++) prefix.push(prefix[i] + advances[i]);

  const units: BreakUnit[] = [];
  let start = 0;

  for (const end of [...opportunities].sort((a, b) => a - b)) {
    if (end <= start || end > n) continue;

    let inkEnd = end;
    if (isNewline(text[inkEnd - 1])) inkEnd--;
    while (inkEnd > start && hangs[inkEnd - 1]) inkEnd--;

    let leadEnd = start;
    while (leadEnd < end && collapsible[leadEnd]) leadEnd++;

    let contentful = false;
    for (let i = start; i < end && !contentful; i++) {
      contentful = !collapsible[i] && !isNewline(text[i]);
    }

    units.push({
      start,
      end,
      width: prefix[end] - prefix[start],
      ink: prefix[inkEnd] - prefix[start],
      lead: prefix[leadEnd] - prefix[start],
      contentful,
      required: isNewline(text[end - 1])
    });

    start = end;
  }

  return {text, items, prefix, collapsible, hangs, units};
}

/**
 * Greedy line breaking. A unit joins the current line if its ink fits after
 * what is already there; trailing spaces hang past the edge. A unit that fits
 * nowhere gets a line of its own.
 */
function breakLines(content: IfcContent, available: number): LineRange[] {
  const lines: LineRange[] = [];
  let lineStart = 0;
  let width = 0;
  let hasContent = false;

  for (const unit of content.units) {
    if (hasContent && width + unit.ink > available) {
      lines.push({start: lineStart, end: unit.start});
      lineStart = unit.start;
      width = 0;
      hasContent = false;
    }

    width += hasContent ? unit.width : unit.width - unit.lead;
    hasContent = hasContent || unit.contentful;

    if (unit.required) {
      lines.push({start: lineStart, end: unit.end});
      lineStart = unit.end;
      width = 0;
      hasContent = false;
    }
  }

  if (hasContent) lines.push({start: lineStart, end: content.text.length});

  return lines;
}

/**
 * Where the painted part of a line starts and ends once collapsible spaces at
 * either edge and the forced break are removed. `inkEnd` also leaves out
 * preserved spaces that hang.
 */
function trimLine(content: IfcContent, line: LineRange) {
  let contentStart = line.start;
  let contentEnd = line.end;

  while (contentStart < contentEnd && content.collapsible[contentStart]) contentStart++;
  if (contentEnd > contentStart && isNewline(content.text[contentEnd - 1])) contentEnd--;
  while (contentEnd > contentStart && content.collapsible[contentEnd - 1]) contentEnd--;

  let inkEnd = contentEnd;
  while (inkEnd > contentStart && content.hangs[inkEnd - 1]) inkEnd--;

  return {contentStart, contentEnd, inkEnd};
}

interface InlineMetrics {
  ascent: number;
  descent: number;
  lineHeight: number;
  /** ascent plus half-leading */
  above: number;
  /** descent plus half-leading */
  below: number;
}

function getInlineMetrics(style: Style, metrics: FontMetrics, cache: Map<Style, InlineMetrics>) {
  let ret = cache.get(style);

  if (!ret) {
    const {ascent, descent, lineHeight: normal} = metrics.measure(style.getFontSpec(), '');
    const lineHeight = style.getLineHeight(normal);
    const halfLeading = (lineHeight - (ascent + descent)) / 2;
    ret = {ascent, descent, lineHeight, above: ascent + halfLeading, below: descent + halfLeading};
    cache.set(style, ret);
  }

  return ret;
}

function getMarginBoxWidth(box: BlockContainer) {
  const margins = box.getMarginsAutoIsZero();
  return margins.lineLeft + box.getBorderArea().inlineSize + margins.lineRight;
}

/**
 * Breaks the paragraph into line boxes no wider than `available` (except for
 * units that can't fit anywhere) and positions fragments, inline-blocks and
 * inline boxes relative to the formatting context. Inline-blocks must already
 * be sized. Returns the total height of the lines.
 */
export function layoutIfc(ifc: IfcInline, metrics: FontMetrics, available: number) {
  const content = measureIfc(ifc, metrics, getMarginBoxWidth);
  const cache = new Map<Style, InlineMetrics>();
  const strut = getInlineMetrics(ifc.style, metrics, cache);
  const textAlign = ifc.style.getTextAlign();
  const lineboxes: Linebox[] = [];
  let blockOffset = 0;

  for (const range of breakLines(content, available)) {
    const {contentStart, contentEnd, inkEnd} = trimLine(content, range);
    const linebox = new Linebox(range.start, range.end);
    const lineLeft = (i: number) => content.prefix[i] - content.prefix[contentStart];
    const inlineMetrics: InlineMetrics[] = [];
    let ascender = strut.above;
    let descender = strut.below;

    for (const item of content.items) {
      if (item.type === 'run') {
        const start = Math.max(item.run.start, contentStart);
        const end = Math.min(item.run.end, contentEnd);
        if (start >= end) continue;
        const m = getInlineMetrics(item.run.style, metrics, cache);
        ascender = Math.max(ascender, m.above);
        descender = Math.max(descender, m.below);
        inlineMetrics.push(m);
        linebox.fragments.push({
          type: 'text',
          text: content.text.slice(start, end),
          start,
          end,
          x: lineLeft(start),
          y: 0,
          width: content.prefix[end] - content.prefix[start],
          height: m.lineHeight,
          baseline: 0,
          style: item.run.style,
          node: item.run.node
        });
      } else if (item.type === 'atomic') {
        if (item.offset < contentStart || item.offset >= contentEnd) continue;
        const margins = item.box.getMarginsAutoIsZero();
        const marginHeight = margins.blockStart + item.box.getBorderArea().blockSize + margins.blockEnd;
        ascender = Math.max(ascender, marginHeight);
        inlineMetrics.push({ascent: marginHeight, descent: 0, lineHeight: marginHeight, above: marginHeight, below: 0});
        linebox.fragments.push({type: 'atomic', start: item.offset, end: item.offset + 1, box: item.box});
      }
    }

    const width = lineLeft(inkEnd);
    const free = available - width;
    let offset = 0;

    if (free > 0) {
      if (textAlign === 'right') offset = free;
      if (textAlign === 'center') offset = free / 2;
    }

    linebox.blockOffset = blockOffset;
    linebox.inlineOffset = offset;
    linebox.width = width;
    linebox.ascender = ascender;
    linebox.descender = descender;

    const baseline = blockOffset + ascender;

    for (let i = 0; i < linebox.fragments.length; i++) {
      const fragment = linebox.fragments[i];
      const m = inlineMetrics[i];

      if (fragment.type === 'text') {
        fragment.x += offset;
        fragment.y = baseline - m.above;
        fragment.baseline = baseline;
      } else {
        const margins = fragment.box.getMarginsAutoIsZero();
        fragment.box.setInlinePosition(offset + lineLeft(fragment.start) + margins.lineLeft);
        fragment.box.setBlockPosition(baseline - m.above + margins.blockStart);
      }
    }

    lineboxes.push(linebox);
    blockOffset += linebox.height;
  }

  ifc.lineboxes = lineboxes;

  const area = ifc.getContentArea();
  area.lineLeft = 0;
  area.blockStart = 0;
  area.inlineSize = available;
  area.blockSize = blockOffset;

  sizeInlineBoxes(ifc);

  if (ifc.isLoggingEnabled()) {
    const log = new Logger();
    log.text(`Paragraph ${ifc.id} (${available}px available):\n`);
    log.pushIndent();
    for (const linebox of lineboxes) log.text(linebox.repr(content.text) + '\n');
    log.popIndent();
    log.flush();
  }

  return blockOffset;
}

/**
 * Inline boxes have no box model of their own here: each one covers the
 * fragments of its content.
 */
function sizeInlineBoxes(ifc: IfcInline) {
  const fragments = ifc.lineboxes.flatMap(linebox => linebox.fragments);
  const stack: InlineLevel[] = ifc.children.slice();

  while (stack.length) {
    const item = stack.pop();
    if (!item || !item.isInline()) continue;

    let left = Infinity, top = Infinity, right = -Infinity, bottom = -Infinity;

    for (const fragment of fragments) {
      if (fragment.start >= item.start && fragment.end <= item.end) {
        const {x, y, width, height} = fragment.type === 'text'
          ? fragment
          : fragment.box.getBorderArea();
        left = Math.min(left, x);
        top = Math.min(top, y);
        right = Math.max(right, x + width);
        bottom = Math.max(bottom, y + height);
      }
    }

    const area = item.getContentArea();
    item.setContainingBlock(ifc.getContentArea());

    if (left === Infinity) {
      area.lineLeft = area.blockStart = area.inlineSize = area.blockSize = 0;
    } else {
      area.lineLeft = left;
      area.blockStart = top;
      area.inlineSize = right - left;
      area.blockSize = bottom - top;
    }

    for (const child of item.children) stack.push(child);
  }
}

/**
 * Width of the paragraph when lines are only broken where they must be
 * (max-content), or at every opportunity (min-content)
 */
export function getIfcContribution(
  ifc: IfcInline,
  metrics: FontMetrics,
  mode: 'min-content' | 'max-content',
  atomicWidth: (box: BlockContainer) => number
) {
  const content = measureIfc(ifc, metrics, atomicWidth);
  let contribution = 0;

  if (mode === 'min-content') {
    for (const unit of content.units) {
      contribution = Math.max(contribution, unit.ink - unit.lead);
    }
  } else {
    for (const line of breakLines(content, Infinity)) {
      const {contentStart, inkEnd} = trimLine(content, line);
      contribution = Math.max(contribution, content.prefix[inkEnd] - content.prefix[contentStart]);
    }
  }

  return contribution;
}
