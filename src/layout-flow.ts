import {Box, BoxArea, RenderItem} from './layout-box.js';
import {Run, Linebox, collapseWhitespace, layoutIfc, getIfcContribution, normalizeNewlines} from './layout-text.js';
import {Document, HTMLElement, TextNode} from './dom.js';
import {createStyle, EMPTY_STYLE} from './style.js';
import {FixedAdvanceMetrics} from './text-font.js';
import {environment} from './environment.js';
import {InvariantError, Logger} from './util.js';

import type {BoxNode, RenderItemLogOptions} from './layout-box.js';
import type {Fragment} from './layout-text.js';
import type {Style} from './style.js';
import type {FontMetrics} from './text-font.js';
import type {ChildNode} from './dom.js';

export interface LayoutContext {
  metrics: FontMetrics;
}

export class BlockContainer extends Box {
  public children: IfcInline[] | BlockContainer[];

  static ATTRS = {
    ...Box.ATTRS,
    isInline: Box.BITS.isInline,
    isBfcRoot: Box.BITS.isBfcRoot
  };

  constructor(style: Style, node: BoxNode, children: IfcInline[] | BlockContainer[], attrs: number) {
    super(style, node, attrs);
    this.children = children;
  }

  isBlockContainer(): this is BlockContainer {
    return true;
  }

  /**
   * Inline-blocks. They sit on lines like glyphs do.
   */
  isInlineLevel() {
    return Boolean(this.bitfield & Box.BITS.isInline);
  }

  isBfcRoot() {
    return Boolean(this.bitfield & Box.BITS.isBfcRoot);
  }

  getMarginsAutoIsZero() {
    let marginLineLeft = this.style.getMarginLineLeft(this);
    let marginLineRight = this.style.getMarginLineRight(this);
    let marginBlockStart = this.style.getMarginBlockStart(this);
    let marginBlockEnd = this.style.getMarginBlockEnd(this);

    if (marginBlockStart === 'auto') marginBlockStart = 0;
    if (marginLineRight === 'auto') marginLineRight = 0;
    if (marginBlockEnd === 'auto') marginBlockEnd = 0;
    if (marginLineLeft === 'auto') marginLineLeft = 0;

    return {
      blockStart: marginBlockStart,
      lineRight: marginLineRight,
      blockEnd: marginBlockEnd,
      lineLeft: marginLineLeft
    };
  }

  getInlineBorderPadding() {
    return this.style.getBorderLineLeftWidth(this)
      + this.style.getPaddingLineLeft(this)
      + this.style.getPaddingLineRight(this)
      + this.style.getBorderLineRightWidth(this);
  }

  getDefiniteInnerInlineSize() {
    const inlineSize = this.style.getInlineSize(this);
    if (inlineSize !== 'auto') return inlineSize;
  }

  /**
   * Outer (margin box) width the box would like to have when its lines are
   * broken as little as possible or as much as possible
   */
  contribution(mode: 'min-content' | 'max-content', ctx: LayoutContext): number {
    const margins = this.getMarginsAutoIsZero();
    const inner = this.getDefiniteInnerInlineSize() ?? this.contentContribution(mode, ctx);
    return margins.lineLeft + this.getInlineBorderPadding() + inner + margins.lineRight;
  }

  private contentContribution(mode: 'min-content' | 'max-content', ctx: LayoutContext) {
    const contentArea = this.getContentArea();
    let contribution = 0;

    for (const child of this.children) {
      if (child.isIfcInline()) {
        contribution = Math.max(contribution, getIfcContribution(child, ctx.metrics, mode, atomic => {
          atomic.setContainingBlock(contentArea);
          return atomic.contribution(mode, ctx);
        }));
      } else if (child.isBlockContainer()) {
        child.setContainingBlock(contentArea);
        contribution = Math.max(contribution, child.contribution(mode, ctx));
      }
    }

    return contribution;
  }

  getLogSymbol() {
    if (this.isInlineLevel()) {
      return '▬';
    } else {
      return '▣';
    }
  }

  logName(log: Logger) {
    if (this.isAnonymous()) log.dim();
    if (this.isBfcRoot()) log.underline();
    log.text(`${this.isInlineLevel() ? 'Inline' : 'Block'} ${this.id}`);
    log.reset();
    log.text(` ${describeNode(this.node)}`);
  }
}

export class Break extends RenderItem {
  public node: HTMLElement;

  constructor(style: Style, node: HTMLElement) {
    super(style);
    this.node = node;
  }

  isBreak(): this is Break {
    return true;
  }

  getLogSymbol() {
    return '⏎';
  }

  logName(log: Logger) {
    log.text('BR');
  }
}

export class Inline extends Box {
  public children: InlineLevel[];
  public start: number;
  public end: number;

  constructor(start: number, end: number, style: Style, node: BoxNode, children: InlineLevel[], attrs: number) {
    super(style, node, attrs);
    this.start = start;
    this.end = end;
    this.children = children;
  }

  isInline(): this is Inline {
    return true;
  }

  getLogSymbol() {
    return '▭';
  }

  logName(log: Logger, options?: RenderItemLogOptions) {
    if (this.isAnonymous()) log.dim();
    if (this.isIfcInline()) log.underline();
    log.text(`Inline ${this.id}`);
    log.reset();
    if (!this.isAnonymous()) log.text(` ${describeNode(this.node)}`);
  }
}

/**
 * The root of an inline formatting context: all of the text of a paragraph
 * and the inline-level boxes in it, broken into lines during layout.
 */
export class IfcInline extends Inline {
  public text: string;
  public lineboxes: Linebox[];

  constructor(style: Style, node: BoxNode, text: string, children: InlineLevel[], attrs: number) {
    super(0, text.length, style, node, children, Box.ATTRS.isAnonymous | attrs);
    this.text = text;
    this.lineboxes = [];
    collapseWhitespace(this);
  }

  isIfcInline(): this is IfcInline {
    return true;
  }

  absolutify() {
    super.absolutify();
    const {x, y} = this.getContentArea();
    for (const linebox of this.lineboxes) linebox.absolutify(x, y);
  }
}

export type InlineLevel = Inline | BlockContainer | Run | Break;

function describeNode(node: BoxNode) {
  return node instanceof Document ? '#document' : `<${node.tagName}>`;
}

function isLogged(el: HTMLElement | Document) {
  return el instanceof HTMLElement && 'x-pagewright-log' in el.attrs;
}

function isInlineBlock(el: HTMLElement) {
  return el.style.display.outer === 'inline' && el.style.display.inner === 'flow-root';
}

function isCollapsibleWhitespaceRun(item: InlineLevel, text: string) {
  return item.isRun()
    && item.wsCollapsible
    && /^[ \t\n\f]*$/.test(text.slice(item.start, item.end));
}

function getEl(el: HTMLElement, path: number[]): ChildNode | HTMLElement | undefined {
  let node: ChildNode | HTMLElement | undefined = el;
  for (const index of path) {
    if (!(node instanceof HTMLElement)) return undefined;
    node = node.children[index];
  }
  return node;
}

interface ParagraphText {
  value: string;
}

// Helper for generateInlineBox
function mapTree(
  el: HTMLElement,
  text: ParagraphText,
  path: number[],
  level: number
): [boolean, Inline] {
  const start = text.value.length;
  const children: InlineLevel[] = [];
  let bail = false;
  let attrs = 0;

  if (!path[level]) path[level] = 0;

  while (!bail && path[level] < el.children.length) {
    let child: InlineLevel | undefined;
    const childEl = el.children[path[level]];

    if (childEl instanceof HTMLElement) {
      if (childEl.style.display.outer === 'none') {
        // generates nothing
      } else if (childEl.tagName === 'br') {
        child = new Break(childEl.style, childEl);
        text.value += '\n';
      } else if (childEl.style.display.outer === 'block') {
        bail = true;
      } else if (isInlineBlock(childEl)) {
        child = generateBlockContainer(childEl);
        text.value += '\ufffc';
      } else {
        [bail, child] = mapTree(childEl, text, path, level + 1);
      }
    } else if (childEl instanceof TextNode) {
      const start = text.value.length;
      text.value += normalizeNewlines(childEl.text);
      child = new Run(start, text.value.length, childEl.style, childEl);
    }

    if (child) children.push(child);
    if (!bail) path[level]++;
  }

  if (!bail) path.pop();
  if (isLogged(el)) attrs |= Box.ATTRS.enableLogging;
  return [bail, new Inline(start, text.value.length, el.style, el, children, attrs)];
}

// Generates at least one inline box for the element. This must be called
// repeatedly until the first tuple value returns false to split out all block-
// level elements and the (fully nested) inlines in between and around them.
function generateInlineBox(
  el: HTMLElement,
  text: ParagraphText,
  path: number[]
): [boolean, Inline | BlockContainer] {
  const target = getEl(el, path);

  if (target instanceof HTMLElement && target.style.display.outer === 'block') {
    ++path[path.length - 1];
    return [true, generateBlockContainer(target)];
  }

  return mapTree(el, text, path, 0);
}

// Wraps consecutive inlines and runs in block-level block containers.
// CSS2.1 section 9.2.1.1
function wrapInBlockContainer(parentEl: HTMLElement | Document, inlines: InlineLevel[], text: ParagraphText) {
  const anonStyle = createStyle(parentEl.style, EMPTY_STYLE);
  let attrs = Box.ATTRS.isAnonymous;
  if (isLogged(parentEl)) attrs |= Box.ATTRS.enableLogging;
  const ifc = new IfcInline(anonStyle, parentEl, text.value, inlines, attrs);
  return new BlockContainer(anonStyle, parentEl, [ifc], attrs);
}

/**
 * Generates the box tree for a styled document, or for one element. Nodes are
 * only read, so the same document can back several box trees at once.
 */
export function generateBlockContainer(el: HTMLElement | Document): BlockContainer {
  const text: ParagraphText = {value: ''};
  const enableLogging = isLogged(el);
  const blocks: BlockContainer[] = [];
  let inlines: InlineLevel[] = [];
  let attrs = 0;

  // Paragraphs made only of collapsible whitespace between blocks are not
  // rendered (CSS2.1 section 9.2.2.1)
  function flushInlines() {
    if (inlines.length) {
      if (!inlines.every(item => isCollapsibleWhitespaceRun(item, text.value))) {
        blocks.push(wrapInBlockContainer(el, inlines, text));
      }
      inlines = [];
      text.value = '';
    }
  }

  if (el.style.display.inner === 'flow-root') attrs |= BlockContainer.ATTRS.isBfcRoot;
  if (enableLogging) attrs |= Box.ATTRS.enableLogging;

  for (const child of el.children) {
    if (child instanceof HTMLElement) {
      if (child.style.display.outer === 'none') continue;

      if (child.tagName === 'br') {
        inlines.push(new Break(child.style, child));
        text.value += '\n';
      } else if (child.style.display.outer === 'block') {
        flushInlines();
        blocks.push(generateBlockContainer(child));
      } else if (isInlineBlock(child)) {
        inlines.push(generateBlockContainer(child));
        text.value += '\ufffc';
      } else {
        const path: number[] = [];
        let more, box;

        do {
          ([more, box] = generateInlineBox(child, text, path));

          if (box.isInline()) {
            inlines.push(box);
          } else {
            flushInlines();
            blocks.push(box);
          }
        } while (more);
      }
    } else if (child instanceof TextNode) {
      const start = text.value.length;
      text.value += normalizeNewlines(child.text);
      inlines.push(new Run(start, text.value.length, child.style, child));
    }
  }

  if (el.style.display.outer === 'inline') {
    attrs |= BlockContainer.ATTRS.isInline;
  }

  let children: BlockContainer[] | IfcInline[];

  if (inlines.length && !blocks.length) {
    const anonComputedStyle = createStyle(el.style, EMPTY_STYLE);
    const ifcAttrs = enableLogging ? Box.ATTRS.enableLogging : 0;
    children = [new IfcInline(anonComputedStyle, el, text.value, inlines, ifcAttrs)];
  } else {
    flushInlines();
    children = blocks;
  }

  return new BlockContainer(el.style, el, children, attrs);
}

// CSS 2.1 §10.3.3
function doInlineBoxModelForBlockBox(box: BlockContainer) {
  const cInlineSize = box.containingBlock.inlineSize;
  const inlineSize = box.getDefiniteInnerInlineSize();
  let marginLineLeft = box.style.getMarginLineLeft(box);
  let marginLineRight = box.style.getMarginLineRight(box);

  // Paragraphs 2 and 3
  if (inlineSize !== undefined) {
    const specifiedInlineSize = inlineSize
      + box.getInlineBorderPadding()
      + (marginLineLeft === 'auto' ? 0 : marginLineLeft)
      + (marginLineRight === 'auto' ? 0 : marginLineRight);

    // Paragraph 2: zero out auto margins if specified values sum to a length
    // greater than the containing block's width.
    if (specifiedInlineSize > cInlineSize) {
      if (marginLineLeft === 'auto') marginLineLeft = 0;
      if (marginLineRight === 'auto') marginLineRight = 0;
    }

    if (marginLineLeft !== 'auto' && marginLineRight !== 'auto') {
      // Paragraph 3: over-constrained. The right margin absorbs the rest, and
      // goes negative if the box is too wide.
      marginLineRight = cInlineSize - (specifiedInlineSize - marginLineRight);
    } else if (marginLineLeft === 'auto' && marginLineRight !== 'auto') {
      // Paragraph 4: only auto value is margin-left
      marginLineLeft = cInlineSize - specifiedInlineSize;
    } else if (marginLineRight === 'auto' && marginLineLeft !== 'auto') {
      // Paragraph 4: only auto value is margin-right
      marginLineRight = cInlineSize - specifiedInlineSize;
    } else {
      // Paragraph 6: two auto values, center the content
      marginLineLeft = marginLineRight = (cInlineSize - specifiedInlineSize) / 2;
    }
  }

  // Paragraph 5: auto width
  if (marginLineLeft === 'auto') marginLineLeft = 0;
  if (marginLineRight === 'auto') marginLineRight = 0;

  box.setInlinePosition(marginLineLeft);
  box.setInlineOuterSize(cInlineSize - marginLineLeft - marginLineRight);
}

function getAtomics(inline: Inline) {
  const atomics: BlockContainer[] = [];
  const stack: InlineLevel[] = inline.children.slice().reverse();

  while (stack.length) {
    const item = stack.pop();
    if (!item) break;
    if (item.isBlockContainer()) {
      atomics.push(item);
    } else if (item.isInline()) {
      for (let i = item.children.length - 1; i >= 0; i--) stack.push(item.children[i]);
    }
  }

  return atomics;
}

// Lays out the content box of a block container whose width is already
// decided, then sets its height (CSS 2.1 §10.6.3)
function layoutContents(box: BlockContainer, ctx: LayoutContext) {
  const contentArea = box.getContentArea();
  const blockSize = box.style.getBlockSize(box);
  let contentBlockSize = 0;

  contentArea.definiteBlockSize = blockSize === 'auto' ? undefined : blockSize;

  for (const child of box.children) {
    if (child.isIfcInline()) {
      child.setContainingBlock(contentArea);

      for (const atomic of getAtomics(child)) {
        atomic.setContainingBlock(contentArea);
        layoutInlineBlockBox(atomic, ctx);
      }

      contentBlockSize = layoutIfc(child, ctx.metrics, contentArea.inlineSize);
    } else if (child.isBlockContainer()) {
      // Margins don't collapse: each border box starts below the previous
      // sibling's margin box
      child.setContainingBlock(contentArea);
      layoutBlockBox(child, ctx);
      const margins = child.getMarginsAutoIsZero();
      child.setBlockPosition(contentBlockSize + margins.blockStart);
      contentBlockSize += margins.blockStart + child.getBorderArea().blockSize + margins.blockEnd;
    }
  }

  box.setBlockSize(blockSize === 'auto' ? contentBlockSize : blockSize);

  if (box.isLoggingEnabled()) {
    const log = new Logger();
    log.text(`Layout of ${box.id} ${describeNode(box.node)}:\n`);
    log.pushIndent();
    log.text(box.getBorderArea().repr() + '\n');
    log.popIndent();
    log.flush();
  }
}

export function layoutBlockBox(box: BlockContainer, ctx: LayoutContext) {
  box.fillAreas();
  doInlineBoxModelForBlockBox(box);
  layoutContents(box, ctx);
}

// CSS 2.1 §10.3.9: shrink-to-fit
function layoutInlineBlockBox(box: BlockContainer, ctx: LayoutContext) {
  box.fillAreas();

  const margins = box.getMarginsAutoIsZero();
  const borderPadding = box.getInlineBorderPadding();
  let inlineSize = box.getDefiniteInnerInlineSize();

  if (inlineSize === undefined) {
    const available = box.containingBlock.inlineSize - margins.lineLeft - margins.lineRight - borderPadding;
    const outside = margins.lineLeft + borderPadding + margins.lineRight;
    const minContent = box.contribution('min-content', ctx) - outside;
    const maxContent = box.contribution('max-content', ctx) - outside;
    inlineSize = Math.min(Math.max(minContent, available), maxContent);
  }

  box.setInlineOuterSize(inlineSize + borderPadding);
  layoutContents(box, ctx);
}

/**
 * Every box in the tree, parents before children. Inline-blocks come after the
 * inline box they are in.
 */
export function* eachBox(root: BlockContainer): Generator<Box, void, undefined> {
  const stack: Box[] = [root];

  while (stack.length) {
    const box = stack.pop();
    if (!box) break;

    yield box;

    if (box.isBlockContainer() || box.isInline()) {
      for (let i = box.children.length - 1; i >= 0; i--) {
        const child = box.children[i];
        if (child.isBox()) stack.push(child);
      }
    }
  }
}

/**
 * The boxes each node generated, in tree order. Anonymous boxes are listed
 * under the element that caused them.
 */
export function boxesByNode(root: BlockContainer): WeakMap<BoxNode, Box[]> {
  const map = new WeakMap<BoxNode, Box[]>();

  for (const box of eachBox(root)) {
    const boxes = map.get(box.node);
    if (boxes) {
      boxes.push(box);
    } else {
      map.set(box.node, [box]);
    }
  }

  return map;
}

function ownerOf(node: BoxNode | TextNode): Document | null {
  if (node instanceof Document) return node;
  if (node instanceof HTMLElement) return node.ownerDocument();
  if (node.parent instanceof Document) return node.parent;
  return node.parent ? node.parent.ownerDocument() : null;
}

/**
 * Throws if a box (or a run of text) in the tree belongs to a node that is
 * not in `document`
 */
export function assertBoxesOwnedBy(root: BlockContainer, document: Document) {
  for (const box of eachBox(root)) {
    if (ownerOf(box.node) !== document) {
      throw new InvariantError(`Box ${box.id} was generated for a node of another document`);
    }

    if (box.isInline()) {
      for (const child of box.children) {
        if (child.isRun() && ownerOf(child.node) !== document) {
          throw new InvariantError(`Text in box ${box.id} belongs to another document`);
        }
      }
    }
  }
}

export interface LayoutOptions {
  /** Viewport width in CSS px */
  width: number;
  /** Viewport height, which percentage heights on the root resolve against */
  height?: number;
  metrics?: FontMetrics;
}

/**
 * Computes the geometry of every box in the tree. Running it again with the
 * same options gives the same result.
 */
export function layout(root: BlockContainer, options: LayoutOptions) {
  const ctx: LayoutContext = {metrics: options.metrics ?? new FixedAdvanceMetrics()};
  let width = options.width;

  if (!Number.isFinite(width) || width < 0) {
    environment.warn(`Unusable viewport width ${width}, using 0`);
    width = 0;
  }

  const initialContainingBlock = new BoxArea(null, 0, 0, width, options.height ?? 0);
  initialContainingBlock.definiteBlockSize = options.height;

  if (root.node instanceof Document) assertBoxesOwnedBy(root, root.node);

  root.setContainingBlock(initialContainingBlock);
  layoutBlockBox(root, ctx);
  root.setBlockPosition(root.getMarginsAutoIsZero().blockStart);

  for (const box of eachBox(root)) box.absolutify();
}

export interface HitTestResult {
  box: Box;
  node: BoxNode | TextNode;
  fragment: Fragment | null;
}

function innermostInline(inline: Inline, fragment: Fragment): Inline {
  for (const child of inline.children) {
    if (child.isInline() && child.start <= fragment.start && fragment.end <= child.end) {
      return innermostInline(child, fragment);
    }
  }
  return inline;
}

/**
 * The deepest box, and the text fragment if there is one, under a point in
 * absolute coordinates
 */
export function hitTest(root: BlockContainer, x: number, y: number): HitTestResult | null {
  function hitBlock(box: BlockContainer): HitTestResult | null {
    if (!box.getBorderArea().contains(x, y)) return null;

    for (let i = box.children.length - 1; i >= 0; i--) {
      const child = box.children[i];
      const hit = child.isIfcInline() ? hitIfc(child) : child.isBlockContainer() ? hitBlock(child) : null;
      if (hit) return hit;
    }

    return {box, node: box.node, fragment: null};
  }

  function hitIfc(ifc: IfcInline): HitTestResult | null {
    for (let i = ifc.lineboxes.length - 1; i >= 0; i--) {
      const {fragments} = ifc.lineboxes[i];

      for (let j = fragments.length - 1; j >= 0; j--) {
        const fragment = fragments[j];

        if (fragment.type === 'atomic') {
          const hit = hitBlock(fragment.box);
          if (hit) return hit;
        } else if (
          x >= fragment.x && x < fragment.x + fragment.width &&
          y >= fragment.y && y < fragment.y + fragment.height
        ) {
          return {box: innermostInline(ifc, fragment), node: fragment.node, fragment};
        }
      }
    }

    return null;
  }

  return hitBlock(root);
}

export interface SerializedFragment {
  type: 'text' | 'atomic';
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SerializedLine {
  x: number;
  y: number;
  width: number;
  height: number;
  baseline: number;
  fragments: SerializedFragment[];
}

export interface SerializedBox {
  type: 'block' | 'inline-block' | 'inline' | 'paragraph';
  node: string;
  anonymous: boolean;
  x: number;
  y: number;
  width: number;
  height: number;
  children: SerializedBox[];
  lines?: SerializedLine[];
}

/**
 * Plain-object snapshot of the laid out tree, with border box geometry
 */
export function serializeBoxTree(box: Box): SerializedBox {
  const {x, y, width, height} = box.getBorderArea();
  const children: SerializedBox[] = [];
  let type: SerializedBox['type'] = 'inline';

  if (box.isBlockContainer()) {
    type = box.isInlineLevel() ? 'inline-block' : 'block';
  } else if (box.isIfcInline()) {
    type = 'paragraph';
  }

  if (box.isBlockContainer() || box.isInline()) {
    for (const child of box.children) {
      if (child.isBox()) children.push(serializeBoxTree(child));
    }
  }

  const ret: SerializedBox = {
    type,
    node: describeNode(box.node),
    anonymous: box.isAnonymous(),
    x,
    y,
    width,
    height,
    children
  };

  if (box.isIfcInline()) {
    ret.lines = box.lineboxes.map(linebox => ({
      x: linebox.inlineOffset,
      y: linebox.blockOffset,
      width: linebox.width,
      height: linebox.height,
      baseline: linebox.baseline,
      fragments: linebox.fragments.map(fragment => {
        if (fragment.type === 'text') {
          const {text, x, y, width, height} = fragment;
          return {type: 'text' as const, text, x, y, width, height};
        } else {
          const {x, y, width, height} = fragment.box.getBorderArea();
          return {type: 'atomic' as const, text: '', x, y, width, height};
        }
      })
    }));
  }

  return ret;
}
