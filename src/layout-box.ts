import {id, Logger} from './util.js';

import type {Style} from './style.js';
import type {Document, HTMLElement} from './dom.js';
import type {Run} from './layout-text.js';
import type {Break, Inline, IfcInline, BlockContainer} from './layout-flow.js';

export interface RenderItemLogOptions {
  containingBlocks?: boolean;
  css?: keyof Style;
  paragraphText?: string;
  bits?: boolean;
}

/**
 * The node a box was generated for. Anonymous boxes point at the element
 * whose content caused them to be created.
 */
export type BoxNode = HTMLElement | Document;

export abstract class RenderItem {
  public style: Style;

  constructor(style: Style) {
    this.style = style;
  }

  isBlockContainer(): this is BlockContainer {
    return false;
  }

  isRun(): this is Run {
    return false;
  }

  isInline(): this is Inline {
    return false;
  }

  isBreak(): this is Break {
    return false;
  }

  isIfcInline(): this is IfcInline {
    return false;
  }

  isBox(): this is Box {
    return false;
  }

  abstract logName(log: Logger, options?: RenderItemLogOptions): void;

  abstract getLogSymbol(): string;

  log(options?: RenderItemLogOptions, log?: Logger) {
    const flush = !log;

    log ||= new Logger();

    if (this.isIfcInline()) {
      options = {...options};
      options.paragraphText = this.text;
    }

    log.text(`${this.getLogSymbol()} `);
    this.logName(log, options);

    if (options?.containingBlocks && this.isBox()) {
      log.text(` (cb: ${this.containingBlock.box?.id ?? '(initial)'})`);
    }

    if (options?.css) {
      const css = this.style[options.css];
      log.text(` (${options.css}: ${css && JSON.stringify(css)})`);
    }

    if (options?.bits && this.isBox()) {
      log.text(` (bf: ${this.stringifyBitfield()})`);
    }

    log.text('\n');

    if (this.isBlockContainer() || this.isInline()) {
      log.pushIndent();

      for (let i = 0; i < this.children.length; i++) {
        this.children[i].log(options, log);
      }

      log.popIndent();
    }

    if (flush) log.flush();
  }
}

export abstract class Box extends RenderItem {
  public id: string;
  public node: BoxNode;
  public containingBlock: BoxArea;
  public bitfield: number;
  private area: BoxArea;

  static BITS = {
    isAnonymous:   1 << 0,
    enableLogging: 1 << 1,
    // 2..3: attributes for BlockContainer. An anonymous block container's
    // style is the initial (inline) display, so inline-level-ness has to be
    // recorded separately.
    isInline:      1 << 2,
    isBfcRoot:     1 << 3
  };

  /**
   * Use this, not BITS, for the ctor! BITS are ~private
   */
  static ATTRS = {
    isAnonymous: Box.BITS.isAnonymous,
    enableLogging: Box.BITS.enableLogging
  };

  constructor(style: Style, node: BoxNode, attrs: number) {
    super(style);
    this.id = id();
    this.node = node;
    this.bitfield = attrs;
    this.containingBlock = new BoxArea(null);
    this.area = new BoxArea(this);

    // Only block containers take part in the box model. Inline boxes are
    // sized to their fragments, so they get a single area.
    if (this.isBlockContainer()) {
      const hasBorder = this.style.hasBorder();
      const hasPadding = this.style.hasPadding();
      if (hasBorder && hasPadding) { // b -> p -> c
        const b = new BoxArea(this);
        const p = new BoxArea(this);
        this.area.setParent(p);
        p.setParent(b);
      } else if (hasBorder || hasPadding) { // b -> c or p -> c
        this.area.setParent(new BoxArea(this));
      }
    }
  }

  getBorderArea(): BoxArea {
    let area = this.area;
    while (area.parent && area.parent.box === this) area = area.parent;
    return area;
  }

  getPaddingArea(): BoxArea {
    const parent = this.area.parent;
    if (this.isBlockContainer() && this.style.hasPadding() && parent) {
      return parent;
    } else {
      return this.area;
    }
  }

  getContentArea(): BoxArea {
    return this.area;
  }

  setContainingBlock(area: BoxArea) {
    this.containingBlock = area;
    this.getBorderArea().setParent(area);
  }

  /**
   * Assign the offsets of the border and padding areas from the content area,
   * as defined by the style. The containing block must be set first for
   * percentages to work.
   */
  fillAreas() {
    if (this.style.hasBorder()) {
      const paddingArea = this.getPaddingArea();
      paddingArea.blockStart = this.style.getBorderBlockStartWidth(this);
      paddingArea.lineLeft = this.style.getBorderLineLeftWidth(this);
    }

    if (this.style.hasPadding()) {
      const contentArea = this.getContentArea();
      contentArea.blockStart = this.style.getPaddingBlockStart(this);
      contentArea.lineLeft = this.style.getPaddingLineLeft(this);
    }
  }

  setBlockPosition(position: number) {
    this.getBorderArea().blockStart = position;
  }

  setBlockSize(size: number) {
    this.getContentArea().blockSize = size;

    if (this.style.hasPadding()) {
      const paddingBlockStart = this.style.getPaddingBlockStart(this);
      const paddingBlockEnd = this.style.getPaddingBlockEnd(this);
      this.getPaddingArea().blockSize = size + paddingBlockStart + paddingBlockEnd;
    }

    if (this.style.hasBorder()) {
      const borderBlockStartWidth = this.style.getBorderBlockStartWidth(this);
      const borderBlockEndWidth = this.style.getBorderBlockEndWidth(this);
      const paddingArea = this.getPaddingArea();
      const borderArea = this.getBorderArea();
      borderArea.blockSize = paddingArea.blockSize + borderBlockStartWidth + borderBlockEndWidth;
    }
  }

  setInlinePosition(lineLeft: number) {
    this.getBorderArea().lineLeft = lineLeft;
  }

  setInlineOuterSize(size: number) {
    this.getBorderArea().inlineSize = size;

    if (this.style.hasBorder()) {
      const borderLineLeftWidth = this.style.getBorderLineLeftWidth(this);
      const borderLineRightWidth = this.style.getBorderLineRightWidth(this);
      this.getPaddingArea().inlineSize = size - borderLineLeftWidth - borderLineRightWidth;
    }

    if (this.style.hasPadding()) {
      const paddingLineLeft = this.style.getPaddingLineLeft(this);
      const paddingLineRight = this.style.getPaddingLineRight(this);
      const paddingArea = this.getPaddingArea();
      this.getContentArea().inlineSize = paddingArea.inlineSize - paddingLineLeft - paddingLineRight;
    }
  }

  /**
   * Converts the relative coordinates of every area this box owns into
   * absolute ones. Parents must be absolutified first.
   */
  absolutify() {
    const borderArea = this.getBorderArea();
    const paddingArea = this.getPaddingArea();
    const contentArea = this.getContentArea();
    borderArea.absolutify();
    if (paddingArea !== borderArea) paddingArea.absolutify();
    if (contentArea !== paddingArea) contentArea.absolutify();
  }

  isBox(): this is Box {
    return true;
  }

  isAnonymous() {
    return Boolean(this.bitfield & Box.BITS.isAnonymous);
  }

  isLoggingEnabled() {
    return Boolean(this.bitfield & Box.BITS.enableLogging);
  }

  logName(log: Logger, options?: RenderItemLogOptions) {
    log.text('Box');
  }

  getLogSymbol() {
    return '◼︎';
  }

  stringifyBitfield() {
    return '0b' + this.bitfield.toString(2).padStart(4, '0');
  }
}

export class BoxArea {
  parent: BoxArea | null;
  /**
   * Null for the initial containing block
   */
  box: Box | null;
  blockStart: number;
  blockSize: number;
  lineLeft: number;
  inlineSize: number;
  /**
   * The used height, when it was known before the contents were laid out.
   * Percentage heights of children resolve against this.
   */
  definiteBlockSize: number | undefined;

  constructor(box: Box | null, x?: number, y?: number, w?: number, h?: number) {
    this.parent = null;
    this.box = box;
    this.blockStart = y || 0;
    this.blockSize = h || 0;
    this.lineLeft = x || 0;
    this.inlineSize = w || 0;
    this.definiteBlockSize = undefined;
  }

  get x() {
    return this.lineLeft;
  }

  set x(x: number) {
    this.lineLeft = x;
  }

  get y() {
    return this.blockStart;
  }

  set y(y: number) {
    this.blockStart = y;
  }

  get width() {
    return this.inlineSize;
  }

  get height() {
    return this.blockSize;
  }

  setParent(p: BoxArea) {
    this.parent = p;
  }

  absolutify() {
    if (!this.parent) {
      throw new Error(`Cannot absolutify area for ${this.box?.id}, parent was never set`);
    }

    this.lineLeft = this.parent.x + this.lineLeft;
    this.blockStart = this.parent.y + this.blockStart;
  }

  contains(x: number, y: number) {
    return x >= this.x && x < this.x + this.width && y >= this.y && y < this.y + this.height;
  }

  repr(indent = 0) {
    const {width: w, height: h, x, y} = this;
    return '  '.repeat(indent) + `⚃ Area ${this.box?.id ?? '(initial)'}: ${w}⨯${h} @${x},${y}`;
  }
}
