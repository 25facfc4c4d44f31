import type {Color} from './style.js';
import type {FontSpec} from './text-font.js';
import type {Box} from './layout-box.js';
import type {BlockContainer, IfcInline} from './layout-flow.js';
import type {TextFragment} from './layout-text.js';

export type Side = 'top' | 'right' | 'bottom' | 'left';

/**
 * Presentation surface. Properties are state set before each call, the same
 * way a canvas context works.
 */
export interface PaintBackend {
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;
  font: FontSpec | undefined;
  /**
   * A border side, stroked along its center line
   */
  edge(x: number, y: number, length: number, side: Side): void;
  /**
   * Text is placed with its baseline at y
   */
  text(x: number, y: number, text: string): void;
  rect(x: number, y: number, w: number, h: number): void;
}

function paintBorders(box: BlockContainer, b: PaintBackend) {
  const {x, y, width, height} = box.getBorderArea();
  const style = box.style;
  const top = style.getBorderBlockStartWidth(box);
  const right = style.getBorderLineRightWidth(box);
  const bottom = style.getBorderBlockEndWidth(box);
  const left = style.getBorderLineLeftWidth(box);

  if (top > 0) {
    b.strokeColor = style.borderTopColor;
    b.lineWidth = top;
    b.edge(x, y + top / 2, width, 'top');
  }

  if (right > 0) {
    b.strokeColor = style.borderRightColor;
    b.lineWidth = right;
    b.edge(x + width - right / 2, y, height, 'right');
  }

  if (bottom > 0) {
    b.strokeColor = style.borderBottomColor;
    b.lineWidth = bottom;
    b.edge(x, y + height - bottom / 2, width, 'bottom');
  }

  if (left > 0) {
    b.strokeColor = style.borderLeftColor;
    b.lineWidth = left;
    b.edge(x + left / 2, y, height, 'left');
  }
}

function paintBlockBackground(box: BlockContainer, b: PaintBackend, isRoot = false) {
  if (!isRoot && box.style.backgroundColor.a > 0) {
    const {x, y, width, height} = box.getBorderArea();
    b.fillColor = box.style.backgroundColor;
    b.rect(x, y, width, height);
  }

  if (box.style.hasBorder()) paintBorders(box, b);
}

function paintText(fragment: TextFragment, b: PaintBackend) {
  b.fillColor = fragment.style.color;
  b.font = fragment.style.getFontSpec();
  b.text(fragment.x, fragment.baseline, fragment.text);
}

function paintInlines(ifc: IfcInline, b: PaintBackend) {
  for (const linebox of ifc.lineboxes) {
    for (const fragment of linebox.fragments) {
      if (fragment.type === 'text') {
        if (fragment.style.color.a > 0) paintText(fragment, b);
      } else {
        // inline-blocks paint atomically, as if they were their own layer
        paintBlock(fragment.box, b);
      }
    }
  }
}

function paintBlock(box: BlockContainer, b: PaintBackend, isRoot = false) {
  paintBlockBackground(box, b, isRoot);

  for (const child of box.children) {
    if (child.isIfcInline()) {
      paintInlines(child, b);
    } else if (child.isBlockContainer()) {
      paintBlock(child, b);
    }
  }
}

/**
 * Paint the root element and everything in it. Backgrounds and borders of a
 * block come before its content, in tree order.
 * https://www.w3.org/TR/CSS22/zindex.html
 */
export default function paint(block: BlockContainer, b: PaintBackend) {
  // Propagate background color to the viewport
  if (block.style.backgroundColor.a > 0) {
    const area = block.containingBlock;
    b.fillColor = block.style.backgroundColor;
    b.rect(area.x, area.y, area.width, area.height);
  }

  paintBlock(block, b, true);
}

export type PaintCommand = {type: 'rect', x: number, y: number, width: number, height: number, color: Color}
  | {type: 'edge', x: number, y: number, length: number, side: Side, lineWidth: number, color: Color}
  | {type: 'text', x: number, y: number, text: string, color: Color, font: FontSpec | undefined};

/**
 * Records what would have been drawn
 */
export class DisplayListBackend implements PaintBackend {
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;
  font: FontSpec | undefined;
  commands: PaintCommand[];

  constructor() {
    this.fillColor = {r: 0, g: 0, b: 0, a: 0};
    this.strokeColor = {r: 0, g: 0, b: 0, a: 0};
    this.lineWidth = 0;
    this.font = undefined;
    this.commands = [];
  }

  edge(x: number, y: number, length: number, side: Side) {
    const {lineWidth, strokeColor: color} = this;
    this.commands.push({type: 'edge', x, y, length, side, lineWidth, color});
  }

  text(x: number, y: number, text: string) {
    this.commands.push({type: 'text', x, y, text, color: this.fillColor, font: this.font});
  }

  rect(x: number, y: number, width: number, height: number) {
    this.commands.push({type: 'rect', x, y, width, height, color: this.fillColor});
  }
}

function* eachPaintedRect(box: Box): Generator<{x: number, y: number, width: number, height: number}> {
  yield box.getBorderArea();

  if (box.isBlockContainer()) {
    for (const child of box.children) yield* eachPaintedRect(child);
  } else if (box.isIfcInline()) {
    for (const linebox of box.lineboxes) {
      for (const fragment of linebox.fragments) {
        if (fragment.type === 'text') {
          yield fragment;
        } else {
          yield* eachPaintedRect(fragment.box);
        }
      }
    }
  }
}

/**
 * Extent of everything that was laid out, measured from the origin
 */
export function getDocumentSize(root: BlockContainer) {
  let width = 0;
  let height = 0;

  for (const rect of eachPaintedRect(root)) {
    width = Math.max(width, rect.x + rect.width);
    height = Math.max(height, rect.y + rect.height);
  }

  return {width, height};
}

/**
 * How far the viewport can be scrolled in each direction
 */
export function getScrollLimit(root: BlockContainer, viewport: {width: number, height: number}) {
  const size = getDocumentSize(root);
  return {
    x: Math.max(0, size.width - viewport.width),
    y: Math.max(0, size.height - viewport.height)
  };
}
