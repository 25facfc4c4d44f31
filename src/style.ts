import {HTMLElement, TextNode} from './dom.js';
import {environment} from './environment.js';
import {compareSpecificity} from './style-selector.js';

import type {Box} from './layout-box.js';
import type {Document} from './dom.js';
import type {Rule} from './parse-css.js';
import type {RuleIndex} from './style-query.js';
import type {FontSpec} from './text-font.js';

export const inherited = Symbol('inherited');

type Inherited = typeof inherited;

export const initial = Symbol('initial');

type Initial = typeof initial;

export type WhiteSpace = 'normal' | 'nowrap' | 'pre-wrap' | 'pre-line' | 'pre';

export type Length = number | {value: number, unit: 'em'};

export type Percentage = {value: number, unit: '%'};

export type Number = {value: number, unit: null};

export type FontWeight = number | 'normal' | 'bold' | 'bolder' | 'lighter';

export type FontStyle = 'normal' | 'italic' | 'oblique';

export type Color = {r: number, g: number, b: number, a: number};

export type OuterDisplay = 'inline' | 'block' | 'none';

export type InnerDisplay = 'flow' | 'flow-root' | 'none';

export type Display = {outer: OuterDisplay, inner: InnerDisplay};

export type BorderStyle = 'none' | 'hidden' | 'dotted' | 'dashed' | 'solid'
  | 'double' | 'groove' | 'ridge' | 'inset' | 'outset';

export type TextAlign = 'start' | 'end' | 'left' | 'right' | 'center';

export type LineHeight = 'normal' | Length | Percentage | Number;

export interface DeclaredStyle {
  whiteSpace?: WhiteSpace | Inherited | Initial;
  color?: Color | Inherited | Initial;
  fontSize?: Length | Percentage | Inherited | Initial;
  fontWeight?: FontWeight | Inherited | Initial;
  fontStyle?: FontStyle | Inherited | Initial;
  fontFamily?: string[] | Inherited | Initial;
  lineHeight?: LineHeight | Inherited | Initial;
  backgroundColor?: Color | Inherited | Initial;
  display?: Display | Inherited | Initial;
  borderTopWidth?: Length | Inherited | Initial;
  borderRightWidth?: Length | Inherited | Initial;
  borderBottomWidth?: Length | Inherited | Initial;
  borderLeftWidth?: Length | Inherited | Initial;
  borderTopStyle?: BorderStyle | Inherited | Initial;
  borderRightStyle?: BorderStyle | Inherited | Initial;
  borderBottomStyle?: BorderStyle | Inherited | Initial;
  borderLeftStyle?: BorderStyle | Inherited | Initial;
  borderTopColor?: Color | Inherited | Initial;
  borderRightColor?: Color | Inherited | Initial;
  borderBottomColor?: Color | Inherited | Initial;
  borderLeftColor?: Color | Inherited | Initial;
  paddingTop?: Length | Percentage | Inherited | Initial;
  paddingRight?: Length | Percentage | Inherited | Initial;
  paddingBottom?: Length | Percentage | Inherited | Initial;
  paddingLeft?: Length | Percentage | Inherited | Initial;
  marginTop?: Length | Percentage | 'auto' | Inherited | Initial;
  marginRight?: Length | Percentage | 'auto' | Inherited | Initial;
  marginBottom?: Length | Percentage | 'auto' | Inherited | Initial;
  marginLeft?: Length | Percentage | 'auto' | Inherited | Initial;
  width?: Length | Percentage | 'auto' | Inherited | Initial;
  height?: Length | Percentage | 'auto' | Inherited | Initial;
  textAlign?: TextAlign | Inherited | Initial;
}

export const EMPTY_STYLE: DeclaredStyle = {};

type CascadedStyle = DeclaredStyle;

type RemoveUnits<T, U> =
  T extends number ? number
    : T extends {value: number, unit: infer V} | number ?
      V extends U ? number : number | {value: number, unit: Exclude<V, U>}
    : T;

type SpecifiedStyle = Required<{
  [K in keyof DeclaredStyle]: Exclude<DeclaredStyle[K], Inherited | Initial>
}>;

type ComputedStyle = {
  [K in keyof SpecifiedStyle]
    : K extends 'fontSize' ? number
    : K extends 'lineHeight' ? 'normal' | number | {value: number, unit: null}
    : K extends 'fontWeight' ? number
    : RemoveUnits<SpecifiedStyle[K], 'em'>
};

/**
 * Turns a computed value into a used pixel value for a box. Percentages are of
 * the containing block's width. Anything that doesn't come out as a finite
 * number is reported and replaced with the property's initial value.
 */
function resolvePercent(
  box: Box,
  cssVal: number | Percentage,
  property: keyof ComputedStyle,
  fallback = 0
) {
  const value = typeof cssVal === 'object'
    ? cssVal.value / 100 * box.containingBlock.inlineSize
    : cssVal;

  if (!Number.isFinite(value)) {
    environment.warn(`Unusable value for ${property} on box ${box.id}, using ${fallback}`);
    return fallback;
  }

  return value;
}

function percentGtZero(cssVal: number | {value: number, unit: '%'}) {
  return typeof cssVal === 'object' ? cssVal.value > 0 : cssVal > 0;
}

export class Style implements ComputedStyle {
  whiteSpace: ComputedStyle['whiteSpace'];
  color: ComputedStyle['color'];
  fontSize: ComputedStyle['fontSize'];
  fontWeight: ComputedStyle['fontWeight'];
  fontStyle: ComputedStyle['fontStyle'];
  fontFamily: ComputedStyle['fontFamily'];
  lineHeight: ComputedStyle['lineHeight'];
  backgroundColor: ComputedStyle['backgroundColor'];
  display: ComputedStyle['display'];
  borderTopWidth: ComputedStyle['borderTopWidth'];
  borderRightWidth: ComputedStyle['borderRightWidth'];
  borderBottomWidth: ComputedStyle['borderBottomWidth'];
  borderLeftWidth: ComputedStyle['borderLeftWidth'];
  borderTopStyle: ComputedStyle['borderTopStyle'];
  borderRightStyle: ComputedStyle['borderRightStyle'];
  borderBottomStyle: ComputedStyle['borderBottomStyle'];
  borderLeftStyle: ComputedStyle['borderLeftStyle'];
  borderTopColor: ComputedStyle['borderTopColor'];
  borderRightColor: ComputedStyle['borderRightColor'];
  borderBottomColor: ComputedStyle['borderBottomColor'];
  borderLeftColor: ComputedStyle['borderLeftColor'];
  paddingTop: ComputedStyle['paddingTop'];
  paddingRight: ComputedStyle['paddingRight'];
  paddingBottom: ComputedStyle['paddingBottom'];
  paddingLeft: ComputedStyle['paddingLeft'];
  marginTop: ComputedStyle['marginTop'];
  marginRight: ComputedStyle['marginRight'];
  marginBottom: ComputedStyle['marginBottom'];
  marginLeft: ComputedStyle['marginLeft'];
  width: ComputedStyle['width'];
  height: ComputedStyle['height'];
  textAlign: ComputedStyle['textAlign'];

  constructor(style: ComputedStyle) {
    this.whiteSpace = style.whiteSpace;
    this.color = style.color;
    this.fontSize = style.fontSize;
    this.fontWeight = style.fontWeight;
    this.fontStyle = style.fontStyle;
    this.fontFamily = style.fontFamily;
    this.lineHeight = style.lineHeight;
    this.backgroundColor = style.backgroundColor;
    this.display = style.display;
    this.borderTopWidth = style.borderTopWidth;
    this.borderRightWidth = style.borderRightWidth;
    this.borderBottomWidth = style.borderBottomWidth;
    this.borderLeftWidth = style.borderLeftWidth;
    this.borderTopStyle = style.borderTopStyle;
    this.borderRightStyle = style.borderRightStyle;
    this.borderBottomStyle = style.borderBottomStyle;
    this.borderLeftStyle = style.borderLeftStyle;
    this.borderTopColor = style.borderTopColor;
    this.borderRightColor = style.borderRightColor;
    this.borderBottomColor = style.borderBottomColor;
    this.borderLeftColor = style.borderLeftColor;
    this.paddingTop = style.paddingTop;
    this.paddingRight = style.paddingRight;
    this.paddingBottom = style.paddingBottom;
    this.paddingLeft = style.paddingLeft;
    this.marginTop = style.marginTop;
    this.marginRight = style.marginRight;
    this.marginBottom = style.marginBottom;
    this.marginLeft = style.marginLeft;
    this.width = style.width;
    this.height = style.height;
    this.textAlign = style.textAlign;
  }

  /**
   * Used line height. `normal` is whatever the font says.
   */
  getLineHeight(normal: number) {
    if (this.lineHeight === 'normal') return normal;
    if (typeof this.lineHeight === 'object') return this.lineHeight.value * this.fontSize;
    return this.lineHeight;
  }

  getTextAlign() {
    if (this.textAlign === 'start') return 'left';
    if (this.textAlign === 'end') return 'right';
    return this.textAlign;
  }

  getFontSpec(): FontSpec {
    return {
      family: this.fontFamily,
      size: this.fontSize,
      weight: this.fontWeight,
      style: this.fontStyle
    };
  }

  hasPadding() {
    return percentGtZero(this.paddingTop)
      || percentGtZero(this.paddingRight)
      || percentGtZero(this.paddingBottom)
      || percentGtZero(this.paddingLeft);
  }

  hasBorder() {
    return this.borderTopWidth > 0 && this.borderTopStyle !== 'none'
      || this.borderRightWidth > 0 && this.borderRightStyle !== 'none'
      || this.borderBottomWidth > 0 && this.borderBottomStyle !== 'none'
      || this.borderLeftWidth > 0 && this.borderLeftStyle !== 'none';
  }

  wraps() {
    return this.whiteSpace !== 'nowrap' && this.whiteSpace !== 'pre';
  }

  getMarginBlockStart(box: Box) {
    if (this.marginTop === 'auto') return this.marginTop;
    return resolvePercent(box, this.marginTop, 'marginTop');
  }

  getMarginBlockEnd(box: Box) {
    if (this.marginBottom === 'auto') return this.marginBottom;
    return resolvePercent(box, this.marginBottom, 'marginBottom');
  }

  getMarginLineLeft(box: Box) {
    if (this.marginLeft === 'auto') return this.marginLeft;
    return resolvePercent(box, this.marginLeft, 'marginLeft');
  }

  getMarginLineRight(box: Box) {
    if (this.marginRight === 'auto') return this.marginRight;
    return resolvePercent(box, this.marginRight, 'marginRight');
  }

  getPaddingBlockStart(box: Box) {
    return Math.max(0, resolvePercent(box, this.paddingTop, 'paddingTop'));
  }

  getPaddingBlockEnd(box: Box) {
    return Math.max(0, resolvePercent(box, this.paddingBottom, 'paddingBottom'));
  }

  getPaddingLineLeft(box: Box) {
    return Math.max(0, resolvePercent(box, this.paddingLeft, 'paddingLeft'));
  }

  getPaddingLineRight(box: Box) {
    return Math.max(0, resolvePercent(box, this.paddingRight, 'paddingRight'));
  }

  getBorderBlockStartWidth(box: Box) {
    if (this.borderTopStyle === 'none' || this.borderTopStyle === 'hidden') return 0;
    return Math.max(0, resolvePercent(box, this.borderTopWidth, 'borderTopWidth'));
  }

  getBorderBlockEndWidth(box: Box) {
    if (this.borderBottomStyle === 'none' || this.borderBottomStyle === 'hidden') return 0;
    return Math.max(0, resolvePercent(box, this.borderBottomWidth, 'borderBottomWidth'));
  }

  getBorderLineLeftWidth(box: Box) {
    if (this.borderLeftStyle === 'none' || this.borderLeftStyle === 'hidden') return 0;
    return Math.max(0, resolvePercent(box, this.borderLeftWidth, 'borderLeftWidth'));
  }

  getBorderLineRightWidth(box: Box) {
    if (this.borderRightStyle === 'none' || this.borderRightStyle === 'hidden') return 0;
    return Math.max(0, resolvePercent(box, this.borderRightWidth, 'borderRightWidth'));
  }

  /**
   * Content height, or auto. Percentages only apply when the containing block
   * has a definite height (CSS2 §10.5).
   */
  getBlockSize(box: Box): number | 'auto' {
    const cssVal = this.height;
    if (cssVal === 'auto') return cssVal;

    let value;

    if (typeof cssVal === 'object') {
      const cbBlockSize = box.containingBlock.definiteBlockSize;
      if (cbBlockSize === undefined) return 'auto';
      value = cssVal.value / 100 * cbBlockSize;
    } else {
      value = cssVal;
    }

    if (!Number.isFinite(value) || value < 0) {
      environment.warn(`Unusable value for height on box ${box.id}, using auto`);
      return 'auto';
    }

    return value;
  }

  getInlineSize(box: Box): number | 'auto' {
    const cssVal = this.width;
    if (cssVal === 'auto') return cssVal;
    const value = resolvePercent(box, cssVal, 'width', -1);

    if (value < 0) {
      if (value !== -1) environment.warn(`Unusable value for width on box ${box.id}, using auto`);
      return 'auto';
    }

    return value;
  }
}

// Initial values for every property, as given by each property's CSS
// definition. This is also the style that's used as the root style for
// inheritance. These are the "computed value"s as described in CSS Cascading
// and Inheritance Level 4 § 4.4
const initialPlainStyle: ComputedStyle = Object.freeze({
  whiteSpace: 'normal',
  color: {r: 0, g: 0, b: 0, a: 1},
  fontSize: 16,
  fontWeight: 400,
  fontStyle: 'normal',
  fontFamily: ['serif'],
  lineHeight: 'normal',
  backgroundColor: {r: 0, g: 0, b: 0, a: 0},
  display: {outer: 'inline' as const, inner: 'flow' as const},
  borderTopWidth: 3,
  borderRightWidth: 3,
  borderBottomWidth: 3,
  borderLeftWidth: 3,
  borderTopStyle: 'none',
  borderRightStyle: 'none',
  borderBottomStyle: 'none',
  borderLeftStyle: 'none',
  borderTopColor: {r: 0, g: 0, b: 0, a: 1},
  borderRightColor: {r: 0, g: 0, b: 0, a: 1},
  borderBottomColor: {r: 0, g: 0, b: 0, a: 1},
  borderLeftColor: {r: 0, g: 0, b: 0, a: 1},
  paddingTop: 0,
  paddingRight: 0,
  paddingBottom: 0,
  paddingLeft: 0,
  marginTop: 0,
  marginRight: 0,
  marginBottom: 0,
  marginLeft: 0,
  width: 'auto',
  height: 'auto',
  textAlign: 'start'
});

export const initialStyle = new Style(initialPlainStyle);

type InheritedStyleDefinitions = {[K in keyof ComputedStyle]: boolean};

// Each CSS property defines whether or not it's inherited
const inheritedStyle: InheritedStyleDefinitions = Object.freeze({
  whiteSpace: true,
  color: true,
  fontSize: true,
  fontWeight: true,
  fontStyle: true,
  fontFamily: true,
  lineHeight: true,
  backgroundColor: false,
  display: false,
  borderTopWidth: false,
  borderRightWidth: false,
  borderBottomWidth: false,
  borderLeftWidth: false,
  borderTopStyle: false,
  borderRightStyle: false,
  borderBottomStyle: false,
  borderLeftStyle: false,
  borderTopColor: false,
  borderRightColor: false,
  borderBottomColor: false,
  borderLeftColor: false,
  paddingTop: false,
  paddingRight: false,
  paddingBottom: false,
  paddingLeft: false,
  marginTop: false,
  marginRight: false,
  marginBottom: false,
  marginLeft: false,
  width: false,
  height: false,
  textAlign: true
});

type UaDeclaredStyles = {[tagName: string]: DeclaredStyle};

const block: Display = {outer: 'block', inner: 'flow'};
const none: Display = {outer: 'none', inner: 'none'};

export const uaDeclaredStyles: UaDeclaredStyles = Object.freeze({
  '!doctype': {display: none},
  head: {display: none},
  title: {display: none},
  script: {display: none},
  style: {display: none},
  link: {display: none},
  meta: {display: none},
  base: {display: none},
  html: {display: block},
  body: {
    display: block,
    marginTop: 8,
    marginRight: 8,
    marginBottom: 8,
    marginLeft: 8
  },
  article: {display: block},
  section: {display: block},
  nav: {display: block},
  aside: {display: block},
  hgroup: {display: block},
  header: {display: block},
  footer: {display: block},
  address: {display: block, fontStyle: 'italic'},
  main: {display: block},
  div: {display: block},
  figure: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    marginLeft: 40,
    marginRight: 40
  },
  figcaption: {display: block},
  table: {display: block},
  form: {display: block},
  fieldset: {display: block},
  legend: {display: block},
  details: {display: block},
  summary: {display: block},
  dl: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  dt: {display: block},
  dd: {display: block, marginLeft: 40},
  ol: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    paddingLeft: 40
  },
  ul: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    paddingLeft: 40
  },
  menu: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    paddingLeft: 40
  },
  li: {display: block},
  blockquote: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    marginLeft: 40,
    marginRight: 40
  },
  pre: {
    display: block,
    whiteSpace: 'pre',
    fontFamily: ['monospace'],
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  hr: {
    display: block,
    marginTop: {value: 0.5, unit: 'em'},
    marginBottom: {value: 0.5, unit: 'em'},
    borderTopStyle: 'inset',
    borderRightStyle: 'inset',
    borderBottomStyle: 'inset',
    borderLeftStyle: 'inset',
    borderTopWidth: 1,
    borderRightWidth: 1,
    borderBottomWidth: 1,
    borderLeftWidth: 1,
    borderTopColor: {r: 128, g: 128, b: 128, a: 1},
    borderRightColor: {r: 128, g: 128, b: 128, a: 1},
    borderBottomColor: {r: 128, g: 128, b: 128, a: 1},
    borderLeftColor: {r: 128, g: 128, b: 128, a: 1}
  },
  p: {
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'}
  },
  strong: {
    fontWeight: 'bolder'
  },
  b: {
    fontWeight: 'bolder'
  },
  em: {
    fontStyle: 'italic'
  },
  i: {
    fontStyle: 'italic'
  },
  code: {
    fontFamily: ['monospace']
  },
  h1: {
    fontSize: {value: 2, unit: 'em'},
    display: block,
    marginTop: {value: 0.67, unit: 'em'},
    marginBottom: {value: 0.67, unit: 'em'},
    fontWeight: 'bold'
  },
  h2: {
    fontSize: {value: 1.5, unit: 'em'},
    display: block,
    marginTop: {value: 0.83, unit: 'em'},
    marginBottom: {value: 0.83, unit: 'em'},
    fontWeight: 'bold'
  },
  h3: {
    fontSize: {value: 1.17, unit: 'em'},
    display: block,
    marginTop: {value: 1, unit: 'em'},
    marginBottom: {value: 1, unit: 'em'},
    fontWeight: 'bold'
  },
  h4: {
    display: block,
    marginTop: {value: 1.33, unit: 'em'},
    marginBottom: {value: 1.33, unit: 'em'},
    fontWeight: 'bold'
  },
  h5: {
    fontSize: {value: 0.83, unit: 'em'},
    display: block,
    marginTop: {value: 1.67, unit: 'em'},
    marginBottom: {value: 1.67, unit: 'em'},
    fontWeight: 'bold'
  },
  h6: {
    fontSize: {value: 0.67, unit: 'em'},
    display: block,
    marginTop: {value: 2.33, unit: 'em'},
    marginBottom: {value: 2.33, unit: 'em'},
    fontWeight: 'bold'
  }
});

const cascadedCache = new WeakMap<CascadedStyle, WeakMap<CascadedStyle, DeclaredStyle>>();

export function cascadeStyles(s1: DeclaredStyle, s2: DeclaredStyle): CascadedStyle {
  let m1 = cascadedCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = {...s1, ...s2};

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  cascadedCache.set(s1, m1);

  return ret;
}

// Inheritance and defaulting for one property
function specify<T>(
  value: T | Inherited | Initial | undefined,
  parentValue: NoInfer<T>,
  initialValue: NoInfer<T>,
  inherits: boolean
): T {
  if (value === inherited) return parentValue;
  if (value === initial) return initialValue;
  if (value === undefined) return inherits ? parentValue : initialValue;
  return value;
}

function computeLength(value: Length, fontSize: number) {
  return typeof value === 'object' ? value.value * fontSize : value;
}

function computeLengthPercentage(value: Length | Percentage, fontSize: number) {
  if (typeof value === 'object' && value.unit === 'em') return value.value * fontSize;
  return value;
}

function computeLengthPercentageAuto(value: Length | Percentage | 'auto', fontSize: number) {
  if (value === 'auto') return value;
  return computeLengthPercentage(value, fontSize);
}

// https://www.w3.org/TR/css-fonts-4/#relative-weights
function computeFontWeight(value: FontWeight, parentWeight: number) {
  if (value === 'normal') return 400;
  if (value === 'bold') return 700;
  if (value === 'bolder' || value === 'lighter') {
    const bolder = value === 'bolder';
    if (parentWeight < 100) {
      return bolder ? 400 : parentWeight;
    } else if (parentWeight >= 100 && parentWeight < 350) {
      return bolder ? 400 : 100;
    } else if (parentWeight >= 350 && parentWeight < 550) {
      return bolder ? 700 : 100;
    } else if (parentWeight >= 550 && parentWeight < 750) {
      return bolder ? 900 : 400;
    } else if (parentWeight >= 750 && parentWeight < 900) {
      return bolder ? 900 : 700;
    } else {
      return bolder ? parentWeight : 700;
    }
  }
  return value;
}

function computeLineHeight(value: LineHeight, fontSize: number): ComputedStyle['lineHeight'] {
  if (value === 'normal' || typeof value === 'number') return value;
  if (value.unit === 'em') return value.value * fontSize;
  if (value.unit === '%') return value.value / 100 * fontSize;
  return value;
}

/**
 * Very simple property inheritance model. createStyle starts out with cascaded
 * styles (CSS Cascading and Inheritance Level 4 §4.2), calculates the specified
 * style (§4.3) by doing inheritance and defaulting, and then calculates the
 * computed style (§4.4) by resolving em, some percentages, etc. Used/actual
 * styles (§4.5, §4.6) are calculated during layout, external to this file.
 */
function computeStyle(parent: Style, style: CascadedStyle) {
  const init = initialPlainStyle;
  const inh = inheritedStyle;

  // Compute fontSize first since em values depend on it
  const specifiedFontSize = specify(style.fontSize, parent.fontSize, init.fontSize, inh.fontSize);
  let fontSize;

  if (typeof specifiedFontSize === 'object') {
    if (specifiedFontSize.unit === '%') {
      fontSize = parent.fontSize * specifiedFontSize.value / 100;
    } else {
      fontSize = parent.fontSize * specifiedFontSize.value;
    }
  } else {
    fontSize = specifiedFontSize;
  }

  const fontWeight = specify(style.fontWeight, parent.fontWeight, init.fontWeight, inh.fontWeight);
  const lineHeight = specify(style.lineHeight, parent.lineHeight, init.lineHeight, inh.lineHeight);
  const length = (value: Length) => computeLength(value, fontSize);
  const lengthPercentage = (value: Length | Percentage) => computeLengthPercentage(value, fontSize);
  const lengthPercentageAuto = (value: Length | Percentage | 'auto') => {
    return computeLengthPercentageAuto(value, fontSize);
  };

  return new Style({
    whiteSpace: specify(style.whiteSpace, parent.whiteSpace, init.whiteSpace, inh.whiteSpace),
    color: specify(style.color, parent.color, init.color, inh.color),
    fontSize,
    fontWeight: computeFontWeight(fontWeight, parent.fontWeight),
    fontStyle: specify(style.fontStyle, parent.fontStyle, init.fontStyle, inh.fontStyle),
    fontFamily: specify(style.fontFamily, parent.fontFamily, init.fontFamily, inh.fontFamily),
    lineHeight: computeLineHeight(lineHeight, fontSize),
    backgroundColor: specify(style.backgroundColor, parent.backgroundColor, init.backgroundColor, inh.backgroundColor),
    display: specify(style.display, parent.display, init.display, inh.display),
    borderTopWidth: length(specify(style.borderTopWidth, parent.borderTopWidth, init.borderTopWidth, inh.borderTopWidth)),
    borderRightWidth: length(specify(style.borderRightWidth, parent.borderRightWidth, init.borderRightWidth, inh.borderRightWidth)),
    borderBottomWidth: length(specify(style.borderBottomWidth, parent.borderBottomWidth, init.borderBottomWidth, inh.borderBottomWidth)),
    borderLeftWidth: length(specify(style.borderLeftWidth, parent.borderLeftWidth, init.borderLeftWidth, inh.borderLeftWidth)),
    borderTopStyle: specify(style.borderTopStyle, parent.borderTopStyle, init.borderTopStyle, inh.borderTopStyle),
    borderRightStyle: specify(style.borderRightStyle, parent.borderRightStyle, init.borderRightStyle, inh.borderRightStyle),
    borderBottomStyle: specify(style.borderBottomStyle, parent.borderBottomStyle, init.borderBottomStyle, inh.borderBottomStyle),
    borderLeftStyle: specify(style.borderLeftStyle, parent.borderLeftStyle, init.borderLeftStyle, inh.borderLeftStyle),
    borderTopColor: specify(style.borderTopColor, parent.borderTopColor, init.borderTopColor, inh.borderTopColor),
    borderRightColor: specify(style.borderRightColor, parent.borderRightColor, init.borderRightColor, inh.borderRightColor),
    borderBottomColor: specify(style.borderBottomColor, parent.borderBottomColor, init.borderBottomColor, inh.borderBottomColor),
    borderLeftColor: specify(style.borderLeftColor, parent.borderLeftColor, init.borderLeftColor, inh.borderLeftColor),
    paddingTop: lengthPercentage(specify(style.paddingTop, parent.paddingTop, init.paddingTop, inh.paddingTop)),
    paddingRight: lengthPercentage(specify(style.paddingRight, parent.paddingRight, init.paddingRight, inh.paddingRight)),
    paddingBottom: lengthPercentage(specify(style.paddingBottom, parent.paddingBottom, init.paddingBottom, inh.paddingBottom)),
    paddingLeft: lengthPercentage(specify(style.paddingLeft, parent.paddingLeft, init.paddingLeft, inh.paddingLeft)),
    marginTop: lengthPercentageAuto(specify(style.marginTop, parent.marginTop, init.marginTop, inh.marginTop)),
    marginRight: lengthPercentageAuto(specify(style.marginRight, parent.marginRight, init.marginRight, inh.marginRight)),
    marginBottom: lengthPercentageAuto(specify(style.marginBottom, parent.marginBottom, init.marginBottom, inh.marginBottom)),
    marginLeft: lengthPercentageAuto(specify(style.marginLeft, parent.marginLeft, init.marginLeft, inh.marginLeft)),
    width: lengthPercentageAuto(specify(style.width, parent.width, init.width, inh.width)),
    height: lengthPercentageAuto(specify(style.height, parent.height, init.height, inh.height)),
    textAlign: specify(style.textAlign, parent.textAlign, init.textAlign, inh.textAlign)
  });
}

const styleCache = new WeakMap<Style, WeakMap<DeclaredStyle, Style>>();

export function createStyle(s1: Style, s2: CascadedStyle) {
  let m1 = styleCache.get(s1);
  let m2 = m1 && m1.get(s2);

  if (m2) return m2;

  const ret = computeStyle(s1, s2);

  if (m1) {
    m1.set(s2, ret);
    return ret;
  }

  m1 = new WeakMap();
  m1.set(s2, ret);
  styleCache.set(s1, m1);

  return ret;
}

// required styles that always come last in the cascade
const rootDeclaredStyle: DeclaredStyle = {
  display: {
    outer: 'block',
    inner: 'flow-root'
  }
};

export function getRootStyle(style: DeclaredStyle = EMPTY_STYLE) {
  return createStyle(initialStyle, cascadeStyles(style, rootDeclaredStyle));
}

export function getOriginStyle() {
  return initialStyle;
}

function byPrecedence(a: Rule, b: Rule) {
  return compareSpecificity(a.specificity, b.specificity) || a.order - b.order;
}

/**
 * Cascade for one element: user agent defaults, then matching author rules
 * from least to most specific (source order breaking ties), then the [style]
 * attribute. The last declaration of a property wins.
 */
export function cascadeElement(el: HTMLElement, rules: RuleIndex<Rule> | null) {
  let cascaded = uaDeclaredStyles[el.tagName] ?? EMPTY_STYLE;

  if (rules) {
    const matched = rules.match(el).sort(byPrecedence);
    for (const rule of matched) cascaded = cascadeStyles(cascaded, rule.declarations);
  }

  return cascadeStyles(cascaded, el.declaredStyle);
}

export function computeElementStyle(el: HTMLElement | TextNode, rules: RuleIndex<Rule> | null = null) {
  const parentStyle = el.parent ? el.parent.style : initialStyle;

  if (el instanceof TextNode) {
    el.style = createStyle(parentStyle, EMPTY_STYLE);
  } else {
    el.style = createStyle(parentStyle, cascadeElement(el, rules));
  }
}

/**
 * Assigns a computed style to every element and text node, parents first. Only
 * the style slots are written; the tree itself is left alone.
 */
export function resolveStyles(document: Document, rules: RuleIndex<Rule> | null) {
  const stack = document.children.slice().reverse();

  while (stack.length) {
    const node = stack.pop();

    if (node instanceof HTMLElement) {
      computeElementStyle(node, rules);
      for (let i = node.children.length - 1; i >= 0; i--) stack.push(node.children[i]);
    } else if (node instanceof TextNode) {
      computeElementStyle(node, rules);
    }
  }
}
