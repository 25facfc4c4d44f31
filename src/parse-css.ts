import {environment} from './environment.js';
import {parse as parseSelector, specificity, SelectorSyntaxError} from './style-selector.js';
import {inherited, initial} from './style.js';

import type {Selector, Specificity} from './style-selector.js';
import type {
  DeclaredStyle,
  Color,
  Display,
  BorderStyle,
  Length,
  Percentage,
  FontWeight,
  LineHeight
} from './style.js';

export interface Rule {
  selector: Selector[];
  specificity: Specificity;
  /**
   * Position among every rule parsed so far. Stylesheets parsed later sort
   * after earlier ones, so parsing in document order gives source order.
   */
  order: number;
  declarations: DeclaredStyle;
}

type Longhand = keyof DeclaredStyle;

type SpecifiedValue<K extends Longhand> =
  Exclude<DeclaredStyle[K], typeof inherited | typeof initial | undefined>;

let ruleOrder = 0;

const namedColors: Record<string, Color> = {
  black: {r: 0, g: 0, b: 0, a: 1},
  silver: {r: 192, g: 192, b: 192, a: 1},
  gray: {r: 128, g: 128, b: 128, a: 1},
  grey: {r: 128, g: 128, b: 128, a: 1},
  white: {r: 255, g: 255, b: 255, a: 1},
  maroon: {r: 128, g: 0, b: 0, a: 1},
  red: {r: 255, g: 0, b: 0, a: 1},
  purple: {r: 128, g: 0, b: 128, a: 1},
  fuchsia: {r: 255, g: 0, b: 255, a: 1},
  magenta: {r: 255, g: 0, b: 255, a: 1},
  green: {r: 0, g: 128, b: 0, a: 1},
  lime: {r: 0, g: 255, b: 0, a: 1},
  olive: {r: 128, g: 128, b: 0, a: 1},
  yellow: {r: 255, g: 255, b: 0, a: 1},
  navy: {r: 0, g: 0, b: 128, a: 1},
  blue: {r: 0, g: 0, b: 255, a: 1},
  teal: {r: 0, g: 128, b: 128, a: 1},
  aqua: {r: 0, g: 255, b: 255, a: 1},
  cyan: {r: 0, g: 255, b: 255, a: 1},
  orange: {r: 255, g: 165, b: 0, a: 1},
  transparent: {r: 0, g: 0, b: 0, a: 0}
};

const reNumber = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;
const reDimension = /^([+-]?(?:\d+\.?\d*|\.\d+))(px|em|%)$/i;

function parseDimension(value: string): Length | Percentage | undefined {
  if (reNumber.test(value)) {
    // only zero may go without a unit
    return Number(value) === 0 ? 0 : undefined;
  }

  const match = reDimension.exec(value);
  if (!match) return;

  const n = Number(match[1]);
  const unit = match[2].toLowerCase();

  if (unit === 'px') return n;
  if (unit === 'em') return {value: n, unit: 'em'};
  return {value: n, unit: '%'};
}

function isNegative(value: Length | Percentage) {
  return typeof value === 'number' ? value < 0 : value.value < 0;
}

export function parseLength(value: string): Length | undefined {
  const dimension = parseDimension(value);
  if (typeof dimension === 'object' && dimension.unit === '%') return;
  return dimension;
}

function clampByte(n: number) {
  return Math.max(0, Math.min(255, Math.round(n)));
}

function parseRgbComponent(value: string) {
  if (value.endsWith('%')) {
    const n = value.slice(0, -1);
    if (!reNumber.test(n)) return;
    return clampByte(Number(n) / 100 * 255);
  }

  if (!reNumber.test(value)) return;
  return clampByte(Number(value));
}

function parseAlpha(value: string) {
  let n;

  if (value.endsWith('%')) {
    const s = value.slice(0, -1);
    if (!reNumber.test(s)) return;
    n = Number(s) / 100;
  } else {
    if (!reNumber.test(value)) return;
    n = Number(value);
  }

  return Math.max(0, Math.min(1, n));
}

export function parseColor(value: string): Color | undefined {
  const lower = value.toLowerCase();

  if (Object.prototype.hasOwnProperty.call(namedColors, lower)) {
    return {...namedColors[lower]};
  }

  if (/^#[\da-f]+$/i.test(value)) {
    const hex = value.slice(1);

    if (hex.length === 3 || hex.length === 4) {
      const c = (i: number) => parseInt(hex[i] + hex[i], 16);
      return {r: c(0), g: c(1), b: c(2), a: hex.length === 4 ? c(3) / 255 : 1};
    }

    if (hex.length === 6 || hex.length === 8) {
      const c = (i: number) => parseInt(hex.slice(i * 2, i * 2 + 2), 16);
      return {r: c(0), g: c(1), b: c(2), a: hex.length === 8 ? c(3) / 255 : 1};
    }

    return;
  }

  const fn = /^rgba?\((.*)\)$/i.exec(value);

  if (fn) {
    const body = fn[1].trim();
    let args;

    if (body.includes(',')) {
      args = body.split(',').map(s => s.trim());
    } else {
      // rgb(1 2 3 / 0.5)
      const [rgb, alpha] = body.split('/').map(s => s.trim());
      args = rgb.split(/\s+/);
      if (alpha !== undefined) args.push(alpha);
    }

    if (args.length !== 3 && args.length !== 4) return;

    const r = parseRgbComponent(args[0]);
    const g = parseRgbComponent(args[1]);
    const b = parseRgbComponent(args[2]);
    const a = args.length === 4 ? parseAlpha(args[3]) : 1;

    if (r === undefined || g === undefined || b === undefined || a === undefined) return;

    return {r, g, b, a};
  }
}

function keyword<T extends string>(...keywords: T[]) {
  return (value: string): T | undefined => {
    const lower = value.toLowerCase();
    return keywords.find(k => k === lower);
  };
}

function parseDisplay(value: string): Display | undefined {
  switch (value.toLowerCase()) {
    case 'none': return {outer: 'none', inner: 'none'};
    case 'block': return {outer: 'block', inner: 'flow'};
    case 'list-item': return {outer: 'block', inner: 'flow'};
    case 'inline': return {outer: 'inline', inner: 'flow'};
    case 'inline-block': return {outer: 'inline', inner: 'flow-root'};
    case 'flow-root': return {outer: 'block', inner: 'flow-root'};
  }
}

const parseBorderStyle = keyword<BorderStyle>(
  'none', 'hidden', 'dotted', 'dashed', 'solid', 'double', 'groove', 'ridge',
  'inset', 'outset'
);

function parseBorderWidth(value: string): Length | undefined {
  switch (value.toLowerCase()) {
    case 'thin': return 1;
    case 'medium': return 3;
    case 'thick': return 5;
  }

  const length = parseLength(value);
  if (length !== undefined && !isNegative(length)) return length;
}

function parseNonNegativeLengthPercentage(value: string) {
  const dimension = parseDimension(value);
  if (dimension !== undefined && !isNegative(dimension)) return dimension;
}

function parseSize(value: string) {
  if (value.toLowerCase() === 'auto') return 'auto' as const;
  return parseNonNegativeLengthPercentage(value);
}

function parseMargin(value: string) {
  if (value.toLowerCase() === 'auto') return 'auto' as const;
  return parseDimension(value);
}

const fontSizeKeywords: Record<string, number> = {
  'xx-small': 9,
  'x-small': 10,
  'small': 13,
  'medium': 16,
  'large': 18,
  'x-large': 24,
  'xx-large': 32
};

function parseFontSize(value: string): Length | Percentage | undefined {
  const lower = value.toLowerCase();
  if (Object.prototype.hasOwnProperty.call(fontSizeKeywords, lower)) return fontSizeKeywords[lower];
  if (lower === 'larger') return {value: 1.2, unit: 'em'};
  if (lower === 'smaller') return {value: 1 / 1.2, unit: 'em'};
  return parseNonNegativeLengthPercentage(value);
}

function parseFontWeight(value: string): FontWeight | undefined {
  const lower = value.toLowerCase();

  if (lower === 'normal' || lower === 'bold' || lower === 'bolder' || lower === 'lighter') {
    return lower;
  }

  if (reNumber.test(value)) {
    const n = Number(value);
    if (n >= 1 && n <= 1000) return n;
  }
}

function parseFontFamily(value: string): string[] | undefined {
  const families = value.split(',').map(family => {
    const trimmed = family.trim();
    const quoted = /^(["'])(.*)\1$/.exec(trimmed);
    return quoted ? quoted[2] : trimmed.split(/\s+/).join(' ');
  });

  if (families.some(family => !family)) return;

  return families;
}

function parseLineHeight(value: string): LineHeight | undefined {
  if (value.toLowerCase() === 'normal') return 'normal';

  if (reNumber.test(value)) {
    const n = Number(value);
    if (n >= 0) return {value: n, unit: null};
    return;
  }

  return parseNonNegativeLengthPercentage(value);
}

const longhands: {[K in Longhand]: (value: string) => SpecifiedValue<K> | undefined} = {
  whiteSpace: keyword('normal', 'nowrap', 'pre-wrap', 'pre-line', 'pre'),
  color: parseColor,
  fontSize: parseFontSize,
  fontWeight: parseFontWeight,
  fontStyle: keyword('normal', 'italic', 'oblique'),
  fontFamily: parseFontFamily,
  lineHeight: parseLineHeight,
  backgroundColor: parseColor,
  display: parseDisplay,
  borderTopWidth: parseBorderWidth,
  borderRightWidth: parseBorderWidth,
  borderBottomWidth: parseBorderWidth,
  borderLeftWidth: parseBorderWidth,
  borderTopStyle: parseBorderStyle,
  borderRightStyle: parseBorderStyle,
  borderBottomStyle: parseBorderStyle,
  borderLeftStyle: parseBorderStyle,
  borderTopColor: parseColor,
  borderRightColor: parseColor,
  borderBottomColor: parseColor,
  borderLeftColor: parseColor,
  paddingTop: parseNonNegativeLengthPercentage,
  paddingRight: parseNonNegativeLengthPercentage,
  paddingBottom: parseNonNegativeLengthPercentage,
  paddingLeft: parseNonNegativeLengthPercentage,
  marginTop: parseMargin,
  marginRight: parseMargin,
  marginBottom: parseMargin,
  marginLeft: parseMargin,
  width: parseSize,
  height: parseSize,
  textAlign: keyword('start', 'end', 'left', 'right', 'center')
};

function isLonghand(key: string): key is Longhand {
  return Object.prototype.hasOwnProperty.call(longhands, key);
}

function camelCase(name: string) {
  return name.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
}

function set<K extends Longhand>(style: DeclaredStyle, key: K, value: DeclaredStyle[K]) {
  style[key] = value;
}

function setLonghand<K extends Longhand>(style: DeclaredStyle, key: K, value: string) {
  const parsed = longhands[key](value);
  if (parsed === undefined) return false;
  set(style, key, parsed);
  return true;
}

type Side = 'Top' | 'Right' | 'Bottom' | 'Left';

const sides: Side[] = ['Top', 'Right', 'Bottom', 'Left'];

/**
 * Splits a value on whitespace that isn't inside parentheses
 */
function splitValue(value: string) {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < value.length; i++) {
    const c = value[i];
    if (c === '(') depth++;
    else if (c === ')') depth = Math.max(0, depth - 1);
    else if (depth === 0 && /\s/.test(c)) {
      if (i > start) parts.push(value.slice(start, i));
      start = i + 1;
    }
  }

  if (start < value.length) parts.push(value.slice(start));

  return parts;
}

// 1 to 4 values: top, right, bottom, left with the usual repetition
function expandBox(parts: string[]): [string, string, string, string] | undefined {
  switch (parts.length) {
    case 1: return [parts[0], parts[0], parts[0], parts[0]];
    case 2: return [parts[0], parts[1], parts[0], parts[1]];
    case 3: return [parts[0], parts[1], parts[2], parts[1]];
    case 4: return [parts[0], parts[1], parts[2], parts[3]];
  }
}

function boxShorthand(prefix: string, suffix: string): (style: DeclaredStyle, value: string) => boolean {
  return (style, value) => {
    const values = expandBox(splitValue(value));
    if (!values) return false;

    const next: DeclaredStyle = {};

    for (let i = 0; i < 4; i++) {
      const key = camelCase(`${prefix}-${sides[i].toLowerCase()}${suffix}`);
      if (!isLonghand(key) || !setLonghand(next, key, values[i])) return false;
    }

    Object.assign(style, next);
    return true;
  };
}

function borderSideShorthand(which: Side[]): (style: DeclaredStyle, value: string) => boolean {
  return (style, value) => {
    let width: Length | undefined;
    let borderStyle: BorderStyle | undefined;
    let color: Color | undefined;

    for (const part of splitValue(value)) {
      if (width === undefined && (width = parseBorderWidth(part)) !== undefined) continue;
      if (borderStyle === undefined && (borderStyle = parseBorderStyle(part)) !== undefined) continue;
      if (color === undefined && (color = parseColor(part)) !== undefined) continue;
      return false;
    }

    // omitted parts are reset
    for (const side of which) {
      set(style, `border${side}Width` as const, width ?? initial);
      set(style, `border${side}Style` as const, borderStyle ?? initial);
      set(style, `border${side}Color` as const, color ?? initial);
    }

    return true;
  };
}

const shorthands: Record<string, (style: DeclaredStyle, value: string) => boolean> = {
  margin: boxShorthand('margin', ''),
  padding: boxShorthand('padding', ''),
  'border-width': boxShorthand('border', '-width'),
  'border-style': boxShorthand('border', '-style'),
  'border-color': boxShorthand('border', '-color'),
  border: borderSideShorthand(sides),
  'border-top': borderSideShorthand(['Top']),
  'border-right': borderSideShorthand(['Right']),
  'border-bottom': borderSideShorthand(['Bottom']),
  'border-left': borderSideShorthand(['Left']),
  background(style, value) {
    const color = value.toLowerCase() === 'none' ? namedColors.transparent : parseColor(value);
    if (!color) return false;
    style.backgroundColor = color;
    return true;
  }
};

const shorthandLonghands: Record<string, Longhand[]> = {
  margin: ['marginTop', 'marginRight', 'marginBottom', 'marginLeft'],
  padding: ['paddingTop', 'paddingRight', 'paddingBottom', 'paddingLeft'],
  'border-width': sides.map(side => `border${side}Width` as const),
  'border-style': sides.map(side => `border${side}Style` as const),
  'border-color': sides.map(side => `border${side}Color` as const),
  border: sides.flatMap(side => [`border${side}Width`, `border${side}Style`, `border${side}Color`] as const),
  'border-top': ['borderTopWidth', 'borderTopStyle', 'borderTopColor'],
  'border-right': ['borderRightWidth', 'borderRightStyle', 'borderRightColor'],
  'border-bottom': ['borderBottomWidth', 'borderBottomStyle', 'borderBottomColor'],
  'border-left': ['borderLeftWidth', 'borderLeftStyle', 'borderLeftColor'],
  background: ['backgroundColor']
};

/**
 * Applies one declaration to `style`. Returns false, leaving `style` as it
 * was, if the property is unknown or the value doesn't parse.
 */
function applyDeclaration(style: DeclaredStyle, name: string, value: string) {
  const lower = value.toLowerCase();
  const global = lower === 'inherit' ? inherited : lower === 'initial' ? initial : undefined;

  if (Object.prototype.hasOwnProperty.call(shorthands, name)) {
    if (global) {
      for (const key of shorthandLonghands[name]) set(style, key, global);
      return true;
    }

    return shorthands[name](style, value);
  }

  if (!/^[a-z-]+$/.test(name)) return false;

  const key = camelCase(name);

  if (!isLonghand(key)) return false;

  if (global) {
    set(style, key, global);
    return true;
  }

  return setLonghand(style, key, value);
}

// Where a top-level `separator` could end the current item. Quotes and
// parentheses are skipped over.
function splitTopLevel(text: string, separator: string) {
  const parts: string[] = [];
  let depth = 0;
  let quote = '';
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];

    if (quote) {
      if (c === '\\') i++;
      else if (c === quote) quote = '';
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '(') {
      depth++;
    } else if (c === ')') {
      depth = Math.max(0, depth - 1);
    } else if (c === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }

  parts.push(text.slice(start));

  return parts;
}

function stripComments(text: string) {
  return text.replace(/\/\*[\s\S]*?(?:\*\/|$)/g, ' ');
}

/**
 * Parses the contents of a declaration block or a [style] attribute. Bad
 * declarations are reported and skipped one at a time.
 */
export function parseDeclarations(text: string): DeclaredStyle {
  const style: DeclaredStyle = {};

  for (const declaration of splitTopLevel(stripComments(text), ';')) {
    if (!declaration.trim()) continue;

    const colon = declaration.indexOf(':');

    if (colon < 0) {
      environment.warn(`Ignoring CSS declaration without a value: "${declaration.trim()}"`);
      continue;
    }

    const name = declaration.slice(0, colon).trim().toLowerCase();
    const value = declaration.slice(colon + 1).replace(/!\s*important\s*$/i, '').trim();

    if (!name || !value || !applyDeclaration(style, name, value)) {
      environment.warn(`Ignoring CSS declaration "${name}: ${value}"`);
    }
  }

  return style;
}

// Index of the } that closes the { at `open`, or the end of the text
function findBlockEnd(css: string, open: number) {
  let depth = 0;
  let quote = '';

  for (let i = open; i < css.length; i++) {
    const c = css[i];

    if (quote) {
      if (c === '\\') i++;
      else if (c === quote) quote = '';
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '{') {
      depth++;
    } else if (c === '}') {
      if (--depth === 0) return i;
    }
  }

  return css.length;
}

/**
 * Parses a stylesheet into rules, one per selector in each selector list.
 * At-rules are skipped, as are rules whose selector can't be parsed.
 */
export function parseStylesheet(text: string): Rule[] {
  const css = stripComments(text);
  const rules: Rule[] = [];
  let i = 0;

  while (i < css.length) {
    while (i < css.length && /\s/.test(css[i])) i++;
    if (i >= css.length) break;

    if (css[i] === '@') {
      const semicolon = css.indexOf(';', i);
      const brace = css.indexOf('{', i);

      if (brace >= 0 && (semicolon < 0 || brace < semicolon)) {
        i = findBlockEnd(css, brace) + 1;
      } else {
        i = semicolon < 0 ? css.length : semicolon + 1;
      }

      continue;
    }

    if (css[i] === '}' || css[i] === ';') {
      environment.warn(`Ignoring stray "${css[i]}" in stylesheet`);
      i++;
      continue;
    }

    const brace = css.indexOf('{', i);

    if (brace < 0) {
      environment.warn(`Ignoring trailing text in stylesheet: "${css.slice(i).trim()}"`);
      break;
    }

    const prelude = css.slice(i, brace).trim();
    const end = findBlockEnd(css, brace);
    const body = css.slice(brace + 1, end);
    i = end + 1;

    let selectors;

    try {
      selectors = parseSelector(prelude);
    } catch (e) {
      if (e instanceof SelectorSyntaxError) {
        environment.warn(`Ignoring rule: ${e.message}`);
        continue;
      }
      throw e;
    }

    const declarations = parseDeclarations(body);

    for (const selector of selectors) {
      rules.push({
        selector,
        specificity: specificity(selector),
        order: ruleOrder++,
        declarations
      });
    }
  }

  return rules;
}
