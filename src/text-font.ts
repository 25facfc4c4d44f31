import GraphemeBreaker from 'grapheme-breaker';

import type {FontStyle} from './style.js';

export interface FontSpec {
  family: string[];
  /** px */
  size: number;
  weight: number;
  style: FontStyle;
}

export interface TextMeasurement {
  /**
   * One entry per UTF-16 code unit of the measured text. A grapheme's advance
   * is on its first code unit; the rest of its code units are zero.
   */
  advances: number[];
  ascent: number;
  descent: number;
  /**
   * What `line-height: normal` means for this font
   */
  lineHeight: number;
}

/**
 * Everything layout knows about fonts. Implementations must return the same
 * measurement every time they are given the same font and text.
 */
export interface FontMetrics {
  measure(font: FontSpec, text: string): TextMeasurement;
}

export interface FixedAdvanceOptions {
  /** Advance of a narrow grapheme, in em */
  advance?: number;
  /** Advance of a wide (East Asian) grapheme, in em */
  wideAdvance?: number;
  /** in em */
  ascent?: number;
  /** in em */
  descent?: number;
  /** line-height: normal, in em */
  lineHeight?: number;
}

// East Asian Wide and Fullwidth blocks: Hangul Jamo, CJK radicals through CJK
// symbols, kana, CJK ideographs and extensions, Yi, Hangul syllables, CJK
// compatibility, fullwidth forms, and the supplementary ideographic planes
const reWide = /^(?:[ᄀ-ᅟ⺀-〾ぁ-㏿㐀-䶿一-鿿ꀀ-꓏가-힣豈-﫿︰-﹏＀-｠￠-￦]|[\u{20000}-\u{3fffd}])/u;

export function isWide(grapheme: string) {
  return reWide.test(grapheme);
}

/**
 * Deterministic metrics with no font files: every grapheme is either narrow or
 * wide, and vertical metrics are fixed fractions of the font size. Weight,
 * style and family don't change anything.
 */
export class FixedAdvanceMetrics implements FontMetrics {
  private advance: number;
  private wideAdvance: number;
  private ascent: number;
  private descent: number;
  private lineHeight: number;

  constructor(options: FixedAdvanceOptions = {}) {
    this.advance = options.advance ?? 0.5;
    this.wideAdvance = options.wideAdvance ?? 1;
    this.ascent = options.ascent ?? 0.8;
    this.descent = options.descent ?? 0.2;
    this.lineHeight = options.lineHeight ?? 1.2;
  }

  measure(font: FontSpec, text: string): TextMeasurement {
    const advances: number[] = new Array(text.length).fill(0);
    let offset = 0;

    for (const grapheme of GraphemeBreaker.break(text)) {
      const em = isWide(grapheme) ? this.wideAdvance : this.advance;
      advances[offset] = em * font.size;
      offset += grapheme.length;
    }

    return {
      advances,
      ascent: this.ascent * font.size,
      descent: this.descent * font.size,
      lineHeight: this.lineHeight * font.size
    };
  }
}
