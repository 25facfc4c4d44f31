import type {Color} from './style.js';
import type {PaintBackend, Side} from './paint.js';
import type {FontSpec} from './text-font.js';

function encode(s: string) {
  return s.replaceAll('&', '&amp;').replaceAll('<', '&lt;').replaceAll('"', '&quot;');
}

function camelToKebab(camel: string) {
  return camel.replace(/[A-Z]/g, s => '-' + s.toLowerCase());
}

function rgba({r, g, b, a}: Color) {
  return `rgba(${r}, ${g}, ${b}, ${a})`;
}

function fontString(font: FontSpec) {
  const family = font.family.map(f => /^[\w-]+$/.test(f) ? f : `'${f}'`).join(', ');
  return `${font.style} ${font.weight} ${font.size}px ${family}`;
}

export default class SvgPaintBackend implements PaintBackend {
  main: string;
  fillColor: Color;
  strokeColor: Color;
  lineWidth: number;
  font: FontSpec | undefined;

  constructor() {
    this.main = '';
    this.fillColor = {r: 0, g: 0, b: 0, a: 0};
    this.strokeColor = {r: 0, g: 0, b: 0, a: 0};
    this.lineWidth = 0;
    this.font = undefined;
  }

  style(style: Record<string, string>) {
    return Object.entries(style).map(([prop, value]) => {
      return `${camelToKebab(prop)}: ${value}`;
    }).join('; ');
  }

  edge(x: number, y: number, length: number, side: Side) {
    const lw = this.lineWidth;
    const lw2 = lw / 2;
    const width = side === 'top' || side === 'bottom' ? length : lw;
    const height = side === 'left' || side === 'right' ? length : lw;

    x = side === 'left' || side === 'right' ? x - lw2 : x;
    y = side === 'top' || side === 'bottom' ? y - lw2 : y;

    this.main += `<rect x="${x}" y="${y}" width="${width}" height="${height}" fill="${rgba(this.strokeColor)}" />`;
  }

  text(x: number, y: number, text: string) {
    const style = this.style({
      font: this.font ? fontString(this.font) : '',
      whiteSpace: 'pre'
    });

    this.main += `<text x="${x}" y="${y}" style="${encode(style)}" fill="${rgba(this.fillColor)}">${encode(text)}</text>`;
  }

  rect(x: number, y: number, w: number, h: number) {
    this.main += `<rect x="${x}" y="${y}" width="${w}" height="${h}" fill="${rgba(this.fillColor)}" />`;
  }

  body() {
    return this.main;
  }

  /**
   * A standalone SVG document of everything painted so far
   */
  toSvg(width: number, height: number) {
    return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`
      + this.body()
      + '</svg>';
  }
}
