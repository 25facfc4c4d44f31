import {describe, it, expect} from 'vitest';
import {parse} from '../src/parse-tree.js';
import {resolveStyles} from '../src/style.js';
import {generateBlockContainer, layout} from '../src/layout-flow.js';
import {FixedAdvanceMetrics} from '../src/text-font.js';
import paint, {DisplayListBackend, getDocumentSize, getScrollLimit} from '../src/paint.js';
import SvgPaintBackend from '../src/paint-svg.js';
import {renderToSvg} from '../src/api.js';

import type {FontSpec} from '../src/text-font.js';

const metrics = new FixedAdvanceMetrics({ascent: 0.75, descent: 0.25, lineHeight: 1.25});
const black = {r: 0, g: 0, b: 0, a: 1};
const red = {r: 255, g: 0, b: 0, a: 1};
const serif: FontSpec = {family: ['serif'], size: 16, weight: 400, style: 'normal'};

function render(html: string, width: number) {
  const document = parse(html);
  resolveStyles(document, null);
  const root = generateBlockContainer(document);
  layout(root, {width, metrics});
  return root;
}

function commands(html: string, width: number) {
  const backend = new DisplayListBackend();
  paint(render(html, width), backend);
  return backend.commands;
}

describe('Painting', function () {
  it('fills backgrounds with the border box', function () {
    expect(commands('<div style="height: 10px; background-color: red"></div>', 100)).toEqual([
      {type: 'rect', x: 0, y: 0, width: 100, height: 10, color: red}
    ]);
  });

  it('draws text at its baseline', function () {
    expect(commands('<p style="margin: 0">a</p>', 100)).toEqual([
      {type: 'text', x: 0, y: 14, text: 'a', color: black, font: serif}
    ]);
  });

  it('strokes borders along their center line', function () {
    expect(commands('<div style="border-top: 2px solid blue; width: 20px"></div>', 100)).toEqual([
      {type: 'edge', x: 0, y: 1, length: 20, side: 'top', lineWidth: 2, color: {r: 0, g: 0, b: 255, a: 1}}
    ]);
  });

  it('paints inline-blocks where they sit on the line', function () {
    const html = '<div>a<span style="display: inline-block; width: 10px; height: 10px; background-color: red"></span></div>';
    expect(commands(html, 100)).toEqual([
      {type: 'text', x: 0, y: 14, text: 'a', color: black, font: serif},
      {type: 'rect', x: 8, y: 4, width: 10, height: 10, color: red}
    ]);
  });

  it('skips transparent text', function () {
    expect(commands('<p style="color: transparent">a</p>', 100)).toEqual([]);
  });
});

describe('Document size', function () {
  it('covers every box and fragment', function () {
    const root = render('<p>hello world</p>', 80);
    expect(getDocumentSize(root)).toEqual({width: 80, height: 72});
    expect(getScrollLimit(root, {width: 100, height: 50})).toEqual({x: 0, y: 22});
  });

  it('grows with text that overflows its line', function () {
    const root = render('<p style="margin: 0">aaaaaaaaaa</p>', 40);
    expect(getScrollLimit(root, {width: 40, height: 100})).toEqual({x: 40, y: 0});
  });
});

describe('SVG', function () {
  it('escapes text and sets the font', function () {
    const backend = new SvgPaintBackend();
    backend.fillColor = black;
    backend.font = serif;
    backend.text(0, 14, 'a<b&c');
    expect(backend.body()).toBe(
      '<text x="0" y="14" style="font: normal 400 16px serif; white-space: pre" fill="rgba(0, 0, 0, 1)">a&lt;b&amp;c</text>'
    );
  });

  it('quotes font families with spaces', function () {
    const backend = new SvgPaintBackend();
    backend.fillColor = black;
    backend.font = {...serif, family: ['Noto Sans', 'serif']};
    backend.text(0, 0, 'x');
    expect(backend.body()).toContain(`style="font: normal 400 16px 'Noto Sans', serif; white-space: pre"`);
  });

  it('renders markup to a standalone document', async function () {
    const svg = await renderToSvg('<div style="width: 20px; height: 5px; background-color: blue"></div>', {
      width: 20,
      metrics
    });

    expect(svg).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="20" height="5" viewBox="0 0 20 5">' +
      '<rect x="0" y="0" width="20" height="5" fill="rgba(0, 0, 255, 1)" />' +
      '</svg>'
    );
  });
});
