import './environment-node.js';
import {parse} from './parse-tree.js';
import {RuleIndex} from './style-query.js';
import {resolveStyles} from './style.js';
import {generateBlockContainer, layout} from './layout-flow.js';
import {loadStylesheets} from './navigation.js';
import SvgPaintBackend from './paint-svg.js';
import paint, {getDocumentSize} from './paint.js';

import type {Document} from './dom.js';
import type {BlockContainer, LayoutOptions} from './layout-flow.js';

export {environment, FetchError} from './environment.js';
export type {Environment, FetchedResource} from './environment.js';

export {tokenize, Tokenizer, decodeDocument} from './parse-html.js';
export type {Token, Attributes} from './parse-html.js';
export {parse};
export {Document, HTMLElement, TextNode, CommentNode, textContent} from './dom.js';

export {parseStylesheet, parseDeclarations} from './parse-css.js';
export type {Rule} from './parse-css.js';
export {parse as parseSelector, specificity, SelectorSyntaxError} from './style-selector.js';
export {matches, query, queryAll, RuleIndex} from './style-query.js';
export {resolveStyles, Style} from './style.js';
export type {DeclaredStyle, Color} from './style.js';

export {generateBlockContainer, layout, hitTest, serializeBoxTree, eachBox, boxesByNode} from './layout-flow.js';
export type {
  BlockContainer,
  IfcInline,
  Inline,
  LayoutOptions,
  HitTestResult,
  SerializedBox
} from './layout-flow.js';
export {BoxArea} from './layout-box.js';
export {FixedAdvanceMetrics} from './text-font.js';
export type {FontMetrics, FontSpec, TextMeasurement} from './text-font.js';

export {paint, getDocumentSize, SvgPaintBackend};
export {DisplayListBackend, getScrollLimit} from './paint.js';
export type {PaintBackend, PaintCommand} from './paint.js';

export {Navigator, PipelineWorker, Channel, loadStylesheets} from './navigation.js';
export type {PublishedPage, NavigationStatus, NavigatorOptions} from './navigation.js';

export {InvariantError, Logger} from './util.js';

/**
 * Gathers the document's stylesheets, then computes the style of every node
 */
export async function load(document: Document): Promise<void> {
  const rules = await loadStylesheets(document);
  resolveStyles(document, new RuleIndex(rules));
}

export function paintToSvg(root: BlockContainer): string {
  const backend = new SvgPaintBackend();
  const {width} = root.containingBlock;
  const {height} = getDocumentSize(root);
  paint(root, backend);
  return backend.toSvg(width, height);
}

/**
 * Markup to SVG in one go. Relative stylesheet links resolve against `url`.
 */
export async function renderToSvg(
  html: string,
  options: LayoutOptions & {url?: URL}
): Promise<string> {
  const document = parse(html, options.url ?? null);
  await load(document);
  const root = generateBlockContainer(document);
  layout(root, options);
  return paintToSvg(root);
}
