import {environment, FetchError} from './environment.js';
import {decodeDocument} from './parse-html.js';
import {parse} from './parse-tree.js';
import {parseStylesheet} from './parse-css.js';
import {RuleIndex} from './style-query.js';
import {resolveStyles} from './style.js';
import {generateBlockContainer, layout, boxesByNode} from './layout-flow.js';
import {FixedAdvanceMetrics} from './text-font.js';
import {textContent} from './dom.js';
import {Deferred} from './util.js';

import type {Document} from './dom.js';
import type {Rule} from './parse-css.js';
import type {BlockContainer} from './layout-flow.js';
import type {Box, BoxNode} from './layout-box.js';
import type {FontMetrics} from './text-font.js';

export type NavigationStatus = 'idle' | 'load' | 'parse' | 'style' | 'layout';

/**
 * Everything the presentation layer needs for one laid-out page. Never
 * mutated once it is published.
 */
export interface PublishedPage {
  generation: number;
  url: URL;
  document: Document;
  root: BlockContainer;
  width: number;
  /**
   * Boxes of `root` by the node that generated them. Each page has its own,
   * since a relayout builds a second box tree over the same document.
   */
  boxes: WeakMap<BoxNode, Box[]>;
}

type WorkerRequest = {type: 'navigate', generation: number, url: URL, width: number}
  | {type: 'relayout', generation: number, width: number};

type WorkerResponse = {type: 'status', generation: number, status: NavigationStatus}
  | {type: 'complete', page: PublishedPage}
  | {type: 'error', generation: number, error: Error};

/**
 * Unbounded queue between two async loops. Receiving waits for a message, or
 * resolves to null once the channel is closed and empty.
 */
export class Channel<T> {
  private queue: T[];
  private waiting: Deferred<void> | null;
  public closed: boolean;

  constructor() {
    this.queue = [];
    this.waiting = null;
    this.closed = false;
  }

  send(message: T) {
    if (this.closed) throw new Error('Channel is closed');
    this.queue.push(message);
    this.wake();
  }

  close() {
    this.closed = true;
    this.wake();
  }

  private wake() {
    if (this.waiting) {
      this.waiting.resolve();
      this.waiting = null;
    }
  }

  async receive(): Promise<T | null> {
    while (!this.queue.length) {
      if (this.closed) return null;
      this.waiting ??= new Deferred<void>();
      await this.waiting.promise;
    }

    return this.queue.shift() ?? null;
  }

  /**
   * Takes every message that is waiting without blocking
   */
  drain(): T[] {
    return this.queue.splice(0);
  }

  /**
   * Messages waiting to be received, oldest first
   */
  peek(): readonly T[] {
    return this.queue;
  }
}

function nextTick() {
  return new Promise<void>(resolve => setImmediate(resolve));
}

function isStylesheetLink(el: {tagName: string, attrs: Record<string, string>}) {
  if (el.tagName !== 'link' || el.attrs.href === undefined) return false;
  const rel = el.attrs.rel ?? '';
  return rel.split(/[ \t\n\f\r]+/).some(token => token.toLowerCase() === 'stylesheet');
}

/**
 * Runs fetch, parse, style and layout for the newest request it has. Stale
 * work is never interrupted; the navigator decides what to keep.
 */
export class PipelineWorker {
  private requests: Channel<WorkerRequest>;
  private responses: Channel<WorkerResponse>;
  private metrics: FontMetrics;
  /**
   * The last document this worker styled, which relayouts reuse
   */
  private current: Document | null;

  constructor(
    requests: Channel<WorkerRequest>,
    responses: Channel<WorkerResponse>,
    metrics: FontMetrics
  ) {
    this.requests = requests;
    this.responses = responses;
    this.metrics = metrics;
    this.current = null;
  }

  async run() {
    try {
      let request;
      while ((request = await this.requests.receive())) {
        await nextTick();
        await this.handle(this.coalesce(request));
      }
    } finally {
      this.responses.close();
    }
  }

  /**
   * Only the newest request matters. A navigation anywhere in the queue still
   * has to happen, at the newest width and under the newest generation.
   */
  private coalesce(first: WorkerRequest): WorkerRequest {
    const requests = [first, ...this.requests.drain()];
    const newest = requests[requests.length - 1];

    for (let i = requests.length - 1; i >= 0; i--) {
      const request = requests[i];
      if (request.type === 'navigate') {
        return {...request, generation: newest.generation, width: newest.width};
      }
    }

    return newest;
  }

  private status(generation: number, status: NavigationStatus) {
    this.responses.send({type: 'status', generation, status});
  }

  private async handle(request: WorkerRequest) {
    const {generation} = request;

    try {
      let document;

      if (request.type === 'navigate') {
        document = await this.load(request.url, generation);
      } else if (this.current) {
        document = this.current;
      } else {
        this.status(generation, 'idle');
        return;
      }

      this.current = document;
      this.status(generation, 'layout');

      // Resizes that arrived during loading replace the width. If another
      // navigation is waiting this one is stale already, but it still finishes.
      let {width} = request;
      let publishAs = generation;
      const queued = this.requests.peek();

      if (queued.length && queued.every(r => r.type === 'relayout')) {
        const newest = queued[queued.length - 1];
        width = newest.width;
        publishAs = newest.generation;
        this.requests.drain();
      }

      const root = generateBlockContainer(document);
      layout(root, {width, metrics: this.metrics});

      const url = document.url ?? new URL('about:blank');
      const boxes = boxesByNode(root);
      this.responses.send({type: 'complete', page: {generation: publishAs, url, document, root, width, boxes}});
    } catch (e) {
      // FetchError and InvariantError mostly. Either way nothing is published.
      const error = e instanceof Error ? e : new Error(String(e));
      this.responses.send({type: 'error', generation, error});
    }
  }

  private async load(url: URL, generation: number) {
    this.status(generation, 'load');
    const resource = await environment.fetchResource(url);
    let html;

    if (resource.status >= 200 && resource.status < 300) {
      html = decodeDocument(resource.body, resource.contentType);
    } else {
      html = `<h1>[http ${resource.status}]</h1>`;
    }

    this.status(generation, 'parse');
    const document = parse(html, resource.url);
    document.generation = generation;

    this.status(generation, 'style');
    const rules = await loadStylesheets(document);
    resolveStyles(document, new RuleIndex(rules));

    return document;
  }
}

async function fetchStylesheet(href: string, base: URL | null): Promise<string | null> {
  let url;

  try {
    url = new URL(href, base ?? undefined);
  } catch {
    environment.warn(`Stylesheet URL "${href}" is invalid, skipping`);
    return null;
  }

  try {
    const resource = await environment.fetchResource(url);
    if (resource.status >= 200 && resource.status < 300) {
      return decodeDocument(resource.body, resource.contentType);
    }
    environment.warn(`Stylesheet ${url.href} answered http ${resource.status}, skipping`);
  } catch (e) {
    if (!(e instanceof FetchError)) throw e;
    environment.warn(`Stylesheet request failed: ${e.message}`);
  }

  return null;
}

/**
 * Author rules of `<link rel=stylesheet>` and `<style>` elements, in document
 * order. External sheets load in parallel.
 */
export async function loadStylesheets(document: Document): Promise<Rule[]> {
  const sheets: (string | null | Promise<string | null>)[] = [];

  for (const el of document.elements()) {
    if (isStylesheetLink(el)) {
      sheets.push(fetchStylesheet(el.attrs.href, document.url));
    } else if (el.tagName === 'style') {
      sheets.push(textContent(el));
    }
  }

  const rules: Rule[] = [];
  for (const text of await Promise.all(sheets)) {
    if (text !== null) rules.push(...parseStylesheet(text));
  }

  return rules;
}

export interface NavigatorOptions {
  width: number;
  metrics?: FontMetrics;
}

type Listener<T extends unknown[]> = (...args: T) => void;

/**
 * Owns the published page. Navigation and resize requests go to a background
 * pipeline worker; a completed page is published only if no newer request
 * was made in the meantime.
 */
export class Navigator {
  /**
   * The page being presented, swapped whole on publication
   */
  public front: PublishedPage | null;
  public generation: number;
  public width: number;
  public status: NavigationStatus;
  public layoutComplete: Deferred<PublishedPage>;
  private halted: boolean;
  private requests: Channel<WorkerRequest>;
  private responses: Channel<WorkerResponse>;
  private running: Promise<void>;
  private publishListeners: Listener<[PublishedPage]>[];
  private statusListeners: Listener<[NavigationStatus, number]>[];
  private errorListeners: Listener<[Error, number]>[];

  constructor(options: NavigatorOptions) {
    this.front = null;
    this.generation = 0;
    this.width = options.width;
    this.status = 'idle';
    this.layoutComplete = new Deferred<PublishedPage>();
    this.halted = false;
    this.requests = new Channel<WorkerRequest>();
    this.responses = new Channel<WorkerResponse>();
    this.publishListeners = [];
    this.statusListeners = [];
    this.errorListeners = [];

    const metrics = options.metrics ?? new FixedAdvanceMetrics();
    const worker = new PipelineWorker(this.requests, this.responses, metrics);

    this.running = Promise.all([worker.run(), this.receive()]).then(() => {
      this.setStatus('idle', this.generation);
    }, (e: unknown) => {
      const error = e instanceof Error ? e : new Error(String(e));
      this.emitError(error, this.generation);
    });
  }

  onPublish(listener: Listener<[PublishedPage]>) {
    this.publishListeners.push(listener);
  }

  onStatus(listener: Listener<[NavigationStatus, number]>) {
    this.statusListeners.push(listener);
  }

  onError(listener: Listener<[Error, number]>) {
    this.errorListeners.push(listener);
  }

  /**
   * Starts loading `url`. Returns the generation of the request, or null if
   * the navigator no longer takes requests. Throws a TypeError for a string
   * that is not a URL.
   */
  navigate(url: URL | string): number | null {
    if (this.halted) return null;
    // throws before the generation moves, so the request in flight stays current
    const parsed = new URL(url);
    const generation = ++this.generation;
    this.requests.send({type: 'navigate', generation, url: parsed, width: this.width});
    return generation;
  }

  /**
   * Lays the current document out again at a new viewport width
   */
  resize(width: number): number | null {
    this.width = width;
    if (this.halted) return null;
    const generation = ++this.generation;
    this.requests.send({type: 'relayout', generation, width});
    return generation;
  }

  /**
   * Stops taking requests. Resolves once work already requested is done.
   */
  close() {
    this.halted = true;
    if (!this.requests.closed) this.requests.close();
    return this.running;
  }

  private setStatus(status: NavigationStatus, generation: number) {
    this.status = status;
    for (const listener of this.statusListeners) listener(status, generation);
  }

  private emitError(error: Error, generation: number) {
    if (!this.errorListeners.length) environment.warn(`Navigation ${generation} failed: ${error.message}`);
    for (const listener of this.errorListeners) listener(error, generation);
  }

  private publish(page: PublishedPage) {
    this.front = page;
    for (const listener of this.publishListeners) listener(page);

    if (this.layoutComplete.status === 'unresolved') {
      this.layoutComplete.resolve(page);
      if (environment.haltAfterFirstLayout) {
        this.halted = true;
        this.requests.close();
      }
    }
  }

  private async receive() {
    let response;
    while ((response = await this.responses.receive())) {
      if (response.type === 'status') {
        if (response.generation === this.generation) this.setStatus(response.status, response.generation);
      } else if (response.type === 'complete') {
        if (response.page.generation === this.generation) {
          this.publish(response.page);
          this.setStatus('idle', response.page.generation);
        }
      } else {
        this.emitError(response.error, response.generation);
        if (response.generation === this.generation) this.setStatus('idle', response.generation);
      }
    }
  }
}
