import {describe, it, expect, vi, beforeEach, afterEach} from 'vitest';
import {Channel, Navigator, loadStylesheets} from '../src/navigation.js';
import {environment, FetchError} from '../src/environment.js';
import {parse} from '../src/parse-tree.js';
import {resolveStyles} from '../src/style.js';
import {RuleIndex} from '../src/style-query.js';
import {FixedAdvanceMetrics} from '../src/text-font.js';
import {HTMLElement, textContent} from '../src/dom.js';
import {eachBox} from '../src/layout-flow.js';
import {Deferred} from '../src/util.js';

import type {FetchedResource} from '../src/environment.js';
import type {NavigationStatus, PublishedPage} from '../src/navigation.js';

const metrics = new FixedAdvanceMetrics({ascent: 0.75, descent: 0.25, lineHeight: 1.25});
const red = {r: 255, g: 0, b: 0, a: 1};
const blue = {r: 0, g: 0, b: 255, a: 1};

/**
 * Answers requests only when the test says so
 */
class FakeServer {
  requested: string[] = [];
  private responses = new Map<string, Deferred<FetchedResource>>();

  private deferred(href: string) {
    let deferred = this.responses.get(href);
    if (!deferred) {
      deferred = new Deferred<FetchedResource>();
      this.responses.set(href, deferred);
    }
    return deferred;
  }

  fetch(url: URL) {
    this.requested.push(url.href);
    return this.deferred(url.href).promise;
  }

  respond(href: string, body: string, status = 200, contentType = 'text/html') {
    this.deferred(href).resolve({
      url: new URL(href),
      status,
      contentType,
      body: new TextEncoder().encode(body)
    });
  }

  fail(href: string) {
    this.deferred(href).reject(new FetchError(new URL(href), 'connection refused'));
  }
}

let server: FakeServer;

beforeEach(function () {
  server = new FakeServer();
  vi.spyOn(environment, 'fetchResource').mockImplementation(url => server.fetch(url));
  vi.spyOn(environment, 'warn').mockImplementation(() => {});
});

afterEach(function () {
  environment.haltAfterFirstLayout = false;
  vi.restoreAllMocks();
});

describe('Channel', function () {
  it('delivers messages in order', async function () {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBe(2);
  });

  it('waits for a message', async function () {
    const channel = new Channel<string>();
    const received = channel.receive();
    channel.send('x');
    expect(await received).toBe('x');
  });

  it('gives null once closed and empty', async function () {
    const channel = new Channel<number>();
    channel.send(1);
    channel.close();
    expect(await channel.receive()).toBe(1);
    expect(await channel.receive()).toBeNull();
    expect(() => channel.send(2)).toThrow('Channel is closed');
  });

  it('drains without waiting', function () {
    const channel = new Channel<number>();
    channel.send(1);
    channel.send(2);
    expect(channel.peek()).toEqual([1, 2]);
    expect(channel.drain()).toEqual([1, 2]);
    expect(channel.peek()).toEqual([]);
  });
});

describe('Navigator', function () {
  const one = 'http://test.invalid/one';
  const two = 'http://test.invalid/two';

  it('publishes a page and reports each stage', async function () {
    const nav = new Navigator({width: 100, metrics});
    const statuses: NavigationStatus[] = [];
    nav.onStatus((status, generation) => {
      if (generation === 1) statuses.push(status);
    });

    server.respond(one, '<p>hello</p>');
    expect(nav.navigate(one)).toBe(1);

    const page = await nav.layoutComplete.promise;
    expect(page.generation).toBe(1);
    expect(page.url.href).toBe(one);
    expect(page.width).toBe(100);
    expect(textContent(page.document)).toBe('hello');
    expect(nav.front).toBe(page);
    expect(statuses).toEqual(['load', 'parse', 'style', 'layout', 'idle']);

    await nav.close();
  });

  it('throws away a page that finished after a newer navigation', async function () {
    const nav = new Navigator({width: 100, metrics});
    const published: number[] = [];
    nav.onPublish(page => published.push(page.generation));

    nav.navigate(one);
    await vi.waitFor(() => expect(server.requested).toEqual([one]));
    nav.navigate(two);
    server.respond(one, 'first');
    server.respond(two, 'second');

    const page = await nav.layoutComplete.promise;
    expect(page.generation).toBe(2);
    expect(textContent(page.document)).toBe('second');

    await nav.close();
    expect(published).toEqual([2]);
    expect(server.requested).toEqual([one, two]);
  });

  it('skips navigations that were replaced before they started', async function () {
    const nav = new Navigator({width: 100, metrics});
    server.respond(two, 'second');

    nav.navigate(one);
    nav.navigate(two);

    const page = await nav.layoutComplete.promise;
    expect(page.generation).toBe(2);
    expect(server.requested).toEqual([two]);

    await nav.close();
  });

  it('shows the status of a failed request as the page', async function () {
    const nav = new Navigator({width: 100, metrics});
    server.respond(one, 'not here', 404);
    nav.navigate(one);

    const page = await nav.layoutComplete.promise;
    expect(textContent(page.document)).toBe('[http 404]');
    expect(page.document.query('h1')?.style.fontSize).toBe(32);

    await nav.close();
  });

  it('reports a request that got no response', async function () {
    const nav = new Navigator({width: 100, metrics});
    const errors: [Error, number][] = [];
    nav.onError((error, generation) => errors.push([error, generation]));

    nav.navigate(one);
    await vi.waitFor(() => expect(server.requested).toEqual([one]));
    server.fail(one);
    await vi.waitFor(() => expect(errors).toHaveLength(1));

    expect(errors[0][0]).toBeInstanceOf(FetchError);
    expect(errors[0][1]).toBe(1);
    expect(nav.front).toBeNull();
    expect(nav.status).toBe('idle');

    await nav.close();
  });

  it('lays the page out again on resize', async function () {
    const nav = new Navigator({width: 100, metrics});
    const pages: PublishedPage[] = [];
    nav.onPublish(page => pages.push(page));

    server.respond(one, '<p>hello world</p>');
    nav.navigate(one);
    await nav.layoutComplete.promise;

    expect(nav.resize(50)).toBe(2);
    await vi.waitFor(() => expect(pages).toHaveLength(2));

    expect(pages[1].generation).toBe(2);
    expect(pages[1].width).toBe(50);
    expect(pages[1].document).toBe(pages[0].document);
    expect(pages[1].root.getBorderArea().width).toBe(50);
    expect(pages[0].root.getBorderArea().width).toBe(100);
    expect(server.requested).toEqual([one]);

    await nav.close();
  });

  it('keeps the boxes of an earlier page after a resize', async function () {
    const nav = new Navigator({width: 100, metrics});
    const pages: PublishedPage[] = [];
    nav.onPublish(page => pages.push(page));

    server.respond(one, '<p>hello world</p>');
    nav.navigate(one);
    await nav.layoutComplete.promise;
    nav.resize(50);
    await vi.waitFor(() => expect(pages).toHaveLength(2));

    const p = pages[0].document.query('p');
    expect(p).toBeInstanceOf(HTMLElement);
    if (!p) return;

    const firstTree = new Set(eachBox(pages[0].root));
    const firstBoxes = pages[0].boxes.get(p) ?? [];
    const secondBoxes = pages[1].boxes.get(p) ?? [];
    expect(firstBoxes.length).toBeGreaterThan(0);
    expect(secondBoxes.length).toBeGreaterThan(0);
    for (const box of firstBoxes) expect(firstTree.has(box)).toBe(true);
    for (const box of secondBoxes) expect(firstTree.has(box)).toBe(false);
    expect(firstBoxes[0].getBorderArea().width).toBe(100);
    expect(secondBoxes[0].getBorderArea().width).toBe(50);

    await nav.close();
  });

  it('lays out at the new width when resized during loading', async function () {
    const nav = new Navigator({width: 100, metrics});
    const published: PublishedPage[] = [];
    nav.onPublish(page => published.push(page));

    expect(nav.navigate(one)).toBe(1);
    await vi.waitFor(() => expect(server.requested).toEqual([one]));
    expect(nav.resize(50)).toBe(2);
    server.respond(one, '<p>hello world</p>');

    const page = await nav.layoutComplete.promise;
    expect(page.generation).toBe(2);
    expect(page.width).toBe(50);
    expect(page.root.getBorderArea().width).toBe(50);

    await nav.close();
    expect(published).toHaveLength(1);
    expect(server.requested).toEqual([one]);
  });

  it('rejects a malformed URL without dropping the navigation in flight', async function () {
    const nav = new Navigator({width: 100, metrics});

    nav.navigate(one);
    await vi.waitFor(() => expect(server.requested).toEqual([one]));
    expect(() => nav.navigate('not a url')).toThrow(TypeError);
    expect(nav.generation).toBe(1);
    server.respond(one, 'first');

    const page = await nav.layoutComplete.promise;
    expect(page.generation).toBe(1);
    expect(textContent(page.document)).toBe('first');
    expect(nav.front).toBe(page);

    await nav.close();
    expect(nav.status).toBe('idle');
  });

  it('does nothing on resize before the first navigation', async function () {
    const nav = new Navigator({width: 100, metrics});
    expect(nav.resize(50)).toBe(1);
    await nav.close();
    expect(nav.front).toBeNull();
    expect(nav.width).toBe(50);
  });

  it('stops after the first layout when asked to', async function () {
    environment.haltAfterFirstLayout = true;
    const nav = new Navigator({width: 100, metrics});
    server.respond(one, 'x');
    nav.navigate(one);

    await nav.layoutComplete.promise;
    expect(nav.navigate(two)).toBeNull();
    expect(nav.resize(10)).toBeNull();

    await nav.close();
    expect(server.requested).toEqual([one]);
  });

  it('applies linked stylesheets', async function () {
    const nav = new Navigator({width: 100, metrics});
    server.respond(one, '<link rel="stylesheet" href="style.css"><p>x</p>');
    server.respond('http://test.invalid/style.css', 'p { color: red }', 200, 'text/css');
    nav.navigate(one);

    const page = await nav.layoutComplete.promise;
    expect(page.document.query('p')?.style.color).toEqual(red);

    await nav.close();
  });
});

describe('loadStylesheets', function () {
  const url = new URL('http://test.invalid/page');

  it('keeps document order', async function () {
    server.respond('http://test.invalid/a.css', 'p { color: red }');

    const document = parse('<link rel="stylesheet" href="a.css"><style>p { color: blue }</style><p>x</p>', url);
    resolveStyles(document, new RuleIndex(await loadStylesheets(document)));
    expect(document.query('p')?.style.color).toEqual(blue);

    const reversed = parse('<style>p { color: blue }</style><link rel="stylesheet" href="a.css"><p>x</p>', url);
    resolveStyles(reversed, new RuleIndex(await loadStylesheets(reversed)));
    expect(reversed.query('p')?.style.color).toEqual(red);
  });

  it('skips sheets that fail to load', async function () {
    server.respond('http://test.invalid/missing.css', '', 404);
    server.fail('http://test.invalid/down.css');

    const document = parse(
      '<link rel="stylesheet" href="missing.css"><link rel="stylesheet" href="down.css"><style>p {}</style>',
      url
    );

    expect(await loadStylesheets(document)).toHaveLength(1);
    expect(environment.warn).toHaveBeenCalledWith(
      'Stylesheet http://test.invalid/missing.css answered http 404, skipping'
    );
    expect(environment.warn).toHaveBeenCalledWith(
      'Stylesheet request failed: http://test.invalid/down.css: connection refused'
    );
  });

  it('skips links it cannot resolve', async function () {
    const document = parse('<link rel="stylesheet" href="a.css">');
    expect(await loadStylesheets(document)).toEqual([]);
    expect(environment.warn).toHaveBeenCalledWith('Stylesheet URL "a.css" is invalid, skipping');
    expect(server.requested).toEqual([]);
  });

  it('ignores links that are not stylesheets', async function () {
    const document = parse('<link rel="icon" href="a.png">', url);
    expect(await loadStylesheets(document)).toEqual([]);
    expect(server.requested).toEqual([]);
  });
});
