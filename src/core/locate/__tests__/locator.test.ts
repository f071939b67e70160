import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { findContainer, findElement, findElements, readValue, releaseNodes } from '../locator.js';
import { StaticPage } from '../../render/static-page.js';
import { MemorySink } from '../../logging/diagnostics.js';
import type { DomNode, QueryRoot } from '../../types/index.js';

const FEED_HTML = `
<main>
  <article class="post"><a class="link" href="/p/1">One</a></article>
  <article class="post"><a class="link" href="/p/2">Two</a></article>
</main>`;

const failingRoot = (message: string): QueryRoot => ({
  queryOne: jest.fn(() => Promise.reject(new Error(message))),
  queryAll: jest.fn(() => Promise.reject(new Error(message))),
});

describe('findElement', () => {
  let sink: MemorySink;
  let page: StaticPage;

  beforeEach(() => {
    sink = new MemorySink();
    page = new StaticPage(FEED_HTML);
  });

  it('returns the first match without logging', async () => {
    const link = await findElement(page, 'a.link', { sink });

    expect(link).not.toBeNull();
    expect(await link?.text()).toBe('One');
    expect(sink.events).toEqual([]);
  });

  it('logs a warning on a miss by default', async () => {
    const result = await findElement(page, '.missing', { sink, description: 'author' });

    expect(result).toBeNull();
    expect(sink.events).toEqual([
      {
        severity: 'warn',
        message: "Author not found with selector: '.missing'",
        selector: '.missing',
        parentKey: undefined,
      },
    ]);
  });

  it('logs an error on a miss when required', async () => {
    const result = await findElement(page, '.missing', { sink, required: true, parentKey: 'post.author' });

    expect(result).toBeNull();
    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toMatchObject({ severity: 'error', parentKey: 'post.author' });
  });

  it('turns a query failure into null', async () => {
    const result = await findElement(failingRoot('detached'), 'a', { sink });

    expect(result).toBeNull();
    expect(sink.events).toEqual([
      { severity: 'error', message: 'Error finding element: detached', selector: 'a', parentKey: undefined },
    ]);
  });
});

describe('findElements', () => {
  it('returns every match in document order', async () => {
    const sink = new MemorySink();
    const links = await findElements(new StaticPage(FEED_HTML), 'a.link', { sink });

    expect(await Promise.all(links.map(l => l.attribute('href')))).toEqual(['/p/1', '/p/2']);
    expect(sink.events).toEqual([]);
  });

  it('returns an empty list when nothing matches', async () => {
    const sink = new MemorySink();

    expect(await findElements(new StaticPage(FEED_HTML), '.missing', { sink })).toEqual([]);
    expect(sink.events).toEqual([]);
  });

  it('turns a query failure into an empty list', async () => {
    const sink = new MemorySink();

    expect(await findElements(failingRoot('gone'), 'a', { sink, description: 'links' })).toEqual([]);
    expect(sink.bySeverity('error')).toEqual([
      { severity: 'error', message: 'Error finding links: gone', selector: 'a', parentKey: undefined },
    ]);
  });
});

describe('findContainer', () => {
  let sink: MemorySink;
  const page = new StaticPage(FEED_HTML);

  beforeEach(() => {
    sink = new MemorySink();
  });

  it('returns the container at the index', async () => {
    const container = await findContainer(page, 'article.post', 1, { sink });

    expect(await container?.text()).toBe('Two');
    expect(sink.events).toEqual([
      { severity: 'debug', message: 'Found 2 containers', selector: 'article.post', parentKey: undefined },
    ]);
  });

  it('reports when no containers exist', async () => {
    const container = await findContainer(page, 'section', 0, { sink });

    expect(container).toBeNull();
    expect(sink.events).toEqual([
      { severity: 'warn', message: "No containers found with selector: 'section'", selector: 'section', parentKey: undefined },
    ]);
  });

  it('reports an index out of range with the total', async () => {
    const container = await findContainer(page, 'article.post', 2, { sink, description: 'post' });

    expect(container).toBeNull();
    expect(sink.bySeverity('warn')).toEqual([
      { severity: 'warn', message: 'Post at position 2 not found (total: 2)', selector: 'article.post', parentKey: undefined },
    ]);
  });

  it('treats a negative index as out of range', async () => {
    expect(await findContainer(page, 'article.post', -1, { sink })).toBeNull();
    expect(sink.bySeverity('warn')).toHaveLength(1);
  });

  it('turns a query failure into null', async () => {
    const container = await findContainer(failingRoot('boom'), 'article', 0, { sink });

    expect(container).toBeNull();
    expect(sink.events).toEqual([
      { severity: 'error', message: 'Error finding container at index 0: boom', selector: 'article', parentKey: undefined },
    ]);
  });
});

describe('readValue', () => {
  const node = (overrides: Partial<DomNode>): DomNode => ({
    queryOne: () => Promise.resolve(null),
    queryAll: () => Promise.resolve([]),
    text: () => Promise.resolve('text'),
    attribute: () => Promise.resolve(null),
    ...overrides,
  });

  it('reads text when no attribute is given', async () => {
    expect(await readValue(node({}), undefined)).toBe('text');
  });

  it('reads the named attribute', async () => {
    const attribute = jest.fn((name: string) => Promise.resolve(name === 'href' ? '/x' : null));
    expect(await readValue(node({ attribute }), 'href')).toBe('/x');
    expect(attribute).toHaveBeenCalledWith('href');
  });

  it('logs and returns null when the read fails', async () => {
    const sink = new MemorySink();
    const broken = node({ text: () => Promise.reject(new Error('detached node')) });

    expect(await readValue(broken, undefined, { sink, parentKey: 'title' })).toBeNull();
    expect(sink.events).toEqual([
      { severity: 'error', message: 'Error reading text: detached node', parentKey: 'title' },
    ]);
  });
});

describe('releaseNodes', () => {
  const releasable = (dispose?: () => Promise<void>): DomNode => ({
    queryOne: () => Promise.resolve(null),
    queryAll: () => Promise.resolve([]),
    text: () => Promise.resolve(''),
    attribute: () => Promise.resolve(null),
    dispose,
  });

  it('disposes every node that can be disposed', async () => {
    const first = jest.fn(() => Promise.resolve());
    const second = jest.fn(() => Promise.resolve());

    await releaseNodes([releasable(first), releasable(), releasable(second)]);

    expect(first).toHaveBeenCalledTimes(1);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('logs a failed release and carries on', async () => {
    const sink = new MemorySink();
    const after = jest.fn(() => Promise.resolve());

    await releaseNodes([releasable(() => Promise.reject(new Error('target closed'))), releasable(after)], {
      sink,
      parentKey: 'tags',
    });

    expect(after).toHaveBeenCalledTimes(1);
    expect(sink.events).toEqual([
      { severity: 'debug', message: 'Error releasing node: target closed', parentKey: 'tags' },
    ]);
  });
});
