import { describe, it, expect } from '@jest/globals';
import { extractRecord, extractRecords } from '../records.js';
import { defineSchema } from '../field.js';
import { StaticPage } from '../../render/static-page.js';
import { MemorySink } from '../../logging/diagnostics.js';

const FEED_HTML = `
<div class="feed">
  <div class="item"><span class="title">First</span><a href="/1">go</a></div>
  <div class="item"><span class="title">Second</span></div>
  <div class="item"><span class="title">Third</span><a href="/3">go</a></div>
</div>`;

const schema = defineSchema({
  title: { selector: '.title' },
  url: { selector: 'a', attribute: 'href' },
});

describe('extractRecords', () => {
  it('produces one record per container in document order', async () => {
    const sink = new MemorySink();
    const page = new StaticPage(FEED_HTML);
    const containers = await page.queryAll('.item');

    const records = await extractRecords(containers, schema, sink);

    expect(records).toEqual([
      { title: 'First', url: '/1' },
      { title: 'Second', url: null },
      { title: 'Third', url: '/3' },
    ]);
  });

  it('reports misses under the field name', async () => {
    const sink = new MemorySink();
    const page = new StaticPage(FEED_HTML);
    const containers = await page.queryAll('.item');

    await extractRecords(containers, schema, sink);

    expect(sink.events).toEqual([
      {
        severity: 'warn',
        message: "Element for url not found with selector: 'a'",
        selector: 'a',
        parentKey: 'url',
      },
    ]);
  });

  it('returns an empty list for no containers', async () => {
    expect(await extractRecords([], schema)).toEqual([]);
  });
});

describe('extractRecord', () => {
  it('keys the record by schema field names', async () => {
    const page = new StaticPage(FEED_HTML);
    const [first] = await page.queryAll('.item');
    if (!first) throw new Error('fixture has no items');

    const record = await extractRecord(first, schema, new MemorySink());

    expect(Object.keys(record)).toEqual(['title', 'url']);
  });
});
