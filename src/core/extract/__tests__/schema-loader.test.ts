import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { loadSchemaFile, parseSchemaDocument } from '../schema-loader.js';
import { extractStatic } from '../../orchestrator.js';
import { ErrorCode, HarvestError } from '../../errors.js';
import { MemorySink } from '../../logging/diagnostics.js';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

function captureError(fn: () => unknown): HarvestError {
  try {
    fn();
  } catch (error) {
    if (error instanceof HarvestError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a HarvestError');
}

describe('parseSchemaDocument', () => {
  it('defaults the identity field to url', () => {
    const schema = parseSchemaDocument({ container: '.item', fields: { url: { selector: 'a', attribute: 'href' } } });

    expect(schema.identityField).toBe('url');
    expect(schema.endMarkerSelector).toBeUndefined();
    expect(schema.fields.url).toEqual({
      kind: 'leaf',
      selector: 'a',
      attribute: 'href',
      transform: undefined,
      required: undefined,
    });
  });

  it('builds lists and composites', () => {
    const schema = parseSchemaDocument({
      container: '.item',
      fields: {
        images: { selector: 'img', attribute: 'src', multiple: true },
        meta: { selector: '.meta', multiple: true, children: { author: { selector: '.author' } } },
      },
    });

    expect(schema.fields.images?.kind).toBe('list');
    expect(schema.fields.meta?.kind).toBe('composite');
  });

  it('reports the path of an unknown property', () => {
    const error = captureError(() =>
      parseSchemaDocument({ container: '.item', fields: { title: { selektor: '.title' } } })
    );

    expect(error.code).toBe(ErrorCode.INVALID_SCHEMA);
    expect(error.message).toBe("Invalid schema document at fields.title: Unrecognized key(s) in object: 'selektor'");
  });

  it('requires a container selector', () => {
    const error = captureError(() => parseSchemaDocument({ fields: {} }));

    expect(error.message).toBe('Invalid schema document at container: Required');
  });

  it('rejects a document that is not an object', () => {
    const error = captureError(() => parseSchemaDocument('article'));

    expect(error.code).toBe(ErrorCode.INVALID_SCHEMA);
    expect(error.message.startsWith('Invalid schema document: ')).toBe(true);
  });

  it('rejects unknown transforms and lists the known ones', () => {
    const error = captureError(() =>
      parseSchemaDocument({
        container: '.item',
        fields: { meta: { children: { likes: { selector: '.likes', transform: ['trim', 'toInt'] } } } },
      })
    );

    expect(error.message).toBe("Unknown transform 'toInt' on field meta.likes");
    expect(error.suggestion).toBe(
      'Available transforms: trim, collapseWhitespace, lowercase, nonEmpty, integer, number, absoluteUrl'
    );
  });

  it('rejects multiple without a selector', () => {
    const error = captureError(() =>
      parseSchemaDocument({ container: '.item', fields: { tags: { multiple: true } } })
    );

    expect(error.message).toBe('Field tags is multiple but has no selector');
  });
});

describe('loadSchemaFile', () => {
  it('loads a schema document from disk', async () => {
    const schema = await loadSchemaFile(fixture('feed-schema.json'));

    expect(schema.containerSelector).toBe('article.post');
    expect(schema.identityField).toBe('url');
    expect(schema.endMarkerSelector).toBe('.feed-end');
    expect(Object.keys(schema.fields)).toEqual(['title', 'url', 'likes', 'tags', 'author']);
  });

  it('fails with SCHEMA_NOT_FOUND for a missing file', async () => {
    await expect(loadSchemaFile(fixture('missing.json'))).rejects.toMatchObject({
      code: ErrorCode.SCHEMA_NOT_FOUND,
      suggestion: 'Check the --schema path',
    });
  });

  it('fails with INVALID_SCHEMA for malformed JSON', async () => {
    await expect(loadSchemaFile(fixture('broken-schema.json'))).rejects.toMatchObject({
      code: ErrorCode.INVALID_SCHEMA,
      message: `Schema file is not valid JSON: ${fixture('broken-schema.json')}`,
    });
  });

  it('extracts records from a page with the loaded schema', async () => {
    const schema = await loadSchemaFile(fixture('feed-schema.json'), { location: 'https://feed.test/latest' });
    const html = `
      <article class="post">
        <h2 class="title">A
          long   title</h2>
        <a class="permalink" href="/p/1#top">read</a>
        <span class="likes"> 1,204 </span>
        <span class="tag"> news </span><span class="tag">  </span>
        <div class="byline"><span class="name">ada</span><a href="/u/ada">profile</a></div>
      </article>`;

    const records = await extractStatic(html, schema, 'https://feed.test/latest', new MemorySink());

    expect(records).toEqual([
      {
        title: 'A long title',
        url: 'https://feed.test/p/1#top',
        likes: 1204,
        tags: ['news'],
        author: { name: 'ada', profile: 'https://feed.test/u/ada' },
      },
    ]);
  });
});
