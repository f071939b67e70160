import { describe, it, expect } from '@jest/globals';
import { defineField, defineSchema, field } from '../field.js';

describe('defineField', () => {
  const extract = () => 'custom';
  const upper = (value: string | null) => value?.toUpperCase();

  it('prefers a custom extractor over everything else', () => {
    const resolved = defineField({
      extract,
      selector: '.x',
      multiple: true,
      children: { a: { selector: '.a' } },
    });

    expect(resolved).toEqual({ kind: 'custom', extract });
  });

  it('prefers children over multiple', () => {
    const resolved = defineField({
      selector: '.meta',
      multiple: true,
      children: { author: { selector: '.author' } },
    });

    expect(resolved).toEqual({
      kind: 'composite',
      selector: '.meta',
      children: {
        author: {
          kind: 'leaf',
          selector: '.author',
          attribute: undefined,
          transform: undefined,
          required: undefined,
        },
      },
    });
  });

  it('builds a list for multiple', () => {
    expect(defineField({ selector: 'img', attribute: 'src', multiple: true, transform: upper })).toEqual({
      kind: 'list',
      selector: 'img',
      attribute: 'src',
      transform: upper,
    });
  });

  it('rejects multiple without a selector', () => {
    expect(() => defineField({ multiple: true })).toThrow('A multiple field needs a selector');
  });

  it('falls back to a leaf', () => {
    expect(defineField({ selector: 'a', attribute: 'href', required: true })).toEqual({
      kind: 'leaf',
      selector: 'a',
      attribute: 'href',
      transform: undefined,
      required: true,
    });
  });

  it('treats an empty selector as the element itself', () => {
    const resolved = defineField({ selector: '' });

    expect(resolved.kind).toBe('leaf');
    expect(resolved.kind === 'leaf' ? resolved.selector : 'not a leaf').toBeUndefined();
  });

  it('returns a resolved field unchanged', () => {
    const leaf = field.text('.title');

    expect(defineField(leaf)).toBe(leaf);
  });
});

describe('defineSchema', () => {
  it('resolves every entry', () => {
    const schema = defineSchema({
      title: { selector: '.title' },
      tags: { selector: '.tag', multiple: true },
      author: field.text('.author'),
    });

    expect(Object.keys(schema)).toEqual(['title', 'tags', 'author']);
    expect(schema.title?.kind).toBe('leaf');
    expect(schema.tags?.kind).toBe('list');
    expect(schema.author?.kind).toBe('leaf');
  });
});
