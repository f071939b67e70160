// src/core/extract/field.ts
import type { DomNode, ExtractScalar, ExtractValue } from '../types/index.js';

/**
 * What a transform knows about the page it runs on.
 */
export interface TransformContext {
  /** Current page URL, base for relative links */
  location: string;
}

export type Transform = (value: string | null, context?: TransformContext) => ExtractScalar | null | undefined;

export interface LeafField {
  kind: 'leaf';
  /** Scopes the lookup; the element itself is read when omitted */
  selector?: string;
  attribute?: string;
  transform?: Transform;
  /** A miss is logged as an error instead of a warning */
  required?: boolean;
}

export interface ListField {
  kind: 'list';
  selector: string;
  attribute?: string;
  transform?: Transform;
}

export interface CompositeField {
  kind: 'composite';
  selector?: string;
  children: Record<string, ExtractField>;
}

export interface CustomField {
  kind: 'custom';
  extract: (element: DomNode, field: CustomField) => ExtractValue | Promise<ExtractValue>;
}

export type ExtractField = LeafField | ListField | CompositeField | CustomField;

/**
 * Field names mapped to nodes, run once per container.
 */
export type RecordSchema = Record<string, ExtractField>;

/**
 * Attribute-bag form of a field, as written in hand-authored site schemas.
 */
export interface FieldSpec {
  selector?: string;
  attribute?: string;
  multiple?: boolean;
  required?: boolean;
  transform?: Transform;
  children?: Record<string, FieldSpec | ExtractField>;
  extract?: CustomField['extract'];
}

function isExtractField(value: FieldSpec | ExtractField): value is ExtractField {
  return 'kind' in value;
}

/**
 * Resolve a field spec into its variant.
 *
 * Order: `extract`, then `children`, then `multiple`, then a single leaf.
 */
export function defineField(spec: FieldSpec | ExtractField): ExtractField {
  if (isExtractField(spec)) {
    return spec;
  }

  if (spec.extract) {
    return { kind: 'custom', extract: spec.extract };
  }

  if (spec.children) {
    const children: Record<string, ExtractField> = {};
    for (const [key, child] of Object.entries(spec.children)) {
      children[key] = defineField(child);
    }
    return { kind: 'composite', selector: spec.selector || undefined, children };
  }

  if (spec.multiple) {
    if (!spec.selector) {
      throw new Error('A multiple field needs a selector');
    }
    return {
      kind: 'list',
      selector: spec.selector,
      attribute: spec.attribute,
      transform: spec.transform,
    };
  }

  return {
    kind: 'leaf',
    selector: spec.selector || undefined,
    attribute: spec.attribute,
    transform: spec.transform,
    required: spec.required,
  };
}

export function defineSchema(specs: Record<string, FieldSpec | ExtractField>): RecordSchema {
  const schema: RecordSchema = {};
  for (const [key, spec] of Object.entries(specs)) {
    schema[key] = defineField(spec);
  }
  return schema;
}

export const field = {
  text: (selector?: string, transform?: Transform): LeafField => ({ kind: 'leaf', selector, transform }),
  attr: (selector: string | undefined, attribute: string, transform?: Transform): LeafField => ({
    kind: 'leaf',
    selector,
    attribute,
    transform,
  }),
  list: (selector: string, options: { attribute?: string; transform?: Transform } = {}): ListField => ({
    kind: 'list',
    selector,
    ...options,
  }),
  group: (selector: string | undefined, children: Record<string, ExtractField>): CompositeField => ({
    kind: 'composite',
    selector,
    children,
  }),
  custom: (extract: CustomField['extract']): CustomField => ({ kind: 'custom', extract }),
};
