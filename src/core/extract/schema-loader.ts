// src/core/extract/schema-loader.ts
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ExtractField, RecordSchema, Transform } from './field.js';
import { composeTransforms, isTransformName, TRANSFORM_NAMES, type TransformName } from './transforms.js';
import { ErrorCode, HarvestError } from '../errors.js';
import { DEFAULT_IDENTITY_FIELD } from '../config/constants.js';

interface FieldDocument {
  selector?: string;
  attribute?: string;
  multiple?: boolean;
  required?: boolean;
  transform?: string | string[];
  children?: Record<string, FieldDocument>;
}

const fieldDocument: z.ZodType<FieldDocument> = z.lazy(() =>
  z
    .object({
      selector: z.string().min(1).optional(),
      attribute: z.string().min(1).optional(),
      multiple: z.boolean().optional(),
      required: z.boolean().optional(),
      transform: z.union([z.string(), z.array(z.string())]).optional(),
      children: z.record(fieldDocument).optional(),
    })
    .strict()
);

const schemaDocument = z
  .object({
    container: z.string().min(1),
    identity: z.string().min(1).optional(),
    endMarker: z.string().min(1).optional(),
    fields: z.record(fieldDocument),
  })
  .strict();

export interface FeedSchema {
  containerSelector: string;
  identityField: string;
  endMarkerSelector?: string;
  fields: RecordSchema;
}

export interface SchemaLoadOptions {
  /** Base for `absoluteUrl` when extraction runs without a page location */
  location?: string;
}

/**
 * Validate a JSON schema document and build its field tree.
 */
export function parseSchemaDocument(input: unknown, options: SchemaLoadOptions = {}): FeedSchema {
  const parsed = schemaDocument.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new HarvestError(
      ErrorCode.INVALID_SCHEMA,
      `Invalid schema document${where}: ${issue?.message ?? 'unknown error'}`,
      false,
      'Each field takes selector, attribute, multiple, required, transform and children'
    );
  }

  const location = options.location ?? 'about:blank';
  const fields: RecordSchema = {};
  for (const [key, doc] of Object.entries(parsed.data.fields)) {
    fields[key] = buildField(doc, key, location);
  }

  return {
    containerSelector: parsed.data.container,
    identityField: parsed.data.identity ?? DEFAULT_IDENTITY_FIELD,
    endMarkerSelector: parsed.data.endMarker,
    fields,
  };
}

export async function loadSchemaFile(filePath: string, options: SchemaLoadOptions = {}): Promise<FeedSchema> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new HarvestError(
      ErrorCode.SCHEMA_NOT_FOUND,
      `Cannot read schema file: ${filePath}`,
      false,
      'Check the --schema path',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new HarvestError(
      ErrorCode.INVALID_SCHEMA,
      `Schema file is not valid JSON: ${filePath}`,
      false,
      undefined,
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  return parseSchemaDocument(json, options);
}

function buildField(doc: FieldDocument, path: string, location: string): ExtractField {
  if (doc.children) {
    const children: Record<string, ExtractField> = {};
    for (const [key, child] of Object.entries(doc.children)) {
      children[key] = buildField(child, `${path}.${key}`, location);
    }
    return { kind: 'composite', selector: doc.selector, children };
  }

  const transform = buildTransform(doc.transform, path, location);

  if (doc.multiple) {
    if (!doc.selector) {
      throw new HarvestError(ErrorCode.INVALID_SCHEMA, `Field ${path} is multiple but has no selector`);
    }
    return { kind: 'list', selector: doc.selector, attribute: doc.attribute, transform };
  }

  return {
    kind: 'leaf',
    selector: doc.selector,
    attribute: doc.attribute,
    transform,
    required: doc.required,
  };
}

function buildTransform(spec: string | string[] | undefined, path: string, location: string): Transform | undefined {
  if (spec === undefined) {
    return undefined;
  }

  const names: TransformName[] = [];
  for (const name of Array.isArray(spec) ? spec : [spec]) {
    if (!isTransformName(name)) {
      throw new HarvestError(
        ErrorCode.INVALID_SCHEMA,
        `Unknown transform '${name}' on field ${path}`,
        false,
        `Available transforms: ${TRANSFORM_NAMES.join(', ')}`
      );
    }
    names.push(name);
  }

  return composeTransforms(names, { location });
}
