// src/core/extract/engine.ts
import type { DomNode, ExtractValue } from '../types/index.js';
import type {
  CompositeField,
  ExtractField,
  LeafField,
  ListField,
  Transform,
  TransformContext,
} from './field.js';
import { findElement, findElements, readValue, releaseNodes } from '../locate/locator.js';
import {
  ConsoleSink,
  describeError,
  emitDiagnostic,
  type DiagnosticSink,
} from '../logging/diagnostics.js';

const defaultSink = new ConsoleSink();

/**
 * Derive one value from `element` following `field`.
 *
 * Never rejects: misses and failures degrade to `null` (leaf, custom), `[]` (list)
 * or `{}` (composite), with a diagnostic on `sink`. `context` reaches every transform.
 * Nodes looked up on the way are released before returning.
 */
export async function extractField(
  element: DomNode,
  field: ExtractField,
  parentKey = '',
  sink: DiagnosticSink = defaultSink,
  context?: TransformContext
): Promise<ExtractValue> {
  switch (field.kind) {
    case 'custom':
      try {
        return await field.extract(element, field);
      } catch (error) {
        emitDiagnostic(sink, {
          severity: 'error',
          message: `Custom extraction failed: ${describeError(error)}`,
          parentKey,
        });
        return null;
      }
    case 'composite':
      return extractComposite(element, field, parentKey, sink, context);
    case 'list':
      return extractList(element, field, parentKey, sink, context);
    case 'leaf':
      return extractLeaf(element, field, parentKey, sink, context);
  }
}

async function extractComposite(
  element: DomNode,
  field: CompositeField,
  parentKey: string,
  sink: DiagnosticSink,
  context: TransformContext | undefined
): Promise<ExtractValue> {
  const container = field.selector
    ? await findElement(element, field.selector, {
        description: `container for ${parentKey || 'field'}`,
        parentKey,
        sink,
      })
    : element;

  if (!container) {
    return {};
  }

  const result: { [key: string]: ExtractValue } = {};
  for (const [key, child] of Object.entries(field.children)) {
    const childKey = parentKey ? `${parentKey}.${key}` : key;
    result[key] = await extractField(container, child, childKey, sink, context);
  }

  if (container !== element) {
    await releaseNodes([container], { parentKey, sink });
  }
  return result;
}

async function extractList(
  element: DomNode,
  field: ListField,
  parentKey: string,
  sink: DiagnosticSink,
  context: TransformContext | undefined
): Promise<ExtractValue> {
  const nodes = await findElements(element, field.selector, {
    description: `elements for ${parentKey || 'field'}`,
    parentKey,
    sink,
  });

  const values: ExtractValue[] = [];
  for (const node of nodes) {
    const raw = await readValue(node, field.attribute, { parentKey, sink });
    const value = applyTransform(raw, field.transform, parentKey, sink, context);
    if (value !== null) {
      values.push(value);
    }
  }

  await releaseNodes(nodes, { parentKey, sink });
  return values;
}

async function extractLeaf(
  element: DomNode,
  field: LeafField,
  parentKey: string,
  sink: DiagnosticSink,
  context: TransformContext | undefined
): Promise<ExtractValue> {
  const target = field.selector
    ? await findElement(element, field.selector, {
        description: `element for ${parentKey || 'field'}`,
        required: field.required,
        parentKey,
        sink,
      })
    : element;

  if (!target) {
    return null;
  }

  const raw = await readValue(target, field.attribute, { parentKey, sink });
  if (target !== element) {
    await releaseNodes([target], { parentKey, sink });
  }
  return applyTransform(raw, field.transform, parentKey, sink, context);
}

function applyTransform(
  raw: string | null,
  transform: Transform | undefined,
  parentKey: string,
  sink: DiagnosticSink,
  context: TransformContext | undefined
): ExtractValue {
  if (!transform) {
    return raw;
  }

  try {
    return transform(raw, context) ?? null;
  } catch (error) {
    emitDiagnostic(sink, {
      severity: 'error',
      message: `Transform failed: ${describeError(error)}`,
      parentKey,
    });
    return null;
  }
}
