// src/core/extract/transforms.ts
import type { ExtractScalar } from '../types/index.js';
import type { Transform, TransformContext } from './field.js';
import { isValidUrl, resolveUrl } from '../render/utils.js';

export type { TransformContext };

/** `defaults` apply when the caller passes no context of its own */
type TransformFactory = (defaults: TransformContext) => Transform;

const TRANSFORMS = {
  trim: () => (value) => value?.trim() ?? null,
  collapseWhitespace: () => (value) => value?.replace(/\s+/g, ' ').trim() ?? null,
  lowercase: () => (value) => value?.toLowerCase() ?? null,
  nonEmpty: () => (value) => (value && value.trim() ? value : null),
  integer: () => (value) => {
    if (value === null) return null;
    const parsed = parseInt(value.replace(/[,\s]/g, ''), 10);
    return Number.isNaN(parsed) ? null : parsed;
  },
  number: () => (value) => {
    if (value === null) return null;
    const parsed = parseFloat(value.replace(/[,\s]/g, ''));
    return Number.isNaN(parsed) ? null : parsed;
  },
  // pages without a web location (about:blank) keep the schema's base
  absoluteUrl: (defaults) => (value, context) => {
    const href = value?.trim();
    const base = context && isValidUrl(context.location) ? context.location : defaults.location;
    return href ? resolveUrl(href, base) : null;
  },
} satisfies Record<string, TransformFactory>;

export type TransformName = keyof typeof TRANSFORMS;

export function isTransformName(name: string): name is TransformName {
  return Object.prototype.hasOwnProperty.call(TRANSFORMS, name);
}

export const TRANSFORM_NAMES: TransformName[] = Object.keys(TRANSFORMS).filter(isTransformName);

/**
 * Chain named transforms left to right. Non-string intermediate values are stringified.
 */
export function composeTransforms(names: TransformName[], defaults: TransformContext): Transform {
  const steps: Transform[] = names.map(name => TRANSFORMS[name](defaults));

  return (value, context) => {
    let current: ExtractScalar | null = value;
    for (const step of steps) {
      const input: string | null = current === null || typeof current === 'string' ? current : String(current);
      current = step(input, context) ?? null;
    }
    return current;
  };
}
