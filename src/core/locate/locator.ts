// src/core/locate/locator.ts
import type { DomNode, QueryRoot } from '../types/index.js';
import {
  ConsoleSink,
  describeError,
  emitDiagnostic,
  type DiagnosticSink,
} from '../logging/diagnostics.js';

export interface LocateOptions {
  /** Human-readable name used in log messages */
  description?: string;
  /** Miss is logged as an error instead of a warning */
  required?: boolean;
  parentKey?: string;
  sink?: DiagnosticSink;
}

const defaultSink = new ConsoleSink();

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Look up a single node under `parent`. Misses and query failures become `null`.
 */
export async function findElement(
  parent: QueryRoot,
  selector: string,
  options: LocateOptions = {}
): Promise<DomNode | null> {
  const { description = 'element', required = false, parentKey, sink = defaultSink } = options;

  try {
    const element = await parent.queryOne(selector);
    if (element) {
      return element;
    }

    emitDiagnostic(sink, {
      severity: required ? 'error' : 'warn',
      message: `${capitalize(description)} not found with selector: '${selector}'`,
      selector,
      parentKey,
    });
    return null;
  } catch (error) {
    emitDiagnostic(sink, {
      severity: 'error',
      message: `Error finding ${description}: ${describeError(error)}`,
      selector,
      parentKey,
    });
    return null;
  }
}

/**
 * Look up every node matching `selector`. Query failures become an empty list.
 */
export async function findElements(
  parent: QueryRoot,
  selector: string,
  options: Omit<LocateOptions, 'required'> = {}
): Promise<DomNode[]> {
  const { description = 'elements', parentKey, sink = defaultSink } = options;

  try {
    return await parent.queryAll(selector);
  } catch (error) {
    emitDiagnostic(sink, {
      severity: 'error',
      message: `Error finding ${description}: ${describeError(error)}`,
      selector,
      parentKey,
    });
    return [];
  }
}

/**
 * Resolve the container at `index` among all matches of `selector`.
 */
export async function findContainer(
  page: QueryRoot,
  selector: string,
  index: number,
  options: Omit<LocateOptions, 'required'> = {}
): Promise<DomNode | null> {
  const { description = 'container', parentKey, sink = defaultSink } = options;

  let containers: DomNode[];
  try {
    containers = await page.queryAll(selector);
  } catch (error) {
    emitDiagnostic(sink, {
      severity: 'error',
      message: `Error finding ${description} at index ${index}: ${describeError(error)}`,
      selector,
      parentKey,
    });
    return null;
  }

  if (containers.length === 0) {
    emitDiagnostic(sink, {
      severity: 'warn',
      message: `No ${description}s found with selector: '${selector}'`,
      selector,
      parentKey,
    });
    return null;
  }

  emitDiagnostic(sink, {
    severity: 'debug',
    message: `Found ${containers.length} ${description}s`,
    selector,
    parentKey,
  });

  if (!Number.isInteger(index) || index < 0 || index >= containers.length) {
    emitDiagnostic(sink, {
      severity: 'warn',
      message: `${capitalize(description)} at position ${index} not found (total: ${containers.length})`,
      selector,
      parentKey,
    });
    return null;
  }

  return containers[index] ?? null;
}

/**
 * Read an attribute, or the text content when no attribute is given.
 */
export async function readValue(
  node: DomNode,
  attribute: string | undefined,
  options: Pick<LocateOptions, 'parentKey' | 'sink'> = {}
): Promise<string | null> {
  const { parentKey, sink = defaultSink } = options;

  try {
    return attribute ? await node.attribute(attribute) : await node.text();
  } catch (error) {
    emitDiagnostic(sink, {
      severity: 'error',
      message: `Error reading ${attribute ? `attribute '${attribute}'` : 'text'}: ${describeError(error)}`,
      parentKey,
    });
    return null;
  }
}

/**
 * Release nodes the caller is done with. A failed release is only logged.
 */
export async function releaseNodes(
  nodes: Iterable<DomNode>,
  options: Pick<LocateOptions, 'parentKey' | 'sink'> = {}
): Promise<void> {
  const { parentKey, sink = defaultSink } = options;

  for (const node of nodes) {
    if (!node.dispose) {
      continue;
    }
    try {
      await node.dispose();
    } catch (error) {
      emitDiagnostic(sink, {
        severity: 'debug',
        message: `Error releasing node: ${describeError(error)}`,
        parentKey,
      });
    }
  }
}
