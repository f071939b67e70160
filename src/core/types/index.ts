// src/core/types/index.ts

/**
 * Anything that can be queried for descendants by CSS selector.
 */
export interface QueryRoot {
  queryOne(selector: string): Promise<DomNode | null>;
  queryAll(selector: string): Promise<DomNode[]>;
}

/**
 * A single DOM node handed out by a page adapter.
 */
export interface DomNode extends QueryRoot {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  /** Free whatever the adapter holds for this node in the page */
  dispose?(): Promise<void>;
}

export interface FeedPage extends QueryRoot {
  currentLocation(): string;
}

/**
 * A page the scroll controller can drive. `distance` is a fraction of the viewport height.
 */
export interface ScrollablePage extends FeedPage {
  scroll(distance: number): Promise<void>;
}

export type ExtractScalar = string | number | boolean;

export type ExtractValue =
  | ExtractScalar
  | null
  | ExtractValue[]
  | { [key: string]: ExtractValue };

export type ExtractRecord = Record<string, ExtractValue>;

export type BrowserType = 'chrome' | 'edge' | 'chromium';
