// src/core/render/static-page.ts
import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { DomNode, ScrollablePage } from '../types/index.js';

/**
 * A node of a parsed HTML document.
 */
export class StaticNode implements DomNode {
  constructor(
    private readonly $: cheerio.CheerioAPI,
    private readonly element: AnyNode
  ) {}

  async queryOne(selector: string): Promise<DomNode | null> {
    const match = this.$(this.element).find(selector).get(0);
    return match ? new StaticNode(this.$, match) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    return this.$(this.element)
      .find(selector)
      .toArray()
      .map(el => new StaticNode(this.$, el));
  }

  async text(): Promise<string> {
    return this.$(this.element).text();
  }

  async attribute(name: string): Promise<string | null> {
    return this.$(this.element).attr(name) ?? null;
  }
}

/**
 * Page capability over static HTML. Scrolling does nothing.
 */
export class StaticPage implements ScrollablePage {
  private $: cheerio.CheerioAPI;

  constructor(html: string, private location: string = 'about:blank') {
    this.$ = cheerio.load(html);
  }

  currentLocation(): string {
    return this.location;
  }

  async queryOne(selector: string): Promise<DomNode | null> {
    const match = this.$(selector).get(0);
    return match ? new StaticNode(this.$, match) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    return this.$(selector)
      .toArray()
      .map(el => new StaticNode(this.$, el));
  }

  async scroll(_distance: number): Promise<void> {
    return;
  }

  /** Replace the document, e.g. with the next snapshot of a feed */
  setContent(html: string): void {
    this.$ = cheerio.load(html);
  }
}
