// src/core/render/playwright-page.ts
import type { ElementHandle, Page } from 'playwright';
import type { DomNode, ScrollablePage } from '../types/index.js';

export class PlaywrightNode implements DomNode {
  constructor(private readonly handle: ElementHandle) {}

  async queryOne(selector: string): Promise<DomNode | null> {
    const match = await this.handle.$(selector);
    return match ? new PlaywrightNode(match) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    const matches = await this.handle.$$(selector);
    return matches.map(match => new PlaywrightNode(match));
  }

  async text(): Promise<string> {
    return this.handle.innerText();
  }

  async attribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async dispose(): Promise<void> {
    await this.handle.dispose();
  }
}

/**
 * Page capability backed by a live Playwright page.
 */
export class PlaywrightFeedPage implements ScrollablePage {
  constructor(private readonly page: Page) {}

  currentLocation(): string {
    return this.page.url();
  }

  async queryOne(selector: string): Promise<DomNode | null> {
    const match = await this.page.$(selector);
    return match ? new PlaywrightNode(match) : null;
  }

  async queryAll(selector: string): Promise<DomNode[]> {
    const matches = await this.page.$$(selector);
    return matches.map(match => new PlaywrightNode(match));
  }

  async scroll(distance: number): Promise<void> {
    // Small steps keep virtualized feeds from unloading items
    await this.page.evaluate((fraction) => {
      window.scrollBy(0, window.innerHeight * fraction);
    }, distance);
  }
}
