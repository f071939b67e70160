// src/core/render/browser.ts
import { chromium, type Browser, type BrowserContext } from 'playwright';
import * as fs from 'fs/promises';
import * as path from 'path';
import { DEFAULT_SESSION_DIR, DEFAULT_USER_AGENT } from '../config/constants.js';
import { ErrorCode, HarvestError } from '../errors.js';
import type { BrowserType } from '../types/index.js';

export interface BrowserOptions {
  cdpEndpoint?: string;  // Chrome DevTools Protocol endpoint (e.g., 'http://localhost:9222')
  browserType?: BrowserType;
  headless?: boolean;
}

const CHANNELS: Record<BrowserType, string | undefined> = {
  chrome: 'chrome',
  edge: 'msedge',
  chromium: undefined,
};

export class BrowserManager {
  private context?: BrowserContext;
  private browser?: Browser;
  private sessionDir: string;
  private options: BrowserOptions;

  constructor(
    sessionDir: string = path.join(process.cwd(), DEFAULT_SESSION_DIR),
    options: BrowserOptions = {}
  ) {
    this.sessionDir = sessionDir;
    this.options = options;
  }

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    if (this.options.cdpEndpoint) {
      return this.connect(this.options.cdpEndpoint);
    }

    try {
      await fs.mkdir(this.sessionDir, { recursive: true });
    } catch {
      throw new HarvestError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to create session directory: ${this.sessionDir}`,
        false,
        `Check permissions for directory: ${this.sessionDir}`
      );
    }

    const browserType = this.options.browserType ?? 'chrome';
    try {
      console.error(`[INFO] Launching ${browserType} with persistent session: ${this.sessionDir}`);
      this.context = await chromium.launchPersistentContext(this.sessionDir, {
        channel: CHANNELS[browserType],
        headless: this.options.headless ?? false,
        userAgent: DEFAULT_USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        args: [
          '--disable-blink-features=AutomationControlled',
          '--no-first-run',
          '--no-default-browser-check',
        ],
      });
    } catch (error) {
      throw new HarvestError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to launch browser: ${error instanceof Error ? error.message : 'Unknown error'}`,
        false,
        `Ensure ${browserType} is installed on your system, or pass --cdp to reuse a running browser`
      );
    }

    return this.context;
  }

  private async connect(endpoint: string): Promise<BrowserContext> {
    try {
      console.error(`[INFO] Connecting to browser at ${endpoint}`);
      this.browser = await chromium.connectOverCDP(endpoint);
      this.context = this.browser.contexts()[0] ?? (await this.browser.newContext());
      return this.context;
    } catch (error) {
      throw new HarvestError(
        ErrorCode.BROWSER_LAUNCH_FAILED,
        `Failed to connect to browser at ${endpoint}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        true,
        'Start Chrome with --remote-debugging-port and retry'
      );
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
    } else if (this.context) {
      await this.context.close();
    }
    this.browser = undefined;
    this.context = undefined;
  }
}
