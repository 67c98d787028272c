import { chromium } from 'playwright-core';
import type { BrowserDriver } from './browser-driver.js';
import { PlaywrightDriver } from './playwright-driver.js';

export interface SessionOptions {
  headless: boolean;
  /** Seconds. */
  navigationTimeout: number;
  /** Directory for relative screenshot paths. */
  outputDir: string;
}

export interface BrowserSession {
  driver: BrowserDriver;
  close(): Promise<void>;
}

/** Launch Chromium and hand back a driver bound to a fresh page. */
export async function openBrowserSession(options: SessionOptions): Promise<BrowserSession> {
  const browser = await chromium.launch({ headless: options.headless });
  try {
    const page = await browser.newPage();
    return {
      driver: new PlaywrightDriver(page, {
        navigationTimeout: options.navigationTimeout,
        outputDir: options.outputDir,
      }),
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}
