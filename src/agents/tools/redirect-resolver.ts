/**
 * Resolves headline links to the article they finally land on.
 *
 * Aggregator links are tracking wrappers that only unwrap after their
 * JavaScript runs, so a plain HTTP redirect follow is not enough: each call
 * drives a throw-away headless Chrome, lets the page settle and reads the
 * address bar.
 */

import puppeteer from 'puppeteer-core';
import { logger, errorMessage } from '../../utils/logger';

export interface ResolverPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<unknown>;
  url(): string;
}

export interface ResolverBrowser {
  newPage(): Promise<ResolverPage>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  executablePath?: string;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<ResolverBrowser>;

export interface ResolveOptions {
  executablePath?: string;
  settleMs?: number;
  navigationTimeoutMs?: number;
  launch?: BrowserLauncher;
}

const DEFAULT_SETTLE_MS = 5000;
const DEFAULT_NAVIGATION_TIMEOUT_MS = 30000;

export const launchHeadlessChrome: BrowserLauncher = ({ executablePath }) =>
  puppeteer.launch({
    headless: true,
    // No executable configured: let puppeteer locate the installed stable Chrome
    ...(executablePath ? { executablePath } : { channel: 'chrome' as const }),
    args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage']
  });

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Follow server-side and client-side redirects starting at `url`.
 * Returns the final address, or null when the browser could not get there.
 */
export async function resolveFinalUrl(url: string, options: ResolveOptions = {}): Promise<string | null> {
  const launch = options.launch ?? launchHeadlessChrome;
  const settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
  const timeout = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;

  logger.info('Resolving final URL via headless Chrome', { url });

  let browser: ResolverBrowser | null = null;
  try {
    browser = await launch({ executablePath: options.executablePath });
    const page = await browser.newPage();
    await page.goto(url, { waitUntil: 'domcontentloaded', timeout });
    // TODO: wait on the navigation event of the final hop instead of a fixed delay
    await sleep(settleMs);
    const finalUrl = page.url();
    logger.info(`Resolved URL: ${finalUrl}`);
    return finalUrl;
  } catch (error) {
    logger.warn(`URL resolution failed: ${errorMessage(error)}`, { url });
    return null;
  } finally {
    if (browser) {
      await browser.close().catch((closeError: unknown) => {
        logger.warn(`Failed to close browser: ${errorMessage(closeError)}`);
      });
    }
  }
}
