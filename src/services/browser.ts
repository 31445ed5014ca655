import { chromium, Browser, Page } from 'playwright';
import { logger } from '../utils/logger.js';
import { Prompter } from '../utils/prompt.js';

export async function connectToBrowser(cdpUrl: string): Promise<Browser> {
  logger.action(`Connecting to Chrome on ${cdpUrl} ...`);

  try {
    const browser = await chromium.connectOverCDP(cdpUrl);
    logger.success(`Connected (${browser.contexts().length} context(s) open)`);
    return browser;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Could not reach Chrome at ${cdpUrl}. Start it with --remote-debugging-port and try again. (${message})`
    );
  }
}

export function findJobsPage(browser: Browser, urlPattern: string): Page | null {
  for (const context of browser.contexts()) {
    for (const page of context.pages()) {
      if (page.url().includes(urlPattern)) {
        return page;
      }
    }
  }
  return null;
}

export async function waitForJobsPage(
  browser: Browser,
  urlPattern: string,
  prompter: Prompter,
  signal?: AbortSignal
): Promise<Page | null> {
  let page = findJobsPage(browser, urlPattern);

  while (!page) {
    if (signal?.aborted) return null;
    await prompter.pause(
      'No LinkedIn Jobs tab found. Open https://www.linkedin.com/jobs/ in the debug Chrome.',
      'Press Enter to retry...'
    );
    page = findJobsPage(browser, urlPattern);
  }

  logger.success(`Using tab: ${page.url()}`);
  return page;
}

export async function preparePage(page: Page, defaultTimeoutMs: number): Promise<void> {
  await page.bringToFront();
  page.setDefaultTimeout(defaultTimeoutMs);
}

// Over CDP this only drops our connection; the user's Chrome stays open
export async function disconnectBrowser(browser: Browser): Promise<void> {
  logger.action('Disconnecting from Chrome...');
  await browser.close();
  logger.success('Disconnected');
}
