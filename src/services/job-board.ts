import { Page, Locator } from 'playwright';
import { EasyApplyOpenResult, JobBoard, JobCard, JobDetails } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { humanClick } from '../utils/human.js';
import { SELECTORS } from './selectors.js';

const JOB_VIEW_PATTERN = /\/jobs\/view\/(\d+)/;

export function parseJobIdFromHref(href: string | null | undefined): string | null {
  if (!href) return null;
  const match = JOB_VIEW_PATTERN.exec(href);
  return match ? match[1] : null;
}

/**
 * Job id from a search-result card: the occludable id LinkedIn uses for
 * virtualised rows, then the plain data attribute, then the card's link.
 */
export function resolveJobId(attributes: {
  occludableId?: string | null;
  dataJobId?: string | null;
  href?: string | null;
}): string | null {
  if (attributes.occludableId) return attributes.occludableId;
  if (attributes.dataJobId) return attributes.dataJobId;
  return parseJobIdFromHref(attributes.href);
}

async function firstVisibleText(page: Page, selectors: readonly string[]): Promise<string | null> {
  for (const selector of selectors) {
    const locator = page.locator(selector);
    if ((await locator.count()) > 0 && (await locator.first().isVisible())) {
      const text = await locator.first().textContent();
      if (text && text.trim()) {
        return text.trim();
      }
    }
  }
  return null;
}

export class LinkedInJobBoard implements JobBoard {
  private cardSelector: string = SELECTORS.jobCardLists[0];

  constructor(private readonly page: Page) {}

  private cards(): Locator {
    return this.page.locator(this.cardSelector);
  }

  async listCards(): Promise<JobCard[]> {
    for (const selector of SELECTORS.jobCardLists) {
      const count = await this.page.locator(selector).count();
      if (count > 0) {
        if (selector !== this.cardSelector) {
          logger.debug(`Job cards found with selector: ${selector}`);
          this.cardSelector = selector;
        }
        break;
      }
    }

    const list = this.cards();
    const count = await list.count();
    const cards: JobCard[] = [];

    for (let i = 0; i < count; i++) {
      const card = list.nth(i);
      const link = card.locator('a').first();
      const id = resolveJobId({
        occludableId: await card.getAttribute('data-occludable-job-id'),
        dataJobId: await card.getAttribute('data-job-id'),
        href: (await link.count()) > 0 ? await link.getAttribute('href') : null,
      });
      cards.push({ index: i, id });
    }

    return cards;
  }

  async openCard(card: JobCard): Promise<boolean> {
    try {
      const locator = this.cards().nth(card.index);
      await locator.scrollIntoViewIfNeeded();
      // The mouse click below goes to coordinates; make sure no overlay takes it
      await locator.click({ trial: true });
      await humanClick(this.page, locator);
      return true;
    } catch (error) {
      logger.debug(`Could not open card ${card.index}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  async readDetails(): Promise<JobDetails> {
    return {
      title: await firstVisibleText(this.page, SELECTORS.jobTitle),
      company: await firstVisibleText(this.page, SELECTORS.jobCompany),
      url: this.page.url(),
    };
  }

  async openEasyApply(): Promise<EasyApplyOpenResult> {
    const button = this.page.locator(SELECTORS.easyApplyButton);
    if ((await button.count()) === 0) {
      return 'missing';
    }

    try {
      await humanClick(this.page, button.first());
      return 'opened';
    } catch (error) {
      logger.debug(`Easy Apply click failed: ${error instanceof Error ? error.message : String(error)}`);
      return 'failed';
    }
  }

  async hasOpenDialog(): Promise<boolean> {
    const dialog = this.page.locator(SELECTORS.modal);
    return (await dialog.count()) > 0 && (await dialog.first().isVisible());
  }

  // The results pane scrolls on its own; the window does not
  async loadMore(): Promise<void> {
    try {
      const container = this.page.locator(SELECTORS.resultsContainer);
      if ((await container.count()) > 0) {
        await container.first().evaluate((el) => el.scrollBy(0, 1200));
      } else {
        await this.page.mouse.wheel(0, 1200);
      }
    } catch (error) {
      logger.debug(`Scrolling results failed, using mouse wheel: ${error instanceof Error ? error.message : String(error)}`);
      await this.page.mouse.wheel(0, 1200);
    }
  }
}
