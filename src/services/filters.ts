import { Page, Locator } from 'playwright';
import { HUMAN_CONFIG } from '../config.js';
import { SearchFilters } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { pause, humanType } from '../utils/human.js';
import { Prompter } from '../utils/prompt.js';
import { SELECTORS } from './selectors.js';

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Suggestion texts worth trying for a location. LinkedIn lists the country
 * as either "Türkiye" or "Turkey" depending on the account locale.
 */
export function locationCandidates(location: string): string[] {
  const candidates = [location];
  const lower = location.toLowerCase();
  if (lower === 'türkiye' || lower === 'turkiye') {
    candidates.push('Turkey');
  }
  if (lower === 'turkey') {
    candidates.push('Türkiye');
  }
  return candidates;
}

async function firstPresent(page: Page, selectors: readonly string[]): Promise<Locator | null> {
  for (const selector of selectors) {
    const locator = page.locator(selector);
    if ((await locator.count()) > 0) {
      return locator.first();
    }
  }
  return null;
}

async function firstVisible(page: Page, selectors: readonly string[]): Promise<Locator | null> {
  for (const selector of selectors) {
    const locator = page.locator(selector);
    if ((await locator.count()) > 0 && (await locator.first().isVisible())) {
      return locator.first();
    }
  }
  return null;
}

async function clickShowResults(page: Page): Promise<void> {
  const applyButton = page.getByRole('button', { name: /Show results|Apply/i });
  if ((await applyButton.count()) > 0) {
    await applyButton.first().click();
  }
}

export async function applyLocationFilter(page: Page, location: string, typingDelayMs: number): Promise<void> {
  logger.action(`Setting location: ${location}`);

  const inputBox = await firstPresent(page, SELECTORS.locationInputs);
  if (!inputBox) {
    throw new Error('Location input not found');
  }

  const clearButton = await firstVisible(page, SELECTORS.locationClearButtons);
  if (clearButton) {
    await clearButton.click();
  }
  await inputBox.click();
  if (!clearButton) {
    // Select-all differs between macOS and everything else
    for (const combo of ['Meta+A', 'Control+A']) {
      try {
        await inputBox.press(combo);
        await inputBox.press('Backspace');
      } catch (error) {
        logger.debug(`${combo} did not clear the location: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  await humanType(inputBox, location, typingDelayMs);
  await pause(HUMAN_CONFIG.suggestionDelay);

  const suggestions = page.locator(SELECTORS.locationSuggestions);
  if ((await suggestions.count()) > 0) {
    for (const candidate of locationCandidates(location)) {
      const match = suggestions.filter({ hasText: new RegExp(escapeRegExp(candidate), 'i') });
      if ((await match.count()) > 0 && (await match.first().isVisible())) {
        await match.first().click();
        return;
      }
    }

    if (await suggestions.first().isVisible()) {
      await suggestions.first().click();
      return;
    }
  }

  await inputBox.press('Enter');
}

/**
 * Picks a distance option, or "Any distance" when `label` is empty.
 */
export async function applyDistanceFilter(page: Page, label: string | null): Promise<void> {
  logger.action(label ? `Setting distance: ${label}` : 'Clearing distance');

  const distanceButton = page.getByRole('button', { name: /^Distance$/i });
  if ((await distanceButton.count()) > 0) {
    await distanceButton.first().click();
  } else {
    await page.getByRole('button', { name: /All filters/i }).click();
  }

  const pattern = label ? new RegExp(escapeRegExp(label), 'i') : /Any distance|Any/i;
  let option = page.getByRole('radio', { name: pattern });
  if ((await option.count()) === 0) {
    option = page.getByLabel(pattern);
  }
  if ((await option.count()) === 0) {
    throw new Error(`Distance option "${label ?? 'Any distance'}" not found`);
  }

  await option.first().click();
  await clickShowResults(page);
}

export async function applyDatePostedFilter(page: Page, label: string): Promise<void> {
  logger.action(`Setting date posted: ${label}`);

  await page.getByRole('button', { name: /Date posted/i }).click();

  const pattern = new RegExp(escapeRegExp(label), 'i');
  let option = page.getByRole('radio', { name: pattern });
  if ((await option.count()) === 0) {
    option = page.getByLabel(pattern);
  }
  await option.first().click();
  await clickShowResults(page);
}

export async function applyEasyApplyFilter(page: Page): Promise<void> {
  logger.action('Enabling Easy Apply filter');

  const pill = page.getByRole('button', { name: /^Easy Apply$/i });
  if ((await pill.count()) > 0) {
    try {
      const pressed = await pill.first().getAttribute('aria-pressed');
      if (pressed !== 'true') {
        await pill.first().click();
        await pause(HUMAN_CONFIG.suggestionDelay);
      }
      return;
    } catch (error) {
      logger.debug(`Easy Apply pill failed, using All filters: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  await page.getByRole('button', { name: /All filters/i }).click();
  let checkbox = page.getByRole('checkbox', { name: /Easy Apply/i });
  if ((await checkbox.count()) === 0) {
    checkbox = page.locator(SELECTORS.easyApplyCheckbox);
  }
  if ((await checkbox.count()) > 0) {
    await checkbox.first().check();
  }
  await page.getByRole('button', { name: /Show results|Apply/i }).first().click();
}

export type FilterName = 'location' | 'distance' | 'time_posted' | 'easy_apply';

/**
 * Which filters a run will touch, in the order they are applied.
 */
export function plannedFilters(filters: SearchFilters): FilterName[] {
  const names: FilterName[] = [];
  if (filters.location) names.push('location');
  // An explicit empty distance means "reset to any"; an absent one leaves it alone
  if (filters.distance !== undefined) names.push('distance');
  if (filters.time_posted) names.push('time_posted');
  if (filters.easy_apply) names.push('easy_apply');
  return names;
}

function runFilter(page: Page, name: FilterName, filters: SearchFilters, typingDelayMs: number): Promise<void> {
  switch (name) {
    case 'location':
      return applyLocationFilter(page, filters.location ?? '', typingDelayMs);
    case 'distance':
      return applyDistanceFilter(page, filters.distance || null);
    case 'time_posted':
      return applyDatePostedFilter(page, filters.time_posted ?? '');
    case 'easy_apply':
      return applyEasyApplyFilter(page);
  }
}

/**
 * Applies every configured filter. Failures are collected and handed to the
 * human, who sets them by hand before the run continues.
 */
export async function applyFilters(
  page: Page,
  filters: SearchFilters,
  typingDelayMs: number,
  prompter: Prompter
): Promise<string[]> {
  const failures: string[] = [];

  for (const name of plannedFilters(filters)) {
    try {
      await runFilter(page, name, filters, typingDelayMs);
    } catch (error) {
      failures.push(`${name} (${error instanceof Error ? error.message : String(error)})`);
    }
  }

  if (failures.length > 0) {
    logger.warn('Could not apply some filters:');
    for (const item of failures) {
      logger.warn(`- ${item}`);
    }
    await prompter.pause('Please set these filters manually in the browser.');
  } else {
    logger.success('Filters applied');
  }

  return failures;
}
