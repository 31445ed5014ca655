import { Locator } from 'playwright';
import { isRegexPattern } from '../config.js';
import { FormAnswer } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { humanType } from '../utils/human.js';
import { SELECTORS } from './selectors.js';

function normalizeLabel(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * First answer whose label pattern matches the field label. A pattern is a
 * case-insensitive substring, or `/.../` for a case-insensitive regex.
 */
export function findAnswer(label: string, answers: readonly FormAnswer[]): FormAnswer | null {
  const normalized = normalizeLabel(label);
  if (!normalized) return null;

  for (const answer of answers) {
    if (isRegexPattern(answer.label)) {
      if (new RegExp(answer.label.slice(1, -1), 'i').test(normalized)) {
        return answer;
      }
    } else if (normalized.includes(normalizeLabel(answer.label))) {
      return answer;
    }
  }
  return null;
}

// Label text for a control: <label for>, then aria-label, then the wrapping label
async function labelFor(field: Locator): Promise<string> {
  return field.evaluate((el) => {
    const byFor = el.id ? document.querySelector(`label[for="${CSS.escape(el.id)}"]`) : null;
    const text = byFor?.textContent ?? el.getAttribute('aria-label') ?? el.closest('label')?.textContent ?? '';
    return text.trim();
  });
}

async function fillTextFields(modal: Locator, answers: readonly FormAnswer[], typingDelayMs: number): Promise<number> {
  const fields = modal.locator(SELECTORS.textFields);
  const count = await fields.count();
  let filled = 0;

  for (let i = 0; i < count; i++) {
    const field = fields.nth(i);
    if (!(await field.isVisible()) || !(await field.isEditable())) continue;
    if ((await field.inputValue()).trim() !== '') continue;

    const label = await labelFor(field);
    const answer = findAnswer(label, answers);
    if (!answer) continue;

    await humanType(field, answer.value, typingDelayMs);
    logger.debug(`Filled "${label}"`);
    filled++;
  }
  return filled;
}

async function fillSelects(modal: Locator, answers: readonly FormAnswer[]): Promise<number> {
  const selects = modal.locator(SELECTORS.selectFields);
  const count = await selects.count();
  let filled = 0;

  for (let i = 0; i < count; i++) {
    const select = selects.nth(i);
    if (!(await select.isVisible())) continue;

    // LinkedIn leaves "Select an option" selected, which has no real value
    const untouched = await select.evaluate(
      (el) => el instanceof HTMLSelectElement && (el.selectedIndex <= 0 || /select an option/i.test(el.value))
    );
    if (!untouched) continue;

    const label = await labelFor(select);
    const answer = findAnswer(label, answers);
    if (!answer) continue;

    try {
      await select.selectOption({ label: answer.value });
    } catch {
      await select.selectOption(answer.value);
    }
    logger.debug(`Selected "${answer.value}" for "${label}"`);
    filled++;
  }
  return filled;
}

async function fillRadioGroups(modal: Locator, answers: readonly FormAnswer[]): Promise<number> {
  const groups = modal.locator(SELECTORS.radioGroups);
  const count = await groups.count();
  let filled = 0;

  for (let i = 0; i < count; i++) {
    const group = groups.nth(i);
    const radios = group.locator("input[type='radio']");
    if ((await radios.count()) === 0) continue;
    if ((await group.locator("input[type='radio']:checked").count()) > 0) continue;

    const legend = group.locator('legend');
    const label = (await legend.count()) > 0 ? ((await legend.first().textContent()) ?? '') : '';
    const answer = findAnswer(label, answers);
    if (!answer) continue;

    const option = group.getByLabel(answer.value, { exact: true });
    if ((await option.count()) === 0) {
      logger.debug(`No option "${answer.value}" for "${label.trim()}"`);
      continue;
    }
    await option.first().check({ force: true });
    logger.debug(`Chose "${answer.value}" for "${label.trim()}"`);
    filled++;
  }
  return filled;
}

/**
 * Fills the empty controls of the current Easy Apply step that have a
 * configured answer. Controls the user already touched are left alone.
 */
export async function fillKnownFields(
  modal: Locator,
  answers: readonly FormAnswer[],
  typingDelayMs: number
): Promise<number> {
  if (answers.length === 0) return 0;

  const filled =
    (await fillTextFields(modal, answers, typingDelayMs)) +
    (await fillSelects(modal, answers)) +
    (await fillRadioGroups(modal, answers));

  if (filled > 0) {
    logger.debug(`Filled ${filled} field(s) on this step`);
  }
  return filled;
}
