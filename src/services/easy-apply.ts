import { Page, Locator } from 'playwright';
import { HUMAN_CONFIG } from '../config.js';
import { ApplyOutcome, BehaviorConfig, EasyApplyModal, FormAnswer, ModalAction } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { humanClick, pause } from '../utils/human.js';
import { Prompter } from '../utils/prompt.js';
import { fillKnownFields } from './form-filler.js';
import { SELECTORS } from './selectors.js';

async function visible(locator: Locator): Promise<boolean> {
  return (await locator.count()) > 0 && (await locator.first().isVisible());
}

export class LinkedInEasyApplyModal implements EasyApplyModal {
  constructor(
    private readonly page: Page,
    private readonly answers: readonly FormAnswer[],
    private readonly typingDelayMs: number
  ) {}

  private dialog(): Locator {
    return this.page.locator(SELECTORS.modal);
  }

  async isOpen(): Promise<boolean> {
    return visible(this.dialog());
  }

  async visibleAction(): Promise<ModalAction | null> {
    const dialog = this.dialog();
    if (await visible(dialog.locator(SELECTORS.submitButton))) return 'submit';
    if (await visible(dialog.locator(SELECTORS.reviewButton))) return 'review';
    if (await visible(dialog.locator(SELECTORS.nextButton))) return 'next';
    return null;
  }

  async click(action: Exclude<ModalAction, 'submit'>): Promise<void> {
    const selector = action === 'review' ? SELECTORS.reviewButton : SELECTORS.nextButton;
    await humanClick(this.page, this.dialog().locator(selector).first());
  }

  async hasValidationError(): Promise<boolean> {
    return visible(this.dialog().locator(SELECTORS.validationError));
  }

  async fillKnownFields(): Promise<number> {
    return fillKnownFields(this.dialog().first(), this.answers, this.typingDelayMs);
  }

  // LinkedIn sometimes follows a submission with a "Done" confirmation
  async dismissDone(): Promise<void> {
    const done = this.page.locator(SELECTORS.doneButton);
    if (await visible(done)) {
      await done.first().click();
    }
  }
}

export interface EasyApplyOptions {
  behavior: Pick<BehaviorConfig, 'pause_on_unfilled' | 'max_idle_seconds' | 'fill_known_fields'>;
  prompter: Prompter;
  signal?: AbortSignal;
  pollIntervalMs?: number;
  stepDelayMs?: number;
  now?: () => number;
}

async function waitForModalClose(
  modal: EasyApplyModal,
  maxWaitSeconds: number,
  options: Required<Pick<EasyApplyOptions, 'pollIntervalMs' | 'now'>> & { signal?: AbortSignal }
): Promise<'closed' | 'timeout' | 'interrupted'> {
  const start = options.now();
  while (await modal.isOpen()) {
    if (options.signal?.aborted) return 'interrupted';
    await pause(options.pollIntervalMs, options.signal);
    if (maxWaitSeconds > 0 && options.now() - start > maxWaitSeconds * 1000) {
      return 'timeout';
    }
  }
  return 'closed';
}

/**
 * Steps through an open Easy Apply modal, filling known fields and pressing
 * Next/Review, and stops at Submit. The human submits (or closes) the modal;
 * this waits for that and reports what happened.
 */
export async function completeEasyApply(modal: EasyApplyModal, options: EasyApplyOptions): Promise<ApplyOutcome> {
  const { behavior, prompter, signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? HUMAN_CONFIG.modalPollInterval;
  const stepDelayMs = options.stepDelayMs ?? HUMAN_CONFIG.modalStepDelay;
  const now = options.now ?? Date.now;
  const maxIdleMs = behavior.max_idle_seconds * 1000;

  let lastProgress = now();
  const idleTooLong = () => maxIdleMs > 0 && now() - lastProgress > maxIdleMs;

  while (true) {
    if (signal?.aborted) return 'interrupted';
    if (!(await modal.isOpen())) return 'closed';

    const action = await modal.visibleAction();

    if (action === 'submit') {
      logger.prompt('Ready to submit. Please review and click Submit in the modal.');
      const closed = await waitForModalClose(modal, behavior.max_idle_seconds, { pollIntervalMs, now, signal });
      if (closed === 'timeout') {
        logger.warn('Timed out waiting for submit. Leaving modal open.');
        return 'timeout';
      }
      if (closed === 'interrupted') return 'interrupted';
      await modal.dismissDone();
      return 'submitted';
    }

    if (action === 'review' || action === 'next') {
      if (behavior.fill_known_fields) {
        await modal.fillKnownFields();
      }
      await modal.click(action);
      await pause(stepDelayMs, signal);

      if (await modal.hasValidationError()) {
        if (behavior.pause_on_unfilled) {
          await prompter.pause('Validation error. Fill required fields in the modal.');
          lastProgress = now();
        } else if (idleTooLong()) {
          logger.warn('Form is stuck on a validation error. Leaving modal open.');
          return 'timeout';
        }
        continue;
      }

      lastProgress = now();
      continue;
    }

    if (behavior.pause_on_unfilled) {
      await prompter.pause('Please complete this step manually in the modal.', 'Press Enter to re-check...');
      lastProgress = now();
      continue;
    }

    if (idleTooLong()) {
      return 'timeout';
    }
    await pause(pollIntervalMs, signal);
  }
}
