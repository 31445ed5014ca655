import type { Browser } from 'playwright';
import { loadConfig } from './config.js';
import { RunStats } from './types/index.js';
import { logger } from './utils/logger.js';
import { Prompter } from './utils/prompt.js';
import { connectToBrowser, disconnectBrowser, preparePage, waitForJobsPage } from './services/browser.js';
import { applyFilters } from './services/filters.js';
import { LinkedInJobBoard } from './services/job-board.js';
import { completeEasyApply, LinkedInEasyApplyModal } from './services/easy-apply.js';
import { runJobLoop } from './services/job-runner.js';
import { AppliedJobsStore } from './services/state-store.js';

export type RunBotOptions = {
  configPath: string;
  prompter: Prompter;
  signal?: AbortSignal;
  // Defaults to attaching over CDP
  connect?: (cdpUrl: string) => Promise<Browser>;
};

export async function runBot(options: RunBotOptions): Promise<RunStats> {
  const { prompter, signal } = options;
  const connect = options.connect ?? connectToBrowser;

  logger.banner();

  const config = loadConfig(options.configPath);
  logger.info(`Config: ${options.configPath}`);

  const store = await AppliedJobsStore.load(config.state.file);
  logger.info(`State: ${config.state.file} (${store.size} job(s) already handled)`);

  const stats: RunStats = { processed: 0, skippedSeen: 0, outcomes: {} };
  let browser: Browser | null = null;
  let failed = false;
  let saveError: unknown = null;

  try {
    logger.divider('Step 1: Browser');
    browser = await connect(config.browser.cdp_url);

    const page = await waitForJobsPage(browser, config.browser.jobs_url_pattern, prompter, signal);
    if (!page) {
      return stats;
    }
    await preparePage(page, config.browser.default_timeout_ms);

    logger.divider('Step 2: Filters');
    await applyFilters(page, config.filters, config.behavior.typing_delay_ms, prompter);

    logger.divider('Step 3: Job Loop');
    logger.info('Starting job loop. Press Ctrl+C in the terminal to stop.');
    const modal = new LinkedInEasyApplyModal(page, config.answers, config.behavior.typing_delay_ms);
    const result = await runJobLoop({
      board: new LinkedInJobBoard(page),
      store,
      completeApplication: () => completeEasyApply(modal, { behavior: config.behavior, prompter, signal }),
      maxJobs: config.behavior.max_jobs,
      excludeKeywords: config.behavior.exclude_keywords,
      signal,
    });
    Object.assign(stats, result);

    if (signal?.aborted) {
      logger.warn('Stopping...');
    }
    return stats;
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    try {
      await store.save();
    } catch (error) {
      saveError = error;
      logger.error(`Could not save ${config.state.file}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (browser) {
      await disconnectBrowser(browser);
    }
    logger.summary({ ...stats, storedByStatus: store.countByStatus() });
    // The run's own error wins; otherwise a lost save still fails the run
    if (saveError && !failed) {
      throw saveError;
    }
  }
}
