import { HUMAN_CONFIG } from '../config.js';
import { ApplyOutcome, JobBoard, JobDetails, RunStats } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { pause } from '../utils/human.js';
import { AppliedJobsStore } from './state-store.js';

export interface JobLoopOptions {
  board: JobBoard;
  store: AppliedJobsStore;
  // Runs once the Easy Apply modal is open
  completeApplication: () => Promise<ApplyOutcome>;
  maxJobs?: number;
  excludeKeywords?: readonly string[];
  signal?: AbortSignal;
  settleDelayMs?: number;
  emptyListDelayMs?: number;
  now?: () => Date;
}

export function matchesExcluded(details: Pick<JobDetails, 'title' | 'company'>, keywords: readonly string[]): string | null {
  const haystack = `${details.title ?? ''}\n${details.company ?? ''}`.toLowerCase();
  for (const keyword of keywords) {
    if (haystack.includes(keyword.toLowerCase())) {
      return keyword;
    }
  }
  return null;
}

/**
 * Walks the search results until aborted (or `maxJobs` jobs were recorded),
 * skipping ids already in the store. Every recorded job is written back
 * immediately so an interrupted run loses at most the job in progress.
 */
export async function runJobLoop(options: JobLoopOptions): Promise<RunStats> {
  const { board, store, signal } = options;
  const maxJobs = options.maxJobs ?? 0;
  const excludeKeywords = options.excludeKeywords ?? [];
  const settleDelayMs = options.settleDelayMs ?? HUMAN_CONFIG.cardSettleDelay;
  const emptyListDelayMs = options.emptyListDelayMs ?? HUMAN_CONFIG.emptyListDelay;
  const now = options.now ?? (() => new Date());

  const seen = new Set(store.ids());
  const handledBefore = new Set(seen);
  const countedSeen = new Set<string>();
  const stats: RunStats = { processed: 0, skippedSeen: 0, outcomes: {} };

  const limitReached = () => maxJobs > 0 && stats.processed >= maxJobs;

  const record = async (jobId: string, status: string, details: JobDetails) => {
    store.record(jobId, { status, title: details.title, company: details.company, url: details.url }, now());
    await store.save();
    seen.add(jobId);
    stats.processed++;
    stats.outcomes[status] = (stats.outcomes[status] ?? 0) + 1;
    logger.application(details.title ?? jobId, status);
  };

  while (!signal?.aborted && !limitReached()) {
    const cards = await board.listCards();
    if (cards.length === 0) {
      logger.warn('No job cards found. Make sure the Jobs search results list is visible.');
      await pause(emptyListDelayMs, signal);
      continue;
    }

    let blocked = false;
    for (const card of cards) {
      if (signal?.aborted || limitReached()) break;

      const jobId = card.id ?? `idx-${card.index}-${Math.floor(now().getTime() / 1000)}`;
      if (seen.has(jobId)) {
        // Count ids from earlier runs once, however many passes see them again
        if (handledBefore.has(jobId) && !countedSeen.has(jobId)) {
          countedSeen.add(jobId);
          stats.skippedSeen++;
        }
        continue;
      }

      // A modal left open (timed out) would swallow the click and the next
      // job would be recorded with the old application's outcome
      if (await board.hasOpenDialog()) {
        logger.warn('An Easy Apply modal is still open. Close it in the browser to continue.');
        blocked = true;
        break;
      }

      if (!(await board.openCard(card))) {
        continue;
      }
      await pause(settleDelayMs, signal);
      if (signal?.aborted) break;

      const details = await board.readDetails();
      logger.job(`${details.title ?? 'Untitled'} at ${details.company ?? 'unknown company'} (${jobId})`);

      const excluded = matchesExcluded(details, excludeKeywords);
      if (excluded) {
        logger.debug(`Excluded by keyword "${excluded}"`);
        await record(jobId, 'skipped_excluded', details);
        continue;
      }

      const opened = await board.openEasyApply();
      if (opened === 'missing') {
        await record(jobId, 'skipped_no_easy_apply', details);
        continue;
      }
      if (opened === 'failed') {
        continue;
      }

      await pause(settleDelayMs, signal);
      logger.application(details.title ?? jobId, 'applying');
      const outcome = await options.completeApplication();
      if (outcome === 'interrupted') {
        logger.warn('Interrupted before this job finished; it will come up again next run.');
        break;
      }

      await record(jobId, outcome, details);
    }

    if (signal?.aborted || limitReached()) break;
    if (blocked) {
      await pause(emptyListDelayMs, signal);
      continue;
    }

    await board.loadMore();
    await pause(settleDelayMs, signal);
  }

  if (limitReached()) {
    logger.info(`Reached max_jobs (${maxJobs})`);
  }
  return stats;
}
