import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach } from 'vitest';
import { ApplyOutcome } from '../../src/types/index.js';
import { matchesExcluded, runJobLoop } from '../../src/services/job-runner.js';
import { AppliedJobsStore } from '../../src/services/state-store.js';
import { FakeJobBoard } from '../helpers/fakes.js';

let file: string;

beforeEach(async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'easy-apply-loop-'));
  file = path.join(dir, 'applied.json');
});

const engineer = (id: string | null) => ({ id, title: `Engineer ${id ?? '?'}`, company: 'Acme' });

async function storedIds(): Promise<string[]> {
  const parsed: { jobs: Record<string, unknown> } = JSON.parse(await fs.readFile(file, 'utf8'));
  return Object.keys(parsed.jobs);
}

function submitting(): { calls: number; run: () => Promise<ApplyOutcome> } {
  const counter = {
    calls: 0,
    run: async (): Promise<ApplyOutcome> => {
      counter.calls++;
      return 'submitted';
    },
  };
  return counter;
}

describe('runJobLoop', () => {
  it('skips ids already in the store and records the rest', async () => {
    const store = await AppliedJobsStore.load(file);
    store.record('1', { status: 'submitted', title: 'Old', company: 'Acme', url: null });

    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer('1'), engineer('2'), engineer('3')]], () => controller.abort());
    const apply = submitting();

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: apply.run,
      signal: controller.signal,
      settleDelayMs: 0,
    });

    expect(board.opened).toEqual(['2', '3']);
    expect(apply.calls).toBe(2);
    expect(stats).toEqual({ processed: 2, skippedSeen: 1, outcomes: { submitted: 2 } });
    expect((await storedIds()).sort()).toEqual(['1', '2', '3']);
  });

  it('does not reopen or rewrite jobs that reappear after scrolling', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer('1'), engineer('2')], [engineer('3')]], (calls) => {
      if (calls === 2) controller.abort();
    });

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: submitting().run,
      signal: controller.signal,
      settleDelayMs: 0,
    });

    expect(board.opened).toEqual(['1', '2', '3']);
    expect(stats.processed).toBe(3);
    expect(stats.skippedSeen).toBe(0);
    expect((await storedIds()).sort()).toEqual(['1', '2', '3']);
  });

  it('records jobs without an Easy Apply button and moves on', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[{ ...engineer('5'), easyApply: false }]], () => controller.abort());
    const apply = submitting();

    await runJobLoop({ board, store, completeApplication: apply.run, signal: controller.signal, settleDelayMs: 0 });

    expect(apply.calls).toBe(0);
    expect(store.get('5')).toMatchObject({
      status: 'skipped_no_easy_apply',
      title: 'Engineer 5',
      company: 'Acme',
      url: 'https://www.linkedin.com/jobs/view/5/',
    });
  });

  it('records excluded jobs without opening Easy Apply', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard(
      [[{ id: '8', title: 'Software Engineering Intern', company: 'Acme' }, engineer('9')]],
      () => controller.abort()
    );
    const apply = submitting();

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: apply.run,
      excludeKeywords: ['intern'],
      signal: controller.signal,
      settleDelayMs: 0,
    });

    expect(apply.calls).toBe(1);
    expect(store.get('8')?.status).toBe('skipped_excluded');
    expect(stats.outcomes).toEqual({ skipped_excluded: 1, submitted: 1 });
  });

  it('stops after max_jobs records', async () => {
    const store = await AppliedJobsStore.load(file);
    const board = new FakeJobBoard([[engineer('1'), engineer('2'), engineer('3')]]);

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: submitting().run,
      maxJobs: 2,
      settleDelayMs: 0,
    });

    expect(board.opened).toEqual(['1', '2']);
    expect(board.loadMoreCalls).toBe(0);
    expect(stats.processed).toBe(2);
  });

  it('leaves an interrupted job unrecorded', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer('1'), engineer('2')]]);

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: async () => {
        controller.abort();
        return 'interrupted';
      },
      signal: controller.signal,
      settleDelayMs: 0,
    });

    expect(board.opened).toEqual(['1']);
    expect(store.has('1')).toBe(false);
    expect(stats.processed).toBe(0);
  });

  it('gives cards without an id a positional id', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer(null)]], () => controller.abort());

    await runJobLoop({
      board,
      store,
      completeApplication: submitting().run,
      signal: controller.signal,
      settleDelayMs: 0,
      now: () => new Date(1_700_000_000_000),
    });

    expect(store.ids()).toEqual(['idx-0-1700000000']);
  });

  it('skips a card it cannot open without recording it', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer('1')]], () => controller.abort());
    board.openCard = async (card) => {
      board.opened.push(card.id);
      return false;
    };

    const stats = await runJobLoop({
      board,
      store,
      completeApplication: submitting().run,
      signal: controller.signal,
      settleDelayMs: 0,
    });

    expect(store.size).toBe(0);
    expect(stats.processed).toBe(0);
  });

  it('waits and looks again when the list is empty', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([]);
    let lists = 0;
    board.listCards = async () => {
      lists++;
      if (lists === 3) controller.abort();
      return [];
    };

    await runJobLoop({
      board,
      store,
      completeApplication: submitting().run,
      signal: controller.signal,
      settleDelayMs: 0,
      emptyListDelayMs: 0,
    });

    expect(lists).toBe(3);
    expect(board.loadMoreCalls).toBe(0);
  });

  it('does not open the next card while a timed-out modal is still on screen', async () => {
    const store = await AppliedJobsStore.load(file);
    const controller = new AbortController();
    const board = new FakeJobBoard([[engineer('1'), engineer('2')]], () => controller.abort());
    let blockedChecks = 0;
    board.hasOpenDialog = async () => {
      if (!board.dialogOpen) return false;
      blockedChecks++;
      // The user closes it while the loop waits
      board.dialogOpen = false;
      return true;
    };
    const outcomes: ApplyOutcome[] = ['timeout', 'submitted'];
    const completeApplication = async (): Promise<ApplyOutcome> => {
      const outcome = outcomes.shift() ?? 'submitted';
      if (outcome === 'timeout') board.dialogOpen = true;
      return outcome;
    };

    const stats = await runJobLoop({
      board,
      store,
      completeApplication,
      signal: controller.signal,
      settleDelayMs: 0,
      emptyListDelayMs: 0,
    });

    expect(blockedChecks).toBe(1);
    expect(board.opened).toEqual(['1', '2']);
    expect(store.get('1')?.status).toBe('timeout');
    expect(store.get('2')?.status).toBe('submitted');
    expect(stats).toEqual({ processed: 2, skippedSeen: 0, outcomes: { timeout: 1, submitted: 1 } });
    expect(board.loadMoreCalls).toBe(1);
  });
});

describe('matchesExcluded', () => {
  it('checks title and company case-insensitively', () => {
    expect(matchesExcluded({ title: 'Senior Engineer', company: 'Staffing Recruiters Ltd' }, ['recruiter'])).toBe(
      'recruiter'
    );
    expect(matchesExcluded({ title: 'INTERN', company: null }, ['intern'])).toBe('intern');
    expect(matchesExcluded({ title: 'Engineer', company: 'Acme' }, ['intern'])).toBeNull();
  });
});
