import { describe, it, expect } from 'vitest';
import { applyFilters, escapeRegExp, locationCandidates, plannedFilters } from '../../src/services/filters.js';
import { SELECTORS } from '../../src/services/selectors.js';
import { RecordingPrompter } from '../helpers/fakes.js';
import { type LocatorStub, locatorStub, pageStub, roleKey } from '../helpers/playwright-stubs.js';

describe('locationCandidates', () => {
  it('tries the location as written', () => {
    expect(locationCandidates('Berlin, Germany')).toEqual(['Berlin, Germany']);
  });

  it('adds the other spelling of Türkiye', () => {
    expect(locationCandidates('Türkiye')).toEqual(['Türkiye', 'Turkey']);
    expect(locationCandidates('turkiye')).toEqual(['turkiye', 'Turkey']);
    expect(locationCandidates('Turkey')).toEqual(['Turkey', 'Türkiye']);
  });
});

describe('plannedFilters', () => {
  it('skips filters that are not configured', () => {
    expect(plannedFilters({})).toEqual([]);
    expect(plannedFilters({ easy_apply: false, location: '' })).toEqual([]);
  });

  it('resets distance only when the key is present', () => {
    expect(plannedFilters({ distance: '' })).toEqual(['distance']);
    expect(plannedFilters({ distance: null })).toEqual(['distance']);
    expect(plannedFilters({ location: 'Istanbul' })).toEqual(['location']);
  });

  it('orders location, distance, date posted, Easy Apply', () => {
    expect(
      plannedFilters({ easy_apply: true, time_posted: 'Past 24 hours', distance: '25 mi', location: 'Austin' })
    ).toEqual(['location', 'distance', 'time_posted', 'easy_apply']);
  });
});

describe('escapeRegExp', () => {
  it('escapes regex metacharacters', () => {
    expect(escapeRegExp('Past 24 hours (new)')).toBe('Past 24 hours \\(new\\)');
    expect(new RegExp(escapeRegExp('C++ developer')).test('Senior C++ developer')).toBe(true);
  });
});

describe('applyFilters', () => {
  it('collects every failed filter and asks for them once', async () => {
    const { page } = pageStub({
      getByRole: () =>
        locatorStub({
          click: async () => {
            throw new Error('Timeout 5000ms exceeded.');
          },
        }),
    });
    const prompter = new RecordingPrompter();

    const failures = await applyFilters(page, { location: 'Berlin', time_posted: 'Past week' }, 0, prompter);

    expect(failures).toEqual(['location (Location input not found)', 'time_posted (Timeout 5000ms exceeded.)']);
    expect(prompter.pauses).toEqual([{ message: 'Please set these filters manually in the browser.' }]);
  });

  it('does not stop the run when nothing is configured', async () => {
    const { page } = pageStub();
    const prompter = new RecordingPrompter();

    expect(await applyFilters(page, {}, 0, prompter)).toEqual([]);
    expect(prompter.pauses).toEqual([]);
  });

  it('falls back to All filters when the Easy Apply pill cannot be clicked', async () => {
    const events: string[] = [];
    const roles: Record<string, LocatorStub> = {
      [roleKey('button', { name: /^Easy Apply$/i })]: locatorStub({
        count: async () => 1,
        getAttribute: async () => 'false',
        click: async () => {
          events.push('pill');
          throw new Error('Element is not attached to the DOM');
        },
      }),
      [roleKey('button', { name: /All filters/i })]: locatorStub({
        click: async () => {
          events.push('all filters');
        },
      }),
      [roleKey('checkbox', { name: /Easy Apply/i })]: locatorStub({
        count: async () => 1,
        check: async () => {
          events.push('check');
        },
      }),
      [roleKey('button', { name: /Show results|Apply/i })]: locatorStub({
        click: async () => {
          events.push('show results');
        },
      }),
    };
    const { page } = pageStub({ getByRole: (role, options) => roles[roleKey(role, options)] ?? locatorStub() });
    const prompter = new RecordingPrompter();

    const failures = await applyFilters(page, { easy_apply: true }, 0, prompter);

    expect(failures).toEqual([]);
    expect(events).toEqual(['pill', 'all filters', 'check', 'show results']);
    expect(prompter.pauses).toEqual([]);
  });

  it('keeps clearing the location when one select-all shortcut fails', async () => {
    const keys: string[] = [];
    const typed: string[] = [];
    const input = locatorStub({
      count: async () => 1,
      press: async (key) => {
        keys.push(key);
        if (key === 'Meta+A') throw new Error('Unknown key: "Meta"');
      },
      pressSequentially: async (text) => {
        typed.push(text);
      },
    });
    const { page } = pageStub({
      locator: (selector) => (selector === SELECTORS.locationInputs[0] ? input : locatorStub()),
    });
    const prompter = new RecordingPrompter();

    const failures = await applyFilters(page, { location: 'Berlin' }, 0, prompter);

    expect(failures).toEqual([]);
    expect(keys).toEqual(['Meta+A', 'Control+A', 'Backspace', 'Enter']);
    expect(typed).toEqual(['Berlin']);
  });
});
