import { describe, it, expect } from 'vitest';
import { isCrashPingFacet, matchesFilters, normalizeCrashPings } from '../../src/normalizers/crashPingsNormalizer';
import type { RawCrashPings } from '../../src/types/raw';

// Four pings: three Windows release, one Linux nightly
function pings(): RawCrashPings {
  return {
    crashid: ['id-0', 'id-1', 'id-2', 'id-3'],
    channel: { strings: ['release', 'nightly'], values: [0, 0, 0, 1] },
    process: { strings: ['main', 'content'], values: [0, 1, 1, 0] },
    ipc_actor: { strings: [null, 'windows-file-dialog'], values: [0, 1, 0, 0] },
    version: { strings: ['128.0', '130.0a1'], values: [0, 0, 0, 1] },
    os: { strings: ['Windows', 'Linux'], values: [0, 0, 0, 1] },
    osversion: { strings: ['10.0', '6.8'], values: [0, 0, 0, 1] },
    arch: { strings: ['x86_64', 'aarch64'], values: [0, 0, 1, 0] },
    date: { strings: ['2024-10-01'], values: [0, 0, 0, 0] },
    reason: { strings: [null], values: [0, 0, 0, 0] },
    type: { strings: [null, 'SIGSEGV'], values: [0, 0, 0, 1] },
    build_id: { strings: ['20240930091500', '20241001094000'], values: [0, 0, 0, 1] },
    signature: {
      strings: ['OOM | small', 'mozilla::dom::Foo::Bar', 'shutdownhang | nsThread::Shutdown'],
      values: [0, 1, 1, 2]
    }
  };
}

describe('crashPingsNormalizer', () => {
  describe('matchesFilters', () => {
    it('should compare channel and os case-insensitively', () => {
      expect(matchesFilters(pings(), 0, { channel: 'RELEASE', os: 'windows' })).toBe(true);
      expect(matchesFilters(pings(), 3, { channel: 'release' })).toBe(false);
    });

    it('should compare versions exactly', () => {
      expect(matchesFilters(pings(), 0, { version: '128.0' })).toBe(true);
      expect(matchesFilters(pings(), 0, { version: '128' })).toBe(false);
    });

    it('should match signatures exactly or by substring with a tilde', () => {
      expect(matchesFilters(pings(), 0, { signature: 'OOM | small' })).toBe(true);
      expect(matchesFilters(pings(), 0, { signature: 'oom | small' })).toBe(false);
      expect(matchesFilters(pings(), 1, { signature: '~DOM::FOO' })).toBe(true);
    });
  });

  describe('normalizeCrashPings', () => {
    it('should count facet values sorted by count then label', () => {
      const summary = normalizeCrashPings(pings(), {}, 'signature', 10, '2024-10-01');

      expect(summary).toEqual({
        kind: 'crashPings',
        date: '2024-10-01',
        facet: 'signature',
        total: 4,
        filteredTotal: 4,
        items: [
          { label: 'mozilla::dom::Foo::Bar', count: 2, percentage: 50 },
          { label: 'OOM | small', count: 1, percentage: 25 },
          { label: 'shutdownhang | nsThread::Shutdown', count: 1, percentage: 25 }
        ]
      });
    });

    it('should apply filters before counting', () => {
      const summary = normalizeCrashPings(pings(), { os: 'Windows', signature: '~foo' }, 'arch', 10, '2024-10-01');

      expect(summary.signatureFilter).toBe('~foo');
      expect(summary.total).toBe(4);
      expect(summary.filteredTotal).toBe(2);
      expect(summary.items).toEqual([
        { label: 'aarch64', count: 1, percentage: 50 },
        { label: 'x86_64', count: 1, percentage: 50 }
      ]);
    });

    it('should label null values as (none)', () => {
      const summary = normalizeCrashPings(pings(), {}, 'ipc_actor', 10, '2024-10-01');

      expect(summary.items).toEqual([
        { label: '(none)', count: 3, percentage: 75 },
        { label: 'windows-file-dialog', count: 1, percentage: 25 }
      ]);
    });

    it('should truncate to the limit', () => {
      const summary = normalizeCrashPings(pings(), {}, 'signature', 1, '2024-10-01');

      expect(summary.items.map(i => i.label)).toEqual(['mozilla::dom::Foo::Bar']);
    });

    it('should report zero percentages when nothing matches', () => {
      const summary = normalizeCrashPings(pings(), { channel: 'esr' }, 'signature', 10, '2024-10-01');

      expect(summary.filteredTotal).toBe(0);
      expect(summary.items).toEqual([]);
    });
  });

  it('should recognise only supported facets', () => {
    expect(isCrashPingFacet('build_id')).toBe(true);
    expect(isCrashPingFacet('clientid')).toBe(false);
  });
});
