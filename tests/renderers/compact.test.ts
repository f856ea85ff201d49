import { describe, it, expect } from 'vitest';
import { formatCorrelations, formatCrash, formatCrashPingStack, formatCrashPings, formatSearch } from '../../src/renderers/compact';
import { correlationSummary, crashPingStackSummary, crashPingsSummary, crashSummary, searchResult } from './fixtures';

describe('compact renderer', () => {
  describe('formatCrash', () => {
    it('should render present fields and the crashing stack', () => {
      expect(formatCrash(crashSummary)).toBe(
        [
          'CRASH 7d4f2a10-3c5e-4b8a-9f21-0a1b2c3d4e5f',
          'sig: OOM | small',
          'reason: EXCEPTION_ACCESS_VIOLATION_READ @ 0x0 (null ptr)',
          'product: Firefox 128.0',
          'platform: Windows NT 10.0.19045',
          'build: 20240701123456',
          'channel: release',
          '',
          'stack[GeckoMain] [CRASHING]:',
          '  #0 mozalloc_abort @ memory/mozalloc/mozalloc_abort.cpp:33',
          '  #1 0x1a2b (xul.dll)',
          ''
        ].join('\n')
      );
    });

    it('should render a bare crash with no threads', () => {
      const output = formatCrash({ kind: 'crash', crashId: 'abc', crashingThread: 'unknown', allThreads: false, threads: [] });

      expect(output).toBe('CRASH abc\n');
    });

    it('should include the device on android crashes', () => {
      const output = formatCrash({
        kind: 'crash',
        crashId: 'abc',
        osName: 'Android',
        osVersion: '34',
        androidModel: 'Pixel 7',
        androidVersion: '14',
        crashingThread: 'unknown',
        allThreads: false,
        threads: []
      });

      expect(output.split('\n')[1]).toBe('platform: Android 34, Pixel 7 14');
    });

    it('should print the address on its own line when there is no reason', () => {
      const output = formatCrash({
        kind: 'crash',
        crashId: 'abc',
        address: '0x0',
        crashingThread: 'unknown',
        allThreads: false,
        threads: []
      });

      expect(output).toBe('CRASH abc\naddress: 0x0 (null ptr)\n');
    });

    it('should print a file without a line', () => {
      const output = formatCrash({
        kind: 'crash',
        crashId: 'abc',
        crashingThread: 'unknown',
        allThreads: false,
        threads: [{ index: 0, label: 'thread 0', crashing: false, frames: [{ index: 4, function: 'f', file: 'a.rs' }] }]
      });

      expect(output).toBe('CRASH abc\n\nstack[thread 0]:\n  #4 f @ a.rs\n');
    });
  });

  describe('formatSearch', () => {
    it('should render rows and aggregations', () => {
      expect(formatSearch(searchResult)).toBe(
        [
          'FOUND 2 crashes',
          '',
          'abc-1 | 2024-07-02 | Firefox 128.0 | Windows NT | release | - | OOM | small',
          'abc-2 | - | - | - | - | - | -',
          '',
          'AGGREGATIONS:',
          '',
          'platform:',
          '  Windows NT (2)',
          '  Linux (1)',
          '',
          'cpu_arch:',
          ''
        ].join('\n')
      );
    });

    it('should keep column positions when middle cells are absent', () => {
      const output = formatSearch({
        kind: 'search',
        total: 1,
        rows: [{ crashId: 'abc-3', releaseChannel: 'beta', signature: 'shutdownhang' }],
        facets: {}
      });

      expect(output).toBe('FOUND 1 crashes\n\nabc-3 | - | - | - | beta | - | shutdownhang\n');
    });

    it('should render an empty result set', () => {
      expect(formatSearch({ kind: 'search', total: 0, rows: [], facets: {} })).toBe('FOUND 0 crashes\n');
    });
  });

  it('should render correlations with priors', () => {
    expect(formatCorrelations(correlationSummary)).toBe(
      [
        'CORRELATIONS OOM | small',
        'channel: release date: 2024-07-01',
        'sig_count: 200 ref_count: 1000',
        '',
        'platform:',
        '  25.0% vs 10.0% Windows',
        '    prior cpu = x86: 12.5% vs 3.0%',
        ''
      ].join('\n')
    );
  });

  it('should render crash ping aggregates', () => {
    expect(formatCrashPings(crashPingsSummary)).toBe(
      ['CRASH PINGS 2024-10-01', 'sig: ~oom', 'total: 4 matched: 2', '', 'signature:', '  2 (100.0%) OOM | small', ''].join(
        '\n'
      )
    );
  });

  describe('formatCrashPingStack', () => {
    it('should render the frames and the java exception', () => {
      expect(formatCrashPingStack(crashPingStackSummary)).toBe(
        [
          'CRASH PING 5b1d0c2e-7f3a-4e21-8c9d-112233445566',
          'date: 2024-10-01',
          '',
          'stack:',
          '  #0 mozilla::ipc::FatalError @ ipc/glue/ProtocolUtils.cpp:120',
          '  #1 0x4f2a10 (libxul.so)',
          '',
          'java_exception:',
          '{',
          '  "type": "IllegalStateException",',
          '  "message": "bad state"',
          '}',
          ''
        ].join('\n')
      );
    });

    it('should print a string exception as-is and skip an empty stack', () => {
      const summary = { ...crashPingStackSummary, frames: [], javaException: 'java.lang.OutOfMemoryError' };

      expect(formatCrashPingStack(summary)).toBe(
        'CRASH PING 5b1d0c2e-7f3a-4e21-8c9d-112233445566\ndate: 2024-10-01\n\njava_exception:\njava.lang.OutOfMemoryError\n'
      );
    });
  });
});
