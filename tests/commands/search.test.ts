import { describe, it, expect, vi } from 'vitest';
import type { SearchParams } from '../../src/client/crashStatsClient';
import { runSearch } from '../../src/commands/search';
import { OutputFormat } from '../../src/renderers';

const params: SearchParams = {
  product: 'Firefox',
  days: 7,
  limit: 0,
  facets: ['platform', 'version'],
  facetsSize: 2,
  sort: '-date'
};

describe('search command', () => {
  it('should render a facet-only query', async () => {
    const client = {
      search: vi.fn().mockResolvedValue({
        total: 69146,
        hits: [{ uuid: 'abc-1' }],
        facets: {
          platform: [
            { term: 'Windows NT', count: 60000 },
            { term: 'Linux', count: 5000 },
            { term: 'Mac OS X', count: 4146 }
          ],
          version: [{ term: '131.0', count: 69146 }]
        }
      })
    };
    const now = new Date('2024-10-02T00:00:00Z');

    const output = await runSearch(client, params, OutputFormat.COMPACT, now);

    expect(client.search).toHaveBeenCalledWith(params, now);
    expect(output).toBe(
      [
        'FOUND 69146 crashes',
        '',
        'AGGREGATIONS:',
        '',
        'platform:',
        '  Windows NT (60000)',
        '  Linux (5000)',
        '',
        'version:',
        '  131.0 (69146)',
        ''
      ].join('\n')
    );
  });
});
