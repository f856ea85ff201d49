import type {
  CorrelationSummary,
  CrashPingStackSummary,
  CrashPingsSummary,
  CrashSummary,
  SearchResultSet
} from '../../src/types/summary';

export const crashSummary: CrashSummary = {
  kind: 'crash',
  crashId: '7d4f2a10-3c5e-4b8a-9f21-0a1b2c3d4e5f',
  signature: 'OOM | small',
  reason: 'EXCEPTION_ACCESS_VIOLATION_READ',
  address: '0x0',
  product: 'Firefox',
  version: '128.0',
  osName: 'Windows NT',
  osVersion: '10.0.19045',
  buildId: '20240701123456',
  releaseChannel: 'release',
  crashingThread: 0,
  allThreads: false,
  threads: [
    {
      index: 0,
      label: 'GeckoMain',
      name: 'GeckoMain',
      crashing: true,
      frames: [
        { index: 0, function: 'mozalloc_abort', file: 'memory/mozalloc/mozalloc_abort.cpp', line: 33 },
        { index: 1, function: '0x1a2b (xul.dll)', module: 'xul.dll', offset: '0x1a2b' }
      ]
    }
  ]
};

export const searchResult: SearchResultSet = {
  kind: 'search',
  total: 2,
  rows: [
    {
      crashId: 'abc-1',
      date: '2024-07-02',
      signature: 'OOM | small',
      product: 'Firefox',
      version: '128.0',
      platform: 'Windows NT',
      releaseChannel: 'release'
    },
    { crashId: 'abc-2' }
  ],
  facets: {
    platform: [
      { term: 'Windows NT', count: 2 },
      { term: 'Linux', count: 1 }
    ],
    cpu_arch: []
  }
};

export const correlationSummary: CorrelationSummary = {
  kind: 'correlations',
  signature: 'OOM | small',
  channel: 'release',
  date: '2024-07-01',
  groupTotal: 200,
  referenceTotal: 1000,
  groups: [
    {
      attribute: 'platform',
      items: [
        {
          value: 'Windows',
          label: 'platform = Windows',
          groupCount: 50,
          referenceCount: 100,
          groupPercentage: 25,
          referencePercentage: 10,
          prior: { label: 'cpu = x86', groupPercentage: 12.5, referencePercentage: 3 }
        }
      ]
    }
  ]
};

export const crashPingsSummary: CrashPingsSummary = {
  kind: 'crashPings',
  date: '2024-10-01',
  facet: 'signature',
  signatureFilter: '~oom',
  total: 4,
  filteredTotal: 2,
  items: [{ label: 'OOM | small', count: 2, percentage: 100 }]
};

export const crashPingStackSummary: CrashPingStackSummary = {
  kind: 'crashPingStack',
  crashId: '5b1d0c2e-7f3a-4e21-8c9d-112233445566',
  date: '2024-10-01',
  frames: [
    { index: 0, function: 'mozilla::ipc::FatalError', file: 'ipc/glue/ProtocolUtils.cpp', line: 120 },
    { index: 1, function: '0x4f2a10 (libxul.so)', module: 'libxul.so', offset: '0x4f2a10' }
  ],
  javaException: { type: 'IllegalStateException', message: 'bad state' }
};
