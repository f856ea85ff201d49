import { z } from 'zod';

// Raw payload shapes as returned by the crash reporting services.
// z.object() strips unknown keys on parse, so anything not named here
// (user comments, emails, URLs, client ids, minidump hashes...) never
// makes it past the fetch boundary.

const optionalString = z.string().nullish();

// Some identifiers (build ids, facet terms) arrive as either strings or numbers
const stringOrNumber = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(v => (v === null || v === undefined ? undefined : String(v)));

const optionalIndex = z.number().nullish();

export const rawStackFrameSchema = z.object({
  frame: z.number().nullish(),
  function: optionalString,
  file: optionalString,
  line: z.number().nullish(),
  module: optionalString,
  offset: optionalString
});

export const rawThreadSchema = z.object({
  thread: optionalIndex,
  thread_name: optionalString,
  frames: z.array(rawStackFrameSchema).nullish()
});

export const rawCrashInfoSchema = z.object({
  type: optionalString,
  address: optionalString,
  crashing_thread: optionalIndex
});

export const rawJsonDumpSchema = z.object({
  crashing_thread: optionalIndex,
  crash_info: rawCrashInfoSchema.nullish(),
  threads: z.array(rawThreadSchema).nullish()
});

export const rawCrashRecordSchema = z.object({
  uuid: z.string(),
  signature: optionalString,
  product: optionalString,
  version: optionalString,
  os_name: optionalString,
  os_version: optionalString,
  build: stringOrNumber,
  release_channel: optionalString,
  moz_crash_reason: optionalString,
  abort_message: optionalString,
  android_model: optionalString,
  android_version: optionalString,
  crashing_thread: optionalIndex,
  crash_info: rawCrashInfoSchema.nullish(),
  threads: z.array(rawThreadSchema).nullish(),
  json_dump: rawJsonDumpSchema.nullish()
});

export const rawCrashHitSchema = z.object({
  uuid: z.string(),
  date: optionalString,
  signature: optionalString,
  product: optionalString,
  version: optionalString,
  platform: optionalString,
  platform_version: optionalString,
  build_id: stringOrNumber,
  release_channel: optionalString
});

export const rawFacetBucketSchema = z.object({
  term: z.union([z.string(), z.number(), z.boolean()]).transform(String),
  count: z.number()
});

export const rawSearchResponseSchema = z.object({
  total: z.number(),
  hits: z.array(rawCrashHitSchema).default([]),
  facets: z.record(z.array(rawFacetBucketSchema)).default({})
});

export const rawCorrelationTotalsSchema = z.object({
  date: z.string(),
  release: z.number(),
  beta: z.number(),
  nightly: z.number(),
  esr: z.number()
});

const correlationItemSchema = z.record(z.unknown());

export const rawCorrelationPriorSchema = z.object({
  item: correlationItemSchema,
  count_reference: z.number(),
  count_group: z.number(),
  total_reference: z.number(),
  total_group: z.number()
});

export const rawCorrelationResultSchema = z.object({
  item: correlationItemSchema,
  count_reference: z.number(),
  count_group: z.number(),
  prior: rawCorrelationPriorSchema.nullish()
});

export const rawCorrelationResponseSchema = z.object({
  total: z.number(),
  results: z.array(rawCorrelationResultSchema).default([])
});

const indexedStringsSchema = z.object({
  strings: z.array(z.string()),
  values: z.array(z.number())
});

const nullableIndexedStringsSchema = z.object({
  strings: z.array(z.string().nullable()),
  values: z.array(z.number())
});

// Crash pings come as struct-of-arrays with per-column string deduplication
export const rawCrashPingsSchema = z.object({
  crashid: z.array(z.string()),
  channel: indexedStringsSchema,
  process: indexedStringsSchema,
  ipc_actor: nullableIndexedStringsSchema,
  version: indexedStringsSchema,
  os: indexedStringsSchema,
  osversion: indexedStringsSchema,
  arch: indexedStringsSchema,
  date: indexedStringsSchema,
  reason: nullableIndexedStringsSchema,
  type: nullableIndexedStringsSchema,
  build_id: indexedStringsSchema,
  signature: indexedStringsSchema
});

export const rawCrashPingFrameSchema = z.object({
  function: optionalString,
  file: optionalString,
  line: z.number().nullish(),
  module: optionalString,
  offset: optionalString
});

// Symbolicated on the server; Java crashes carry the exception instead of native frames
export const rawCrashPingStackSchema = z.object({
  stack: z.array(rawCrashPingFrameSchema).nullish(),
  java_exception: z.unknown()
});

export type RawStackFrame = z.infer<typeof rawStackFrameSchema>;
export type RawThread = z.infer<typeof rawThreadSchema>;
export type RawCrashInfo = z.infer<typeof rawCrashInfoSchema>;
export type RawCrashRecord = z.infer<typeof rawCrashRecordSchema>;
export type RawCrashHit = z.infer<typeof rawCrashHitSchema>;
export type RawFacetBucket = z.infer<typeof rawFacetBucketSchema>;
export type RawSearchResponse = z.infer<typeof rawSearchResponseSchema>;
export type RawCorrelationTotals = z.infer<typeof rawCorrelationTotalsSchema>;
export type RawCorrelationPrior = z.infer<typeof rawCorrelationPriorSchema>;
export type RawCorrelationResult = z.infer<typeof rawCorrelationResultSchema>;
export type RawCorrelationResponse = z.infer<typeof rawCorrelationResponseSchema>;
export type RawCrashPings = z.infer<typeof rawCrashPingsSchema>;
export type RawCrashPingFrame = z.infer<typeof rawCrashPingFrameSchema>;
export type RawCrashPingStack = z.infer<typeof rawCrashPingStackSchema>;
export type IndexedStrings = z.infer<typeof indexedStringsSchema>;
export type NullableIndexedStrings = z.infer<typeof nullableIndexedStringsSchema>;
