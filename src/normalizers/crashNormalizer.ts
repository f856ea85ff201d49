import type { RawCrashRecord, RawStackFrame, RawThread } from '../types/raw';
import type { CrashSummary, CrashingThread, StackFrame, ThreadSummary } from '../types/summary';
import { assignPresent, clampCount, present } from '../utils/fields';

type CrashingThreadExtractor = (raw: RawCrashRecord) => number | null | undefined;

// Locations of the crashing thread index, in priority order. The field moved
// around between processor versions.
const CRASHING_THREAD_EXTRACTORS: CrashingThreadExtractor[] = [
  raw => raw.crashing_thread,
  raw => raw.crash_info?.crashing_thread,
  raw => raw.json_dump?.crashing_thread
];

const UNKNOWN_FUNCTION = '???';

function isThreadIndex(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function findCrashingThread(raw: RawCrashRecord): CrashingThread {
  for (const extract of CRASHING_THREAD_EXTRACTORS) {
    const value = extract(raw);
    if (isThreadIndex(value)) return value;
  }
  return 'unknown';
}

// Shared by every stack display: crash reports and crash-ping stacks
export function resolveFunctionName(frame: Pick<RawStackFrame, 'function' | 'offset' | 'module'>): string {
  if (present(frame.function)) return frame.function;

  const parts: string[] = [];
  if (present(frame.offset)) parts.push(frame.offset);
  if (present(frame.module)) parts.push(`(${frame.module})`);
  return parts.length > 0 ? parts.join(' ') : UNKNOWN_FUNCTION;
}

function mapFrame(raw: RawStackFrame, position: number): StackFrame {
  const frame: StackFrame = {
    index: isThreadIndex(raw.frame) ? raw.frame : position,
    function: resolveFunctionName(raw)
  };
  assignPresent(frame, 'file', raw.file);
  assignPresent(frame, 'line', raw.line);
  assignPresent(frame, 'module', raw.module);
  assignPresent(frame, 'offset', raw.offset);
  return frame;
}

function summarizeThread(thread: RawThread, position: number, depth: number, crashing: boolean): ThreadSummary {
  const name = thread.thread_name;
  const summary: ThreadSummary = {
    index: position,
    label: present(name) && name.length > 0 ? name : `thread ${position}`,
    crashing,
    frames: (thread.frames ?? []).slice(0, depth).map(mapFrame)
  };
  assignPresent(summary, 'name', name);
  return summary;
}

function selectThreads(
  threads: RawThread[],
  crashingThread: CrashingThread,
  depth: number,
  allThreads: boolean
): ThreadSummary[] {
  if (allThreads) {
    return threads.map((thread, i) => summarizeThread(thread, i, depth, i === crashingThread));
  }

  if (crashingThread !== 'unknown') {
    const thread = threads[crashingThread];
    if (thread) return [summarizeThread(thread, crashingThread, depth, true)];
  }

  // No usable crashing thread: show the first one, unflagged
  const first = threads[0];
  return first ? [summarizeThread(first, 0, depth, false)] : [];
}

export function normalizeCrash(raw: RawCrashRecord, depth: number, allThreads: boolean): CrashSummary {
  const crashingThread = findCrashingThread(raw);
  const threads = raw.threads ?? raw.json_dump?.threads ?? [];
  const crashInfo = raw.crash_info ?? raw.json_dump?.crash_info;

  const summary: CrashSummary = {
    kind: 'crash',
    crashId: raw.uuid,
    crashingThread,
    allThreads,
    threads: selectThreads(threads, crashingThread, clampCount(depth), allThreads)
  };

  assignPresent(summary, 'signature', raw.signature);
  assignPresent(summary, 'reason', crashInfo?.type);
  assignPresent(summary, 'address', crashInfo?.address);
  assignPresent(summary, 'crashReason', raw.moz_crash_reason);
  assignPresent(summary, 'abortMessage', raw.abort_message);
  assignPresent(summary, 'product', raw.product);
  assignPresent(summary, 'version', raw.version);
  assignPresent(summary, 'buildId', raw.build);
  assignPresent(summary, 'releaseChannel', raw.release_channel);
  assignPresent(summary, 'osName', raw.os_name);
  assignPresent(summary, 'osVersion', raw.os_version);
  assignPresent(summary, 'androidModel', raw.android_model);
  assignPresent(summary, 'androidVersion', raw.android_version);

  return summary;
}
