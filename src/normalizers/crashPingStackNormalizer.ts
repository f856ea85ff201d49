import type { RawCrashPingFrame, RawCrashPingStack } from '../types/raw';
import type { CrashPingStackSummary, StackFrame } from '../types/summary';
import { assignPresent, present } from '../utils/fields';
import { resolveFunctionName } from './crashNormalizer';

function mapFrame(raw: RawCrashPingFrame, index: number): StackFrame {
  const frame: StackFrame = { index, function: resolveFunctionName(raw) };
  assignPresent(frame, 'file', raw.file);
  assignPresent(frame, 'line', raw.line);
  assignPresent(frame, 'module', raw.module);
  assignPresent(frame, 'offset', raw.offset);
  return frame;
}

export function normalizeCrashPingStack(raw: RawCrashPingStack, crashId: string, date: string): CrashPingStackSummary {
  const summary: CrashPingStackSummary = {
    kind: 'crashPingStack',
    crashId,
    date,
    frames: (raw.stack ?? []).map(mapFrame)
  };
  if (present(raw.java_exception)) {
    summary.javaException = raw.java_exception;
  }
  return summary;
}
