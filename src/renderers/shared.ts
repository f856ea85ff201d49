import type { StackFrame } from '../types/summary';

const NULL_ADDRESSES = ['0x0', '0'];

export function formatFrame(frame: StackFrame): string {
  let location = '';
  if (frame.file !== undefined) {
    location = frame.line !== undefined ? ` @ ${frame.file}:${frame.line}` : ` @ ${frame.file}`;
  }
  return `#${frame.index} ${frame.function}${location}`;
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function isNullAddress(address: string): boolean {
  return NULL_ADDRESSES.includes(address);
}

// Joins the defined, non-empty parts with a separator
export function joinPresent(parts: (string | undefined)[], separator = ' '): string {
  return parts.filter((p): p is string => p !== undefined && p !== '').join(separator);
}

// Java exceptions arrive as free-form JSON; plain strings print as-is
export function formatJavaException(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value, null, 2);
}
