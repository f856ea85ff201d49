// Helpers shared by the normalizers for copying loosely-typed raw values.

export function present<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

// Sets target[key] only when the raw value exists, so absent fields stay absent keys
export function assignPresent<T extends object, K extends keyof T>(target: T, key: K, value: T[K] | null | undefined): void {
  if (value !== null && value !== undefined) {
    target[key] = value;
  }
}

// Truncation sizes are non-negative integers; anything else is clamped
export function clampCount(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.floor(value);
}

export function percentage(count: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((count / total) * 1000) / 10;
}
