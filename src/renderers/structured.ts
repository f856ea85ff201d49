import type { Summary } from '../types/summary';

// Lossless: JSON.parse of the output equals the summary. Absent fields are
// absent keys in the summary, so they are absent here too.
export function renderStructured(summary: Summary): string {
  return `${JSON.stringify(summary, null, 2)}\n`;
}
