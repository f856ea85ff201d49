import type { Summary } from '../types/summary';
import { renderCompact } from './compact';
import { renderMarkdown } from './markdown';
import { renderStructured } from './structured';

export enum OutputFormat {
  COMPACT = 'compact',
  JSON = 'json',
  MARKDOWN = 'markdown'
}

export type Renderer = (summary: Summary) => string;

const RENDERERS: Record<OutputFormat, Renderer> = {
  [OutputFormat.COMPACT]: renderCompact,
  [OutputFormat.JSON]: renderStructured,
  [OutputFormat.MARKDOWN]: renderMarkdown
};

export function parseOutputFormat(value: string): OutputFormat | undefined {
  return Object.values(OutputFormat).find(f => f === value);
}

export function render(format: OutputFormat, summary: Summary): string {
  return RENDERERS[format](summary);
}

export { renderCompact, renderMarkdown, renderStructured };
