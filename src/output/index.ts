import type { OutputFormat, Report } from '../types.js';
import { renderJson } from './json.js';
import { renderMarkdown } from './markdown.js';
import { renderTerminal } from './terminal.js';
import type { TerminalOptions } from './terminal.js';

/** Render the report in the requested format */
export function renderReport(
  report: Report,
  format: OutputFormat,
  options: TerminalOptions = {},
): string {
  switch (format) {
    case 'terminal':
      return renderTerminal(report, options);
    case 'markdown':
      return renderMarkdown(report);
    case 'json':
      return renderJson(report);
  }
}

export { renderJson, renderMarkdown, renderTerminal };
export type { TerminalOptions };
