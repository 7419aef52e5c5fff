import type { Report } from '../types.js';
import { planRender } from './format.js';

/**
 * Render the report as JSON. Findings that cannot be located are listed
 * under `omitted` instead of their tier.
 */
export function renderJson(report: Report): string {
  const plan = planRender(report);
  return JSON.stringify(
    {
      baseline: report.baseline,
      total: report.total,
      counts: report.counts,
      groups: plan.groups,
      omitted: plan.omitted,
      files: report.files,
      stats: report.stats,
    },
    null,
    2,
  );
}
