/**
 * Human-readable rendering of a LanguageReport.
 */

import type { LanguageReport } from './build.js';

interface FindingRef {
  file: string;
  line: number;
  issue: string;
  location: string;
  problem: string;
  fix: string;
  impact: string;
}

const BLOCKING_EXAMPLES = 5;
const SUGGESTION_EXAMPLES = 3;

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** Group by issue name, keeping first-seen order. */
function groupByIssue(refs: readonly FindingRef[]): Map<string, FindingRef[]> {
  const groups = new Map<string, FindingRef[]>();
  for (const ref of refs) {
    const group = groups.get(ref.issue) ?? [];
    group.push(ref);
    groups.set(ref.issue, group);
  }
  return groups;
}

function collectFindings(report: LanguageReport): { blocking: FindingRef[]; suggestions: FindingRef[] } {
  const blocking: FindingRef[] = [];
  const suggestions: FindingRef[] = [];
  for (const row of report.results) {
    for (const finding of row.findings ?? []) {
      const ref = { file: row.file, line: row.line, ...finding };
      (finding.blocking ? blocking : suggestions).push(ref);
    }
  }
  return { blocking, suggestions };
}

function renderFailures(report: LanguageReport): string[] {
  const failures = report.results.filter((row) => !row.success);
  if (failures.length === 0) {
    return ['✅ Every sample ran to completion.', ''];
  }
  const lines: string[] = [];
  for (const row of failures) {
    lines.push(`### \`${row.file}:${row.line}\` (${row.type}, ${row.priority} priority)`, '');
    const failedRules = Object.entries(row.validation_results)
      .filter(([, passed]) => !passed)
      .map(([name]) => name);
    if (failedRules.length > 0) {
      lines.push(`Failed rules: ${failedRules.join(', ')}`, '');
    }
    lines.push('```', row.error, '```', '');
  }
  return lines;
}

export function renderMarkdown(report: LanguageReport): string {
  const { summary } = report;
  const { blocking, suggestions } = collectFindings(report);
  const out: string[] = [
    `# ${titleCase(report.language)} Documentation Sample Report`,
    '',
    '## Overview',
    `- **Mode:** ${report.mode}`,
    `- **Total samples:** ${summary.total}`,
    `- **Samples ready to use:** ${summary.passed} (${summary.success_rate}%)`,
    `- **Samples failing:** ${summary.failed}`,
  ];

  if (report.mode === 'analyze') {
    out.push(
      `- **Blocking issues:** ${blocking.length}`,
      `- **Improvement opportunities:** ${suggestions.length}`,
      '',
      '## 🚨 Blocking Issues (Fix These First)',
      '',
      'These issues prevent users from running the code successfully:',
      '',
    );

    if (blocking.length === 0) {
      out.push('✅ No blocking issues found! All code samples should run correctly.', '');
    }
    for (const [issue, refs] of groupByIssue(blocking)) {
      out.push(`### ${issue} (${refs.length} samples)`, '');
      for (const ref of refs.slice(0, BLOCKING_EXAMPLES)) {
        out.push(
          `**\`${ref.file}:${ref.line}\`** - ${ref.location}`,
          `- Problem: ${ref.problem}`,
          `- Fix: ${ref.fix}`,
          `- Impact: ${ref.impact}`,
          '',
        );
      }
      if (refs.length > BLOCKING_EXAMPLES) {
        out.push(`... and ${refs.length - BLOCKING_EXAMPLES} more samples with this issue`, '');
      }
    }

    out.push('## 💡 Improvement Opportunities', '');
    if (suggestions.length === 0) {
      out.push('✨ No improvement suggestions.', '');
    }
    for (const [issue, refs] of groupByIssue(suggestions)) {
      const [first] = refs;
      out.push(`### ${issue} (${refs.length} samples)`, '');
      if (first) {
        out.push(`**Why this helps:** ${first.impact}`, '', `**How to fix:** ${first.fix}`, '');
      }
      out.push('**Examples:**');
      for (const ref of refs.slice(0, SUGGESTION_EXAMPLES)) {
        out.push(`- \`${ref.file}:${ref.line}\``);
      }
      if (refs.length > SUGGESTION_EXAMPLES) {
        out.push(`- ... and ${refs.length - SUGGESTION_EXAMPLES} more samples`);
      }
      out.push('');
    }
  } else {
    out.push('', '## Failures', '', ...renderFailures(report));
  }

  out.push('## Next Steps', '');
  const blockingGroups = [...groupByIssue(blocking)];
  const suggestionGroups = [...groupByIssue(suggestions)];

  if (blockingGroups.length > 0) {
    out.push('### 🚨 Immediate Actions', '');
    blockingGroups.slice(0, BLOCKING_EXAMPLES).forEach(([issue, refs], i) => {
      out.push(`${i + 1}. **Fix ${issue}** in ${refs.length} sample(s)`);
    });
    out.push('');
  }
  if (suggestionGroups.length > 0) {
    out.push('### 💡 Quality Improvements', '');
    suggestionGroups.slice(0, SUGGESTION_EXAMPLES).forEach(([issue, refs], i) => {
      out.push(`${i + 1}. **Implement ${issue}** in ${refs.length} sample(s)`);
    });
    out.push('');
  }
  if (report.mode === 'execute' && summary.failed > 0) {
    out.push(`Re-run after fixing the ${summary.failed} failing sample(s) listed above.`, '');
  }
  if (blockingGroups.length === 0 && suggestionGroups.length === 0 && summary.failed === 0) {
    out.push('🎉 **No action needed.**', '');
  }

  return out.join('\n');
}
