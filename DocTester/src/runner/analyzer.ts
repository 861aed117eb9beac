/**
 * Static analysis of raw sample text against a catalogue of known-bad patterns.
 * Nothing is executed.
 */

import type { Finding } from '../samples/types.js';

export interface AnalysisCheck extends Finding {
  /** Receives the raw, un-rewritten sample text */
  applies(code: string): boolean;
}

export interface AnalysisOutcome {
  findings: Finding[];
  blockingIssues: boolean;
}

export function analyzeCode(code: string, catalogue: readonly AnalysisCheck[]): AnalysisOutcome {
  const findings: Finding[] = catalogue
    .filter((check) => check.applies(code))
    .map(({ issue, location, problem, fix, impact, blocking }) => ({
      issue,
      location,
      problem,
      fix,
      impact,
      blocking,
    }));

  return {
    findings,
    blockingIssues: findings.some((finding) => finding.blocking),
  };
}

export const NO_ISSUES_MESSAGE = '✅ No issues found - code looks good!';

/**
 * Human summary: blocking findings first, then advisory suggestions.
 */
export function formatFindings(findings: readonly Finding[]): string {
  if (findings.length === 0) {
    return NO_ISSUES_MESSAGE;
  }

  const blocking = findings.filter((finding) => finding.blocking);
  const suggestions = findings.filter((finding) => !finding.blocking);
  const output: string[] = [];

  if (blocking.length > 0) {
    output.push(`🚨 ${blocking.length} issue(s) that prevent users from running this code:`);
    for (const finding of blocking) {
      output.push(
        '',
        `**${finding.issue}** (${finding.location})`,
        `Problem: ${finding.problem}`,
        `Fix: ${finding.fix}`,
        `Impact: ${finding.impact}`,
      );
    }
  }

  if (suggestions.length > 0) {
    if (blocking.length > 0) {
      output.push('', '='.repeat(50));
    }
    output.push(`💡 ${suggestions.length} suggestion(s) to improve this example:`);
    for (const finding of suggestions) {
      output.push(
        '',
        `**${finding.issue}** (${finding.location})`,
        `Suggestion: ${finding.fix}`,
        `Why: ${finding.impact}`,
      );
    }
  }

  return output.join('\n');
}
