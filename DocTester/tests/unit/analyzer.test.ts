import { describe, it, expect } from 'vitest';
import { createPythonDialect } from '../../src/dialects/python.js';
import { analyzeCode, formatFindings, NO_ISSUES_MESSAGE, type AnalysisCheck } from '../../src/runner/analyzer.js';

const catalogue = createPythonDialect().analysis ?? [];

describe('analyzeCode', () => {
  it('should report the outdated import as blocking', () => {
    const outcome = analyzeCode('from deepgram import Deepgram\nprint("transcribing audio with the SDK")', catalogue);

    expect(outcome.blockingIssues).toBe(true);
    expect(outcome.findings.map((finding) => finding.issue)).toEqual(['Outdated SDK Import (v2/v3)']);
  });

  it('should flag advisory findings without blocking', () => {
    const outcome = analyzeCode(
      'import os\nfrom deepgram import DeepgramClient\nclient = DeepgramClient("YOUR_API_KEY")',
      catalogue,
    );

    expect(outcome.blockingIssues).toBe(false);
    expect(outcome.findings.map((finding) => finding.issue)).toEqual(['Placeholder API Key']);
  });

  it('should catch an async client that is never awaited', () => {
    const outcome = analyzeCode('from deepgram import AsyncDeepgramClient\nclient = AsyncDeepgramClient()', catalogue);

    expect(outcome.findings.map((finding) => finding.issue)).toEqual(['Async Pattern Issue']);
    expect(outcome.blockingIssues).toBe(true);
  });

  it('should flag an async client used without any deepgram import', () => {
    const outcome = analyzeCode(
      'async def run():\n    client = AsyncDeepgramClient()\n    await client.listen.prerecorded.v("1").transcribe_url({"url": "x"})',
      catalogue,
    );

    expect(outcome.findings.map((finding) => finding.issue)).toEqual(['Missing Core Import']);
    expect(outcome.blockingIssues).toBe(true);
  });

  it('should not treat the async client alone as a mixed-client sample', () => {
    const outcome = analyzeCode(
      'from deepgram import AsyncDeepgramClient\nasync def run():\n    client = AsyncDeepgramClient()\n    await client.close()',
      catalogue,
    );

    expect(outcome.findings).toEqual([]);
  });

  it('should return plain findings without the predicate', () => {
    const [finding] = analyzeCode('from deepgram import Deepgram', catalogue).findings;
    expect(finding).not.toHaveProperty('applies');
  });
});

describe('formatFindings', () => {
  const check = (issue: string, blocking: boolean): AnalysisCheck => ({
    issue,
    location: 'Top of file',
    problem: `${issue} problem`,
    fix: `${issue} fix`,
    impact: `${issue} impact`,
    blocking,
    applies: () => true,
  });

  it('should say so when there is nothing to report', () => {
    expect(formatFindings([])).toBe(NO_ISSUES_MESSAGE);
  });

  it('should list one blocking finding', () => {
    const { findings } = analyzeCode('from deepgram import Deepgram\nprint("transcribing audio with the SDK")', catalogue);

    expect(formatFindings(findings)).toBe(
      [
        '🚨 1 issue(s) that prevent users from running this code:',
        '',
        '**Outdated SDK Import (v2/v3)** (Import statement)',
        'Problem: Uses completely outdated import: `from deepgram import Deepgram`',
        'Fix: Change to: `from deepgram import DeepgramClient`',
        'Impact: Users will get ImportError - this class no longer exists',
      ].join('\n'),
    );
  });

  it('should separate blocking findings from suggestions', () => {
    const { findings } = analyzeCode('x', [check('Broken', true), check('Nicer', false)]);

    expect(formatFindings(findings)).toBe(
      [
        '🚨 1 issue(s) that prevent users from running this code:',
        '',
        '**Broken** (Top of file)',
        'Problem: Broken problem',
        'Fix: Broken fix',
        'Impact: Broken impact',
        '',
        '='.repeat(50),
        '💡 1 suggestion(s) to improve this example:',
        '',
        '**Nicer** (Top of file)',
        'Suggestion: Nicer fix',
        'Why: Nicer impact',
      ].join('\n'),
    );
  });
});
