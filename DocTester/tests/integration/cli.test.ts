import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { runCli } from '../../src/cli.js';
import { resetConfig } from '../../src/config.js';
import { registerBuiltinDialects, resetDialects } from '../../src/dialects/registry.js';
import type { LanguageReport } from '../../src/report/build.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config', import.meta.url));

describe('doctester CLI', () => {
  let root = '';
  let printed: string[] = [];
  const print = (line: string) => {
    printed.push(line);
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'doctester-cli-run-'));
    printed = [];
    registerBuiltinDialects();
    resetConfig();
    vi.stubEnv('DOCTESTER_SANDBOX_ROOT', join(root, 'sandboxes'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    resetConfig();
    resetDialects();
    await rm(root, { recursive: true, force: true });
  });

  it('should analyze python docs and write both reports', async () => {
    const docsPath = join(root, 'docs');
    const outputDir = join(root, 'reports');
    await mkdir(docsPath);
    await writeFile(
      join(docsPath, 'page.md'),
      '# Page\n\n```python\nfrom deepgram import Deepgram\nprint("transcribing audio with the SDK")\n```\n',
    );

    const code = await runCli(
      ['--language', 'python', '--docs-path', docsPath, '--output-dir', outputDir, '--config-dir', SHIPPED_CONFIG],
      print,
    );

    expect(code).toBe(0);
    expect(printed).toEqual([
      '🚀 Testing documentation samples for: python',
      `📁 Documentation path: ${docsPath}`,
      `📊 Output directory: ${outputDir}`,
      '',
      '🧪 Testing python samples...',
      '  [1/1] page.md:3 🚨 NEEDS FIXES (1 blocking issues)',
      '✅ python analysis complete: 1 samples analyzed',
      '🚨 Found 1 issues that prevent code from running correctly.',
      `📋 Reports: ${join(outputDir, 'python_test_report.json')}, ${join(outputDir, 'python_test_report.md')}`,
      '',
    ]);

    const report: LanguageReport = JSON.parse(await readFile(join(outputDir, 'python_test_report.json'), 'utf-8'));
    expect(report.summary).toEqual({ total: 1, passed: 0, failed: 1, success_rate: 0 });
    expect(report.results[0]?.validation_results).toEqual({ blocking_issues: true });

    const markdown = await readFile(join(outputDir, 'python_test_report.md'), 'utf-8');
    expect(markdown.startsWith('# Python Documentation Sample Report\n')).toBe(true);
  });

  it('should keep going when one language fails', async () => {
    const configDir = join(root, 'config');
    await mkdir(join(configDir, 'languages'), { recursive: true });
    await writeFile(join(configDir, 'framework.yaml'), '');
    await writeFile(join(configDir, 'languages', 'csharp.yaml'), 'language:\n  name: csharp\nmode: analyze\n');
    await writeFile(join(configDir, 'languages', 'python.yaml'), 'language:\n  name: python\n');
    await writeFile(join(configDir, 'languages', 'ruby.yaml'), 'language:\n  name: ruby\n');
    const outputDir = join(root, 'reports');

    const code = await runCli(
      ['--all-languages', '--docs-path', root, '--output-dir', outputDir, '--config-dir', configDir],
      print,
    );

    expect(code).toBe(0);
    expect(printed[0]).toBe('🚀 Testing documentation samples for: csharp, python');
    expect(printed).toContain(
      '❌ Failed to test csharp: Language "csharp" has no analysis catalogue; use mode: execute',
    );
    expect(printed).toContain('🎉 All samples are ready to use with no issues found.');
    expect(printed).toContain('✅ python analysis complete: 0 samples analyzed');
  });
});
