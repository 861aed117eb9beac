import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError } from '@doctester/shared/Types/errors.js';
import type { DocTesterConfig } from '../../src/config.js';
import { loadFrameworkDescriptor } from '../../src/descriptors/loader.js';
import { createCSharpDialect } from '../../src/dialects/csharp.js';
import { createJavaScriptDialect } from '../../src/dialects/javascript.js';
import { registerBuiltinDialects, resetDialects } from '../../src/dialects/registry.js';
import type { DocumentSource } from '../../src/extraction/documents.js';
import { resolveRunnerMode, runLanguage } from '../../src/pipeline/run-language.js';
import { runSamples } from '../../src/pipeline/run-samples.js';
import { SampleRunner } from '../../src/runner/runner.js';
import { SandboxManager } from '../../src/sandbox/environment.js';
import type { TestResult } from '../../src/samples/types.js';
import { makeDescriptor, makeSample } from '../helpers.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config', import.meta.url));

function testConfig(root: string, configDir = SHIPPED_CONFIG): DocTesterConfig {
  return {
    sandboxRoot: join(root, 'sandboxes'),
    configDir,
    outputDir: join(root, 'out'),
    maxOutputChars: 10_000,
    truncationHead: 4_000,
    truncationTail: 4_000,
    killGraceMs: 200,
  };
}

function memorySource(pages: Record<string, string>): DocumentSource {
  return {
    listDocuments: async () => Object.keys(pages),
    readDocument: async (path) => pages[path] ?? '',
  };
}

let root = '';

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'doctester-pipeline-'));
  registerBuiltinDialects();
});

afterEach(async () => {
  resetDialects();
  await rm(root, { recursive: true, force: true });
});

describe('runSamples', () => {
  it('should fail every sample when no sandbox can be created and still finish', async () => {
    const blocker = join(root, 'blocker');
    await writeFile(blocker, 'x');
    const sandbox = new SandboxManager({ root: blocker, apiKeyPlaceholder: 'test_key', credentialVariables: [] });
    const dialect = createJavaScriptDialect();
    const descriptor = makeDescriptor({ language: { name: 'javascript' } });
    const runner = new SampleRunner({ dialect, descriptor, mode: { kind: 'analyze', catalogue: [] } });
    const samples = [makeSample({ code: 'a', lineNumber: 1 }), makeSample({ code: 'b', lineNumber: 9 })];
    const seen: Array<[number, number, number]> = [];

    const results = await runSamples(samples, runner, sandbox, {
      onResult: (result, index, total) => seen.push([result.sample.lineNumber, index, total]),
    });

    expect(results.map((result) => result.success)).toEqual([false, false]);
    expect(results[0]?.errorMessage).toMatch(/^Failed to create sandbox directory /);
    expect(results[0]?.sample).toBe(samples[0]);
    expect(seen).toEqual([
      [1, 0, 2],
      [9, 1, 2],
    ]);
  });
});

describe('resolveRunnerMode', () => {
  it('should build execute limits from the framework and process config', async () => {
    const framework = await loadFrameworkDescriptor(SHIPPED_CONFIG);
    const mode = resolveRunnerMode(
      createJavaScriptDialect(),
      makeDescriptor({ language: { name: 'javascript' } }),
      framework,
      testConfig(root),
    );

    expect(mode).toEqual({
      kind: 'execute',
      timeoutMs: 30_000,
      setupTimeoutMs: 60_000,
      killGraceMs: 200,
      output: { maxChars: 10_000, head: 4_000, tail: 4_000 },
    });
  });

  it('should refuse analyze mode for a dialect without a catalogue', async () => {
    const framework = await loadFrameworkDescriptor(SHIPPED_CONFIG);

    expect(() =>
      resolveRunnerMode(
        createCSharpDialect(),
        makeDescriptor({ language: { name: 'csharp' }, mode: 'analyze' }),
        framework,
        testConfig(root),
      ),
    ).toThrow(ConfigurationError);
  });
});

describe('runLanguage', () => {
  it('should analyze python samples end to end', async () => {
    const framework = await loadFrameworkDescriptor(SHIPPED_CONFIG);
    const page = [
      '# Transcription',
      '',
      '```python',
      'from deepgram import Deepgram',
      'print("transcribing audio with the SDK")',
      '```',
      '',
      '```python',
      'from deepgram import DeepgramClient',
      'client = DeepgramClient()',
      '```',
    ].join('\n');
    const progress: TestResult[] = [];

    const { results, report } = await runLanguage({
      language: 'python',
      docsPath: root,
      framework,
      config: testConfig(root),
      source: memorySource({ 'docs/stt.mdx': page }),
      onResult: (result) => progress.push(result),
    });

    expect(results.map((result) => result.success)).toEqual([false, true]);
    expect(progress).toEqual(results);
    expect(report.mode).toBe('analyze');
    expect(report.summary).toEqual({ total: 2, passed: 1, failed: 1, success_rate: 50 });
    expect(report.results.map((row) => `${row.file}:${row.line}`)).toEqual(['stt.mdx:3', 'stt.mdx:8']);
    expect(report.results[1]?.findings).toEqual([]);
  });

  it('should execute javascript samples found on disk', async () => {
    const configDir = join(root, 'config');
    await mkdir(join(configDir, 'languages'), { recursive: true });
    await writeFile(
      join(configDir, 'languages', 'javascript.yaml'),
      [
        'language:',
        '  name: javascript',
        'runtime:',
        `  command: ${JSON.stringify(process.execPath)}`,
        'validation_rules:',
        '  - name: uses_create_client',
        "    check: 'createClient\\('",
        '    expected: true',
        '',
      ].join('\n'),
    );
    const docsPath = join(root, 'docs');
    await mkdir(docsPath);
    await writeFile(
      join(docsPath, 'quickstart.md'),
      [
        '# Quickstart',
        '',
        '```javascript',
        'const deepgram = { createClient() { return "stub"; } };',
        'console.log(deepgram.createClient());',
        '```',
        '',
      ].join('\n'),
    );
    const framework = await loadFrameworkDescriptor(SHIPPED_CONFIG);

    const { results, report } = await runLanguage({
      language: 'javascript',
      docsPath,
      framework,
      config: testConfig(root, configDir),
    });

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      success: true,
      stdout: 'stub\n✅ Code sample executed successfully\n',
      validation: { uses_create_client: true },
    });
    expect(report.mode).toBe('execute');
    expect(report.results[0]).toMatchObject({ file: 'quickstart.md', line: 3, type: 'sync', priority: 'high', error: '' });
  });
});
