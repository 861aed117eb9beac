import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { HELP_TEXT, parseArgs, runCli } from '../../src/cli.js';
import { resetConfig } from '../../src/config.js';
import { registerBuiltinDialects, resetDialects } from '../../src/dialects/registry.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config', import.meta.url));

describe('parseArgs', () => {
  it('should accept one language with a docs path', () => {
    expect(parseArgs(['--language', 'python', '--docs-path', 'docs', '--output-dir', 'out'])).toEqual({
      kind: 'run',
      options: { allLanguages: false, language: 'python', docsPath: 'docs', outputDir: 'out' },
    });
  });

  it('should accept every language', () => {
    expect(parseArgs(['--all-languages', '--docs-path', 'docs', '--config-dir', 'cfg'])).toEqual({
      kind: 'run',
      options: { allLanguages: true, docsPath: 'docs', configDir: 'cfg' },
    });
  });

  it.each([
    [['--help'], { kind: 'help' }],
    [['--language', 'go', '-h'], { kind: 'help' }],
    [['--docs-path', 'docs'], { kind: 'error', message: 'Must specify either --language or --all-languages' }],
    [
      ['--language', 'go', '--all-languages', '--docs-path', 'docs'],
      { kind: 'error', message: '--language and --all-languages are mutually exclusive' },
    ],
    [['--language', 'go'], { kind: 'error', message: 'No documentation path specified (use --docs-path)' }],
    [['--language'], { kind: 'error', message: '--language requires a value' }],
    [['--language', '--docs-path', 'docs'], { kind: 'error', message: '--language requires a value' }],
    [['--verbose'], { kind: 'error', message: 'Unknown argument: --verbose' }],
  ])('should parse %j', (args, expected) => {
    expect(parseArgs(args)).toEqual(expected);
  });
});

describe('runCli', () => {
  let docsPath = '';
  let printed: string[] = [];
  const print = (line: string) => {
    printed.push(line);
  };

  beforeEach(async () => {
    registerBuiltinDialects();
    resetConfig();
    printed = [];
    docsPath = await mkdtemp(join(tmpdir(), 'doctester-cli-'));
  });

  afterEach(async () => {
    resetDialects();
    resetConfig();
    await rm(docsPath, { recursive: true, force: true });
  });

  it('should print help and succeed', async () => {
    expect(await runCli(['--help'], print)).toBe(0);
    expect(printed).toEqual([HELP_TEXT]);
  });

  it('should fail on a usage error', async () => {
    expect(await runCli(['--docs-path', docsPath], print)).toBe(1);
    expect(printed).toEqual([HELP_TEXT]);
  });

  it('should fail when the configuration directory is missing', async () => {
    const code = await runCli(
      ['--language', 'python', '--docs-path', docsPath, '--config-dir', join(docsPath, 'missing')],
      print,
    );

    expect(code).toBe(1);
    expect(printed).toEqual([]);
  });

  it('should fail when the documentation directory is missing', async () => {
    const code = await runCli(
      ['--language', 'python', '--docs-path', join(docsPath, 'missing'), '--config-dir', SHIPPED_CONFIG],
      print,
    );
    expect(code).toBe(1);
  });

  it('should fail on a language without a descriptor', async () => {
    const code = await runCli(['--language', 'ruby', '--docs-path', docsPath, '--config-dir', SHIPPED_CONFIG], print);

    expect(code).toBe(1);
    expect(printed).toEqual([]);
  });
});
