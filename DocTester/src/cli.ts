/**
 * Command-line front end.
 *
 * Usage: doctester --language <name> | --all-languages --docs-path <dir> [options]
 *
 * Exit code is 1 for usage and configuration errors only; sample failures
 * are reported, not treated as a failed run.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { ConfigurationError } from '@doctester/shared/Types/errors.js';
import { Logger } from '@doctester/shared/Utils/logger.js';
import { getConfig, type DocTesterConfig } from './config.js';
import { listConfiguredLanguages, loadFrameworkDescriptor } from './descriptors/loader.js';
import { registeredDialects } from './dialects/registry.js';
import { runLanguage } from './pipeline/run-language.js';
import { countFindings, type LanguageReport } from './report/build.js';
import { writeReport } from './report/writer.js';
import type { TestResult } from './samples/types.js';

const logger = new Logger('doctester:cli');

export interface CliOptions {
  language?: string;
  allLanguages: boolean;
  docsPath?: string;
  outputDir?: string;
  configDir?: string;
}

export type ParsedArgs = { kind: 'run'; options: CliOptions } | { kind: 'help' } | { kind: 'error'; message: string };

export const HELP_TEXT = `
Doc sample tester

Usage: doctester [options]

Options:
  --language <name>     Test one language (must have config/languages/<name>.yaml)
  --all-languages       Test every configured language
  --docs-path <dir>     Documentation root to scan
  --output-dir <dir>    Where reports are written (default: $DOCTESTER_OUTPUT_DIR or test-runs)
  --config-dir <dir>    Descriptor directory (default: $DOCTESTER_CONFIG_DIR or DocTester/config)
  --help                Show this help message
`;

const VALUE_FLAGS = {
  '--language': 'language',
  '--docs-path': 'docsPath',
  '--output-dir': 'outputDir',
  '--config-dir': 'configDir',
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const options: CliOptions = { allLanguages: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    if (arg === '--all-languages') {
      options.allLanguages = true;
      continue;
    }
    if (isValueFlag(arg)) {
      const value = args[++i];
      if (value === undefined || value.startsWith('--')) {
        return { kind: 'error', message: `${arg} requires a value` };
      }
      options[VALUE_FLAGS[arg]] = value;
      continue;
    }
    return { kind: 'error', message: `Unknown argument: ${arg}` };
  }

  if (!options.language && !options.allLanguages) {
    return { kind: 'error', message: 'Must specify either --language or --all-languages' };
  }
  if (options.language && options.allLanguages) {
    return { kind: 'error', message: '--language and --all-languages are mutually exclusive' };
  }
  if (!options.docsPath) {
    return { kind: 'error', message: 'No documentation path specified (use --docs-path)' };
  }
  return { kind: 'run', options };
}

export type Print = (line: string) => void;

function resultLine(result: TestResult, index: number, total: number): string {
  const where = `${basename(result.sample.filePath)}:${result.sample.lineNumber}`;
  const blocking = result.findings?.filter((finding) => finding.blocking).length ?? 0;
  const suggestions = (result.findings?.length ?? 0) - blocking;

  let verdict: string;
  if (result.findings) {
    verdict = result.success
      ? suggestions > 0
        ? `✅ GOOD (${suggestions} suggestions)`
        : '✅ LOOKS GOOD'
      : `🚨 NEEDS FIXES (${blocking} blocking issues)`;
  } else {
    verdict = result.success ? '✅ PASSED' : `❌ FAILED${result.errorMessage ? `: ${result.errorMessage}` : ''}`;
  }
  return `  [${index + 1}/${total}] ${where} ${verdict}`;
}

function summaryLines(report: LanguageReport): string[] {
  const { total, passed, failed } = report.summary;
  if (report.mode === 'execute') {
    return [`✅ ${report.language}: ${passed}/${total} samples passed, ${failed} failed`];
  }

  const { blocking, suggestions } = countFindings(report);
  const lines = [`✅ ${report.language} analysis complete: ${total} samples analyzed`];
  if (blocking === 0) {
    lines.push(
      suggestions === 0
        ? '🎉 All samples are ready to use with no issues found.'
        : `✅ All samples work correctly. Found ${suggestions} opportunities for improvement.`,
    );
  } else {
    lines.push(`🚨 Found ${blocking} issues that prevent code from running correctly.`);
    if (suggestions > 0) lines.push(`💡 Also found ${suggestions} suggestions to improve the examples.`);
  }
  return lines;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function selectLanguages(options: CliOptions, configDir: string): Promise<string[]> {
  const configured = await listConfiguredLanguages(configDir);
  const supported = new Set(registeredDialects());

  if (options.allLanguages) {
    for (const language of configured.filter((name) => !supported.has(name))) {
      logger.warn(`Skipping ${language}: no dialect registered`);
    }
    return configured.filter((name) => supported.has(name));
  }

  const language = options.language ?? '';
  if (!configured.includes(language) || !supported.has(language)) {
    const available = configured.filter((name) => supported.has(name)).join(', ') || 'none';
    throw new ConfigurationError(`Unsupported language: ${language} (supported: ${available})`);
  }
  return [language];
}

export async function runCli(args: readonly string[], print: Print = (line) => console.log(line)): Promise<number> {
  const parsed = parseArgs(args);
  if (parsed.kind === 'help') {
    print(HELP_TEXT);
    return 0;
  }
  if (parsed.kind === 'error') {
    logger.error(parsed.message);
    print(HELP_TEXT);
    return 1;
  }

  const { options } = parsed;
  try {
    const base = getConfig();
    const config: DocTesterConfig = {
      ...base,
      configDir: options.configDir ? resolve(options.configDir) : base.configDir,
      outputDir: options.outputDir ? resolve(options.outputDir) : base.outputDir,
    };
    const docsPath = resolve(options.docsPath ?? '.');

    if (!(await isDirectory(config.configDir))) {
      throw new ConfigurationError(`Configuration directory not found: ${config.configDir}`);
    }
    if (!(await isDirectory(docsPath))) {
      throw new ConfigurationError(`Documentation directory not found: ${docsPath}`);
    }

    const framework = await loadFrameworkDescriptor(config.configDir);
    const languages = await selectLanguages(options, config.configDir);

    print(`🚀 Testing documentation samples for: ${languages.join(', ')}`);
    print(`📁 Documentation path: ${docsPath}`);
    print(`📊 Output directory: ${config.outputDir}`);
    print('');

    for (const language of languages) {
      print(`🧪 Testing ${language} samples...`);
      try {
        const { report } = await runLanguage({
          language,
          docsPath,
          framework,
          config,
          onResult: (result, index, total) => print(resultLine(result, index, total)),
        });
        const written = await writeReport(report, config.outputDir);
        for (const line of summaryLines(report)) print(line);
        print(`📋 Reports: ${written.jsonPath}, ${written.markdownPath}`);
      } catch (err) {
        logger.error(`Failed to test ${language}`, err);
        print(`❌ Failed to test ${language}: ${err instanceof Error ? err.message : String(err)}`);
      }
      print('');
    }
    return 0;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }
}
