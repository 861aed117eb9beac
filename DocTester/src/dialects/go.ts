/**
 * Go variant. Produces a single main.go in its own module; `go mod tidy`
 * resolves the SDK before `go run .`.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Declarations, RewriteProfile } from '../rewrite/pipeline.js';
import { collectBraceBlock, indentLines, type RewriteRule } from '../rewrite/steps.js';
import type { SampleType } from '../samples/types.js';
import { FAILURE_MARKER, SUCCESS_MARKER } from './markers.js';
import type { Dialect, ExtractionProfile, LaunchPlan, MaterializeContext } from './types.js';

export const SDK_MODULE = 'github.com/deepgram/deepgram-go-sdk';

const SINGLE_IMPORT = /^import\s+(?:[\w.]+\s+)?"[^"]+"\s*$/;
const IMPORT_BLOCK_START = /^import\s*\(\s*$/;
const IMPORT_SPEC = /^\s*(?:[\w.]+\s+)?"([^"]+)"/;
const TOP_LEVEL_DECLARATION = /^(?:func\s|type\s|var\s*\(|const\s*\()/;

/** Import paths named by single imports and import blocks. */
export function extractGoImports(code: string): string[] {
  const paths: string[] = [];
  for (const match of code.matchAll(/^import\s+(?:[\w.]+\s+)?"([^"]+)"/gm)) {
    if (match[1]) paths.push(match[1]);
  }
  for (const block of code.matchAll(/^import\s*\(([^)]*)\)/gm)) {
    for (const line of (block[1] ?? '').split('\n')) {
      const spec = IMPORT_SPEC.exec(line);
      if (spec?.[1]) paths.push(spec[1]);
    }
  }
  return paths;
}

// ── Extraction ───────────────────────────────────────────────────────────────

function classify(code: string): SampleType {
  if (code.includes('go func') || /\bgoroutine\b/.test(code) || /<-\s*\w+|chan\s+\w+/.test(code)) return 'async';
  if (/\btype\s+\w+\s+struct\b/.test(code)) return 'class';
  if (/websocket|\.Live|listen\.NewWS/i.test(code)) return 'streaming';
  if (/^func\s+(?!main\b)\w+\s*\(/m.test(code)) return 'function';
  return 'sync';
}

const extraction: ExtractionProfile = {
  fenceLabels: ['go', 'golang'],
  minLength: 30,
  commentPrefixes: ['//', '/*', '*'],
  libraryMarkers: ['deepgram'],
  libraryMarkersIgnoreCase: false,
  foreignMarkers: ['from deepgram import', 'using System', 'require(', 'const {'],
  classify,
  extractImports: extractGoImports,
  credentialKeywords: ['api_key', 'DEEPGRAM_API_KEY', 'client.New'],
  mediaKeywords: ['.wav', '.mp3', 'audio_file', 'transcribe'],
};

// ── Rewrite ──────────────────────────────────────────────────────────────────

const blockingOperations: RewriteRule[] = [
  {
    kind: 'call',
    pattern: /(\w+)\.ReadString\([^()]*\)/,
    statement: ([reader]) => `// ${reader}.ReadString() skipped in sandbox`,
    expression: () => '"test_input", error(nil)',
  },
  { kind: 'text', pattern: /^(\s*)for\s*\{\s*$/gm, replace: '$1for sandboxLoop := 0; sandboxLoop < 3; sandboxLoop++ {' },
  { kind: 'text', pattern: /^(\s*)select\s*\{\s*\}\s*$/gm, replace: '$1// select {} skipped in sandbox' },
  { kind: 'text', pattern: /\btime\.Sleep\((?:[^()]|\([^()]*\))*\)/g, replace: 'time.Sleep(100 * time.Millisecond)' },
  {
    kind: 'call',
    pattern: /([\w.]+)\.(Connect|Start)\(\)/,
    statement: ([receiver, method]) => `// ${receiver}.${method}() skipped in sandbox`,
    expression: () => 'true',
  },
];

interface Partition {
  imports: string[];
  declarations: string[];
  body: string[];
}

/**
 * Split a Go fragment into imports, package-level declarations and the
 * statements that belong in main(). A `package` clause is dropped.
 */
export function partitionGo(lines: readonly string[]): Partition {
  const partition: Partition = { imports: [], declarations: [], body: [] };
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';

    if (/^package\s+\w+/.test(line)) {
      i++;
    } else if (SINGLE_IMPORT.test(line)) {
      partition.imports.push(line.replace(/^import\s+/, '').trim());
      i++;
    } else if (IMPORT_BLOCK_START.test(line)) {
      i++;
      while (i < lines.length && !/^\s*\)\s*$/.test(lines[i] ?? '')) {
        const spec = (lines[i] ?? '').trim();
        if (spec) partition.imports.push(spec);
        i++;
      }
      i++;
    } else if (TOP_LEVEL_DECLARATION.test(line)) {
      const end = /[({]/.test(line) ? collectParenOrBraceBlock(lines, i) : i + 1;
      partition.declarations.push(...lines.slice(i, end), '');
      i = end;
    } else {
      partition.body.push(line);
      i++;
    }
  }

  return partition;
}

function collectParenOrBraceBlock(lines: readonly string[], start: number): number {
  const first = lines[start] ?? '';
  if (/\(\s*$/.test(first) && !first.includes('{')) {
    let i = start + 1;
    while (i < lines.length && !/^\s*\)\s*$/.test(lines[i] ?? '')) i++;
    return Math.min(i + 1, lines.length);
  }
  return collectBraceBlock(lines, start);
}

function mergeImports(specs: readonly string[]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const spec of ['"fmt"', '"os"', ...specs]) {
    if (seen.has(spec)) continue;
    seen.add(spec);
    merged.push(spec);
  }
  return merged;
}

function hasMain(code: string): boolean {
  return /^func\s+main\s*\(\s*\)/m.test(code);
}

function wrap(code: string, preamble: readonly string[]): string {
  const lines = code.split('\n');

  if (hasMain(code)) {
    return /^package\s+\w+/m.test(code) ? `${code}\n` : `package main\n\n${code}\n`;
  }

  const { imports, declarations, body } = partitionGo(lines);
  const out = ['package main', '', 'import (', ...indentLines(mergeImports([...preamble, ...imports]), '\t'), ')', ''];
  if (declarations.length > 0) out.push(...declarations);

  out.push(
    'func main() {',
    '\tdefer func() {',
    '\t\tif r := recover(); r != nil {',
    `\t\t\tfmt.Printf("${FAILURE_MARKER}%v\\n", r)`,
    '\t\t\tos.Exit(1)',
    '\t\t}',
    '\t}()',
    '',
    ...indentLines(body, '\t'),
    '',
    `\tfmt.Println("${SUCCESS_MARKER}")`,
    '}',
    '',
  );
  return out.join('\n');
}

const rewrite: RewriteProfile = {
  migrationNotice: /\/\/\s*For help migrating.*\n.*\/\/.*MIGRATION\.md.*\n\s*/g,
  commentPrefixes: ['//', '/*', '*'],
  credentialReads: [/os\.Getenv\(\s*"DEEPGRAM_API_KEY"\s*\)/g],
  deprecatedNames: [
    { kind: 'text', pattern: /github\.com\/deepgram-devs\/deepgram-go-sdk/g, replace: SDK_MODULE },
  ],
  blockingOperations,
  // Go has no optional imports; the wrapper merges the import set itself
  declarations: (code: string): Declarations => ({
    code,
    preamble: /\btime\.\w+/.test(code) && !/"time"/.test(code) ? ['"time"'] : [],
  }),
  wrap: (code, preamble) => wrap(code, preamble),
};

// ── Materialize ──────────────────────────────────────────────────────────────

async function materialize(program: string, { environment, descriptor }: MaterializeContext): Promise<LaunchPlan> {
  await writeFile(join(environment.tempDir, 'main.go'), program, 'utf-8');

  const go = descriptor.runtime.command ?? 'go';
  const setup = [{ command: go, args: ['mod', 'init', 'doctester/sample'] }];
  if (descriptor.sdk.path) {
    setup.push({ command: go, args: ['mod', 'edit', `-replace=${SDK_MODULE}=${descriptor.sdk.path}`] });
  }
  setup.push({ command: go, args: ['mod', 'tidy'] });

  return {
    setup,
    run: { command: go, args: ['run', '.'] },
    env: { GOFLAGS: '-mod=mod' },
  };
}

export function createGoDialect(): Dialect {
  return {
    name: 'go',
    defaultMode: 'execute',
    extraction,
    rewrite,
    materialize,
  };
}
