/**
 * JavaScript variant. The sample body runs inside an async `main()`, with
 * its function and class declarations kept at module scope; module format
 * follows the sample (ES imports → .mjs, otherwise .cjs).
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Declarations, RewriteContext, RewriteProfile } from '../rewrite/pipeline.js';
import { collectBraceBlock, indentLines, type RewriteRule } from '../rewrite/steps.js';
import type { SampleType } from '../samples/types.js';
import { FAILURE_MARKER, SUCCESS_MARKER } from './markers.js';
import type { Dialect, ExtractionProfile, LaunchPlan, MaterializeContext } from './types.js';

const ES_IMPORT = /^import\s/;
const IMPORT_SOURCE_END = /['"][^'"]+['"]\s*;?\s*$/;

export function isEsModule(code: string): boolean {
  return /^(?:import\s|export\s)/m.test(code);
}

// ── Extraction ───────────────────────────────────────────────────────────────

function classify(code: string): SampleType {
  if (/\bawait\s/.test(code) || /\basync\s/.test(code)) return 'async';
  if (/^\s*(?:export\s+)?class\s+\w+/m.test(code)) return 'class';
  if (/websocket|\.live\(|listen\.live/i.test(code)) return 'streaming';
  if (/\bfunction\s+\w+\s*\(/.test(code)) return 'function';
  return 'sync';
}

const extraction: ExtractionProfile = {
  fenceLabels: ['javascript', 'js', 'node'],
  minLength: 30,
  commentPrefixes: ['//', '/*', '*'],
  libraryMarkers: ['@deepgram/sdk', 'createClient(', 'deepgram.'],
  libraryMarkersIgnoreCase: false,
  foreignMarkers: ['from deepgram import', 'def main(', 'using System', 'package main'],
  classify,
  extractImports: (code) => code.match(/^(?:import\s.+|.*\brequire\(\s*['"][^'"]+['"]\s*\).*)$/gm) ?? [],
  credentialKeywords: ['DEEPGRAM_API_KEY', 'apiKey', 'createClient('],
  mediaKeywords: ['.wav', '.mp3', '.m4a', 'audioFile', 'transcribeFile', 'createReadStream'],
};

// ── Rewrite ──────────────────────────────────────────────────────────────────

const blockingOperations: RewriteRule[] = [
  {
    kind: 'text',
    pattern: /^(\s*)while\s*\(\s*true\s*\)/gm,
    replace: '$1for (let sandboxLoop = 0; sandboxLoop < 3; sandboxLoop++)',
  },
  { kind: 'text', pattern: /\bsetInterval\(/g, replace: 'setTimeout(' },
  // Delay argument only; the callback may hold one level of parentheses
  {
    kind: 'text',
    pattern: /(?<=\bsetTimeout\((?:[^()]|\([^()]*\))*?,\s*)\d[\d_]*(?=\s*\))/g,
    replace: '100',
  },
  {
    kind: 'call',
    pattern: /([\w.]+)\.(connect|startListening)\(\)/,
    statement: ([receiver, method]) => `// ${receiver}.${method}() skipped in sandbox`,
    expression: () => 'undefined',
  },
];

const DOTENV_LOADERS = [
  /^[ \t]*require\(\s*['"]dotenv['"]\s*\)\.config\([^)]*\)\s*;?[ \t]*\n?/gm,
  /^[ \t]*import\s+['"]dotenv\/config['"]\s*;?[ \t]*\n?/gm,
  /^[ \t]*import\s+(?:\*\s+as\s+)?dotenv\s+from\s+['"]dotenv['"]\s*;?[ \t]*\n?/gm,
  /^[ \t]*(?:const|let|var)\s+dotenv\s*=\s*require\(\s*['"]dotenv['"]\s*\)\s*;?[ \t]*\n?/gm,
  /^[ \t]*dotenv\.config\([^)]*\)\s*;?[ \t]*\n?/gm,
];

interface BuiltinModule {
  name: 'fs' | 'path';
  uses: RegExp;
  bound: RegExp;
}

const BUILTIN_MODULES: BuiltinModule[] = [
  { name: 'fs', uses: /\bfs\.\w+/, bound: /\b(?:const|let|var|import)\s+(?:\*\s+as\s+)?fs\b/ },
  { name: 'path', uses: /\bpath\.\w+/, bound: /\b(?:const|let|var|import)\s+(?:\*\s+as\s+)?path\b/ },
];

/**
 * The sandbox already exports the mocked credentials, so dotenv loading is
 * dropped. fs and path are bound when the body uses them unbound.
 */
function declarations(code: string, { sample }: RewriteContext): Declarations {
  const body = DOTENV_LOADERS.reduce((text, pattern) => text.replace(pattern, ''), code);
  const esm = isEsModule(sample.code);

  const preamble = BUILTIN_MODULES.filter(({ uses, bound }) => uses.test(body) && !bound.test(body)).map(
    ({ name }) => (esm ? `import ${name} from 'node:${name}';` : `const ${name} = require('node:${name}');`),
  );
  return { code: body, preamble };
}

/** Pull ES import statements (including multi-line ones) out of the body. */
export function hoistEsImports(lines: readonly string[]): { imports: string[]; body: string[] } {
  const imports: string[] = [];
  const body: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';
    if (!ES_IMPORT.test(line)) {
      body.push(line);
      i++;
      continue;
    }
    imports.push(line);
    i++;
    if (IMPORT_SOURCE_END.test(line)) continue;
    while (i < lines.length) {
      const next = lines[i] ?? '';
      imports.push(next);
      i++;
      if (IMPORT_SOURCE_END.test(next)) break;
    }
  }

  return { imports, body };
}

const TOP_LEVEL_DEFINITION = /^(?:export\s+(?:default\s+)?)?(?:async\s+)?(?:function\b|class\s)/;
const EXPORT_LIST = /^export\s*\{/;
const EXPORT_KEYWORD = /^export\s+(?:default\s+)?/;

/**
 * Split a sample into module-scope function/class declarations and the
 * statements for main(). Export lists are dropped and other exported
 * declarations lose the keyword, since `export` is only legal at module scope.
 */
export function partitionJavaScript(lines: readonly string[]): { module: string[]; body: string[] } {
  const module: string[] = [];
  const body: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';

    if (TOP_LEVEL_DEFINITION.test(line)) {
      const end = collectBraceBlock(lines, i);
      module.push(...lines.slice(i, end), '');
      i = end;
      continue;
    }

    if (EXPORT_LIST.test(line)) {
      i = collectBraceBlock(lines, i);
      continue;
    }

    body.push(line.replace(EXPORT_KEYWORD, ''));
    i++;
  }

  while (body.length > 0 && !body[0]?.trim()) body.shift();
  while (body.length > 0 && !body[body.length - 1]?.trim()) body.pop();
  return { module, body };
}

function wrap(code: string, preamble: readonly string[], { sample }: RewriteContext): string {
  const lines = code.split('\n');
  const { imports, body: rest } = isEsModule(sample.code) ? hoistEsImports(lines) : { imports: [], body: lines };
  const { module, body } = partitionJavaScript(rest);
  const head = [...preamble, ...imports];

  const out = head.length > 0 ? [...head, ''] : [];
  out.push(...module);
  out.push(
    'async function main() {',
    ...indentLines(body, '  '),
    '}',
    '',
    'main()',
    '  .then(() => {',
    `    console.log(${JSON.stringify(SUCCESS_MARKER)});`,
    '  })',
    '  .catch((error) => {',
    `    console.log(${JSON.stringify(FAILURE_MARKER)} + (error instanceof Error ? error.message : String(error)));`,
    '    process.exit(1);',
    '  });',
    '',
  );
  return out.join('\n');
}

const rewrite: RewriteProfile = {
  migrationNotice: /\/\/\s*For help migrating.*\n.*\/\/.*\/docs\/Migrating.*\n\s*/g,
  commentPrefixes: ['//', '/*', '*'],
  credentialReads: [/process\.env\.DEEPGRAM_API_KEY\b/g, /process\.env\[\s*["']DEEPGRAM_API_KEY["']\s*\]/g],
  deprecatedNames: [
    { kind: 'text', pattern: /\bnew\s+Deepgram\(/g, replace: 'createClient(' },
    { kind: 'text', pattern: /\{\s*Deepgram\s*\}/g, replace: '{ createClient }' },
  ],
  blockingOperations,
  declarations,
  wrap,
};

// ── Materialize ──────────────────────────────────────────────────────────────

async function materialize(program: string, { sample, environment, descriptor }: MaterializeContext): Promise<LaunchPlan> {
  const extension = isEsModule(sample.code) ? 'mjs' : 'cjs';
  const script = `test_sample_${sample.lineNumber}.${extension}`;
  await writeFile(join(environment.tempDir, script), program, 'utf-8');

  const env: Record<string, string> = {};
  if (descriptor.sdk.path) {
    env.NODE_PATH = descriptor.sdk.path;
  }

  return {
    setup: [],
    run: { command: descriptor.runtime.command ?? 'node', args: [script] },
    env,
  };
}

export function createJavaScriptDialect(): Dialect {
  return {
    name: 'javascript',
    defaultMode: 'execute',
    extraction,
    rewrite,
    materialize,
  };
}
