/**
 * Python variant.
 *
 * Default mode is analyze: the catalogue below flags the SDK-migration
 * mistakes that dominate Python docs. Execute mode rewrites the block into a
 * script with a `_doctester_main()` entry point and runs it with python3.
 */

import { writeFile } from 'node:fs/promises';
import { delimiter, join } from 'node:path';
import type { AnalysisCheck } from '../runner/analyzer.js';
import type { Declarations, RewriteContext, RewriteProfile } from '../rewrite/pipeline.js';
import { indentLines, type RewriteRule } from '../rewrite/steps.js';
import type { SampleType } from '../samples/types.js';
import type { Dialect, ExtractionProfile, LaunchPlan, MaterializeContext } from './types.js';
import { SUCCESS_MARKER, FAILURE_MARKER } from './markers.js';

// ── Extraction ───────────────────────────────────────────────────────────────

function classify(code: string): SampleType {
  if (code.includes('async def') || code.includes('await ') || code.includes('AsyncDeepgramClient')) {
    return 'async';
  }
  if (/^\s*class\s+\w+/m.test(code) && code.includes('def ')) {
    return 'class';
  }
  if (/websocket/i.test(code)) {
    return 'streaming';
  }
  if (/^\s*def\s+\w+/m.test(code)) {
    return 'function';
  }
  return 'sync';
}

const IMPORT_LINE = /^(?:from\s+\S+\s+import\s+.+|import\s+\S+.*)$/gm;

const extraction: ExtractionProfile = {
  fenceLabels: ['python', 'py'],
  minLength: 30,
  commentPrefixes: ['#'],
  libraryMarkers: ['from deepgram import', 'import deepgram', 'DeepgramClient', 'AsyncDeepgramClient'],
  libraryMarkersIgnoreCase: false,
  foreignMarkers: [
    'var ',
    'let ',
    'const ',
    'new Credentials(',
    'using System',
    'namespace ',
    'public class',
    'private ',
    'public ',
    'interface I',
  ],
  classify,
  extractImports: (code) => code.match(IMPORT_LINE) ?? [],
  credentialKeywords: ['api_key', 'DEEPGRAM_API_KEY', 'DEEPGRAM_TOKEN', 'DeepgramClient('],
  mediaKeywords: ['.wav', '.mp3', '.m4a', 'audio_file', 'transcribe_file'],
};

// ── Rewrite ──────────────────────────────────────────────────────────────────

const blockingOperations: RewriteRule[] = [
  {
    kind: 'call',
    pattern: /\binput\(\s*(?:"[^"]*"|'[^']*')?\s*\)/,
    statement: () => '"test_input"',
    expression: () => '"test_input"',
  },
  { kind: 'text', pattern: /^(\s*)while\s+True\s*:\s*$/gm, replace: '$1for _ in range(3):' },
  { kind: 'text', pattern: /\btime\.sleep\([^()]*\)/g, replace: 'time.sleep(0.1)' },
  { kind: 'text', pattern: /\basyncio\.sleep\([^()]*\)/g, replace: 'asyncio.sleep(0.1)' },
  {
    kind: 'call',
    pattern: /([\w.]+)\.(start_listening|connect|start)\(\)/,
    statement: ([receiver, method]) => `pass  # ${receiver}.${method}() skipped in sandbox`,
    expression: () => 'None',
  },
];

interface StdlibImport {
  uses: RegExp;
  present: RegExp;
  line: string;
}

const STDLIB_IMPORTS: StdlibImport[] = [
  { uses: /\btime\.\w+/, present: /^\s*(?:import time\b|from time import)/m, line: 'import time' },
  { uses: /\bos\.(?:getenv|environ|path)\b/, present: /^\s*(?:import os\b|from os import)/m, line: 'import os' },
  { uses: /\basyncio\.\w+/, present: /^\s*import asyncio\b/m, line: 'import asyncio' },
  { uses: /\bjson\.(?:dumps|loads|dump|load)\(/, present: /^\s*import json\b/m, line: 'import json' },
  {
    uses: /\bre\.(?:search|match|fullmatch|sub|findall|compile|split)\(/,
    present: /^\s*import re\b/m,
    line: 'import re',
  },
  { uses: /\bPath\(/, present: /^\s*from pathlib import .*\bPath\b/m, line: 'from pathlib import Path' },
];

interface OptionalDependency {
  uses: RegExp;
  /** The sample's own import of the dependency, dropped in favour of the guard */
  importLine: RegExp;
  guard: string;
}

const OPTIONAL_DEPENDENCIES: OptionalDependency[] = [
  {
    uses: /\bload_dotenv\b/,
    importLine: /^[ \t]*from dotenv import[^\n]*\n?/gm,
    guard: [
      'try:',
      '    from dotenv import load_dotenv',
      'except ImportError:',
      '    def load_dotenv(*args, **kwargs):',
      '        return False',
    ].join('\n'),
  },
  {
    uses: /\brequests\.\w+/,
    importLine: /^[ \t]*import requests[ \t]*\n?/gm,
    guard: [
      'try:',
      '    import requests',
      'except ImportError:',
      '    class _SandboxResponse:',
      '        status_code = 200',
      '        def json(self):',
      '            return {"mock": "data"}',
      '        def raise_for_status(self):',
      '            return None',
      '    class _SandboxRequests:',
      '        @staticmethod',
      '        def get(*args, **kwargs):',
      '            return _SandboxResponse()',
      '        post = get',
      '    requests = _SandboxRequests()',
    ].join('\n'),
  },
  {
    uses: /\bdeepgram\.utils\b/,
    importLine: /^[ \t]*from deepgram\.utils import verboselogs[ \t]*\n?/gm,
    guard: [
      'try:',
      '    from deepgram.utils import verboselogs',
      'except ImportError:',
      '    class _SandboxVerboseLogs:',
      '        DEBUG = INFO = WARNING = ERROR = SPAM = 0',
      '    verboselogs = _SandboxVerboseLogs()',
    ].join('\n'),
  },
];

function declarations(code: string): Declarations {
  const preamble: string[] = [];
  let body = code;

  for (const dependency of OPTIONAL_DEPENDENCIES) {
    if (dependency.uses.test(body)) {
      body = body.replace(dependency.importLine, '');
      preamble.push(dependency.guard);
    }
  }

  const stdlib = STDLIB_IMPORTS.filter(({ uses, present }) => uses.test(body) && !present.test(body)).map(
    ({ line }) => line,
  );

  return { code: body, preamble: [...stdlib, ...preamble] };
}

const TOP_LEVEL_DEFINITION = /^(?:async\s+def|def|class)\s/;
const TOP_LEVEL_IMPORT = /^(?:import|from)\s/;

interface Partition {
  module: string[];
  body: string[];
}

/**
 * Split a sample into module-scope definitions and statements for the entry point.
 * Indentation based: a definition runs until the next non-indented line.
 * Decorators flush left stick to the definition that follows them.
 */
export function partitionPython(lines: readonly string[]): Partition {
  const module: string[] = [];
  const body: string[] = [];
  let decorators: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';

    if (line.startsWith('@')) {
      decorators.push(line);
      i++;
      continue;
    }

    if (TOP_LEVEL_DEFINITION.test(line)) {
      module.push(...decorators, line);
      decorators = [];
      i++;
      while (i < lines.length) {
        const next = lines[i] ?? '';
        if (next.trim() && !/^\s/.test(next)) break;
        module.push(next);
        i++;
      }
      continue;
    }

    body.push(...decorators);
    decorators = [];

    if (!line.trim() || TOP_LEVEL_IMPORT.test(line)) {
      module.push(line);
    } else {
      body.push(line);
    }
    i++;
  }

  body.push(...decorators);
  return { module, body };
}

// Must not collide with a main() the sample defines
const ENTRY_POINT = '_doctester_main';

function wrap(code: string, preamble: readonly string[]): string {
  const lines = code.split('\n');
  const hasDefinitions = lines.some((line) => TOP_LEVEL_DEFINITION.test(line));
  const { module, body } = hasDefinitions ? partitionPython(lines) : { module: [], body: lines };

  const isAsync = body.some((line) => /\bawait\s|\basync\s+(?:with|for)\b/.test(line));
  const header = ['import sys'];
  if (isAsync) header.push('import asyncio');

  const moduleText = [...preamble, ...module].join('\n').trim();
  const out = [...header, ''];
  if (moduleText) out.push(moduleText, '', '');

  out.push(
    `${isAsync ? 'async ' : ''}def ${ENTRY_POINT}():`,
    '    try:',
    ...indentLines(body, '        '),
    `        print("${SUCCESS_MARKER}")`,
    '    except Exception as e:',
    `        print(f"${FAILURE_MARKER}{e}")`,
    '        sys.exit(1)',
    '',
    '',
    'if __name__ == "__main__":',
    isAsync ? `    asyncio.run(${ENTRY_POINT}())` : `    ${ENTRY_POINT}()`,
    '',
  );
  return out.join('\n');
}

const rewrite: RewriteProfile = {
  migrationNotice: /#\s*For help migrating.*\n.*#.*\/docs\/Migrating.*\n\s*/g,
  commentPrefixes: ['#'],
  credentialReads: [
    /os\.getenv\(\s*["']DEEPGRAM_API_KEY["']\s*\)/g,
    /os\.environ\.get\(\s*["']DEEPGRAM_API_KEY["']\s*\)/g,
    /os\.environ\[\s*["']DEEPGRAM_API_KEY["']\s*\]/g,
  ],
  deprecatedNames: [
    { kind: 'text', pattern: /from deepgram import Deepgram\b/g, replace: 'from deepgram import DeepgramClient' },
    { kind: 'text', pattern: /\bDeepgram\(/g, replace: 'DeepgramClient(' },
  ],
  blockingOperations,
  declarations: (code: string, _context: RewriteContext) => declarations(code),
  wrap: (code, preamble) => wrap(code, preamble),
};

// ── Analysis catalogue ───────────────────────────────────────────────────────

const analysis: AnalysisCheck[] = [
  {
    issue: 'Outdated SDK Import (v2/v3)',
    location: 'Import statement',
    problem: 'Uses completely outdated import: `from deepgram import Deepgram`',
    fix: 'Change to: `from deepgram import DeepgramClient`',
    impact: 'Users will get ImportError - this class no longer exists',
    blocking: true,
    applies: (code) => /from deepgram import Deepgram\b/.test(code),
  },
  {
    issue: 'Outdated Constructor (v2/v3)',
    location: 'Client instantiation',
    problem: 'Uses old constructor: `Deepgram(...)`',
    fix: 'Change to: `DeepgramClient(api_key=...)`',
    impact: 'Users will get NameError - this class no longer exists',
    blocking: true,
    applies: (code) => /\bDeepgram\(/.test(code),
  },
  {
    issue: 'Outdated API Pattern (v2/v3)',
    location: 'API call',
    problem: 'Uses old API pattern: `deepgram.transcription.prerecorded`',
    fix: 'Change to: `deepgram.listen.prerecorded.v(version)`',
    impact: 'Users will get AttributeError - this API structure changed',
    blocking: true,
    applies: (code) => code.includes('deepgram.transcription.prerecorded'),
  },
  {
    issue: 'Missing Core Import',
    location: 'Top of file',
    problem: 'Uses `DeepgramClient` without importing it',
    fix: 'Add: `from deepgram import DeepgramClient`',
    impact: 'Users will get NameError when trying to create client',
    blocking: true,
    applies: (code) => /DeepgramClient\b/.test(code) && !code.includes('from deepgram import'),
  },
  {
    issue: 'Missing Standard Import',
    location: 'Top of file',
    problem: 'Uses `os.getenv` or `os.environ` without importing os',
    fix: 'Add: `import os`',
    impact: 'Users will get NameError when accessing environment variables',
    blocking: true,
    applies: (code) => /\bos\.(?:getenv|environ)\b/.test(code) && !/^\s*import os\b/m.test(code),
  },
  {
    issue: 'Missing Optional Import',
    location: 'Top of file',
    problem: 'Uses `load_dotenv()` without importing it',
    fix: "Add: `from dotenv import load_dotenv` (and note it's optional)",
    impact: 'Users without python-dotenv will get ImportError',
    blocking: false,
    applies: (code) => code.includes('load_dotenv') && !code.includes('from dotenv import load_dotenv'),
  },
  {
    issue: 'Placeholder API Key',
    location: 'Client configuration',
    problem: "Uses placeholder string: `'YOUR_API_KEY'`",
    fix: "Show environment variable pattern: `os.getenv('DEEPGRAM_API_KEY')`",
    impact: 'Users learn proper API key management from the start',
    blocking: false,
    applies: (code) => /(["'])YOUR_API_KEY\1/.test(code),
  },
  {
    issue: 'Placeholder File Path',
    location: 'File operations',
    problem: "Uses placeholder path: `'path/to/audio.wav'`",
    fix: 'Use realistic example path or show how to get from user input',
    impact: 'Users understand how to provide actual file paths',
    blocking: false,
    applies: (code) => /(["'])path\/to\/audio\.wav\1/.test(code),
  },
  {
    issue: 'Missing Error Handling',
    location: 'API calls',
    problem: 'Long example without error handling shown',
    fix: 'Add try/except block around API calls',
    impact: 'Users learn proper error handling patterns',
    blocking: false,
    applies: (code) => code.includes('DeepgramClient') && !code.includes('try:') && code.split('\n').length > 10,
  },
  {
    issue: 'Async Pattern Issue',
    location: 'Async client usage',
    problem: 'Uses AsyncDeepgramClient but no await calls shown',
    fix: 'Show proper await usage with async client methods',
    impact: 'Users understand how to properly use async client',
    blocking: true,
    applies: (code) => code.includes('AsyncDeepgramClient') && !code.includes('await'),
  },
  {
    issue: 'Mixed Client Types',
    location: 'Client usage',
    problem: 'Uses both sync and async clients in same example',
    fix: 'Show either sync OR async pattern, not both',
    impact: 'Reduces confusion about which client to use',
    blocking: false,
    applies: (code) => /\bDeepgramClient\b/.test(code) && code.includes('AsyncDeepgramClient'),
  },
  {
    issue: 'Hardcoded API URL',
    location: 'Client configuration',
    problem: 'Hardcodes API URL instead of using default',
    fix: 'Remove explicit URL (use SDK default) or show as configuration option',
    impact: 'Prevents issues if API URL changes',
    blocking: false,
    applies: (code) => code.includes('https://api.deepgram.com'),
  },
];

// ── Materialize ──────────────────────────────────────────────────────────────

async function materialize(program: string, { sample, environment, descriptor }: MaterializeContext): Promise<LaunchPlan> {
  const script = `test_sample_${sample.lineNumber}.py`;
  await writeFile(join(environment.tempDir, script), program, 'utf-8');

  const env: Record<string, string> = {};
  if (descriptor.sdk.path) {
    const inherited = process.env.PYTHONPATH;
    env.PYTHONPATH = inherited ? `${descriptor.sdk.path}${delimiter}${inherited}` : descriptor.sdk.path;
  }

  return {
    setup: [],
    run: { command: descriptor.runtime.command ?? 'python3', args: [script] },
    env,
  };
}

export function createPythonDialect(): Dialect {
  return {
    name: 'python',
    defaultMode: 'analyze',
    extraction,
    rewrite,
    analysis,
    materialize,
  };
}
