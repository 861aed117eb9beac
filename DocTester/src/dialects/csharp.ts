/**
 * C# variant. Samples become a console project: TestProject.csproj plus a
 * Program.cs whose Main runs the sample body.
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Declarations, RewriteContext, RewriteProfile } from '../rewrite/pipeline.js';
import { collectBraceBlock, indentLines, type RewriteRule } from '../rewrite/steps.js';
import type { SampleType } from '../samples/types.js';
import { FAILURE_MARKER, SUCCESS_MARKER } from './markers.js';
import type { Dialect, ExtractionProfile, LaunchPlan, MaterializeContext } from './types.js';

export const DEFAULT_PROJECT_FILE = `<Project Sdk="Microsoft.NET.Sdk">
  <PropertyGroup>
    <OutputType>Exe</OutputType>
    <TargetFramework>net6.0</TargetFramework>
    <Nullable>enable</Nullable>
  </PropertyGroup>
  <ItemGroup>
    <PackageReference Include="Deepgram" Version="*" />
  </ItemGroup>
</Project>
`;

// ── Extraction ───────────────────────────────────────────────────────────────

function classify(code: string): SampleType {
  if (code.includes('async ') && code.includes('await ')) return 'async';
  if (code.includes('class ') && /\b(?:public|private|internal|protected)\s/.test(code)) return 'class';
  if (/websocket|\.Listen\.|live/i.test(code)) return 'streaming';
  if (METHOD_DECLARATION.test(code)) return 'function';
  return 'sync';
}

const USING_DIRECTIVE = /^using\s+(?:static\s+)?[\w.]+(?:\s*=\s*[\w.]+)?\s*;$/;

const extraction: ExtractionProfile = {
  fenceLabels: ['csharp', 'cs', 'c#', 'dotnet'],
  minLength: 30,
  commentPrefixes: ['//', '/*', '*'],
  libraryMarkers: ['using Deepgram', 'DeepgramClient', 'Deepgram.', 'deepgram'],
  libraryMarkersIgnoreCase: true,
  foreignMarkers: [],
  classify,
  extractImports: (code) => code.match(/^using\s+[^;]+;/gm) ?? [],
  credentialKeywords: ['apiKey', 'DEEPGRAM_API_KEY', 'DEEPGRAM_TOKEN', 'DeepgramClient('],
  mediaKeywords: ['.wav', '.mp3', '.m4a', 'audioFile', 'File.ReadAllBytes', 'Transcribe.File'],
};

// ── Rewrite ──────────────────────────────────────────────────────────────────

const blockingOperations: RewriteRule[] = [
  {
    kind: 'call',
    pattern: /Console\.ReadLine\(\)/,
    statement: () => '// Console.ReadLine() skipped in sandbox',
    expression: () => '"test_input"',
  },
  {
    kind: 'call',
    pattern: /Console\.ReadKey\([^()]*\)/,
    statement: () => '// Console.ReadKey() skipped in sandbox',
    expression: () => 'default(ConsoleKeyInfo)',
  },
  {
    kind: 'text',
    pattern: /^(\s*)while\s*\(\s*true\s*\)/gm,
    replace: '$1for (var sandboxLoop = 0; sandboxLoop < 3; sandboxLoop++)',
  },
  { kind: 'text', pattern: /\bThread\.Sleep\((?:[^()]|\([^()]*\))*\)/g, replace: 'Thread.Sleep(100)' },
  { kind: 'text', pattern: /\bTask\.Delay\((?:[^()]|\([^()]*\))*\)/g, replace: 'Task.Delay(100)' },
  {
    kind: 'call',
    pattern: /([\w.]+)\.(Connect|StartListening)\([^()]*\)/,
    statement: ([receiver, method]) => `// ${receiver}.${method}() skipped in sandbox`,
    expression: () => 'Task.FromResult(true)',
  },
];

const TYPE_DECLARATION =
  /^(?:(?:public|private|internal|protected|static|sealed|abstract|partial|readonly)\s+)*(?:class|record|struct|interface|enum)\s+\w+/;

const METHOD_DECLARATION =
  /^[ \t]*(?:(?:public|private|internal|protected|static|async|override|virtual)\s+)+[\w<>[\],.?]+(?:\s*<[^>]*>)?\s+\w+\s*\([^)]*\)?\s*$/m;

const ATTRIBUTE = /^\[[^\]]*\]\s*$/;

const BASE_USINGS = ['using System;', 'using System.Threading.Tasks;'];

function declarations(code: string, { descriptor }: RewriteContext): Declarations {
  const body: string[] = [];
  const sampleUsings: string[] = [];

  for (const line of code.split('\n')) {
    if (USING_DIRECTIVE.test(line.trim()) && !/^\s/.test(line)) {
      sampleUsings.push(line.trim());
    } else {
      body.push(line);
    }
  }

  const usings = [...new Set([...BASE_USINGS, ...descriptor.rewrite.required_declarations, ...sampleUsings])];
  return { code: body.join('\n').replace(/^\n+/, ''), preamble: usings };
}

interface Partition {
  types: string[];
  methods: string[];
  body: string[];
}

function ensureStatic(signature: string): string {
  if (/\bstatic\b/.test(signature)) return signature;
  return signature.replace(/^((?:(?:public|private|internal|protected)\s+)*)/, '$1static ');
}

/**
 * Types go to namespace scope, methods become static members of Program,
 * everything else runs inside Main. Attribute lines stay with what follows.
 */
export function partitionCSharp(lines: readonly string[]): Partition {
  const partition: Partition = { types: [], methods: [], body: [] };
  let attributes: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i] ?? '';

    if (ATTRIBUTE.test(line)) {
      attributes.push(line);
      i++;
      continue;
    }

    const isType = TYPE_DECLARATION.test(line);
    const isMethod = !isType && !/^\s/.test(line) && METHOD_DECLARATION.test(line);
    if (isType || isMethod) {
      const end = collectBraceBlock(lines, i);
      const block = lines.slice(i, end);
      if (isType) {
        partition.types.push(...attributes, ...block, '');
      } else {
        const [signature = '', ...rest] = block;
        partition.methods.push(...attributes, ensureStatic(signature), ...rest, '');
      }
      attributes = [];
      i = end;
      continue;
    }

    partition.body.push(...attributes, line);
    attributes = [];
    i++;
  }

  partition.body.push(...attributes);
  return partition;
}

function hasEntryPoint(code: string): boolean {
  return /static\s+(?:async\s+Task(?:<int>)?|void|int)\s+Main\s*\(/.test(code);
}

function wrap(code: string, preamble: readonly string[]): string {
  const usings = preamble.join('\n');
  if (hasEntryPoint(code)) {
    return `${usings}\n\n${code}\n`;
  }

  const { types, methods, body } = partitionCSharp(code.split('\n'));
  const isAsync = body.some((line) => /\bawait\s/.test(line));

  const out = [usings, ''];
  if (types.length > 0) out.push(...types);
  out.push(
    'class Program',
    '{',
    ...indentLines(methods, '    '),
    `    static ${isAsync ? 'async Task' : 'void'} Main(string[] args)`,
    '    {',
    '        try',
    '        {',
    ...indentLines(body, '            '),
    `            Console.WriteLine("${SUCCESS_MARKER}");`,
    '        }',
    '        catch (Exception ex)',
    '        {',
    `            Console.WriteLine($"${FAILURE_MARKER}{ex.Message}");`,
    '            Environment.Exit(1);',
    '        }',
    '    }',
    '}',
    '',
  );
  return out.join('\n');
}

const rewrite: RewriteProfile = {
  migrationNotice: /\/\/\s*For help migrating.*\n.*\/\/.*MIGRATION\.md.*\n\s*/g,
  commentPrefixes: ['//', '/*', '*'],
  credentialReads: [/Environment\.GetEnvironmentVariable\(\s*"DEEPGRAM_API_KEY"\s*\)/g],
  deprecatedNames: [],
  blockingOperations,
  declarations,
  wrap: (code, preamble) => wrap(code, preamble),
};

// ── Materialize ──────────────────────────────────────────────────────────────

async function materialize(program: string, { environment, descriptor }: MaterializeContext): Promise<LaunchPlan> {
  const projectFile = descriptor.rewrite.project_template ?? DEFAULT_PROJECT_FILE;
  await writeFile(join(environment.tempDir, 'TestProject.csproj'), projectFile, 'utf-8');
  await writeFile(join(environment.tempDir, 'Program.cs'), program, 'utf-8');

  const dotnet = descriptor.runtime.command ?? 'dotnet';
  return {
    setup: [{ command: dotnet, args: ['restore'] }],
    run: { command: dotnet, args: ['run'] },
    env: { DOTNET_CLI_TELEMETRY_OPTOUT: '1', DOTNET_NOLOGO: '1' },
  };
}

export function createCSharpDialect(): Dialect {
  return {
    name: 'csharp',
    defaultMode: 'execute',
    extraction,
    rewrite,
    materialize,
  };
}
