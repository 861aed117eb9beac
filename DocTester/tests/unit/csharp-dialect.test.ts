import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { createCSharpDialect, DEFAULT_PROJECT_FILE, partitionCSharp } from '../../src/dialects/csharp.js';
import { rewriteSample } from '../../src/rewrite/pipeline.js';
import type { LanguageDescriptor } from '../../src/descriptors/schema.js';
import type { CodeSample } from '../../src/samples/types.js';
import { makeDescriptor, makeEnvironment, makeSample } from '../helpers.js';

const dialect = createCSharpDialect();

function rewrite(code: string, descriptor: LanguageDescriptor = makeDescriptor({ language: { name: 'csharp' } })): string {
  const sample: CodeSample = makeSample({ code, language: 'csharp' });
  return rewriteSample(dialect.rewrite, { sample, environment: makeEnvironment(), descriptor });
}

describe('csharp rewrite', () => {
  it('should wrap a bare statement in Program.Main with the required usings', () => {
    const descriptor = makeDescriptor({
      language: { name: 'csharp' },
      rewrite: { required_declarations: ['using Deepgram;'] },
    });

    expect(rewrite('DeepgramClient client = DeepgramClient("YOUR_API_KEY");', descriptor)).toBe(
      [
        'using System;',
        'using System.Threading.Tasks;',
        'using Deepgram;',
        '',
        'class Program',
        '{',
        '    static void Main(string[] args)',
        '    {',
        '        try',
        '        {',
        '            DeepgramClient client = DeepgramClient("test_api_key");',
        '            Console.WriteLine("✅ Code sample executed successfully");',
        '        }',
        '        catch (Exception ex)',
        '        {',
        '            Console.WriteLine($"❌ Error: {ex.Message}");',
        '            Environment.Exit(1);',
        '        }',
        '    }',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('should hoist types and make methods static members of Program', () => {
    const code = [
      'using Deepgram.Models;',
      '',
      'public class Options',
      '{',
      '    public string Model { get; set; } = "nova";',
      '}',
      '',
      'async Task<string> Transcribe(string path)',
      '{',
      '    await Task.Delay(5000);',
      '    return path;',
      '}',
      '',
      'var result = await Transcribe("audio.wav");',
      'Console.ReadLine();',
    ].join('\n');

    expect(rewrite(code)).toBe(
      [
        'using System;',
        'using System.Threading.Tasks;',
        'using Deepgram.Models;',
        '',
        'public class Options',
        '{',
        '    public string Model { get; set; } = "nova";',
        '}',
        '',
        'class Program',
        '{',
        '    static async Task<string> Transcribe(string path)',
        '    {',
        '        await Task.Delay(100);',
        '        return path;',
        '    }',
        '',
        '    static async Task Main(string[] args)',
        '    {',
        '        try',
        '        {',
        '',
        '',
        '            var result = await Transcribe("audio.wav");',
        '            // Console.ReadLine() skipped in sandbox',
        '            Console.WriteLine("✅ Code sample executed successfully");',
        '        }',
        '        catch (Exception ex)',
        '        {',
        '            Console.WriteLine($"❌ Error: {ex.Message}");',
        '            Environment.Exit(1);',
        '        }',
        '    }',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('should leave a sample with its own Main alone apart from usings', () => {
    const code = [
      'using Deepgram;',
      'class App',
      '{',
      '    static void Main(string[] args)',
      '    {',
      '        Console.WriteLine("hi");',
      '    }',
      '}',
    ].join('\n');

    expect(rewrite(code)).toBe(
      'using System;\nusing System.Threading.Tasks;\nusing Deepgram;\n\n' + code.split('\n').slice(1).join('\n') + '\n',
    );
  });

  it('should replace blocking calls inside expressions', () => {
    const program = rewrite(
      [
        'var key = Console.ReadKey(true);',
        'var name = Console.ReadLine();',
        'if (await client.Connect(options)) { }',
        'await liveClient.StartListening();',
        'while (true)',
        '{',
        '    Thread.Sleep(TimeSpan.FromSeconds(5));',
        '}',
      ].join('\n'),
    );

    expect(program).toContain('            var key = default(ConsoleKeyInfo);\n');
    expect(program).toContain('            var name = "test_input";\n');
    expect(program).toContain('            if (await Task.FromResult(true)) { }\n');
    expect(program).toContain('            // liveClient.StartListening() skipped in sandbox\n');
    expect(program).toContain(
      '            for (var sandboxLoop = 0; sandboxLoop < 3; sandboxLoop++)\n            {\n                Thread.Sleep(100);\n            }\n',
    );
  });

  it('should read the API key from the test value', () => {
    expect(rewrite('var key = Environment.GetEnvironmentVariable("DEEPGRAM_API_KEY");')).toContain(
      '            var key = "test_api_key";\n',
    );
  });
});

describe('partitionCSharp', () => {
  it('should keep attributes with the declaration that follows', () => {
    const { types, methods, body } = partitionCSharp([
      '[Serializable]',
      'public record Item(string Name);',
      'Console.WriteLine("x");',
    ]);

    expect(types).toEqual(['[Serializable]', 'public record Item(string Name);', '']);
    expect(methods).toEqual([]);
    expect(body).toEqual(['Console.WriteLine("x");']);
  });

  it('should not treat indented method-like lines as declarations', () => {
    const { methods, body } = partitionCSharp(['    public void Run()', '    {', '    }']);

    expect(methods).toEqual([]);
    expect(body).toEqual(['    public void Run()', '    {', '    }']);
  });
});

describe('csharp materialize', () => {
  let tempDir = '';

  afterEach(async () => {
    if (tempDir) await rm(tempDir, { recursive: true, force: true });
  });

  it('should write the project and restore before running', async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'doctester-cs-'));
    const descriptor = makeDescriptor({ language: { name: 'csharp' } });

    const plan = await dialect.materialize('class Program {}', {
      sample: makeSample({ code: 'class Program {}', language: 'csharp' }),
      environment: makeEnvironment({ tempDir }),
      descriptor,
    });

    expect(await readFile(join(tempDir, 'TestProject.csproj'), 'utf-8')).toBe(DEFAULT_PROJECT_FILE);
    expect(await readFile(join(tempDir, 'Program.cs'), 'utf-8')).toBe('class Program {}');
    expect(plan.setup).toEqual([{ command: 'dotnet', args: ['restore'] }]);
    expect(plan.run).toEqual({ command: 'dotnet', args: ['run'] });
    expect(plan.env).toEqual({ DOTNET_CLI_TELEMETRY_OPTOUT: '1', DOTNET_NOLOGO: '1' });
  });

  it('should prefer the project template from the descriptor', async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'doctester-cs-'));
    const descriptor = makeDescriptor({
      language: { name: 'csharp' },
      rewrite: { project_template: '<Project />\n' },
    });

    await dialect.materialize('', {
      sample: makeSample({ code: '', language: 'csharp' }),
      environment: makeEnvironment({ tempDir }),
      descriptor,
    });

    expect(await readFile(join(tempDir, 'TestProject.csproj'), 'utf-8')).toBe('<Project />\n');
  });
});
