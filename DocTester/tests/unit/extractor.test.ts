import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { createPythonDialect } from '../../src/dialects/python.js';
import { createCSharpDialect } from '../../src/dialects/csharp.js';
import { FileSystemDocumentSource, type DocumentSource } from '../../src/extraction/documents.js';
import { extractFromContent, extractSamples, rejectionReason } from '../../src/extraction/extractor.js';

const python = createPythonDialect().extraction;

const PAGE = [
  '# Intro',
  '',
  '```python',
  'from deepgram import DeepgramClient',
  'client = DeepgramClient("YOUR_API_KEY")',
  '```',
  '',
  '```py title="transcribe.py"',
  'from deepgram import AsyncDeepgramClient',
  '',
  'async def main():',
  '    client = AsyncDeepgramClient()',
  '    with open("call.wav", "rb") as f:',
  '        await client.listen.transcribe_file(f)',
  '```',
  '',
  '```python',
  'import deepgram',
  '```',
  '```python',
  'const client = new DeepgramClient("YOUR_API_KEY");',
  '```',
  '```python',
  '# from deepgram import DeepgramClient goes here',
  '```',
  '```javascript',
  'const { createClient } = require("@deepgram/sdk");',
  '```',
  '',
].join('\n');

describe('extractFromContent', () => {
  it('should keep library samples and record where they start', () => {
    const samples = extractFromContent('docs/stt.mdx', PAGE, 'python', python);

    expect(samples).toHaveLength(2);
    const [first, second] = samples;

    expect(first).toMatchObject({
      filePath: 'docs/stt.mdx',
      lineNumber: 3,
      code: 'from deepgram import DeepgramClient\nclient = DeepgramClient("YOUR_API_KEY")',
      language: 'python',
      sampleType: 'sync',
      imports: ['from deepgram import DeepgramClient'],
      requiresApiKey: true,
      requiresAudioFile: false,
    });
    expect(second).toMatchObject({
      lineNumber: 8,
      sampleType: 'async',
      imports: ['from deepgram import AsyncDeepgramClient'],
      requiresApiKey: true,
      requiresAudioFile: true,
    });
  });

  it('should return nothing for a document without matching fences', () => {
    const page = '# Setup\n\nInstall the SDK first.\n\n```bash\npip install deepgram-sdk\n```\n';
    expect(extractFromContent('docs/setup.md', page, 'python', python)).toEqual([]);
    expect(extractFromContent('docs/empty.md', '', 'python', python)).toEqual([]);
  });

  it('should drop a block made only of comment lines', () => {
    const page = [
      '```python',
      '# Step 1: create a DeepgramClient',
      '# Step 2: call client.listen()',
      '# Step 3: print the transcript',
      '```',
    ].join('\n');

    expect(extractFromContent('docs/steps.md', page, 'python', python)).toEqual([]);
  });

  it('should freeze extracted samples', () => {
    const [sample] = extractFromContent('a.md', PAGE, 'python', python);
    expect(Object.isFrozen(sample)).toBe(true);
    expect(Object.isFrozen(sample?.imports)).toBe(true);
  });

  it('should match library markers without case for dialects that ask for it', () => {
    const csharp = createCSharpDialect().extraction;
    const page = '```cs\nvar client = ClientFactory.CreateDEEPGRAMClient();\n```\n';

    const [sample] = extractFromContent('a.md', page, 'csharp', csharp);

    expect(sample?.lineNumber).toBe(1);
  });
});

describe('rejectionReason', () => {
  it.each([
    ['import deepgram', 'too short'],
    ['# from deepgram import DeepgramClient goes here', 'comments only'],
    ['# Step 1: create a DeepgramClient\n# Step 2: call client.listen()\n# Step 3: print it', 'comments only'],
    ['print("a sample that never mentions the library at all")', 'no library reference'],
    ['let client = DeepgramClient("YOUR_API_KEY")  # mixed up', 'foreign dialect'],
  ])('should reject %j as %s', (code, reason) => {
    expect(rejectionReason(code, python)).toBe(reason);
  });

  it('should accept a real sample', () => {
    expect(rejectionReason('from deepgram import DeepgramClient\nDeepgramClient()', python)).toBeNull();
  });
});

describe('extractSamples', () => {
  it('should return nothing for an empty corpus', async () => {
    const source: DocumentSource = {
      listDocuments: async () => [],
      readDocument: async () => PAGE,
    };

    await expect(extractSamples(source, 'python', python)).resolves.toEqual([]);
  });

  it('should skip documents that cannot be read', async () => {
    const source: DocumentSource = {
      listDocuments: async () => ['broken.md', 'ok.md'],
      readDocument: async (path) => {
        if (path === 'broken.md') throw new Error('EACCES');
        return PAGE;
      },
    };

    const samples = await extractSamples(source, 'python', python);

    expect(samples.map((sample) => `${sample.filePath}:${sample.lineNumber}`)).toEqual(['ok.md:3', 'ok.md:8']);
  });
});

describe('FileSystemDocumentSource', () => {
  let root = '';

  afterEach(async () => {
    if (root) await rm(root, { recursive: true, force: true });
  });

  it('should walk nested folders and skip dependency and hidden ones', async () => {
    root = await mkdtemp(join(tmpdir(), 'doctester-docs-'));
    await mkdir(join(root, 'guides'), { recursive: true });
    await mkdir(join(root, 'node_modules', 'pkg'), { recursive: true });
    await mkdir(join(root, '.cache'), { recursive: true });
    await writeFile(join(root, 'index.md'), '# a');
    await writeFile(join(root, 'guides', 'live.mdx'), '# b');
    await writeFile(join(root, 'guides', 'notes.txt'), 'c');
    await writeFile(join(root, 'node_modules', 'pkg', 'README.md'), '# d');
    await writeFile(join(root, '.cache', 'page.md'), '# e');

    const source = new FileSystemDocumentSource(root, ['.md', '.mdx']);
    const documents = await source.listDocuments();

    expect(documents).toEqual([join(root, 'guides', 'live.mdx'), join(root, 'index.md')]);
    expect(await source.readDocument(join(root, 'index.md'))).toBe('# a');
  });
});
