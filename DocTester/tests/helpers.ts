/**
 * Builders for test samples, descriptors and environments.
 */

import { languageDescriptorSchema, type LanguageDescriptor } from '../src/descriptors/schema.js';
import { createCodeSample } from '../src/samples/sample.js';
import type { CodeSample, ExecutionEnvironment } from '../src/samples/types.js';

export function makeSample(fields: Partial<CodeSample> & { code: string }): CodeSample {
  return createCodeSample({
    filePath: 'docs/example.mdx',
    lineNumber: 1,
    language: 'python',
    sampleType: 'sync',
    imports: [],
    requiresApiKey: false,
    requiresAudioFile: false,
    metadata: {},
    ...fields,
  });
}

export function makeDescriptor(raw: Record<string, unknown> & { language: { name: string } }): LanguageDescriptor {
  return languageDescriptorSchema.parse(raw);
}

export function makeEnvironment(fields: Partial<ExecutionEnvironment> = {}): ExecutionEnvironment {
  return {
    tempDir: '/tmp/doctester-test',
    mockFiles: [],
    envVars: { DEEPGRAM_API_KEY: 'test_key' },
    ...fields,
  };
}
