/**
 * Pulls fenced code blocks for one dialect out of a set of documents.
 */

import { Logger } from '@doctester/shared/Utils/logger.js';
import type { ExtractionProfile } from '../dialects/types.js';
import { createCodeSample } from '../samples/sample.js';
import type { CodeSample } from '../samples/types.js';
import type { DocumentSource } from './documents.js';

const logger = new Logger('doctester:extractor');

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * One pattern per fence label. The lookahead keeps `py` from also
 * matching a ```python fence.
 */
function fencePatterns(labels: readonly string[]): RegExp[] {
  return labels.map((label) => new RegExp('```' + escapeRegExp(label) + '(?![\\w#+-])[^\\n]*\\n([\\s\\S]*?)```', 'g'));
}

function isCommentOnly(code: string, commentPrefixes: readonly string[]): boolean {
  const lines = code
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.every((line) => commentPrefixes.some((prefix) => line.startsWith(prefix)));
}

function containsAny(code: string, markers: readonly string[], ignoreCase: boolean): boolean {
  if (!ignoreCase) return markers.some((marker) => code.includes(marker));
  const lower = code.toLowerCase();
  return markers.some((marker) => lower.includes(marker.toLowerCase()));
}

/** Why a block was rejected, or null when it is kept. */
export function rejectionReason(code: string, profile: ExtractionProfile): string | null {
  if (code.length < profile.minLength) return 'too short';
  if (isCommentOnly(code, profile.commentPrefixes)) return 'comments only';
  if (!containsAny(code, profile.libraryMarkers, profile.libraryMarkersIgnoreCase)) return 'no library reference';
  if (containsAny(code, profile.foreignMarkers, false)) return 'foreign dialect';
  return null;
}

export function extractFromContent(
  filePath: string,
  content: string,
  language: string,
  profile: ExtractionProfile,
): CodeSample[] {
  const matches = new Map<number, RegExpMatchArray>();
  for (const pattern of fencePatterns(profile.fenceLabels)) {
    for (const match of content.matchAll(pattern)) {
      matches.set(match.index ?? 0, match);
    }
  }

  const samples: CodeSample[] = [];
  for (const [start, match] of [...matches.entries()].sort(([a], [b]) => a - b)) {
    const code = (match[1] ?? '').trim();
    const reason = rejectionReason(code, profile);
    if (reason) {
      logger.debug(`Skipping block at ${filePath}:${lineNumberAt(content, start)} (${reason})`);
      continue;
    }

    const lowerCode = code.toLowerCase();
    samples.push(
      createCodeSample({
        filePath,
        lineNumber: lineNumberAt(content, start),
        code,
        language,
        sampleType: profile.classify(code),
        imports: profile.extractImports(code),
        requiresApiKey: profile.credentialKeywords.some((keyword) => code.includes(keyword)),
        requiresAudioFile: profile.mediaKeywords.some((keyword) => lowerCode.includes(keyword.toLowerCase())),
        metadata: {},
      }),
    );
  }
  return samples;
}

function lineNumberAt(content: string, index: number): number {
  let newlines = 0;
  for (let i = 0; i < index; i++) {
    if (content.charCodeAt(i) === 10) newlines++;
  }
  return newlines + 1;
}

/**
 * Extract samples from every document the source lists, in listing order.
 * A document that cannot be read is logged and skipped.
 */
export async function extractSamples(
  source: DocumentSource,
  language: string,
  profile: ExtractionProfile,
): Promise<CodeSample[]> {
  const samples: CodeSample[] = [];

  for (const path of await source.listDocuments()) {
    let content: string;
    try {
      content = await source.readDocument(path);
    } catch (err) {
      logger.warn(`Failed to read ${path}`, err);
      continue;
    }
    samples.push(...extractFromContent(path, content, language, profile));
  }

  logger.info(`Found ${samples.length} ${language} samples`);
  return samples;
}
