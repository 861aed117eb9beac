/**
 * Text transforms shared by every dialect's rewrite.
 *
 * All of these are plain pattern rewrites with no parsing, so a pattern can
 * hit unrelated code that happens to look the same. Misfires surface later
 * as execution failures.
 */

/** Literal every credential placeholder and env lookup becomes */
export const TEST_API_KEY = 'test_api_key';

/** Public host the SDK docs use for sample media */
export const ASSET_HOST = 'dpgr.am';
export const PLACEHOLDER_URL = 'https://example.com/test.wav';

export const AUDIO_EXTENSIONS = ['wav', 'mp3', 'm4a', 'flac', 'opus', 'ogg', 'webm'] as const;

const CREDENTIAL_PLACEHOLDERS = ['YOUR_API_KEY', 'YOUR_DEEPGRAM_API_KEY'];

/** Plain regex substitution applied to the whole text */
export interface TextRule {
  kind: 'text';
  pattern: RegExp;
  replace: string;
}

/**
 * Rewrites a call that blocks or reaches the network. When the call is the
 * whole statement on its line the line becomes `statement(...)`; when it sits
 * inside a larger expression only the call becomes `expression(...)`.
 */
export interface CallRule {
  kind: 'call';
  /** Capture groups are passed to the renderers; no `g` flag needed */
  pattern: RegExp;
  statement: (groups: string[]) => string;
  expression: (groups: string[]) => string;
}

export type RewriteRule = TextRule | CallRule;

function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

function commonPrefix(values: string[]): string {
  if (values.length === 0) return '';
  let prefix = values[0] ?? '';
  for (const value of values.slice(1)) {
    let i = 0;
    while (i < prefix.length && i < value.length && prefix[i] === value[i]) i++;
    prefix = prefix.slice(0, i);
    if (!prefix) break;
  }
  return prefix;
}

function isComment(line: string, commentPrefixes: readonly string[]): boolean {
  const trimmed = line.trim();
  return commentPrefixes.some((prefix) => trimmed.startsWith(prefix));
}

function dropEdgeBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start]?.trim()) start++;
  while (end > start && !lines[end - 1]?.trim()) end--;
  return lines.slice(start, end);
}

export function stripMigrationNotice(code: string, notice: RegExp): string {
  return code.replace(notice, '');
}

/**
 * Remove the indentation a docs page wrapped around a block.
 *
 * First tries the whitespace prefix shared by every non-blank line. When
 * there is none (a comment flush left, mixed tabs and spaces) it falls back
 * to the smallest indentation among non-comment lines and strips that many
 * characters from each line, or all leading whitespace where a line has less.
 */
export function normalizeIndentation(code: string, commentPrefixes: readonly string[]): string {
  const lines = dropEdgeBlankLines(code.split('\n').map((line) => line.trimEnd()));
  const nonBlank = lines.filter((line) => line.trim() !== '');
  if (nonBlank.length === 0) return '';

  const prefix = commonPrefix(nonBlank.map(leadingWhitespace));
  if (prefix) {
    return lines.map((line) => (line.trim() ? line.slice(prefix.length) : '')).join('\n');
  }

  const codeIndents = nonBlank
    .filter((line) => !isComment(line, commentPrefixes))
    .map((line) => leadingWhitespace(line).length);
  const minIndent = codeIndents.length > 0 ? Math.min(...codeIndents) : 0;
  if (minIndent === 0) {
    return lines.join('\n');
  }

  return lines
    .map((line) => {
      if (!line.trim()) return '';
      const indent = leadingWhitespace(line).length;
      return line.slice(Math.min(indent, minIndent));
    })
    .join('\n');
}

/** Swap quoted placeholder keys for the test key, keeping the quote style. Idempotent. */
export function substituteCredentialPlaceholders(code: string): string {
  const placeholders = CREDENTIAL_PLACEHOLDERS.join('|');
  return code.replace(new RegExp(`(["'])(?:${placeholders})\\1`, 'g'), `$1${TEST_API_KEY}$1`);
}

/** Replace each env-lookup pattern with the quoted test key. */
export function substituteCredentialReads(code: string, reads: readonly RegExp[]): string {
  return reads.reduce(
    (text, pattern) => text.replace(ensureGlobal(pattern), () => `"${TEST_API_KEY}"`),
    code,
  );
}

function ensureGlobal(pattern: RegExp): RegExp {
  return pattern.flags.includes('g') ? pattern : new RegExp(pattern.source, pattern.flags + 'g');
}

function groupsOf(match: RegExpMatchArray): string[] {
  return Array.from(match).slice(1).map((group) => group ?? '');
}

function applyCallRule(code: string, rule: CallRule): string {
  const flags = rule.pattern.flags.replace('g', '');
  const anywhere = new RegExp(rule.pattern.source, flags + 'g');
  const wholeStatement = new RegExp(`^(?:await\\s+)?(?:${rule.pattern.source})\\s*;?$`, flags);

  return code
    .split('\n')
    .map((line) => {
      const statement = wholeStatement.exec(line.trim());
      if (statement) {
        return leadingWhitespace(line) + rule.statement(groupsOf(statement));
      }

      let out = '';
      let last = 0;
      for (const match of line.matchAll(anywhere)) {
        const index = match.index ?? 0;
        out += line.slice(last, index) + rule.expression(groupsOf(match));
        last = index + match[0].length;
      }
      return out + line.slice(last);
    })
    .join('\n');
}

export function applyRules(code: string, rules: readonly RewriteRule[]): string {
  return rules.reduce((text, rule) => {
    if (rule.kind === 'text') {
      return text.replace(rule.pattern, rule.replace);
    }
    return applyCallRule(text, rule);
  }, code);
}

/**
 * Point every quoted audio path at the sandbox's mock file.
 * Backslashes are escaped so the literal survives in any C-family string.
 */
export function substituteMediaPaths(code: string, mockPath: string): string {
  const escaped = mockPath.replace(/\\/g, '\\\\');
  const extensions = AUDIO_EXTENSIONS.join('|');
  return ['"', "'", '`'].reduce((text, quote) => {
    const pattern = new RegExp(`${quote}[^${quote}\\n]*\\.(?:${extensions})${quote}`, 'gi');
    return text.replace(pattern, () => `${quote}${escaped}${quote}`);
  }, code);
}

/** Replace literal asset-host URLs so samples never fetch real media. */
export function substituteAssetUrls(code: string): string {
  const host = ASSET_HOST.replace(/\./g, '\\.');
  const pattern = new RegExp(`(["'\`])https?://${host}/[^"'\`\\s]*\\1`, 'g');
  return code.replace(pattern, (_match, quote: string) => `${quote}${PLACEHOLDER_URL}${quote}`);
}

/** Prefix each non-blank line with `indent`. */
export function indentLines(lines: readonly string[], indent: string): string[] {
  return lines.map((line) => (line.trim() ? indent + line : ''));
}

/**
 * Collect lines from `start` until the braces opened there close again.
 * A declaration that ends in `;` before any brace opens is one line long.
 * Returns the index just past the block.
 */
export function collectBraceBlock(lines: readonly string[], start: number): number {
  let depth = 0;
  let opened = false;
  let i = start;
  while (i < lines.length) {
    const line = lines[i] ?? '';
    for (const char of line) {
      if (char === '{') {
        depth++;
        opened = true;
      } else if (char === '}') {
        depth--;
      }
    }
    i++;
    if (opened ? depth <= 0 : line.trimEnd().endsWith(';')) break;
  }
  return i;
}
