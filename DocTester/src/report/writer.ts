import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { LanguageReport } from './build.js';
import { renderMarkdown } from './markdown.js';

export interface WrittenReport {
  jsonPath: string;
  markdownPath: string;
}

export async function writeReport(report: LanguageReport, outputDir: string): Promise<WrittenReport> {
  await mkdir(outputDir, { recursive: true });

  const jsonPath = join(outputDir, `${report.language}_test_report.json`);
  const markdownPath = join(outputDir, `${report.language}_test_report.md`);

  await writeFile(jsonPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
  await writeFile(markdownPath, renderMarkdown(report), 'utf-8');

  return { jsonPath, markdownPath };
}
