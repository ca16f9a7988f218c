import fs from 'node:fs/promises';
import path from 'node:path';
import { reportToMarkdown } from './markdownReport';
import { serializeReport, type ParseReport } from './parseReport';

export type ReportFormat = 'json' | 'md';

/** `.json` files get the JSON report; anything else gets Markdown. */
export function reportFormatFor(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(outFile: string, report: ParseReport, format?: ReportFormat): Promise<ReportFormat> {
  const chosen = format ?? reportFormatFor(outFile);
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  await fs.writeFile(outFile, chosen === 'json' ? serializeReport(report) : reportToMarkdown(report), 'utf8');
  return chosen;
}
