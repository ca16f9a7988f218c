import type { ParseReport, ReportFinding } from './parseReport';
import { stableStringify } from './stableJson';

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

function formatValue(v: unknown): string {
  if (v === undefined) return '(unset)';
  return stableStringify(v, 0).trim();
}

export function reportToMarkdown(report: ParseReport): string {
  const lines: string[] = [];
  const errors = report.findings.filter((f) => f.severity === 'error');
  const byKind = countByKind(report.findings);

  lines.push(`# Parse report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Program: \`${report.program}\``);
  lines.push(`- Tokens: ${report.tokens.length > 0 ? report.tokens.map((t) => `\`${t}\``).join(' ') : '(none)'}`);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Result: **${report.ok ? 'ok' : 'failed'}** (errors: **${errors.length}**)`);
  if (report.helpShown) lines.push(`- Help was shown`);
  if (report.exitRequested) lines.push(`- Exit was requested`);
  if (report.commands.length > 0) lines.push(`- Commands: ${report.commands.join(' > ')}`);
  lines.push('');

  lines.push(`## Values`);
  lines.push('');
  lines.push(`| Name | Value |`);
  lines.push(`|---|---|`);
  const names = Object.keys(report.values).sort((a, b) => a.localeCompare(b));
  for (const k of names) lines.push(`| ${escapeCell(k)} | ${escapeCell(formatValue(report.values[k]))} |`);
  if (names.length === 0) lines.push(`| (none) |  |`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  // Findings stay in the order the parser recorded them.
  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Argument | Message |`);
  lines.push(`|---|---|---|---|`);
  for (const f of report.findings) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(f.option)} | ${escapeCell(f.message)} |`);
  }
  if (report.findings.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
