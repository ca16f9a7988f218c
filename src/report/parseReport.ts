import { describeError } from '../help/errorMessages';
import type { ErrorKind, ParseResult } from '../parse/parseResult';
import { stableStringify } from './stableJson';

export type ReportSeverity = 'info' | 'error';

export type ReportFindingKind = ErrorKind | 'IgnoredArgument';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  /** Argument (or group) the finding is about; empty when none. */
  option: string;
  message: string;
};

export type ParseReport = {
  schema: 'parse-report-v1';
  tool: { name: string; version: string };
  program: string;
  tokens: string[];
  startedAtIso: string;
  finishedAtIso: string;
  ok: boolean;
  helpShown: boolean;
  exitRequested: boolean;
  /** Bound variables after the parse, keyed by destination name. */
  values: Record<string, unknown>;
  commands: string[];
  ignoredArguments: string[];
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  program: string;
  tokens: readonly string[];
  startedAtIso?: string;
}): ParseReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'parse-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    program: args.program,
    tokens: [...args.tokens],
    startedAtIso: now,
    finishedAtIso: now,
    ok: false,
    helpShown: false,
    exitRequested: false,
    values: {},
    commands: [],
    ignoredArguments: [],
    findings: [],
  };
}

export function addFinding(report: ParseReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

/** Copy the outcome of a parse into the report. */
export function recordParseResult(report: ParseReport, result: ParseResult, values: Record<string, unknown>): void {
  report.ok = result.ok;
  report.helpShown = result.helpWasShown;
  report.exitRequested = result.exitRequested;
  report.values = { ...values };
  report.commands = result.commands.map((c) => c.name);
  report.ignoredArguments = [...result.ignoredArguments];

  for (const e of result.errors) {
    addFinding(report, {
      kind: e.kind,
      severity: e.kind === 'ExitRequested' ? 'info' : 'error',
      option: e.option,
      message: describeError(e)?.replace(/^Error: /, '') ?? 'Exit requested',
    });
  }
  for (const token of result.ignoredArguments) {
    addFinding(report, { kind: 'IgnoredArgument', severity: 'error', option: '', message: `Ignored argument: '${token}'` });
  }
}

export function finalizeReport(report: ParseReport, finishedAtIso?: string): ParseReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: ParseReport): string {
  return stableStringify(report);
}
