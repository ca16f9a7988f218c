#!/usr/bin/env node

import { Command, CommanderError, Option } from 'commander';
import { VERSION } from './index';
import { formatHelp } from './help/helpFormatter';
import type { OutputStream } from './parserConfig';
import { createEmptyReport, finalizeReport, recordParseResult, serializeReport } from './report/parseReport';
import { writeReportFile, type ReportFormat } from './report/writeReport';
import { buildParser, loadDefinitionFile } from './schema/definitionFile';

const TOOL_NAME = 'argbind';

type CheckOptions = {
  definition: string;
  tokens: string[];
  report?: string;
  /** Format of the report file; taken from its extension when absent. */
  format?: ReportFormat;
  verbose: boolean;
  /** Where the parser writes help and error descriptions; stderr by default. */
  parserOutput?: OutputStream;
};

type DescribeOptions = {
  definition: string;
  out?: OutputStream;
};

/**
 * Parse `tokens` with the parser described by the definition file and print the
 * parse report. Returns 0 when the parse succeeded (or only showed help), 1 otherwise.
 */
export async function runCheck(opts: CheckOptions): Promise<number> {
  const def = await loadDefinitionFile(opts.definition);
  const { parser, values } = buildParser(def);
  parser.config().output(opts.parserOutput ?? process.stderr);

  const report = createEmptyReport({
    toolName: TOOL_NAME,
    toolVersion: VERSION,
    program: parser.getConfig().program,
    tokens: opts.tokens,
  });
  const result = parser.parseArgs(opts.tokens);
  recordParseResult(report, result, values());
  const final = finalizeReport(report);

  // eslint-disable-next-line no-console
  console.log(serializeReport(final).trimEnd());

  if (opts.report) {
    const written = await writeReportFile(opts.report, final, opts.format);
    if (opts.verbose) {
      // eslint-disable-next-line no-console
      console.error(`Wrote ${written} report: ${opts.report} (findings: ${final.findings.length})`);
    }
  }

  return result.ok || result.helpWasShown ? 0 : 1;
}

export async function runDescribe(opts: DescribeOptions): Promise<number> {
  const def = await loadDefinitionFile(opts.definition);
  const { parser } = buildParser(def);
  const out: OutputStream = opts.out ?? process.stdout;
  out.write(formatHelp(parser));
  return 0;
}

function buildProgram(setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Check command lines against a declarative argument definition.')
    .version(VERSION)
    .exitOverride();

  program
    .command('check')
    .description('Parse the tokens after -- and print a JSON parse report.')
    .requiredOption('-d, --definition <file>', 'Definition file (JSON)')
    .option('--report <file>', 'Also write the report to this file')
    .addOption(new Option('--format <format>', 'Format of the --report file (default: from its extension)').choices(['md', 'json']))
    .option('-v, --verbose', 'Verbose logging', false)
    .argument('[tokens...]', 'Command line to parse')
    .action(async (tokens: string[], raw: { definition: string; report?: string; format?: ReportFormat; verbose: boolean }) => {
      setExitCode(
        await runCheck({
          definition: raw.definition,
          tokens,
          report: raw.report,
          format: raw.format,
          verbose: raw.verbose,
        }),
      );
    });

  program
    .command('describe')
    .description('Print the help text of a definition file.')
    .requiredOption('-d, --definition <file>', 'Definition file (JSON)')
    .action(async (raw: { definition: string }) => {
      setExitCode(await runDescribe({ definition: raw.definition }));
    });

  return program;
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = buildProgram((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // --help and --version end up here with exit code 0.
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 2;
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

if (require.main === module) {
  main(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      // eslint-disable-next-line no-console
      console.error(e);
      process.exitCode = 2;
    });
}
