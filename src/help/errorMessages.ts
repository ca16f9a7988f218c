import type { ParseError, ParseResult } from '../parse/parseResult';

export function describeError(e: ParseError): string | undefined {
  switch (e.kind) {
    case 'UnknownOption':
      return `Error: Unknown option: '${e.option}'`;
    case 'ExclusiveViolation':
      return `Error: Only one option from an exclusive group can be set. '${e.option}'`;
    case 'MissingOption':
      return `Error: A required option is missing: '${e.option}'`;
    case 'MissingOptionGroup':
      return `Error: A required option from a group is missing: '${e.option}'`;
    case 'MissingArgument':
      return `Error: An argument is missing: '${e.option}'`;
    case 'ConversionError':
      return `Error: The argument could not be converted: '${e.option}'`;
    case 'InvalidChoice':
      return `Error: The value is not in the list of valid values: '${e.option}'`;
    case 'FlagTakesNoParameter':
      return `Error: Flag options do not accept parameters: '${e.option}'`;
    case 'ActionError':
      return `Error: ${e.detail ?? e.option}`;
    case 'InvalidInput':
      return 'Error: Parser input is invalid.';
    case 'ExitRequested':
      return undefined;
  }
}

/** One line per problem, in the order they were recorded; ignored tokens come last. */
export function describeErrors(result: ParseResult): string[] {
  const lines: string[] = [];
  for (const e of result.errors) {
    const line = describeError(e);
    if (line) lines.push(line);
  }
  if (result.ignoredArguments.length > 0) {
    lines.push(`Error: Ignored arguments: ${result.ignoredArguments.join(', ')}`);
  }
  return lines;
}
