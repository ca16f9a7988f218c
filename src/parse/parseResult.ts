import type { CommandOptions } from '../definition/command';

export type ErrorKind =
  | 'UnknownOption'
  | 'ExclusiveViolation'
  | 'MissingOption'
  | 'MissingOptionGroup'
  | 'MissingArgument'
  | 'ConversionError'
  | 'InvalidChoice'
  | 'FlagTakesNoParameter'
  | 'ExitRequested'
  | 'ActionError'
  | 'InvalidInput';

export type ParseError = {
  /** Help name of the argument (or group) involved; empty when the error is not tied to one. */
  option: string;
  kind: ErrorKind;
  /** Extra text, e.g. the message an action passed to Environment.addError. */
  detail?: string;
};

export type ParseResult = {
  readonly ok: boolean;
  readonly errors: readonly ParseError[];
  /** Free tokens no positional took. */
  readonly ignoredArguments: readonly string[];
  readonly helpWasShown: boolean;
  readonly errorsWereShown: boolean;
  readonly exitRequested: boolean;
  /** Dispatched sub-commands, outermost first. */
  readonly commands: readonly CommandOptions[];
};

/**
 * Collects the outcome of one parse. Parent and sub-command parsers share a builder.
 */
export class ParseResultBuilder {
  private readonly errors: ParseError[] = [];
  private readonly ignored: string[] = [];
  private readonly commands: CommandOptions[] = [];
  private helpShown = false;
  private errorsShown = false;
  private exitRequested = false;

  addError(option: string, kind: ErrorKind, detail?: string): void {
    this.errors.push(detail === undefined ? { option, kind } : { option, kind, detail });
  }

  addIgnored(token: string): void {
    this.ignored.push(token);
  }

  addCommand(options: CommandOptions): void {
    this.commands.push(options);
  }

  signalHelpShown(): void {
    this.helpShown = true;
  }

  signalErrorsShown(): void {
    this.errorsShown = true;
  }

  requestExit(): void {
    this.exitRequested = true;
  }

  wasExitRequested(): boolean {
    return this.exitRequested;
  }

  wasHelpShown(): boolean {
    return this.helpShown;
  }

  hasErrorKind(kind: ErrorKind): boolean {
    return this.errors.some((e) => e.kind === kind);
  }

  hasArgumentProblems(): boolean {
    return this.errors.some((e) => e.kind !== 'ExitRequested') || this.ignored.length > 0;
  }

  getResult(): ParseResult {
    const errors = Object.freeze(this.errors.map((e) => Object.freeze({ ...e })));
    const ignoredArguments = Object.freeze([...this.ignored]);
    return Object.freeze({
      ok: errors.length === 0 && ignoredArguments.length === 0 && !this.exitRequested,
      errors,
      ignoredArguments,
      helpWasShown: this.helpShown,
      errorsWereShown: this.errorsShown,
      exitRequested: this.exitRequested,
      commands: Object.freeze([...this.commands]),
    });
  }
}
