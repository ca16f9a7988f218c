import type { ParseResultBuilder } from '../parse/parseResult';

/**
 * Handed to every assign action. Lets an action report a problem or stop the parser
 * without the matcher knowing anything about the action.
 */
export class Environment {
  private readonly optionName: string;
  private readonly result: ParseResultBuilder;
  /** Opaque caller value from ParserConfig.context(). */
  readonly context: unknown;

  constructor(optionName: string, result: ParseResultBuilder, context: unknown) {
    this.optionName = optionName;
    this.result = result;
    this.context = context;
  }

  getOptionName(): string {
    return this.optionName;
  }

  addError(message: string): void {
    this.result.addError(this.optionName, 'ActionError', message);
  }

  /** Stop scanning after the current option; post-parse checks are skipped. */
  exitParser(): void {
    this.result.requestExit();
  }
}
