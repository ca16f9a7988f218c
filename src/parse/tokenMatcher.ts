import type { Command } from '../definition/command';
import type { AssignOutcome, Option } from '../definition/option';
import type { ParserDefinition } from '../definition/parserDefinition';
import { Environment } from '../values/environment';
import type { ParseResultBuilder } from './parseResult';
import { distributeFreeArguments } from './positionals';

export type CommandDispatcher = (command: Command, tokens: readonly string[]) => void;

export type TokenMatcherOptions = {
  /** Opaque value handed to actions through Environment.context. */
  context?: unknown;
  dispatchCommand: CommandDispatcher;
};

const NEGATIVE_NUMBER = /^-\d/;

/**
 * Walks the tokens once and routes each one to an option, the active option's
 * arguments, the positional pool, or a sub-command.
 *
 * Positional tokens are pooled during the scan and handed out when the scan ends (or
 * when a command takes over), so the split between positionals of variable arity can
 * see how many tokens there are.
 */
export class TokenMatcher {
  private readonly def: ParserDefinition;
  private readonly result: ParseResultBuilder;
  private readonly context: unknown;
  private readonly dispatchCommand: CommandDispatcher;

  private active: Option | undefined;
  private freeArguments: string[] = [];
  private ignoreOptions = false;
  private sequence = 0;

  constructor(def: ParserDefinition, result: ParseResultBuilder, options: TokenMatcherOptions) {
    this.def = def;
    this.result = result;
    this.context = options.context;
    this.dispatchCommand = options.dispatchCommand;
  }

  parse(tokens: readonly string[]): void {
    this.active = undefined;
    this.freeArguments = [];
    this.ignoreOptions = false;

    for (let i = 0; i < tokens.length; i++) {
      if (this.result.wasExitRequested()) return;
      const token = tokens[i];

      if (this.ignoreOptions) {
        this.addFreeArgument(token);
      } else if (token === '--') {
        this.ignoreOptions = true;
      } else if (this.isNegativeNumber(token)) {
        this.addFreeArgument(token);
      } else if (token.startsWith('--')) {
        this.matchLongOption(token);
      } else if (token.startsWith('-') && token.length > 1) {
        this.matchShortOption(token);
      } else {
        const command = this.commandFor(token);
        if (command) {
          this.closeOption();
          this.assignPositionals();
          if (this.result.wasExitRequested()) return;
          this.dispatchCommand(command, tokens.slice(i + 1));
          return;
        }
        this.addFreeArgument(token);
      }
    }

    if (this.result.wasExitRequested()) return;
    this.closeOption();
    this.assignPositionals();
  }

  /**
   * `-5` is a value, not an option name, when the active option still wants arguments
   * or when no short option is spelled with its first two characters.
   */
  private isNegativeNumber(token: string): boolean {
    if (!NEGATIVE_NUMBER.test(token)) return false;
    if (this.active?.willAcceptArgument()) return true;
    return this.def.findOption(token.slice(0, 2)) === undefined;
  }

  private commandFor(token: string): Command | undefined {
    if (this.active?.willAcceptArgument()) return undefined;
    return this.def.findCommand(token);
  }

  private matchLongOption(token: string): void {
    const eq = token.indexOf('=');
    const name = eq < 0 ? token : token.slice(0, eq);
    const option = this.def.findOption(name);
    if (!option) {
      this.result.addError(name, 'UnknownOption');
      return;
    }
    if (eq < 0) {
      this.startOption(option);
      return;
    }
    if (option.isFlag()) {
      this.closeOption();
      this.result.addError(option.getName(), 'FlagTakesNoParameter');
      return;
    }
    this.startOption(option);
    this.addFreeArgument(token.slice(eq + 1));
  }

  private matchShortOption(token: string): void {
    const exact = this.def.findOption(token);
    if (exact) {
      this.startOption(exact);
      return;
    }

    // Cluster: -abc is -a -b -c; an option taking arguments swallows the rest (-n10).
    for (let k = 1; k < token.length; k++) {
      if (this.result.wasExitRequested()) return;
      const name = `-${token[k]}`;
      const option = this.def.findOption(name);
      if (!option) {
        this.result.addError(name, 'UnknownOption');
        return;
      }
      this.startOption(option);
      const rest = token.slice(k + 1);
      if (option.acceptsAnyArguments() && rest !== '') {
        this.addFreeArgument(rest);
        return;
      }
    }
  }

  private startOption(option: Option): void {
    this.closeOption();
    option.onOptionStarted();
    if (option.isFlag()) {
      this.report(option, option.assignFlag(this.envFor(option), this.nextSequence()));
      return;
    }
    this.active = option;
  }

  private closeOption(): void {
    const option = this.active;
    if (!option) return;
    this.active = undefined;

    if (option.needsMoreArguments()) {
      this.result.addError(option.getName(), 'MissingArgument');
    } else if (option.getActivationCount() === 0) {
      this.report(option, option.assignFlag(this.envFor(option), this.nextSequence()));
    }
  }

  private addFreeArgument(token: string): void {
    const option = this.active;
    if (option) {
      if (option.willAcceptArgument()) {
        this.report(option, option.assignArgument(token, this.envFor(option), this.nextSequence()));
        if (!option.willAcceptArgument()) this.active = undefined;
        return;
      }
      this.closeOption();
    }
    this.freeArguments.push(token);
  }

  private assignPositionals(): void {
    const positionals = this.def.positionals;
    const free = this.freeArguments;
    this.freeArguments = [];

    const counts = distributeFreeArguments(positionals, free.length);
    let next = 0;
    for (let p = 0; p < positionals.length; p++) {
      const positional = positionals[p];
      for (let n = 0; n < counts[p]; n++) {
        if (this.result.wasExitRequested()) return;
        const token = free[next++];
        this.report(positional, positional.assignArgument(token, this.envFor(positional), this.nextSequence()));
      }
    }
    for (; next < free.length; next++) this.result.addIgnored(free[next]);
  }

  private report(option: Option, outcome: AssignOutcome): void {
    if (outcome === 'invalidChoice') this.result.addError(option.getName(), 'InvalidChoice');
    else if (outcome === 'conversionError') this.result.addError(option.getName(), 'ConversionError');
  }

  private envFor(option: Option): Environment {
    return new Environment(option.getName(), this.result, this.context);
  }

  private nextSequence(): number {
    return this.sequence++;
  }
}
