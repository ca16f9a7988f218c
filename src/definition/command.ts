import type { ArgumentParser } from '../argumentParser';
import type { ParseResult } from '../parse/parseResult';

/** A structure that registers its own fields as arguments. */
export interface Options {
  addArguments(parser: ArgumentParser): void;
}

export interface CommandOptions extends Options {
  readonly name: string;
  /** Called by the application after a successful parse; the parser never calls it. */
  execute?(result: ParseResult): void;
}

export type CommandFactory = (name: string) => CommandOptions;

/** Sub-command entry. The factory runs only when the command name is matched. */
export class Command {
  readonly name: string;
  readonly factory: CommandFactory;
  help = '';

  constructor(name: string, factory: CommandFactory) {
    this.name = name;
    this.factory = factory;
  }
}

export class CommandConfig {
  private readonly command: Command;

  constructor(command: Command) {
    this.command = command;
  }

  help(text: string): this {
    this.command.help = text;
    return this;
  }
}
