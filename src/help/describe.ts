import type { Command } from '../definition/command';
import type { Option } from '../definition/option';
import type { ParserDefinition } from '../definition/parserDefinition';

export type GroupHelp = {
  name: string;
  title: string;
  description: string;
  isExclusive: boolean;
  isRequired: boolean;
};

/** What a help formatter needs to know about one argument or command. */
export type ArgumentHelpResult = {
  helpName: string;
  shortName: string;
  longName: string;
  metavar: string;
  /** Usage fragment for the argument's values, e.g. `FILE [FILE ...]`; empty for flags. */
  arguments: string;
  help: string;
  isRequired: boolean;
  isCommand: boolean;
  group?: GroupHelp;
};

/**
 * `min` copies of the metavar followed by the optional part:
 * `[M ...]` when unbounded, `[M]` when one more is allowed, `[M {0..k}]` otherwise.
 */
export function formatArgumentCounts(metavar: string, minArgs: number, maxArgs: number): string {
  const parts: string[] = [];
  for (let i = 0; i < minArgs; i++) parts.push(metavar);
  const extra = maxArgs - minArgs;
  if (!Number.isFinite(maxArgs)) parts.push(`[${metavar} ...]`);
  else if (extra === 1) parts.push(`[${metavar}]`);
  else if (extra > 1) parts.push(`[${metavar} {0..${extra}}]`);
  return parts.join(' ');
}

export function describeOption(def: ParserDefinition, option: Option): ArgumentHelpResult {
  const metavar = option.getMetavar();
  const help: ArgumentHelpResult = {
    helpName: option.getName(),
    shortName: option.shortName,
    longName: option.longName,
    metavar,
    arguments: option.acceptsAnyArguments() ? formatArgumentCounts(metavar, option.minArgs, option.maxArgs) : '',
    help: option.help,
    isRequired: option.isRequired,
    isCommand: false,
  };

  const group = def.groupOf(option);
  if (group) {
    help.group = {
      name: group.name,
      title: group.title,
      description: group.description,
      isExclusive: group.isExclusive,
      isRequired: group.isRequired,
    };
  }
  return help;
}

export function describeCommand(command: Command): ArgumentHelpResult {
  return {
    helpName: command.name,
    shortName: '',
    longName: command.name,
    metavar: '',
    arguments: '',
    help: command.help,
    isRequired: false,
    isCommand: true,
  };
}

/** Options first, then positionals, then commands, each in registration order. */
export function describeDefinition(def: ParserDefinition): ArgumentHelpResult[] {
  return [
    ...def.options.map((o) => describeOption(def, o)),
    ...def.positionals.map((p) => describeOption(def, p)),
    ...def.commands.map(describeCommand),
  ];
}
