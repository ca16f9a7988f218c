import { Command, CommandConfig, type CommandFactory, type Options } from './definition/command';
import { GroupConfig, OptionGroup, normalizeGroupName } from './definition/group';
import { Option, UNBOUNDED } from './definition/option';
import { OptionConfig } from './definition/optionConfig';
import { ParserDefinition } from './definition/parserDefinition';
import {
  DuplicateCommand,
  DuplicateOption,
  InvalidDefinition,
  MixingGroupTypes,
  RequiredExclusiveOption,
} from './errors';
import { describeDefinition, describeOption, type ArgumentHelpResult } from './help/describe';
import { describeErrors } from './help/errorMessages';
import { HelpFormatter } from './help/helpFormatter';
import { warn } from './notifier';
import { ParseResultBuilder, type ParseResult } from './parse/parseResult';
import { TokenMatcher } from './parse/tokenMatcher';
import { ParserConfig, type OutputStream, type ParserConfigData } from './parserConfig';
import { voidValue, type Value } from './values/value';

function isTokenList(tokens: unknown): tokens is readonly string[] {
  return Array.isArray(tokens) && tokens.every((t) => typeof t === 'string');
}

/**
 * Registration API and parse entry point.
 *
 * Arguments are bound to caller-owned variables through value adapters; a parse resets
 * every target, matches the tokens and then checks required options, exclusive groups
 * and required groups. One parser serves one parse at a time.
 */
export class ArgumentParser {
  private readonly parserConfig = new ParserConfig();
  private readonly definition = new ParserDefinition();
  private readonly helpOptionNames = new Set<string>();
  private readonly targets: Options[] = [];
  private activeGroupIndex: number | undefined;
  private defaultHelpChecked = false;

  config(): ParserConfig {
    return this.parserConfig;
  }

  getConfig(): Readonly<ParserConfigData> {
    return this.parserConfig.data();
  }

  getDefinition(): ParserDefinition {
    return this.definition;
  }

  addCommand(name: string, factory: CommandFactory): CommandConfig {
    if (name === '') throw new InvalidDefinition('A command must have a name.');
    if (name.startsWith('-')) throw new InvalidDefinition('Command name must not start with a dash.');
    if (this.definition.findCommand(name)) throw new DuplicateCommand(name);

    const command = new Command(name, factory);
    this.definition.commands.push(command);
    return new CommandConfig(command);
  }

  /**
   * Register an option (all names start with a dash) or a positional (no name does).
   * A single-dash name is the short spelling and has one character after the dash.
   */
  addArgument<S>(value: Value<S>, name = '', altName = ''): OptionConfig<S> {
    const option = this.tryAddArgument(value, [name, altName]);
    return new OptionConfig(option, value);
  }

  /** Register a structure's arguments; the parser keeps the structure alive. */
  addArguments(options: Options): void {
    this.targets.push(options);
    options.addArguments(this);
  }

  /** Add `-h` and `--help` (whichever names are still free) as help options. */
  addDefaultHelpOption(): OptionConfig<undefined> {
    const shortName = '-h';
    const longName = '--help';
    const hasShort = this.definition.findOption(shortName) !== undefined;
    const hasLong = this.definition.findOption(longName) !== undefined;

    if (!hasShort && !hasLong) return this.addHelpOption(shortName, longName);
    if (!hasShort) return this.addHelpOption(shortName);
    if (!hasLong) return this.addHelpOption(longName);
    throw new InvalidDefinition('The default help options are hidden by other options.');
  }

  addHelpOption(name: string, altName = ''): OptionConfig<undefined> {
    if ((name !== '' && !name.startsWith('-')) || (altName !== '' && !altName.startsWith('-'))) {
      throw new InvalidDefinition('A help argument must be an option.');
    }
    const value = voidValue();
    const config = this.addArgument(value, name, altName).help('Display this help message and exit.');
    if (name !== '') this.helpOptionNames.add(name);
    if (altName !== '') this.helpOptionNames.add(altName);
    return config;
  }

  /** Start (or resume) a simple group; arguments added until endGroup() join it. */
  addGroup(name: string): GroupConfig {
    return this.openGroup(name, false);
  }

  /** Start (or resume) an exclusive group: at most one member may be given. */
  addExclusiveGroup(name: string): GroupConfig {
    return this.openGroup(name, true);
  }

  endGroup(): void {
    this.activeGroupIndex = undefined;
  }

  parseArgs(tokens: readonly string[] | null | undefined, skipArgs = 0): ParseResult {
    const result = new ParseResultBuilder();
    if (!isTokenList(tokens)) {
      result.addError('argv', 'InvalidInput');
      return this.finish(result);
    }
    this.verifyDefinedOptions();
    this.parseInto(tokens.slice(Math.max(0, skipArgs)), result);
    return this.finish(result);
  }

  /** Parse a `process.argv`-shaped list: the node binary and script path are skipped. */
  parseArgv(argv: readonly string[] | null | undefined = process.argv, skipArgs = 2): ParseResult {
    return this.parseArgs(argv, skipArgs);
  }

  describeArgument(name: string): ArgumentHelpResult {
    const option = name.startsWith('-') ? this.definition.findOption(name) : this.definition.findPositional(name);
    if (!option) throw new InvalidDefinition(`Unknown argument '${name}'.`);
    return describeOption(this.definition, option);
  }

  describeArguments(): ArgumentHelpResult[] {
    return describeDefinition(this.definition);
  }

  private output(): OutputStream {
    return this.getConfig().output ?? process.stdout;
  }

  private finish(result: ParseResultBuilder): ParseResult {
    if (!result.hasArgumentProblems()) return result.getResult();
    result.signalErrorsShown();
    const res = result.getResult();
    const out = this.output();
    for (const line of describeErrors(res)) out.write(`${line}\n`);
    return res;
  }

  /** Reset, match and check; sub-command parsers run this with the parent's builder. */
  private parseInto(tokens: readonly string[], result: ParseResultBuilder): void {
    for (const arg of this.definition.allArguments()) arg.resetValue();

    const emptyWithRequired = tokens.length === 0 && this.getConfig().helpOnEmpty && this.hasRequiredArguments();
    if (emptyWithRequired || this.hasHelpToken(tokens)) {
      new HelpFormatter().format(this, this.output());
      result.signalHelpShown();
      result.requestExit();
      return;
    }

    const matcher = new TokenMatcher(this.definition, result, {
      context: this.getConfig().context,
      dispatchCommand: (command, rest) => this.runCommand(command, rest, result),
    });
    matcher.parse(tokens);

    if (result.wasExitRequested()) {
      if (!result.wasHelpShown() && !result.hasErrorKind('ExitRequested')) result.addError('', 'ExitRequested');
      return;
    }

    this.assignDefaultValues();
    this.reportMissingOptions(result);
    this.reportExclusiveViolations(result);
    this.reportMissingGroups(result);
  }

  private runCommand(command: Command, tokens: readonly string[], result: ParseResultBuilder): void {
    const options = command.factory(command.name);
    result.addCommand(options);

    const cfg = this.getConfig();
    const child = new ArgumentParser();
    child
      .config()
      .program(`${cfg.program} ${command.name}`.trim())
      .context(cfg.context)
      .helpOnEmpty(cfg.helpOnEmpty)
      .output(this.output());
    child.addArguments(options);
    child.verifyDefinedOptions();
    child.parseInto(tokens, result);
  }

  /** Help tokens count only before `--` and before the first command name. */
  private hasHelpToken(tokens: readonly string[]): boolean {
    for (const token of tokens) {
      if (token === '--' || this.definition.findCommand(token)) return false;
      if (this.helpOptionNames.has(token)) return true;
    }
    return false;
  }

  private hasRequiredArguments(): boolean {
    return (
      this.definition.options.some((o) => o.isRequired) || this.definition.positionals.some((p) => p.isRequired)
    );
  }

  private verifyDefinedOptions(): void {
    if (this.helpOptionNames.size === 0 && !this.defaultHelpChecked) {
      this.defaultHelpChecked = true;
      this.endGroup();
      try {
        this.addDefaultHelpOption();
      } catch (e: unknown) {
        if (!(e instanceof InvalidDefinition)) throw e;
        warn(e.message);
      }
    }

    for (const option of this.definition.options) {
      const group = this.definition.groupOf(option);
      if (option.isRequired && group?.isExclusive) throw new RequiredExclusiveOption(option.getName(), group.name);
    }
  }

  private assignDefaultValues(): void {
    for (const arg of this.definition.allArguments()) {
      if (!arg.wasAssigned() && arg.hasDefault()) arg.assignDefault();
    }
  }

  private reportMissingOptions(result: ParseResultBuilder): void {
    for (const option of this.definition.options) {
      if (option.isRequired && !option.wasAssigned()) result.addError(option.getName(), 'MissingOption');
    }
    for (const positional of this.definition.positionals) {
      if (positional.needsMoreArguments()) result.addError(positional.getName(), 'MissingArgument');
    }
  }

  private reportExclusiveViolations(result: ParseResultBuilder): void {
    const assignedByGroup = new Map<number, Option[]>();
    for (const option of this.definition.options) {
      const idx = option.groupIndex;
      if (idx === undefined || !this.definition.groups[idx].isExclusive || !option.wasAssignedDirectly()) continue;
      const members = assignedByGroup.get(idx) ?? [];
      members.push(option);
      assignedByGroup.set(idx, members);
    }

    for (const members of assignedByGroup.values()) {
      if (members.length < 2) continue;
      const first = [...members].sort(
        (a, b) => (a.getFirstAssignedAt() ?? UNBOUNDED) - (b.getFirstAssignedAt() ?? UNBOUNDED),
      )[0];
      result.addError(first.getName(), 'ExclusiveViolation');
    }
  }

  private reportMissingGroups(result: ParseResultBuilder): void {
    const assignedByGroup = new Map<number, number>();
    for (const option of this.definition.options) {
      const idx = option.groupIndex;
      if (idx === undefined || !this.definition.groups[idx].isRequired) continue;
      assignedByGroup.set(idx, (assignedByGroup.get(idx) ?? 0) + (option.wasAssigned() ? 1 : 0));
    }

    for (const [idx, count] of assignedByGroup) {
      if (count < 1) result.addError(this.definition.groups[idx].name, 'MissingOptionGroup');
    }
  }

  private openGroup(name: string, isExclusive: boolean): GroupConfig {
    if (name === '') throw new InvalidDefinition('A group must have a name.');
    const existing = this.definition.findGroupIndex(name);
    if (existing !== undefined) {
      if (this.definition.groups[existing].isExclusive !== isExclusive) throw new MixingGroupTypes(name);
      this.activeGroupIndex = existing;
    } else {
      this.definition.groups.push(new OptionGroup(normalizeGroupName(name), isExclusive));
      this.activeGroupIndex = this.definition.groups.length - 1;
    }
    return new GroupConfig(this.definition.groups[this.activeGroupIndex]);
  }

  private tryAddArgument(value: Value, names: string[]): Option {
    const given = names.filter((n) => n !== '');
    if (given.length === 0) throw new InvalidDefinition('An argument must have a name.');
    if (given.some((n) => /\s/.test(n))) throw new InvalidDefinition('Argument names must not contain spaces.');

    const dashed = given.filter((n) => n.startsWith('-'));
    if (dashed.length === 0) return this.addPositional(value, given[0]);
    if (dashed.length === given.length) return this.addOption(value, given);
    throw new InvalidDefinition('The argument must be either positional or an option.');
  }

  private addPositional(value: Value, name: string): Option {
    const positional = new Option(value, true);
    positional.longName = name;
    if (value.shape === 'sequence') {
      positional.minArgs = 0;
      positional.maxArgs = UNBOUNDED;
    } else {
      positional.minArgs = 1;
      positional.maxArgs = 1;
    }
    positional.isRequired = positional.minArgs > 0;

    // Positionals are required, so only a simple group can hold them.
    const idx = this.activeGroupIndex;
    if (idx !== undefined && !this.definition.groups[idx].isExclusive) positional.groupIndex = idx;

    this.definition.linkTarget(value);
    this.definition.positionals.push(positional);
    return positional;
  }

  private addOption(value: Value, names: string[]): Option {
    const option = new Option(value, false);
    for (const name of names) {
      if (name === '-' || name === '--') continue;
      if (name.startsWith('--')) {
        option.longName = name;
      } else {
        if (name.length > 2) throw new InvalidDefinition('Short option name has too many characters.');
        option.shortName = name;
      }
    }
    if (option.getName() === '') throw new InvalidDefinition('An option must have a name.');
    this.ensureIsNewOption(option.longName);
    this.ensureIsNewOption(option.shortName);

    option.groupIndex = this.activeGroupIndex;
    this.definition.linkTarget(value);
    this.definition.options.push(option);
    return option;
  }

  private ensureIsNewOption(name: string): void {
    if (name === '') return;
    const existing = this.definition.findOption(name);
    if (!existing) return;
    throw new DuplicateOption(this.definition.groupOf(existing)?.name ?? '', name);
  }
}
