import type { Environment } from '../values/environment';
import type { AssignAction, Value } from '../values/value';

export type AssignOutcome = 'ok' | 'invalidChoice' | 'conversionError';

export const UNBOUNDED = Number.POSITIVE_INFINITY;

/**
 * Static description of one option or positional plus the per-parse counters the
 * matcher and the post-parse checks read.
 */
export class Option {
  readonly value: Value;
  readonly isPositional: boolean;
  shortName = '';
  longName = '';
  metavar = '';
  help = '';
  minArgs = 0;
  maxArgs = 0;
  isRequired = false;
  flagValue = '1';
  choices: string[] = [];
  assignAction: AssignAction | undefined;
  defaultAction: (() => void) | undefined;
  /** Index into ParserDefinition.groups. */
  groupIndex: number | undefined;

  /** Arguments taken since the option was last started. */
  private activationCount = 0;
  /** Assignments through this argument alone (aliases not included). */
  private ownAssignCount = 0;
  private firstAssignedAt: number | undefined;

  constructor(value: Value, isPositional: boolean) {
    this.value = value;
    this.isPositional = isPositional;
  }

  /** Long name when present, else the short one; positionals have only a long name. */
  getName(): string {
    return this.longName || this.shortName;
  }

  hasName(name: string): boolean {
    return name !== '' && (name === this.longName || name === this.shortName);
  }

  getMetavar(): string {
    if (this.metavar) return this.metavar;
    if (this.isPositional) return this.longName;
    return this.getName().replace(/^-+/, '').toUpperCase();
  }

  getArgumentCounts(): [number, number] {
    return [this.minArgs, this.maxArgs];
  }

  isFlag(): boolean {
    return this.maxArgs === 0;
  }

  acceptsAnyArguments(): boolean {
    return this.maxArgs > 0;
  }

  willAcceptArgument(): boolean {
    return this.activationCount < this.maxArgs;
  }

  needsMoreArguments(): boolean {
    return this.activationCount < this.minArgs;
  }

  getActivationCount(): number {
    return this.activationCount;
  }

  /** True when the target was assigned through this argument or any alias of it. */
  wasAssigned(): boolean {
    return this.value.getAssignCount() > 0;
  }

  /** True when a token was assigned through this very argument. */
  wasAssignedDirectly(): boolean {
    return this.ownAssignCount > 0;
  }

  /** Sequence number of the first assignment in the current parse. */
  getFirstAssignedAt(): number | undefined {
    return this.firstAssignedAt;
  }

  hasDefault(): boolean {
    return this.defaultAction !== undefined;
  }

  assignDefault(): void {
    this.defaultAction?.();
  }

  resetValue(): void {
    this.value.reset();
    this.activationCount = 0;
    this.ownAssignCount = 0;
    this.firstAssignedAt = undefined;
  }

  onOptionStarted(): void {
    this.activationCount = 0;
  }

  /** Assign one argument token; counts toward the arity of the current activation. */
  assignArgument(text: string, env: Environment, sequence: number): AssignOutcome {
    this.activationCount += 1;
    return this.store(text, env, sequence);
  }

  /** Assign the flag value (a flag was matched, or an option with optional arguments got none). */
  assignFlag(env: Environment, sequence: number): AssignOutcome {
    return this.store(this.flagValue, env, sequence);
  }

  private store(text: string, env: Environment, sequence: number): AssignOutcome {
    this.ownAssignCount += 1;
    if (this.firstAssignedAt === undefined) this.firstAssignedAt = sequence;
    if (this.choices.length > 0 && !this.choices.includes(text)) {
      this.value.markBadArgument();
      return 'invalidChoice';
    }
    return this.value.setValue(text, this.assignAction, env) ? 'ok' : 'conversionError';
  }
}
