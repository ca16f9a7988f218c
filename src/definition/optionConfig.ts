import { InvalidDefinition } from '../errors';
import type { AssignAction, AssignDefaultAction, Value } from '../values/value';
import { UNBOUNDED, type Option } from './option';

function checkCount(what: string, count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidDefinition(`${what} must be a non-negative integer (got ${count}).`);
  }
}

/**
 * Fluent configuration for one registered argument. S is the type held by the bound
 * variable, so defaults and actions are checked against it.
 */
export class OptionConfig<S> {
  private readonly option: Option;
  private readonly value: Value<S>;

  constructor(option: Option, value: Value<S>) {
    this.option = option;
    this.value = value;
  }

  /** Exactly `count` arguments. */
  nargs(count: number): this {
    checkCount('nargs', count);
    return this.setArity(count, count);
  }

  /** At least `count` arguments, no upper bound. */
  minargs(count: number): this {
    checkCount('minargs', count);
    return this.setArity(count, UNBOUNDED);
  }

  /** At most `count` arguments. */
  maxargs(count: number): this {
    checkCount('maxargs', count);
    return this.setArity(0, count);
  }

  required(isRequired = true): this {
    this.option.isRequired = isRequired;
    return this;
  }

  /** Value stored when the argument is not given. */
  absent(value: S): this {
    this.option.defaultAction = () => this.value.store(value);
    return this;
  }

  absentAction(action: AssignDefaultAction<S>): this {
    this.option.defaultAction = () => this.value.setDefault(action);
    return this;
  }

  /** Token assigned when a flag is matched; defaults to "1". */
  flagValue(text: string): this {
    this.option.flagValue = text;
    return this;
  }

  choices(values: readonly string[]): this {
    this.option.choices = [...values];
    return this;
  }

  action(action: AssignAction<S>): this {
    const value = this.value;
    this.option.assignAction = (_target, text, env) => action(value, text, env);
    return this;
  }

  metavar(metavar: string): this {
    this.option.metavar = metavar;
    return this;
  }

  help(text: string): this {
    this.option.help = text;
    return this;
  }

  private setArity(minArgs: number, maxArgs: number): this {
    const { option } = this;
    const holdsOneValue = option.value.shape === 'scalar' || option.value.shape === 'optional';
    if (option.isPositional && holdsOneValue && (minArgs !== 1 || maxArgs !== 1)) {
      throw new InvalidDefinition(`Positional argument '${option.getName()}' holds a single value and takes exactly one argument.`);
    }
    option.minArgs = minArgs;
    option.maxArgs = maxArgs;
    if (option.isPositional) option.isRequired = minArgs > 0;
    return this;
  }
}
