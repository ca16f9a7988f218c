import { ConversionFailure } from '../errors';
import { warn } from '../notifier';
import type { Environment } from './environment';
import { resolveConversion, type ConvertFn, type ValueType } from './valueTypes';

export type ValueShape = 'void' | 'scalar' | 'optional' | 'sequence';

/**
 * Identity of the variable behind an adapter. Two adapters with equal ids write the
 * same variable and share their assignment count.
 */
export type TargetId = {
  holder: object;
  key: PropertyKey;
  shape: ValueShape;
  typeName: string;
};

export type AssignAction<S = unknown> = (target: Value<S>, text: string, env: Environment) => void;

export type AssignDefaultAction<S = unknown> = (target: Value<S>) => void;

type TargetState = {
  assignCount: number;
  hasErrors: boolean;
};

export function sameTarget(a: TargetId, b: TargetId): boolean {
  return a.holder === b.holder && a.key === b.key && a.shape === b.shape && a.typeName === b.typeName;
}

/**
 * Type-erased binding between an argument and a caller-owned variable (`holder[key]`).
 * S is the type the variable holds; actions and defaults are typed with it.
 */
export abstract class Value<S = unknown> {
  private state: TargetState = { assignCount: 0, hasErrors: false };

  abstract readonly shape: ValueShape;

  /** Current content of the bound variable. */
  abstract current(): S;

  /** Overwrite the bound variable. Used by actions and defaults. */
  abstract store(value: S): void;

  abstract targetId(): TargetId;

  /** Convert one token into the variable (scalar: replace, optional: set, sequence: append). */
  protected abstract assignText(text: string): void;

  /** Put the variable back into its type's zero state. */
  protected abstract clear(): void;

  /**
   * Run `action` (or the conversion for this target) for one token. Returns false when the
   * token could not be converted; the error flag is set in that case.
   */
  setValue(text: string, action: AssignAction<S> | undefined, env: Environment): boolean {
    this.state.assignCount += 1;
    try {
      if (action) action(this, text, env);
      else this.assignText(text);
    } catch (e: unknown) {
      if (!(e instanceof ConversionFailure)) throw e;
      this.markBadArgument();
      return false;
    }
    return true;
  }

  setDefault(action: AssignDefaultAction<S>): void {
    action(this);
  }

  markBadArgument(): void {
    this.state.hasErrors = true;
  }

  hasErrors(): boolean {
    return this.state.hasErrors;
  }

  /** Assignments made through every argument that shares this target. */
  getAssignCount(): number {
    return this.state.assignCount;
  }

  reset(): void {
    this.state.assignCount = 0;
    this.state.hasErrors = false;
    this.clear();
  }

  /** @internal Make this adapter count together with `other` (same target). */
  shareStateWith(other: Value): void {
    this.state = other.state;
  }
}

function convertOrWarn<T>(convert: ConvertFn<T> | undefined, text: string): { value: T } | undefined {
  if (!convert) {
    warn(`Assignment is not implemented. ('${text}')`);
    return undefined;
  }
  return { value: convert(text) };
}

export class ScalarValue<T, K extends PropertyKey = PropertyKey> extends Value<T> {
  readonly shape: ValueShape = 'scalar';
  readonly type: ValueType<T>;
  private readonly holder: Record<K, T>;
  private readonly key: K;
  private readonly convert: ConvertFn<T> | undefined;

  constructor(holder: Record<K, T>, key: K, type: ValueType<T>) {
    super();
    this.holder = holder;
    this.key = key;
    this.type = type;
    this.convert = resolveConversion(type);
  }

  current(): T {
    return this.holder[this.key];
  }

  store(value: T): void {
    this.holder[this.key] = value;
  }

  targetId(): TargetId {
    return { holder: this.holder, key: this.key, shape: this.shape, typeName: this.type.name };
  }

  protected assignText(text: string): void {
    const converted = convertOrWarn(this.convert, text);
    if (converted) this.holder[this.key] = converted.value;
  }

  protected clear(): void {
    this.holder[this.key] = this.type.empty();
  }
}

export class OptionalValue<T, K extends PropertyKey = PropertyKey> extends Value<T | undefined> {
  readonly shape: ValueShape = 'optional';
  readonly type: ValueType<T>;
  private readonly holder: Partial<Record<K, T>>;
  private readonly key: K;
  private readonly convert: ConvertFn<T> | undefined;

  constructor(holder: Partial<Record<K, T>>, key: K, type: ValueType<T>) {
    super();
    this.holder = holder;
    this.key = key;
    this.type = type;
    this.convert = resolveConversion(type);
  }

  current(): T | undefined {
    return this.holder[this.key];
  }

  store(value: T | undefined): void {
    this.holder[this.key] = value;
  }

  targetId(): TargetId {
    return { holder: this.holder, key: this.key, shape: this.shape, typeName: this.type.name };
  }

  protected assignText(text: string): void {
    // Convert first so a failed conversion leaves the optional untouched.
    const converted = convertOrWarn(this.convert, text);
    if (converted) this.holder[this.key] = converted.value;
  }

  protected clear(): void {
    this.holder[this.key] = undefined;
  }
}

export class SequenceValue<T, K extends PropertyKey = PropertyKey> extends Value<T[]> {
  readonly shape: ValueShape = 'sequence';
  readonly type: ValueType<T>;
  private readonly holder: Record<K, T[]>;
  private readonly key: K;
  private readonly convert: ConvertFn<T> | undefined;

  constructor(holder: Record<K, T[]>, key: K, type: ValueType<T>) {
    super();
    this.holder = holder;
    this.key = key;
    this.type = type;
    this.convert = resolveConversion(type);
  }

  current(): T[] {
    return this.holder[this.key];
  }

  store(value: T[]): void {
    this.holder[this.key] = [...value];
  }

  push(value: T): void {
    this.holder[this.key].push(value);
  }

  targetId(): TargetId {
    return { holder: this.holder, key: this.key, shape: this.shape, typeName: this.type.name };
  }

  protected assignText(text: string): void {
    const converted = convertOrWarn(this.convert, text);
    if (converted) this.holder[this.key].push(converted.value);
  }

  protected clear(): void {
    this.holder[this.key] = [];
  }
}

/** Target for arguments that only matter by presence (help options, pure actions). */
export class VoidValue extends Value<undefined> {
  readonly shape: ValueShape = 'void';

  current(): undefined {
    return undefined;
  }

  store(): void {}

  targetId(): TargetId {
    return { holder: this, key: 'void', shape: this.shape, typeName: 'void' };
  }

  protected assignText(): void {}

  protected clear(): void {}
}

// K and T come from `key` and `type` only; the holder is checked against them.
export function scalar<K extends PropertyKey, T>(
  holder: Record<NoInfer<K>, NoInfer<T>>,
  key: K,
  type: ValueType<T>,
): ScalarValue<T, K> {
  return new ScalarValue<T, K>(holder, key, type);
}

export function optional<K extends PropertyKey, T>(
  holder: Partial<Record<NoInfer<K>, NoInfer<T>>>,
  key: K,
  type: ValueType<T>,
): OptionalValue<T, K> {
  return new OptionalValue<T, K>(holder, key, type);
}

export function sequence<K extends PropertyKey, T>(
  holder: Record<NoInfer<K>, NoInfer<T>[]>,
  key: K,
  type: ValueType<T>,
): SequenceValue<T, K> {
  return new SequenceValue<T, K>(holder, key, type);
}

export function voidValue(): VoidValue {
  return new VoidValue();
}
