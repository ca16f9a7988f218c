import { sameTarget, type Value } from '../values/value';
import type { Command } from './command';
import { normalizeGroupName, type OptionGroup } from './group';
import type { Option } from './option';

/**
 * Everything registered on one parser. Arguments, commands and groups live in arrays
 * whose indices never change once an entry is added.
 */
export class ParserDefinition {
  readonly options: Option[] = [];
  readonly positionals: Option[] = [];
  readonly commands: Command[] = [];
  readonly groups: OptionGroup[] = [];

  findOption(name: string): Option | undefined {
    return this.options.find((o) => o.hasName(name));
  }

  findPositional(name: string): Option | undefined {
    return this.positionals.find((o) => o.hasName(name));
  }

  findCommand(name: string): Command | undefined {
    return this.commands.find((c) => c.name === name);
  }

  findGroupIndex(name: string): number | undefined {
    const key = normalizeGroupName(name);
    const idx = this.groups.findIndex((g) => g.name === key);
    return idx < 0 ? undefined : idx;
  }

  groupOf(option: Option): OptionGroup | undefined {
    return option.groupIndex === undefined ? undefined : this.groups[option.groupIndex];
  }

  allArguments(): Option[] {
    return [...this.options, ...this.positionals];
  }

  /**
   * Link `value` with an already registered adapter for the same variable so that
   * assignment counts are shared (e.g. `-v` and `--verbose` bound separately to one field).
   */
  linkTarget(value: Value): void {
    const id = value.targetId();
    for (const arg of this.allArguments()) {
      if (arg.value === value) return;
      if (sameTarget(arg.value.targetId(), id)) {
        value.shareStateWith(arg.value);
        return;
      }
    }
  }
}
