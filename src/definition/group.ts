/**
 * Constraint over a set of options. Options point at a group by its index in
 * ParserDefinition.groups; the group itself owns nothing.
 */
export class OptionGroup {
  /** Lower-cased; group lookup is case-insensitive. */
  readonly name: string;
  readonly isExclusive: boolean;
  title = '';
  description = '';
  isRequired = false;

  constructor(name: string, isExclusive: boolean) {
    this.name = name;
    this.isExclusive = isExclusive;
  }
}

export function normalizeGroupName(name: string): string {
  return name.toLowerCase();
}

/** Fluent configuration returned by ArgumentParser.addGroup / addExclusiveGroup. */
export class GroupConfig {
  private readonly group: OptionGroup;

  constructor(group: OptionGroup) {
    this.group = group;
  }

  title(title: string): this {
    this.group.title = title;
    return this;
  }

  description(description: string): this {
    this.group.description = description;
    return this;
  }

  /** At least one member must be given (exactly one for an exclusive group). */
  required(isRequired = true): this {
    this.group.isRequired = isRequired;
    return this;
  }
}
