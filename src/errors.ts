/**
 * Errors raised while registering arguments. These describe programmer mistakes in the
 * parser definition, never bad user input; user input problems end up in ParseResult.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidDefinition extends ConfigurationError {}

export class DuplicateOption extends ConfigurationError {
  readonly groupName: string;
  readonly optionName: string;

  constructor(groupName: string, optionName: string) {
    const where = groupName ? ` (group '${groupName}')` : '';
    super(`Option '${optionName}' is already defined${where}.`);
    this.groupName = groupName;
    this.optionName = optionName;
  }
}

export class DuplicateCommand extends ConfigurationError {
  readonly commandName: string;

  constructor(commandName: string) {
    super(`Command '${commandName}' is already defined.`);
    this.commandName = commandName;
  }
}

export class MixingGroupTypes extends ConfigurationError {
  readonly groupName: string;

  constructor(groupName: string) {
    super(`Group '${groupName}' was already defined with a different kind (exclusive vs. simple).`);
    this.groupName = groupName;
  }
}

export class RequiredExclusiveOption extends ConfigurationError {
  readonly optionName: string;
  readonly groupName: string;

  constructor(optionName: string, groupName: string) {
    super(`Option '${optionName}' is required and can not be in the exclusive group '${groupName}'.`);
    this.optionName = optionName;
    this.groupName = groupName;
  }
}

/**
 * Thrown by value conversions when a token can not be turned into the target type.
 * The value adapter turns it into a ConversionError entry.
 */
export class ConversionFailure extends Error {
  readonly text: string;

  constructor(text: string, typeName: string) {
    super(`'${text}' is not a valid ${typeName}.`);
    this.name = 'ConversionFailure';
    this.text = text;
  }
}
