export type OutputStream = {
  write(text: string): unknown;
};

export type ParserConfigData = {
  program: string;
  usage: string;
  description: string;
  epilog: string;
  /** Where help and error descriptions go; process.stdout when unset. */
  output?: OutputStream;
  /** Handed to actions as Environment.context. */
  context?: unknown;
  /** Show help and request exit when invoked without tokens while arguments are required. */
  helpOnEmpty: boolean;
};

export class ParserConfig {
  private readonly values: ParserConfigData = {
    program: '',
    usage: '',
    description: '',
    epilog: '',
    helpOnEmpty: true,
  };

  data(): Readonly<ParserConfigData> {
    return this.values;
  }

  program(program: string): this {
    this.values.program = program;
    return this;
  }

  usage(usage: string): this {
    this.values.usage = usage;
    return this;
  }

  description(description: string): this {
    this.values.description = description;
    return this;
  }

  epilog(epilog: string): this {
    this.values.epilog = epilog;
    return this;
  }

  output(stream: OutputStream): this {
    this.values.output = stream;
    return this;
  }

  context(context: unknown): this {
    this.values.context = context;
    return this;
  }

  helpOnEmpty(enabled: boolean): this {
    this.values.helpOnEmpty = enabled;
    return this;
  }
}
