import fs from 'node:fs/promises';
import Ajv from 'ajv/dist/2020';

import { ArgumentParser } from '../argumentParser';
import type { CommandOptions } from '../definition/command';
import type { OptionConfig } from '../definition/optionConfig';
import { ConfigurationError } from '../errors';
import { optional, scalar, sequence } from '../values/value';
import { boolean, float, integer, resolveConversion, string, type ValueType } from '../values/valueTypes';
import definitionSchema from './definition-schema.json';

export type ArgumentTypeName = 'integer' | 'float' | 'string' | 'boolean';
export type ArgumentShape = 'scalar' | 'optional' | 'sequence';

export type ArgumentSpec = {
  names: string[];
  /** Key in the collected values; defaults to the long name without dashes. */
  dest?: string;
  type?: ArgumentTypeName;
  shape?: ArgumentShape;
  /** `count` adds one to an integer for every occurrence (e.g. -vvv). */
  action?: 'store' | 'count';
  nargs?: number;
  minargs?: number;
  maxargs?: number;
  required?: boolean;
  default?: string | string[];
  flagValue?: string;
  choices?: string[];
  metavar?: string;
  help?: string;
  group?: string;
};

export type GroupSpec = {
  name: string;
  exclusive?: boolean;
  required?: boolean;
  title?: string;
  description?: string;
};

export type CommandSpec = {
  name: string;
  help?: string;
  arguments?: ArgumentSpec[];
  groups?: GroupSpec[];
  commands?: CommandSpec[];
};

export type DefinitionFile = {
  program?: string;
  usage?: string;
  description?: string;
  epilog?: string;
  helpOnEmpty?: boolean;
  arguments?: ArgumentSpec[];
  groups?: GroupSpec[];
  commands?: CommandSpec[];
};

export class DefinitionFileError extends ConfigurationError {}

export type BoundParser = {
  parser: ArgumentParser;
  /** Current content of every bound variable; command values are prefixed with `<command>.`. */
  values(): Record<string, unknown>;
};

type Holders<T> = {
  scalar: Record<string, T>;
  optional: Partial<Record<string, T>>;
  sequence: Record<string, T[]>;
};

function makeHolders<T>(): Holders<T> {
  return { scalar: {}, optional: {}, sequence: {} };
}

type BuildContext = {
  prefix: string;
  readers: Map<string, () => unknown>;
  holders: {
    integer: Holders<number>;
    float: Holders<number>;
    string: Holders<string>;
    boolean: Holders<boolean>;
  };
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDefinition = ajv.compile<DefinitionFile>(definitionSchema);

export function parseDefinitionFile(json: string, source = 'definition'): DefinitionFile {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new DefinitionFileError(`Failed to parse ${source}: ${msg}`);
  }
  if (!validateDefinition(data)) {
    const problems = (validateDefinition.errors ?? []).map((err) => `${err.instancePath || '/'} ${err.message ?? ''}`.trim());
    throw new DefinitionFileError(`Invalid ${source}:\n${problems.join('\n')}`);
  }
  return data;
}

export async function loadDefinitionFile(filePath: string): Promise<DefinitionFile> {
  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf8');
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new DefinitionFileError(`Failed to read definition file: ${filePath}\n${msg}`);
  }
  return parseDefinitionFile(json, filePath);
}

function destOf(spec: ArgumentSpec): string {
  if (spec.dest) return spec.dest;
  const long = spec.names.find((n) => n.startsWith('--'));
  return (long ?? spec.names[0]).replace(/^-+/, '');
}

function convertDefault<T>(type: ValueType<T>, text: string, dest: string): T {
  const convert = resolveConversion(type);
  if (!convert) throw new DefinitionFileError(`Default of '${dest}' can not be converted to ${type.name}.`);
  try {
    return convert(text);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new DefinitionFileError(`Default of '${dest}' is invalid: ${msg}`);
  }
}

function applyCommon<S>(cfg: OptionConfig<S>, spec: ArgumentSpec): void {
  if (spec.nargs !== undefined) cfg.nargs(spec.nargs);
  if (spec.minargs !== undefined) cfg.minargs(spec.minargs);
  if (spec.maxargs !== undefined) cfg.maxargs(spec.maxargs);
  if (spec.required !== undefined) cfg.required(spec.required);
  if (spec.flagValue !== undefined) cfg.flagValue(spec.flagValue);
  if (spec.choices) cfg.choices(spec.choices);
  if (spec.metavar) cfg.metavar(spec.metavar);
  if (spec.help) cfg.help(spec.help);
}

function bindArgument<T>(parser: ArgumentParser, spec: ArgumentSpec, type: ValueType<T>, holders: Holders<T>, ctx: BuildContext): void {
  const dest = destOf(spec);
  const [name, altName = ''] = spec.names;
  const key = `${ctx.prefix}${dest}`;
  const shape = spec.shape ?? 'scalar';
  const defaults = spec.default === undefined ? undefined : Array.isArray(spec.default) ? spec.default : [spec.default];

  if (shape === 'sequence') {
    const cfg = parser.addArgument(sequence(holders.sequence, dest, type), name, altName);
    applyCommon(cfg, spec);
    if (defaults) cfg.absent(defaults.map((d) => convertDefault(type, d, dest)));
    ctx.readers.set(key, () => holders.sequence[dest]);
    return;
  }

  if (defaults && defaults.length !== 1) throw new DefinitionFileError(`Default of '${dest}' must be a single value.`);
  const def = defaults ? convertDefault(type, defaults[0], dest) : undefined;

  if (shape === 'optional') {
    const cfg = parser.addArgument(optional(holders.optional, dest, type), name, altName);
    applyCommon(cfg, spec);
    if (def !== undefined) cfg.absent(def);
    ctx.readers.set(key, () => holders.optional[dest]);
    return;
  }

  const cfg = parser.addArgument(scalar(holders.scalar, dest, type), name, altName);
  applyCommon(cfg, spec);
  if (def !== undefined) cfg.absent(def);
  ctx.readers.set(key, () => holders.scalar[dest]);
}

function bindCounter(parser: ArgumentParser, spec: ArgumentSpec, ctx: BuildContext): void {
  if ((spec.type ?? 'integer') !== 'integer' || (spec.shape ?? 'scalar') !== 'scalar') {
    throw new DefinitionFileError(`Argument '${spec.names[0]}': the count action needs a scalar integer.`);
  }
  const dest = destOf(spec);
  const holder = ctx.holders.integer.scalar;
  const [name, altName = ''] = spec.names;
  const cfg = parser.addArgument(scalar(holder, dest, integer), name, altName);
  applyCommon(cfg, spec);
  cfg.action((target) => target.store(target.current() + 1));
  ctx.readers.set(`${ctx.prefix}${dest}`, () => holder[dest]);
}

function registerArgument(parser: ArgumentParser, spec: ArgumentSpec, ctx: BuildContext): void {
  if (spec.action === 'count') {
    bindCounter(parser, spec, ctx);
    return;
  }
  switch (spec.type ?? 'string') {
    case 'integer':
      return bindArgument(parser, spec, integer, ctx.holders.integer, ctx);
    case 'float':
      return bindArgument(parser, spec, float, ctx.holders.float, ctx);
    case 'boolean':
      return bindArgument(parser, spec, boolean, ctx.holders.boolean, ctx);
    case 'string':
      return bindArgument(parser, spec, string, ctx.holders.string, ctx);
  }
}

function registerAll(parser: ArgumentParser, spec: CommandSpec | DefinitionFile, ctx: BuildContext): void {
  const groups = new Map((spec.groups ?? []).map((g) => [g.name.toLowerCase(), g]));

  for (const arg of spec.arguments ?? []) {
    if (arg.group === undefined) {
      registerArgument(parser, arg, ctx);
      continue;
    }
    const group = groups.get(arg.group.toLowerCase());
    if (!group) throw new DefinitionFileError(`Argument '${arg.names[0]}' refers to unknown group '${arg.group}'.`);
    const cfg = group.exclusive ? parser.addExclusiveGroup(group.name) : parser.addGroup(group.name);
    if (group.title) cfg.title(group.title);
    if (group.description) cfg.description(group.description);
    if (group.required) cfg.required();
    registerArgument(parser, arg, ctx);
    parser.endGroup();
  }

  for (const command of spec.commands ?? []) {
    const childCtx: BuildContext = {
      prefix: `${ctx.prefix}${command.name}.`,
      readers: ctx.readers,
      holders: newHolders(),
    };
    const factory = (name: string): CommandOptions => ({
      name,
      addArguments: (child) => registerAll(child, command, childCtx),
    });
    const cfg = parser.addCommand(command.name, factory);
    if (command.help) cfg.help(command.help);
  }
}

function newHolders(): BuildContext['holders'] {
  return {
    integer: makeHolders<number>(),
    float: makeHolders<number>(),
    string: makeHolders<string>(),
    boolean: makeHolders<boolean>(),
  };
}

/** Build a parser whose arguments are bound to fresh holders described by `def`. */
export function buildParser(def: DefinitionFile): BoundParser {
  const parser = new ArgumentParser();
  const cfg = parser.config();
  if (def.program) cfg.program(def.program);
  if (def.usage) cfg.usage(def.usage);
  if (def.description) cfg.description(def.description);
  if (def.epilog) cfg.epilog(def.epilog);
  if (def.helpOnEmpty !== undefined) cfg.helpOnEmpty(def.helpOnEmpty);

  const readers = new Map<string, () => unknown>();
  registerAll(parser, def, { prefix: '', readers, holders: newHolders() });

  return {
    parser,
    values: () => {
      const out: Record<string, unknown> = {};
      for (const [key, read] of readers) out[key] = read();
      return out;
    },
  };
}
