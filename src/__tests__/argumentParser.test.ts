import { ArgumentParser } from '../argumentParser';
import type { CommandOptions, Options } from '../definition/command';
import { DuplicateCommand, DuplicateOption, InvalidDefinition, MixingGroupTypes, RequiredExclusiveOption } from '../errors';
import { setWarningSink } from '../notifier';
import { optional, scalar, sequence, voidValue } from '../values/value';
import { boolean, constructible, integer, string } from '../values/valueTypes';

function collectOutput(parser: ArgumentParser): string[] {
  const chunks: string[] = [];
  parser.config().output({
    write: (text: string) => {
      chunks.push(text);
    },
  });
  return chunks;
}

describe('ArgumentParser: matching', () => {
  test('negative numbers go to the option that still wants an argument, then to positionals', () => {
    const vars = { num: 0, number: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);
    parser.addArgument(scalar(vars, 'number', integer), 'number');

    const res = parser.parseArgs(['--num', '-5', '-6']);

    expect(res.ok).toBe(true);
    expect(vars).toEqual({ num: -5, number: -6 });
  });

  test('a token spelled like a registered short option is that option', () => {
    const vars: { one: boolean; rest: string[] } = { one: false, rest: [] };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'one', boolean), '-1');
    parser.addArgument(sequence(vars, 'rest', string), 'rest');

    const res = parser.parseArgs(['-1', '-2']);

    expect(res.ok).toBe(true);
    expect(vars).toEqual({ one: true, rest: ['-2'] });
  });

  test('an option waiting for its argument takes a negative number even if an option has that name', () => {
    const vars = { num: 0, five: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);
    parser.addArgument(scalar(vars, 'five', boolean), '-5');

    expect(parser.parseArgs(['--num', '-5']).ok).toBe(true);
    expect(vars).toEqual({ num: -5, five: false });

    expect(parser.parseArgs(['-5']).ok).toBe(true);
    expect(vars).toEqual({ num: 0, five: true });
  });

  test('an unknown option is reported once and the parse fails', () => {
    const vars = { num: 0 };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);

    const res = parser.parseArgs(['--bogus']);

    expect(res.ok).toBe(false);
    expect(res.errors).toEqual([{ option: '--bogus', kind: 'UnknownOption' }]);
    expect(res.errorsWereShown).toBe(true);
    expect(out).toEqual(["Error: Unknown option: '--bogus'\n"]);
  });

  test('positionals of variable arity leave tokens for the ones after them', () => {
    const vars: { a: string[]; b: string } = { a: [], b: '' };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(sequence(vars, 'a', string), 'a').minargs(1);
    parser.addArgument(scalar(vars, 'b', string), 'b');

    const res = parser.parseArgs(['t1', 't2', 't3']);

    expect(res.ok).toBe(true);
    expect(vars.a).toEqual(['t1', 't2']);
    expect(vars.b).toBe('t3');
  });

  test('assigning a scalar twice keeps the last value and aliases share the count', () => {
    const vars = { n: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    const short = scalar(vars, 'n', integer);
    parser.addArgument(short, '-n').nargs(1);
    parser.addArgument(scalar(vars, 'n', integer), '--number').nargs(1);

    const res = parser.parseArgs(['-n', '1', '--number', '2', '-n', '3']);

    expect(res.ok).toBe(true);
    expect(vars.n).toBe(3);
    expect(short.getAssignCount()).toBe(3);
  });

  test('clusters of short flags and attached arguments', () => {
    const vars = { a: false, b: false, n: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'a', boolean), '-a');
    parser.addArgument(scalar(vars, 'b', boolean), '-b');
    parser.addArgument(scalar(vars, 'n', integer), '-n').nargs(1);

    const res = parser.parseArgs(['-ab', '-n10']);

    expect(res.ok).toBe(true);
    expect(vars).toEqual({ a: true, b: true, n: 10 });
  });

  test('--name=value assigns the value; a flag rejects it', () => {
    const vars = { level: 0, verbose: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'level', integer), '--level').nargs(1);
    parser.addArgument(scalar(vars, 'verbose', boolean), '--verbose');

    const res = parser.parseArgs(['--level=3', '--verbose=1']);

    expect(vars.level).toBe(3);
    expect(vars.verbose).toBe(false);
    expect(res.errors).toEqual([{ option: '--verbose', kind: 'FlagTakesNoParameter' }]);
  });

  test('a new option name closes the active option even if it is short of arguments', () => {
    const vars = { num: 0, verbose: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);
    parser.addArgument(scalar(vars, 'verbose', boolean), '--verbose');

    const res = parser.parseArgs(['--num', '--verbose']);

    expect(vars.verbose).toBe(true);
    expect(res.errors).toEqual([{ option: '--num', kind: 'MissingArgument' }]);
  });

  test('-- ends option parsing but the active option still takes arguments', () => {
    const vars: { num: number; rest: string[] } = { num: 0, rest: [] };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);
    parser.addArgument(sequence(vars, 'rest', string), 'rest');

    const res = parser.parseArgs(['--num', '--', '7', '--num', '-x']);

    expect(res.ok).toBe(true);
    expect(vars).toEqual({ num: 7, rest: ['--num', '-x'] });
  });

  test('an option with optional arguments gets its flag value when none follow', () => {
    const vars = { level: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'level', integer), '--level').maxargs(1).flagValue('5');

    expect(parser.parseArgs(['--level']).ok).toBe(true);
    expect(vars.level).toBe(5);

    expect(parser.parseArgs(['--level', '2']).ok).toBe(true);
    expect(vars.level).toBe(2);
  });

  test('values outside the choices are rejected and do not count as assigned', () => {
    const vars = { color: '' };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'color', string), '--color').nargs(1).choices(['red', 'green']).required();

    const res = parser.parseArgs(['--color', 'blue']);

    expect(vars.color).toBe('');
    expect(res.errors).toEqual([
      { option: '--color', kind: 'InvalidChoice' },
      { option: '--color', kind: 'MissingOption' },
    ]);
  });

  test('tokens that do not convert are reported', () => {
    const vars = { num: 0 };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);

    const res = parser.parseArgs(['--num', 'abc']);

    expect(res.errors).toEqual([{ option: '--num', kind: 'ConversionError' }]);
    expect(out).toEqual(["Error: The argument could not be converted: '--num'\n"]);
  });

  test('any error thrown while converting a token becomes a conversion error', () => {
    const vars = { n: BigInt(0) };
    const bigint = { name: 'bigint', empty: () => BigInt(0), fromString: (text: string) => BigInt(text) };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'n', bigint), '--n').nargs(1);

    const res = parser.parseArgs(['--n', 'abc']);

    expect(res.errors).toEqual([{ option: '--n', kind: 'ConversionError' }]);
    expect(parser.parseArgs(['--n', '9007199254740993']).ok).toBe(true);
    expect(vars.n).toBe(BigInt('9007199254740993'));
  });

  test('free tokens nobody takes are ignored and reported last', () => {
    const vars = { verbose: false };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.addArgument(scalar(vars, 'verbose', boolean), '-v');

    const res = parser.parseArgs(['a', '-v', 'b']);

    expect(vars.verbose).toBe(true);
    expect(res.ok).toBe(false);
    expect(res.errors).toEqual([]);
    expect(res.ignoredArguments).toEqual(['a', 'b']);
    expect(out).toEqual(['Error: Ignored arguments: a, b\n']);
  });
});

describe('ArgumentParser: post-parse checks', () => {
  test('only one option of an exclusive group may be given', () => {
    const vars = { fast: false, slow: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addExclusiveGroup('mode');
    parser.addArgument(scalar(vars, 'fast', boolean), '--fast');
    parser.addArgument(scalar(vars, 'slow', boolean), '--slow');
    parser.endGroup();

    expect(parser.parseArgs(['--slow']).ok).toBe(true);

    const res = parser.parseArgs(['--fast', '--slow']);
    expect(res.errors).toEqual([{ option: '--fast', kind: 'ExclusiveViolation' }]);
  });

  test('an exclusive group names the option given first on the command line', () => {
    const vars = { fast: false, slow: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addExclusiveGroup('mode');
    parser.addArgument(scalar(vars, 'fast', boolean), '--fast');
    parser.addArgument(scalar(vars, 'slow', boolean), '--slow');
    parser.endGroup();

    const res = parser.parseArgs(['--slow', '--fast']);

    expect(res.errors).toEqual([{ option: '--slow', kind: 'ExclusiveViolation' }]);
  });

  test('a required group needs one of its members', () => {
    const vars = { json: false, text: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addGroup('Output').required();
    parser.addArgument(scalar(vars, 'json', boolean), '--json');
    parser.addArgument(scalar(vars, 'text', boolean), '--text');
    parser.endGroup();

    expect(parser.parseArgs([]).errors).toEqual([{ option: 'output', kind: 'MissingOptionGroup' }]);
    expect(parser.parseArgs(['--text']).ok).toBe(true);
  });

  test('an empty parse resets every target and reports what is required', () => {
    const vars = { out: 'stale', file: 'stale' };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.config().helpOnEmpty(false);
    parser.addArgument(scalar(vars, 'out', string), '--out').nargs(1).required();
    parser.addArgument(scalar(vars, 'file', string), 'file');

    const res = parser.parseArgs([]);

    expect(res.errors).toEqual([
      { option: '--out', kind: 'MissingOption' },
      { option: 'file', kind: 'MissingArgument' },
    ]);
    expect(vars).toEqual({ out: '', file: '' });
  });

  test('defaults apply only to arguments that were not given; every parse starts fresh', () => {
    const vars: { jobs: number; name?: string } = { jobs: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'jobs', integer), '--jobs').nargs(1).absent(8);
    parser
      .addArgument(optional(vars, 'name', string), '--name')
      .nargs(1)
      .absentAction((target) => target.store('anonymous'));

    parser.parseArgs(['--jobs', '2', '--name', 'x']);
    expect(vars).toEqual({ jobs: 2, name: 'x' });

    parser.parseArgs([]);
    expect(vars).toEqual({ jobs: 8, name: 'anonymous' });
  });
});

describe('ArgumentParser: help, actions and exit', () => {
  test('a help token shows help and requests exit without an error entry', () => {
    const vars = { num: 0 };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.config().program('tool');
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);

    const res = parser.parseArgs(['--num', '3', '-h']);

    expect(res.helpWasShown).toBe(true);
    expect(res.exitRequested).toBe(true);
    expect(res.ok).toBe(false);
    expect(res.errors).toEqual([]);
    expect(vars.num).toBe(0);
    expect(out.join('').split('\n')[0]).toBe('usage: tool [options]');
  });

  test('help tokens after -- are plain tokens', () => {
    const vars: { rest: string[] } = { rest: [] };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(sequence(vars, 'rest', string), 'rest');

    const res = parser.parseArgs(['--', '--help']);

    expect(res.helpWasShown).toBe(false);
    expect(vars.rest).toEqual(['--help']);
  });

  test('an empty command line shows help when something is required', () => {
    const vars = { file: '' };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.addArgument(scalar(vars, 'file', string), 'file');

    const res = parser.parseArgs([]);

    expect(res.helpWasShown).toBe(true);
    expect(res.exitRequested).toBe(true);
    expect(out.length).toBe(1);
  });

  test('an action can stop the parser; the exit is recorded once', () => {
    const printed: string[] = [];
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(voidValue(), '--version').action((_target, _text, env) => {
      printed.push(`version of ${env.getOptionName()}`);
      env.exitParser();
    });

    const res = parser.parseArgs(['--version', '--bogus']);

    expect(printed).toEqual(['version of --version']);
    expect(res.errors).toEqual([{ option: '', kind: 'ExitRequested' }]);
    expect(res.exitRequested).toBe(true);
    expect(res.errorsWereShown).toBe(false);
  });

  test('an exit request stops a short-option cluster', () => {
    const vars = { quiet: false };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(voidValue(), '-x').action((_target, _text, env) => env.exitParser());
    parser.addArgument(scalar(vars, 'quiet', boolean), '-q');

    const res = parser.parseArgs(['-xq']);

    expect(vars.quiet).toBe(false);
    expect(res.exitRequested).toBe(true);
    expect(res.errors).toEqual([{ option: '', kind: 'ExitRequested' }]);
  });

  test('actions see the configured context and can add errors', () => {
    const vars = { port: 0 };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.config().context({ maxPort: 1024 });
    parser
      .addArgument(scalar(vars, 'port', integer), '--port')
      .nargs(1)
      .action((target, text, env) => {
        const n = Number(text);
        const ctx = env.context;
        const limit = typeof ctx === 'object' && ctx !== null && 'maxPort' in ctx ? Number(ctx.maxPort) : 0;
        if (n > limit) env.addError(`Port ${n} is above ${limit}`);
        else target.store(n);
      });

    expect(parser.parseArgs(['--port', '80']).ok).toBe(true);
    expect(vars.port).toBe(80);

    const res = parser.parseArgs(['--port', '8080']);
    expect(res.errors).toEqual([{ option: '--port', kind: 'ActionError', detail: 'Port 8080 is above 1024' }]);
    expect(out).toEqual(['Error: Port 8080 is above 1024\n']);
  });

  test('rejects input that is not a token list', () => {
    const parser = new ArgumentParser();
    const out = collectOutput(parser);

    const res = parser.parseArgs(null);

    expect(res.errors).toEqual([{ option: 'argv', kind: 'InvalidInput' }]);
    expect(out).toEqual(['Error: Parser input is invalid.\n']);
  });

  test('parseArgv skips the node binary and the script', () => {
    const vars = { num: 0 };
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArgument(scalar(vars, 'num', integer), '--num').nargs(1);

    expect(parser.parseArgv(['node', 'script.js', '--num', '4']).ok).toBe(true);
    expect(vars.num).toBe(4);
  });
});

describe('ArgumentParser: commands', () => {
  function setup() {
    const vars = { verbose: false };
    const build: { release: boolean; files: string[] } = { release: false, files: [] };
    const parser = new ArgumentParser();
    const out = collectOutput(parser);
    parser.config().program('tool');
    parser.addArgument(scalar(vars, 'verbose', boolean), '--verbose');
    parser
      .addCommand(
        'build',
        (name): CommandOptions => ({
          name,
          addArguments: (p) => {
            p.addArgument(scalar(build, 'release', boolean), '--release');
            p.addArgument(sequence(build, 'files', string), 'files');
          },
        }),
      )
      .help('Build the sources');
    return { vars, build, parser, out };
  }

  test('the rest of the tokens go to the sub-command parser', () => {
    const { vars, build, parser } = setup();

    const res = parser.parseArgs(['--verbose', 'build', '--release', 'a.c', 'b.c']);

    expect(res.ok).toBe(true);
    expect(res.commands.map((c) => c.name)).toEqual(['build']);
    expect(vars.verbose).toBe(true);
    expect(build).toEqual({ release: true, files: ['a.c', 'b.c'] });
  });

  test('parent options after the command name are unknown to the sub-command', () => {
    const { parser } = setup();

    const res = parser.parseArgs(['build', '--verbose']);

    expect(res.errors).toEqual([{ option: '--verbose', kind: 'UnknownOption' }]);
  });

  test('a help token after the command shows the sub-command help', () => {
    const { parser, out } = setup();

    const res = parser.parseArgs(['build', '-h']);

    expect(res.helpWasShown).toBe(true);
    expect(res.errors).toEqual([]);
    expect(out.join('').split('\n')[0]).toBe('usage: tool build [options] [files ...]');
  });
});

describe('ArgumentParser: option structures', () => {
  class Point {
    readonly x: number;
    readonly y: number;

    constructor(text: string) {
      const parts = text.split(',').map(Number);
      if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n))) throw new RangeError(text);
      this.x = parts[0];
      this.y = parts[1];
    }
  }

  class DrawOptions implements Options {
    origin = new Point('0,0');
    labels: string[] = [];

    addArguments(parser: ArgumentParser): void {
      parser.addArgument(scalar(this, 'origin', constructible('point', Point, () => new Point('0,0'))), '--origin').nargs(1);
      parser.addArgument(sequence(this, 'labels', string), '-l', '--label').minargs(1);
    }
  }

  test('a structure registers its own fields', () => {
    const options = new DrawOptions();
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArguments(options);

    const res = parser.parseArgs(['--origin', '3,4', '-l', 'a', 'b']);

    expect(res.ok).toBe(true);
    expect(options.origin).toEqual(new Point('3,4'));
    expect(options.labels).toEqual(['a', 'b']);
  });

  test('a constructor that rejects the token is a conversion error', () => {
    const options = new DrawOptions();
    const parser = new ArgumentParser();
    collectOutput(parser);
    parser.addArguments(options);

    expect(parser.parseArgs(['--origin', 'x']).errors).toEqual([{ option: '--origin', kind: 'ConversionError' }]);
  });

  test('a warning is emitted when -h and --help are both taken', () => {
    const warnings: string[] = [];
    const prev = setWarningSink((m) => warnings.push(m));
    try {
      const vars = { host: '', help: false };
      const parser = new ArgumentParser();
      collectOutput(parser);
      parser.addArgument(scalar(vars, 'host', string), '-h').nargs(1);
      parser.addArgument(scalar(vars, 'help', boolean), '--help');

      const res = parser.parseArgs(['-h', 'example.org', '--help']);

      expect(res.helpWasShown).toBe(false);
      expect(vars).toEqual({ host: 'example.org', help: true });
      expect(warnings).toEqual(['Warning: The default help options are hidden by other options.']);
    } finally {
      setWarningSink(prev);
    }
  });
});

describe('ArgumentParser: registration errors', () => {
  test('duplicate option names', () => {
    const vars = { a: false, b: false };
    const parser = new ArgumentParser();
    parser.addArgument(scalar(vars, 'a', boolean), '--x');
    expect(() => parser.addArgument(scalar(vars, 'b', boolean), '-y', '--x')).toThrow(DuplicateOption);
    expect(() => parser.addArgument(scalar(vars, 'b', boolean), '--x')).toThrow("Option '--x' is already defined.");
  });

  test('duplicate command names', () => {
    const parser = new ArgumentParser();
    const factory = (name: string): CommandOptions => ({ name, addArguments: () => undefined });
    parser.addCommand('run', factory);
    expect(() => parser.addCommand('run', factory)).toThrow(DuplicateCommand);
  });

  test('a group name can not be reused for the other kind', () => {
    const parser = new ArgumentParser();
    parser.addGroup('g');
    parser.endGroup();
    expect(() => parser.addExclusiveGroup('G')).toThrow(MixingGroupTypes);
  });

  test('a required option can not be in an exclusive group', () => {
    const vars = { a: false };
    const parser = new ArgumentParser();
    parser.addExclusiveGroup('g');
    parser.addArgument(scalar(vars, 'a', boolean), '--a').required();
    parser.endGroup();
    expect(() => parser.parseArgs(['--a'])).toThrow(RequiredExclusiveOption);
  });

  test('invalid names and arities', () => {
    const vars = { a: '', b: '' };
    const parser = new ArgumentParser();
    expect(() => parser.addArgument(scalar(vars, 'a', string), '-ab')).toThrow(InvalidDefinition);
    expect(() => parser.addArgument(scalar(vars, 'a', string), '--a', 'b')).toThrow(InvalidDefinition);
    expect(() => parser.addArgument(scalar(vars, 'a', string))).toThrow('An argument must have a name.');
    expect(() => parser.addArgument(scalar(vars, 'b', string), 'b').nargs(2)).toThrow(InvalidDefinition);
    expect(() => parser.addArgument(scalar(vars, 'a', string), '--aa').nargs(-1)).toThrow(InvalidDefinition);
  });
});
