import type { ArgumentParser } from '../argumentParser';
import type { OutputStream } from '../parserConfig';
import { formatArgumentCounts, type ArgumentHelpResult } from './describe';

type Section = {
  title: string;
  description: string;
  entries: ArgumentHelpResult[];
};

function entryLabel(a: ArgumentHelpResult): string {
  if (a.isCommand) return a.helpName;
  const names = [a.shortName, a.longName].filter((n) => n !== '').join(', ');
  const isPositional = !a.helpName.startsWith('-');
  if (isPositional) return a.helpName;
  return a.arguments ? `${names} ${a.arguments}` : names;
}

function usageLine(parser: ArgumentParser, args: ArgumentHelpResult[]): string {
  const cfg = parser.getConfig();
  if (cfg.usage) return `usage: ${cfg.usage}`;

  const def = parser.getDefinition();
  const parts: string[] = ['usage:'];
  if (cfg.program) parts.push(cfg.program);
  if (args.some((a) => !a.isCommand && a.helpName.startsWith('-'))) parts.push('[options]');
  for (const p of def.positionals) parts.push(formatArgumentCounts(p.getMetavar(), p.minArgs, p.maxArgs));
  if (def.commands.length > 0) parts.push('<command> ...');
  return parts.filter((p) => p !== '').join(' ');
}

function buildSections(args: ArgumentHelpResult[]): Section[] {
  const positional: Section = { title: 'positional arguments', description: '', entries: [] };
  const options: Section = { title: 'optional arguments', description: '', entries: [] };
  const commands: Section = { title: 'commands', description: '', entries: [] };
  const groups = new Map<string, Section>();

  for (const a of args) {
    if (a.isCommand) commands.entries.push(a);
    else if (!a.helpName.startsWith('-')) positional.entries.push(a);
    else if (a.group) {
      let section = groups.get(a.group.name);
      if (!section) {
        section = { title: a.group.title || a.group.name, description: a.group.description, entries: [] };
        groups.set(a.group.name, section);
      }
      section.entries.push(a);
    } else options.entries.push(a);
  }
  return [positional, options, ...groups.values(), commands].filter((s) => s.entries.length > 0);
}

/**
 * Plain-text help: usage, description, argument sections, epilog. Help texts are
 * aligned in one column and never wrapped.
 */
export function formatHelp(parser: ArgumentParser): string {
  const cfg = parser.getConfig();
  const args = parser.describeArguments();
  const sections = buildSections(args);
  const width = Math.max(0, ...sections.flatMap((s) => s.entries.map((e) => entryLabel(e).length))) + 2;

  const lines: string[] = [usageLine(parser, args), ''];
  if (cfg.description) lines.push(cfg.description, '');

  for (const s of sections) {
    lines.push(`${s.title}:`);
    if (s.description) lines.push(`  ${s.description}`);
    for (const e of s.entries) {
      const label = entryLabel(e);
      lines.push(e.help ? `  ${label.padEnd(width)}${e.help}` : `  ${label}`);
    }
    lines.push('');
  }

  if (cfg.epilog) lines.push(cfg.epilog, '');
  return lines.join('\n');
}

export class HelpFormatter {
  format(parser: ArgumentParser, out: OutputStream): void {
    out.write(formatHelp(parser));
  }
}
