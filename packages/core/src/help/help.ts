/**
 * Help synthesis: a read-only projection of a Spec Model
 *
 * Sections list arguments in declaration order: ARGS, OPTIONS, FLAGS,
 * SUBCOMMANDS. Hidden arguments are left out.
 */

import type { ArgumentSpec, HelpOptions } from "../types.js";
import type { SpecModel } from "../spec/model.js";
import { valuePlaceholder } from "../spec/display.js";
import { renderUsage } from "./usage.js";
import { displayWidth, padDisplay, wrapText } from "./wrap.js";

const TAB = "    ";
const HELP_FLAG_TEXT = "Prints help information";
const HELP_SUBCOMMAND_TEXT = "Prints this message or the help of the given subcommand(s)";

interface Entry {
  left: string;
  text: string;
}

/**
 * Full help text for a command, rendered from its template when it has one
 */
export function renderHelp(model: SpecModel, options: HelpOptions = {}): string {
  if (model.helpTemplate !== undefined) {
    return renderTemplate(model, model.helpTemplate, options);
  }

  const width = options.width;
  const fill = (text: string): string => (width === undefined ? text : wrapText(text, width));
  let out = "";

  if (model.beforeHelp) out += `${fill(model.beforeHelp)}\n\n`;
  out += model.version ? `${bin(model)} ${model.version}\n` : `${bin(model)}\n`;
  if (model.author) out += `${fill(model.author)}\n`;
  if (model.about) out += `${fill(model.about)}\n`;
  out += `\nUSAGE:\n${TAB}${renderUsage(model)}\n`;

  const body = renderAllArgs(model, options);
  if (body) out += `\n${body}\n`;
  if (model.afterHelp) out += `\n${fill(model.afterHelp)}\n`;

  return out;
}

/**
 * Every non-empty section with its title
 */
export function renderAllArgs(model: SpecModel, options: HelpOptions = {}): string {
  const sections: Array<[string, Entry[]]> = [
    ["ARGS", positionalEntries(model)],
    ["OPTIONS", optionEntries(model)],
    ["FLAGS", flagEntries(model)],
    ["SUBCOMMANDS", subcommandEntries(model)],
  ];

  return sections
    .filter(([, entries]) => entries.length > 0)
    .map(([title, entries]) => `${title}:\n${formatEntries(entries, options)}`)
    .join("\n\n");
}

/**
 * Tags: {bin} {version} {author} {about} {usage} {all-args} {unified}
 * {flags} {options} {positionals} {subcommands} {before-help} {after-help}.
 * Unknown tags are written back verbatim.
 */
export function renderTemplate(model: SpecModel, template: string, options: HelpOptions = {}): string {
  return template.replace(/\{([a-z-]+)\}/g, (tag: string, name: string) => {
    switch (name) {
      case "bin":
        return bin(model);
      case "version":
        return model.version ?? "";
      case "author":
        return model.author ?? "";
      case "about":
        return model.about ?? "";
      case "usage":
        return renderUsage(model);
      case "all-args":
        return renderAllArgs(model, options);
      case "unified":
        return formatEntries([...optionEntries(model), ...flagEntries(model)], options);
      case "flags":
        return formatEntries(flagEntries(model), options);
      case "options":
        return formatEntries(optionEntries(model), options);
      case "positionals":
        return formatEntries(positionalEntries(model), options);
      case "subcommands":
        return formatEntries(subcommandEntries(model), options);
      case "before-help":
        return model.beforeHelp ?? "";
      case "after-help":
        return model.afterHelp ?? "";
      default:
        return tag;
    }
  });
}

function bin(model: SpecModel): string {
  return model.commandPath.join(" ");
}

function visible(model: SpecModel, kind: ArgumentSpec["kind"]): ArgumentSpec[] {
  return model.args.filter((arg) => arg.kind === kind && !arg.hidden);
}

function positionalEntries(model: SpecModel): Entry[] {
  return model
    .positionals()
    .filter((arg) => !arg.hidden)
    .map((arg) => ({
      left: arg.multiple ? `<${arg.valueName}>...` : `<${arg.valueName}>`,
      text: describe(arg),
    }));
}

function optionEntries(model: SpecModel): Entry[] {
  return visible(model, "option").map((arg) => ({
    left: `${switches(arg.short, arg.long)} ${valuePlaceholder(arg)}`,
    text: describe(arg),
  }));
}

function flagEntries(model: SpecModel): Entry[] {
  const entries = visible(model, "flag").map((arg) => ({
    left: switches(arg.short, arg.long),
    text: describe(arg),
  }));

  const short = model.implicitHelpShort ? "h" : undefined;
  const long = model.implicitHelpLong ? "help" : undefined;
  if (short !== undefined || long !== undefined) {
    entries.push({ left: switches(short, long), text: HELP_FLAG_TEXT });
  }
  return entries;
}

function subcommandEntries(model: SpecModel): Entry[] {
  const entries = [...model.subcommands.values()].map((child) => ({
    left: child.name,
    text: child.about ?? "",
  }));
  if (model.implicitHelpSubcommand) {
    entries.push({ left: "help", text: HELP_SUBCOMMAND_TEXT });
  }
  return entries;
}

/**
 * "-n, --name", "    --name" or "-n"
 */
function switches(short: string | undefined, long: string | undefined): string {
  if (short !== undefined && long !== undefined) return `-${short}, --${long}`;
  if (long !== undefined) return `${TAB}--${long}`;
  return `-${short ?? ""}`;
}

/**
 * Help text followed by [default: ...] [values: ...] [aliases: ...]
 */
function describe(arg: ArgumentSpec): string {
  const parts: string[] = [];
  if (arg.help) parts.push(arg.help);
  if (arg.defaultValue !== undefined) parts.push(`[default: ${arg.defaultValue}]`);
  if (arg.possibleValues) parts.push(`[values: ${arg.possibleValues.join(", ")}]`);
  if (arg.aliases.length > 0) parts.push(`[aliases: ${arg.aliases.join(", ")}]`);
  return parts.join(" ");
}

function formatEntries(entries: Entry[], options: HelpOptions): string {
  const longest = Math.max(0, ...entries.map((entry) => displayWidth(entry.left)));
  const indent = TAB.length + longest + TAB.length;
  const available = options.width === undefined ? 0 : options.width - indent;

  return entries
    .map((entry) => {
      if (entry.text === "") return `${TAB}${entry.left}`;
      const text = available > 0 ? wrapText(entry.text, available) : entry.text;
      const [first = "", ...rest] = text.split("\n");
      const lines = [`${TAB}${padDisplay(entry.left, longest)}${TAB}${first}`];
      for (const line of rest) lines.push(`${" ".repeat(indent)}${line}`);
      return lines.join("\n");
    })
    .join("\n");
}
