import { describe, it, expect } from "vitest";
import { renderHelp, renderTemplate } from "./help.js";
import { renderUsage } from "./usage.js";
import { displayWidth, wrapText } from "./wrap.js";
import { buildSpec } from "../spec/build.js";

const app = buildSpec({
  name: "app",
  version: "1.0.0",
  about: "Does things",
  args: [
    { id: "name", kind: "option", short: "n", long: "name", help: "Name to use", required: true },
    {
      id: "level",
      kind: "option",
      long: "level",
      help: "Level",
      defaultValue: "1",
      possibleValues: ["1", "2"],
    },
    { id: "verbose", kind: "flag", short: "v", long: "verbose", help: "More output" },
    { id: "secret", kind: "flag", long: "secret", hidden: true },
    { id: "file", kind: "positional", help: "Input file", required: true },
  ],
  subcommands: [{ name: "build", about: "Build it" }],
});

describe("renderUsage", () => {
  it("should list flags, options, required options, positionals and subcommands", () => {
    expect(renderUsage(app)).toBe("app [FLAGS] [OPTIONS] --name <NAME> <FILE> [SUBCOMMAND]");
  });

  it("should prefix the parent chain", () => {
    const git = buildSpec({
      name: "git",
      subcommands: [
        {
          name: "remote",
          subcommands: [
            {
              name: "add",
              args: [
                { id: "url", kind: "option", long: "url", required: true },
                { id: "name", kind: "positional", required: true },
              ],
            },
          ],
        },
      ],
    });
    const add = git.subcommand("remote")?.subcommand("add");

    expect(add && renderUsage(add)).toBe("git remote add [FLAGS] --url <URL> <NAME>");
  });

  it("should bracket optional positionals and mark multiple ones", () => {
    const model = buildSpec({
      name: "cat",
      args: [
        { id: "out", kind: "positional", required: true, valueName: "OUT" },
        { id: "file", kind: "positional", multiple: true },
      ],
    });

    expect(renderUsage(model)).toBe("cat [FLAGS] <OUT> [FILE]...");
  });

  it("should spell out required flags next to required options", () => {
    const model = buildSpec({
      name: "app",
      args: [
        { id: "force", kind: "flag", long: "force", required: true },
        { id: "dry", kind: "flag", short: "n" },
        { id: "to", kind: "option", long: "to", required: true },
      ],
    });

    expect(renderUsage(model)).toBe("app [FLAGS] --force --to <TO>");
  });

  it("should leave out [FLAGS] when help is user-declared and no flags are visible", () => {
    const model = buildSpec({
      name: "app",
      args: [
        { id: "host", kind: "option", short: "h", long: "help" },
        { id: "debug", kind: "flag", long: "debug", hidden: true },
      ],
    });

    expect(renderUsage(model)).toBe("app [OPTIONS]");
  });
});

describe("renderHelp", () => {
  it("should render every section in order", () => {
    expect(renderHelp(app)).toBe(
      [
        "app 1.0.0",
        "Does things",
        "",
        "USAGE:",
        "    app [FLAGS] [OPTIONS] --name <NAME> <FILE> [SUBCOMMAND]",
        "",
        "ARGS:",
        "    <FILE>    Input file",
        "",
        "OPTIONS:",
        "    -n, --name <NAME>      Name to use",
        "        --level <LEVEL>    Level [default: 1] [values: 1, 2]",
        "",
        "FLAGS:",
        "    -v, --verbose    More output",
        "    -h, --help       Prints help information",
        "",
        "SUBCOMMANDS:",
        "    build    Build it",
        "    help     Prints this message or the help of the given subcommand(s)",
        "",
      ].join("\n")
    );
  });

  it("should place before-help, author and after-help", () => {
    const model = buildSpec({
      name: "app",
      author: "Test Author",
      beforeHelp: "Before",
      afterHelp: "After",
    });

    expect(renderHelp(model)).toBe(
      "Before\n\napp\nTest Author\n\nUSAGE:\n    app [FLAGS]\n\nFLAGS:\n    -h, --help    Prints help information\n\nAfter\n"
    );
  });

  it("should use the command's template when declared", () => {
    const model = buildSpec({
      name: "tool",
      version: "0.1.0",
      helpTemplate: "{bin} {version}\n{usage}\n\n{flags}\n{unknown}",
      args: [{ id: "quiet", kind: "flag", short: "q", help: "Less output" }],
    });

    expect(renderHelp(model)).toBe(
      "tool 0.1.0\ntool [FLAGS]\n\n    -q            Less output\n    -h, --help    Prints help information\n{unknown}"
    );
  });

  it("should annotate aliases", () => {
    const model = buildSpec({
      name: "app",
      args: [{ id: "color", kind: "option", long: "color", aliases: ["colour"], help: "Color mode" }],
    });

    expect(renderTemplate(model, "{options}")).toBe("        --color <COLOR>    Color mode [aliases: colour]");
  });

  it("should wrap entry text under its column", () => {
    const model = buildSpec({
      name: "w",
      args: [{ id: "quiet", kind: "flag", long: "quiet", help: "Suppress all output except errors" }],
    });
    const pad = " ".repeat(19);

    expect(renderTemplate(model, "{flags}", { width: 30 })).toBe(
      [
        "        --quiet    Suppress",
        `${pad}all output`,
        `${pad}except`,
        `${pad}errors`,
        "    -h, --help     Prints help",
        `${pad}information`,
      ].join("\n")
    );
  });

  it("should align columns by display width", () => {
    const model = buildSpec({
      name: "app",
      args: [
        { id: "cafe", kind: "flag", long: "cafe\u0301", help: "Coffee" },
        { id: "tea", kind: "flag", long: "tea", help: "Tea" },
      ],
    });

    expect(renderTemplate(model, "{flags}")).toBe(
      [
        "        --cafe\u0301    Coffee",
        "        --tea     Tea",
        "    -h, --help    Prints help information",
      ].join("\n")
    );
  });

  it("should not list the implicit help flag when both names are declared", () => {
    const model = buildSpec({
      name: "app",
      args: [{ id: "helpme", kind: "flag", short: "h", long: "help", help: "Custom help" }],
    });

    expect(renderTemplate(model, "{flags}")).toBe("    -h, --help    Custom help");
  });
});

describe("wrapText", () => {
  it("should break between words", () => {
    expect(wrapText("foo bar baz", 5)).toBe("foo\nbar\nbaz");
    expect(wrapText("foo bar baz", 7)).toBe("foo bar\nbaz");
  });

  it("should never break a word", () => {
    expect(wrapText("a extraordinarily b", 4)).toBe("a\nextraordinarily\nb");
  });

  it("should keep existing line breaks", () => {
    expect(wrapText("one two\nthree", 20)).toBe("one two\nthree");
  });

  it("should measure words by display width", () => {
    expect(wrapText("\u{1F600}\u{1F600} ab", 5)).toBe("\u{1F600}\u{1F600} ab");
    expect(wrapText("e\u0301e\u0301 ab", 5)).toBe("e\u0301e\u0301 ab");
  });

  it("should leave text alone without a positive width", () => {
    expect(wrapText("foo bar", 0)).toBe("foo bar");
  });
});

describe("displayWidth", () => {
  it("should count code points and skip combining marks", () => {
    expect(displayWidth("abc")).toBe(3);
    expect(displayWidth("caf\u00e9")).toBe(4);
    expect(displayWidth("e\u0301")).toBe(1);
    expect(displayWidth("\u{1F600}")).toBe(1);
  });
});
