/**
 * Subcommands Example
 *
 * Nested subcommands, groups and dispatch on the chosen path.
 * Run after `npm run build`: node dist/examples/subcommands.js remote add origin ssh://example.test/repo
 */

import { buildSpec, describeError, formatDiagnostic, parse } from "@argspec/core";
import type { ParseSuccess } from "@argspec/core";

const spec = buildSpec({
  name: "vcs",
  about: "A toy version control front end",
  args: [{ id: "quiet", kind: "flag", short: "q", long: "quiet" }],
  subcommands: [
    {
      name: "remote",
      about: "Manage remotes",
      subcommands: [
        {
          name: "add",
          about: "Add a remote",
          args: [
            { id: "name", kind: "positional", required: true },
            { id: "url", kind: "positional", required: true },
          ],
        },
        {
          name: "remove",
          about: "Remove a remote",
          args: [{ id: "name", kind: "positional", required: true }],
        },
      ],
    },
    {
      name: "log",
      about: "Show history",
      args: [
        { id: "oneline", kind: "flag", long: "oneline" },
        { id: "format", kind: "option", long: "format" },
      ],
      groups: [{ id: "style", kind: "conflict", members: ["oneline", "format"] }],
    },
  ],
});

/**
 * Follow chosen subcommands down to the innermost level
 */
function innermost(result: ParseSuccess): ParseSuccess {
  return result.subcommand ? innermost(result.subcommand.result) : result;
}

const result = parse(spec, process.argv.slice(2), { helpWidth: 80 });

if (result.status === "help") {
  process.stdout.write(result.text);
} else if (result.status === "error") {
  process.stderr.write(formatDiagnostic(describeError(result.error, spec)));
  process.exitCode = 1;
} else {
  const leaf = innermost(result);
  const quiet = result.binding.isPresent("quiet");

  switch (leaf.commandPath.slice(1).join(" ")) {
    case "remote add":
      if (!quiet) console.log(`added ${leaf.binding.valueOf("name")} -> ${leaf.binding.valueOf("url")}`);
      break;
    case "remote remove":
      if (!quiet) console.log(`removed ${leaf.binding.valueOf("name")}`);
      break;
    case "log":
      console.log(leaf.binding.isPresent("oneline") ? "one line per commit" : "full log");
      break;
    default:
      console.log(`nothing to do for '${leaf.commandPath.join(" ")}'`);
  }
}
