/**
 * Basic Usage Example
 *
 * Declares a small command, parses an argument vector and reads the binding.
 * Run after `npm run build`: node dist/examples/basic-usage.js --name=a -v f1 f2
 */

import { buildSpec, describeError, formatDiagnostic, parse } from "@argspec/core";

const spec = buildSpec({
  name: "basic",
  version: "1.0.0",
  about: "Greets someone and lists files",
  args: [
    { id: "name", kind: "option", short: "n", long: "name", required: true, help: "Who to greet" },
    { id: "verbose", kind: "flag", short: "v", long: "verbose", multiple: true, help: "More output" },
    {
      id: "color",
      kind: "option",
      long: "color",
      possibleValues: ["auto", "always", "never"],
      defaultValue: "auto",
    },
    { id: "file", kind: "positional", multiple: true, help: "Files to list" },
  ],
});

const result = parse(spec, process.argv.slice(2));

switch (result.status) {
  case "help":
    process.stdout.write(result.text);
    break;

  case "error":
    process.stderr.write(formatDiagnostic(describeError(result.error, spec)));
    process.exitCode = 1;
    break;

  case "ok": {
    const { binding } = result;
    console.log(`Hello, ${binding.valueOf("name") ?? "nobody"}`);
    console.log(`verbosity: ${binding.occurrencesOf("verbose")}`);
    console.log(`color: ${binding.valueOf("color")} (from ${binding.sourceOf("color")})`);
    for (const file of binding.valuesOf("file")) {
      console.log(`  - ${file}`);
    }
    break;
  }
}
