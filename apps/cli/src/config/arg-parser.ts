import { Command } from "commander";
import { createRequire } from "node:module";
import type { LocusConfig } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const manifest: unknown = require("../../package.json");
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

type LocusOptions = {
  kind?: boolean;
  stats?: boolean;
  file: string;
  color: boolean;
};

const createCommand = (): Command =>
  new Command()
    .name("locus")
    .description("Parse location text and print it in canonical form")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("[locations...]", "location text to canonicalize (default: stdin lines)")
    .option("-k, --kind", "prefix each result with its location kind")
    .option("--stats", "log interner statistics on exit")
    .option("--file <name>", "name of the input in diagnostics", "<input>")
    .option("--no-color", "disable colored diagnostics");

export const getConfigFromCli = (): LocusConfig => {
  const program = createCommand();
  program.parse(["node", "locus", ...process.argv.slice(2)]);
  const opts = program.opts<LocusOptions>();

  return {
    locations: program.args,
    showKind: opts.kind ?? false,
    stats: opts.stats ?? false,
    file: opts.file,
    color: opts.color,
  };
};
