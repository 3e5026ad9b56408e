import { readFileSync } from "node:fs";
import { createLocationContext } from "@locus/location";
import { getConfig } from "./config/index.js";
import { canonicalizeInputs, inputLines } from "./canonicalize.js";
import { formatCliDiagnostic } from "./diagnostics.js";

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  const inputs =
    config.locations.length > 0
      ? config.locations
      : inputLines(readFileSync(process.stdin.fd, "utf8"));

  const context = createLocationContext({ label: "cli", stats: config.stats });
  try {
    const result = canonicalizeInputs(context, inputs, {
      file: config.file,
      showKind: config.showKind,
    });

    result.output.forEach((line) => console.log(line));
    result.failures.forEach(({ diagnostic, source, line }) =>
      console.error(
        formatCliDiagnostic(diagnostic, { source, line, color: config.color }),
      ),
    );

    if (result.diagnostics.hasErrors) {
      process.exitCode = 1;
    }
  } finally {
    context.dispose();
  }
}

function errorHandler(error: unknown) {
  console.error(error);
  process.exit(1);
}
