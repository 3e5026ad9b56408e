import type { FileRangeFields, LocationMetadata } from "../descriptors.js";
import { isLineOnly, isPoint } from "../file-range.js";
import type { Location } from "../location.js";

export const quoteString = (value: string): string =>
  `"${value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")}"`;

export const printFileRange = (range: FileRangeFields): string => {
  const file = quoteString(range.filename);
  if (isLineOnly(range)) {
    return `${file}:${range.startLine}`;
  }
  const start = `${file}:${range.startLine}:${range.startColumn}`;
  if (isPoint(range)) {
    return start;
  }
  if (range.startLine === range.endLine) {
    return `${start} to :${range.endColumn}`;
  }
  return `${start} to ${range.endLine}:${range.endColumn}`;
};

export const printMetadata = (metadata: LocationMetadata): string => {
  switch (metadata.kind) {
    case "string":
      return quoteString(metadata.value);
    case "integer":
      return `${metadata.value}`;
    case "bool":
      return metadata.value ? "true" : "false";
    case "symbol":
      return /^[A-Za-z_$][A-Za-z0-9_$.]*$/.test(metadata.name)
        ? `@${metadata.name}`
        : `@${quoteString(metadata.name)}`;
    case "unit":
      return "unit";
    case "array":
      return `[${metadata.elements.map(printMetadata).join(", ")}]`;
  }
};

/** Textual form of a location. Opaque locations print as their fallback. */
export const printLocation = (location: Location): string => {
  const view = location.view();
  switch (view.kind) {
    case "unknown":
      return "?";
    case "file-range":
      return printFileRange(view);
    case "name":
      return view.child.isUnknown()
        ? quoteString(view.name)
        : `${quoteString(view.name)}(${printLocation(view.child)})`;
    case "call-site":
      return `callsite(${printLocation(view.callee)} at ${printLocation(view.caller)})`;
    case "fused": {
      const metadata = view.metadata ? `<${printMetadata(view.metadata)}>` : "";
      return `fused${metadata}[${view.locations.map(printLocation).join(",")}]`;
    }
    case "opaque":
      return printLocation(view.fallback);
  }
};
