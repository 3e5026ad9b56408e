export * from "./ids.js";
export * from "./diagnostics/index.js";
export * from "./errors.js";
export * from "./type-tags.js";
export * from "./descriptors.js";
export * from "./file-range.js";
export * from "./structural.js";
export * from "./stats.js";
export { Location, isViewOf } from "./location.js";
export * from "./context.js";
export * from "./builders.js";
export {
  expectUnderlying,
  fallbackOf,
  getUnderlyingAs,
  underlyingTagOf,
} from "./opaque.js";
export * from "./walk.js";
export * from "./fusion.js";
export { parseLocation, type ParseLocationOptions } from "./text/parser.js";
export {
  printFileRange,
  printLocation,
  printMetadata,
  quoteString,
} from "./text/printer.js";
