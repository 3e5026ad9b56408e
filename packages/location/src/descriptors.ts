import type { LocationId, OpaqueAddress } from "./ids.js";
import type { Location } from "./location.js";
import type { TypeTag } from "./type-tags.js";

/** Marks a line or column that is not known, as opposed to column zero. */
export const UNSET_POSITION = -1;

export type LocationKind =
  | "unknown"
  | "file-range"
  | "name"
  | "call-site"
  | "fused"
  | "opaque";

/** Attribute attached to a fused location. */
export type LocationMetadata =
  | { kind: "string"; value: string }
  | { kind: "integer"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "symbol"; name: string }
  | { kind: "array"; elements: readonly LocationMetadata[] }
  | { kind: "unit" };

export interface FileRangeFields {
  filename: string;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

// Stored forms. Children are ids into the owning context's arena.

export interface UnknownDescriptor {
  kind: "unknown";
}

export interface FileRangeDescriptor extends FileRangeFields {
  kind: "file-range";
}

export interface NameDescriptor {
  kind: "name";
  name: string;
  child: LocationId;
}

export interface CallSiteDescriptor {
  kind: "call-site";
  callee: LocationId;
  caller: LocationId;
}

export interface FusedDescriptor {
  kind: "fused";
  locations: readonly LocationId[];
  metadata?: LocationMetadata;
}

export interface OpaqueDescriptor {
  kind: "opaque";
  address: OpaqueAddress;
  tag: TypeTag<unknown>;
  fallback: LocationId;
}

export type LocationDescriptor =
  | UnknownDescriptor
  | FileRangeDescriptor
  | NameDescriptor
  | CallSiteDescriptor
  | FusedDescriptor
  | OpaqueDescriptor;

// Views resolve child ids back into handles.

export type FileRangeView = FileRangeDescriptor;

export interface NameView {
  kind: "name";
  name: string;
  child: Location;
}

export interface CallSiteView {
  kind: "call-site";
  callee: Location;
  caller: Location;
}

export interface FusedView {
  kind: "fused";
  locations: readonly Location[];
  metadata?: LocationMetadata;
}

export interface OpaqueView {
  kind: "opaque";
  address: OpaqueAddress;
  tag: TypeTag<unknown>;
  fallback: Location;
}

export type LocationView =
  | UnknownDescriptor
  | FileRangeView
  | NameView
  | CallSiteView
  | FusedView
  | OpaqueView;

export type LocationViewOf<K extends LocationKind> = Extract<
  LocationView,
  { kind: K }
>;
