import { hashParts } from "@locus/lib/murmur-hash.js";
import type { LocationDescriptor, LocationMetadata } from "./descriptors.js";
import { sameTypeTag } from "./type-tags.js";

export const metadataEqual = (
  left: LocationMetadata | undefined,
  right: LocationMetadata | undefined,
): boolean => {
  if (left === undefined || right === undefined) {
    return left === right;
  }

  switch (left.kind) {
    case "string":
      return right.kind === "string" && right.value === left.value;
    case "integer":
      return right.kind === "integer" && right.value === left.value;
    case "bool":
      return right.kind === "bool" && right.value === left.value;
    case "symbol":
      return right.kind === "symbol" && right.name === left.name;
    case "unit":
      return right.kind === "unit";
    case "array":
      return (
        right.kind === "array" &&
        right.elements.length === left.elements.length &&
        left.elements.every((element, index) =>
          metadataEqual(element, right.elements[index]),
        )
      );
  }
};

/**
 * Structural equality over stored descriptors. Children are compared by id,
 * which is identity because every child is itself interned.
 */
export const locationDescriptorsEqual = (
  left: LocationDescriptor,
  right: LocationDescriptor,
): boolean => {
  switch (left.kind) {
    case "unknown":
      return right.kind === "unknown";
    case "file-range":
      return (
        right.kind === "file-range" &&
        right.filename === left.filename &&
        right.startLine === left.startLine &&
        right.startColumn === left.startColumn &&
        right.endLine === left.endLine &&
        right.endColumn === left.endColumn
      );
    case "name":
      return (
        right.kind === "name" &&
        right.name === left.name &&
        right.child === left.child
      );
    case "call-site":
      return (
        right.kind === "call-site" &&
        right.callee === left.callee &&
        right.caller === left.caller
      );
    case "fused":
      return (
        right.kind === "fused" &&
        right.locations.length === left.locations.length &&
        left.locations.every((id, index) => right.locations[index] === id) &&
        metadataEqual(left.metadata, right.metadata)
      );
    case "opaque":
      return (
        right.kind === "opaque" &&
        right.address === left.address &&
        sameTypeTag(right.tag, left.tag) &&
        right.fallback === left.fallback
      );
  }
};

const metadataKey = (metadata: LocationMetadata | undefined): string => {
  if (metadata === undefined) {
    return "-";
  }
  switch (metadata.kind) {
    case "string":
      return `s${JSON.stringify(metadata.value)}`;
    case "integer":
      return `i${metadata.value}`;
    case "bool":
      return `b${metadata.value}`;
    case "symbol":
      return `@${JSON.stringify(metadata.name)}`;
    case "unit":
      return "u";
    case "array":
      return `[${metadata.elements.map(metadataKey).join(",")}]`;
  }
};

/** The identity-bearing fields of a descriptor, in a fixed order. */
export const locationDescriptorParts = (
  desc: LocationDescriptor,
): (string | number)[] => {
  switch (desc.kind) {
    case "unknown":
      return [desc.kind];
    case "file-range":
      return [
        desc.kind,
        desc.filename,
        desc.startLine,
        desc.startColumn,
        desc.endLine,
        desc.endColumn,
      ];
    case "name":
      return [desc.kind, desc.name, desc.child];
    case "call-site":
      return [desc.kind, desc.callee, desc.caller];
    case "fused":
      return [
        desc.kind,
        desc.locations.length,
        ...desc.locations,
        metadataKey(desc.metadata),
      ];
    case "opaque":
      return [desc.kind, desc.address, desc.tag.id, desc.fallback];
  }
};

export const locationDescriptorKey = (desc: LocationDescriptor): string =>
  JSON.stringify(locationDescriptorParts(desc));

export const hashLocationDescriptor = (desc: LocationDescriptor): number =>
  hashParts(locationDescriptorParts(desc));
