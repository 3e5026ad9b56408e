import {
  type FileRangeFields,
  type LocationDescriptor,
  type LocationKind,
  type LocationMetadata,
  type LocationView,
} from "./descriptors.js";
import { locationError, missingChildHint } from "./errors.js";
import {
  normalizeColumnRange,
  normalizeFilePosition,
  normalizeFileRange,
  type FilePosition,
} from "./file-range.js";
import {
  contextIdFrom,
  locationIdFrom,
  type ContextId,
  type LocationId,
} from "./ids.js";
import { Location } from "./location.js";
import { addressOf } from "./opaque.js";
import {
  incrementInternerCounter,
  isInternerStatsEnabled,
  logInternerStats,
  toSortedRecord,
  type InternerCounters,
} from "./stats.js";
import {
  hashLocationDescriptor,
  locationDescriptorsEqual,
} from "./structural.js";
import { typeTagOfValue, type TypeTag } from "./type-tags.js";

export type ContextState = "open" | "disposed";

export type LocationContextOptions = {
  /** Label used in diagnostics and stats output. */
  label?: string;
  /** Log interner stats on dispose. Defaults to the LOCUS_INTERNER_STATS env var. */
  stats?: boolean;
};

export type OpaqueOptions<T> = {
  /** Overrides the tag derived from the target's constructor. */
  tag?: TypeTag<T>;
  fallback?: Location;
};

/** A child argument as callers often hold it: possibly missing. */
export type MaybeLocation = Location | undefined | null;

export interface LocationContext {
  readonly id: ContextId;
  readonly label: string;
  readonly state: ContextState;
  /** Number of distinct locations interned so far. */
  readonly size: number;
  readonly unknown: Location;
  owns(location: Location): boolean;
  get(id: LocationId): Readonly<LocationDescriptor>;
  view(id: LocationId): LocationView;
  fileLineColRange(filename: string, ...position: FilePosition): Location;
  fileColumnRange(
    filename: string,
    line: number,
    startColumn: number,
    endColumn: number,
  ): Location;
  fileRange(fields: FileRangeFields): Location;
  name(name: string, child?: Location): Location;
  callSite(callee: MaybeLocation, caller: MaybeLocation): Location;
  callSiteChain(frames: readonly MaybeLocation[]): Location;
  fused(
    locations: readonly MaybeLocation[],
    metadata?: LocationMetadata,
  ): Location;
  opaque<T extends object>(
    target: T | undefined | null,
    options?: OpaqueOptions<T>,
  ): Location;
  /** The live target of an opaque location, or `undefined` once it has been collected. */
  opaqueTarget(location: Location): object | undefined;
  stats(): Record<string, number>;
  dispose(): void;
}

let nextContextId = 0;

/** Deep-frozen copy of `metadata`. Integers must be safe integers so they print and compare. */
const freezeMetadata = (
  metadata: LocationMetadata,
  path = "metadata",
): LocationMetadata => {
  switch (metadata.kind) {
    case "array":
      return Object.freeze({
        kind: "array",
        elements: Object.freeze(
          metadata.elements.map((element, index) =>
            freezeMetadata(element, `${path}[${index}]`),
          ),
        ),
      });
    case "integer":
      if (!Number.isSafeInteger(metadata.value)) {
        throw locationError({
          code: "LB0004",
          params: { kind: "invalid-integer", path, value: `${metadata.value}` },
        });
      }
      return Object.freeze({ ...metadata });
    default:
      return Object.freeze({ ...metadata });
  }
};

export const createLocationContext = (
  options: LocationContextOptions = {},
): LocationContext => {
  const id = contextIdFrom(nextContextId++);
  const label = options.label ?? `context#${id}`;
  const statsEnabled = options.stats ?? isInternerStatsEnabled();

  let state: ContextState = "open";
  let unknown: Location | undefined;

  const descriptors: LocationDescriptor[] = [];
  const handles: Location[] = [];
  const buckets = new Map<number, LocationId[]>();
  const views = new Map<LocationId, LocationView>();
  const opaqueTargets = new Map<LocationId, WeakRef<object>>();
  const counters: InternerCounters = new Map();

  const assertOpen = (operation: string): void => {
    if (state === "disposed") {
      throw locationError({
        code: "LI0001",
        params: { kind: "context-disposed", context: label, operation },
      });
    }
  };

  const descriptorAt = (locationId: LocationId): LocationDescriptor => {
    const desc = descriptors[locationId];
    if (!desc) {
      throw new Error(`unknown LocationId ${locationId} in ${label}`);
    }
    return desc;
  };

  const handleAt = (locationId: LocationId): Location => {
    const handle = handles[locationId];
    if (!handle) {
      throw new Error(`unknown LocationId ${locationId} in ${label}`);
    }
    return handle;
  };

  const intern = (desc: LocationDescriptor): Location => {
    assertOpen("intern a location");
    const hash = hashLocationDescriptor(desc);
    const bucket = buckets.get(hash);
    const existing = bucket?.find((candidate) =>
      locationDescriptorsEqual(descriptorAt(candidate), desc),
    );
    if (existing !== undefined) {
      incrementInternerCounter(counters, "intern.hit");
      return handleAt(existing);
    }

    const locationId = locationIdFrom(descriptors.length);
    descriptors.push(Object.freeze(desc));
    handles.push(new Location(context, locationId));
    if (bucket) {
      bucket.push(locationId);
    } else {
      buckets.set(hash, [locationId]);
    }
    incrementInternerCounter(counters, "intern.miss");
    incrementInternerCounter(counters, `intern.${desc.kind}`);
    return handleAt(locationId);
  };

  const requireChild = (
    variant: LocationKind,
    field: string,
    child: MaybeLocation,
  ): LocationId => {
    if (child === undefined || child === null) {
      throw locationError({
        code: "LB0001",
        params: { kind: "missing-field", variant, field },
        hints: [missingChildHint],
      });
    }
    if (child.context !== context) {
      throw locationError({
        code: "LB0002",
        params: {
          kind: "foreign-child",
          variant,
          field,
          childContext: child.context.label,
          targetContext: label,
        },
      });
    }
    return child.id;
  };

  const buildView = (desc: LocationDescriptor): LocationView => {
    switch (desc.kind) {
      case "unknown":
      case "file-range":
        return desc;
      case "name":
        return Object.freeze({
          kind: desc.kind,
          name: desc.name,
          child: handleAt(desc.child),
        });
      case "call-site":
        return Object.freeze({
          kind: desc.kind,
          callee: handleAt(desc.callee),
          caller: handleAt(desc.caller),
        });
      case "fused":
        return Object.freeze({
          kind: desc.kind,
          locations: Object.freeze(desc.locations.map(handleAt)),
          metadata: desc.metadata,
        });
      case "opaque":
        return Object.freeze({
          kind: desc.kind,
          address: desc.address,
          tag: desc.tag,
          fallback: handleAt(desc.fallback),
        });
    }
  };

  const context: LocationContext = {
    id,
    label,

    get state() {
      return state;
    },

    get size() {
      return descriptors.length;
    },

    get unknown() {
      assertOpen("read the unknown location");
      unknown ??= intern({ kind: "unknown" });
      return unknown;
    },

    owns: (location) => location.context === context && state === "open",

    get: (locationId) => {
      assertOpen("read a location");
      return descriptorAt(locationId);
    },

    view: (locationId) => {
      assertOpen("read a location");
      const cached = views.get(locationId);
      if (cached) {
        return cached;
      }
      const view = buildView(descriptorAt(locationId));
      views.set(locationId, view);
      return view;
    },

    fileLineColRange: (filename, ...position) => {
      assertOpen("build a file location");
      return intern({
        kind: "file-range",
        ...normalizeFilePosition(filename, position),
      });
    },

    fileColumnRange: (filename, line, startColumn, endColumn) => {
      assertOpen("build a file location");
      return intern({
        kind: "file-range",
        ...normalizeColumnRange(filename, line, startColumn, endColumn),
      });
    },

    fileRange: (fields) => {
      assertOpen("build a file location");
      return intern({ kind: "file-range", ...normalizeFileRange(fields) });
    },

    name: (locationName, child) => {
      assertOpen("build a name location");
      if (locationName.length === 0) {
        throw locationError({ code: "LB0001", params: { kind: "empty-name" } });
      }
      return intern({
        kind: "name",
        name: locationName,
        child: requireChild("name", "child", child ?? context.unknown),
      });
    },

    callSite: (callee, caller) => {
      assertOpen("build a call-site location");
      return intern({
        kind: "call-site",
        callee: requireChild("call-site", "callee", callee),
        caller: requireChild("call-site", "caller", caller),
      });
    },

    callSiteChain: (frames) => {
      assertOpen("build a call-site chain");
      if (frames.length === 0) {
        throw locationError({ code: "LB0001", params: { kind: "empty-chain" } });
      }
      const ids = frames.map((frame, index) =>
        requireChild("call-site", `frames[${index}]`, frame),
      );

      // Innermost callee first: [A, B, C] folds to callsite(A at callsite(B at C)).
      // The tail pair forms the deepest call site.
      let chain = ids[ids.length - 1];
      for (let index = ids.length - 2; index >= 0; index -= 1) {
        chain = intern({ kind: "call-site", callee: ids[index], caller: chain }).id;
      }
      return handleAt(chain);
    },

    fused: (locations, metadata) => {
      assertOpen("build a fused location");
      return intern({
        kind: "fused",
        locations: Object.freeze(
          locations.map((location, index) =>
            requireChild("fused", `locations[${index}]`, location),
          ),
        ),
        metadata: metadata === undefined ? undefined : freezeMetadata(metadata),
      });
    },

    opaque: (target, opaqueOptions = {}) => {
      assertOpen("build an opaque location");
      if (target === undefined || target === null) {
        throw locationError({
          code: "LB0001",
          params: { kind: "missing-field", variant: "opaque", field: "target" },
        });
      }
      const fallback = requireChild(
        "opaque",
        "fallback",
        opaqueOptions.fallback ?? context.unknown,
      );
      const location = intern({
        kind: "opaque",
        address: addressOf(target),
        tag: opaqueOptions.tag ?? typeTagOfValue(target),
        fallback,
      });
      if (!opaqueTargets.has(location.id)) {
        opaqueTargets.set(location.id, new WeakRef(target));
      }
      return location;
    },

    opaqueTarget: (location) => {
      assertOpen("read an opaque target");
      if (location.context !== context) {
        return undefined;
      }
      return opaqueTargets.get(location.id)?.deref();
    },

    stats: () => toSortedRecord(counters),

    dispose: () => {
      if (state === "disposed") {
        return;
      }
      if (statsEnabled) {
        logInternerStats({
          context: label,
          size: descriptors.length,
          counters: toSortedRecord(counters),
        });
      }
      state = "disposed";
      unknown = undefined;
      descriptors.length = 0;
      handles.length = 0;
      buckets.clear();
      views.clear();
      opaqueTargets.clear();
    },
  };

  return context;
};
