import type { LocationContext } from "./context.js";
import type {
  LocationDescriptor,
  LocationKind,
  LocationView,
  LocationViewOf,
} from "./descriptors.js";
import type { LocationId } from "./ids.js";
import { printLocation } from "./text/printer.js";

/**
 * Handle to an interned location. A context creates exactly one handle per
 * distinct location, so handles compare with `===`.
 */
export class Location {
  readonly context: LocationContext;
  readonly id: LocationId;

  /** @internal Only `LocationContext` allocates handles. */
  constructor(context: LocationContext, id: LocationId) {
    this.context = context;
    this.id = id;
    Object.freeze(this);
  }

  get kind(): LocationKind {
    return this.descriptor.kind;
  }

  get descriptor(): Readonly<LocationDescriptor> {
    return this.context.get(this.id);
  }

  view(): LocationView {
    return this.context.view(this.id);
  }

  is<K extends LocationKind>(kind: K): boolean {
    return this.kind === kind;
  }

  /** The view of this location when it has the given kind. */
  as<K extends LocationKind>(kind: K): LocationViewOf<K> | undefined {
    const view = this.view();
    return isViewOf(view, kind) ? view : undefined;
  }

  isUnknown(): boolean {
    return this.kind === "unknown";
  }

  /** Direct children: a name's child, callee then caller, fused elements, an opaque fallback. */
  children(): readonly Location[] {
    const view = this.view();
    switch (view.kind) {
      case "unknown":
      case "file-range":
        return [];
      case "name":
        return [view.child];
      case "call-site":
        return [view.callee, view.caller];
      case "fused":
        return view.locations;
      case "opaque":
        return [view.fallback];
    }
  }

  toString(): string {
    return printLocation(this);
  }
}

export const isViewOf = <K extends LocationKind>(
  view: LocationView,
  kind: K,
): view is LocationViewOf<K> => view.kind === kind;
