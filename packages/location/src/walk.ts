import type {
  FileRangeView,
  LocationKind,
  LocationView,
  LocationViewOf,
} from "./descriptors.js";
import { isViewOf, type Location } from "./location.js";

export type WalkAction = "advance" | "skip" | "interrupt";

export type WalkResult = "advance" | "interrupt";

export type LocationVisitor = (
  location: Location,
  view: LocationView,
) => WalkAction | void;

/**
 * Pre-order walk over a location and everything it references. Shared
 * sub-locations are visited once per occurrence; `skip` leaves out the
 * children of the current location and `interrupt` ends the walk.
 */
export const walkLocation = (
  root: Location,
  visit: LocationVisitor,
): WalkResult => {
  const pending: Location[] = [root];
  while (pending.length > 0) {
    const location = pending.pop();
    if (!location) break;

    const action = visit(location, location.view());
    if (action === "interrupt") {
      return "interrupt";
    }
    if (action === "skip") {
      continue;
    }

    const children = location.children();
    for (let index = children.length - 1; index >= 0; index -= 1) {
      pending.push(children[index]);
    }
  }
  return "advance";
};

export const findLocation = <K extends LocationKind>(
  root: Location,
  kind: K,
): LocationViewOf<K> | undefined => {
  let found: LocationViewOf<K> | undefined;
  walkLocation(root, (_location, view) => {
    if (isViewOf(view, kind)) {
      found = view;
      return "interrupt";
    }
    return "advance";
  });
  return found;
};

export const collectFileRanges = (root: Location): FileRangeView[] => {
  const ranges: FileRangeView[] = [];
  walkLocation(root, (_location, view) => {
    if (view.kind === "file-range") {
      ranges.push(view);
    }
  });
  return ranges;
};
