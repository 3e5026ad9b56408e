import { afterEach, describe, expect, it, vi } from "vitest";
import { createLocationContext } from "../context.js";
import { UNSET_POSITION } from "../descriptors.js";
import { LocationError, isLocationError } from "../errors.js";

const captureError = (run: () => unknown): LocationError => {
  try {
    run();
  } catch (error) {
    if (error instanceof LocationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a LocationError");
};

describe("location context interning", () => {
  it("returns one handle for every spelling of the same file range", () => {
    const ctx = createLocationContext();
    const lineOnly = ctx.fileLineColRange("f", 3);
    expect(ctx.fileLineColRange("f", 3, UNSET_POSITION, 3, UNSET_POSITION)).toBe(
      lineOnly,
    );
    expect(ctx.fileLineColRange("f", 3, UNSET_POSITION)).toBe(lineOnly);

    const point = ctx.fileLineColRange("f", 10, 8);
    expect(ctx.fileLineColRange("f", 10, 8, 10, 8)).toBe(point);
    expect(ctx.fileColumnRange("f", 10, 8, 8)).toBe(point);
    expect(
      ctx.fileRange({
        filename: "f",
        startLine: 10,
        startColumn: 8,
        endLine: 10,
        endColumn: 8,
      }),
    ).toBe(point);

    expect(point).not.toBe(lineOnly);
    expect(ctx.size).toBe(2);
  });

  it("keeps column zero distinct from an unknown column", () => {
    const ctx = createLocationContext();
    expect(ctx.fileLineColRange("f", 3, 0)).not.toBe(ctx.fileLineColRange("f", 3));
  });

  it("creates the unknown location once per context", () => {
    const ctx = createLocationContext();
    expect(ctx.size).toBe(0);
    const unknown = ctx.unknown;
    expect(ctx.unknown).toBe(unknown);
    expect(unknown.kind).toBe("unknown");
    expect(ctx.size).toBe(1);
  });

  it("never shares instances between contexts", () => {
    const left = createLocationContext();
    const right = createLocationContext();
    const a = left.fileLineColRange("f", 1, 1);
    const b = right.fileLineColRange("f", 1, 1);
    expect(a).not.toBe(b);
    expect(left.unknown).not.toBe(right.unknown);
    expect(a.toString()).toBe(b.toString());
    expect(left.owns(a)).toBe(true);
    expect(left.owns(b)).toBe(false);
  });

  it("defaults a name's child to unknown", () => {
    const ctx = createLocationContext();
    const named = ctx.name("x");
    expect(ctx.name("x", ctx.unknown)).toBe(named);
    expect(named.as("name")?.child).toBe(ctx.unknown);
  });

  it("interns composites by child identity", () => {
    const ctx = createLocationContext();
    const file = ctx.fileLineColRange("f", 1, 1);
    const named = ctx.name("inlined", file);
    const call = ctx.callSite(named, ctx.fileLineColRange("g", 2));
    expect(ctx.name("inlined", ctx.fileLineColRange("f", 1, 1))).toBe(named);
    expect(ctx.callSite(named, ctx.fileLineColRange("g", 2))).toBe(call);
    expect(ctx.callSite(ctx.fileLineColRange("g", 2), named)).not.toBe(call);
  });

  it("keeps fused order, duplicates and metadata in the identity", () => {
    const ctx = createLocationContext();
    const a = ctx.fileLineColRange("f", 1);
    const b = ctx.fileLineColRange("f", 2);

    const fused = ctx.fused([a, b]);
    expect(ctx.fused([a, b])).toBe(fused);
    expect(ctx.fused([b, a])).not.toBe(fused);

    const repeated = ctx.fused([a, a]);
    expect(repeated.as("fused")?.locations).toEqual([a, a]);
    expect(ctx.fused([]).as("fused")?.locations).toEqual([]);

    const emptyString = ctx.fused([a, b], { kind: "string", value: "" });
    const emptyArray = ctx.fused([a, b], { kind: "array", elements: [] });
    expect(emptyString).not.toBe(fused);
    expect(emptyArray).not.toBe(fused);
    expect(emptyArray).not.toBe(emptyString);
    expect(ctx.fused([a, b], { kind: "array", elements: [] })).toBe(emptyArray);
  });

  it("freezes stored descriptors and views", () => {
    const ctx = createLocationContext();
    const fused = ctx.fused([ctx.unknown], { kind: "symbol", name: "pass" });
    expect(Object.isFrozen(fused.descriptor)).toBe(true);
    expect(Object.isFrozen(fused.view())).toBe(true);
    expect(fused.view()).toBe(fused.view());
  });

  it("exposes children in traversal order", () => {
    const ctx = createLocationContext();
    const callee = ctx.name("callee");
    const caller = ctx.fileLineColRange("f", 4);
    const call = ctx.callSite(callee, caller);
    expect(call.children()).toEqual([callee, caller]);
    expect(call.is("call-site")).toBe(true);
    expect(call.as("name")).toBeUndefined();
    expect(caller.children()).toEqual([]);
  });
});

describe("location context errors", () => {
  it("rejects children owned by another context", () => {
    const one = createLocationContext({ label: "one" });
    const two = createLocationContext({ label: "two" });
    const error = captureError(() => two.name("n", one.unknown));
    expect(error.kind).toBe("ContextMismatch");
    expect(error.diagnostic.code).toBe("LB0002");
    expect(error.diagnostic.message).toBe(
      "name location field 'child' belongs to context one, not two",
    );

    const fusedError = captureError(() =>
      two.fused([two.unknown, one.unknown]),
    );
    expect(fusedError.diagnostic.message).toBe(
      "fused location field 'locations[1]' belongs to context one, not two",
    );
  });

  it("rejects missing required fields instead of defaulting to unknown", () => {
    const ctx = createLocationContext();
    const callee = captureError(() => ctx.callSite(undefined, ctx.unknown));
    expect(callee.kind).toBe("MissingRequiredField");
    expect(callee.diagnostic.message).toBe(
      "call-site location is missing required field 'callee'",
    );

    expect(captureError(() => ctx.callSite(ctx.unknown, null)).diagnostic.message).toBe(
      "call-site location is missing required field 'caller'",
    );
    expect(captureError(() => ctx.name("")).diagnostic.message).toBe(
      "name location requires a non-empty name",
    );
    expect(
      captureError(() => ctx.fused([ctx.unknown, undefined])).diagnostic.message,
    ).toBe("fused location is missing required field 'locations[1]'");
    expect(captureError(() => ctx.opaque(null)).diagnostic.message).toBe(
      "opaque location is missing required field 'target'",
    );
  });

  it("requires a filename for file ranges", () => {
    const ctx = createLocationContext();
    const error = captureError(() => ctx.fileLineColRange("", 1));
    expect(error.kind).toBe("MissingRequiredField");
    expect(error.diagnostic.message).toBe(
      "file-range location is missing required field 'filename'",
    );
    expect(
      captureError(() => ctx.fileColumnRange("", 1, 2, 3)).diagnostic.code,
    ).toBe("LB0001");
    expect(ctx.size).toBe(0);
  });

  it("suggests the unknown location only for a missing child", () => {
    const ctx = createLocationContext();
    expect(
      captureError(() => ctx.callSite(undefined, ctx.unknown)).diagnostic.hints,
    ).toEqual([
      {
        message:
          "Pass the context's unknown location explicitly when no origin is available.",
      },
    ]);
    expect(captureError(() => ctx.name("")).diagnostic.hints).toBeUndefined();
    expect(captureError(() => ctx.callSiteChain([])).diagnostic.hints).toBeUndefined();
  });

  it("rejects integer metadata that is not a safe integer", () => {
    const ctx = createLocationContext();
    const notANumber = captureError(() =>
      ctx.fused([], { kind: "integer", value: Number.NaN }),
    );
    expect(notANumber.kind).toBe("InvalidRange");
    expect(notANumber.diagnostic.code).toBe("LB0004");
    expect(notANumber.diagnostic.message).toBe(
      "fused metadata must be a safe integer, got NaN",
    );
    expect(
      captureError(() => ctx.fused([], { kind: "integer", value: 1.5 })).diagnostic
        .message,
    ).toBe("fused metadata must be a safe integer, got 1.5");
    expect(
      captureError(() =>
        ctx.fused([], {
          kind: "array",
          elements: [
            { kind: "unit" },
            { kind: "array", elements: [{ kind: "integer", value: 2 ** 53 }] },
          ],
        }),
      ).diagnostic.message,
    ).toBe("fused metadata[1][0] must be a safe integer, got 9007199254740992");
    expect(ctx.size).toBe(0);

    const valid = ctx.fused([], { kind: "integer", value: -7 });
    expect(ctx.fused([], { kind: "integer", value: -7 })).toBe(valid);
    expect(valid.toString()).toBe("fused<-7>[]");
  });

  it("rejects malformed file ranges", () => {
    const ctx = createLocationContext();
    const error = captureError(() => ctx.fileLineColRange("f", 5, 2, 4, 0));
    expect(error.kind).toBe("InvalidRange");
    expect(error.diagnostic.message).toBe(
      'invalid range in "f": range end precedes its start',
    );
    expect(ctx.size).toBe(0);
  });
});

describe("location context lifecycle", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("refuses every operation after dispose", () => {
    const ctx = createLocationContext({ label: "short-lived", stats: false });
    const file = ctx.fileLineColRange("f", 1);
    ctx.dispose();

    expect(ctx.state).toBe("disposed");
    expect(ctx.size).toBe(0);
    const error = captureError(() => ctx.unknown);
    expect(error.kind).toBe("ContextDisposed");
    expect(error.diagnostic.message).toBe(
      "cannot read the unknown location: location context short-lived has been disposed",
    );
    expect(isLocationError(captureError(() => file.kind), "ContextDisposed")).toBe(
      true,
    );
    expect(
      isLocationError(
        captureError(() => ctx.fileLineColRange("f", 1)),
        "ContextDisposed",
      ),
    ).toBe(true);
    expect(ctx.owns(file)).toBe(false);
    expect(() => ctx.dispose()).not.toThrow();
  });

  it("counts hits and misses and logs them once on dispose", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const ctx = createLocationContext({ label: "stats", stats: true });
    ctx.fileLineColRange("f", 1);
    ctx.fileLineColRange("f", 1);
    void ctx.unknown;

    expect(ctx.stats()).toEqual({
      "intern.file-range": 1,
      "intern.hit": 1,
      "intern.miss": 2,
      "intern.unknown": 1,
    });

    ctx.dispose();
    ctx.dispose();
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      '[locus:interner:stats] {"context":"stats","size":2,"counters":{"intern.file-range":1,"intern.hit":1,"intern.miss":2,"intern.unknown":1}}',
    );
  });

  it("reads the stats switch from the environment", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.stubEnv("LOCUS_INTERNER_STATS", "yes");
    try {
      const ctx = createLocationContext({ label: "env" });
      ctx.dispose();
    } finally {
      vi.unstubAllEnvs();
    }
    expect(log).toHaveBeenCalledWith(
      '[locus:interner:stats] {"context":"env","size":0,"counters":{}}',
    );

    const quiet = createLocationContext({ label: "quiet" });
    quiet.dispose();
    expect(log).toHaveBeenCalledTimes(1);
  });
});
