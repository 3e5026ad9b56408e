import { createLocationContext } from "@locus/location";
import { describe, expect, it } from "vitest";
import { canonicalizeInputs, inputLines } from "../canonicalize.js";

describe("canonicalizeInputs", () => {
  it("prints each input in canonical form", () => {
    const ctx = createLocationContext();
    const result = canonicalizeInputs(
      ctx,
      ['"a.c":3:1 to 3:9', 'fused[ "x" , ? ]', '"n"( ? )'],
      { file: "<input>" },
    );
    expect(result.output).toEqual(['"a.c":3:1 to :9', 'fused["x",?]', '"n"']);
    expect(result.failures).toEqual([]);
    expect(result.diagnostics.hasErrors).toBe(false);
  });

  it("prefixes the kind on request", () => {
    const ctx = createLocationContext();
    const result = canonicalizeInputs(ctx, ["?", 'callsite("f" at ?)'], {
      file: "<input>",
      showKind: true,
    });
    expect(result.output).toEqual(["unknown\t?", 'call-site\tcallsite("f" at ?)']);
  });

  it("records malformed inputs and keeps going", () => {
    const ctx = createLocationContext();
    const result = canonicalizeInputs(ctx, ["?", "fused[", '"b.c":2'], {
      file: "args",
    });
    expect(result.output).toEqual(["?", '"b.c":2']);
    expect(result.failures).toHaveLength(1);
    const [failure] = result.failures;
    expect(failure.line).toBe(2);
    expect(failure.source).toBe("fused[");
    expect(failure.diagnostic.code).toBe("LP0002");
    expect(failure.diagnostic.span).toEqual({ file: "args", start: 6, end: 6 });
    expect(result.diagnostics.hasErrors).toBe(true);
  });

  it("records builder errors raised by well-formed text", () => {
    const ctx = createLocationContext();
    const result = canonicalizeInputs(ctx, ['""'], { file: "args" });
    expect(result.output).toEqual([]);
    expect(result.failures.map(({ diagnostic }) => diagnostic.message)).toEqual([
      "name location requires a non-empty name",
    ]);
  });

  it("does not treat a disposed context as bad input", () => {
    const ctx = createLocationContext();
    ctx.dispose();
    expect(() => canonicalizeInputs(ctx, ["?"], { file: "x" })).toThrow(
      "has been disposed",
    );
  });
});

describe("inputLines", () => {
  it("drops blank lines and surrounding whitespace", () => {
    expect(inputLines('  ?  \r\n\n"a":1\n   \n')).toEqual(["?", '"a":1']);
  });
});
