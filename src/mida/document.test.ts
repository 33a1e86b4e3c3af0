import { describe, it, expect } from "vitest";
import { assembleDocument, previewDocument } from "./document.js";

describe("assembleDocument", () => {
  it("reports an empty document when there are no audicles", () => {
    expect(assembleDocument([], [])).toBe("// No tracks found.");
  });

  it("writes a single melodic audicle on its own", () => {
    expect(assembleDocument([], ["*C4 - - -*"])).toBe("*C4 - - -*");
  });

  it("writes a single drum audicle twice", () => {
    expect(assembleDocument(["(*|)"], [])).toBe("(*|)\n(*|)");
  });

  it("wraps two or more audicles in the envelope, drums first", () => {
    expect(assembleDocument(["(x)"], ["*A*", "*B*"])).toBe(
      ["`~#", "‘", "(x)", "*A*", "*B*", "‘"].join("\n"),
    );
  });

  it("wraps melodic-only documents", () => {
    expect(assembleDocument([], ["*A*", "*B*"])).toBe("`~#\n‘\n*A*\n*B*\n‘");
  });

  it("wraps drum-only documents", () => {
    expect(assembleDocument(["(^|)", "(_ v|)"], [])).toBe("`~#\n‘\n(^|)\n(_ v|)\n‘");
  });

  it("does not modify its inputs", () => {
    const drums = ["(x)"];
    const melodic = ["*A*"];
    assembleDocument(drums, melodic);
    expect(drums).toEqual(["(x)"]);
    expect(melodic).toEqual(["*A*"]);
  });
});

describe("previewDocument", () => {
  it("returns short documents unchanged", () => {
    expect(previewDocument("abc", 3)).toBe("abc");
  });

  it("cuts long documents and marks the cut", () => {
    expect(previewDocument("abcdef", 3)).toBe("abc...");
  });

  it("defaults to 500 characters", () => {
    expect(previewDocument("x".repeat(600))).toBe("x".repeat(500) + "...");
  });
});
