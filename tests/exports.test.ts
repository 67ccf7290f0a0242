import { describe, expect, it } from "vitest";
import * as api from "../src/index.js";

describe("public API exports", () => {
  it("exports the comparison entry points", () => {
    expect(typeof api.compareSources).toBe("function");
    expect(typeof api.compareChannels).toBe("function");
    expect(typeof api.decide).toBe("function");
    expect(typeof api.ByteChannel).toBe("function");
  });

  it("exports the error hierarchy", () => {
    expect(new api.SourceOpenError("a", "gone")).toBeInstanceOf(api.CmpError);
    expect(new api.OffsetParseError("offset1", "x", "invalid syntax")).toBeInstanceOf(
      api.UsageError
    );
  });
});
