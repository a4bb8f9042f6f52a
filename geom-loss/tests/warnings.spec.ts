import { describe, it, expect } from "vitest";
import { MAX_WARNINGS, WarningCollector } from "../src/index.js";

describe("WarningCollector", () => {
  it("tags merged warnings with their term", () => {
    const W = new WarningCollector();
    W.add("plain");
    W.addTagged("bondAngle", ["a", "b"]);
    expect(W.toArray()).toEqual(["plain", "[bondAngle] a", "[bondAngle] b"]);
  });

  it("keeps MAX_WARNINGS messages and counts the rest", () => {
    const W = new WarningCollector();
    for (let i = 0; i < MAX_WARNINGS + 3; i++) W.add(`w${i}`);
    const out = W.toArray();
    expect(out).toHaveLength(MAX_WARNINGS + 1);
    expect(out[MAX_WARNINGS - 1]).toBe(`w${MAX_WARNINGS - 1}`);
    expect(out[MAX_WARNINGS]).toBe("3 further warnings dropped");
  });
});
