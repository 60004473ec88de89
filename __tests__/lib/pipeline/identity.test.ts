/**
 * Tests for content identifiers
 */

import { describe, it, expect } from "vitest";
import { identify } from "@/src/lib/pipeline/identity";

describe("identify", () => {
  it("should be stable for the same title and link", () => {
    const id = identify("고용노동부 보도자료", "https://example.com/a");
    expect(id).toBe(identify("고용노동부 보도자료", "https://example.com/a"));
    expect(id).toMatch(/^[0-9a-f]{64}$/);
  });

  it("should differ when the link differs", () => {
    expect(identify("제목", "https://example.com/a")).not.toBe(identify("제목", "https://example.com/b"));
  });

  it("should not collide when characters move across the title/link boundary", () => {
    expect(identify("ab", "c")).not.toBe(identify("a", "bc"));
  });

  it("should return null when both fields are empty", () => {
    expect(identify("", "")).toBeNull();
    expect(identify("  ", " ")).toBeNull();
  });

  it("should accept a title without a link", () => {
    expect(identify("제목만 있음", "")).toMatch(/^[0-9a-f]{64}$/);
  });
});
