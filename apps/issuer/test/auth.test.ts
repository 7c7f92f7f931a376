/**
 * SeenRequests: accepted-envelope memory bounded by the skew window.
 */

import { describe, it, expect } from "vitest";
import { SeenRequests } from "../src/auth.js";

const WINDOW = 300_000;
const T0 = 1_700_000_000_000;

describe("SeenRequests", () => {
  it("accepts a digest once", () => {
    const seen = new SeenRequests();
    expect(seen.remember("a", T0, T0, WINDOW)).toBe(true);
    expect(seen.remember("a", T0, T0 + 1_000, WINDOW)).toBe(false);
    expect(seen.remember("b", T0, T0 + 1_000, WINDOW)).toBe(true);
  });

  it("forgets digests whose timestamp left the window", () => {
    const seen = new SeenRequests();
    seen.remember("a", T0, T0, WINDOW);
    seen.remember("b", T0 + 200_000, T0 + 200_000, WINDOW);

    seen.remember("c", T0 + 400_000, T0 + 400_000, WINDOW);
    // "a" (T0) fell out; "b" (T0 + 200s) is still inside [T0 + 100s, ...].
    expect(seen.size()).toBe(2);
    expect(seen.remember("b", T0 + 200_000, T0 + 400_000, WINDOW)).toBe(false);
  });
});
