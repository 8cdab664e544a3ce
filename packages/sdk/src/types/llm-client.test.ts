import { describe, it, expect } from "vitest";
import { mergeSampling } from "./llm-client.js";

describe("mergeSampling", () => {
  it("is undefined when neither side sets sampling", () => {
    expect(mergeSampling(undefined, undefined)).toBeUndefined();
  });

  it("returns the only side present", () => {
    const only = { temperature: 0.3 };

    expect(mergeSampling(only, undefined)).toBe(only);
    expect(mergeSampling(undefined, only)).toBe(only);
  });

  it("lets overrides win field by field", () => {
    expect(mergeSampling({ temperature: 0.2, maxTokens: 100, stop: ["##"] }, { maxTokens: 8, topP: 0.9 })).toEqual({
      temperature: 0.2,
      maxTokens: 8,
      topP: 0.9,
      stop: ["##"],
    });
  });
});
