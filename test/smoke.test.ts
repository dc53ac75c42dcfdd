import { describe, it, expect } from "vitest";
import { makeReadyFuture } from "chainlet";

describe("smoke", () => {
  it("exports makeReadyFuture and await resolves", async () => {
    await expect(makeReadyFuture(42)).resolves.toBe(42);
  });
});
