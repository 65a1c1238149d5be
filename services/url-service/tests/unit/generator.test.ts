import { describe, expect, test } from "vitest";
import { createShortIdGenerator, SHORT_ID_ALPHABET } from "../../src/generator.js";

describe("createShortIdGenerator", () => {
  test("alphabet is the 62 alphanumerics", () => {
    expect(SHORT_ID_ALPHABET).toHaveLength(62);
    expect(new Set(SHORT_ID_ALPHABET).size).toBe(62);
  });

  test("defaults to 8 characters", () => {
    expect(createShortIdGenerator().generate()).toMatch(/^[0-9a-zA-Z]{8}$/);
  });

  test("honours the configured length", () => {
    const gen = createShortIdGenerator(12);
    for (let i = 0; i < 20; i++) {
      expect(gen.generate()).toMatch(/^[0-9a-zA-Z]{12}$/);
    }
  });

  test("does not repeat itself", () => {
    const gen = createShortIdGenerator();
    const ids = new Set(Array.from({ length: 200 }, () => gen.generate()));
    expect(ids.size).toBe(200);
  });

  test.each([0, -1, 2.5])("rejects length %s", (length) => {
    expect(() => createShortIdGenerator(length)).toThrow(`Invalid short id length: ${length}`);
  });
});
