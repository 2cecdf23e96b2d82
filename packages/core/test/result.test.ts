import { describe, it, expect } from "vitest";
import { Ok, Err, andThen, toError, type Result } from "../src/result.js";

describe("Result", () => {
  describe("Ok / Err", () => {
    it("creates a successful result", () => {
      expect(Ok(42)).toEqual({ ok: true, value: 42 });
    });

    it("creates an error result", () => {
      const error = new Error("something went wrong");
      expect(Err(error)).toEqual({ ok: false, error });
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> => (n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`));

    it("chains successes", () => {
      expect(andThen(Ok(8), half)).toEqual(Ok(4));
    });

    it("stops at the first error", () => {
      expect(andThen(andThen(Ok(6), half), half)).toEqual(Err("3 is odd"));
    });

    it("does not call fn for an error", () => {
      let called = false;
      const result: Result<number, string> = Err("early");
      andThen(result, (n) => {
        called = true;
        return Ok(n);
      });
      expect(called).toBe(false);
    });
  });

  describe("toError", () => {
    it("keeps Error instances", () => {
      const error = new TypeError("typed");
      expect(toError(error)).toBe(error);
    });

    it("stringifies anything else", () => {
      expect(toError(42).message).toBe("42");
    });
  });
});
