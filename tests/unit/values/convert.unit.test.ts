import { describe, it, expect } from "vitest";
import { convertArguments } from "../../../src/values/convert";
import { variable } from "../../../src/values/items";
import type { VariableValue } from "../../../src/values/types";
import { InvalidArgumentError, UnknownReferenceError } from "../../../src/errors";

describe("values", () => {
  describe("convertArguments", () => {
    it("should turn numbers into num values and strings into txt values", () => {
      const result = convertArguments([5, 1.5, "hello", ""], new Map());

      expect(result).toEqual([
        { type: "num", value: 5 },
        { type: "num", value: 1.5 },
        { type: "txt", value: "hello" },
        { type: "txt", value: "" },
      ]);
    });

    it("should pass typed values through unchanged", () => {
      const score = variable("score", "saved");

      const [result] = convertArguments([score], new Map());

      expect(result).toBe(score);
    });

    it("should resolve ^name to the defined variable", () => {
      const score = variable("score", "saved");
      const defined = new Map<string, VariableValue>([["score", score]]);

      const [result] = convertArguments(["^score"], defined);

      expect(result).toBe(score);
    });

    it("should fail on a reference that was never defined", () => {
      expect(() => convertArguments(["hello", "^missing"], new Map())).toThrowError(UnknownReferenceError);

      try {
        convertArguments(["^missing"], new Map());
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownReferenceError);
        if (error instanceof UnknownReferenceError) {
          expect(error.reference).toBe("missing");
          expect(error.code).toBe("unknown-reference");
        }
      }
    });

    it("should reject non-finite numbers with the argument index", () => {
      expect(() => convertArguments([1, Number.NaN], new Map())).toThrowError(
        new InvalidArgumentError(1, "number must be finite (got NaN)")
      );
    });
  });
});
