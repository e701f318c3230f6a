import { describe, it, expect } from "vitest";
import { validateScriptContent } from "../../../src/script/validation";
import { num, parameter } from "../../../src/values/items";

const validate = (content: string) => validateScriptContent(content, "script.yaml");

describe("script", () => {
  describe("validateScriptContent", () => {
    it("should read operations, arguments and options", () => {
      const result = validate(
        [
          "description: greet players",
          "blocks:",
          "  - playerEvent: Join",
          "  - playerAction: SendMessage",
          "    args: [hello, 5, { type: var, name: score, scope: saved }]",
          "    target: AllPlayers",
          "  - repeat: Multiple",
          "    args: [3]",
          "  - bracket",
        ].join("\n")
      );

      expect(result.issues).toEqual([]);
      expect(result.script).toEqual({
        file: "script.yaml",
        description: "greet players",
        steps: [
          { operation: "playerEvent", name: "Join" },
          {
            operation: "playerAction",
            name: "SendMessage",
            args: ["hello", 5, { type: "var", name: "score", scope: "saved" }],
            target: "AllPlayers",
          },
          { operation: "repeat", name: "Multiple", args: [3] },
          { operation: "bracket" },
        ],
      });
    });

    it("should read function parameters with defaults", () => {
      const result = validate(
        [
          "blocks:",
          "  - function: add",
          "    parameters:",
          "      - { name: amount, type: num, optional: true, default: 1 }",
        ].join("\n")
      );

      expect(result.script?.steps).toEqual([
        {
          operation: "function",
          name: "add",
          parameters: [parameter("amount", "num", { optional: true, defaultValue: num(1) })],
        },
      ]);
    });

    it("should keep the order of named values", () => {
      const result = validate(["blocks:", "  - return:", "      total: 3", "      label: done"].join("\n"));

      expect(result.script?.steps).toEqual([
        {
          operation: "return",
          values: [
            ["total", 3],
            ["label", "done"],
          ],
        },
      ]);
    });

    it("should keep integer-like names in the order they are written", () => {
      const result = validate(
        [
          "blocks:",
          "  - callFunction: pick",
          "    parameters: { b: 1, 2: two }",
          "  - return: { z: 0, 10: 1, a: 2 }",
        ].join("\n")
      );

      expect(result.issues).toEqual([]);
      expect(result.script?.steps).toEqual([
        {
          operation: "callFunction",
          name: "pick",
          parameters: [
            ["b", 1],
            ["2", "two"],
          ],
        },
        {
          operation: "return",
          values: [
            ["z", 0],
            ["10", 1],
            ["a", 2],
          ],
        },
      ]);
    });

    it("should reject options the operation does not take", () => {
      const result = validate(["blocks:", "  - playerEvent: Join", "    target: AllPlayers"].join("\n"));

      expect(result.script).toBeUndefined();
      expect(result.issues).toEqual([
        expect.objectContaining({ path: "blocks[0].target", message: 'Unknown key "target"', severity: "error" }),
      ]);
    });

    it("should reject steps naming zero or several operations", () => {
      const result = validate(["blocks:", "  - { playerEvent: Join, process: loop }", "  - { args: [1] }"].join("\n"));

      expect(result.issues.map((issue) => [issue.path, issue.message])).toEqual([
        ["blocks[0]", "Step names more than one operation (playerEvent, process)"],
        ["blocks[1]", "Step does not name an operation"],
      ]);
    });

    it("should report unknown value types and bad scopes by path", () => {
      const result = validate(
        [
          "blocks:",
          "  - playerEvent: Join",
          "  - setVariable: '='",
          "    args: [{ type: banana }, { type: var, name: x, scope: global }]",
        ].join("\n")
      );

      expect(result.issues.map((issue) => [issue.path, issue.message])).toEqual([
        ["blocks[1].args[0].type", 'Unknown value type "banana"'],
        ["blocks[1].args[1].scope", "scope must be one of unsaved, saved, local, line"],
      ]);
    });

    it("should require a non-empty block list", () => {
      const result = validate("description: nothing");

      expect(result.issues).toEqual([
        expect.objectContaining({ path: "blocks", message: "blocks must be a non-empty array" }),
      ]);
    });

    it("should require operation names to be non-empty strings", () => {
      const result = validate(["blocks:", "  - playerEvent: ''"].join("\n"));

      expect(result.issues).toEqual([
        expect.objectContaining({ path: "blocks[0].playerEvent", message: "playerEvent must be a non-empty string" }),
      ]);
    });

    it("should report YAML syntax errors with a line", () => {
      const result = validate("blocks: [playerEvent: Join");

      expect(result.script).toBeUndefined();
      expect(result.issues[0].severity).toBe("error");
      expect(result.issues[0].line).toBeDefined();
    });
  });
});
