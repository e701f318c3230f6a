import { gunzipSync, gzipSync } from "node:zlib";
import { describe, it, expect } from "vitest";
import { decodeTemplate, encodeTemplate } from "../../../src/encoding/codec";
import { Template } from "../../../src/builder/template";
import { TemplateDecodeError } from "../../../src/errors";

const gzipBase64 = (json: string): string => gzipSync(Buffer.from(json, "utf-8")).toString("base64");

describe("encoding", () => {
  describe("encodeTemplate", () => {
    it("should gzip the document as JSON with sorted keys", () => {
      const { code, name } = encodeTemplate(
        { blocks: [{ id: "bracket", direct: "open", type: "norm", args: { items: [] } }] },
        "x"
      );

      expect(name).toBe("x");
      expect(gunzipSync(Buffer.from(code, "base64")).toString("utf-8")).toBe(
        '{"blocks":[{"args":{"items":[]},"direct":"open","id":"bracket","type":"norm"}]}'
      );
    });

    it("should encode equal documents to the same code regardless of key order", () => {
      const first = encodeTemplate(
        { blocks: [{ id: "bracket", direct: "close", type: "repeat", args: { items: [] } }] },
        "a"
      );
      const second = encodeTemplate(
        { blocks: [{ args: { items: [] }, type: "repeat", direct: "close", id: "bracket" }] },
        "a"
      );

      expect(first.code).toBe(second.code);
    });

    it("should round-trip a built template", () => {
      const template = new Template()
        .playerEvent("Join")
        .define("visits", { scope: "saved" })
        .ifVariable(">", ["^visits", 10])
        .playerAction("SendMessage", ["Welcome back"], { target: "AllPlayers" })
        .bracket();
      const { document } = template.toDocument();

      expect(decodeTemplate(template.build().code)).toEqual(document);
    });
  });

  describe("decodeTemplate", () => {
    it("should accept surrounding whitespace", () => {
      expect(decodeTemplate(` ${gzipBase64('{"blocks":[]}')}\n`)).toEqual({ blocks: [] });
    });

    it("should reject codes that are not gzip data", () => {
      expect(() => decodeTemplate("not a template")).toThrowError(TemplateDecodeError);
      expect(() => decodeTemplate("not a template")).toThrowError(/^Template code is not valid compressed data: /);
    });

    it("should reject compressed text that is not JSON", () => {
      expect(() => decodeTemplate(gzipBase64("blocks"))).toThrowError(
        /^Template code does not contain valid JSON: /
      );
    });

    it("should reject JSON that is not a list of code blocks", () => {
      expect(() => decodeTemplate(gzipBase64('{"foo":1}'))).toThrowError(
        "Template code does not describe a list of code blocks"
      );
      expect(() => decodeTemplate(gzipBase64('{"blocks":[{"id":"chest"}]}'))).toThrowError(
        "Template code does not describe a list of code blocks"
      );
    });
  });
});
