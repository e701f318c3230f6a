import { describe, it, expect } from "vitest";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { execa } from "../../helpers/execa";

const distCli = resolve(process.cwd(), "dist/cli.js");
const hasDist = existsSync(distCli);
const example = resolve(process.cwd(), "examples/join-greeting.yaml");

const runIfDist = it.runIf(hasDist);

describe("cli", () => {
  runIfDist("should print a code that decodes back to the example blocks", async () => {
    const built = await execa("node", [distCli, "build", example, "--quiet"]);

    expect(built.exitCode).toBe(0);
    const code = String(built.stdout).trim();
    expect(code).toMatch(/^[A-Za-z0-9+/]+=*$/);

    const decoded = await execa("node", [distCli, "decode", code]);

    expect(decoded.exitCode).toBe(0);
    expect(JSON.parse(String(decoded.stdout)).blocks).toHaveLength(12);
  });

  runIfDist("should fail when the script does not exist", async () => {
    const result = await execa("node", [distCli, "build", "does-not-exist.yaml"]);

    expect(result.exitCode).toBe(1);
    expect(String(result.stdout)).toBe("");
    expect(String(result.stderr)).toContain('"event":"build-failed"');
  });

  runIfDist("should fail on a code that is not a template", async () => {
    const result = await execa("node", [distCli, "decode", "not-a-template"]);

    expect(result.exitCode).toBe(1);
    expect(String(result.stderr)).toContain('"event":"decode-failed"');
  });

  runIfDist("should show help and exit 0", async () => {
    const result = await execa("node", [distCli, "build", "--help"]);

    expect(result.exitCode).toBe(0);
    expect(String(result.stdout)).toContain("--schema");
  });
});
