import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";
import { envLayer, mergeLayers, readYamlLayer, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

const Schema = Type.Object(
  {
    host: Type.String({ default: "0.0.0.0" }),
    port: Type.Integer({ minimum: 1, maximum: 65535, default: 2222 }),
    clock: Type.Boolean({ default: false }),
  },
  { additionalProperties: false }
);

function tempFile(name: string, contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "termfolio-config-"));
  const path = join(dir, name);
  writeFileSync(path, contents);
  return path;
}

describe("mergeLayers", () => {
  it("lets later layers win and skips undefined", () => {
    expect(mergeLayers([{ port: 1, host: "a" }, { port: 2, host: undefined }])).toEqual({
      port: 2,
      host: "a",
    });
  });
});

describe("envLayer", () => {
  it("maps only variables that are set and non-empty", () => {
    const layer = envLayer(
      { TF_PORT: "2300", TF_HOST: "" },
      { port: "TF_PORT", host: "TF_HOST", clock: "TF_CLOCK" }
    );
    expect(layer).toEqual({ port: "2300" });
  });
});

describe("resolveConfig", () => {
  it("fills schema defaults", () => {
    expect(resolveConfig(Schema, [])).toEqual({ host: "0.0.0.0", port: 2222, clock: false });
  });

  it("coerces string values from env and flags", () => {
    const cfg = resolveConfig(Schema, [{ port: "2300" }, { clock: "true" }]);
    expect(cfg.port).toBe(2300);
    expect(cfg.clock).toBe(true);
  });

  it("throws ConfigError listing the failing path", () => {
    try {
      resolveConfig(Schema, [{ port: 70000 }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const issues = err instanceof ConfigError ? err.issues : [];
      expect(issues.some((issue) => issue.startsWith("/port"))).toBe(true);
    }
  });

  it("rejects unknown keys", () => {
    expect(() => resolveConfig(Schema, [{ prot: 22 }])).toThrow(ConfigError);
  });
});

describe("readYamlLayer", () => {
  it("reads a mapping", () => {
    const path = tempFile("termfolio.yaml", "port: 2022\nhost: 127.0.0.1\n");
    expect(readYamlLayer(path)).toEqual({ port: 2022, host: "127.0.0.1" });
  });

  it("returns an empty layer for an empty document", () => {
    expect(readYamlLayer(tempFile("empty.yaml", ""))).toEqual({});
  });

  it("returns an empty layer for a missing optional file", () => {
    expect(readYamlLayer("/nonexistent/termfolio.yaml", true)).toEqual({});
  });

  it("throws for a missing required file", () => {
    expect(() => readYamlLayer("/nonexistent/termfolio.yaml")).toThrow(ConfigError);
  });

  it("throws when the document is not a mapping", () => {
    expect(() => readYamlLayer(tempFile("list.yaml", "- a\n- b\n"))).toThrow(
      /must be a mapping/
    );
  });
});
