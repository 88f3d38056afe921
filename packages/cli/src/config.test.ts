/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createVersion } from "@introgen/frontend";
import {
  findConfig,
  loadConfig,
  policyForType,
  resolveConfig,
  validateConfig,
} from "./config.js";
import type { IntrogenConfig } from "./types.js";

describe("Config", () => {
  describe("loadConfig", () => {
    it("should load introgen.json", () => {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "introgen-test-"));
      const configPath = path.join(tmpDir, "introgen.json");
      fs.writeFileSync(
        configPath,
        JSON.stringify({
          options: { library: "Gdk", version: "3.0" },
          objects: [{ name: "Gdk.Rgba", unhide: ["clone"] }],
        })
      );

      const result = loadConfig(configPath);

      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.options?.library).to.equal("Gdk");
        expect(result.value.objects?.[0]?.unhide).to.deep.equal(["clone"]);
      }
    });

    it("should report a missing file", () => {
      const result = loadConfig("/nonexistent/introgen.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("IGN1001");
      }
    });

    it("should report invalid JSON", () => {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "introgen-test-"));
      const configPath = path.join(tmpDir, "introgen.json");
      fs.writeFileSync(configPath, "{ options: ");

      const result = loadConfig(configPath);

      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("IGN1003");
      }
    });
  });

  describe("validateConfig", () => {
    it("should report every mistyped field", () => {
      const result = validateConfig(
        {
          options: { trustReturnValueNullability: "yes" },
          objects: [{ name: 5, unhide: "clone" }],
        },
        "introgen.json"
      );

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.message)).to.deep.equal([
          "'options.trustReturnValueNullability' must be a boolean",
          "'objects[0].unhide' must be an array of strings",
          "'objects[0].name' must be a string",
        ]);
      }
    });

    it("should reject a non-object config", () => {
      const result = validateConfig([], "introgen.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error[0]?.code).to.equal("IGN1004");
      }
    });
  });

  describe("findConfig", () => {
    it("should walk up to the nearest introgen.json", () => {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "introgen-test-"));
      const nested = path.join(tmpDir, "a", "b");
      fs.mkdirSync(nested, { recursive: true });
      fs.writeFileSync(path.join(tmpDir, "introgen.json"), "{}");

      const found = findConfig(nested);

      fs.rmSync(tmpDir, { recursive: true, force: true });

      expect(found).to.equal(path.join(tmpDir, "introgen.json"));
    });
  });

  describe("resolveConfig", () => {
    it("should default to distrusting nullability", () => {
      const result = resolveConfig({}, {});

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.trustReturnValueNullability).to.equal(false);
        expect(result.value.minCfgVersion).to.be.undefined;
        expect(result.value.objects).to.deep.equal([]);
        expect(result.value.verbose).to.equal(false);
      }
    });

    it("should let CLI options override the file", () => {
      const config: IntrogenConfig = {
        options: {
          minCfgVersion: "3.0",
          trustReturnValueNullability: false,
        },
      };

      const result = resolveConfig(config, {
        minCfgVersion: "3.22",
        trustNullability: true,
        quiet: true,
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.minCfgVersion).to.deep.equal(createVersion(3, 22));
        expect(result.value.trustReturnValueNullability).to.equal(true);
        expect(result.value.quiet).to.equal(true);
      }
    });

    it("should collect version, identifier and operation errors", () => {
      const config: IntrogenConfig = {
        options: { minCfgVersion: "three" },
        objects: [{ name: "Gtk.*" }, { name: "Gdk.Rgba", unhide: ["copy"] }],
      };

      const result = resolveConfig(config, {}, "introgen.json");

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.map((d) => d.code)).to.deep.equal([
          "IGN3001",
          "IGN1007",
          "IGN1009",
        ]);
      }
    });
  });

  describe("policyForType", () => {
    const config: IntrogenConfig = {
      options: { trustReturnValueNullability: false, minCfgVersion: "2.50" },
      objects: [
        { name: "Gio.FileType", trustReturnValueNullability: true },
        { pattern: "Gio\\..*", unhide: ["clone"] },
      ],
    };

    it("should use the first matching object", () => {
      const resolved = resolveConfig(config, {});
      expect(resolved.ok).to.equal(true);
      if (!resolved.ok) return;

      expect(policyForType(resolved.value, "Gio.FileType")).to.deep.equal({
        trustReturnValueNullability: true,
        unhide: [],
        minCfgVersion: createVersion(2, 50),
      });
      expect(policyForType(resolved.value, "Gio.File")).to.deep.equal({
        trustReturnValueNullability: false,
        unhide: ["clone"],
        minCfgVersion: createVersion(2, 50),
      });
    });

    it("should fall back to global options", () => {
      const resolved = resolveConfig(config, {});
      expect(resolved.ok).to.equal(true);
      if (!resolved.ok) return;

      expect(policyForType(resolved.value, "Gtk.Widget")).to.deep.equal({
        trustReturnValueNullability: false,
        unhide: [],
        minCfgVersion: createVersion(2, 50),
      });
    });
  });
});
