import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import { Type } from "#types";

import { NativeLoader, nativeType } from "./loader.js";

const signatures = (loader: NativeLoader) =>
  Object.fromEntries(
    [...loader.builtins()].map(([name, type]) => [name, type.toString()]),
  );

describe("NativeLoader", () => {
  describe("loadFromText", () => {
    it("reads native declaration lines", () => {
      const loader = new NativeLoader();
      const count = loader.loadFromText(`
        // engine natives
        native void TriggerExecute(trigger t, bool checkConds, bool wait);
        native int[] Values();
        native fixed Average(int[] values, int count);
        int NotNative(int a);
      `);

      expect(count).toBe(3);
      expect(signatures(loader)).toEqual({
        TriggerExecute: "void(trigger, bool, bool)",
        Values: "int[]()",
        Average: "fixed(int[], int)",
      });
    });

    it("maps type aliases", () => {
      const loader = new NativeLoader();
      loader.loadFromText("native boolean IsReady(integer value);");

      expect(signatures(loader)).toEqual({ IsReady: "bool(int)" });
    });

    it("accepts void, const and unnamed parameters", () => {
      const loader = new NativeLoader();
      loader.loadFromText(
        [
          "native void Reset(void);",
          "native void Set(const int v);",
          "native void Wait(fixed);",
        ].join("\n"),
      );

      expect(signatures(loader)).toEqual({
        Reset: "void()",
        Set: "void(int)",
        Wait: "void(fixed)",
      });
    });

    it("marks unknown type names as failures", () => {
      const loader = new NativeLoader();
      loader.loadFromText("native widget Make(gizmo g);");

      expect(signatures(loader)).toEqual({ Make: "<error>(<error>)" });
    });
  });

  describe("loadFromFile", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(path.join(tmpdir(), "natives-"));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("reads a declaration file", () => {
      const file = path.join(dir, "natives.galaxy");
      writeFileSync(file, "native string IntToString(int x);\n");

      const loader = new NativeLoader();
      expect(loader.loadFromFile(file)).toBe(1);
      expect(signatures(loader)).toEqual({ IntToString: "string(int)" });
      expect(loader.loadErrors).toEqual([]);
    });

    it("records a missing file", () => {
      const file = path.join(dir, "missing.galaxy");
      const loader = new NativeLoader();

      expect(loader.loadFromFile(file)).toBe(0);
      expect(loader.loadErrors).toEqual([`File not found: ${file}`]);
    });
  });

  describe("loadCommon", () => {
    it("loads the bundled table", () => {
      const loader = new NativeLoader();
      loader.loadCommon();

      const builtins = loader.builtins();
      expect(builtins.size).toBe(45);
      expect(builtins.get("TimerCreate")?.toString()).toBe("timer()");
      expect(builtins.get("StringLength")?.toString()).toBe("int(string)");
    });
  });

  it("hands out copies of its state", () => {
    const loader = new NativeLoader();
    loader.loadFromText("native void A();");

    loader.builtins().clear();
    expect(loader.builtins().size).toBe(1);
  });
});

describe("nativeType", () => {
  it("resolves built-in names", () => {
    expect(nativeType("fixed")).toBe(Type.Basic.fixed);
    expect(nativeType("unit").toString()).toBe("unit");
  });

  it("wraps arrays without a size", () => {
    const type = nativeType("int", true);

    expect(Type.isArray(type) && type.size).toBe(undefined);
    expect(type.toString()).toBe("int[]");
  });
});
