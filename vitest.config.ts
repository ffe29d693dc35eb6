import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const src = (path: string) =>
  fileURLToPath(new URL(`./packages/galaxyc/src/${path}`, import.meta.url));

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "#ast": src("ast/index.ts"),
      "#types": src("types/index.ts"),
      "#result": src("result.ts"),
      "#errors": src("errors.ts"),
      "#diagnostics": src("diagnostics/index.ts"),
      "#typechecker": src("typechecker/index.ts"),
      "#parser": src("parser/index.ts"),
      "#natives": src("natives/index.ts"),
      "#compiler": src("compiler/index.ts"),
      "#test": fileURLToPath(
        new URL("./packages/galaxyc/test", import.meta.url),
      ),
    },
  },
});
