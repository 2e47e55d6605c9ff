import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — the builder only touches Uint8Array/DataView and
  // console; nothing here is Node.js or browser specific.
  platform: "neutral",
});
