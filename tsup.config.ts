import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The public interface touches ArrayBuffer and SharedArrayBuffer only;
  // `debug` picks its own Node.js or browser entry.
  platform: "neutral",
  external: ["debug"],
});
