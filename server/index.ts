import { createServerRuntime } from "./runtime/kernel.js";

const runtime = createServerRuntime();
runtime.start();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    runtime.stop();
    process.exit(0);
  });
}
