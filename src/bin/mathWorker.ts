#!/usr/bin/env node
import { MATH_WORKER_INFO, createMathWorkerServer } from "../tools/mathTools.js";
import { runStdioWorker } from "../tools/stdioWorker.js";

runStdioWorker(createMathWorkerServer(), MATH_WORKER_INFO.name).catch((error: unknown) => {
  process.stderr.write(`${MATH_WORKER_INFO.name} failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
