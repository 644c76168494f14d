#!/usr/bin/env node
import { TEXT_WORKER_INFO, createTextWorkerServer } from "../tools/textTools.js";
import { runStdioWorker } from "../tools/stdioWorker.js";

runStdioWorker(createTextWorkerServer(), TEXT_WORKER_INFO.name).catch((error: unknown) => {
  process.stderr.write(`${TEXT_WORKER_INFO.name} failed to start: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
