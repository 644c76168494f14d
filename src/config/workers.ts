import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { InvalidWorkerConfigError } from "../errors.js";
import type { WorkerConfig } from "../types.js";

/** Schema validating a single worker launch description. */
export const WorkerConfigSchema = z
  .object({
    name: z.string().trim().min(1, "name must not be empty"),
    command: z
      .string()
      .trim()
      .min(1, "command must not be empty")
      .refine((value) => !value.includes("\u0000"), "command must not contain NUL bytes"),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
  })
  .strict();

/** Schema of a worker manifest file. */
export const WorkerManifestSchema = z
  .object({
    workers: z.array(WorkerConfigSchema),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.workers.forEach((worker, index) => {
      if (seen.has(worker.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["workers", index, "name"],
          message: `duplicate worker name '${worker.name}'`,
        });
      }
      seen.add(worker.name);
    });
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`);
}

function freezeConfig(parsed: z.infer<typeof WorkerConfigSchema>): WorkerConfig {
  return Object.freeze({
    name: parsed.name,
    command: parsed.command,
    args: Object.freeze([...parsed.args]),
    ...(parsed.env ? { env: Object.freeze({ ...parsed.env }) } : {}),
  });
}

/**
 * Validates an untrusted worker description and returns a frozen copy.
 * Throws {@link InvalidWorkerConfigError} listing every issue.
 */
export function parseWorkerConfig(input: unknown, source = "worker config"): WorkerConfig {
  const result = WorkerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidWorkerConfigError(source, formatIssues(result.error));
  }
  return freezeConfig(result.data);
}

/**
 * Parses a manifest written as JSON or YAML. JSON is attempted first and
 * YAML only when the text is not valid JSON.
 */
export function parseWorkerManifest(text: string, source = "manifest"): WorkerConfig[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    try {
      raw = parseYaml(text);
    } catch (error) {
      throw new InvalidWorkerConfigError(source, [
        `unable to parse manifest: ${error instanceof Error ? error.message : String(error)}`,
      ]);
    }
  }

  const result = WorkerManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidWorkerConfigError(source, formatIssues(result.error));
  }
  return result.data.workers.map(freezeConfig);
}

/** Reads and parses the manifest stored at {@link path}. */
export async function loadWorkerManifest(path: string): Promise<WorkerConfig[]> {
  const text = await readFile(path, "utf8");
  return parseWorkerManifest(text, path);
}

/**
 * Launch descriptions of the bundled example workers. Both run on the current
 * Node.js executable; when this module is loaded from its TypeScript source
 * the workers are started through the `tsx` loader as well.
 */
export function defaultWorkerConfigs(moduleUrl: string = import.meta.url): WorkerConfig[] {
  const fromSources = moduleUrl.endsWith(".ts");
  const extension = fromSources ? ".ts" : ".js";
  const loaderArgs = fromSources ? ["--import", "tsx"] : [];
  const entry = (file: string): string => fileURLToPath(new URL(`../bin/${file}${extension}`, moduleUrl));

  return [
    parseWorkerConfig({ name: "math-server", command: process.execPath, args: [...loaderArgs, entry("mathWorker")] }),
    parseWorkerConfig({ name: "string-server", command: process.execPath, args: [...loaderArgs, entry("textWorker")] }),
  ];
}
