import { existsSync, readFileSync } from "node:fs";
import { basename, isAbsolute, resolve } from "node:path";
import debug from "debug";
import { z } from "zod";
import { ConfigError } from "../errors";
import type { ProjectConfig } from "../types";

const log = debug("distrun:config");

export const CONFIG_FILE_NAME = "distrun.config.json";

const MAX_COMPRESSION_LEVEL = 9;
const PATH_SEPARATOR_PATTERN = /[/\\]/;

const relativePath = z
  .string()
  .min(1)
  .refine((value) => !isAbsolute(value), "must be relative to the project");

const globList = z.array(z.string().min(1));

export const ProjectConfigSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .refine(
        (value) =>
          !PATH_SEPARATOR_PATTERN.test(value) && value !== "." && value !== "..",
        "must be a single path segment"
      )
      .default("kmeans"),
    sources: z.array(relativePath).default(["KMeans.py"]),
    extras: z.array(relativePath).default(["Makefile", "setup.py"]),
    clean: z
      .object({
        patterns: globList.default(["*~"]),
      })
      .default({}),
    distclean: z
      .object({
        directories: z.array(relativePath).default(["build", "__pycache__"]),
        patterns: globList.default(["*.pyc"]),
      })
      .default({}),
    install: z
      .object({
        command: z.string().min(1).default("python"),
        args: z.array(z.string()).default(["setup.py", "install"]),
      })
      .default({}),
    compressionLevel: z
      .number()
      .int()
      .min(0)
      .max(MAX_COMPRESSION_LEVEL)
      .default(MAX_COMPRESSION_LEVEL),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Map<string, string>();
    for (const entry of [...config.sources, ...config.extras]) {
      const name = basename(entry);
      const previous = seen.get(name);
      if (previous !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `"${entry}" and "${previous}" share the file name "${name}"`,
          path: ["extras"],
        });
      }
      seen.set(name, entry);
    }
  });

export type ProjectConfigInput = z.input<typeof ProjectConfigSchema>;

export function parseProjectConfig(input: unknown): ProjectConfig {
  const parsed = ProjectConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(
      `Invalid project config:\n  ${issues.join("\n  ")}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Load the project config from `configPath`, or from `distrun.config.json`
 * in `cwd` when it exists. Without a file every field takes its default.
 */
export function loadProjectConfig(
  cwd: string,
  configPath?: string
): ProjectConfig {
  const path = resolve(cwd, configPath ?? CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    log("No config file at %s, using defaults", path);
    return parseProjectConfig({});
  }

  log("Loading config from %s", path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Error reading ${path}: ${message}`, [], error);
  }
  return parseProjectConfig(raw);
}

/** Source files followed by metadata/build files, in manifest order. */
export function artifactSet(config: ProjectConfig): readonly string[] {
  return Object.freeze([...config.sources, ...config.extras]);
}

export function archiveFileName(config: ProjectConfig): string {
  return `${config.name}.zip`;
}

export function backupFileName(config: ProjectConfig): string {
  return `${config.name}-old.zip`;
}
