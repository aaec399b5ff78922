import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  archiveFileName,
  artifactSet,
  backupFileName,
  CONFIG_FILE_NAME,
  loadProjectConfig,
  parseProjectConfig,
} from "../../core/config";
import { ConfigError } from "../../errors";
import { createProject, removeProject } from "../helpers/project";

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("parseProjectConfig", () => {
  it("fills every field with the defaults", () => {
    expect(parseProjectConfig({})).toEqual({
      clean: { patterns: ["*~"] },
      compressionLevel: 9,
      distclean: {
        directories: ["build", "__pycache__"],
        patterns: ["*.pyc"],
      },
      extras: ["Makefile", "setup.py"],
      install: { args: ["setup.py", "install"], command: "python" },
      name: "kmeans",
      sources: ["KMeans.py"],
    });
  });

  it("keeps nested defaults when a section is partly given", () => {
    const config = parseProjectConfig({ distclean: { patterns: ["*.o"] } });

    expect(config.distclean).toEqual({
      directories: ["build", "__pycache__"],
      patterns: ["*.o"],
    });
  });

  it("rejects a name with a path separator", () => {
    expect(issuesOf(() => parseProjectConfig({ name: "dist/kmeans" }))).toEqual([
      "name: must be a single path segment",
    ]);
  });

  it("rejects absolute manifest entries", () => {
    expect(issuesOf(() => parseProjectConfig({ sources: ["/etc/passwd"] }))).toEqual([
      "sources.0: must be relative to the project",
    ]);
  });

  it("rejects manifest entries that flatten to the same name", () => {
    expect(
      issuesOf(() =>
        parseProjectConfig({
          extras: ["KMeans.py"],
          sources: ["src/KMeans.py"],
        })
      )
    ).toEqual([
      'extras: "KMeans.py" and "src/KMeans.py" share the file name "KMeans.py"',
    ]);
  });

  it("rejects compression levels outside 0-9", () => {
    expect(() => parseProjectConfig({ compressionLevel: 10 })).toThrow(ConfigError);
    expect(() => parseProjectConfig({ compressionLevel: 1.5 })).toThrow(ConfigError);
  });

  it("rejects unknown keys", () => {
    const issues = issuesOf(() => parseProjectConfig({ version: "1.0" }));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^\(root\): Unrecognized key/);
  });

  it("names the invalid fields in the message", () => {
    expect(() => parseProjectConfig({ name: "" })).toThrow(
      /^Invalid project config:\n {2}name: /
    );
  });
});

describe("loadProjectConfig", () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await createProject({});
  });

  afterEach(async () => {
    await removeProject(cwd);
  });

  it("uses defaults when no config file exists", () => {
    expect(loadProjectConfig(cwd)).toEqual(parseProjectConfig({}));
  });

  it("reads distrun.config.json from the working directory", async () => {
    await writeFile(
      join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({ extras: [], name: "widget", sources: ["widget.py"] })
    );

    const config = loadProjectConfig(cwd);

    expect(config.name).toBe("widget");
    expect(artifactSet(config)).toEqual(["widget.py"]);
  });

  it("reads an explicit config path relative to the working directory", async () => {
    await writeFile(join(cwd, "custom.json"), JSON.stringify({ name: "custom" }));

    expect(loadProjectConfig(cwd, "custom.json").name).toBe("custom");
  });

  it("fails when an explicit config path does not exist", () => {
    expect(() => loadProjectConfig(cwd, "missing.json")).toThrow(
      `Config file not found: ${join(cwd, "missing.json")}`
    );
  });

  it("fails on malformed JSON", async () => {
    await writeFile(join(cwd, CONFIG_FILE_NAME), "{ name: ");

    expect(() => loadProjectConfig(cwd)).toThrow(ConfigError);
    expect(() => loadProjectConfig(cwd)).toThrow(/^Error reading /);
  });

  it("fails on schema violations", async () => {
    await writeFile(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ sources: "KMeans.py" }));

    expect(() => loadProjectConfig(cwd)).toThrow(ConfigError);
  });
});

describe("manifest helpers", () => {
  const config = parseProjectConfig({});

  it("lists sources before extras", () => {
    expect(artifactSet(config)).toEqual(["KMeans.py", "Makefile", "setup.py"]);
  });

  it("returns a frozen manifest", () => {
    expect(Object.isFrozen(artifactSet(config))).toBe(true);
  });

  it("derives archive names from the project name", () => {
    expect(archiveFileName(config)).toBe("kmeans.zip");
    expect(backupFileName(config)).toBe("kmeans-old.zip");
  });
});
