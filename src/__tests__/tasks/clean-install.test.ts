import { existsSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseProjectConfig } from "../../core/config";
import { InstallError } from "../../errors";
import { Runner } from "../../execution/runner";
import { createDefaultRegistry } from "../../tasks";
import {
  createProject,
  FakeInstaller,
  KMEANS_FILES,
  listTree,
  removeProject,
  silenceConsole,
  stripAnsi,
} from "../helpers/project";

describe("clean, install and distclean", () => {
  let cwd: string;

  const runnerFor = (installer = new FakeInstaller()) =>
    new Runner(
      createDefaultRegistry(parseProjectConfig({}), { installer }),
      { cwd, quiet: true }
    );

  beforeEach(async () => {
    silenceConsole();
    cwd = await createProject({
      ...KMEANS_FILES,
      "KMeans.py~": "old",
      "setup.py~": "old",
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeProject(cwd);
  });

  describe("clean", () => {
    it("removes editor backup files", async () => {
      const result = await runnerFor().run("clean");

      expect(result.executed).toEqual(["clean"]);
      expect(await listTree(cwd)).toEqual(["KMeans.py", "Makefile", "setup.py"]);
    });

    it("succeeds when there is nothing to clean", async () => {
      await runnerFor().run("clean");

      const result = await runnerFor().run("clean");

      expect(result.states).toEqual({ clean: "done" });
    });
  });

  describe("install", () => {
    it("cleans before invoking the installer", async () => {
      const backupsAtInstall: boolean[] = [];
      const installer = new FakeInstaller(() => {
        backupsAtInstall.push(existsSync(join(cwd, "KMeans.py~")));
        return { ok: true };
      });

      const result = await runnerFor(installer).run("install");

      expect(result.executed).toEqual(["clean", "install"]);
      expect(backupsAtInstall).toEqual([false]);
    });

    it("passes the build descriptor command to the installer", async () => {
      const installer = new FakeInstaller();

      await runnerFor(installer).run("install");

      expect(installer.requests).toHaveLength(1);
      expect(installer.requests[0]).toMatchObject({
        args: ["setup.py", "install"],
        command: "python",
        cwd,
      });
    });

    it("fails with InstallError carrying the collaborator's report", async () => {
      const installer = new FakeInstaller(() => ({
        exitCode: 2,
        message: "python setup.py install exited with code 2",
        ok: false,
        output: "error: invalid command 'install'",
      }));

      const error = await runnerFor(installer)
        .run("install")
        .catch((e: unknown) => e);

      if (!(error instanceof InstallError)) {
        throw new Error("expected an InstallError");
      }
      expect(error.message).toBe(
        'Task "install" failed: python setup.py install exited with code 2'
      );
      expect(error.task).toBe("install");
      expect(error.exitCode).toBe(2);
      expect(error.output).toBe("error: invalid command 'install'");
      expect(installer.requests).toHaveLength(1);
    });

    it("prints the installer's output on failure in quiet mode", async () => {
      const installer = new FakeInstaller(() => ({
        exitCode: 1,
        message: "python setup.py install exited with code 1",
        ok: false,
        output: "running install\nerror: permission denied\n",
      }));

      await runnerFor(installer).run("install").catch(() => undefined);

      expect(
        vi.mocked(console.error).mock.calls.map((c) => stripAnsi(String(c[0])))
      ).toEqual([
        "[install]   | running install",
        "[install]   | error: permission denied",
        "✗ Failed: install",
      ]);
    });

    it("does not repeat the output when it was already streamed", async () => {
      const installer = new FakeInstaller(() => ({
        exitCode: 1,
        message: "python setup.py install exited with code 1",
        ok: false,
        output: "error: permission denied",
      }));

      await new Runner(
        createDefaultRegistry(parseProjectConfig({}), { installer }),
        { cwd }
      )
        .run("install")
        .catch(() => undefined);

      expect(
        vi.mocked(console.error).mock.calls.map((c) => stripAnsi(String(c[0])))
      ).toEqual(["✗ Failed: install"]);
    });
  });

  describe("distclean", () => {
    it("leaves a pristine tree unchanged", async () => {
      const pristine = await createProject();
      try {
        const before = await listTree(pristine);

        await new Runner(
          createDefaultRegistry(parseProjectConfig({})),
          { cwd: pristine, quiet: true }
        ).run("distclean");

        expect(await listTree(pristine)).toEqual(before);
      } finally {
        await removeProject(pristine);
      }
    });

    it("removes build outputs and compiled files", async () => {
      const project = await createProject({
        ...KMEANS_FILES,
        "KMeans.pyc": "bytecode",
        "__pycache__/KMeans.cpython-312.pyc": "bytecode",
        "build/lib/KMeans.py": "built",
        "kmeans.zip": "archive",
      });
      try {
        const result = await new Runner(
          createDefaultRegistry(parseProjectConfig({})),
          { cwd: project, quiet: true }
        ).run("distclean");

        expect(result.executed).toEqual(["clean", "distclean"]);
        expect(await listTree(project)).toEqual([
          "KMeans.py",
          "Makefile",
          "kmeans.zip",
          "setup.py",
        ]);
      } finally {
        await removeProject(project);
      }
    });

    it("runs clean first", async () => {
      await runnerFor().run("distclean");

      expect(existsSync(join(cwd, "setup.py~"))).toBe(false);
    });
  });
});
