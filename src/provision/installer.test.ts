import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InstallFailedError, ManifestMissingError, ProvisionErrorCode } from "./errors";
import { PipInstaller } from "./installer";
import type { CommandOptions, CommandResult, CommandRunner } from "./types";

type RecordedCall = { command: string; args: string[]; options?: CommandOptions };

class RecordingRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: () => Promise<CommandResult>) {}

  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    return this.respond();
  }
}

function result(partial: Partial<CommandResult>): CommandResult {
  return { code: 0, signal: null, stdout: "", stderr: "", timedOut: false, ...partial };
}

async function createManifest(): Promise<{ root: string; manifestPath: string }> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "installer-test-"));
  const manifestPath = path.join(root, "requirements.txt");
  await fs.writeFile(manifestPath, "vosk\n");
  return { root, manifestPath };
}

test("install runs pip against the manifest from the project root", async () => {
  const { root, manifestPath } = await createManifest();
  const runner = new RecordingRunner(async () => result({ stdout: "Successfully installed vosk" }));
  const installer = new PipInstaller(runner, { pythonBin: "python3", manifestPath, cwd: root });

  await installer.install();

  assert.deepEqual(runner.calls, [
    {
      command: "python3",
      args: ["-m", "pip", "install", "--disable-pip-version-check", "-r", manifestPath],
      options: { cwd: root }
    }
  ]);
});

test("install refuses to run without a manifest", async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "installer-test-"));
  const manifestPath = path.join(root, "requirements.txt");
  const runner = new RecordingRunner(async () => result({}));
  const installer = new PipInstaller(runner, { pythonBin: "python3", manifestPath, cwd: root });

  await assert.rejects(installer.install(), (error: unknown) => {
    assert.ok(error instanceof ManifestMissingError);
    assert.equal(error.code, ProvisionErrorCode.MANIFEST_MISSING);
    assert.equal(error.exitCode, 1);
    assert.equal(error.message, `Dependency manifest not found: ${manifestPath}`);
    return true;
  });
  assert.equal(runner.calls.length, 0);
});

test("install surfaces pip's stderr and exit code", async () => {
  const { root, manifestPath } = await createManifest();
  const runner = new RecordingRunner(async () =>
    result({ code: 2, stderr: "ERROR: No matching distribution found for vosk\n" })
  );
  const installer = new PipInstaller(runner, { pythonBin: "python3", manifestPath, cwd: root });

  await assert.rejects(installer.install(), (error: unknown) => {
    assert.ok(error instanceof InstallFailedError);
    assert.equal(error.exitCode, 2);
    assert.equal(
      error.message,
      "Dependency install failed (exit 2): ERROR: No matching distribution found for vosk"
    );
    return true;
  });
});

test("install reports a missing interpreter as an install failure", async () => {
  const { root, manifestPath } = await createManifest();
  const runner = new RecordingRunner(async () => {
    throw new Error("spawn python9 ENOENT");
  });
  const installer = new PipInstaller(runner, { pythonBin: "python9", manifestPath, cwd: root });

  await assert.rejects(installer.install(), (error: unknown) => {
    assert.ok(error instanceof InstallFailedError);
    assert.equal(error.exitCode, 1);
    assert.equal(error.message, "Dependency install failed: python9: spawn python9 ENOENT");
    return true;
  });
});
