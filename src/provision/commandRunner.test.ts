import test from "node:test";
import assert from "node:assert/strict";
import { SpawnCommandRunner, commandSucceeded, describeFailure, trimText } from "./commandRunner";

test("run captures output and the exit code", async () => {
  const runner = new SpawnCommandRunner();
  const result = await runner.run(process.execPath, [
    "-e",
    "process.stdout.write('out'); process.stderr.write('err'); process.exitCode = 3"
  ]);

  assert.equal(result.code, 3);
  assert.equal(result.stdout, "out");
  assert.equal(result.stderr, "err");
  assert.equal(result.timedOut, false);
  assert.equal(commandSucceeded(result), false);
  assert.equal(describeFailure(result, "fallback"), "err");
});

test("run kills a command that outlives its timeout", async () => {
  const runner = new SpawnCommandRunner(200);
  const result = await runner.run(process.execPath, ["-e", "setTimeout(() => {}, 10000)"]);

  assert.equal(result.timedOut, true);
  assert.equal(result.signal, "SIGKILL");
  assert.equal(result.stderr, "Command timeout after 200ms");
  assert.equal(commandSucceeded(result), false);
});

test("run rejects when the binary does not exist", async () => {
  const runner = new SpawnCommandRunner();
  await assert.rejects(runner.run("provision-no-such-binary", []), { code: "ENOENT" });
});

test("describeFailure falls back to stdout, then to the given text", () => {
  const base = { code: 1, signal: null, timedOut: false };
  assert.equal(describeFailure({ ...base, stdout: " warning \n", stderr: "" }, "fallback"), "warning");
  assert.equal(describeFailure({ ...base, stdout: "", stderr: "" }, "fallback"), "fallback");
});

test("trimText keeps the tail of long text", () => {
  assert.equal(trimText("abcdef", 3), "def");
  assert.equal(trimText("abc", 3), "abc");
});
