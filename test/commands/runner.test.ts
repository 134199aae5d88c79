import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MAX_TIMEOUT_SEC, runCommand, runCommands } from "../../src/commands/runner.js";

describe("runCommand", () => {
  it("should capture stdout and a zero exit", async () => {
    const result = await runCommand("echo hello");
    assert.equal(result.ok, true);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "hello\n");
    assert.equal(result.stderr, "");
    assert.ok(result.duration_sec >= 0);
  });

  it("should report a non-zero exit without throwing", async () => {
    const result = await runCommand("echo oops >&2; exit 3");
    assert.equal(result.ok, false);
    assert.equal(result.code, 3);
    assert.equal(result.stderr, "oops\n");
  });

  it("should run in the requested directory", async () => {
    const dir = realpathSync(mkdtempSync(join(tmpdir(), "runner-")));
    try {
      const result = await runCommand("pwd", { cwd: dir });
      assert.equal(result.stdout.trim(), dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("should kill the command and mark a timeout", async () => {
    const result = await runCommand("echo started; sleep 5; echo never", { timeoutSec: 0.3 });
    assert.equal(result.ok, false);
    assert.equal(result.code, null);
    assert.equal(result.stdout, "started\n");
    assert.ok(result.stderr.endsWith("\nTIMEOUT"));
    assert.ok(result.duration_sec < 4);
  });

  it("should treat a timeout beyond the timer range as no limit", async () => {
    const result = await runCommand("sleep 0.2; echo done", { timeoutSec: 30 * 24 * 3600 });
    assert.equal(result.ok, true);
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "done\n");
    assert.equal(result.stderr, "");
  });

  it("should report a missing working directory as an error", async () => {
    const result = await runCommand("echo hi", { cwd: join(tmpdir(), "definitely-not-here-4821") });
    assert.equal(result.ok, false);
    assert.equal(result.code, null);
    assert.ok(result.stderr.startsWith("ERROR: "));
  });
});

describe("MAX_TIMEOUT_SEC", () => {
  it("should fit a signed 32-bit millisecond delay", () => {
    assert.equal(MAX_TIMEOUT_SEC, 2_147_483);
    assert.ok(MAX_TIMEOUT_SEC * 1000 <= 2 ** 31 - 1);
  });
});

describe("runCommands", () => {
  it("should run every command in order", async () => {
    const batch = await runCommands(["echo one", "false", "echo three"]);
    assert.equal(batch.ok, false);
    assert.equal(batch.stopped_early, false);
    assert.deepEqual(
      batch.results.map((r) => [r.cmd, r.code, r.stdout]),
      [
        ["echo one", 0, "one\n"],
        ["false", 1, ""],
        ["echo three", 0, "three\n"],
      ],
    );
  });

  it("should stop at the first failure when asked", async () => {
    const batch = await runCommands(["echo one", "exit 2", "echo three"], { stopOnError: true });
    assert.equal(batch.ok, false);
    assert.equal(batch.stopped_early, true);
    assert.deepEqual(
      batch.results.map((r) => r.cmd),
      ["echo one", "exit 2"],
    );
  });

  it("should be ok when every command succeeds", async () => {
    const batch = await runCommands(["true", "echo done"], { stopOnError: true });
    assert.equal(batch.ok, true);
    assert.equal(batch.stopped_early, false);
    assert.equal(batch.results.length, 2);
  });
});
