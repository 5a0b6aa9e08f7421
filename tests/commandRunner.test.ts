import { realpath } from "fs/promises";
import os from "os";
import { describe, it, expect } from "vitest";
import { LocalCommandRunner } from "../src/execution/commandRunner.js";

const node = process.execPath;

describe("LocalCommandRunner", () => {
  const runner = new LocalCommandRunner(5);

  it("captures output and the exit code", async () => {
    const res = await runner.run([
      node,
      "-e",
      "process.stdout.write('hi'); process.stderr.write('err'); process.exit(3)"
    ]);
    expect(res.exitCode).toBe(3);
    expect(res.stdout).toBe("hi");
    expect(res.stderr).toBe("err");
    expect(res.timedOut).toBe(false);
    expect(Date.parse(res.finishedAt)).toBeGreaterThanOrEqual(Date.parse(res.startedAt));
  });

  it("writes input to stdin and closes it", async () => {
    const res = await runner.run(
      [node, "-e", "let s = ''; process.stdin.on('data', (d) => (s += d)).on('end', () => process.stdout.write(s.toUpperCase()))"],
      { input: "#!/bin/bash\necho hi\n" }
    );
    expect(res.exitCode).toBe(0);
    expect(res.stdout).toBe("#!/BIN/BASH\nECHO HI\n");
  });

  it("passes cwd and extra environment", async () => {
    const dir = await realpath(os.tmpdir());
    const res = await runner.run([node, "-e", "process.stdout.write(process.cwd() + '|' + process.env.MONITOR_TEST)"], {
      cwd: dir,
      env: { MONITOR_TEST: "x" }
    });
    expect(res.stdout).toBe(`${dir}|x`);
  });

  it("kills commands that exceed the timeout", async () => {
    const res = await runner.run([node, "-e", "setTimeout(() => {}, 10000)"], { timeoutSeconds: 0.2 });
    expect(res.timedOut).toBe(true);
    expect(res.exitCode).toBe(124);
  });

  it("rejects when the command cannot be started", async () => {
    await expect(runner.run(["hpc-monitor-no-such-binary"])).rejects.toThrow(/ENOENT/);
    await expect(runner.run([])).rejects.toThrow("command argv must be non-empty");
  });

  it("finds executables", async () => {
    expect(await runner.which(node)).toBe(node);
    expect(await runner.which("hpc-monitor-no-such-binary")).toBeNull();
  });
});
