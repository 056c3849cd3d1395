import { describe, expect, it } from "vitest";
import { ProcessSandbox } from "../ProcessSandbox.js";
import { SandboxFaultError, SandboxTimeoutError } from "../../core/errors.js";

describe("ProcessSandbox", () => {
  const sandbox = new ProcessSandbox();

  it("runs module code from stdin and captures stdout", async () => {
    const result = await sandbox.run("console.log(6 * 7);", 10_000);
    expect(result).toEqual({ stdout: "42\n", stderr: "", exitStatus: 0 });
  });

  it("reports a non-zero exit status with stderr", async () => {
    const result = await sandbox.run('console.error("bad input"); process.exit(3);', 10_000);
    expect(result.exitStatus).toBe(3);
    expect(result.stderr).toBe("bad input\n");
  });

  it("does not pass the parent environment to the child", async () => {
    const result = await sandbox.run(
      'console.log(process.env.TASKFORGE_SANDBOX_PROBE ?? "unset");',
      10_000
    );
    expect(result.stdout).toBe("unset\n");
  });

  it("truncates long output", async () => {
    const small = new ProcessSandbox({ maxOutputChars: 5 });
    const result = await small.run('console.log("abcdefghij");', 10_000);
    expect(result.stdout).toBe("abcde");
  });

  it("kills code that runs past the timeout", async () => {
    await expect(sandbox.run("setInterval(() => {}, 1000);", 200)).rejects.toBeInstanceOf(
      SandboxTimeoutError
    );
  });

  it("fails when the interpreter cannot be started", async () => {
    const broken = new ProcessSandbox({ executable: "/nonexistent/taskforge-interpreter" });
    await expect(broken.run("1", 1_000)).rejects.toBeInstanceOf(SandboxFaultError);
  });
});
