import { spawn } from "child_process";
import os from "os";
import { SandboxFaultError, SandboxTimeoutError } from "../core/errors.js";
import type { Sandbox, SandboxResult } from "../types/index.js";

export interface ProcessSandboxOptions {
  /** 解释器路径，默认当前 Node 可执行文件 */
  executable?: string;
  /** 单路输出保留的最大字符数 */
  maxOutputChars?: number;
  cwd?: string;
}

/**
 * 在独立子进程中运行 JavaScript（经 stdin 传入），不继承父进程环境变量。
 * 超时后强制结束进程并抛出 SandboxTimeoutError。
 */
export class ProcessSandbox implements Sandbox {
  private readonly executable: string;

  private readonly maxOutputChars: number;

  private readonly cwd: string;

  constructor(options: ProcessSandboxOptions = {}) {
    this.executable = options.executable ?? process.execPath;
    this.maxOutputChars = options.maxOutputChars ?? 64 * 1024;
    this.cwd = options.cwd ?? os.tmpdir();
  }

  async run(code: string, timeoutMs: number): Promise<SandboxResult> {
    return new Promise<SandboxResult>((resolve, reject) => {
      const child = spawn(this.executable, ["--input-type=module", "-"], {
        cwd: this.cwd,
        env: {},
        stdio: ["pipe", "pipe", "pipe"],
      });

      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let settled = false;
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, timeoutMs);

      child.stdout.on("data", (chunk) => stdoutChunks.push(String(chunk)));
      child.stderr.on("data", (chunk) => stderrChunks.push(String(chunk)));

      child.on("error", (error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(new SandboxFaultError(`Failed to start sandbox: ${error.message}`, { cause: error }));
      });

      child.on("close", (code) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        if (timedOut) {
          reject(new SandboxTimeoutError(timeoutMs));
          return;
        }
        resolve({
          stdout: this.truncate(stdoutChunks.join("")),
          stderr: this.truncate(stderrChunks.join("")),
          exitStatus: code ?? 1,
        });
      });

      child.stdin.on("error", (error) => {
        console.warn(`[ProcessSandbox] stdin closed early (${error.message})`);
      });
      child.stdin.end(code);
    });
  }

  private truncate(value: string): string {
    return value.length > this.maxOutputChars ? value.slice(0, this.maxOutputChars) : value;
  }
}
