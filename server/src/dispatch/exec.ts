import { spawn } from "node:child_process";

export type ExecResult = {
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  error?: string;
};

export type ExecFn = (cmd: string, args: string[], opts?: { timeoutMs?: number }) => Promise<ExecResult>;

/** Runs a command to completion; never rejects. A timeout kills the child. */
export const execCapture: ExecFn = async (cmd, args, opts) => {
  const timeoutMs = opts?.timeoutMs ?? 10_000;
  return await new Promise<ExecResult>((resolve) => {
    let settled = false;
    const finish = (r: ExecResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(t);
      resolve(r);
    };

    const child = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));

    const t = setTimeout(() => {
      child.kill("SIGKILL");
      finish({ ok: false, code: null, stdout, stderr, error: "timeout" });
    }, timeoutMs);

    child.on("error", (e) => finish({ ok: false, code: null, stdout, stderr, error: e.message }));
    child.on("close", (code) => finish({ ok: code === 0, code, stdout, stderr }));
  });
};
