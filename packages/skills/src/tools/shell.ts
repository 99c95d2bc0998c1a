import { exec } from "node:child_process";
import { promisify } from "node:util";
import path from "node:path";
import { z } from "zod";

const execAsync = promisify(exec);

export const ShellExecSchema = z.object({
  command: z.string().describe("Shell command to execute"),
  cwd: z.string().optional().describe("Working directory, relative to the workspace"),
});

export interface ShellResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly error?: string;
}

const trimmed = (value: unknown): string =>
  typeof value === "string" ? value.trim() : Buffer.isBuffer(value) ? value.toString("utf8").trim() : "";

/**
 * Runs shell commands inside the workspace. A failing command is a result
 * (non-zero exit code), not an exception.
 */
export class ShellTool {
  readonly workspaceDir: string;

  constructor(
    workspaceDir: string,
    private readonly timeoutMs = 60_000,
  ) {
    this.workspaceDir = path.resolve(workspaceDir);
  }

  async exec(params: z.infer<typeof ShellExecSchema>, signal?: AbortSignal): Promise<ShellResult> {
    const cwd = params.cwd ? path.resolve(this.workspaceDir, params.cwd) : this.workspaceDir;
    const relative = path.relative(this.workspaceDir, cwd);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Access denied: ${params.cwd} is outside workspace ${this.workspaceDir}`);
    }

    try {
      const { stdout, stderr } = await execAsync(params.command, {
        cwd,
        timeout: this.timeoutMs,
        signal,
      });
      return { stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 };
    } catch (error: unknown) {
      if (!(error instanceof Error)) throw error;
      const code = "code" in error ? error.code : undefined;
      return {
        stdout: "stdout" in error ? trimmed(error.stdout) : "",
        stderr: "stderr" in error ? trimmed(error.stderr) : "",
        exitCode: typeof code === "number" ? code : 1,
        error: error.message,
      };
    }
  }
}
