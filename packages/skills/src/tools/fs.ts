import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

export const FsReadSchema = z.object({
  path: z.string().describe("Path to the file to read, relative to the workspace"),
});

export const FsWriteSchema = z.object({
  path: z.string().describe("Path to the file to write, relative to the workspace"),
  content: z.string().describe("Content to write to the file"),
});

export const FsListSchema = z.object({
  path: z.string().default(".").describe("Path to the directory to list"),
});

export const FsMkdirSchema = z.object({
  path: z.string().describe("Path of the directory to create, parents included"),
});

export interface DirectoryEntry {
  readonly name: string;
  readonly isDirectory: boolean;
}

/**
 * File operations confined to one workspace directory.
 */
export class FsTool {
  readonly workspaceDir: string;

  constructor(workspaceDir: string) {
    this.workspaceDir = path.resolve(workspaceDir);
  }

  private resolvePath(p: string): string {
    const resolved = path.resolve(this.workspaceDir, p);
    const relative = path.relative(this.workspaceDir, resolved);
    if (relative.startsWith("..") || path.isAbsolute(relative)) {
      throw new Error(`Access denied: Path ${p} is outside workspace ${this.workspaceDir}`);
    }
    return resolved;
  }

  async read(params: z.infer<typeof FsReadSchema>): Promise<string> {
    return fs.readFile(this.resolvePath(params.path), "utf8");
  }

  async write(params: z.infer<typeof FsWriteSchema>): Promise<string> {
    const p = this.resolvePath(params.path);
    await fs.mkdir(path.dirname(p), { recursive: true });
    await fs.writeFile(p, params.content, "utf8");
    return `Wrote ${Buffer.byteLength(params.content, "utf8")} bytes to ${params.path}`;
  }

  async list(params: z.infer<typeof FsListSchema>): Promise<DirectoryEntry[]> {
    const entries = await fs.readdir(this.resolvePath(params.path), { withFileTypes: true });
    return entries
      .map((e) => ({ name: e.name, isDirectory: e.isDirectory() }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async mkdir(params: z.infer<typeof FsMkdirSchema>): Promise<string> {
    await fs.mkdir(this.resolvePath(params.path), { recursive: true });
    return `Created directory ${params.path}`;
  }
}
