import { defineTool } from "@switchboard/runtime";
import type { NativeTool } from "@switchboard/types";
import { FsListSchema, FsMkdirSchema, FsReadSchema, FsTool, FsWriteSchema } from "./tools/fs.js";
import { ShellExecSchema, ShellTool } from "./tools/shell.js";

export interface ToolsetOptions {
  readonly workspaceDir: string;
  /** Limit for `run_command`; the tool executor applies its own on top. */
  readonly commandTimeoutMs?: number;
}

const readFile = (fsTool: FsTool) =>
  defineTool({
    name: "read_file",
    description: "Read a UTF-8 text file from the workspace.",
    schema: FsReadSchema,
    execute: (args) => fsTool.read(args),
  });

const writeFile = (fsTool: FsTool) =>
  defineTool({
    name: "write_file",
    description: "Write a UTF-8 text file in the workspace, creating parent directories.",
    schema: FsWriteSchema,
    execute: (args) => fsTool.write(args),
  });

const listDirectory = (fsTool: FsTool) =>
  defineTool({
    name: "list_directory",
    description: "List the entries of a workspace directory.",
    schema: FsListSchema,
    execute: (args) => fsTool.list(args),
  });

const createDirectory = (fsTool: FsTool) =>
  defineTool({
    name: "create_directory",
    description: "Create a directory in the workspace, parents included.",
    schema: FsMkdirSchema,
    execute: (args) => fsTool.mkdir(args),
  });

/** Lays out the project: directories and skeleton files. */
export function createArchitectTools(options: ToolsetOptions): NativeTool[] {
  const fsTool = new FsTool(options.workspaceDir);
  return [listDirectory(fsTool), createDirectory(fsTool), writeFile(fsTool), readFile(fsTool)];
}

/** Fills the files in. */
export function createCoderTools(options: ToolsetOptions): NativeTool[] {
  const fsTool = new FsTool(options.workspaceDir);
  return [readFile(fsTool), writeFile(fsTool), listDirectory(fsTool)];
}

/** Writes tests and runs them. */
export function createTesterTools(options: ToolsetOptions): NativeTool[] {
  const fsTool = new FsTool(options.workspaceDir);
  const shell = new ShellTool(options.workspaceDir, options.commandTimeoutMs);
  return [
    readFile(fsTool),
    writeFile(fsTool),
    listDirectory(fsTool),
    defineTool({
      name: "run_command",
      description: "Run a shell command in the workspace and return its output and exit code.",
      schema: ShellExecSchema,
      execute: (args, ctx) => shell.exec(args, ctx.signal),
    }),
  ];
}
