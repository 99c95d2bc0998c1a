export { FsTool, FsReadSchema, FsWriteSchema, FsListSchema, FsMkdirSchema } from "./tools/fs.js";
export type { DirectoryEntry } from "./tools/fs.js";
export { ShellTool, ShellExecSchema } from "./tools/shell.js";
export type { ShellResult } from "./tools/shell.js";
export { createArchitectTools, createCoderTools, createTesterTools } from "./toolsets.js";
export type { ToolsetOptions } from "./toolsets.js";
