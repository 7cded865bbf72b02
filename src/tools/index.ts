import type { ToolSpec } from '../types.js';

import { executeCommandTool } from './exec.js';
import {
  copyFileTool,
  createDirectoryTool,
  deleteFileTool,
  diffFilesTool,
  editFileTool,
  listDirectoryTool,
  readFileTool,
  searchFilesTool,
  writeFileTool,
} from './file-ops.js';
import {
  gitBranchTool,
  gitCommitTool,
  gitDiffTool,
  gitLogTool,
  gitPullTool,
  gitPushTool,
  gitStatusTool,
} from './git.js';
import { ToolRegistry } from './registry.js';
import { environmentTool, systemInfoTool } from './system.js';
import { httpPostTool, webFetchTool, webSearchTool } from './web.js';

export const BUILTIN_TOOLS: readonly ToolSpec[] = [
  readFileTool,
  listDirectoryTool,
  searchFilesTool,
  writeFileTool,
  editFileTool,
  deleteFileTool,
  createDirectoryTool,
  copyFileTool,
  diffFilesTool,
  executeCommandTool,
  gitStatusTool,
  gitDiffTool,
  gitLogTool,
  gitCommitTool,
  gitBranchTool,
  gitPushTool,
  gitPullTool,
  webSearchTool,
  webFetchTool,
  httpPostTool,
  systemInfoTool,
  environmentTool,
];

/** Registry with every built-in tool; `enabled` comes from the config's `tools` section. */
export function createDefaultRegistry(enabled: Record<string, boolean> = {}): ToolRegistry {
  const registry = new ToolRegistry(enabled);
  for (const tool of BUILTIN_TOOLS) registry.register(tool);
  return registry;
}

export { ToolRegistry, defineTool, toJsonSchema } from './registry.js';
export { ToolExecutionError } from './tool-error.js';
