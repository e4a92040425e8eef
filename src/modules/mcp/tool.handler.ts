import type { ToolArgs } from './tool.args';
import type { ToolName } from './tool.catalog';
import type { ToolCallResult } from './types';

export type ToolHandler = (args: ToolArgs) => Promise<ToolCallResult>;

export type ToolHandlerMap = Record<ToolName, ToolHandler>;
