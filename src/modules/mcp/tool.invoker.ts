import { Injectable, Logger } from '@nestjs/common';
import { MissingToolArgumentError } from '../../lib/errors/McpError';
import { ToolArgsValidator } from './tool-args.validator';
import { ToolArgs } from './tool.args';
import { isToolName } from './tool.catalog';
import type { ToolHandlerMap } from './tool.handler';
import { describeError, errorResult } from './tool.results';
import type { ClientInfo, ToolCallResult } from './types';
import { TodoTools } from './tools/todo.tools';
import { NoteTools } from './tools/notes.tools';
import { PreferenceTools } from './tools/preferences.tools';
import { RecipeTools } from './tools/recipes.tools';
import { AccountTools } from './tools/accounts.tools';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Routes `tools/call` by name. Arguments pass the catalog schema before
 * any handler runs; every outcome is a ToolCallResult.
 */
@Injectable()
export class ToolInvoker {
  private readonly logger = new Logger(ToolInvoker.name);
  private readonly handlers: ToolHandlerMap;

  constructor(
    private readonly validator: ToolArgsValidator,
    todos: TodoTools,
    notes: NoteTools,
    preferences: PreferenceTools,
    recipes: RecipeTools,
    accounts: AccountTools,
  ) {
    this.handlers = {
      ...todos.handlers(),
      ...notes.handlers(),
      ...preferences.handlers(),
      ...recipes.handlers(),
      ...accounts.handlers(),
    };
  }

  async invoke(
    name: string,
    rawArgs: unknown,
    client?: ClientInfo,
  ): Promise<ToolCallResult> {
    if (!isToolName(name)) {
      this.logger.warn(`Unknown tool requested: ${name}`);
      return errorResult(`Unknown tool: ${name}`);
    }

    const checked = this.validator.check(name, isRecord(rawArgs) ? rawArgs : {});
    if (!checked.ok) {
      return errorResult(`${checked.missing} is required`);
    }

    const started = Date.now();
    try {
      return await this.handlers[name](new ToolArgs(checked.args));
    } catch (err) {
      if (err instanceof MissingToolArgumentError) {
        return errorResult(err.message);
      }
      this.logger.error(
        `Tool ${name} failed: ${describeError(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return errorResult(describeError(err));
    } finally {
      this.logger.debug(
        `tool=${name} client=${client?.name ?? 'unknown'} durationMs=${Date.now() - started}`,
      );
    }
  }
}
