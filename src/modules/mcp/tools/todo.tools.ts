import { Injectable, Logger } from '@nestjs/common';
import { TodosRepository } from '../../todos/todos.repository';
import { DEFAULT_TODO_PRIORITY } from '../../todos/types';
import { ENTITY_FILTERS } from '../../../lib/query/entity-filters';
import { buildFiltersFromMCP } from '../../../lib/query/mcp-filters';
import { toListOptions } from '../../../lib/query/list-options';
import type { ToolArgs } from '../tool.args';
import type { ToolHandlerMap } from '../tool.handler';
import {
  describeError,
  errorResult,
  jsonResult,
  textResult,
} from '../tool.results';
import type { ToolCallResult } from '../types';

@Injectable()
export class TodoTools {
  private readonly logger = new Logger(TodoTools.name);

  constructor(private readonly todos: TodosRepository) {}

  handlers(): Pick<ToolHandlerMap, 'create_todo' | 'list_todos' | 'complete_todo'> {
    return {
      create_todo: (args) => this.createTodo(args),
      list_todos: (args) => this.listTodos(args),
      complete_todo: (args) => this.completeTodo(args),
    };
  }

  async createTodo(args: ToolArgs): Promise<ToolCallResult> {
    const title = args.requiredString('title');
    try {
      const todo = await this.todos.create({
        title,
        description: args.string('description'),
        // Out-of-range priorities fall back to the default.
        priority: args.integerInRange('priority', 1, 5) ?? DEFAULT_TODO_PRIORITY,
        due_date: args.date('due_date'),
        user_uid: args.string('user_uid'),
        household_uid: args.string('household_uid'),
        tags: args.tags(),
      });
      this.logger.log(`Created todo ${todo.uid}`);
      return textResult(`Todo created successfully with ID: ${todo.uid}`);
    } catch (err) {
      return errorResult(`Failed to create todo: ${describeError(err)}`);
    }
  }

  async listTodos(args: ToolArgs): Promise<ToolCallResult> {
    const { filters: allowed } = ENTITY_FILTERS.todo;
    const options = toListOptions(
      {
        limit: args.limit(),
        offset: 0,
        sortBy: 'due_date',
        sortDir: 'ASC',
        filters: buildFiltersFromMCP(args.all(), allowed),
      },
      allowed,
    );
    try {
      return jsonResult(await this.todos.list(options));
    } catch (err) {
      return errorResult(`Failed to list todos: ${describeError(err)}`);
    }
  }

  async completeTodo(args: ToolArgs): Promise<ToolCallResult> {
    const todoId = args.requiredString('todo_id');
    try {
      await this.todos.update(todoId, {
        marked_complete: new Date(),
        completed_by: args.string('completed_by'),
      });
      return textResult(`Todo ${todoId} marked as completed`);
    } catch (err) {
      return errorResult(`Failed to complete todo: ${describeError(err)}`);
    }
  }
}
