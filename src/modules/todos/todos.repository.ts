import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import {
  DEFAULT_TODO_PRIORITY,
  type CreateTodoInput,
  type TodoPatch,
  type TodoRow,
} from './types';

@Injectable()
export class TodosRepository extends TableRepository<TodoRow, string> {
  constructor(pg: PostgresService) {
    super(pg, { table: 'todos', sortFields: ENTITY_FILTERS.todo.sortFields });
  }

  protected keyColumns(uid: string): Record<string, unknown> {
    return { uid };
  }

  protected describeKey(uid: string): string {
    return uid;
  }

  public async create(input: CreateTodoInput): Promise<TodoRow> {
    return this.insertRow({
      uid: randomUUID(),
      title: input.title,
      description: input.description,
      data: input.data ?? '{}',
      priority: input.priority ?? DEFAULT_TODO_PRIORITY,
      due_date: input.due_date,
      recurs_on: input.recurs_on,
      external_url: input.external_url,
      user_uid: input.user_uid,
      household_uid: input.household_uid,
      tags: input.tags ?? [],
    });
  }

  public async update(uid: string, patch: TodoPatch): Promise<TodoRow> {
    return this.updateRow(uid, {
      title: patch.title,
      description: patch.description,
      data: patch.data,
      priority: patch.priority,
      due_date: patch.due_date,
      recurs_on: patch.recurs_on,
      marked_complete: patch.marked_complete,
      external_url: patch.external_url,
      completed_by: patch.completed_by,
      tags: patch.tags,
    });
  }
}
