import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import type { CreateNoteInput, NotePatch, NoteRow } from './types';

@Injectable()
export class NotesRepository extends TableRepository<NoteRow, string> {
  constructor(pg: PostgresService) {
    super(pg, { table: 'notes', sortFields: ENTITY_FILTERS.notes.sortFields });
  }

  protected keyColumns(id: string): Record<string, unknown> {
    return { id };
  }

  protected describeKey(id: string): string {
    return id;
  }

  public async create(input: CreateNoteInput): Promise<NoteRow> {
    return this.insertRow({
      id: randomUUID(),
      key: input.key,
      data: input.data,
      user_uid: input.user_uid,
      household_uid: input.household_uid,
      tags: input.tags ?? [],
    });
  }

  public async update(id: string, patch: NotePatch): Promise<NoteRow> {
    return this.updateRow(id, {
      key: patch.key,
      data: patch.data,
      user_uid: patch.user_uid,
      household_uid: patch.household_uid,
      tags: patch.tags,
    });
  }
}
