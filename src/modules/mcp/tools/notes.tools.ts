import { Injectable, Logger } from '@nestjs/common';
import { NotesRepository } from '../../notes/notes.repository';
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
export class NoteTools {
  private readonly logger = new Logger(NoteTools.name);

  constructor(private readonly notes: NotesRepository) {}

  handlers(): Pick<ToolHandlerMap, 'save_note' | 'recall_note' | 'list_notes'> {
    return {
      save_note: (args) => this.saveNote(args),
      recall_note: (args) => this.recallNote(args),
      list_notes: (args) => this.listNotes(args),
    };
  }

  async saveNote(args: ToolArgs): Promise<ToolCallResult> {
    const key = args.requiredString('key');
    const data = args.requiredString('data');
    try {
      const note = await this.notes.create({
        key,
        data,
        user_uid: args.string('user_uid'),
        household_uid: args.string('household_uid'),
        tags: args.tags(),
      });
      this.logger.log(`Saved note ${note.id} under "${key}"`);
      return textResult(`Note saved successfully with ID: ${note.id}`);
    } catch (err) {
      return errorResult(`Failed to save note: ${describeError(err)}`);
    }
  }

  async recallNote(args: ToolArgs): Promise<ToolCallResult> {
    const noteId = args.requiredString('note_id');
    try {
      return jsonResult(await this.notes.get(noteId));
    } catch (err) {
      return errorResult(`Note not found: ${describeError(err)}`);
    }
  }

  async listNotes(args: ToolArgs): Promise<ToolCallResult> {
    const { filters: allowed } = ENTITY_FILTERS.notes;
    const options = toListOptions(
      {
        limit: args.limit(),
        offset: 0,
        sortBy: 'created_at',
        sortDir: 'DESC',
        filters: buildFiltersFromMCP(args.all(), allowed),
      },
      allowed,
    );
    try {
      return jsonResult(await this.notes.list(options));
    } catch (err) {
      return errorResult(`Failed to list notes: ${describeError(err)}`);
    }
  }
}
