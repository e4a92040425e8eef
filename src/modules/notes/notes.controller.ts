import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { NotesRepository } from './notes.repository';
import { CreateNoteRequestDto } from './dto/CreateNote.request.dto';
import { UpdateNoteRequestDto } from './dto/UpdateNote.request.dto';
import type { NoteRow } from './types';
import type { RawQuery } from '../../lib/query/types';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import { parseListParams } from '../../lib/query/list-params';
import { toListOptions } from '../../lib/query/list-options';
import {
  RecordNotFoundError,
  UnsafeIdentifierError,
} from '../../lib/errors/RecordsError';

@Controller('api/notes')
export class NotesController {
  constructor(private readonly notes: NotesRepository) {}

  private mapDomainError(err: unknown): never {
    if (err instanceof RecordNotFoundError) {
      throw new NotFoundException(err.message);
    }
    if (err instanceof UnsafeIdentifierError) {
      throw new BadRequestException(err.message);
    }
    throw err;
  }

  @Post()
  async create(@Body() body: CreateNoteRequestDto): Promise<NoteRow> {
    try {
      return await this.notes.create(body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get()
  async list(@Query() query: RawQuery): Promise<NoteRow[]> {
    const { sortFields, filters } = ENTITY_FILTERS.notes;
    try {
      return await this.notes.list(
        toListOptions(parseListParams(query, sortFields), filters),
      );
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':id')
  async get(@Param('id') id: string): Promise<NoteRow> {
    try {
      return await this.notes.get(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Put(':id')
  async update(
    @Param('id') id: string,
    @Body() body: UpdateNoteRequestDto,
  ): Promise<NoteRow> {
    try {
      return await this.notes.update(id, body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':id')
  @HttpCode(204)
  async remove(@Param('id') id: string): Promise<void> {
    try {
      await this.notes.delete(id);
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
