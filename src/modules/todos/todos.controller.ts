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
import { TodosRepository } from './todos.repository';
import { CreateTodoRequestDto } from './dto/CreateTodo.request.dto';
import { UpdateTodoRequestDto } from './dto/UpdateTodo.request.dto';
import type { TodoRow } from './types';
import type { RawQuery } from '../../lib/query/types';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import { parseListParams } from '../../lib/query/list-params';
import { toListOptions } from '../../lib/query/list-options';
import {
  RecordNotFoundError,
  UnsafeIdentifierError,
} from '../../lib/errors/RecordsError';

const asDate = (v: string | undefined): Date | undefined =>
  v === undefined ? undefined : new Date(v);

@Controller('api/todos')
export class TodosController {
  constructor(private readonly todos: TodosRepository) {}

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
  async create(@Body() body: CreateTodoRequestDto): Promise<TodoRow> {
    try {
      return await this.todos.create({
        ...body,
        due_date: asDate(body.due_date),
      });
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  /** Paged list; any allow-listed column may be passed as an equality filter. */
  @Get()
  async list(@Query() query: RawQuery): Promise<TodoRow[]> {
    const { sortFields, filters } = ENTITY_FILTERS.todo;
    try {
      return await this.todos.list(
        toListOptions(parseListParams(query, sortFields), filters),
      );
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':uid')
  async get(@Param('uid') uid: string): Promise<TodoRow> {
    try {
      return await this.todos.get(uid);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Put(':uid')
  async update(
    @Param('uid') uid: string,
    @Body() body: UpdateTodoRequestDto,
  ): Promise<TodoRow> {
    try {
      return await this.todos.update(uid, {
        ...body,
        due_date: asDate(body.due_date),
        marked_complete: asDate(body.marked_complete),
      });
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':uid')
  @HttpCode(204)
  async remove(@Param('uid') uid: string): Promise<void> {
    try {
      await this.todos.delete(uid);
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
