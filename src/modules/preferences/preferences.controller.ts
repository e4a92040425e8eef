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
import { PreferencesRepository } from './preferences.repository';
import { CreatePreferenceRequestDto } from './dto/CreatePreference.request.dto';
import { UpdatePreferenceRequestDto } from './dto/UpdatePreference.request.dto';
import type { PreferenceRow } from './types';
import type { RawQuery } from '../../lib/query/types';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import { parseListParams } from '../../lib/query/list-params';
import { toListOptions } from '../../lib/query/list-options';
import {
  RecordNotFoundError,
  UnsafeIdentifierError,
} from '../../lib/errors/RecordsError';

@Controller('api/preferences')
export class PreferencesController {
  constructor(private readonly preferences: PreferencesRepository) {}

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
  async create(
    @Body() body: CreatePreferenceRequestDto,
  ): Promise<PreferenceRow> {
    try {
      return await this.preferences.create(body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get()
  async list(@Query() query: RawQuery): Promise<PreferenceRow[]> {
    const { sortFields, filters } = ENTITY_FILTERS.preferences;
    try {
      return await this.preferences.list(
        toListOptions(parseListParams(query, sortFields), filters),
      );
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Get(':key/:specifier')
  async get(
    @Param('key') key: string,
    @Param('specifier') specifier: string,
  ): Promise<PreferenceRow> {
    try {
      return await this.preferences.get({ key, specifier });
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Put(':key/:specifier')
  async update(
    @Param('key') key: string,
    @Param('specifier') specifier: string,
    @Body() body: UpdatePreferenceRequestDto,
  ): Promise<PreferenceRow> {
    try {
      return await this.preferences.update({ key, specifier }, body);
    } catch (err) {
      this.mapDomainError(err);
    }
  }

  @Delete(':key/:specifier')
  @HttpCode(204)
  async remove(
    @Param('key') key: string,
    @Param('specifier') specifier: string,
  ): Promise<void> {
    try {
      await this.preferences.delete({ key, specifier });
    } catch (err) {
      this.mapDomainError(err);
    }
  }
}
