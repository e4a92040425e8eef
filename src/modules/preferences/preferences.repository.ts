import { Injectable } from '@nestjs/common';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import { ENTITY_FILTERS } from '../../lib/query/entity-filters';
import type {
  CreatePreferenceInput,
  PreferenceKey,
  PreferencePatch,
  PreferenceRow,
} from './types';

/** Preferences are addressed by the (key, specifier) pair. */
@Injectable()
export class PreferencesRepository extends TableRepository<
  PreferenceRow,
  PreferenceKey
> {
  constructor(pg: PostgresService) {
    super(pg, {
      table: 'preferences',
      sortFields: ENTITY_FILTERS.preferences.sortFields,
    });
  }

  protected keyColumns(k: PreferenceKey): Record<string, unknown> {
    return { key: k.key, specifier: k.specifier };
  }

  protected describeKey(k: PreferenceKey): string {
    return `${k.key}/${k.specifier}`;
  }

  public async create(input: CreatePreferenceInput): Promise<PreferenceRow> {
    return this.insertRow({
      key: input.key,
      specifier: input.specifier,
      data: input.data,
      tags: input.tags ?? [],
    });
  }

  public async update(
    k: PreferenceKey,
    patch: PreferencePatch,
  ): Promise<PreferenceRow> {
    return this.updateRow(k, { data: patch.data, tags: patch.tags });
  }
}
