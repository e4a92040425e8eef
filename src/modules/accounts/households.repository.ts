import { Injectable } from '@nestjs/common';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import type { HouseholdPatch, HouseholdRow } from './types';

@Injectable()
export class HouseholdsRepository extends TableRepository<HouseholdRow, string> {
  constructor(pg: PostgresService) {
    super(pg, {
      table: 'households',
      sortFields: new Set(['uid', 'name', 'created_at', 'updated_at']),
    });
  }

  protected keyColumns(uid: string): Record<string, unknown> {
    return { uid };
  }

  protected describeKey(uid: string): string {
    return uid;
  }

  public async update(uid: string, patch: HouseholdPatch): Promise<HouseholdRow> {
    return this.updateRow(uid, {
      name: patch.name,
      description: patch.description,
    });
  }
}
