import { Injectable } from '@nestjs/common';
import { PostgresService } from '../postgres/postgres.service';
import { TableRepository } from '../postgres/table.repository';
import type { UserPatch, UserRow } from './types';

@Injectable()
export class UsersRepository extends TableRepository<UserRow, string> {
  constructor(pg: PostgresService) {
    super(pg, {
      table: 'users',
      sortFields: new Set(['uid', 'name', 'created_at', 'updated_at']),
    });
  }

  protected keyColumns(uid: string): Record<string, unknown> {
    return { uid };
  }

  protected describeKey(uid: string): string {
    return uid;
  }

  public async update(uid: string, patch: UserPatch): Promise<UserRow> {
    return this.updateRow(uid, {
      name: patch.name,
      email: patch.email,
      description: patch.description,
      household_uid: patch.household_uid,
    });
  }
}
