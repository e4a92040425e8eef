import { Module } from '@nestjs/common';
import { PostgresModule } from '../postgres/postgres.module';
import { UsersRepository } from './users.repository';
import { HouseholdsRepository } from './households.repository';

/** User and household records. Not exposed over REST. */
@Module({
  imports: [PostgresModule],
  providers: [UsersRepository, HouseholdsRepository],
  exports: [UsersRepository, HouseholdsRepository],
})
export class AccountsModule {}
