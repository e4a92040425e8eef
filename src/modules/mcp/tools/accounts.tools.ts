import { Injectable } from '@nestjs/common';
import { UsersRepository } from '../../accounts/users.repository';
import { HouseholdsRepository } from '../../accounts/households.repository';
import type { ToolArgs } from '../tool.args';
import type { ToolHandlerMap } from '../tool.handler';
import { describeError, errorResult, textResult } from '../tool.results';
import type { ToolCallResult } from '../types';

@Injectable()
export class AccountTools {
  constructor(
    private readonly users: UsersRepository,
    private readonly households: HouseholdsRepository,
  ) {}

  handlers(): Pick<
    ToolHandlerMap,
    'update_user_description' | 'update_household_description'
  > {
    return {
      update_user_description: (args) => this.updateUserDescription(args),
      update_household_description: (args) =>
        this.updateHouseholdDescription(args),
    };
  }

  async updateUserDescription(args: ToolArgs): Promise<ToolCallResult> {
    const uid = args.requiredString('user_uid');
    const description = args.requiredString('description', { allowEmpty: true });
    try {
      const user = await this.users.update(uid, { description });
      return textResult(
        `User description updated successfully: ${JSON.stringify(user)}`,
      );
    } catch (err) {
      return errorResult(
        `Failed to update user description: ${describeError(err)}`,
      );
    }
  }

  async updateHouseholdDescription(args: ToolArgs): Promise<ToolCallResult> {
    const uid = args.requiredString('household_uid');
    const description = args.requiredString('description', { allowEmpty: true });
    try {
      const household = await this.households.update(uid, { description });
      return textResult(
        `Household description updated successfully: ${JSON.stringify(household)}`,
      );
    } catch (err) {
      return errorResult(
        `Failed to update household description: ${describeError(err)}`,
      );
    }
  }
}
