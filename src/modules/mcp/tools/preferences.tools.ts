import { Injectable, Logger } from '@nestjs/common';
import { PreferencesRepository } from '../../preferences/preferences.repository';
import type { PreferenceKey } from '../../preferences/types';
import { RecordNotFoundError } from '../../../lib/errors/RecordsError';
import type { ToolArgs } from '../tool.args';
import type { ToolHandlerMap } from '../tool.handler';
import {
  describeError,
  errorResult,
  jsonResult,
  textResult,
} from '../tool.results';
import type { ToolCallResult } from '../types';

/**
 * Preference data lives in a jsonb column. Text that is already JSON is
 * stored as is; anything else is stored as a JSON string.
 */
export function toJsonText(data: string): string {
  try {
    JSON.parse(data);
    return data;
  } catch {
    return JSON.stringify(data);
  }
}

@Injectable()
export class PreferenceTools {
  private readonly logger = new Logger(PreferenceTools.name);

  constructor(private readonly preferences: PreferencesRepository) {}

  handlers(): Pick<ToolHandlerMap, 'set_preference' | 'get_preference'> {
    return {
      set_preference: (args) => this.setPreference(args),
      get_preference: (args) => this.getPreference(args),
    };
  }

  /** Update when the pair exists, create otherwise. Not atomic. */
  async setPreference(args: ToolArgs): Promise<ToolCallResult> {
    const k: PreferenceKey = {
      key: args.requiredString('key'),
      specifier: args.requiredString('specifier'),
    };
    const data = toJsonText(args.requiredString('data'));
    const tags = args.tags();
    const label = `${k.key}/${k.specifier}`;

    let exists: boolean;
    try {
      await this.preferences.get(k);
      exists = true;
    } catch (err) {
      if (!(err instanceof RecordNotFoundError)) {
        return errorResult(`Failed to read preference: ${describeError(err)}`);
      }
      exists = false;
    }

    if (exists) {
      try {
        await this.preferences.update(k, { data, tags });
      } catch (err) {
        return errorResult(`Failed to update preference: ${describeError(err)}`);
      }
      this.logger.log(`Updated preference ${label}`);
      return textResult(`Preference updated: ${label}`);
    }

    try {
      await this.preferences.create({ ...k, data, tags });
    } catch (err) {
      return errorResult(`Failed to create preference: ${describeError(err)}`);
    }
    this.logger.log(`Created preference ${label}`);
    return textResult(`Preference created: ${label}`);
  }

  async getPreference(args: ToolArgs): Promise<ToolCallResult> {
    const k: PreferenceKey = {
      key: args.requiredString('key'),
      specifier: args.requiredString('specifier'),
    };
    try {
      return jsonResult(await this.preferences.get(k));
    } catch (err) {
      return errorResult(`Preference not found: ${describeError(err)}`);
    }
  }
}
