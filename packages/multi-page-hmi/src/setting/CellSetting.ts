/**
 * Settings - shared value cells pages read from and write to
 */

import { z } from 'zod';

import { SettingError } from '../core/errors.js';

export interface Setting<T> {
  get(): T;
  set(value: T): void;
  /** Parse and store a textual value; throws {@link SettingError} if rejected */
  setString(value: string): void;
}

export class CellSetting<T> implements Setting<T> {
  private value: T;
  private readonly schema: z.ZodType<T>;

  /**
   * @param schema - parses the strings given to `setString`,
   *   e.g. `z.coerce.number().int()`
   */
  constructor(initial: T, schema: z.ZodType<T>) {
    this.value = initial;
    this.schema = schema;
  }

  get(): T {
    return this.value;
  }

  set(value: T): void {
    this.value = value;
  }

  setString(value: string): void {
    const parsed = this.schema.safeParse(value);
    if (!parsed.success) {
      throw new SettingError(`Invalid setting value: ${JSON.stringify(value)}`, {
        value,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    this.value = parsed.data;
  }
}

/** Numeric setting parsed from decimal text */
export function numberSetting(initial: number): CellSetting<number> {
  return new CellSetting(initial, z.coerce.number().finite());
}

export function stringSetting(initial: string): CellSetting<string> {
  return new CellSetting(initial, z.string());
}
