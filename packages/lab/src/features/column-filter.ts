/**
 * Column filters
 *
 * A filter picks columns out of those still unclaimed by earlier steps of the
 * same set, by dtype and/or by name.
 */

import { DTYPES, type Dtype } from '@strata/core';
import { FilterError } from '@strata/utils';
import { z } from 'zod';

export const ColumnFilterSchema = z.object({
  /** false: match everything except the named dtypes/columns */
  include: z.boolean().default(true),
  dtypes: z.array(z.enum(['float', 'int', 'string', 'bool'])).optional(),
  columns: z.array(z.string()).optional(),
});

export type ColumnFilterInput = z.input<typeof ColumnFilterSchema>;
export type ColumnFilter = z.output<typeof ColumnFilterSchema>;

export interface ResolvedFilter {
  /** Columns claimed by this step, in available order */
  matched: string[];
  /** Columns left for later steps */
  remaining: string[];
}

export function resolveFilter(
  available: readonly string[],
  dtypes: Readonly<Record<string, Dtype>>,
  filter: ColumnFilter,
  configKey: string
): ResolvedFilter {
  const { include, dtypes: wantedDtypes, columns: wantedColumns } = filter;

  for (const dtype of wantedDtypes ?? []) {
    if (!DTYPES.includes(dtype)) {
      throw new FilterError(`Unknown dtype '${dtype}'`, configKey);
    }
    if (!available.some((column) => dtypes[column] === dtype)) {
      throw new FilterError(`No remaining column has dtype '${dtype}'`, configKey, {
        dtype,
        available: [...available],
      });
    }
  }

  for (const column of wantedColumns ?? []) {
    if (!available.includes(column)) {
      throw new FilterError(`Column '${column}' is not available to this step`, configKey, {
        column,
        available: [...available],
      });
    }
  }

  const byDtype = new Set(available.filter((column) => (wantedDtypes ?? []).some((dtype) => dtypes[column] === dtype)));
  const doubled = (wantedColumns ?? []).filter((column) => byDtype.has(column));
  if (doubled.length > 0) {
    throw new FilterError(
      `Column(s) ${doubled.join(', ')} matched both by dtype and by name`,
      configKey,
      { columns: doubled }
    );
  }

  const named = new Set(wantedColumns ?? []);
  const hasCriteria = wantedDtypes !== undefined || wantedColumns !== undefined;
  if (!include && !hasCriteria) {
    throw new FilterError('An exclusion filter needs dtypes or columns', configKey);
  }

  const hit = (column: string): boolean => byDtype.has(column) || named.has(column);
  const matched = available.filter((column) => (!hasCriteria ? true : include ? hit(column) : !hit(column)));

  if (matched.length === 0) {
    throw new FilterError('Filter matched no columns', configKey, { available: [...available] });
  }

  const claimed = new Set(matched);
  return {
    matched,
    remaining: available.filter((column) => !claimed.has(column)),
  };
}
