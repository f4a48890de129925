/**
 * Windower
 *
 * Slides fixed-size windows over the rows of a tabular dataset, turning a
 * rows × columns array into windows × sizeWindow × columns. Windows are
 * right-aligned: the last (shifted, when recorded) window ends on the last row,
 * and surplus leading rows are pruned.
 */

import type { Cube, Matrix } from '@strata/core';
import { ConfigurationError } from '@strata/utils';
import { logger } from '../logger.js';
import { WindowSpecSchema, type WindowPlan, type WindowSpec, type WindowSpecInput } from './types.js';

function range(start: number, length: number): number[] {
  return Array.from({ length }, (_, i) => start + i);
}

export class Windower {
  /**
   * Validate a window spec against the row count. Returns the parsed spec.
   */
  validate(rowCount: number, input: WindowSpecInput): WindowSpec {
    const parsed = WindowSpecSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid window spec: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        'window'
      );
    }
    const spec = parsed.data;
    const errors: string[] = [];

    if (spec.sizeWindow < 1) {
      errors.push(`sizeWindow must be >= 1, got ${spec.sizeWindow}`);
    }
    if (spec.sizeShift < 1) {
      errors.push(`sizeShift must be >= 1, got ${spec.sizeShift}`);
    }
    if (spec.recordShifted) {
      if (spec.sizeWindow + spec.sizeShift > rowCount) {
        errors.push(
          `sizeWindow + sizeShift (${spec.sizeWindow + spec.sizeShift}) exceeds the ${rowCount} available rows`
        );
      }
    } else if (spec.sizeWindow > rowCount) {
      errors.push(`sizeWindow (${spec.sizeWindow}) exceeds the ${rowCount} available rows`);
    }

    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid window spec: ${errors.join('; ')}`, 'window', { rowCount });
    }
    return spec;
  }

  plan(rowCount: number, input: WindowSpecInput): WindowPlan {
    const spec = this.validate(rowCount, input);
    const { sizeWindow, sizeShift, recordShifted } = spec;

    let windowCount: number;
    let unshiftedLead: number;
    if (recordShifted) {
      windowCount = Math.floor((rowCount - sizeWindow) / sizeShift);
      const shiftedLead = rowCount - ((windowCount - 1) * sizeShift + sizeWindow);
      unshiftedLead = shiftedLead - sizeShift;
    } else {
      windowCount = Math.floor((rowCount - sizeWindow) / sizeShift) + 1;
      unshiftedLead = rowCount - ((windowCount - 1) * sizeShift + sizeWindow);
    }

    const samplesUnshifted = range(0, windowCount).map((i) => range(unshiftedLead + i * sizeShift, sizeWindow));
    const samplesShifted = recordShifted
      ? samplesUnshifted.map((rows) => rows.map((row) => row + sizeShift))
      : null;

    logger.debug('Planned windows', {
      rowCount,
      windowCount,
      sizeWindow,
      sizeShift,
      recordShifted,
      leadingRowsPruned: unshiftedLead,
    });

    return {
      spec,
      rowCount,
      windowCount,
      leadingRowsPruned: unshiftedLead,
      samplesUnshifted,
      samplesShifted,
    };
  }

  /**
   * Gather window rows out of an encoded rows × columns matrix
   */
  apply(rows: Matrix, windows: readonly (readonly number[])[]): Cube {
    return windows.map((windowRows) =>
      windowRows.map((row) => {
        const values = rows[row];
        if (values === undefined) {
          throw new RangeError(`Window row ${row} out of range (${rows.length} rows)`);
        }
        return values;
      })
    );
  }

  /**
   * Union of the rows covered by the given windows, ascending
   */
  rowsOf(plan: WindowPlan, windowIndices: readonly number[], shifted: boolean = false): number[] {
    const source = shifted && plan.samplesShifted ? plan.samplesShifted : plan.samplesUnshifted;
    const rows = new Set<number>();
    for (const windowIndex of windowIndices) {
      for (const row of source[windowIndex] ?? []) {
        rows.add(row);
      }
    }
    return [...rows].sort((a, b) => a - b);
  }
}
