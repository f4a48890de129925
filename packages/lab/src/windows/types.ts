/**
 * Window types
 */

import { z } from 'zod';

export const WindowSpecSchema = z
  .object({
    /** Rows per window */
    sizeWindow: z.number().int(),
    /** Rows between consecutive window starts */
    sizeShift: z.number().int(),
    /** Also record each window moved forward by sizeShift (self-supervised target) */
    recordShifted: z.boolean().default(true),
  })
  .strict();

export type WindowSpecInput = z.input<typeof WindowSpecSchema>;
export type WindowSpec = z.output<typeof WindowSpecSchema>;

/**
 * Row indices of every window. The window index is the sample axis.
 */
export interface WindowPlan {
  readonly spec: WindowSpec;
  readonly rowCount: number;
  readonly windowCount: number;
  /** First row of window 0 */
  readonly leadingRowsPruned: number;
  readonly samplesUnshifted: readonly (readonly number[])[];
  readonly samplesShifted: readonly (readonly number[])[] | null;
}
