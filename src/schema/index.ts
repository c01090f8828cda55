import { z } from 'zod';

export const IndicatorColorSchema = z.enum(['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'gray']);
export type IndicatorColor = z.infer<typeof IndicatorColorSchema>;

export const IndicatorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('none') }),
  z.object({ kind: z.literal('spinner') }),
  z.object({ kind: z.literal('success') }),
  z.object({ kind: z.literal('error') }),
  z.object({ kind: z.literal('warning') }),
  z.object({ kind: z.literal('text'), text: z.string() }),
  z.object({ kind: z.literal('coloredText'), text: z.string(), color: IndicatorColorSchema }),
]);
export type Indicator = z.infer<typeof IndicatorSchema>;

export const GlobalStatusSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('loading'), message: z.string().optional() }),
  z.object({ kind: z.literal('ready'), message: z.string().optional() }),
]);
export type GlobalStatus = z.infer<typeof GlobalStatusSchema>;

/** Item text, or the item's original insertion index. */
export const IndicatorKeySchema = z.union([z.string(), z.number().int().nonnegative()]);
export type IndicatorKey = z.infer<typeof IndicatorKeySchema>;

export type SelectionOutcome =
  | { kind: 'selected'; indices: number[]; items: string[] }
  | { kind: 'cancelled' };

export const Indicators = {
  none: { kind: 'none' },
  spinner: { kind: 'spinner' },
  success: { kind: 'success' },
  error: { kind: 'error' },
  warning: { kind: 'warning' },
  text: (text: string): Indicator => ({ kind: 'text', text }),
  coloredText: (text: string, color: IndicatorColor): Indicator => ({ kind: 'coloredText', text, color }),
} as const satisfies Record<string, Indicator | ((...args: never[]) => Indicator)>;

export const Statuses = {
  loading: (message?: string): GlobalStatus => ({ kind: 'loading', message }),
  ready: (message?: string): GlobalStatus => ({ kind: 'ready', message }),
};
