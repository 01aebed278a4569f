import { z } from 'zod';

// ── SelectorSpec ──────────────────────────────────────────────

export const selectorTypeSchema = z.enum(['css', 'xpath', 'id', 'name', 'class']);

export type SelectorType = z.infer<typeof selectorTypeSchema>;

export const SELECTOR_TYPES = selectorTypeSchema.options;

export const selectorSpecSchema = z.object({
  type: selectorTypeSchema,
  value: z.string().min(1),
});

export type SelectorSpec = z.infer<typeof selectorSpecSchema>;
