import { z } from 'zod';

// ── Verbs ─────────────────────────────────────────────────────

export const actionVerbSchema = z.enum([
  'goto',
  'click',
  'input',
  'select',
  'radio',
  'checkbox',
  'wait',
  'extract_text',
  'extract_html',
  'extract_attribute',
  'extract_url',
  'extract_multiple',
]);

export type ActionVerb = z.infer<typeof actionVerbSchema>;

/** Verbs that operate on the page itself rather than a resolved element. */
export const UNTARGETED_VERBS: ReadonlySet<ActionVerb> = new Set([
  'goto',
  'extract_url',
]);

export const extractTypeSchema = z.enum(['text', 'html', 'attribute']);

export type ExtractType = z.infer<typeof extractTypeSchema>;

// ── ActionDescriptor ──────────────────────────────────────────
// The verb stays a plain string: unknown verbs are reported by the
// executor as an error result, not rejected at load time.

export const actionDescriptorSchema = z.object({
  verb: z.string().min(1),
  selector: z.string().nullable(),
  value: z.string().nullable(),
  extras: z.record(z.string()),
});

export type ActionDescriptor = Readonly<z.infer<typeof actionDescriptorSchema>>;

// ── Record surface ───────────────────────────────────────────
// What workflow files and other callers hand us. Optional fields
// map onto the descriptor's nullable slots and extras.

export const actionRecordSchema = z.object({
  verb: z.string().min(1),
  selector: z.string().nullish(),
  value: z.string().nullish(),
  attribute: z.string().min(1).nullish(),
  extractType: z.string().min(1).nullish(),
  /** Snake-case spelling of `extractType`; the camel-case field wins when both are set. */
  extract_type: z.string().min(1).nullish(),
});

export type ActionRecord = z.infer<typeof actionRecordSchema>;

export function toActionDescriptor(record: ActionRecord): ActionDescriptor {
  const extras: Record<string, string> = {};
  if (record.attribute) extras['attribute'] = record.attribute;
  const extractType = record.extractType ?? record.extract_type;
  if (extractType) extras['extractType'] = extractType;

  return Object.freeze({
    verb: record.verb,
    selector: record.selector ?? null,
    value: record.value ?? null,
    extras: Object.freeze(extras),
  });
}

export function parseActionRecord(data: unknown): ActionDescriptor {
  return toActionDescriptor(actionRecordSchema.parse(data));
}
