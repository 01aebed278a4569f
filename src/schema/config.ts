import { z } from 'zod';

import { PATHS } from '../config/defaults.js';
import { workflowDefinitionSchema } from './workflow.js';

// ── Browser block ───────────────────────────────────────────

export const browserKindSchema = z.enum(['chromium', 'firefox', 'webkit']);

export type BrowserKind = z.infer<typeof browserKindSchema>;

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Viewport = z.infer<typeof viewportSchema>;

// ── Anti-crawler block ──────────────────────────────────────

export const antiCrawlerConfigSchema = z.object({
  enabled: z.boolean().optional().default(true),
  proxyEnabled: z.boolean().optional().default(false),
});

export type AntiCrawlerConfig = z.infer<typeof antiCrawlerConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    headless: z.boolean().optional().default(true),
    browser: browserKindSchema.optional().default('chromium'),
    viewport: viewportSchema.optional(),
    navigationTimeout: z.number().int().positive().optional(),
    actionTimeout: z.number().int().positive().optional(),
    antiCrawler: antiCrawlerConfigSchema.optional().default({}),
    storeDir: z.string().min(1).optional().default(PATHS.STORE_DIR),
    workflows: z.array(workflowDefinitionSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.workflows.forEach((workflow, index) => {
      if (seen.has(workflow.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate workflow id "${workflow.id}"`,
          path: ['workflows', index, 'id'],
        });
      }
      seen.add(workflow.id);
    });
  });

export type FileConfig = z.infer<typeof fileConfigSchema>;
