import { z } from 'zod';

// ── Builtin placeholders ────────────────────────────────────

export const builtinsConfigSchema = z.object({
  namespaces: z.array(z.string().min(1)).optional(),
  names: z.array(z.string().min(1)).optional(),
});

export type BuiltinsConfig = z.infer<typeof builtinsConfigSchema>;

// ── Script denylist entry ───────────────────────────────────

export const denylistEntrySchema = z.object({
  pattern: z.string().min(1),
  description: z.string().min(1),
});

export type DenylistEntry = z.infer<typeof denylistEntrySchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  headless: z.boolean().optional().default(true),
  reportPath: z.string().min(1).optional().default('.artifacts'),
  downloadDir: z.string().min(1).optional().default('downloads'),
  navigationTimeoutMs: z.number().int().positive().optional(),
  actionTimeoutMs: z.number().int().positive().optional(),
  builtins: builtinsConfigSchema.optional(),
  scriptDenylist: z.array(denylistEntrySchema).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
