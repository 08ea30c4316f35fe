import { z } from 'zod';

// ── User Config (config.yaml) ──

export const UserConfigSchema = z.object({
  environmentsDir: z.string().min(1).optional(),
  strict: z.boolean().optional(),
}).strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;

// ── Package Manifest ──

export const PackageManifestSchema = z.object({
  version: z.string().optional(),
  bin: z.record(z.string(), z.string()).optional(),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;
