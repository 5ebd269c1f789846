// Zod schemas for scanner configuration

import { z } from 'zod';

/**
 * Log level names accepted in configuration
 */
export const LogLevelNameSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Location provider settings
 */
export const ProviderConfigSchema = z.object({
  allowReplacement: z.boolean().default(true)
});

/**
 * scanner.config.yaml
 */
export const ScannerConfigSchema = z.object({
  roots: z.array(z.string().min(1, 'Root path must not be empty')).default([]),
  namespaces: z.array(z.string()).default([]),
  logLevel: LogLevelNameSchema.default('info'),
  provider: ProviderConfigSchema.default({})
}).strict();

export type LogLevelName = z.infer<typeof LogLevelNameSchema>;
export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;

export function validateScannerConfig(data: unknown): ScannerConfig {
  return ScannerConfigSchema.parse(data);
}

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateScannerConfig(data: unknown) {
  return ScannerConfigSchema.safeParse(data);
}
