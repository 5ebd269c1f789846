import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { safeValidateScannerConfig, validateScannerConfig } from './schemas.js';

describe('ScannerConfigSchema', () => {
  it('should fill defaults for an empty document', () => {
    expect(validateScannerConfig({})).toEqual({
      roots: [],
      namespaces: [],
      logLevel: 'info',
      provider: { allowReplacement: true }
    });
  });

  it('should reject empty roots', () => {
    expect(() => validateScannerConfig({ roots: [''] })).toThrow(ZodError);
  });

  it('should report unknown keys without throwing', () => {
    const result = safeValidateScannerConfig({ provider: { allowReplacement: false }, extra: 1 });
    expect(result.success).toBe(false);
  });

  it('should accept every level name', () => {
    for (const logLevel of ['debug', 'info', 'warn', 'error', 'silent']) {
      expect(validateScannerConfig({ logLevel }).logLevel).toBe(logLevel);
    }
  });
});
