// SchemeRegistry tests

import { describe, it, expect, vi } from 'vitest';
import { SchemeRegistry } from './scheme-registry.js';
import { Logger, LogLevel } from '../../core/logger.js';
import { MemorySchemeFinderFactory, silentLogger } from '../test-utils.js';

describe('SchemeRegistry', () => {
  it('should register every declared scheme in lowercase', () => {
    const registry = new SchemeRegistry(silentLogger);
    const factory = new MemorySchemeFinderFactory({}, new Set(['MEM', 'Ram']));
    registry.register(factory);

    expect(registry.schemes()).toEqual(['mem', 'ram']);
    expect(registry.lookup('mem')).toBe(factory);
    expect(registry.lookup('RAM')).toBe(factory);
  });

  it('should return undefined for unknown schemes', () => {
    expect(new SchemeRegistry(silentLogger).lookup('ftp')).toBeUndefined();
  });

  it('should let the last registered factory win', () => {
    const registry = new SchemeRegistry(silentLogger);
    const first = new MemorySchemeFinderFactory({}, new Set(['mem', 'a']));
    const second = new MemorySchemeFinderFactory({}, new Set(['MEM']));
    registry.register(first);
    registry.register(second);

    expect(registry.lookup('mem')).toBe(second);
    expect(registry.lookup('a')).toBe(first);
  });

  it('should warn when a scheme is taken over', () => {
    const logger = new Logger({ level: LogLevel.WARN });
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const registry = new SchemeRegistry(logger);
    const factory = new MemorySchemeFinderFactory({});

    registry.register(factory);
    registry.register(factory);
    expect(warn).not.toHaveBeenCalled();

    registry.register(new MemorySchemeFinderFactory({}));
    expect(warn).toHaveBeenCalledWith('Scheme "mem" handler replaced', {
      previous: 'memory',
      replacement: 'memory'
    });
  });
});
