/**
 * Tests for the process-wide LocationProvider lifecycle
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  LocationProviders,
  PolicyAccessController,
  REPLACE_PROVIDER_PERMISSION,
  SET_CONTROLLER_PERMISSION,
  setLocationProvider
} from './location-providers.js';
import { LocationProvider } from './location-provider.js';
import { SearchPathLocationProvider } from './search-path-provider.js';
import { PermissionError, UnsupportedOperationError } from '../../core/errors.js';
import { FakeLocationProvider } from '../test-utils.js';

class CountingProvider extends LocationProvider {
  static created = 0;

  constructor() {
    super();
    CountingProvider.created++;
  }

  getLocations(): Iterable<string> {
    return [];
  }
}

describe('LocationProviders', () => {
  beforeEach(() => {
    CountingProvider.created = 0;
    LocationProviders.resetForTesting();
  });

  afterEach(() => {
    LocationProviders.resetForTesting();
  });

  describe('get', () => {
    it('should create the search path provider on first use', () => {
      expect(LocationProviders.constructionCount).toBe(0);
      const provider = LocationProviders.get();
      expect(provider).toBeInstanceOf(SearchPathLocationProvider);
      expect(LocationProviders.get()).toBe(provider);
      expect(LocationProviders.constructionCount).toBe(1);
    });

    it('should construct exactly one default for concurrent first access', async () => {
      LocationProviders.resetForTesting(() => new CountingProvider());

      const callers = Array.from({ length: 50 }, async (_, i) => {
        await new Promise(resolve => setTimeout(resolve, i % 5));
        return LocationProviders.get();
      });
      const providers = await Promise.all(callers);

      expect(CountingProvider.created).toBe(1);
      expect(LocationProviders.constructionCount).toBe(1);
      expect(new Set(providers).size).toBe(1);
    });

    it('should reject re-entrant access during construction', () => {
      LocationProviders.resetForTesting(() => {
        LocationProviders.get();
        return new CountingProvider();
      });

      expect(() => LocationProviders.get()).toThrow(UnsupportedOperationError);
      expect(LocationProviders.constructionCount).toBe(0);

      LocationProviders.resetForTesting(() => new CountingProvider());
      expect(LocationProviders.get()).toBeInstanceOf(CountingProvider);
    });
  });

  describe('set', () => {
    it('should replace the provider for later lookups', () => {
      const custom = new FakeLocationProvider({});
      LocationProviders.get();
      setLocationProvider(custom);
      expect(LocationProviders.get()).toBe(custom);
    });

    it('should skip default construction when set first', () => {
      const custom = new FakeLocationProvider({});
      LocationProviders.set(custom);
      expect(LocationProviders.get()).toBe(custom);
      expect(LocationProviders.constructionCount).toBe(0);
    });

    it('should consult the access controller', () => {
      const checkPermission = vi.fn();
      LocationProviders.setAccessController({ checkPermission });
      LocationProviders.set(new FakeLocationProvider({}));
      expect(checkPermission).toHaveBeenCalledWith(REPLACE_PROVIDER_PERMISSION);
    });

    it('should keep the current provider when the check rejects', () => {
      const original = LocationProviders.get();
      LocationProviders.setAccessController(new PolicyAccessController(false));

      expect(() => LocationProviders.set(new FakeLocationProvider({}))).toThrow(PermissionError);
      expect(LocationProviders.get()).toBe(original);
    });
  });

  describe('setAccessController', () => {
    it('should be gated by the installed controller', () => {
      LocationProviders.setAccessController({
        checkPermission: permission => {
          throw new PermissionError(permission);
        }
      });

      expect(() => LocationProviders.setAccessController(new PolicyAccessController())).toThrow(PermissionError);
      expect(() => LocationProviders.setAccessController(new PolicyAccessController())).toThrow(SET_CONTROLLER_PERMISSION);
    });
  });
});

describe('PolicyAccessController', () => {
  it('should only guard provider replacement', () => {
    const controller = new PolicyAccessController(false);
    expect(() => controller.checkPermission(REPLACE_PROVIDER_PERMISSION)).toThrow(PermissionError);
    expect(() => controller.checkPermission(SET_CONTROLLER_PERMISSION)).not.toThrow();
    expect(() => new PolicyAccessController().checkPermission(REPLACE_PROVIDER_PERMISSION)).not.toThrow();
  });
});
