/**
 * Process-wide LocationProvider
 *
 * The provider is created lazily on first access with a double-checked,
 * guarded initialization and may be replaced through `set()`, subject to
 * the installed access controller. Replace it before starting any scan:
 * a scan captures the provider once, when its discovery pass begins.
 */

import { PermissionError, UnsupportedOperationError } from '../../core/errors.js';
import { Logger } from '../../core/logger.js';
import { LocationProvider } from './location-provider.js';
import { SearchPathLocationProvider } from './search-path-provider.js';

/**
 * Permission checked before the provider is replaced
 */
export const REPLACE_PROVIDER_PERMISSION = 'suppressAccessChecks';

/**
 * Permission checked before the access controller itself is replaced
 */
export const SET_CONTROLLER_PERMISSION = 'setAccessController';

/**
 * Host access-control check. Throws PermissionError to reject.
 */
export interface AccessController {
  checkPermission(permission: string): void;
}

/**
 * Grants or denies provider replacement by a fixed policy
 */
export class PolicyAccessController implements AccessController {
  constructor(private readonly allowReplacement: boolean = true) {}

  checkPermission(permission: string): void {
    if (permission === REPLACE_PROVIDER_PERMISSION && !this.allowReplacement) {
      throw new PermissionError(permission);
    }
  }
}

/**
 * Mutual exclusion for initialization and replacement. Callbacks run
 * synchronously, so holders never interleave; re-entry means the callback
 * reached back into the guarded state.
 */
class InitializationLock {
  private held = false;

  run<T>(action: () => T): T {
    if (this.held) {
      throw new UnsupportedOperationError('Location provider requested during its own initialization');
    }
    this.held = true;
    try {
      return action();
    } finally {
      this.held = false;
    }
  }
}

export class LocationProviders {
  private static provider: LocationProvider | null = null;
  private static controller: AccessController = new PolicyAccessController();
  private static readonly lock = new InitializationLock();
  private static defaults: () => LocationProvider = () => new SearchPathLocationProvider();
  private static constructed = 0;

  /**
   * Returns the current provider, creating the default one on first use
   */
  static get(): LocationProvider {
    let result = LocationProviders.provider;

    if (result === null) { // first check without the lock
      result = LocationProviders.lock.run(() => {
        let current = LocationProviders.provider;
        if (current === null) { // second check with the lock
          current = LocationProviders.defaults();
          LocationProviders.constructed++;
          LocationProviders.provider = current;
          Logger.getInstance().debug('Default location provider created', {
            provider: current.constructor.name
          });
        }
        return current;
      });
    }

    return result;
  }

  /**
   * Replaces the provider for all scans started afterwards
   */
  static set(provider: LocationProvider): void {
    LocationProviders.controller.checkPermission(REPLACE_PROVIDER_PERMISSION);
    LocationProviders.lock.run(() => {
      LocationProviders.provider = provider;
    });
    Logger.getInstance().debug('Location provider replaced', { provider: provider.constructor.name });
  }

  /**
   * Installs the host access-control check
   */
  static setAccessController(controller: AccessController): void {
    LocationProviders.controller.checkPermission(SET_CONTROLLER_PERMISSION);
    LocationProviders.controller = controller;
  }

  /**
   * Number of default providers constructed since the last reset
   */
  static get constructionCount(): number {
    return LocationProviders.constructed;
  }

  /**
   * Clears all process-wide state. For tests only.
   */
  static resetForTesting(defaults?: () => LocationProvider): void {
    LocationProviders.provider = null;
    LocationProviders.controller = new PolicyAccessController();
    LocationProviders.defaults = defaults ?? (() => new SearchPathLocationProvider());
    LocationProviders.constructed = 0;
  }
}

/**
 * Sets the LocationProvider used to find namespace locations.
 * Call before any scanning is performed.
 */
export function setLocationProvider(provider: LocationProvider): void {
  LocationProviders.set(provider);
}
