// Scan commands - list the resources and locations behind namespaces

import { Command } from 'commander';
import { Logger, parseLogLevel } from '../../core/logger.js';
import { splitNamespaces } from '../../core/validation.js';
import { formatLocation } from '../../models/location.js';
import { ConfigService } from '../../services/config/config-service.js';
import { LocationProviders, PolicyAccessController } from '../../services/location/location-providers.js';
import { createLoadingContext } from '../../services/location/search-path-provider.js';
import { PackageScanner } from '../../services/scanner/package-scanner.js';
import { withErrorHandling } from '../utils/error-handler.js';

interface ScanOptions {
  root?: string[];
  config?: string;
  json?: boolean;
}

/**
 * Builds a scanner from command arguments, falling back to configuration
 */
export async function createScanner(namespaces: string[], options: ScanOptions): Promise<PackageScanner> {
  const config = await new ConfigService({ baseDir: options.config }).load();

  const level = parseLogLevel(config.logLevel);
  if (level !== undefined) {
    Logger.getInstance().setLevel(level);
  }
  LocationProviders.setAccessController(new PolicyAccessController(config.provider.allowReplacement));

  const roots = options.root && options.root.length > 0 ? options.root : config.roots;
  const names = namespaces.length > 0 ? namespaces : config.namespaces;

  return PackageScanner.fromString(names, {
    context: createLoadingContext(roots.length > 0 ? roots : ['.'])
  });
}

function addScanOptions(command: Command): Command {
  return command
    .argument('[namespaces...]', 'Dot-delimited namespaces (default: from configuration)')
    .option('-r, --root <path...>', 'Search path roots: directories or archives')
    .option('-c, --config <dir>', 'Directory holding scanner.config.yaml', '.scanner')
    .option('--json', 'Output as JSON');
}

/**
 * `nsscan scan`: prints the resource names, or `{ locations, resources }` with --json
 */
export const createScanCommand = (): Command => addScanOptions(
  new Command('scan').description('List every resource under the given namespaces')
).action(withErrorHandling(async (namespaces: string[], options: ScanOptions) => {
  const scanner = await createScanner(splitNamespaces(namespaces), options);
  const resources = [...scanner];

  if (options.json) {
    console.log(JSON.stringify({ // eslint-disable-line no-console
      locations: scanner.locations.map(formatLocation),
      resources
    }, null, 2));
    return;
  }

  if (resources.length === 0) {
    console.log('No resources found.'); // eslint-disable-line no-console
    return;
  }
  for (const name of resources) {
    console.log(name); // eslint-disable-line no-console
  }
}));

/**
 * `nsscan locations`: prints the canonical locations behind the namespaces
 */
export const createLocationsCommand = (): Command => addScanOptions(
  new Command('locations').description('List the locations that expose the given namespaces')
).action(withErrorHandling(async (namespaces: string[], options: ScanOptions) => {
  const scanner = await createScanner(splitNamespaces(namespaces), options);
  const locations = scanner.locations.map(formatLocation);

  if (options.json) {
    console.log(JSON.stringify(locations, null, 2)); // eslint-disable-line no-console
    return;
  }
  for (const location of locations) {
    console.log(location); // eslint-disable-line no-console
  }
}));
