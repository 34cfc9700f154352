import * as fs from 'fs';
import * as path from 'path';

import { DEFAULT_MAXIMUM_EXPONENT } from 'circuitc-core-optimization';

export type CircuitcProjectConfiguration = {
  readonly input: string;
  readonly output: string;
  readonly maximumExponent: number;
  readonly verbose: boolean;
};

export const CONFIGURATION_FILENAME = 'circuitc.json';

export function parseCircuitcProjectConfiguration(
  configurationString: string
): CircuitcProjectConfiguration | null {
  try {
    const json: unknown = JSON.parse(configurationString);
    if (typeof json !== 'object' || json === null || Array.isArray(json)) return null;
    const {
      input = 'build/typed.json',
      output = 'build/propagated.json',
      maximumExponent = Number(DEFAULT_MAXIMUM_EXPONENT),
      verbose = false,
    } = json as { [k: string]: unknown };
    if (typeof input !== 'string' || typeof output !== 'string') return null;
    if (typeof maximumExponent !== 'number' || !Number.isSafeInteger(maximumExponent)) return null;
    if (maximumExponent < 0) return null;
    if (typeof verbose !== 'boolean') return null;
    return { input, output, maximumExponent, verbose };
  } catch {
    return null;
  }
}

// Used for mock.
type ConfigurationLoader = {
  readonly startPath: string;
  readonly pathExistenceTester: (p: string) => boolean;
  readonly fileReader: (p: string) => string | null;
};

export const fileSystemLoader_EXPOSED_FOR_TESTING: ConfigurationLoader = {
  startPath: path.resolve('.'),
  pathExistenceTester: fs.existsSync,
  fileReader: (p) => {
    try {
      return fs.readFileSync(p).toString();
    } catch {
      return null;
    }
  },
};

export type ConfigurationLoadingResult =
  | CircuitcProjectConfiguration
  | 'UNREADABLE_CONFIGURATION_FILE'
  | 'UNPARSABLE_CONFIGURATION_FILE'
  | 'NO_CONFIGURATION';

export default function loadCircuitcProjectConfiguration({
  startPath,
  pathExistenceTester,
  fileReader,
}: ConfigurationLoader = fileSystemLoader_EXPOSED_FOR_TESTING): ConfigurationLoadingResult {
  let configurationDirectory = startPath;
  while (configurationDirectory !== '/') {
    const configurationPath = path.join(configurationDirectory, CONFIGURATION_FILENAME);
    if (pathExistenceTester(configurationPath)) {
      const content = fileReader(configurationPath);
      if (content == null) {
        return 'UNREADABLE_CONFIGURATION_FILE';
      }
      const configuration = parseCircuitcProjectConfiguration(content);
      return configuration === null
        ? 'UNPARSABLE_CONFIGURATION_FILE'
        : {
            ...configuration,
            input: path.resolve(configurationDirectory, configuration.input),
            output: path.resolve(configurationDirectory, configuration.output),
          };
    }
    configurationDirectory = path.dirname(configurationDirectory);
  }
  return 'NO_CONFIGURATION';
}
