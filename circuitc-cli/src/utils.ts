import loadCircuitcProjectConfiguration, {
  CircuitcProjectConfiguration,
  ConfigurationLoadingResult,
  CONFIGURATION_FILENAME,
} from './configuration';
import { EXIT_CODES } from './exit-codes';

type ConfigurationProblem = Exclude<ConfigurationLoadingResult, CircuitcProjectConfiguration>;

const CONFIGURATION_PROBLEM_MESSAGES: Readonly<Record<ConfigurationProblem, string>> = {
  NO_CONFIGURATION: `No ${CONFIGURATION_FILENAME} in this directory or any of its parents.`,
  UNREADABLE_CONFIGURATION_FILE: `${CONFIGURATION_FILENAME} exists but cannot be read.`,
  UNPARSABLE_CONFIGURATION_FILE: `${CONFIGURATION_FILENAME} is not a valid configuration.`,
};

/** Returns the message to report, or null when a configuration was loaded. */
export function describeConfigurationProblem(result: ConfigurationLoadingResult): string | null {
  return typeof result === 'string' ? `${result}: ${CONFIGURATION_PROBLEM_MESSAGES[result]}` : null;
}

export function getConfiguration(
  load: () => ConfigurationLoadingResult = loadCircuitcProjectConfiguration
): CircuitcProjectConfiguration {
  const result = load();
  if (typeof result === 'string') {
    // eslint-disable-next-line no-console
    console.error(describeConfigurationProblem(result));
    process.exit(EXIT_CODES.INVALID_INPUT);
  }
  return result;
}
