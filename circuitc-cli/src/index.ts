/* eslint-disable no-console */

import { EXIT_CODES } from './exit-codes';
import circuitcCLIMainFunction from './main';

export { default as cliMainRunner, parseCLIArguments } from './cli';
export type { CLIRunners } from './cli';
export {
  default as loadCircuitcProjectConfiguration,
  parseCircuitcProjectConfiguration,
} from './configuration';
export type { CircuitcProjectConfiguration } from './configuration';
export { printSerializedProgram, propagateSerializedProgram } from './propagate';
export type { PropagationOutcome } from './propagate';

if (require.main === module) {
  circuitcCLIMainFunction().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.UNEXPECTED_FAILURE);
  });
}
