/* eslint-disable no-console */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import cliMainRunner, { CIRCUITC_VERSION, CLIRunners } from './cli';
import type { CircuitcProjectConfiguration } from './configuration';
import { printSerializedProgram, propagateSerializedProgram } from './propagate';
import { EXIT_CODES } from './exit-codes';
import { getConfiguration } from './utils';

async function propagateEverything(configuration: CircuitcProjectConfiguration): Promise<void> {
  const source = await readFile(configuration.input, 'utf8');
  const outcome = propagateSerializedProgram(source, BigInt(configuration.maximumExponent));
  switch (outcome.__type__) {
    case 'MALFORMED_INPUT':
      console.error(`${configuration.input} is not a valid typed program.`);
      process.exit(EXIT_CODES.INVALID_INPUT);
    case 'ERROR':
      console.error(`Found ${outcome.errors.length} error(s).`);
      outcome.errors.forEach((it) => console.error(it.toString()));
      process.exit(EXIT_CODES.COMPILE_ERRORS);
    case 'INTERNAL_ERROR':
      console.error(outcome.error.message);
      process.exit(EXIT_CODES.INTERNAL_COMPILER_ERROR);
    case 'OK':
      if (configuration.verbose) {
        outcome.summaries.forEach((it) => console.log(it));
      }
      await mkdir(dirname(configuration.output), { recursive: true });
      await writeFile(configuration.output, outcome.output);
      break;
  }
}

async function printEverything(configuration: CircuitcProjectConfiguration): Promise<void> {
  const printed = printSerializedProgram(await readFile(configuration.input, 'utf8'));
  if (printed == null) {
    console.error(`${configuration.input} is not a valid typed program.`);
    process.exit(EXIT_CODES.INVALID_INPUT);
  }
  console.log(printed);
}

const runners: CLIRunners = {
  async propagate(needHelp) {
    if (needHelp) {
      console.log('circuitc propagate: Propagate constants through the program named in circuitc.json.');
    } else {
      await propagateEverything(getConfiguration());
    }
  },
  async print(needHelp) {
    if (needHelp) {
      console.log('circuitc print: Print the input program named in circuitc.json.');
    } else {
      await printEverything(getConfiguration());
    }
  },
  async version() {
    console.log(`circuitc ${CIRCUITC_VERSION}`);
  },
  async help() {
    console.log(`Usage:
circuitc [command]

Commands:
[no command]: defaults to propagate command specified below.
propagate: Propagate constants through the program named in circuitc.json.
print: Print the input program named in circuitc.json.
version: Show the version.
help: Show this message.`);
  },
};

export default function circuitcCLIMainFunction(): Promise<void> {
  return cliMainRunner(runners, process.argv.slice(2));
}
