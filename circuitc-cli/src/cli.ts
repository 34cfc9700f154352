export const CIRCUITC_VERSION = '0.1.0';

const PROGRAM_COMMANDS = ['propagate', 'print'] as const;
type ProgramCommand = (typeof PROGRAM_COMMANDS)[number];

type ParsedCLIAction =
  | { readonly type: ProgramCommand; readonly needHelp: boolean }
  | { readonly type: 'version' }
  | { readonly type: 'help' };

const isProgramCommand = (command: string): command is ProgramCommand =>
  PROGRAM_COMMANDS.some((it) => it === command);

/** No argument means `propagate`. Anything unrecognized means `help`. */
export function parseCLIArguments(commandLineArguments: readonly string[]): ParsedCLIAction {
  const [command, ...rest] = commandLineArguments;
  if (command == null) return { type: 'propagate', needHelp: false };
  if (command === 'version' || command === 'help') return { type: command };
  if (!isProgramCommand(command)) return { type: 'help' };
  return { type: command, needHelp: rest.includes('--help') || rest.includes('-h') };
}

export interface CLIRunners {
  propagate(needHelp: boolean): Promise<void>;
  print(needHelp: boolean): Promise<void>;
  version(): Promise<void>;
  help(): Promise<void>;
}

export default function cliMainRunner(
  runners: CLIRunners,
  commandLineArguments: readonly string[]
): Promise<void> {
  const action = parseCLIArguments(commandLineArguments);
  switch (action.type) {
    case 'version':
    case 'help':
      return runners[action.type]();
    default:
      return runners[action.type](action.needHelp);
  }
}
