export type Command = 'build' | 'check' | 'print' | 'clean' | 'help';

const COMMANDS: readonly Command[] = ['build', 'check', 'print', 'clean', 'help'];

export interface CommandLine {
  command: Command;
  registryPath?: string;
  outputDir?: string;
  binaryPath?: string;
}

const OPTIONS = {
  '--registry': 'registryPath',
  '--out': 'outputDir',
  '--binary': 'binaryPath',
} as const;

type OptionFlag = keyof typeof OPTIONS;

function isOptionFlag(flag: string): flag is OptionFlag {
  return Object.hasOwn(OPTIONS, flag);
}

function isCommand(word: string): word is Command {
  return COMMANDS.some(command => command === word);
}

/** Parse `process.argv.slice(2)`. The command defaults to `build`. */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const result: CommandLine = { command: 'build' };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      result.command = 'help';
      commandSeen = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      if (!isOptionFlag(flag)) throw new Error(`Unknown option ${flag}`);
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (!value) throw new Error(`Option ${flag} needs a value`);
      result[OPTIONS[flag]] = value;
      continue;
    }

    if (commandSeen) throw new Error(`Unexpected argument ${arg}`);
    if (!isCommand(arg)) throw new Error(`Unknown command ${arg}`);
    result.command = arg;
    commandSeen = true;
  }

  return result;
}
