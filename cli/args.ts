/**
 * Parsowanie argumentów CLI
 */

export type Command = 'score' | 'merge' | 'history';

export interface CliArgs {
  command?: Command;
  positional: string[];
  label?: string;
  save?: boolean;
  limit?: number;
  verbose?: boolean;
  help?: boolean;
}

const COMMANDS: readonly Command[] = ['score', 'merge', 'history'];

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value);
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      result.verbose = true;
    } else if (arg === '--save') {
      result.save = true;
    } else if (arg === '--label') {
      result.label = args[++i];
    } else if (arg === '--limit') {
      result.limit = parseInt(args[++i] ?? '', 10);
    } else if (!arg.startsWith('-')) {
      if (!result.command && isCommand(arg)) {
        result.command = arg;
      } else {
        result.positional.push(arg);
      }
    }
  }

  return result;
}
