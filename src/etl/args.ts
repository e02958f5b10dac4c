import { ArgumentError } from './errors.js';

export interface LoaderArgs {
  /** Empty when no file was given */
  filePath: string;
}

/**
 * Reads `-f <path>` / `--file=<path>` from the argument list.
 *
 * Options end at the first positional argument or at `--`. Anything else
 * that looks like an option is rejected.
 */
export function parseLoaderArgs(argv: string[]): LoaderArgs {
  const args: LoaderArgs = { filePath: '' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      break;
    } else if (arg === '-f' || arg === '--file') {
      if (i + 1 >= argv.length) {
        throw new ArgumentError(`option ${arg} requires argument`);
      }
      args.filePath = argv[++i];
    } else if (arg.startsWith('--file=')) {
      args.filePath = arg.slice('--file='.length);
    } else if (arg.startsWith('-f')) {
      args.filePath = arg.slice(2);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new ArgumentError(`option ${arg.split('=')[0]} not recognized`);
    } else {
      break;
    }
  }

  return args;
}
