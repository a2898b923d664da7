import { EVALUATION_MODES, RETRIEVAL_MODES, type EvaluationMode, type RetrievalMode } from '../config/validation.js';

export type CliArgs =
  | { command: 'help' }
  | {
      command: 'run';
      file: string;
      mode?: EvaluationMode;
      retrieval?: RetrievalMode;
      out?: string;
      json: boolean;
    }
  | { command: 'verify'; snapshot: string };

export class CliUsageError extends Error {
  code = 'CLI_USAGE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function oneOf<T extends string>(options: readonly T[], value: string | undefined, flag: string): T {
  const match = options.find(option => option === value);
  if (!match) {
    throw new CliUsageError(`${flag} must be one of: ${options.join(', ')}`);
  }
  return match;
}

function valueOf(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!command || command === '--help' || command === '-h' || command === 'help') {
    return { command: 'help' };
  }

  const flags = new Map<string, string>();
  let json = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--help':
      case '-h':
        return { command: 'help' };
      case '--file':
      case '--mode':
      case '--retrieval':
      case '--out':
      case '--snapshot':
        flags.set(arg, valueOf(rest, i, arg));
        i++;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  switch (command) {
    case 'run': {
      const file = flags.get('--file');
      if (!file) throw new CliUsageError('--file is required');
      const mode = flags.get('--mode');
      const retrieval = flags.get('--retrieval');
      return {
        command: 'run',
        file,
        mode: mode === undefined ? undefined : oneOf(EVALUATION_MODES, mode, '--mode'),
        retrieval: retrieval === undefined ? undefined : oneOf(RETRIEVAL_MODES, retrieval, '--retrieval'),
        out: flags.get('--out'),
        json,
      };
    }
    case 'verify': {
      const snapshot = flags.get('--snapshot');
      if (!snapshot) throw new CliUsageError('--snapshot is required');
      return { command: 'verify', snapshot };
    }
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}
