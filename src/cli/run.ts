import readline from 'readline';
import { ClaimChecker } from '../interfaces/pipeline';
import { CheckError, errorMessage, ValidationError } from '../utils/errors';
import { toCheckResponse } from '../utils/present';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  input: NodeJS.ReadableStream;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const USAGE = `Usage:
  crisis-check check <claim text...>   Check one claim and print the result as JSON
  crisis-check interactive             Check claims line by line until "exit"`;

const EXIT_WORDS = new Set(['exit', 'quit']);

function describeFailure(err: unknown): string {
  if (err instanceof CheckError) {
    return err.stage ? `Failed at ${err.stage}: ${err.message}` : `Failed: ${err.message}`;
  }
  return `Failed: ${errorMessage(err)}`;
}

async function checkOnce(checker: ClaimChecker, claim: string, io: CliIo): Promise<number> {
  try {
    const outcome = await checker.run(claim);
    io.stdout(JSON.stringify(toCheckResponse(outcome), null, 2));
    return EXIT_OK;
  } catch (err) {
    io.stderr(describeFailure(err));
    return err instanceof ValidationError ? EXIT_USAGE : EXIT_FAILED;
  }
}

async function interactive(checker: ClaimChecker, io: CliIo): Promise<number> {
  const rl = readline.createInterface({ input: io.input, terminal: false });
  io.stdout('Enter a claim to check ("exit" to quit).');
  try {
    for await (const line of rl) {
      const claim = line.trim();
      if (EXIT_WORDS.has(claim.toLowerCase())) {
        break;
      }
      if (!claim) {
        continue;
      }
      await checkOnce(checker, claim, io);
    }
  } finally {
    rl.close();
  }
  return EXIT_OK;
}

/**
 * Runs one CLI invocation and resolves to its exit code. `createChecker` is
 * called at most once, so an interactive session shares one cache.
 */
export async function runCli(argv: readonly string[], io: CliIo, createChecker: () => ClaimChecker): Promise<number> {
  const [command, ...rest] = argv;
  switch (command) {
    case 'check': {
      const claim = rest.join(' ');
      if (!claim.trim()) {
        io.stderr(USAGE);
        return EXIT_USAGE;
      }
      return checkOnce(createChecker(), claim, io);
    }
    case 'interactive':
      return interactive(createChecker(), io);
    default:
      io.stderr(USAGE);
      return EXIT_USAGE;
  }
}
