import { Readable } from 'stream';
import { describe, expect, it } from 'vitest';
import { runCli, USAGE, EXIT_FAILED, EXIT_OK, EXIT_USAGE, CliIo } from '../../../src/cli/run';
import { ClaimChecker } from '../../../src/interfaces/pipeline';
import { ExtractionFailure, ValidationError } from '../../../src/utils/errors';
import { makeResult } from '../../helpers/fakes';

function io(lines: string[] = []): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    input: Readable.from(lines.map(line => `${line}\n`)),
    stdout: text => out.push(text),
    stderr: text => err.push(text),
    out,
    err,
  };
}

class RecordingChecker implements ClaimChecker {
  readonly claims: string[] = [];

  constructor(private readonly fail?: Error) {}

  async check(rawText: string) {
    const outcome = await this.run(rawText);
    return outcome.result;
  }

  async run(rawText: string) {
    this.claims.push(rawText);
    if (this.fail) {
      throw this.fail;
    }
    return { result: makeResult(), cached: false, processingMs: 1234 };
  }
}

describe('runCli', () => {
  it('prints the result of a single check as JSON', async () => {
    const checker = new RecordingChecker();
    const terminal = io();
    const code = await runCli(['check', 'Drinking', 'hot', 'water'], terminal, () => checker);

    expect(code).toBe(EXIT_OK);
    expect(checker.claims).toEqual(['Drinking hot water']);
    expect(JSON.parse(terminal.out[0])).toMatchObject({
      verdict: 'false',
      severity: 'high',
      confidence: 0.65,
      overall_reliability: 0.75,
      cached: false,
      processing_time_seconds: 1.23,
    });
  });

  it('prints usage without a claim or command', async () => {
    const terminal = io();
    let created = 0;
    const create = () => {
      created++;
      return new RecordingChecker();
    };

    expect(await runCli(['check'], terminal, create)).toBe(EXIT_USAGE);
    expect(await runCli([], terminal, create)).toBe(EXIT_USAGE);
    expect(terminal.err).toEqual([USAGE, USAGE]);
    expect(created).toBe(0);
  });

  it('reports the failing stage', async () => {
    const terminal = io();
    const checker = new RecordingChecker(new ExtractionFailure('Could not extract a verifiable claim from the input'));
    const code = await runCli(['check', 'hmm'], terminal, () => checker);

    expect(code).toBe(EXIT_FAILED);
    expect(terminal.err).toEqual(['Failed at Extracting: Could not extract a verifiable claim from the input']);
  });

  it('exits with the usage code on invalid input', async () => {
    const terminal = io();
    const checker = new RecordingChecker(new ValidationError('Claim text must be at most 2000 characters'));

    expect(await runCli(['check', 'long'], terminal, () => checker)).toBe(EXIT_USAGE);
    expect(terminal.err).toEqual(['Failed: Claim text must be at most 2000 characters']);
  });

  it('checks lines interactively until exit', async () => {
    const checker = new RecordingChecker();
    const terminal = io(['first claim', '', '  second claim  ', 'EXIT', 'never checked']);
    const code = await runCli(['interactive'], terminal, () => checker);

    expect(code).toBe(EXIT_OK);
    expect(checker.claims).toEqual(['first claim', 'second claim']);
    expect(terminal.out).toHaveLength(3);
  });
});
