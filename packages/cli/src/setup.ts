import { InvalidArgumentError } from 'commander';
import * as readline from 'node:readline';
import { Writable } from 'node:stream';
import { InsightsError } from '@insights/shared';
import { InsightsAgent, type ConfigOverrides } from '@insights/core';

export interface GlobalOptions {
  config?: string;
}

export async function createAgent(options: GlobalOptions, overrides?: ConfigOverrides): Promise<InsightsAgent> {
  return InsightsAgent.create({
    configPath: options.config,
    overrides,
    onTraceWriteError: (err, traceId) => {
      console.error(`[warn] could not write trace ${traceId}: ${err.message}`);
    },
  });
}

/**
 * Runs a command body against a fresh agent. Failures print a single
 * `Error:` line and set a non-zero exit code; the stores are always closed.
 */
export async function withAgent(
  options: GlobalOptions,
  body: (agent: InsightsAgent) => Promise<void> | void,
  overrides?: ConfigOverrides,
): Promise<void> {
  let agent: InsightsAgent | undefined;
  try {
    agent = await createAgent(options, overrides);
    await body(agent);
  } catch (err) {
    reportError(err);
    process.exitCode = 1;
  } finally {
    agent?.shutdown();
  }
}

export function reportError(err: unknown): void {
  if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
    // Unexpected failures keep their stack for debugging
    if (!(err instanceof InsightsError) && process.env.INSIGHTS_DEBUG) console.error(err.stack);
  } else {
    console.error(`Error: ${String(err)}`);
  }
}

class MutableStdout extends Writable {
  muted = false;

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) process.stdout.write(chunk);
    callback();
  }
}

/** Reads one line from stdin. With `muted`, typed characters are not echoed. */
export function ask(question: string, options: { muted?: boolean } = {}): Promise<string> {
  const output = new MutableStdout();
  const rl = readline.createInterface({
    input: process.stdin,
    output,
    terminal: process.stdin.isTTY === true,
  });
  output.write(question);
  output.muted = options.muted === true;

  return new Promise((resolve, reject) => {
    const onClose = (): void => reject(new InsightsError('Input closed before an answer was given'));
    rl.once('close', onClose);
    rl.question('', (answer) => {
      rl.off('close', onClose);
      rl.close();
      if (options.muted) process.stdout.write('\n');
      resolve(answer);
    });
  });
}

export function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

export function parseScore(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new InvalidArgumentError('Expected a number.');
  }
  return n;
}
