#!/usr/bin/env node
// Roll-call CLI Entrypoint
// Prints exactly one line on stdout: Yes or No
// Every fault collapses to No; logs go to stderr

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { HarnessConfig, loadConfigFromEnvironment } from './config/harnessConfig';
import { VerificationHarness, Verdict, verdictLine } from './application/services/harness';
import { ProcessRunnerAdapter } from './infrastructure/adapters/os/processRunnerAdapter';
import { LoggerAdapter } from './infrastructure/adapters/logging/loggerAdapter';
import { logError, setVerboseLogging } from './infrastructure/adapters/logging/logger';
import { ProcessRunnerPort } from './domain/ports/processRunner';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Run the configured program and verify its roll call
 */
async function runCheck(
  config: HarnessConfig,
  runner: ProcessRunnerPort = new ProcessRunnerAdapter()
): Promise<Verdict> {
  try {
    const harness = new VerificationHarness(runner, new LoggerAdapter(), config);
    return verdictLine(await harness.run());
  } catch (error) {
    logError('CLI', 'Unexpected failure while running the harness', error);
    return 'No';
  }
}

/**
 * Verify captured output from a file, or stdin when no file is given
 */
async function verifyCaptured(config: HarnessConfig, file?: string): Promise<Verdict> {
  let output: string;
  try {
    output = file ? await fs.readFile(file, 'utf8') : await readStdin();
  } catch (error) {
    logError('CLI', `Could not read captured output${file ? ` from ${file}` : ''}`, error);
    return 'No';
  }
  const harness = new VerificationHarness(new ProcessRunnerAdapter(), new LoggerAdapter(), config);
  return verdictLine(harness.check(output));
}

function printVerdict(verdict: Verdict): void {
  process.stdout.write(`${verdict}\n`);
}

function resolveConfig(program: Command): HarnessConfig {
  const config = loadConfigFromEnvironment();
  const opts = program.opts<{ verbose?: boolean }>();
  if (opts.verbose) {
    config.verbose = true;
  }
  setVerboseLogging(config.verbose);
  return config;
}

const program = new Command();

program
  .name('rollcall')
  .description('Run the roll-call program and check that every name is announced exactly once')
  .option('--verbose', 'Log verbose and timing details to stderr');

program
  .command('run', { isDefault: true })
  .description('Run the configured program and print Yes or No')
  .action(async () => {
    printVerdict(await runCheck(resolveConfig(program)));
  });

program
  .command('verify [file]')
  .description('Verify already-captured output from a file (or stdin) and print Yes or No')
  .action(async (file: string | undefined) => {
    printVerdict(await verifyCaptured(resolveConfig(program), file));
  });

// Only parse if this file is being run directly (not imported)
if (require.main === module) {
  program.parseAsync().catch((error: unknown) => {
    logError('CLI', 'Command failed', error);
    printVerdict('No');
  });
}

export { runCheck, verifyCaptured, program };
