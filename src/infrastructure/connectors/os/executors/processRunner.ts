// Process Runner - Launch the program under test and capture its output
// Faults are returned as values, never thrown; no retries

import { ChildProcess, spawn } from 'child_process';
import { StringDecoder } from 'string_decoder';
import { InvocationResult, ProcessSpec } from '../../../../domain/types/types';
import { log as logShared, logVerbose, logPerformance } from '../../../adapters/logging/logger';

function log(message: string, ...args: unknown[]): void {
  logShared('ProcessRunner', message, ...args);
}

/**
 * Run a command to completion or until the timeout fires.
 * stdout and stderr are decoded as UTF-8; a multi-byte character split
 * across chunks is held back until its remaining bytes arrive.
 */
export function runProcess(spec: ProcessSpec): Promise<InvocationResult> {
  const startTime = Date.now();
  logVerbose('ProcessRunner', 'Launching process', {
    command: spec.command,
    args: spec.args,
    cwd: spec.cwd,
    timeout_ms: spec.timeoutMs,
  });

  return new Promise<InvocationResult>(resolve => {
    let settled = false;
    const settle = (result: InvocationResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      logPerformance('RunProcess', Date.now() - startTime, { status: result.status });
      resolve(result);
    };

    let childProcess: ChildProcess;
    try {
      childProcess = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: spec.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log(`Failed to launch ${spec.command}: ${message}`);
      settled = true;
      resolve({ status: 'launch_failed', error: message });
      return;
    }

    const stdoutDecoder = new StringDecoder('utf8');
    const stderrDecoder = new StringDecoder('utf8');
    let stdout = '';
    let stderr = '';

    const timer = setTimeout(() => {
      log(`Process exceeded ${spec.timeoutMs}ms, killing`);
      childProcess.kill('SIGKILL');
      // Grandchildren (e.g. the binary behind `go run`) inherit the pipes and may outlive the kill
      childProcess.stdout?.destroy();
      childProcess.stderr?.destroy();
      settle({ status: 'timed_out', timeoutMs: spec.timeoutMs, durationMs: Date.now() - startTime });
    }, spec.timeoutMs);

    childProcess.stdout?.on('data', (data: Buffer) => {
      stdout += stdoutDecoder.write(data);
    });

    childProcess.stderr?.on('data', (data: Buffer) => {
      stderr += stderrDecoder.write(data);
    });

    childProcess.on('error', (error: Error) => {
      log(`Process error: ${error.message}`);
      settle({ status: 'launch_failed', error: error.message });
    });

    childProcess.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      stdout += stdoutDecoder.end();
      stderr += stderrDecoder.end();
      const durationMs = Date.now() - startTime;
      logVerbose('ProcessRunner', 'Process exited', {
        exit_code: code,
        signal,
        duration_ms: durationMs,
        stdout_length: stdout.length,
        stderr_length: stderr.length,
      });
      settle({ status: 'completed', exitCode: code, signal, stdout, stderr, durationMs });
    });
  });
}
