import { ProcessRunnerPort } from '../../domain/ports/processRunner';
import { LoggerPort } from '../../domain/ports/logger';
import { HarnessVerdict, ProcessSpec } from '../../domain/types/types';
import { inspectAnnouncements } from '../../domain/verification/announcementVerifier';
import { HarnessConfig } from '../../config/harnessConfig';

export type Verdict = 'Yes' | 'No';

export function verdictLine(verdict: HarnessVerdict): Verdict {
  return verdict.passed ? 'Yes' : 'No';
}

/**
 * Runs the program under test once and checks its roll call.
 * Checks are ordered: launch fault, timeout, non-zero exit, then the verifier.
 */
export class VerificationHarness {
  constructor(
    private runner: ProcessRunnerPort,
    private logger: LoggerPort,
    private config: HarnessConfig
  ) {}

  async run(): Promise<HarnessVerdict> {
    const spec: ProcessSpec = {
      command: this.config.command,
      args: this.config.args,
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
    };

    this.logger.logVerbose('Harness', 'Invoking program under test', {
      command: spec.command,
      args: spec.args,
      cwd: spec.cwd,
      timeout_ms: spec.timeoutMs,
    });

    const invocation = await this.runner.run(spec);

    if (invocation.status === 'launch_failed') {
      return this.fail({ passed: false, fault: 'LAUNCH_FAILED', detail: invocation.error });
    }

    if (invocation.status === 'timed_out') {
      return this.fail({
        passed: false,
        fault: 'TIMED_OUT',
        detail: `no exit within ${invocation.timeoutMs}ms`,
      });
    }

    this.logger.logPerformance('Invocation', invocation.durationMs, { exit_code: invocation.exitCode });

    if (invocation.exitCode !== 0) {
      const cause = invocation.signal ? `signal ${invocation.signal}` : `exit code ${invocation.exitCode}`;
      return this.fail({ passed: false, fault: 'NON_ZERO_EXIT', detail: cause });
    }

    return this.check(invocation.stdout);
  }

  /**
   * Verify already-captured output, skipping the invocation
   */
  check(output: string): HarnessVerdict {
    const report = inspectAnnouncements(output);
    if (report.valid) {
      this.logger.logVerbose('Harness', 'Roll call complete', { line_count: report.lineCount });
      return { passed: true };
    }

    let detail: string;
    switch (report.fault) {
      case 'LINE_COUNT_MISMATCH':
        detail = `expected ${report.expectedCount} announcements, got ${report.lineCount}`;
        break;
      case 'MALFORMED_LINE':
        detail = `malformed line: ${JSON.stringify(report.malformedLine)}`;
        break;
      default:
        detail = `missing [${report.missing.join(', ')}], unexpected [${report.unexpected.join(', ')}]`;
    }
    return this.fail({ passed: false, fault: report.fault, detail });
  }

  private fail(verdict: HarnessVerdict): HarnessVerdict {
    this.logger.log('Harness', `Verification failed: ${verdict.fault}`, verdict.detail);
    return verdict;
  }
}
