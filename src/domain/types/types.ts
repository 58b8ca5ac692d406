// Core types for the roll-call harness

export interface ProcessSpec {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface CompletedInvocation {
  status: 'completed';
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface TimedOutInvocation {
  status: 'timed_out';
  timeoutMs: number;
  durationMs: number;
}

export interface FailedLaunch {
  status: 'launch_failed';
  error: string;
}

export type InvocationResult = CompletedInvocation | TimedOutInvocation | FailedLaunch;

export type VerificationFault =
  | 'LINE_COUNT_MISMATCH'
  | 'MALFORMED_LINE'
  | 'LABEL_MISMATCH';

export type HarnessFault =
  | 'LAUNCH_FAILED'
  | 'TIMED_OUT'
  | 'NON_ZERO_EXIT'
  | VerificationFault;

export interface AnnouncementReport {
  valid: boolean;
  fault?: VerificationFault;
  lineCount: number;
  expectedCount: number;
  missing: string[];
  unexpected: string[];
  malformedLine?: string;
}

export interface HarnessVerdict {
  passed: boolean;
  fault?: HarnessFault;
  detail?: string;
}
