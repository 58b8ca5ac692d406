// Roll-call verifier - Main Entry Point
// Exports all public APIs

// Verification
export { verify, inspectAnnouncements, announcementLines } from './src/domain/verification/announcementVerifier';
export { REFERENCE_LABELS, ANNOUNCEMENT_PREFIX } from './src/domain/verification/referenceSet';
export { toMultiset, multisetEquals, multisetDifference } from './src/domain/verification/multiset';
export type { Multiset } from './src/domain/verification/multiset';

// Invocation
export { runProcess } from './src/infrastructure/connectors/os/executors/processRunner';
export { ProcessRunnerAdapter } from './src/infrastructure/adapters/os/processRunnerAdapter';
export type { ProcessRunnerPort } from './src/domain/ports/processRunner';

// Harness
export { VerificationHarness, verdictLine } from './src/application/services/harness';
export type { Verdict } from './src/application/services/harness';

// Configuration
export { loadConfig, loadConfigFromEnvironment, DEFAULT_COMMAND, DEFAULT_ARGS, DEFAULT_TIMEOUT_MS } from './src/config/harnessConfig';
export type { HarnessConfig } from './src/config/harnessConfig';

// Logging
export { LoggerAdapter } from './src/infrastructure/adapters/logging/loggerAdapter';
export { setVerboseLogging } from './src/infrastructure/adapters/logging/logger';
export type { LoggerPort } from './src/domain/ports/logger';

// Types
export type {
  ProcessSpec,
  InvocationResult,
  CompletedInvocation,
  TimedOutInvocation,
  FailedLaunch,
  AnnouncementReport,
  HarnessFault,
  VerificationFault,
  HarnessVerdict,
} from './src/domain/types/types';
