// Port: Process Runner
// Interface for launching the program under test

import { InvocationResult, ProcessSpec } from '../types/types';

export interface ProcessRunnerPort {
  /**
   * Run a command once, resolving with its outcome; never rejects
   */
  run(spec: ProcessSpec): Promise<InvocationResult>;
}
