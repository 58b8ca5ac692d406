import { ProcessRunnerPort } from '../../../domain/ports/processRunner';
import { runProcess } from '../../connectors/os/executors/processRunner';
import { InvocationResult, ProcessSpec } from '../../../domain/types/types';

export class ProcessRunnerAdapter implements ProcessRunnerPort {
  async run(spec: ProcessSpec): Promise<InvocationResult> {
    return runProcess(spec);
  }
}
