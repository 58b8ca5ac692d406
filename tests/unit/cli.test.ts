import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { runCheck, verifyCaptured } from '../../src/cli';
import { HarnessConfig } from '@/config/harnessConfig';
import { ProcessSpec, InvocationResult } from '@/domain/types/types';
import { ProcessRunnerMock } from '@mocks/infrastructure/executor/process-runner.mock';
import { rollCall, withoutLabel } from '../helpers/announcement-builders';

describe('CLI', () => {
  const config: HarnessConfig = {
    command: 'go',
    args: ['run', 'voluspa.go'],
    cwd: '/work',
    timeoutMs: 10000,
    verbose: false,
  };

  describe('runCheck', () => {
    it('should answer Yes for a complete roll call', async () => {
      const runner = new ProcessRunnerMock();
      runner.setCompleted(rollCall());

      expect(await runCheck(config, runner)).toBe('Yes');
    });

    it('should answer No for an incomplete roll call', async () => {
      const runner = new ProcessRunnerMock();
      runner.setCompleted(rollCall(withoutLabel('Þrainn')));

      expect(await runCheck(config, runner)).toBe('No');
    });

    it('should answer No when the runner itself rejects', async () => {
      const runner = {
        run: async (_spec: ProcessSpec): Promise<InvocationResult> => {
          throw new Error('runner crashed');
        },
      };

      expect(await runCheck(config, runner)).toBe('No');
    });
  });

  describe('verifyCaptured', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rollcall-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should answer Yes for a captured complete roll call', async () => {
      const file = path.join(dir, 'output.txt');
      await fs.writeFile(file, rollCall(), 'utf8');

      expect(await verifyCaptured(config, file)).toBe('Yes');
    });

    it('should answer No for a captured incomplete roll call', async () => {
      const file = path.join(dir, 'output.txt');
      await fs.writeFile(file, rollCall(withoutLabel('Bömburr')), 'utf8');

      expect(await verifyCaptured(config, file)).toBe('No');
    });

    it('should answer No when the file cannot be read', async () => {
      expect(await verifyCaptured(config, path.join(dir, 'missing.txt'))).toBe('No');
    });
  });
});
