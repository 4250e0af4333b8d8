jest.mock('child_process', () => ({
  spawn: jest.fn()
}));

import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { createExecCommand } from './exec-command';

const mockSpawn = jest.mocked(spawn);

class FakeProcess extends EventEmitter {
  stdout: EventEmitter | null = new EventEmitter();
  stderr: EventEmitter | null = new EventEmitter();
}

function useFakeProcess(): FakeProcess {
  const proc = new FakeProcess();
  mockSpawn.mockReturnValue(proc as unknown as ChildProcess);
  return proc;
}

describe('createExecCommand', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('[EX-A1] should collect piped output and the exit code', async () => {
    const proc = useFakeProcess();
    const exec = createExecCommand(() => '/default');

    const pending = exec('git', ['commit', '-m', 'msg'], { cwd: '/repo', stdio: 'pipe' });
    proc.stdout?.emit('data', Buffer.from('nothing to commit'));
    proc.stderr?.emit('data', Buffer.from('warn'));
    proc.emit('close', 1);

    await expect(pending).resolves.toEqual({ exitCode: 1, stdout: 'nothing to commit', stderr: 'warn' });
    expect(mockSpawn).toHaveBeenCalledWith('git', ['commit', '-m', 'msg'], expect.objectContaining({
      cwd: '/repo',
      stdio: 'pipe',
    }));
  });

  it('[EX-A2] should inherit stdio and fall back to the default cwd', async () => {
    const proc = useFakeProcess();
    proc.stdout = null;
    proc.stderr = null;
    const exec = createExecCommand(() => '/default');

    const pending = exec('git', ['push', '-u', 'origin', 'master'], { stdio: 'inherit' });
    proc.emit('close', 0);

    await expect(pending).resolves.toEqual({ exitCode: 0, stdout: '', stderr: '' });
    expect(mockSpawn).toHaveBeenCalledWith('git', ['push', '-u', 'origin', 'master'], expect.objectContaining({
      cwd: '/default',
      stdio: 'inherit',
    }));
    expect(mockSpawn.mock.calls[0]?.[2]).not.toHaveProperty('timeout');
  });

  it('[EX-A3] should treat a signal-terminated process as failed', async () => {
    const proc = useFakeProcess();
    const exec = createExecCommand();

    const pending = exec('git', ['add', '-A']);
    proc.emit('close', null);

    await expect(pending).resolves.toEqual({ exitCode: 1, stdout: '', stderr: '' });
  });

  it('[EX-A4] should resolve spawn errors as exit code 1 with the error text', async () => {
    const proc = useFakeProcess();
    const exec = createExecCommand();

    const pending = exec('git', ['status']);
    proc.emit('error', new Error('spawn git ENOENT'));

    await expect(pending).resolves.toEqual({ exitCode: 1, stdout: '', stderr: 'spawn git ENOENT' });
  });
});
