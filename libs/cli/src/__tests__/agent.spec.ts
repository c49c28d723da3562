/**
 * CLI with a running agent
 *
 * Starts an agent in process on the runtime dir the CLI looks in, then
 * checks which commands reach it and when they fall back to the password.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AuditLogger, ShrineAgent, loadAgentConfig } from '@shrine/agent';
import { noVersionControl } from '@shrine/storage';
import { createShell } from './helpers';
import type { TestShell } from './helpers';

const PASSWORD = 'password';

describe('shrine CLI with an agent', () => {
  let tmpDir: string;
  let shell: TestShell;
  let agent: ShrineAgent;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shrine-cli-agent-'));
    const folder = path.join(tmpDir, 'vault');
    fs.mkdirSync(folder);
    shell = createShell(folder, path.join(tmpDir, 'run'));

    await shell.run('--password', PASSWORD, 'init');
    await shell.run('--password', PASSWORD, 'set', 'secret', 'password123');

    const config = loadAgentConfig(path.join(folder, 'shrine'), {}, shell.env);
    agent = new ShrineAgent({
      config,
      vcs: noVersionControl,
      auditLogger: new AuditLogger({ logPath: config.logPath, logLevel: 'error', console: false }),
    });
    await agent.start();
  });

  afterEach(async () => {
    await agent.stop();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reports a locked agent', async () => {
    const status = await shell.run('agent', 'status');
    expect(status.stdout).toBe(`Running: true\nPID:     ${process.pid}\nState:   locked\n`);
  });

  it('serves get, set and ls without a password once unlocked', async () => {
    const unlock = await shell.run('--password', PASSWORD, 'agent', 'unlock');
    expect(unlock.code).toBe(0);
    expect(unlock.stdout).toMatch(/^Unlocked until \d{4}-\d{2}-\d{2}T/);

    expect(await shell.run('get', 'secret')).toEqual({ code: 0, stdout: 'password123', stderr: '' });
    expect((await shell.run('set', 'other', 'value')).code).toBe(0);
    expect((await shell.run('ls')).stdout.split('\n')[0]).toBe('total 2');
    expect(shell.prompts).toEqual([]);
  });

  it('falls back to the password when the agent is locked', async () => {
    shell.answers.push(PASSWORD);

    expect(await shell.run('get', 'secret')).toEqual({ code: 0, stdout: 'password123', stderr: '' });
    expect(shell.prompts).toEqual(['Password: ']);
  });

  it('falls back to the password after lock', async () => {
    await shell.run('--password', PASSWORD, 'agent', 'unlock');
    expect((await shell.run('agent', 'lock')).stdout).toBe('Locked\n');
    shell.answers.push(PASSWORD);

    expect((await shell.run('get', 'secret')).stdout).toBe('password123');
    expect(shell.prompts).toEqual(['Password: ']);
  });

  it('rejects a wrong password at unlock', async () => {
    const result = await shell.run('--password', 'wrong', 'agent', 'unlock');
    expect(result).toEqual({ code: 3, stdout: '', stderr: 'error: Invalid password or corrupted shrine\n' });
  });

  it('locks the agent when the password changes', async () => {
    await shell.run('--password', PASSWORD, 'agent', 'unlock');

    await shell.run('--password', PASSWORD, 'convert', '--new-password', 'password2');

    expect(agent.sessions.state).toBe('locked');
    shell.answers.push('password2');
    expect((await shell.run('get', 'secret')).stdout).toBe('password123');
  });

  it('stops the agent', async () => {
    expect((await shell.run('agent', 'stop')).stdout).toBe('Agent stopped\n');
    await agent.stopped;

    expect((await shell.run('agent', 'status')).stdout).toBe('Running: false\n');
  });
});
