import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { StoreLockedError, ToolExecutionError, ToolNotFoundError } from './errors.js';
import { runTool } from './invoker.js';

describe('runTool', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rbw-lookup-invoker-test-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function script(name: string, body: string[]): Promise<string> {
    const file = path.join(tmpDir, name);
    await fs.writeFile(file, ['#!/usr/bin/env bash', ...body, ''].join('\n'), { encoding: 'utf8' });
    await fs.chmod(file, 0o755);
    return file;
  }

  it('captures stdout as bytes on success', async () => {
    const tool = await script('ok', ["printf 'p@ss\\n'"]);
    const out = await runTool(tool, 'get', ['id001']);
    expect(out.exitCode).toBe(0);
    expect(Buffer.isBuffer(out.stdout)).toBe(true);
    expect(out.stdout.toString('utf8')).toBe('p@ss\n');
  });

  it('passes subcommand and arguments verbatim without a shell', async () => {
    const tool = await script('echo-args', ['for a in "$@"; do printf \'[%s]\\n\' "$a"; done']);
    const tricky = 'name with $HOME; echo pwned | cat && `id` "quoted"';
    const out = await runTool(tool, 'get', ['--raw', tricky, '']);
    expect(out.stdout.toString('utf8')).toBe(`[get]\n[--raw]\n[${tricky}]\n[]\n`);
  });

  it('raises StoreLockedError when stderr says the store is locked', async () => {
    const tool = await script('locked', ["echo 'Error: agent is locked' >&2", 'exit 2']);
    const err = await runTool(tool, 'list', []).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreLockedError);
    expect(err).not.toBeInstanceOf(ToolExecutionError);
    expect((err as StoreLockedError).stderr).toBe('Error: agent is locked\n');
  });

  it('matches locked markers case-insensitively', async () => {
    const tool = await script('locked-upper', ["echo 'VAULT LOCKED' >&2", 'exit 1']);
    await expect(runTool(tool, 'list', [])).rejects.toBeInstanceOf(StoreLockedError);
  });

  it('uses the configured locked markers', async () => {
    const sealed = await script('sealed', ["echo 'vault is sealed' >&2", 'exit 1']);
    await expect(
      runTool(sealed, 'list', [], { lockedMarkers: ['sealed'] }),
    ).rejects.toBeInstanceOf(StoreLockedError);

    const locked = await script('locked', ["echo 'agent is locked' >&2", 'exit 1']);
    await expect(
      runTool(locked, 'list', [], { lockedMarkers: ['sealed'] }),
    ).rejects.toBeInstanceOf(ToolExecutionError);
  });

  it('raises ToolExecutionError with exit code and stderr for other failures', async () => {
    const tool = await script('boom', ["echo 'rbw get: no entry found' >&2", 'exit 3']);
    const err = await runTool(tool, 'get', ['id404']).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    const execErr = err as ToolExecutionError;
    expect(execErr.exitCode).toBe(3);
    expect(execErr.stderr).toBe('rbw get: no entry found\n');
    expect(execErr.message).toBe(`${tool} get failed (code 3): rbw get: no entry found`);
  });

  it('does not treat a locked marker on stdout as a lock', async () => {
    const tool = await script('stdout-locked', ["echo 'locked'", 'exit 4']);
    await expect(runTool(tool, 'get', ['x'])).rejects.toBeInstanceOf(ToolExecutionError);
  });

  it('ignores stderr when the exit code is zero', async () => {
    const tool = await script('warns', ["echo 'warning: locked soon' >&2", "printf 'ok'"]);
    const out = await runTool(tool, 'list', []);
    expect(out.stdout.toString('utf8')).toBe('ok');
    expect(out.stderr).toBe('warning: locked soon\n');
  });

  it('raises ToolExecutionError when the tool is killed by a signal', async () => {
    const tool = await script('killed', ['kill -KILL $$']);
    const err = await runTool(tool, 'list', []).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect((err as ToolExecutionError).exitCode).toBeNull();
    expect((err as ToolExecutionError).message).toBe(`${tool} list was terminated by signal SIGKILL`);
  });

  it('raises ToolNotFoundError when the executable does not exist', async () => {
    const missing = path.join(tmpDir, 'no-such-rbw');
    const err = await runTool(missing, 'list', []).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolNotFoundError);
    expect((err as ToolNotFoundError).cliPath).toBe(missing);
  });
});
