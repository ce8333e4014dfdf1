/**
 * Child Process Helpers
 *
 * Spawning, output piping and process-tree termination for plugin workers
 * and health probes. On POSIX every child gets its own process group so the
 * whole tree can be killed with one signal; on Windows taskkill /T does it.
 */

import { spawn, ChildProcess } from 'child_process';
import * as readline from 'readline';
import type { Logger } from 'pino';
import { errorMessage } from '../logger';

export interface LaunchSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  exitCode: number | null;
  timedOut: boolean;
  error?: string;
}

const USE_PROCESS_GROUP = process.platform !== 'win32';

export function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/**
 * Spawn a long-running child. Resolves once the OS has started it and
 * rejects with the spawn error (missing executable, bad cwd) otherwise.
 */
export function spawnChild(launch: LaunchSpec): Promise<ChildProcess> {
  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(launch.command, launch.args, {
        cwd: launch.cwd,
        env: launch.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: USE_PROCESS_GROUP,
        windowsHide: true,
      });
    } catch (err) {
      reject(err);
      return;
    }

    const onError = (err: Error): void => {
      child.off('spawn', onSpawn);
      reject(err);
    };
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve(child);
    };
    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}

/** Forward child stdout lines at info and stderr lines at warn */
export function pipeOutput(child: ChildProcess, log: Logger): void {
  if (child.stdout) {
    readline.createInterface({ input: child.stdout }).on('line', (line: string) => {
      if (line) log.info({ stream: 'stdout' }, line);
    });
  }
  if (child.stderr) {
    readline.createInterface({ input: child.stderr }).on('line', (line: string) => {
      if (line) log.warn({ stream: 'stderr' }, line);
    });
  }
}

/** Resolve true once the child has exited, false if timeoutMs passes first */
export function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (!isRunning(child)) return Promise.resolve(true);
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      child.off('exit', onExit);
      resolve(false);
    }, timeoutMs);
    const onExit = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    child.once('exit', onExit);
  });
}

/** Forcibly terminate a child and everything it started */
export async function killTree(child: ChildProcess): Promise<void> {
  const pid = child.pid;
  if (pid === undefined || !isRunning(child)) return;

  if (process.platform === 'win32') {
    const result = await runCommand({ command: 'taskkill', args: ['/pid', String(pid), '/T', '/F'] }, 10_000);
    if (result.exitCode !== 0 && isRunning(child)) {
      child.kill('SIGKILL');
    }
    return;
  }

  try {
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    if (!isNoSuchProcess(err)) throw err;
    child.kill('SIGKILL');
  }
}

/**
 * Run a command to completion with a timeout. On timeout the process tree is
 * killed and the result is marked timedOut. Spawn errors are reported in
 * the result, never thrown.
 */
export function runCommand(launch: LaunchSpec, timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(launch.command, launch.args, {
        cwd: launch.cwd,
        env: launch.env,
        stdio: 'ignore',
        detached: USE_PROCESS_GROUP,
        windowsHide: true,
      });
    } catch (err) {
      resolve({ exitCode: null, timedOut: false, error: errorMessage(err) });
      return;
    }

    let settled = false;
    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(result);
    };

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child).catch((err: unknown) => {
        finish({ exitCode: null, timedOut: true, error: errorMessage(err) });
      });
    }, timeoutMs);

    child.once('error', (err: Error) => finish({ exitCode: null, timedOut, error: err.message }));
    child.once('exit', (code: number | null) => {
      finish({ exitCode: timedOut ? null : code, timedOut });
    });
  });
}

function isNoSuchProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}
