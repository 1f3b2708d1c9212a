import { spawn, type ChildProcess } from 'child_process';
import { existsSync } from 'fs';
import { join } from 'path';
import { createInterface } from 'readline';

import { ServiceLogger } from '../utils/logger';

export interface LaunchCommand {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LaunchedProcess {
  readonly pid: number | undefined;
  isAlive(): boolean;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  kill(): void;
}

export interface ProcessLauncher {
  launch(command: LaunchCommand): LaunchedProcess;
}

/** Spawns the daemon and forwards its output to the logger line by line. */
export class ChildProcessLauncher implements ProcessLauncher {
  constructor(private readonly logger: ServiceLogger) {}

  launch(command: LaunchCommand): LaunchedProcess {
    const child = spawn(command.command, command.args, {
      env: command.env,
      cwd: command.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    const output = this.logger.child({ component: 'localService', pid: child.pid });
    if (child.stdout) {
      createInterface({ input: child.stdout }).on('line', (line) => output.debug(line));
    }
    if (child.stderr) {
      createInterface({ input: child.stderr }).on('line', (line) => output.debug(line, { stream: 'stderr' }));
    }
    child.on('error', (error) => output.error('Local service process error.', error));

    return new SpawnedProcess(child);
  }
}

class SpawnedProcess implements LaunchedProcess {
  private exited = false;

  constructor(private readonly child: ChildProcess) {
    child.once('exit', () => {
      this.exited = true;
    });
    child.once('error', () => {
      this.exited = true;
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.exited && this.child.exitCode === null && this.child.signalCode === null;
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    if (!this.isAlive()) {
      listener(this.child.exitCode, this.child.signalCode);
      return;
    }
    this.child.once('exit', listener);
  }

  kill(): void {
    if (this.isAlive()) {
      this.child.kill();
    }
  }
}

/**
 * Command that runs the bundled daemon with the current Node binary. From
 * sources the loader flags in `execArgv` (e.g. `--import tsx`) carry over.
 */
export function defaultDaemonCommand(env: NodeJS.ProcessEnv): LaunchCommand {
  const extension = __filename.endsWith('.ts') ? '.ts' : '.js';
  const entry = join(__dirname, '..', 'local', `main${extension}`);
  return {
    command: process.execPath,
    args: [...process.execArgv, entry, 'serve'],
    env,
    cwd: existsSync(entry) ? join(__dirname, '..', 'local') : undefined,
  };
}
