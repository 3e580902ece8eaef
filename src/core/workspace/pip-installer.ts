import { spawn } from 'child_process';
import { logger } from '../../utils/logger.js';
import type { VenvLayout } from './python-toolchain.js';

/**
 * The external installer seen as a black box: arguments in, exit status out.
 */
export interface Installer {
  run(args: string[], env: NodeJS.ProcessEnv): Promise<InstallerResult>;
}

export interface InstallerResult {
  exitCode: number;
  /** Last part of what the installer wrote to stderr */
  stderr: string;
}

export const PROXY_HOST = '127.0.0.1';

const STDERR_TAIL_CHARS = 2000;

/**
 * Runs pip from the workspace venv, echoing its output and keeping the end of stderr.
 */
export class PipInstaller implements Installer {
  constructor(
    private readonly venv: VenvLayout,
    private readonly echo: boolean = true
  ) {}

  run(args: string[], env: NodeJS.ProcessEnv): Promise<InstallerResult> {
    const fullArgs = ['-I', '-m', 'pip', '--disable-pip-version-check', '--trusted-host', PROXY_HOST, ...args];
    logger.debug(`Running ${this.venv.pythonExecutable} ${fullArgs.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.venv.pythonExecutable, fullArgs, { env, windowsHide: true, stdio: ['ignore', 'pipe', 'pipe'] });
      let stderr = '';

      child.stdout.on('data', (chunk: Buffer) => {
        if (this.echo) process.stdout.write(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr = tail(stderr + chunk.toString('utf8'));
        if (this.echo) process.stderr.write(chunk);
      });

      child.on('error', reject);
      child.on('close', (code, signal) => {
        if (signal) {
          logger.debug(`pip terminated by ${signal}`);
        }
        resolve({ exitCode: code ?? 1, stderr });
      });
    });
  }
}

function tail(text: string, limit: number = STDERR_TAIL_CHARS): string {
  return text.length > limit ? text.slice(text.length - limit) : text;
}
