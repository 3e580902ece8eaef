import { execFile } from 'child_process';
import { join } from 'path';
import { promisify } from 'util';
import { WorkspaceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

export interface InterpreterInfo {
  /** Absolute path reported by the interpreter itself */
  executable: string;
  version: string;
}

export interface VenvLayout {
  root: string;
  pythonExecutable: string;
  sitePackages: string;
}

/**
 * The few things the workspace needs from a Python installation.
 */
export interface PythonToolchain {
  describeInterpreter(python: string): Promise<InterpreterInfo>;
  createVenv(python: string, dir: string): Promise<VenvLayout>;
  installTooling(venv: VenvLayout, specs: string[]): Promise<void>;
  installerVersion(venv: VenvLayout): Promise<string>;
}

export function defaultPythonCommand(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'python' : 'python3';
}

export function venvPythonPath(dir: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? join(dir, 'Scripts', 'python.exe') : join(dir, 'bin', 'python');
}

const DESCRIBE_SCRIPT = 'import sys; print(sys.executable); print(sys.version.split()[0])';
const PURELIB_SCRIPT = "import sysconfig; print(sysconfig.get_paths()['purelib'])";

async function runPython(executable: string, args: string[]): Promise<string> {
  try {
    const { stdout } = await execFileAsync(executable, args, { windowsHide: true });
    return stdout.toString().trim();
  } catch (error: unknown) {
    const stderr = typeof error === 'object' && error !== null && 'stderr' in error ? String(error.stderr).trim() : '';
    const message = stderr || (error instanceof Error ? error.message : String(error));
    throw new WorkspaceError(`Command '${executable} ${args.join(' ')}' failed: ${message}`, { executable, args });
  }
}

/**
 * Toolchain backed by a real interpreter on this machine.
 */
export class SystemPythonToolchain implements PythonToolchain {
  async describeInterpreter(python: string): Promise<InterpreterInfo> {
    const [executable = python, version = ''] = (await runPython(python, ['-c', DESCRIBE_SCRIPT])).split(/\r?\n/);
    return { executable: executable.trim(), version: version.trim() };
  }

  async createVenv(python: string, dir: string): Promise<VenvLayout> {
    logger.info(`Creating workspace environment in ${dir}`);
    await runPython(python, ['-m', 'venv', dir]);
    const pythonExecutable = venvPythonPath(dir);
    const sitePackages = await runPython(pythonExecutable, ['-I', '-c', PURELIB_SCRIPT]);
    return { root: dir, pythonExecutable, sitePackages };
  }

  async installTooling(venv: VenvLayout, specs: string[]): Promise<void> {
    logger.info(`Installing ${specs.join(', ')} into the workspace`);
    await runPython(venv.pythonExecutable, [
      '-I', '-m', 'pip', '--disable-pip-version-check',
      'install', '--no-warn-script-location', '--upgrade', ...specs
    ]);
  }

  async installerVersion(venv: VenvLayout): Promise<string> {
    const output = await runPython(venv.pythonExecutable, ['-I', '-m', 'pip', '--version']);
    const match = /^pip\s+(\S+)/.exec(output);
    if (!match) {
      throw new WorkspaceError(`Unexpected pip version output: ${output}`);
    }
    return match[1];
  }
}
