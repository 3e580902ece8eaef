import { execFile } from 'child_process';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, posix } from 'path';
import { promisify } from 'util';
import { FILE_PATTERNS } from '../../constants/index.js';
import { CompilationFailureError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { RuntimeInfo } from '../target/target-adapter.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_COMPILER_COMMAND = 'mpy-cross';

/**
 * Turns a source file into the bytes that go onto the target instead.
 */
export interface SourceCompiler {
  /** Whether `path` should go through the compiler at all */
  accepts(path: string): boolean;
  /** Path of the compiled file on the target */
  outputPath(path: string): string;
  /** Throws CompilationFailureError */
  compile(source: Uint8Array, path: string): Promise<Uint8Array>;
}

/**
 * Compiler executable for a runtime, looked up by its `major.minor` version.
 */
export function selectCompilerCommand(compilers: Record<string, string> | undefined, runtime: RuntimeInfo): string {
  const match = runtime.version?.match(/^(\d+)\.(\d+)/);
  if (match && compilers) {
    const command = compilers[`${match[1]}.${match[2]}`];
    if (command) {
      return command;
    }
  }
  return DEFAULT_COMPILER_COMMAND;
}

export function compiledPath(path: string): string {
  return path.slice(0, -FILE_PATTERNS.PY_FILES.length) + FILE_PATTERNS.MPY_FILES;
}

export class MpyCrossCompiler implements SourceCompiler {
  constructor(private readonly command: string = DEFAULT_COMPILER_COMMAND, private readonly extraArgs: string[] = []) {}

  static forRuntime(runtime: RuntimeInfo, compilers?: Record<string, string>): MpyCrossCompiler {
    const command = selectCompilerCommand(compilers, runtime);
    if (runtime.mpyVersion !== null) {
      logger.info(`Compiling with ${command} for ${runtime.implementation ?? 'runtime'} ${runtime.version ?? '?'} (mpy v${runtime.mpyVersion})`);
    } else {
      logger.debug(`Compiling with ${command}`);
    }
    return new MpyCrossCompiler(command);
  }

  accepts(path: string): boolean {
    return path.endsWith(FILE_PATTERNS.PY_FILES);
  }

  outputPath(path: string): string {
    return compiledPath(path);
  }

  async compile(source: Uint8Array, path: string): Promise<Uint8Array> {
    const tempDir = await mkdtemp(join(tmpdir(), 'pipbridge-mpy-'));
    try {
      const input = join(tempDir, posix.basename(path));
      const output = compiledPath(input);
      await writeFile(input, source);
      try {
        await execFileAsync(this.command, [...this.extraArgs, '-s', path, '-o', output, input]);
      } catch (error) {
        throw new CompilationFailureError(path, commandFailure(error));
      }
      return new Uint8Array(await readFile(output));
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}

function commandFailure(error: unknown): string {
  if (error instanceof Error && 'stderr' in error) {
    const stderr = String(error.stderr).trim();
    if (stderr) {
      return stderr;
    }
  }
  return describeError(error);
}
