import { join } from 'path';
import { DIR_PATTERNS, FILE_PATTERNS, INSTALLER_DEFAULTS, WORKSPACE_TOOLING } from '../../constants/index.js';
import { calculateCacheKey } from '../../utils/hash-utils.js';
import { WorkspaceError, describeError } from '../../utils/errors.js';
import { ensureDir, exists, listDirectories, readJsoncFile, remove, writeJsoncFile } from '../../utils/fs.js';
import { isPlainObject } from '../../utils/guards.js';
import { logger } from '../../utils/logger.js';
import { normalizeDistName, parseMetaDirName } from '../../utils/package-name.js';
import { installerMajor } from '../../utils/version.js';
import { renderDistInfo } from '../dist/dist-scanner.js';
import type { TargetState } from '../dist/distribution.js';
import { DirectoryTargetAdapter } from '../target/directory-adapter.js';
import { isToolingDist } from '../target/target-adapter.js';
import { Installer, InstallerResult, PipInstaller } from './pip-installer.js';
import { defaultPythonCommand, InterpreterInfo, PythonToolchain, SystemPythonToolchain, VenvLayout } from './python-toolchain.js';
import { acquireWorkspaceLock, WorkspaceLock } from './workspace-lock.js';

export interface WorkspaceManagerOptions {
  /** Parent of all cached workspaces */
  workspacesDir: string;
  pipCacheDir: string;
  /** Base interpreter used to create the venv */
  python?: string;
  installerSpec?: string;
  wheelSpec?: string;
  toolchain?: PythonToolchain;
  createInstaller?: (venv: VenvLayout) => Installer;
}

/**
 * Contents of `workspace.json`.
 */
export interface WorkspaceMeta {
  installerVersion: string;
  pythonExecutable: string;
  pythonVersion: string;
  createdAt: string;
  venv: VenvLayout;
}

interface ActiveWorkspace {
  dir: string;
  venv: VenvLayout;
  lock: WorkspaceLock;
  installer: Installer;
  site: DirectoryTargetAdapter;
}

const TOOLING_FILES: readonly string[] = WORKSPACE_TOOLING.FILES;

/**
 * Whether a site-packages entry belongs to the workspace itself and survives `clear()`.
 */
export function isToolingEntry(entryName: string): boolean {
  if (TOOLING_FILES.includes(entryName) || entryName === DIR_PATTERNS.PYCACHE) {
    return true;
  }
  const meta = parseMetaDirName(entryName);
  return isToolingDist(meta ? meta.name : normalizeDistName(entryName));
}

/**
 * Environment for pip: no user PIP_* settings leak in, and downloads are cached with ours.
 */
export function installerEnvironment(env: NodeJS.ProcessEnv, pipCacheDir: string): NodeJS.ProcessEnv {
  const result: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.toUpperCase().startsWith('PIP_')) {
      result[key] = value;
    }
  }
  result.PIP_CACHE_DIR = pipCacheDir;
  return result;
}

function parseWorkspaceMeta(value: unknown): WorkspaceMeta | null {
  if (!isPlainObject(value)) {
    return null;
  }
  const { installerVersion, pythonExecutable, pythonVersion, createdAt } = value;
  const venv = value.venv;
  if (!isPlainObject(venv)) {
    return null;
  }
  if (
    typeof installerVersion !== 'string' ||
    typeof pythonExecutable !== 'string' ||
    typeof venv.root !== 'string' ||
    typeof venv.pythonExecutable !== 'string' ||
    typeof venv.sitePackages !== 'string'
  ) {
    return null;
  }
  return {
    installerVersion,
    pythonExecutable,
    pythonVersion: typeof pythonVersion === 'string' ? pythonVersion : '',
    createdAt: typeof createdAt === 'string' ? createdAt : '',
    venv: { root: venv.root, pythonExecutable: venv.pythonExecutable, sitePackages: venv.sitePackages }
  };
}

/**
 * Owns the cached pip environment for one session: creation, locking,
 * seeding with placeholders, running pip and scanning the result.
 */
export class WorkspaceManager {
  private readonly python: string;
  private readonly installerSpec: string;
  private readonly wheelSpec: string;
  private readonly toolchain: PythonToolchain;
  private readonly createInstaller: (venv: VenvLayout) => Installer;
  private active: ActiveWorkspace | null = null;

  constructor(private readonly options: WorkspaceManagerOptions) {
    this.python = options.python ?? defaultPythonCommand();
    this.installerSpec = options.installerSpec ?? INSTALLER_DEFAULTS.PIP_SPEC;
    this.wheelSpec = options.wheelSpec ?? INSTALLER_DEFAULTS.WHEEL_SPEC;
    this.toolchain = options.toolchain ?? new SystemPythonToolchain();
    this.createInstaller = options.createInstaller ?? (venv => new PipInstaller(venv));
  }

  /**
   * Create or reuse the cached venv and lock it for this session.
   */
  async prepare(): Promise<VenvLayout> {
    if (this.active) {
      return this.active.venv;
    }

    const interpreter = await this.toolchain.describeInterpreter(this.python);
    const key = await calculateCacheKey(interpreter.executable, interpreter.version);
    const dir = join(this.options.workspacesDir, key);
    await ensureDir(dir);
    const lock = await acquireWorkspaceLock(join(dir, FILE_PATTERNS.WORKSPACE_LOCK));

    try {
      const venv = await this.reuseOrCreate(dir, interpreter);
      this.active = {
        dir,
        venv,
        lock,
        installer: this.createInstaller(venv),
        site: new DirectoryTargetAdapter(venv.sitePackages)
      };
      logger.debug(`Workspace ready at ${dir}`, { sitePackages: venv.sitePackages });
      return venv;
    } catch (error) {
      await lock.release();
      if (error instanceof WorkspaceError) {
        throw error;
      }
      throw new WorkspaceError(`Could not prepare the workspace in ${dir}: ${describeError(error)}`, { dir });
    }
  }

  get directory(): string {
    return this.require().dir;
  }

  get layout(): VenvLayout {
    return this.require().venv;
  }

  /**
   * Remove every distribution from site-packages except the workspace's own tooling.
   */
  async clear(): Promise<void> {
    const { site, venv } = this.require();
    for (const entry of await site.listEntries('')) {
      if (!isToolingEntry(entry.name)) {
        await remove(join(venv.sitePackages, entry.name));
      }
    }
  }

  /**
   * Write one placeholder dist-info per distribution, without payload files.
   */
  async seed(state: TargetState): Promise<void> {
    const { site } = this.require();
    for (const dist of state.values()) {
      try {
        for (const file of await renderDistInfo(dist, { installer: INSTALLER_DEFAULTS.NAME })) {
          await site.writeFile(file.path, file.content);
        }
      } catch (error) {
        throw new WorkspaceError(
          `Could not seed a placeholder for ${dist.displayName} ${dist.version}: ${describeError(error)}`,
          { name: dist.name }
        );
      }
    }
    logger.debug(`Seeded ${state.size} placeholder distribution(s)`);
  }

  async snapshot(): Promise<TargetState> {
    return this.require().site.listDistributions();
  }

  /**
   * Run the installer inside the workspace.
   */
  async runInstaller(args: string[]): Promise<InstallerResult> {
    const { installer } = this.require();
    const result = await installer.run(args, installerEnvironment(process.env, this.options.pipCacheDir));
    logger.debug(`Installer exited with status ${result.exitCode}`);
    return result;
  }

  async readFile(path: string): Promise<Uint8Array> {
    return this.require().site.readFile(path);
  }

  async release(): Promise<void> {
    const active = this.active;
    this.active = null;
    if (active) {
      await active.lock.release();
    }
  }

  private require(): ActiveWorkspace {
    if (!this.active) {
      throw new WorkspaceError('The workspace has not been prepared');
    }
    return this.active;
  }

  private async reuseOrCreate(dir: string, interpreter: InterpreterInfo): Promise<VenvLayout> {
    const metaPath = join(dir, FILE_PATTERNS.WORKSPACE_META);
    const pinnedMajor = installerMajor(this.installerSpec);
    const meta = (await exists(metaPath)) ? parseWorkspaceMeta(await readJsoncFile(metaPath)) : null;

    if (meta && (pinnedMajor === null || installerMajor(meta.installerVersion) === pinnedMajor) && await exists(meta.venv.pythonExecutable)) {
      logger.debug(`Reusing workspace with pip ${meta.installerVersion}`);
      return meta.venv;
    }
    if (meta) {
      logger.info(`Recreating the workspace: it has pip ${meta.installerVersion}, ${this.installerSpec} is required`);
    }

    const venvDir = join(dir, DIR_PATTERNS.VENV);
    await remove(metaPath);
    await remove(venvDir);

    const venv = await this.toolchain.createVenv(this.python, venvDir);
    await this.toolchain.installTooling(venv, [this.installerSpec, this.wheelSpec]);
    const installerVersion = await this.toolchain.installerVersion(venv);

    const created: WorkspaceMeta = {
      installerVersion,
      pythonExecutable: interpreter.executable,
      pythonVersion: interpreter.version,
      createdAt: new Date().toISOString(),
      venv
    };
    await writeJsoncFile(metaPath, created);
    return venv;
  }
}

/**
 * Delete every cached workspace. Returns how many there were.
 */
export async function purgeWorkspaces(workspacesDir: string): Promise<number> {
  if (!(await exists(workspacesDir))) {
    return 0;
  }
  const count = (await listDirectories(workspacesDir)).length;
  await remove(workspacesDir);
  return count;
}
