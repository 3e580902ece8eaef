import type {
  CacheCommand,
  DownloadOptions,
  FreezeOptions,
  IndexOptions,
  InstallOptions,
  ListOptions,
  SelectionOptions,
  TargetSelection,
  UninstallOptions,
  WheelOptions
} from '../types/index.js';
import { InstallerFailureError, PartialSuccessError, ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ConfigManager, configManager, ResolvedConfig } from './config.js';
import type { TargetState } from './dist/distribution.js';
import type { OutputPort } from './ports/output.js';
import { startProxyServer } from './proxy/proxy-server.js';
import { buildRouteTable } from './proxy/route-table.js';
import { HttpUpstreamClient, UpstreamClient } from './proxy/upstream-client.js';
import { applyPlan, ApplyResult } from './reconcile/apply.js';
import { MpyCrossCompiler, SourceCompiler } from './reconcile/compiler.js';
import { describeOperation, diffStates, OperationPlan } from './reconcile/plan.js';
import { createTargetAdapter } from './target/create-adapter.js';
import type { RuntimeInfo, TargetAdapter } from './target/target-adapter.js';
import { purgeWorkspaces, WorkspaceManager } from './workspace/workspace-manager.js';

/** Never reported by list or freeze: they belong to the workspace */
const TOOLING_EXCLUDES = ['pip', 'pkg_resources', 'setuptools', 'wheel'];

export interface SessionOptions {
  /** null for commands that never look at a target */
  target: TargetAdapter | null;
  workspace: WorkspaceManager;
  upstream: UpstreamClient;
  config: ResolvedConfig;
  output: OutputPort;
  workspacesDir: string;
  createCompiler?: (runtime: RuntimeInfo, compilers?: Record<string, string>) => SourceCompiler;
}

interface ReconcileSettings {
  compile?: boolean;
  continueOnError?: boolean;
  /** Asked before anything is changed; false leaves the target alone */
  confirm?: (plan: OperationPlan) => Promise<boolean>;
}

export function emptyApplyResult(): ApplyResult {
  return { installed: [], upgraded: [], removed: [], transferred: 0, skipped: [], failures: [] };
}

export function selectionArgs(options: SelectionOptions): string[] {
  const args: string[] = [];
  for (const path of options.requirementFiles ?? []) {
    args.push('-r', path);
  }
  for (const path of options.constraintFiles ?? []) {
    args.push('-c', path);
  }
  if (options.noDeps) {
    args.push('--no-deps');
  }
  if (options.pre) {
    args.push('--pre');
  }
  args.push(...(options.specs ?? []));
  return args;
}

export function exclusionArgs(excludes: string[] = []): string[] {
  return [...excludes, ...TOOLING_EXCLUDES].flatMap(name => ['--exclude', name]);
}

/**
 * One pipbridge run: a target, the workspace mirroring it, and pip between them.
 */
export class Session {
  private readonly createCompiler: (runtime: RuntimeInfo, compilers?: Record<string, string>) => SourceCompiler;

  constructor(private readonly options: SessionOptions) {
    this.createCompiler = options.createCompiler ?? ((runtime, compilers) => MpyCrossCompiler.forRuntime(runtime, compilers));
  }

  /**
   * Load config, open the selected (or detected) target and set up the workspace.
   * Pass a null selection for commands that need no target.
   */
  static async open(selection: TargetSelection | null, output: OutputPort, manager: ConfigManager = configManager): Promise<Session> {
    const config = await manager.load();
    const directories = manager.getDirectories();
    const target = selection ? await createTargetAdapter(selection, config) : null;
    if (target) {
      logger.debug(`Using target ${target.description} (${target.kind})`);
    }

    return new Session({
      target,
      workspace: new WorkspaceManager({
        workspacesDir: directories.workspaces,
        pipCacheDir: directories.pipCache,
        python: config.python,
        installerSpec: config.installerSpec,
        wheelSpec: config.wheelSpec
      }),
      upstream: new HttpUpstreamClient(config.upstreamTimeoutMs),
      config,
      output,
      workspacesDir: directories.workspaces
    });
  }

  async install(options: InstallOptions = {}): Promise<ApplyResult> {
    const args = ['install', '--no-compile'];
    if (options.upgrade) {
      args.push('--upgrade');
    }
    args.push('--upgrade-strategy', options.upgradeStrategy ?? 'only-if-needed');
    if (options.forceReinstall) {
      args.push('--force-reinstall');
    }
    args.push(...selectionArgs(options));

    return this.reconcile(args, options, options.specs ?? [], {
      compile: options.compile,
      continueOnError: options.continueOnError
    });
  }

  async uninstall(options: UninstallOptions = {}): Promise<ApplyResult> {
    const packages = options.packages ?? [];
    const requirementFiles = options.requirementFiles ?? [];
    if (packages.length === 0 && requirementFiles.length === 0) {
      throw new ValidationError('Nothing to uninstall: name packages or pass -r <file>');
    }

    // pip cannot prompt here, confirmation happens on the plan instead
    const args = ['uninstall', '--yes', ...requirementFiles.flatMap(path => ['-r', path]), ...packages];
    return this.reconcile(args, null, [], {
      confirm: options.yes ? undefined : plan => this.options.output.confirm(`Remove ${plan.size} package(s) from ${this.requireTarget().description}?`, { initial: false })
    });
  }

  async list(options: ListOptions = {}): Promise<void> {
    const args = ['list'];
    if (options.outdated) args.push('--outdated');
    if (options.uptodate) args.push('--uptodate');
    if (options.notRequired) args.push('--not-required');
    if (options.pre) args.push('--pre');
    args.push('--format', options.format ?? 'columns', ...exclusionArgs(options.excludes));

    await this.seedFromTarget();
    await this.runWithIndex(args, options, []);
  }

  async show(packages: string[]): Promise<void> {
    await this.seedFromTarget();
    await this.runInstaller(['show', ...packages]);
  }

  async freeze(options: FreezeOptions = {}): Promise<void> {
    await this.seedFromTarget();
    await this.runInstaller(['freeze', ...exclusionArgs(options.excludes)]);
  }

  async check(): Promise<void> {
    await this.seedFromTarget();
    await this.runInstaller(['check']);
  }

  async download(options: DownloadOptions = {}): Promise<void> {
    const args = ['download'];
    if (options.dest) {
      args.push('--dest', options.dest);
    }
    args.push(...selectionArgs(options));
    await this.seedFromTarget();
    await this.runWithIndex(args, options, options.specs ?? []);
  }

  async wheel(options: WheelOptions = {}): Promise<void> {
    const args = ['wheel'];
    if (options.wheelDir) {
      args.push('--wheel-dir', options.wheelDir);
    }
    args.push(...selectionArgs(options));
    await this.seedFromTarget();
    await this.runWithIndex(args, options, options.specs ?? []);
  }

  async cache(command: CacheCommand): Promise<void> {
    await this.prepareWorkspace();
    await this.runInstaller(['cache', command]);

    if (command === 'purge') {
      await this.options.workspace.release();
      const count = await purgeWorkspaces(this.options.workspacesDir);
      this.options.output.success(`Removed ${count} cached working environment(s)`);
    }
  }

  async close(): Promise<void> {
    try {
      await this.options.workspace.release();
    } finally {
      await this.options.target?.close();
    }
  }

  private requireTarget(): TargetAdapter {
    if (!this.options.target) {
      throw new ValidationError('This command needs a target');
    }
    return this.options.target;
  }

  private async prepareWorkspace(): Promise<void> {
    const spinner = this.options.output.spinner();
    spinner.start('Preparing the working environment');
    try {
      await this.options.workspace.prepare();
    } finally {
      spinner.stop();
    }
  }

  /**
   * Mirror the target's distributions into a freshly cleared workspace.
   * Without a target the workspace is left empty.
   */
  private async seedFromTarget(): Promise<TargetState> {
    await this.prepareWorkspace();
    await this.options.workspace.clear();
    const state: TargetState = this.options.target ? await this.options.target.listDistributions() : new Map();
    await this.options.workspace.seed(state);
    return state;
  }

  private async reconcile(args: string[], index: IndexOptions | null, specs: string[], settings: ReconcileSettings): Promise<ApplyResult> {
    const { output, workspace, config } = this.options;
    const target = this.requireTarget();

    const targetState = await this.seedFromTarget();
    const before = await workspace.snapshot();
    if (index) {
      await this.runWithIndex(args, index, specs);
    } else {
      await this.runInstaller(args);
    }
    const after = await workspace.snapshot();

    const plan = diffStates(before, after);
    if (plan.isEmpty) {
      output.success(`Nothing to change on ${target.description}`);
      return emptyApplyResult();
    }
    output.note(plan.peek().map(describeOperation).join('\n'), `Changes for ${target.description}`);
    if (settings.confirm && !(await settings.confirm(plan))) {
      output.info('Target left unchanged');
      return emptyApplyResult();
    }

    const compiler = settings.compile ? this.createCompiler(await target.getRuntimeInfo(), config.compilers) : undefined;
    const result = await applyPlan(plan, {
      target,
      workspace,
      targetState,
      excludePatterns: config.excludePatterns,
      compiler,
      onTargetError: settings.continueOnError ? 'continue' : 'abort',
      onOperation: (operation, position, total) => output.step(`[${position + 1}/${total}] ${describeOperation(operation)}`)
    });
    this.report(result);
    return result;
  }

  private report(result: ApplyResult): void {
    const { output } = this.options;
    output.success(
      `${result.installed.length} installed, ${result.upgraded.length} upgraded, ${result.removed.length} removed ` +
      `(${result.transferred} file(s) transferred)`
    );
    for (const skipped of result.skipped) {
      output.warn(`Skipped ${skipped.path} (${skipped.dist}): ${skipped.reason}`);
    }
    for (const failure of result.failures) {
      output.error(`Failed to ${failure.operation}: ${failure.error.message}`);
    }
    if (result.skipped.length > 0 || result.failures.length > 0) {
      throw new PartialSuccessError(
        `Applied with problems: ${result.skipped.length} file(s) skipped, ${result.failures.length} target operation(s) failed`
      );
    }
  }

  /**
   * Run pip against the proxy index, or only against --find-links with --no-index.
   */
  private async runWithIndex(args: string[], index: IndexOptions, specs: string[]): Promise<void> {
    const { config } = this.options;
    if (index.noIndex) {
      if (!index.findLinks) {
        throw new ValidationError('--no-index needs --find-links');
      }
      await this.runInstaller([...args, '--no-index', '--find-links', index.findLinks]);
      return;
    }

    const table = buildRouteTable({
      indexUrl: index.indexUrl ?? config.indexUrl,
      extraIndexUrls: [...(config.extraIndexUrls ?? []), ...(index.extraIndexUrls ?? [])],
      noMpOrg: index.noMpOrg ?? config.noMpOrg,
      dummyPackages: config.dummyPackages,
      excludedIndexes: config.excludedIndexes,
      specs
    });
    const proxy = await startProxyServer({ table, client: this.options.upstream });
    logger.info(`Using proxy index at ${proxy.url}`);

    try {
      const indexArgs = ['--index-url', `${proxy.url}/`];
      if (index.findLinks) {
        indexArgs.push('--find-links', index.findLinks);
      }
      await this.runInstaller([...args, ...indexArgs]);
    } finally {
      await proxy.shutdown();
    }
  }

  private async runInstaller(args: string[]): Promise<void> {
    const { exitCode, stderr } = await this.options.workspace.runInstaller(args);
    if (exitCode !== 0) {
      if (stderr) {
        logger.debug(`pip stderr (tail):\n${stderr}`);
      }
      throw new InstallerFailureError(exitCode, this.options.workspace.directory, stderr);
    }
  }
}
