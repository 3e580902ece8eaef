import { posix } from 'path';
import { minimatch } from 'minimatch';
import { CompilationFailureError, TargetIOError } from '../../utils/errors.js';
import { calculateRecordHash } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { renderDistInfo } from '../dist/dist-scanner.js';
import { Distribution, ManifestEntry, TargetState, createDistribution } from '../dist/distribution.js';
import type { TargetAdapter } from '../target/target-adapter.js';
import type { SourceCompiler } from './compiler.js';
import { OperationPlan, PlannedOperation, describeOperation } from './plan.js';

export type TargetErrorPolicy = 'abort' | 'continue';

/**
 * Where installed payload files are read from (the workspace site-packages).
 */
export interface PayloadSource {
  readFile(path: string): Promise<Uint8Array>;
}

export interface ApplyOptions {
  target: TargetAdapter;
  workspace: PayloadSource;
  /** State scanned from the target; its manifests decide what a removal deletes */
  targetState: TargetState;
  excludePatterns?: readonly string[];
  compiler?: SourceCompiler;
  onTargetError?: TargetErrorPolicy;
  onOperation?: (operation: PlannedOperation, index: number, total: number) => void;
}

export interface SkippedFile {
  dist: string;
  path: string;
  reason: string;
}

export interface OperationFailure {
  operation: string;
  error: TargetIOError;
}

export interface ApplyResult {
  installed: Distribution[];
  upgraded: Array<{ from: Distribution; to: Distribution }>;
  removed: Distribution[];
  /** Payload files written */
  transferred: number;
  skipped: SkippedFile[];
  failures: OperationFailure[];
}

interface ApplyContext {
  readonly options: ApplyOptions;
  readonly result: ApplyResult;
  readonly ensuredDirs: Set<string>;
}

export function isExcluded(path: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(path, pattern, { dot: true }));
}

/**
 * Carry out a plan on the target, one file at a time.
 * Nothing already written is rolled back when an operation fails.
 */
export async function applyPlan(plan: OperationPlan, options: ApplyOptions): Promise<ApplyResult> {
  const operations = plan.take();
  const context: ApplyContext = {
    options,
    result: { installed: [], upgraded: [], removed: [], transferred: 0, skipped: [], failures: [] },
    ensuredDirs: new Set()
  };

  for (const [index, operation] of operations.entries()) {
    options.onOperation?.(operation, index, operations.length);
    await guard(context, describeOperation(operation), async () => {
      switch (operation.kind) {
        case 'remove':
          await removeDistribution(context, operation.dist);
          context.result.removed.push(operation.dist);
          break;
        case 'upgrade':
          await removeDistribution(context, operation.from);
          await installDistribution(context, operation.to);
          context.result.upgraded.push({ from: operation.from, to: operation.to });
          break;
        case 'install':
          await installDistribution(context, operation.dist);
          context.result.installed.push(operation.dist);
          break;
      }
    });
  }

  await guard(context, 'sync', () => options.target.sync());
  return context.result;
}

async function guard(context: ApplyContext, operation: string, run: () => Promise<void>): Promise<void> {
  try {
    await run();
  } catch (error) {
    if (error instanceof TargetIOError && context.options.onTargetError === 'continue') {
      logger.warn(`Could not ${operation}: ${error.message}`);
      context.result.failures.push({ operation, error });
      return;
    }
    throw error;
  }
}

async function removeDistribution(context: ApplyContext, dist: Distribution): Promise<void> {
  const { target, targetState } = context.options;
  const installed = targetState.get(dist.name);
  if (!installed) {
    logger.warn(`${dist.displayName} is not installed on ${target.description}, nothing to remove`);
    return;
  }

  // Pruning below may take away directories ensured earlier
  context.ensuredDirs.clear();
  const parents = new Set<string>();
  for (const entry of installed.files) {
    await target.deleteFile(entry.path);
    parents.add(posix.dirname(entry.path));
  }
  await removeTree(target, installed.metaDirName);

  const byDepth = [...parents].filter(dir => dir !== '.').sort((a, b) => b.split('/').length - a.split('/').length);
  for (const dir of byDepth) {
    await pruneEmptyParents(target, dir);
  }
  logger.debug(`Removed ${installed.displayName} ${installed.version} from ${target.description}`);
}

async function removeTree(target: TargetAdapter, dir: string): Promise<void> {
  for (const entry of await target.listEntries(dir)) {
    const path = `${dir}/${entry.name}`;
    if (entry.isDirectory) {
      await removeTree(target, path);
    } else {
      await target.deleteFile(path);
    }
  }
  await target.removeDirIfEmpty(dir);
}

async function pruneEmptyParents(target: TargetAdapter, dir: string): Promise<void> {
  for (let current = dir; current !== '.' && current !== ''; current = posix.dirname(current)) {
    if (!(await target.removeDirIfEmpty(current))) {
      return;
    }
  }
}

async function installDistribution(context: ApplyContext, dist: Distribution): Promise<void> {
  const { target, workspace, compiler } = context.options;
  const excludePatterns = context.options.excludePatterns ?? [];
  const written: ManifestEntry[] = [];

  for (const entry of dist.files) {
    if (isExcluded(entry.path, excludePatterns)) {
      logger.debug(`Not transferring excluded ${entry.path}`);
      continue;
    }

    let path = entry.path;
    let content = await workspace.readFile(entry.path);
    if (compiler?.accepts(path)) {
      try {
        content = await compiler.compile(content, path);
        path = compiler.outputPath(path);
      } catch (error) {
        if (!(error instanceof CompilationFailureError)) {
          throw error;
        }
        logger.warn(`Skipping ${entry.path} of ${dist.displayName}: ${error.message}`);
        context.result.skipped.push({ dist: dist.name, path: entry.path, reason: error.message });
        continue;
      }
    }

    await ensureParent(context, path);
    await target.writeFile(path, content);
    context.result.transferred++;
    written.push({ path, hash: await calculateRecordHash(content), size: content.byteLength });
  }

  const onTarget = createDistribution({
    displayName: dist.displayName,
    version: dist.version,
    requires: dist.requires,
    files: written,
    metaDirName: dist.metaDirName
  });
  await ensureParent(context, `${dist.metaDirName}/RECORD`);
  for (const file of await renderDistInfo(onTarget)) {
    await target.writeFile(file.path, file.content);
  }
  logger.debug(`Installed ${dist.displayName} ${dist.version} on ${target.description} (${written.length} file(s))`);
}

async function ensureParent(context: ApplyContext, path: string): Promise<void> {
  const dir = posix.dirname(path);
  const normalized = dir === '.' ? '' : dir;
  if (!context.ensuredDirs.has(normalized)) {
    await context.options.target.ensureDir(normalized);
    context.ensuredDirs.add(normalized);
  }
}
