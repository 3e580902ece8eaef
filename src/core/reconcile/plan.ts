import { ValidationError } from '../../utils/errors.js';
import { Distribution, TargetState, distributionsEqual } from '../dist/distribution.js';

export type PlannedOperation =
  | { readonly kind: 'install'; readonly dist: Distribution }
  | { readonly kind: 'upgrade'; readonly from: Distribution; readonly to: Distribution }
  | { readonly kind: 'remove'; readonly dist: Distribution };

export type OperationKind = PlannedOperation['kind'];

/**
 * Ordered operations that turn a target into the workspace's post-install state.
 * The operations can be taken exactly once.
 */
export class OperationPlan {
  private readonly operations: readonly PlannedOperation[];
  private taken = false;

  constructor(operations: readonly PlannedOperation[]) {
    this.operations = Object.freeze(operations.map(operation => Object.freeze({ ...operation })));
  }

  get size(): number {
    return this.operations.length;
  }

  get isEmpty(): boolean {
    return this.operations.length === 0;
  }

  /** Inspect without consuming */
  peek(): readonly PlannedOperation[] {
    return this.operations;
  }

  take(): readonly PlannedOperation[] {
    if (this.taken) {
      throw new ValidationError('operation plan has already been applied');
    }
    this.taken = true;
    return this.operations;
  }

  count(kind: OperationKind): number {
    return this.operations.filter(operation => operation.kind === kind).length;
  }
}

function byName(a: Distribution, b: Distribution): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Removes first, then upgrades, then installs; each group sorted by name.
 */
export function diffStates(before: TargetState, after: TargetState): OperationPlan {
  const removes: PlannedOperation[] = [...before.values()]
    .filter(dist => !after.has(dist.name))
    .sort(byName)
    .map(dist => ({ kind: 'remove', dist }));

  const upgrades: PlannedOperation[] = [];
  const installs: PlannedOperation[] = [];
  for (const to of [...after.values()].sort(byName)) {
    const from = before.get(to.name);
    if (!from) {
      installs.push({ kind: 'install', dist: to });
    } else if (!distributionsEqual(from, to)) {
      upgrades.push({ kind: 'upgrade', from, to });
    }
  }

  return new OperationPlan([...removes, ...upgrades, ...installs]);
}

export function describeOperation(operation: PlannedOperation): string {
  switch (operation.kind) {
    case 'install':
      return `install ${operation.dist.displayName} ${operation.dist.version}`;
    case 'upgrade':
      return `upgrade ${operation.to.displayName} ${operation.from.version} -> ${operation.to.version}`;
    case 'remove':
      return `remove ${operation.dist.displayName} ${operation.dist.version}`;
  }
}
