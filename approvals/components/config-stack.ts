// approvals/components/config-stack.ts
import { DisposerLeakError, DisposerOrderError } from './errors.ts';

/**
 * Configuration Stack (process-wide, per Vitest worker)
 *
 * Every override of a default (namer, reporter, front-loaded reporters,
 * subdirectory) is pushed on one shared stack and must be released in
 * reverse order, whichever axis it belongs to.
 * Note: Vitest gives each worker its own module instance, so the stack is
 * never shared between workers. It IS shared between `test.concurrent`
 * tests of one file; do not hold overrides across their awaits.
 */

export type Disposer = {
  readonly axis: string;
  dispose: () => void;
};

type StackEntry = {
  axis: string;
  restore: () => void;
  released: boolean;
};

const stack: StackEntry[] = [];

export class ConfigAxis<T> {
  readonly name: string;
  private readonly init: () => T;
  private slot: { value: T } | null = null;

  constructor(name: string, init: () => T) {
    this.name = name;
    this.init = init;
  }

  /** Current value; the initial value is created on first use. */
  current(): T {
    if (!this.slot) this.slot = { value: this.init() };
    return this.slot.value;
  }

  /** Make `value` current until the returned disposer is released. */
  push(value: T): Disposer {
    const previous = this.current();
    this.slot = { value };

    const entry: StackEntry = {
      axis: this.name,
      restore: () => {
        this.slot = { value: previous };
      },
      released: false,
    };
    stack.push(entry);

    return { axis: this.name, dispose: () => release(entry) };
  }
}

function release(entry: StackEntry): void {
  if (entry.released) {
    throw new DisposerOrderError(entry.axis, 'was already released');
  }
  const top = stack[stack.length - 1];
  if (top !== entry) {
    const position = stack.indexOf(entry) + 1;
    throw new DisposerOrderError(
      entry.axis,
      `released out of order (entry ${position} of ${stack.length}; "${top.axis}" must be released first)`,
    );
  }
  stack.pop();
  entry.released = true;
  entry.restore();
}

/**
 * Run `fn` with an override active; the override is released on every exit
 * path. When `fn` throws and the release fails too, the release error is
 * thrown with `fn`'s error as its cause.
 */
export function withDisposer<R>(disposer: Disposer, fn: () => R): R {
  let failed = false;
  try {
    return fn();
  } catch (err) {
    failed = true;
    releaseAfterFailure(disposer, err);
    throw err;
  } finally {
    if (!failed) disposer.dispose();
  }
}

function releaseAfterFailure(disposer: Disposer, cause: unknown): void {
  try {
    disposer.dispose();
  } catch (releaseError) {
    if (releaseError instanceof DisposerOrderError) {
      throw new DisposerOrderError(releaseError.axis, releaseError.reason, { cause });
    }
    throw releaseError;
  }
}

/** Number of overrides currently active across all axes. */
export function configurationDepth(): number {
  return stack.length;
}

/** Axis names of the active overrides, oldest first. */
export function activeOverrides(): string[] {
  return stack.map((e) => e.axis);
}

/**
 * Release every override pushed above `depth` (newest first) and throw
 * DisposerLeakError naming them. Does nothing when nothing leaked.
 */
export function assertNoLeakedOverrides(depth: number): void {
  if (stack.length <= depth) return;

  const leaked = stack.slice(depth).map((e) => e.axis);
  while (stack.length > depth) {
    const entry = stack[stack.length - 1];
    release(entry);
  }
  throw new DisposerLeakError(leaked);
}
