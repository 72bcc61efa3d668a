// test/unit/config-stack.test.ts
import * as path from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import {
  useApprovalsSubdirectory,
  useAsDefaultNamer,
  useAsDefaultReporter,
  useAsFrontLoadedReporter,
} from '../../approvals/approvals.ts';
import {
  ConfigAxis,
  activeOverrides,
  assertNoLeakedOverrides,
  configurationDepth,
  withDisposer,
} from '../../approvals/components/config-stack.ts';
import {
  getDefaultNamer,
  getDefaultReporter,
  getFrontLoadedReporters,
  getSubdirectory,
} from '../../approvals/components/defaults.ts';
import { DisposerLeakError, DisposerOrderError } from '../../approvals/components/errors.ts';
import { createSubdirectoryNamer } from '../../approvals/components/namers.ts';
import { createRecordingReporter } from '../components/recording-reporter.ts';

const identity = { sourceFile: '/repo/test/math.test.ts', testName: 'math > adds' };

describe('configuration overrides', () => {
  it('restores every axis after releasing in reverse order', () => {
    const reporterBefore = getDefaultReporter();
    const namerBefore = getDefaultNamer();
    const reporter = createRecordingReporter();
    const namer = createSubdirectoryNamer('golden');

    const releaseReporter = useAsDefaultReporter(reporter);
    const releaseNamer = useAsDefaultNamer(namer);
    expect(getDefaultReporter()).toBe(reporter);
    expect(getDefaultNamer()).toBe(namer);
    expect(activeOverrides().slice(-2)).toEqual(['default reporter', 'default namer']);

    releaseNamer.dispose();
    releaseReporter.dispose();

    expect(getDefaultReporter()).toBe(reporterBefore);
    expect(getDefaultNamer()).toBe(namerBefore);
  });

  it('nests overrides of the same axis', () => {
    const before = getDefaultReporter();
    const outer = createRecordingReporter('outer');
    const inner = createRecordingReporter('inner');

    withDisposer(useAsDefaultReporter(outer), () => {
      withDisposer(useAsDefaultReporter(inner), () => {
        expect(getDefaultReporter()).toBe(inner);
      });
      expect(getDefaultReporter()).toBe(outer);
    });

    expect(getDefaultReporter()).toBe(before);
  });

  it('rejects an out-of-order release across axes and leaves state untouched', () => {
    const before = getDefaultReporter();
    const reporter = createRecordingReporter();
    const namer = createSubdirectoryNamer('golden');
    const depth = configurationDepth();

    const releaseReporter = useAsDefaultReporter(reporter);
    const releaseNamer = useAsDefaultNamer(namer);

    expect(() => releaseReporter.dispose()).toThrow(DisposerOrderError);
    expect(() => releaseReporter.dispose()).toThrow(
      `Disposer for "default reporter" released out of order (entry ${depth + 1} of ${depth + 2}; "default namer" must be released first)`,
    );
    expect(getDefaultReporter()).toBe(reporter);
    expect(getDefaultNamer()).toBe(namer);
    expect(configurationDepth()).toBe(depth + 2);

    releaseNamer.dispose();
    releaseReporter.dispose();
    expect(getDefaultReporter()).toBe(before);
  });

  it('rejects releasing the same disposer twice', () => {
    const release = useAsDefaultReporter(createRecordingReporter());
    release.dispose();

    expect(() => release.dispose()).toThrow('Disposer for "default reporter" was already released');
  });

  it('releases the override when the scoped function throws', () => {
    const before = getDefaultReporter();

    expect(() =>
      withDisposer(useAsDefaultReporter(createRecordingReporter()), () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');

    expect(getDefaultReporter()).toBe(before);
  });

  it('keeps the scoped error as the cause when the release fails too', () => {
    const releaseReporter = useAsDefaultReporter(createRecordingReporter());
    const releaseNamer = useAsDefaultNamer(createSubdirectoryNamer('golden'));
    const boom = new Error('boom');

    let caught: unknown;
    try {
      withDisposer(releaseReporter, () => {
        throw boom;
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DisposerOrderError);
    expect(caught instanceof Error ? caught.cause : undefined).toBe(boom);

    releaseNamer.dispose();
    releaseReporter.dispose();
  });

  it('returns the scoped function result', () => {
    expect(withDisposer(useApprovalsSubdirectory('golden'), () => getSubdirectory())).toBe('golden');
  });
});

describe('subdirectory policy', () => {
  it('defaults to approval_tests and moves the default namer output there', () => {
    withDisposer(useApprovalsSubdirectory(), () => {
      expect(getSubdirectory()).toBe('approval_tests');
      expect(getDefaultNamer().approvedPath(identity, '.txt')).toBe(
        path.join('/repo/test', 'approval_tests', 'math.test.math.adds.approved.txt'),
      );
    });
  });
});

describe('front-loaded reporters', () => {
  it('accumulates in registration order and unwinds one at a time', () => {
    const a = createRecordingReporter('a');
    const b = createRecordingReporter('b');
    const before = getFrontLoadedReporters();

    const releaseA = useAsFrontLoadedReporter(a);
    const releaseB = useAsFrontLoadedReporter(b);
    expect(getFrontLoadedReporters()).toEqual([...before, a, b]);

    releaseB.dispose();
    expect(getFrontLoadedReporters()).toEqual([...before, a]);
    releaseA.dispose();
    expect(getFrontLoadedReporters()).toEqual(before);
  });
});

describe('leak detection', () => {
  it('releases leaked overrides and names them', () => {
    const before = getDefaultReporter();
    const depth = configurationDepth();
    useAsDefaultReporter(createRecordingReporter());
    useApprovalsSubdirectory('golden');

    let caught: unknown;
    try {
      assertNoLeakedOverrides(depth);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DisposerLeakError);
    expect(caught instanceof Error ? caught.message : '').toBe(
      'Test leaked 2 configuration override(s): default reporter, subdirectory. ' +
        'Release every disposer before the test ends.',
    );
    expect(configurationDepth()).toBe(depth);
    expect(getDefaultReporter()).toBe(before);
  });

  it('does nothing when every override was released', () => {
    const depth = configurationDepth();
    useAsDefaultReporter(createRecordingReporter()).dispose();

    expect(() => assertNoLeakedOverrides(depth)).not.toThrow();
  });
});

describe('ConfigAxis', () => {
  it('creates its initial value lazily, once', () => {
    const init = vi.fn(() => 42);
    const axis = new ConfigAxis('answer', init);
    expect(init).not.toHaveBeenCalled();

    expect(axis.current()).toBe(42);
    expect(axis.current()).toBe(42);
    expect(init).toHaveBeenCalledTimes(1);
  });
});
