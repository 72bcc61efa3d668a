// approvals/components/test-identity.ts
import { expect } from 'vitest';

import { TestIdentityError } from './errors.ts';

/** Where a verification comes from: the test file and the test's full name. */
export type TestSource = {
  sourceFile: string;
  testName: string;
};

export type TestIdentity = Readonly<
  TestSource & {
    /** Set on the 2nd, 3rd, … verification inside the same test. */
    discriminator?: string;
  }
>;

const verifications = new Map<string, number>();

function nextDiscriminator(source: TestSource): string | undefined {
  const key = `${source.sourceFile}\u0000${source.testName}`;
  const n = (verifications.get(key) ?? 0) + 1;
  verifications.set(key, n);
  return n === 1 ? undefined : String(n);
}

/**
 * Forget every verification count. Called before each test attempt so a
 * retried or repeated test names its files exactly as its first attempt did.
 */
export function resetVerificationCounts(): void {
  verifications.clear();
}

/** The running Vitest test, if any. */
export function currentVitestTest(): TestSource | undefined {
  const { testPath, currentTestName } = expect.getState();
  if (!testPath || !currentTestName) return undefined;
  return { sourceFile: testPath, testName: currentTestName };
}

/**
 * Capture the identity of one verification call. Each call for the same
 * source counts up the discriminator, so names follow call order.
 */
export function captureTestIdentity(explicit?: TestSource): TestIdentity {
  const source = explicit ?? currentVitestTest();
  if (!source) throw new TestIdentityError();

  const discriminator = nextDiscriminator(source);
  const identity = discriminator
    ? { sourceFile: source.sourceFile, testName: source.testName, discriminator }
    : { sourceFile: source.sourceFile, testName: source.testName };
  return Object.freeze(identity);
}
