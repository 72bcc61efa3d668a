// approvals/leak-check.ts
// Vitest setupFiles entry: every test attempt starts its verification count
// from one, and must release every disposer it acquired.
import { afterEach, beforeEach } from 'vitest';

import { assertNoLeakedOverrides, configurationDepth } from './components/config-stack.ts';
import { resetVerificationCounts } from './components/test-identity.ts';

let depthAtStart = 0;

beforeEach(() => {
  resetVerificationCounts();
  depthAtStart = configurationDepth();
});

afterEach(() => {
  assertNoLeakedOverrides(depthAtStart);
});
