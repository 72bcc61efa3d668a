// approvals/components/defaults.ts
import { ConfigAxis, type Disposer } from './config-stack.ts';
import { ENV_SUBDIRECTORY } from './constants.ts';
import { createDefaultNamer, type ApprovalNamer } from './namers.ts';
import { createDefaultReporter, type Reporter } from './reporters.ts';

const subdirectoryAxis = new ConfigAxis<string>(
  'subdirectory',
  () => process.env[ENV_SUBDIRECTORY]?.trim() ?? '',
);

const defaultNamerAxis = new ConfigAxis<ApprovalNamer>('default namer', () =>
  createDefaultNamer({ subdirectory: () => subdirectoryAxis.current() }),
);

const defaultReporterAxis = new ConfigAxis<Reporter>('default reporter', () =>
  createDefaultReporter(),
);

const frontLoadedAxis = new ConfigAxis<readonly Reporter[]>('front-loaded reporters', () => []);

export function getSubdirectory(): string {
  return subdirectoryAxis.current();
}

export function getDefaultNamer(): ApprovalNamer {
  return defaultNamerAxis.current();
}

export function getDefaultReporter(): Reporter {
  return defaultReporterAxis.current();
}

export function getFrontLoadedReporters(): readonly Reporter[] {
  return frontLoadedAxis.current();
}

export function pushSubdirectory(subdirectory: string): Disposer {
  return subdirectoryAxis.push(subdirectory);
}

export function pushDefaultNamer(namer: ApprovalNamer): Disposer {
  return defaultNamerAxis.push(namer);
}

export function pushDefaultReporter(reporter: Reporter): Disposer {
  return defaultReporterAxis.push(reporter);
}

/** Add a reporter that runs before the primary one on every mismatch. */
export function pushFrontLoadedReporter(reporter: Reporter): Disposer {
  return frontLoadedAxis.push([...frontLoadedAxis.current(), reporter]);
}
