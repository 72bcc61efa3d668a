// approvals/components/options.ts
import { DEFAULT_EXTENSION } from './constants.ts';
import { getDefaultNamer, getDefaultReporter } from './defaults.ts';
import { normalizeExtension, type ApprovalNamer } from './namers.ts';
import type { Reporter } from './reporters.ts';
import type { Scrubber } from './scrubbers.ts';
import type { TestSource } from './test-identity.ts';
import { defaultToString, type ToString } from './to-string.ts';

type OptionsFields = {
  scrubber?: Scrubber;
  reporter?: Reporter;
  namer?: ApprovalNamer;
  fileExtension?: string;
  converter?: ToString;
  testSource?: TestSource;
};

/**
 * Per-call settings of a verification. Immutable: every `with…` returns a new
 * Options and leaves this one untouched. Unset reporter/namer fall back to the
 * current defaults at the time they are read.
 */
export class Options {
  private readonly fields: Readonly<OptionsFields>;

  constructor(fields: OptionsFields = {}) {
    this.fields = Object.freeze({ ...fields });
  }

  private with(patch: OptionsFields): Options {
    return new Options({ ...this.fields, ...patch });
  }

  withScrubber(scrubber: Scrubber): Options {
    return this.with({ scrubber });
  }

  withReporter(reporter: Reporter): Options {
    return this.with({ reporter });
  }

  withNamer(namer: ApprovalNamer): Options {
    return this.with({ namer });
  }

  withFileExtension(extension: string): Options {
    return this.with({ fileExtension: normalizeExtension(extension) });
  }

  /** Replace the string conversion used for non-string values. */
  withToString(converter: ToString): Options {
    return this.with({ converter });
  }

  /** Name files after this source instead of the running Vitest test. */
  withTestIdentity(testSource: TestSource): Options {
    return this.with({ testSource: { ...testSource } });
  }

  get scrubber(): Scrubber | undefined {
    return this.fields.scrubber;
  }

  scrub(text: string): string {
    return this.fields.scrubber ? this.fields.scrubber(text) : text;
  }

  get fileExtension(): string {
    return this.fields.fileExtension ?? DEFAULT_EXTENSION;
  }

  get reporter(): Reporter {
    return this.fields.reporter ?? getDefaultReporter();
  }

  get namer(): ApprovalNamer {
    return this.fields.namer ?? getDefaultNamer();
  }

  get toText(): ToString {
    return this.fields.converter ?? defaultToString;
  }

  get testSource(): TestSource | undefined {
    return this.fields.testSource;
  }
}
