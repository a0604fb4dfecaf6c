export type RuntimeFlags = {
  nonInteractive: boolean;
  quiet: boolean;
};

const flags: RuntimeFlags = {
  nonInteractive: process.env.SHELLSCRIBE_NON_INTERACTIVE === "1",
  quiet: false
};

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("nonInteractive" in next) {
    flags.nonInteractive = Boolean(next.nonInteractive);
  }
  if ("quiet" in next) {
    flags.quiet = Boolean(next.quiet);
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
