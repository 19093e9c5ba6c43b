// ── Engine Errors ──

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class CapabilityNotFoundError extends Error {
  constructor(readonly capabilityId: string) {
    super(`Capability not found: ${capabilityId}`);
    this.name = "CapabilityNotFoundError";
  }
}

export class CapabilityIncompatibleError extends Error {
  constructor(
    readonly capabilityId: string,
    readonly reasons: string[],
  ) {
    super(`Capability "${capabilityId}" is incompatible: ${reasons.join("; ") || "unknown reason"}`);
    this.name = "CapabilityIncompatibleError";
  }
}

export class ExecutionFailedError extends Error {
  constructor(
    readonly action: string,
    cause: unknown,
  ) {
    super(`Action "${action}" failed: ${describeError(cause)}`, { cause });
    this.name = "ExecutionFailedError";
  }
}

export class RuleNotFoundError extends Error {
  constructor(readonly ruleId: string) {
    super(`Automation rule not found: ${ruleId}`);
    this.name = "RuleNotFoundError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
