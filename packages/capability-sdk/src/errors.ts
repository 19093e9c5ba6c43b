export class UnknownActionError extends Error {
  constructor(
    readonly capabilityId: string,
    readonly action: string,
  ) {
    super(`Capability "${capabilityId}" does not support action "${action}"`);
    this.name = "UnknownActionError";
  }
}

export class InvalidParameterError extends Error {
  constructor(
    readonly parameter: string,
    readonly reason: string,
  ) {
    super(`Invalid parameter "${parameter}": ${reason}`);
    this.name = "InvalidParameterError";
  }
}
