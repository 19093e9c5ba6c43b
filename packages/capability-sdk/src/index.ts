export type {
  Capability,
  CapabilityFactory,
  StartupAction,
} from "./types.js";

export { compatible, incompatible } from "./types.js";

export {
  asString,
  asFloat,
  asInteger,
  asBoolean,
  asList,
  asMap,
  ParameterReader,
  resolveParameters,
} from "./parameters.js";

export { findAction, validateDescriptor } from "./descriptor.js";

export { UnknownActionError, InvalidParameterError } from "./errors.js";
