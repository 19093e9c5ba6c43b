import type {
  ActionDescriptor,
  ParameterMap,
  ParameterSpec,
  ParameterValue,
} from "@sundial/shared";
import { InvalidParameterError } from "./errors.js";

// ── Accessors ─────────────────────────────────────────────────────────────
// Each returns the requested shape, or undefined when the value has another shape.

export function asString(value: ParameterValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asFloat(value: ParameterValue | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function asInteger(value: ParameterValue | undefined): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

export function asBoolean(value: ParameterValue | undefined): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

export function asList(value: ParameterValue | undefined): ParameterValue[] | undefined {
  return Array.isArray(value) ? value : undefined;
}

export function asMap(value: ParameterValue | undefined): { [key: string]: ParameterValue } | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value !== "object" || Array.isArray(value)) return undefined;
  return value;
}

export class ParameterReader {
  constructor(private readonly values: ParameterMap) {}

  has(key: string): boolean {
    return this.values[key] !== undefined && this.values[key] !== null;
  }

  raw(key: string): ParameterValue | undefined {
    return this.values[key];
  }

  string(key: string): string | undefined {
    return asString(this.values[key]);
  }

  integer(key: string): number | undefined {
    return asInteger(this.values[key]);
  }

  float(key: string): number | undefined {
    return asFloat(this.values[key]);
  }

  boolean(key: string): boolean | undefined {
    return asBoolean(this.values[key]);
  }

  list(key: string): ParameterValue[] | undefined {
    return asList(this.values[key]);
  }

  map(key: string): { [key: string]: ParameterValue } | undefined {
    return asMap(this.values[key]);
  }

  toJSON(): ParameterMap {
    return { ...this.values };
  }
}

// ── Validation ────────────────────────────────────────────────────────────

const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function checkBounds(spec: ParameterSpec, value: number): void {
  const { min, max } = spec.validation ?? {};
  if (min !== undefined && value < min) {
    throw new InvalidParameterError(spec.id, `must be >= ${min}, got ${value}`);
  }
  if (max !== undefined && value > max) {
    throw new InvalidParameterError(spec.id, `must be <= ${max}, got ${value}`);
  }
}

function describeShape(value: ParameterValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

function validateValue(spec: ParameterSpec, value: ParameterValue): ParameterValue {
  switch (spec.type) {
    case "string": {
      const str = asString(value);
      if (str === undefined) throw new InvalidParameterError(spec.id, `expected string, got ${describeShape(value)}`);
      if (spec.validation?.pattern && !new RegExp(spec.validation.pattern).test(str)) {
        throw new InvalidParameterError(spec.id, `does not match pattern ${spec.validation.pattern}`);
      }
      return str;
    }
    case "integer": {
      const int = asInteger(value);
      if (int === undefined) throw new InvalidParameterError(spec.id, `expected integer, got ${describeShape(value)}`);
      checkBounds(spec, int);
      return int;
    }
    case "float": {
      const num = asFloat(value);
      if (num === undefined) throw new InvalidParameterError(spec.id, `expected number, got ${describeShape(value)}`);
      checkBounds(spec, num);
      return num;
    }
    case "boolean": {
      const bool = asBoolean(value);
      if (bool === undefined) throw new InvalidParameterError(spec.id, `expected boolean, got ${describeShape(value)}`);
      return bool;
    }
    case "time": {
      const str = asString(value);
      if (str === undefined || !TIME_PATTERN.test(str)) {
        throw new InvalidParameterError(spec.id, "expected time as HH:mm");
      }
      return str;
    }
    case "date": {
      const str = asString(value);
      if (str === undefined || !DATE_PATTERN.test(str) || Number.isNaN(Date.parse(str))) {
        throw new InvalidParameterError(spec.id, "expected date as YYYY-MM-DD");
      }
      return str;
    }
    case "selection": {
      const str = asString(value);
      if (str === undefined) throw new InvalidParameterError(spec.id, `expected selection, got ${describeShape(value)}`);
      const options = spec.validation?.options;
      if (options && !options.includes(str)) {
        throw new InvalidParameterError(spec.id, `must be one of ${options.join(", ")}`);
      }
      return str;
    }
  }
}

/**
 * Applies defaults and validates `parameters` against the action's declared specs.
 * Only declared parameters are kept.
 */
export function resolveParameters(action: ActionDescriptor, parameters: ParameterMap): ParameterReader {
  const resolved: ParameterMap = {};

  for (const spec of action.parameters) {
    const provided = parameters[spec.id];
    const value = provided === undefined || provided === null ? spec.defaultValue : provided;

    if (value === undefined || value === null) {
      if (spec.required) throw new InvalidParameterError(spec.id, "is required");
      continue;
    }

    resolved[spec.id] = validateValue(spec, value);
  }

  return new ParameterReader(resolved);
}
