import type { ActionDescriptor, CapabilityDescriptor } from "@sundial/shared";
import { UnknownActionError } from "./errors.js";

export function findAction(descriptor: CapabilityDescriptor, actionId: string): ActionDescriptor {
  const action = descriptor.actions.find((a) => a.id === actionId);
  if (!action) throw new UnknownActionError(descriptor.id, actionId);
  return action;
}

/** Structural problems with a descriptor; empty when it is usable. */
export function validateDescriptor(descriptor: CapabilityDescriptor): string[] {
  const problems: string[] = [];
  if (!descriptor.id) problems.push("Capability id is empty");

  const actionIds = new Set<string>();
  for (const action of descriptor.actions) {
    if (actionIds.has(action.id)) {
      problems.push(`Duplicate action id "${action.id}"`);
    }
    actionIds.add(action.id);

    const paramIds = new Set<string>();
    for (const param of action.parameters) {
      if (paramIds.has(param.id)) {
        problems.push(`Duplicate parameter id "${param.id}" in action "${action.id}"`);
      }
      paramIds.add(param.id);
    }
  }

  return problems;
}
