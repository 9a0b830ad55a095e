import { ConfigurationError } from "./errors.ts";

export const DEFAULT_MOUNT_PATH = "/contacts";

const FLOW_NAME_PATTERN = /^[a-z0-9_-]+$/;

export type FlowPaths = {
  name: string;
  entryPath: string;
  callbackPath: string;
};

export type FlowTransition<T extends FlowPaths> =
  | { kind: "entry"; flow: T }
  | { kind: "callback"; flow: T }
  | { kind: "pass" };

export function flowPaths(mountPath: string, name: string): FlowPaths {
  if (!FLOW_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`Invalid contacts flow name: "${name}"`);
  }
  const entryPath = `${mountPath}/${name}`;
  if (entryPath === failurePath(mountPath)) {
    throw new ConfigurationError(
      `Contacts flow name "${name}" is reserved for the failure endpoint`,
    );
  }
  return { name, entryPath, callbackPath: `${entryPath}/callback` };
}

export function failurePath(mountPath: string): string {
  return `${mountPath}/failure`;
}

export function resolveTransition<T extends FlowPaths>(
  path: string,
  flows: readonly T[],
): FlowTransition<T> {
  for (const flow of flows) {
    if (path === flow.entryPath || path === `${flow.entryPath}/`) {
      return { kind: "entry", flow };
    }
    if (path.startsWith(flow.callbackPath)) {
      return { kind: "callback", flow };
    }
  }
  return { kind: "pass" };
}
