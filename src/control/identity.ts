import { createHash } from 'node:crypto';
import os from 'node:os';

export type ComponentIdentity = {
  componentId: string;
  componentName: string;
};

/** Stable id for this host unless one is configured. */
export function resolveComponentId(configured?: string, hostname: string = os.hostname()): string {
  const explicit = configured?.trim();
  if (explicit) {
    return explicit;
  }
  const digest = createHash('sha256').update(hostname.trim().toLowerCase()).digest('hex');
  return `led-receiver-${digest.slice(0, 12)}`;
}

export function resolveIdentity(
  app: { componentId?: string; componentName: string },
  hostname?: string
): ComponentIdentity {
  return {
    componentId: resolveComponentId(app.componentId, hostname),
    componentName: app.componentName
  };
}
