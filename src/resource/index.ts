/**
 * Resources - labels describing the entity that produces the telemetry,
 * e.g. the host, container or service.
 */

import { ConfigurationError } from '../errors';
import type { Labels } from '../types';

export const ENV_RESOURCE_TYPE = 'RESOURCE_TYPE';
export const ENV_RESOURCE_LABELS = 'RESOURCE_LABELS';

export interface Resource {
  type?: string;
  labels: Labels;
}

/**
 * Merges resources; earlier ones win on the type and on colliding labels.
 */
export function mergeResources(...resources: Array<Resource | undefined>): Resource | undefined {
  let merged: Resource | undefined;

  for (const resource of resources) {
    if (!resource) continue;
    if (!merged) {
      merged = { ...(resource.type ? { type: resource.type } : {}), labels: { ...resource.labels } };
      continue;
    }
    if (!merged.type && resource.type) {
      merged.type = resource.type;
    }
    for (const [key, value] of Object.entries(resource.labels)) {
      if (!(key in merged.labels)) {
        merged.labels[key] = value;
      }
    }
  }

  return merged;
}

/**
 * Parses labels in the `key1=value1,key2="value 2"` format.
 * Values may be quoted to carry commas; surrounding whitespace is trimmed.
 *
 * @throws ConfigurationError on an entry without `=` or an empty key
 */
export function parseResourceLabels(text: string): Labels {
  const labels: Labels = {};
  const pattern = /\s*([^=,\s]*)\s*=\s*("[^"]*"|[^,]*)\s*(?:,|$)/y;
  const input = text.trim();
  let offset = 0;

  while (offset < input.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(input);
    if (!match || match[0].length === 0) {
      throw new ConfigurationError(`invalid resource labels at offset ${offset}: "${input}"`);
    }
    const key = match[1] ?? '';
    if (key.length === 0) {
      throw new ConfigurationError(`resource label without key in "${input}"`);
    }
    const raw = (match[2] ?? '').trim();
    labels[key] = raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2 ? raw.slice(1, -1) : raw;
    offset = pattern.lastIndex;
  }

  return labels;
}

/**
 * Reads a resource from `RESOURCE_TYPE` and `RESOURCE_LABELS`.
 * Returns undefined when neither is set.
 */
export function resourceFromEnv(env: NodeJS.ProcessEnv = process.env): Resource | undefined {
  const type = env[ENV_RESOURCE_TYPE]?.trim();
  const labelsText = env[ENV_RESOURCE_LABELS];

  if (!type && !labelsText) {
    return undefined;
  }

  return {
    ...(type ? { type } : {}),
    labels: labelsText ? parseResourceLabels(labelsText) : {},
  };
}
