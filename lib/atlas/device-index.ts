/**
 * Device listing grouped for display:
 * facility display name → device kind → device name → property key
 */

import type { IAtlasClient } from "./client";
import type { Device, DeviceConnection, PropertyValue } from "./types";

export interface DeviceEntry {
  properties: Map<string, PropertyValue>;
  upstream?: Record<string, string>; // connection kind → device id
  downstream?: Record<string, string>;
}

export type DevicesByKind = Map<string, Map<string, DeviceEntry>>;

function byName<T>(key: (item: T) => string) {
  return (a: T, b: T) => key(a).localeCompare(key(b));
}

/**
 * "compressor" → "Compressors", "air_handler" → "Air_Handlers"
 */
export function pluralKindTitle(kind: string): string {
  const title = kind.replace(
    /[A-Za-z]+/g,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
  return `${title}s`;
}

function connectionMap(
  connections: DeviceConnection[],
): Record<string, string> | undefined {
  if (connections.length === 0) return undefined;
  const map: Record<string, string> = {};
  for (const connection of connections) {
    map[connection.kind] = connection.deviceId;
  }
  return map;
}

/**
 * Group one facility's devices by kind, devices ordered by name. Devices with
 * no properties and no connections are left out.
 */
export function indexDevices(devices: Device[]): DevicesByKind {
  const index: DevicesByKind = new Map();

  for (const device of [...devices].sort(byName((d: Device) => d.name))) {
    const entry: DeviceEntry = {
      properties: new Map(
        device.properties.map((prop) => [prop.key, prop.value]),
      ),
      upstream: connectionMap(device.upstream),
      downstream: connectionMap(device.downstream),
    };
    if (entry.properties.size === 0 && !entry.upstream && !entry.downstream) {
      continue;
    }

    const kind = pluralKindTitle(device.kind);
    const group = index.get(kind) ?? new Map<string, DeviceEntry>();
    group.set(device.name, entry);
    index.set(kind, group);
  }

  return index;
}

/**
 * Devices of every facility the user can see, keyed by facility display
 * name. A facility whose devices cannot be listed is logged and skipped.
 */
export async function listAllDevices(
  client: IAtlasClient,
  signal?: AbortSignal,
): Promise<Map<string, DevicesByKind>> {
  const facilities = await client.listFacilities(signal);
  const result = new Map<string, DevicesByKind>();

  for (const facility of [...facilities].sort(
    byName((f: { displayName: string }) => f.displayName),
  )) {
    const agent = facility.agents[0];
    if (!agent) continue;

    try {
      const devices = await client.listDevices(
        facility.organizationId,
        agent.agentId,
        signal,
      );
      result.set(facility.displayName, indexDevices(devices));
    } catch (error) {
      if (signal?.aborted) throw error;
      console.error(
        `[AtlasClient] Error listing devices for facility ${facility.displayName}:`,
        error,
      );
    }
  }

  return result;
}
