/**
 * Point Resolver
 *
 * Turns a Filter into the set of points to query: selects facilities, lists
 * their devices, and matches each spec against the devices of its kind.
 * Output is deduplicated on (facility, device, alias) and ordered by
 * (facility short name, device id, metric label).
 */

import type { IAtlasClient } from "../atlas/client";
import type { Device } from "../atlas/types";
import {
  selectFacilities,
  type FacilityTarget,
} from "./facility-selector";
import {
  createAliasMatcher,
  validateFilter,
  type AliasMatcher,
  type DeviceMetricSpec,
  type Filter,
} from "./filter";
import type {
  MissingMetricPolicy,
  PointBinding,
  UnresolvedMetric,
} from "./types";

export interface PointResolverOptions {
  missingMetricPolicy?: MissingMetricPolicy;
  debug?: boolean;
}

export interface FacilityResolution {
  target: FacilityTarget;
  bindings: PointBinding[];
  unresolved: UnresolvedMetric[];
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareBindings(a: PointBinding, b: PointBinding): number {
  return (
    compareStrings(a.facility.shortName, b.facility.shortName) ||
    compareStrings(a.device.id, b.device.id) ||
    compareStrings(a.label, b.label)
  );
}

export function bindingKey(binding: PointBinding): string {
  return `${binding.facility.shortName}\u0000${binding.device.id}\u0000${binding.pointAlias}`;
}

export class PointResolver {
  private readonly missingMetricPolicy: MissingMetricPolicy;
  private readonly debug: boolean;

  constructor(
    private readonly client: IAtlasClient,
    options: PointResolverOptions = {},
  ) {
    this.missingMetricPolicy = options.missingMetricPolicy ?? "skip";
    this.debug = options.debug ?? false;
  }

  /**
   * Resolve a filter to point bindings across all selected facilities.
   * Fails fast: the first facility whose devices cannot be listed rejects
   * the whole call. MetricsReader resolves per facility instead, so one
   * failure only marks that facility.
   *
   * @throws InvalidFilter before any request is made
   * @throws UnknownFacility if a named facility does not exist
   */
  async resolve(filter: Filter, signal?: AbortSignal): Promise<PointBinding[]> {
    validateFilter(filter);
    const targets = await selectFacilities(
      this.client,
      filter.facilities,
      signal,
    );

    const resolutions = await Promise.all(
      targets.map((target) =>
        this.resolveFacility(target, filter.metrics, signal),
      ),
    );
    return resolutions.flatMap((resolution) => resolution.bindings);
  }

  /**
   * List one facility's devices and match the specs against them
   */
  async resolveFacility(
    target: FacilityTarget,
    specs: DeviceMetricSpec[],
    signal?: AbortSignal,
  ): Promise<FacilityResolution> {
    const devices = await this.client.listDevices(
      target.orgId,
      target.agentId,
      signal,
    );
    return this.resolveDevices(target, devices, specs);
  }

  resolveDevices(
    target: FacilityTarget,
    devices: Device[],
    specs: DeviceMetricSpec[],
  ): FacilityResolution {
    const matchers = specs.map(createAliasMatcher);
    const kinds = new Set<string>(specs.map((spec) => spec.deviceKind));

    const seen = new Set<string>();
    const bindings: PointBinding[] = [];
    const unresolved: UnresolvedMetric[] = [];

    for (const device of devices) {
      if (!kinds.has(device.kind)) continue;

      for (const matcher of matchers) {
        if (matcher.spec.deviceKind !== device.kind) continue;

        const matches = matcher.match(device);
        if (matches.length === 0 && matcher.expectsMatch) {
          this.noteMissing(target, device, matcher, unresolved);
          continue;
        }

        for (const { alias, label } of matches) {
          const binding: PointBinding = {
            facility: target.facility,
            device,
            spec: matcher.spec,
            label,
            pointAlias: alias,
          };
          const key = bindingKey(binding);
          if (seen.has(key)) continue;
          seen.add(key);
          bindings.push(binding);
        }
      }
    }

    if (this.debug) {
      console.log(
        `[PointResolver] ${target.facility.shortName}: ${bindings.length} points on ${devices.length} devices`,
      );
    }

    return { target, bindings: bindings.sort(compareBindings), unresolved };
  }

  private noteMissing(
    target: FacilityTarget,
    device: Device,
    matcher: AliasMatcher,
    unresolved: UnresolvedMetric[],
  ): void {
    const label =
      matcher.spec.type === "catalog"
        ? matcher.spec.metric
        : matcher.spec.aliasRegex;

    if (this.missingMetricPolicy === "report") {
      unresolved.push({
        facilityShortName: target.facility.shortName,
        deviceId: device.id,
        deviceName: device.name,
        label,
        reason: "missing-property",
      });
    } else if (this.debug) {
      console.log(
        `[PointResolver] ${target.facility.shortName}/${device.name} has no ${label}, skipping`,
      );
    }
  }
}
