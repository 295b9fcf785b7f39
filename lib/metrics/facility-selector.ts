import type { IAtlasClient } from "../atlas/client";
import type { Facility } from "../atlas/types";
import { UnknownFacility } from "./errors";

/**
 * A facility together with the ids queries are addressed by
 */
export interface FacilityTarget {
  facility: Facility;
  orgId: string;
  agentId: string;
}

export function compareFacilities(a: FacilityTarget, b: FacilityTarget): number {
  const left = a.facility.shortName;
  const right = b.facility.shortName;
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Pick the facilities a filter refers to, ordered by short name
 *
 * With no short names every accessible facility is returned, minus those
 * without an agent (they cannot be queried). A named facility that does not
 * exist, or has no agent, is an error.
 *
 * @throws UnknownFacility listing every name that could not be matched
 */
export async function selectFacilities(
  client: IAtlasClient,
  shortNames: string[] | undefined,
  signal?: AbortSignal,
): Promise<FacilityTarget[]> {
  const facilities = await client.listFacilities(signal);

  const toTarget = (facility: Facility): FacilityTarget | undefined => {
    const agent = facility.agents[0];
    return agent
      ? { facility, orgId: facility.organizationId, agentId: agent.agentId }
      : undefined;
  };

  if (!shortNames || shortNames.length === 0) {
    const targets: FacilityTarget[] = [];
    for (const facility of facilities) {
      const target = toTarget(facility);
      if (target) {
        targets.push(target);
      } else {
        console.warn(
          `[FacilitySelector] Skipping facility ${facility.shortName}: no agent`,
        );
      }
    }
    return targets.sort(compareFacilities);
  }

  const wanted = Array.from(new Set(shortNames));
  const targets: FacilityTarget[] = [];
  const missing: string[] = [];

  for (const name of wanted) {
    const facility = facilities.find((f) => f.shortName === name);
    const target = facility ? toTarget(facility) : undefined;
    if (target) {
      targets.push(target);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw new UnknownFacility(missing);
  }

  return targets.sort(compareFacilities);
}
