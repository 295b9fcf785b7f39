/**
 * Metric catalog
 *
 * Maps (device kind, metric name) to the device property key that holds the
 * point alias for that metric on devices of that kind.
 */

/**
 * Device kinds the catalog knows about
 */
export enum DeviceKind {
  COMPRESSOR = "compressor",
  CONDENSER = "condenser",
  EVAPORATOR = "evaporator",
  VESSEL = "vessel",
}

/**
 * Metric names across all device kinds
 */
export enum MetricName {
  DISCHARGE_PRESSURE = "discharge_pressure",
  DISCHARGE_TEMPERATURE = "discharge_temperature",
  SUCTION_PRESSURE = "suction_pressure",
  SUCTION_TEMPERATURE = "suction_temperature",
  SUPPLY_TEMPERATURE = "supply_temperature",
  RETURN_TEMPERATURE = "return_temperature",
}

interface CatalogTarget {
  propertyKey: string; // Device property key, e.g. "SuctionPressure"
  label: string;
}

const METRIC_CATALOG = {
  [DeviceKind.COMPRESSOR]: {
    [MetricName.DISCHARGE_PRESSURE]: {
      propertyKey: "DischargePressure",
      label: "Discharge Pressure",
    },
    [MetricName.DISCHARGE_TEMPERATURE]: {
      propertyKey: "DischargeTemperature",
      label: "Discharge Temperature",
    },
    [MetricName.SUCTION_PRESSURE]: {
      propertyKey: "SuctionPressure",
      label: "Suction Pressure",
    },
    [MetricName.SUCTION_TEMPERATURE]: {
      propertyKey: "SuctionTemperature",
      label: "Suction Temperature",
    },
  },
  [DeviceKind.CONDENSER]: {
    [MetricName.DISCHARGE_PRESSURE]: {
      propertyKey: "DischargePressure",
      label: "Discharge Pressure",
    },
    [MetricName.DISCHARGE_TEMPERATURE]: {
      propertyKey: "DischargeTemperature",
      label: "Discharge Temperature",
    },
  },
  [DeviceKind.EVAPORATOR]: {
    [MetricName.SUPPLY_TEMPERATURE]: {
      propertyKey: "SupplyTemperature",
      label: "Supply Temperature",
    },
    [MetricName.RETURN_TEMPERATURE]: {
      propertyKey: "ReturnTemperature",
      label: "Return Temperature",
    },
  },
  [DeviceKind.VESSEL]: {
    [MetricName.SUCTION_PRESSURE]: {
      propertyKey: "SuctionPressure",
      label: "Suction Pressure",
    },
  },
} as const satisfies Record<
  DeviceKind,
  Partial<Record<MetricName, CatalogTarget>>
>;

export interface MetricCatalogEntry extends CatalogTarget {
  deviceKind: DeviceKind;
  metric: MetricName;
}

const ENTRIES: readonly MetricCatalogEntry[] = Object.freeze(
  Object.values(DeviceKind).flatMap((deviceKind) => {
    const targets: Partial<Record<MetricName, CatalogTarget>> =
      METRIC_CATALOG[deviceKind];
    return Object.values(MetricName).flatMap((metric) => {
      const target = targets[metric];
      return target
        ? [Object.freeze({ deviceKind, metric, ...target })]
        : [];
    });
  }),
);

export function isDeviceKind(value: string): value is DeviceKind {
  return Object.values<string>(DeviceKind).includes(value);
}

export function isMetricName(value: string): value is MetricName {
  return Object.values<string>(MetricName).includes(value);
}

/**
 * Look up the catalog entry for a metric on a device kind
 */
export function getCatalogEntry(
  deviceKind: DeviceKind,
  metric: MetricName,
): MetricCatalogEntry | undefined {
  return ENTRIES.find(
    (entry) => entry.deviceKind === deviceKind && entry.metric === metric,
  );
}

/**
 * Check if the metric is valid for the given device kind
 */
export function isValidMetric(
  deviceKind: DeviceKind,
  metric: MetricName,
): boolean {
  return getCatalogEntry(deviceKind, metric) !== undefined;
}

/**
 * All catalog entries, in enum order
 */
export function listCatalogEntries(): readonly MetricCatalogEntry[] {
  return ENTRIES;
}

export function metricsForKind(deviceKind: DeviceKind): MetricName[] {
  return ENTRIES.filter((entry) => entry.deviceKind === deviceKind).map(
    (entry) => entry.metric,
  );
}
