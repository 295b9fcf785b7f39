/**
 * Wire schemas for Atlas API responses
 *
 * Responses are validated here and mapped from snake_case wire fields to the
 * camelCase domain types in ./types.
 */

import { z } from "zod";
import type {
  Device,
  Facility,
  HistoricalValues,
  HistoricalValuesPage,
  PointValues,
} from "./types";

export class AtlasResponseError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[],
    public readonly rawData: unknown,
  ) {
    super(message);
    this.name = "AtlasResponseError";
  }
}

export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context: string,
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new AtlasResponseError(
      `Response validation failed for ${context}: ${result.error.message}`,
      result.error.issues,
      data,
    );
  }
  return result.data;
}

// Ids are opaque; the API sends some of them as numbers
const IdSchema = z.union([z.string(), z.number()]).transform(String);

export const TokenResponseSchema = z.object({
  access_token: z.string().optional(),
  expires_in: z.number().optional(),
});

export const UserInfoSchema = z.object({
  sub: z.string().min(1),
});

export const FacilitySchema = z
  .object({
    organization_id: IdSchema,
    facility_id: IdSchema,
    display_name: z.string(),
    short_name: z.string(),
    address: z.string().nullish(),
    timezone: z.string().nullish(),
    agents: z.array(z.object({ agent_id: IdSchema })).nullish(),
  })
  .transform(
    (raw): Facility => ({
      organizationId: raw.organization_id,
      facilityId: raw.facility_id,
      displayName: raw.display_name,
      shortName: raw.short_name,
      address: raw.address ?? "",
      timezone: raw.timezone || "UTC",
      agents: (raw.agents ?? []).map((agent) => ({ agentId: agent.agent_id })),
    }),
  );

export const FacilitiesResponseSchema = z.array(FacilitySchema);

const ConnectionSchema = z
  .object({ device_id: IdSchema, kind: z.string() })
  .transform((raw) => ({ deviceId: raw.device_id, kind: raw.kind }));

export const DeviceSchema = z
  .object({
    id: IdSchema,
    name: z.string(),
    alias: z.string(),
    kind: z.string(),
    properties: z
      .array(
        z.object({
          key: z.string(),
          value: z.object({
            alias: z.string(),
            name: z.string(),
            kind: z.string(),
            bias: z.string(),
          }),
        }),
      )
      .nullish(),
    upstream: z.array(ConnectionSchema).nullish(),
    downstream: z.array(ConnectionSchema).nullish(),
  })
  .transform(
    (raw): Device => ({
      id: raw.id,
      name: raw.name,
      alias: raw.alias,
      kind: raw.kind,
      properties: raw.properties ?? [],
      upstream: raw.upstream ?? [],
      downstream: raw.downstream ?? [],
    }),
  );

export const DevicesResponseSchema = z
  .object({ values: z.array(DeviceSchema).nullish() })
  .transform((raw): Device[] => raw.values ?? []);

export const PointIdsResponseSchema = z.record(z.string(), IdSchema);

const SampleSeriesSchema = <T extends z.ZodTypeAny>(value: T) =>
  z
    .object({
      timestamps: z.array(z.number()),
      values: z.array(value),
    })
    .refine((series) => series.timestamps.length === series.values.length, {
      message: "timestamps and values differ in length",
    });

const PointValuesSchema = z
  .object({
    analog: SampleSeriesSchema(z.number()).nullish(),
    discrete: SampleSeriesSchema(z.boolean()).nullish(),
  })
  .transform(
    (raw): PointValues => ({
      analog: raw.analog ?? undefined,
      discrete: raw.discrete ?? undefined,
    }),
  );

const HistoricalValuesSchema = z
  .object({
    point_id: IdSchema,
    values: z.object({
      avg: PointValuesSchema.optional(),
      min: PointValuesSchema.optional(),
      max: PointValuesSchema.optional(),
      first: PointValuesSchema.optional(),
      last: PointValuesSchema.optional(),
    }),
  })
  .transform(
    (raw): HistoricalValues => ({ pointId: raw.point_id, values: raw.values }),
  );

/**
 * facility-readings answers with a bare array when everything fits in one
 * page, or with { values, next_page_token } when it paginates
 */
export const HistoricalValuesResponseSchema = z
  .union([
    z.array(HistoricalValuesSchema),
    z.object({
      values: z.array(HistoricalValuesSchema),
      next_page_token: z.string().nullish(),
    }),
  ])
  .transform((raw): HistoricalValuesPage => {
    if (Array.isArray(raw)) return { values: raw };
    return {
      values: raw.values,
      nextPageToken: raw.next_page_token || undefined,
    };
  });

const RawHourlyRateSchema = z.object({ start: z.number(), rate: z.number() });

export const HourlyRatesResponseSchema = z.object({
  usage_rate: z.array(RawHourlyRateSchema).nullish(),
  maximum_demand_charge: z.array(RawHourlyRateSchema).nullish(),
  time_of_use_demand_charge: z.array(RawHourlyRateSchema).nullish(),
  day_ahead_market_rate: z.array(RawHourlyRateSchema).nullish(),
  real_time_market_rate: z.array(RawHourlyRateSchema).nullish(),
});

export type RawHourlyRate = z.output<typeof RawHourlyRateSchema>;
