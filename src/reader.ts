import { z } from "zod";

/** Unix seconds, limited to what a Date can hold */
const epochSeconds = z.number().int().min(0).max(8_640_000_000_000);

const deviceFields = {
  serial_number: z.string(),
  hub_sn: z.string().optional(),
};

/** One slot of an obs_st reading; the station sends null for a sensor it has no value for */
const observationSlot = z.number().nullable();

export const rawPrecipEventSchema = z.object({
  type: z.literal("evt_precip"),
  ...deviceFields,
  evt: z.tuple([epochSeconds]),
});

export const rawStrikeEventSchema = z.object({
  type: z.literal("evt_strike"),
  ...deviceFields,
  evt: z.tuple([epochSeconds, z.number(), z.number()]),
});

export const rawRapidWindSchema = z.object({
  type: z.literal("rapid_wind"),
  ...deviceFields,
  ob: z.tuple([epochSeconds, z.number(), z.number()]),
});

export const rawObservationSchema = z.object({
  type: z.literal("obs_st"),
  ...deviceFields,
  firmware_revision: z.number().int(),
  obs: z.array(z.array(observationSlot).max(18)).nonempty(),
});

export const rawDeviceStatusSchema = z.object({
  type: z.literal("device_status"),
  ...deviceFields,
  timestamp: epochSeconds,
  uptime: z.number(),
  voltage: z.number(),
  firmware_revision: z.number().int(),
  rssi: z.number(),
  hub_rssi: z.number(),
  sensor_status: z.number().int(),
  debug: z.number().int(),
});

export const rawHubStatusSchema = z.object({
  type: z.literal("hub_status"),
  serial_number: z.string(),
  firmware_revision: z.union([z.string(), z.number()]).transform(String),
  uptime: z.number(),
  rssi: z.number(),
  timestamp: epochSeconds,
  reset_flags: z.string(),
  seq: z.number().int(),
  radio_stats: z.array(z.number()).optional(),
});

export const rawMessageSchema = z.discriminatedUnion("type", [
  rawPrecipEventSchema,
  rawStrikeEventSchema,
  rawRapidWindSchema,
  rawObservationSchema,
  rawDeviceStatusSchema,
  rawHubStatusSchema,
]);

export type RawPrecipEvent = z.infer<typeof rawPrecipEventSchema>;
export type RawStrikeEvent = z.infer<typeof rawStrikeEventSchema>;
export type RawRapidWind = z.infer<typeof rawRapidWindSchema>;
export type RawObservation = z.infer<typeof rawObservationSchema>;
export type RawDeviceStatus = z.infer<typeof rawDeviceStatusSchema>;
export type RawHubStatus = z.infer<typeof rawHubStatusSchema>;
export type RawMessage = z.infer<typeof rawMessageSchema>;

export type ReadResult = { ok: true; message: RawMessage } | { ok: false; error: Error };

/** Parses one UDP packet's JSON text into a raw message variant */
export function readRawMessage(json: string): ReadResult {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }

  const parsed = rawMessageSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: parsed.error };
  }
  return { ok: true, message: parsed.data };
}

/**
 * Turns a sequence of packet strings into raw messages, logging and skipping
 * anything that is not valid JSON or not one of the known message shapes.
 */
export async function* readRawMessages(packets: AsyncIterable<string>): AsyncGenerator<RawMessage> {
  for await (const json of packets) {
    const result = readRawMessage(json);
    if (result.ok) {
      yield result.message;
    } else {
      console.warn(`Dropped unreadable message: ${json}`);
      console.warn(`.. error was: ${result.error.message}`);
    }
  }
}
