import { describe, expect, it, vi } from "vitest";
import { decodeMessage, decodeMessages, OBSERVATION_SLOTS, type Observation, type StationMessage } from "../decoder.js";
import type { RawMessage, RawObservation } from "../reader.js";

// 2024-01-01T00:00:00Z
const TS = 1_704_067_200;

function obsSlots(): (number | null)[] {
  return [TS, 0.5, 1.8, 3.1, 270, 3, 1002.4, 18.5, 64, 32000, 2.4, 267, 0.1, 1, 12, 2, 2.63, 1];
}

function rawObservation(slots: (number | null)[] = obsSlots()): RawObservation {
  return {
    type: "obs_st",
    serial_number: "ST-00000001",
    hub_sn: "HB-00000001",
    firmware_revision: 171,
    obs: [slots],
  };
}

function withSlot(index: number, value: number | null): (number | null)[] {
  const slots = obsSlots();
  slots[index] = value;
  return slots;
}

function decodeObservationOk(raw: RawObservation): Observation {
  const result = decodeMessage(raw);
  if (!result.ok || result.message.type !== "observation") {
    throw new Error(`expected an observation, got ${JSON.stringify(result)}`);
  }
  return result.message;
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

describe("decodeMessage()", () => {
  describe("events", () => {
    it("decodes a precipitation event", () => {
      const result = decodeMessage({ type: "evt_precip", serial_number: "ST-00000001", hub_sn: "HB-00000001", evt: [TS] });
      expect(result).toEqual({
        ok: true,
        message: {
          type: "precip_event",
          serialNumber: "ST-00000001",
          hubSerialNumber: "HB-00000001",
          timestamp: new Date("2024-01-01T00:00:00Z"),
        },
      });
    });

    it("decodes a lightning strike event", () => {
      const result = decodeMessage({ type: "evt_strike", serial_number: "ST-00000001", evt: [TS, 27, 3848] });
      expect(result).toEqual({
        ok: true,
        message: {
          type: "strike_event",
          serialNumber: "ST-00000001",
          timestamp: new Date("2024-01-01T00:00:00Z"),
          distance: 27,
          energy: 3848,
        },
      });
    });

    it("decodes rapid wind", () => {
      const result = decodeMessage({ type: "rapid_wind", serial_number: "ST-00000001", ob: [TS, 2.3, 128] });
      if (!result.ok || result.message.type !== "rapid_wind") throw new Error("expected rapid wind");
      expect(result.message.timestamp.toISOString()).toBe("2024-01-01T00:00:00.000Z");
      expect(result.message.wind.speedMagnitude).toBe(2.3);
      expect(result.message.wind.sourceDirection).toBe(128);
      expect(result.message.hubSerialNumber).toBeUndefined();
    });
  });

  describe("observations", () => {
    it("names every slot", () => {
      const obs = decodeObservationOk(rawObservation());
      expect(obs.timestamp).toEqual(new Date("2024-01-01T00:00:00Z"));
      expect(obs.serialNumber).toBe("ST-00000001");
      expect(obs.hubSerialNumber).toBe("HB-00000001");
      expect(obs.firmwareRevision).toBe(171);
      expect(obs.wind?.lull.speedMagnitude).toBe(0.5);
      expect(obs.wind?.avg.speedMagnitude).toBe(1.8);
      expect(obs.wind?.gust.speedMagnitude).toBe(3.1);
      expect(obs.wind?.gust.sourceDirection).toBe(270);
      expect(obs.wind?.intervalMs).toBe(3000);
      expect(obs.stationPressure).toBe(1002.4);
      expect(obs.airTemperature).toBe(18.5);
      expect(obs.relativeHumidity).toBe(64);
      expect(obs.solar).toEqual({ illuminance: 32000, ultravioletIndex: 2.4, irradiance: 267 });
      expect(obs.precip).toEqual({ quantityLastMinute: 0.1, kind: "rain" });
      expect(obs.lightning).toEqual({ averageDistance: 12, count: 2 });
      expect(obs.batteryVolts).toBe(2.63);
      expect(obs.reportIntervalMs).toBe(60_000);
    });

    it("decodes each precipitation code", () => {
      const kinds = [0, 1, 2, 3].map(
        (code) => decodeObservationOk(rawObservation(withSlot(OBSERVATION_SLOTS.precipType, code))).precip?.kind
      );
      expect(kinds).toEqual(["none", "rain", "hail", "rain_hail"]);
    });

    it("drops the whole wind group when the direction is missing", () => {
      const obs = decodeObservationOk(rawObservation(withSlot(OBSERVATION_SLOTS.windDirection, null)));
      expect(obs.wind).toBeUndefined();
      expect("wind" in obs).toBe(false);
      expect(obs.airTemperature).toBe(18.5);
    });

    it("drops each group independently", () => {
      const slots = obsSlots();
      slots[OBSERVATION_SLOTS.irradiance] = null;
      slots[OBSERVATION_SLOTS.precipType] = null;
      slots[OBSERVATION_SLOTS.lightningCount] = null;
      const obs = decodeObservationOk(rawObservation(slots));
      expect(obs.wind).toBeDefined();
      expect(obs.solar).toBeUndefined();
      expect(obs.precip).toBeUndefined();
      expect(obs.lightning).toBeUndefined();
    });

    it("leaves missing scalars absent", () => {
      const slots = obsSlots();
      slots[OBSERVATION_SLOTS.stationPressure] = null;
      slots[OBSERVATION_SLOTS.airTemperature] = null;
      slots[OBSERVATION_SLOTS.relativeHumidity] = null;
      const obs = decodeObservationOk(rawObservation(slots));
      expect(obs.stationPressure).toBeUndefined();
      expect(obs.airTemperature).toBeUndefined();
      expect(obs.relativeHumidity).toBeUndefined();
    });

    it("treats a short slot array as missing trailing fields", () => {
      const result = decodeMessage(rawObservation(obsSlots().slice(0, 16)));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe("Missing battery voltage");
    });

    it.each([
      [OBSERVATION_SLOTS.timestamp, "Missing observation timestamp"],
      [OBSERVATION_SLOTS.batteryVolts, "Missing battery voltage"],
      [OBSERVATION_SLOTS.reportInterval, "Missing report interval"],
    ])("fails when required slot %i is missing", (index, message) => {
      const result = decodeMessage(rawObservation(withSlot(index, null)));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("missing_field");
        expect(result.error.message).toBe(message);
      }
    });

    it("fails on an unknown precipitation code and hands back the raw message untouched", () => {
      const raw = rawObservation(withSlot(OBSERVATION_SLOTS.precipType, 9));
      const before = structuredClone(raw);

      const result = decodeMessage(raw);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.raw).toBe(raw);
        expect(result.raw).toEqual(before);
        expect(result.error.kind).toBe("unrecognized_code");
        expect(result.error.message).toBe("Unrecognized precip type 9");
      }
    });

    it("fails on an observation timestamp a Date cannot hold", () => {
      const result = decodeMessage(rawObservation(withSlot(OBSERVATION_SLOTS.timestamp, 1e16)));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("out_of_range");
        expect(result.error.message).toBe("Timestamp 10000000000000000 is outside the representable range");
      }
    });

    it("rejects a fractional precipitation code", () => {
      expect(decodeMessage(rawObservation(withSlot(OBSERVATION_SLOTS.precipType, 1.5))).ok).toBe(false);
    });
  });

  describe("status messages", () => {
    it("decodes device status", () => {
      const result = decodeMessage({
        type: "device_status",
        serial_number: "ST-00000001",
        hub_sn: "HB-00000001",
        timestamp: TS,
        uptime: 2189,
        voltage: 3.5,
        firmware_revision: 17,
        rssi: -17,
        hub_rssi: -87,
        sensor_status: 0x8008,
        debug: 0,
      });
      if (!result.ok || result.message.type !== "device_status") throw new Error("expected device status");
      expect(result.message.uptimeMs).toBe(2_189_000);
      expect(result.message.hubRssi).toBe(-87);
      expect(result.message.debug).toBe(false);
      expect(result.message.sensorStatus.pressureFailed).toBe(true);
      expect(result.message.sensorStatus.powerBoosterDepleted).toBe(true);
      expect(result.message.sensorStatus.windFailed).toBe(false);
    });

    it("decodes hub status", () => {
      const result = decodeMessage({
        type: "hub_status",
        serial_number: "HB-00000001",
        firmware_revision: "35",
        uptime: 1670133,
        rssi: -62,
        timestamp: TS,
        reset_flags: "BOR,PIN,POR",
        seq: 48,
      });
      if (!result.ok || result.message.type !== "hub_status") throw new Error("expected hub status");
      expect(result.message.timestamp).toEqual(new Date("2024-01-01T00:00:00Z"));
      expect(result.message.uptimeMs).toBe(1_670_133_000);
      expect(result.message.resetFlags.brownout).toBe(true);
      expect(result.message.resetFlags.powerOn).toBe(true);
      expect(result.message.resetFlags.watchdog).toBe(false);
      expect(result.message.seq).toBe(48);
      expect(result.message.serialNumber).toBe("HB-00000001");
      expect("hubSerialNumber" in result.message).toBe(false);
    });

    it("fails hub status with an unknown reset flag", () => {
      const raw: RawMessage = {
        type: "hub_status",
        serial_number: "HB-00000001",
        firmware_revision: "35",
        uptime: 10,
        rssi: -62,
        timestamp: TS,
        reset_flags: "BOR,XYZ",
        seq: 1,
      };
      const result = decodeMessage(raw);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.raw).toBe(raw);
        expect(result.error.kind).toBe("unrecognized_code");
      }
    });
  });
});

describe("decodeMessages()", () => {
  it("skips an undecodable message and keeps going", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bad = rawObservation(withSlot(OBSERVATION_SLOTS.precipType, 9));
    const good = rawObservation();

    const messages: StationMessage[] = await collect(
      decodeMessages(fromArray<RawMessage>([bad, good, { type: "evt_precip", serial_number: "ST-00000001", evt: [TS] }]))
    );

    expect(messages.map((m) => m.type)).toEqual(["observation", "precip_event"]);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(1, `Dropped undecodable message: ${JSON.stringify(bad)}`);
    expect(warn).toHaveBeenNthCalledWith(2, ".. error was: Unrecognized precip type 9");
    warn.mockRestore();
  });

  it("ends when the source ends", async () => {
    expect(await collect(decodeMessages(fromArray<RawMessage>([])))).toEqual([]);
  });
});
