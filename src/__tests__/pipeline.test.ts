import { describe, expect, it, vi } from "vitest";
import type { StationMessage } from "../decoder.js";
import { pumpMessages, type ReportHandler } from "../pipeline.js";

function precip(n: number): StationMessage {
  return { type: "precip_event", serialNumber: `ST-0000000${n}`, timestamp: new Date(n * 1000) };
}

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  yield* items;
}

function recorder(): ReportHandler & { seen: string[] } {
  const seen: string[] = [];
  return { seen, handleReport: (msg) => void seen.push(msg.serialNumber) };
}

describe("pumpMessages()", () => {
  it("hands every message to every handler", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const a = recorder();
    const b = recorder();

    const count = await pumpMessages(fromArray([precip(1), precip(2)]), [a, b]);

    expect(count).toBe(2);
    expect(a.seen).toEqual(["ST-00000001", "ST-00000002"]);
    expect(b.seen).toEqual(["ST-00000001", "ST-00000002"]);
    expect(log).toHaveBeenCalledWith("Station API is alive");
    log.mockRestore();
  });

  it("keeps going when a handler throws", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "log").mockImplementation(() => {});
    const failing: ReportHandler = {
      handleReport: () => {
        throw new Error("sink down");
      },
    };
    const ok = recorder();

    const count = await pumpMessages(fromArray([precip(1), precip(2)]), [failing, ok]);

    expect(count).toBe(2);
    expect(ok.seen).toEqual(["ST-00000001", "ST-00000002"]);
    expect(error).toHaveBeenCalledTimes(2);
    vi.restoreAllMocks();
  });

  it("stops between messages once aborted", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const controller = new AbortController();
    const seen: string[] = [];
    const stopper: ReportHandler = {
      handleReport: (msg) => {
        seen.push(msg.serialNumber);
        controller.abort();
      },
    };

    const count = await pumpMessages(fromArray([precip(1), precip(2), precip(3)]), [stopper], controller.signal);

    expect(count).toBe(1);
    expect(seen).toEqual(["ST-00000001"]);
    vi.restoreAllMocks();
  });

  it("returns zero for an empty source", async () => {
    expect(await pumpMessages(fromArray<StationMessage>([]), [recorder()])).toBe(0);
  });
});
