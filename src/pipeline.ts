import type { StationMessage } from "./decoder.js";

export interface ReportHandler {
  handleReport(msg: StationMessage): void;
}

/**
 * Feeds every decoded message to each handler until the source ends or the
 * signal aborts. Stopping only happens between messages. A handler that
 * throws is logged; the others still see the message.
 *
 * @returns the number of messages handled
 */
export async function pumpMessages(
  messages: AsyncIterable<StationMessage>,
  handlers: ReportHandler[],
  signal?: AbortSignal
): Promise<number> {
  let count = 0;

  for await (const msg of messages) {
    for (const handler of handlers) {
      try {
        handler.handleReport(msg);
      } catch (err) {
        console.error(`Failed to handle ${msg.type} message:`, err);
      }
    }

    count++;
    if (count === 1) {
      console.log("Station API is alive");
    }

    if (signal?.aborted) {
      console.log("Message pump stopping");
      break;
    }
  }

  return count;
}
