import dgram from "dgram";
import { on, type EventEmitter } from "events";

export const DEFAULT_UDP_PORT = 50222;

export function bindReceiver(port: number = DEFAULT_UDP_PORT): Promise<dgram.Socket> {
  const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });
  return new Promise((resolve, reject) => {
    socket.once("error", reject);
    socket.bind(port, () => {
      socket.off("error", reject);
      console.log(`Listening for station broadcasts on udp/${port}`);
      resolve(socket);
    });
  });
}

/**
 * Yields each datagram received on the socket as text. Ends when the signal
 * aborts or the socket reports an error.
 */
export async function* receivePackets(socket: EventEmitter, signal?: AbortSignal): AsyncGenerator<string> {
  try {
    for await (const [packet] of on(socket, "message", { signal })) {
      if (Buffer.isBuffer(packet)) {
        yield packet.toString("utf8");
      }
    }
  } catch (err) {
    if (signal?.aborted) return;
    console.warn("Receiver terminated: socket error", err);
  }
}
