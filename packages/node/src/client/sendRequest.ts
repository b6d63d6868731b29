import net from "node:net";
import { encodeRequest } from "@barline/core";

/**
 * Deliver one request id to the daemon. Resolves once the four bytes have
 * been handed to the socket; the daemon sends nothing back.
 */
export function sendRequest(path: string, id: number): Promise<void> {
  const payload = encodeRequest(id);
  return new Promise<void>((resolve, reject) => {
    const socket = net.connect(path);
    socket.once("error", (err: Error) => {
      socket.destroy();
      reject(err);
    });
    socket.once("connect", () => {
      socket.end(payload, () => {
        socket.destroy();
        resolve();
      });
    });
  });
}
