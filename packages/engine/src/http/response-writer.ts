import type { ITcpSocket } from "../interfaces/socket.js";
import type { HttpResponse } from "./response.js";

/**
 * Send a complete HTTP response (headers + body) over a socket. Every
 * connection carries a single exchange, so `connection: close` is added
 * unless the handler set it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  if (!response.headers.has("connection")) {
    response.addHeader("Connection", "close");
  }

  const data = response.serialize();
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}
