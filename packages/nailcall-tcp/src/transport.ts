// TCP connector for Nailgun sessions.

import net from "node:net";
import { type ChunkTransport, type Connector, ConnectionError } from "@nailcall/core";
import { SocketChunkTransport } from "./framing.ts";

/** Open a TCP connection and wrap it in a SocketChunkTransport. */
export const connectTcp: Connector = (endpoint, options) =>
  new Promise<ChunkTransport>((resolve, reject) => {
    const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });

    const timer = setTimeout(() => {
      socket.off("error", onError);
      socket.destroy();
      reject(ConnectionError.timeout(endpoint, options.timeoutMs));
    }, options.timeoutMs);

    const onError = (err: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      reject(
        err.code === "ECONNREFUSED"
          ? ConnectionError.refused(endpoint, err)
          : ConnectionError.io(endpoint, err.message, err),
      );
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      socket.setNoDelay(true);
      resolve(new SocketChunkTransport(socket));
    });
  });
