/**
 * Datagram channel used by the VISCA transport
 * The UDP implementation is swapped for an in-process camera in tests.
 */

import dgram from "node:dgram";
import { CameraConnectionError } from "../../errors";
import { cameraLogger } from "../../logger";

export interface DatagramChannel {
  send(packet: Buffer): Promise<void>;
  onMessage(listener: (packet: Buffer) => void): void;
  /** Socket faults after the channel is open, on either the send or receive side */
  onError(listener: (error: Error) => void): void;
  close(): Promise<void>;
}

export type ChannelOpener = (host: string, port: number) => Promise<DatagramChannel>;

/**
 * Open a connected UDP socket to the camera
 */
export const openUdpChannel: ChannelOpener = (host, port) =>
  new Promise<DatagramChannel>((resolve, reject) => {
    const socket = dgram.createSocket("udp4");
    const errorListeners: Array<(error: Error) => void> = [];
    let opened = false;
    let closed = false;

    const fault = (error: Error) => {
      cameraLogger.warn("UdpChannel: Socket error", {
        host,
        port,
        error: error.message,
      });
      for (const listener of errorListeners) listener(error);
    };

    // Kept for the socket's lifetime
    socket.on("error", (error) => {
      if (!opened) {
        closed = true;
        socket.close();
        reject(new CameraConnectionError(error.message, { operation: "connect" }, error));
        return;
      }
      fault(error);
    });

    socket.connect(port, host, () => {
      opened = true;
      resolve({
        send: (packet) =>
          new Promise<void>((resolveSend, rejectSend) => {
            socket.send(packet, (error) => {
              if (error) {
                // A refused send is reported like a receive-side fault
                fault(error);
                rejectSend(error);
              } else {
                resolveSend();
              }
            });
          }),
        onMessage: (listener) => {
          socket.on("message", (packet) => listener(packet));
        },
        onError: (listener) => {
          errorListeners.push(listener);
        },
        close: () =>
          new Promise<void>((resolveClose) => {
            if (closed) return resolveClose();
            closed = true;
            socket.close(() => resolveClose());
          }),
      });
    });
  });
