/**
 * Printer transport.
 *
 * Network receipt printers accept raw ESC/POS bytes on a TCP port (9100 by
 * convention). A print request opens one connection, writes the whole
 * operation stream in order, and closes it again.
 */

import { Socket } from "node:net";

export interface PrinterConnection {
  /** Human-readable endpoint, used in error messages. */
  readonly endpoint: string;
  open(): Promise<void>;
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type ConnectionFactory = () => PrinterConnection;

export interface TcpConnectionOptions {
  host: string;
  port?: number;
  /** Connect and idle timeout in milliseconds (default: 5000). */
  timeoutMs?: number;
}

export const DEFAULT_PRINTER_PORT = 9100;

export class TcpPrinterConnection implements PrinterConnection {
  readonly endpoint: string;
  private readonly host: string;
  private readonly port: number;
  private readonly timeoutMs: number;
  private socket: Socket | null = null;
  private failure: Error | null = null;

  constructor(options: TcpConnectionOptions) {
    this.host = options.host;
    this.port = options.port ?? DEFAULT_PRINTER_PORT;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.endpoint = `${this.host}:${this.port}`;
  }

  open(): Promise<void> {
    return new Promise<void>((resolvePromise, rejectPromise) => {
      const socket = new Socket();
      this.socket = socket;

      socket.setTimeout(this.timeoutMs);
      socket.once("timeout", () => {
        socket.destroy(new Error(`no activity for ${this.timeoutMs} ms`));
      });
      socket.on("error", (err) => {
        this.failure = err;
      });

      const onConnectError = (err: Error): void => rejectPromise(err);
      socket.once("error", onConnectError);
      socket.connect(this.port, this.host, () => {
        socket.off("error", onConnectError);
        resolvePromise();
      });
    });
  }

  write(chunk: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      return Promise.reject(this.failure ?? new Error("connection is not open"));
    }
    return new Promise<void>((resolvePromise, rejectPromise) => {
      socket.write(chunk, (err) => {
        if (err) {
          rejectPromise(err);
        } else {
          resolvePromise();
        }
      });
    });
  }

  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket || socket.destroyed) return Promise.resolve();
    return new Promise<void>((resolvePromise) => {
      socket.end(() => {
        socket.destroy();
        resolvePromise();
      });
    });
  }
}

/**
 * Factory for TCP connections to one configured printer.
 */
export function tcpConnectionFactory(options: TcpConnectionOptions): ConnectionFactory {
  return () => new TcpPrinterConnection(options);
}
