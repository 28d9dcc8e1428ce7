import { Socket, createConnection } from "net";
import { createDebugLog } from "../debug";
import { TraciReply, TraciRequest, decodeReplies, encodeMessage } from "./protocol";
import { TraciError, TraciReader } from "./storage";

interface PendingMessage {
  resolve: (message: Uint8Array) => void;
  reject: (error: Error) => void;
}

const debugLog = createDebugLog("traci");

/**
 * Request/reply transport over one TCP socket. Messages are sent one at a
 * time; a batch of commands travels in a single message and its replies are
 * decoded in order.
 */
export class TraciClient {
  private readonly socket: Socket;
  private buffered: Buffer = Buffer.alloc(0);
  private pending: PendingMessage | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private closedError: Error | null = null;

  constructor(socket: Socket) {
    this.socket = socket;
    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => this.handleData(chunk));
    socket.on("error", (error: Error) => this.handleClosed(error));
    socket.on("close", () => this.handleClosed(new TraciError("TraCI connection closed.")));
  }

  static connect(host: string, port: number): Promise<TraciClient> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port });
      const onError = (error: Error) => {
        socket.destroy();
        reject(error);
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(new TraciClient(socket));
      });
    });
  }

  isClosed(): boolean {
    return this.closedError !== null;
  }

  send(requests: readonly TraciRequest[]): Promise<TraciReply[]> {
    const run = this.queue.then(() => this.exchange(requests));
    this.queue = run.catch(() => undefined);
    return run;
  }

  close(): void {
    this.handleClosed(new TraciError("TraCI connection closed."));
    this.socket.destroy();
  }

  private async exchange(requests: readonly TraciRequest[]): Promise<TraciReply[]> {
    if (this.closedError) {
      throw this.closedError;
    }
    if (!requests.length) {
      return [];
    }
    const reply = new Promise<Uint8Array>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    const message = encodeMessage(requests);
    debugLog(`send ${requests.length} command(s), ${message.length} bytes`);
    this.socket.write(message);
    const body = await reply;
    return decodeReplies(body, requests);
  }

  private handleData(chunk: Buffer) {
    this.buffered = this.buffered.length ? Buffer.concat([this.buffered, chunk]) : chunk;
    while (this.buffered.length >= 4) {
      const total = new TraciReader(this.buffered.subarray(0, 4)).readInt();
      if (total < 4) {
        this.handleClosed(new TraciError(`Invalid TraCI message length ${total}.`));
        this.socket.destroy();
        return;
      }
      if (this.buffered.length < total) {
        return;
      }
      const body = Uint8Array.from(this.buffered.subarray(4, total));
      this.buffered = this.buffered.subarray(total);
      const pending = this.pending;
      this.pending = null;
      if (pending) {
        pending.resolve(body);
      } else {
        debugLog(`dropping unsolicited message of ${total} bytes`);
      }
    }
  }

  private handleClosed(error: Error) {
    if (!this.closedError) {
      this.closedError = error;
    }
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }
}
