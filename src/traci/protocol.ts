import { CMD_SIMSTEP, RESPONSE_OFFSET, RTYPE_OK, describeStatus } from "./constants";
import { TraciError, TraciReader, TraciWriter } from "./storage";

/**
 * How the server answers a command: a bare status, a status followed by a
 * result command (getters), or a status followed by the subscription count
 * (simulation step).
 */
export type ReplyShape = "status" | "result" | "step";

export interface TraciRequest {
  commandId: number;
  content: Uint8Array;
  reply: ReplyShape;
}

export interface TraciStatus {
  commandId: number;
  result: number;
  description: string;
}

export type TraciReply =
  | { ok: true; status: TraciStatus; body: TraciReader | null }
  | { ok: false; status: TraciStatus };

const SHORT_COMMAND_LIMIT = 255;

export function encodeCommand(commandId: number, content: Uint8Array): Uint8Array {
  const writer = new TraciWriter();
  const shortLength = 1 + 1 + content.length;
  if (shortLength <= SHORT_COMMAND_LIMIT) {
    writer.writeUnsignedByte(shortLength);
  } else {
    writer.writeUnsignedByte(0).writeInt(1 + 4 + 1 + content.length);
  }
  return writer.writeUnsignedByte(commandId).writeBytes(content).toBytes();
}

/** Frames commands into one message: a 4-byte total length, then the commands. */
export function encodeMessage(requests: readonly TraciRequest[]): Uint8Array {
  const body = new TraciWriter();
  for (const request of requests) {
    body.writeBytes(encodeCommand(request.commandId, request.content));
  }
  const writer = new TraciWriter();
  writer.writeInt(body.length + 4);
  writer.writeBytes(body.toBytes());
  return writer.toBytes();
}

export function getVariableRequest(commandId: number, variable: number, objectId: string): TraciRequest {
  const content = new TraciWriter().writeUnsignedByte(variable).writeString(objectId).toBytes();
  return { commandId, content, reply: "result" };
}

export function readStatus(reader: TraciReader): TraciStatus {
  const length = reader.readUnsignedByte();
  if (length === 0) {
    reader.readInt();
  }
  const commandId = reader.readUnsignedByte();
  const result = reader.readUnsignedByte();
  const description = reader.readString();
  return { commandId, result, description };
}

/** Reads one length-prefixed response command and returns a reader over its body. */
export function readResponseCommand(reader: TraciReader): { commandId: number; body: TraciReader } {
  let length = reader.readUnsignedByte();
  let header = 1;
  if (length === 0) {
    length = reader.readInt();
    header = 5;
  }
  const commandId = reader.readUnsignedByte();
  const bodyLength = length - header - 1;
  return { commandId, body: new TraciReader(reader.readBytes(bodyLength)) };
}

/**
 * Splits a reply message (without its 4-byte length prefix) into one reply
 * per request. A failed command carries no result, so decoding continues
 * with the next status.
 */
export function decodeReplies(
  message: Uint8Array,
  requests: readonly TraciRequest[]
): TraciReply[] {
  const reader = new TraciReader(message);
  const replies: TraciReply[] = [];
  for (const request of requests) {
    const status = readStatus(reader);
    if (status.commandId !== request.commandId) {
      throw new TraciError(
        `Received answer 0x${status.commandId.toString(16)} for command 0x${request.commandId.toString(16)}.`,
        request.commandId,
        status.result
      );
    }
    if (status.result !== RTYPE_OK) {
      replies.push({ ok: false, status });
      continue;
    }
    if (request.reply === "status") {
      replies.push({ ok: true, status, body: null });
      continue;
    }
    if (request.reply === "step") {
      const subscriptions = reader.readInt();
      if (subscriptions !== 0) {
        throw new TraciError(
          `Unexpected ${subscriptions} subscription result(s) after a step.`,
          CMD_SIMSTEP
        );
      }
      replies.push({ ok: true, status, body: null });
      continue;
    }
    const response = readResponseCommand(reader);
    const expected = expectedResponseId(request.commandId);
    if (response.commandId !== expected) {
      throw new TraciError(
        `Expected response 0x${expected.toString(16)}, got 0x${response.commandId.toString(16)}.`,
        request.commandId
      );
    }
    replies.push({ ok: true, status, body: response.body });
  }
  return replies;
}

/** Getter commands (0xa0..0xaf) answer with +0x10; the rest answer with their own id. */
export function expectedResponseId(commandId: number): number {
  return commandId >= 0xa0 && commandId <= 0xaf ? commandId + RESPONSE_OFFSET : commandId;
}

export function statusError(reply: { status: TraciStatus }, context: string): TraciError {
  const { status } = reply;
  const detail = status.description || describeStatus(status.result);
  return new TraciError(`${context}: ${detail}`, status.commandId, status.result);
}
