import type {
  EntityReading,
  SignalSample,
  SimulatorConnection,
  VehicleSample
} from "../sim/connection";
import {
  CMD_CLOSE,
  CMD_GETVERSION,
  CMD_GET_SIM_VARIABLE,
  CMD_GET_TL_VARIABLE,
  CMD_GET_VEHICLE_VARIABLE,
  CMD_SETORDER,
  CMD_SET_TL_VARIABLE,
  CMD_SIMSTEP,
  ID_LIST,
  TL_CURRENT_PHASE,
  TL_CURRENT_PROGRAM,
  TL_PHASE_INDEX,
  TL_PROGRAM,
  TL_RED_YELLOW_GREEN_STATE,
  TYPE_INTEGER,
  TYPE_STRING,
  VAR_LANEPOSITION,
  VAR_LANE_ID,
  VAR_POSITION,
  VAR_ROAD_ID,
  VAR_SPEED,
  VAR_TIME,
  VAR_TYPE
} from "./constants";
import type { TraciClient } from "./client";
import { TraciReply, TraciRequest, getVariableRequest, statusError } from "./protocol";
import { TraciError, TraciReader, TraciWriter } from "./storage";

/** Ids read per message, so one tick never builds an unbounded frame. */
export const READ_BATCH_SIZE = 200;

const VEHICLE_VARIABLES = [
  VAR_POSITION,
  VAR_SPEED,
  VAR_ROAD_ID,
  VAR_LANE_ID,
  VAR_LANEPOSITION,
  VAR_TYPE
] as const;

const SIGNAL_VARIABLES = [TL_RED_YELLOW_GREEN_STATE, TL_CURRENT_PROGRAM, TL_CURRENT_PHASE] as const;

export interface TraciVersion {
  apiVersion: number;
  identifier: string;
}

export interface TraciSessionOptions {
  /** Runs after the connection is closed, e.g. to reap the simulator process. */
  onClose?: () => void;
}

/** A TraCI connection exposed through the simulator handle the viewer uses. */
export class TraciSession implements SimulatorConnection {
  private readonly client: TraciClient;
  private readonly onClose: () => void;
  private closed = false;

  constructor(client: TraciClient, options: TraciSessionOptions = {}) {
    this.client = client;
    this.onClose = options.onClose ?? (() => {});
  }

  async getVersion(): Promise<TraciVersion> {
    const [reply] = await this.client.send([
      { commandId: CMD_GETVERSION, content: new Uint8Array(0), reply: "result" }
    ]);
    const body = requireBody(reply, "getVersion");
    return { apiVersion: body.readInt(), identifier: body.readString() };
  }

  /** Sets the client order, which SUMO requires before the first step. */
  async setOrder(order: number): Promise<void> {
    const content = new TraciWriter().writeInt(order).toBytes();
    const [reply] = await this.client.send([{ commandId: CMD_SETORDER, content, reply: "status" }]);
    requireOk(reply, "setOrder");
  }

  async step(): Promise<number> {
    const stepContent = new TraciWriter().writeDouble(0).toBytes();
    const [stepReply, timeReply] = await this.client.send([
      { commandId: CMD_SIMSTEP, content: stepContent, reply: "step" },
      getVariableRequest(CMD_GET_SIM_VARIABLE, VAR_TIME, "")
    ]);
    requireOk(stepReply, "simulationStep");
    return readVariable(requireBody(timeReply, "getTime"), (body) => body.readTypedDouble());
  }

  async getVehicleIds(): Promise<string[]> {
    return this.getIdList(CMD_GET_VEHICLE_VARIABLE, "vehicle.getIDList");
  }

  async getSignalIds(): Promise<string[]> {
    return this.getIdList(CMD_GET_TL_VARIABLE, "trafficlight.getIDList");
  }

  async readVehicles(ids: readonly string[]): Promise<Array<EntityReading<VehicleSample>>> {
    return this.readBatched(ids, CMD_GET_VEHICLE_VARIABLE, VEHICLE_VARIABLES, (bodies) => {
      const [position, speed, road, lane, lanePosition, type] = bodies;
      const point = readVariable(position, (body) => body.readTypedPosition());
      return {
        x: point.x,
        y: point.y,
        speed: readVariable(speed, (body) => body.readTypedDouble()),
        roadId: readVariable(road, (body) => body.readTypedString()),
        laneId: readVariable(lane, (body) => body.readTypedString()),
        lanePosition: readVariable(lanePosition, (body) => body.readTypedDouble()),
        type: readVariable(type, (body) => body.readTypedString())
      };
    });
  }

  async readSignals(ids: readonly string[]): Promise<Array<EntityReading<SignalSample>>> {
    return this.readBatched(ids, CMD_GET_TL_VARIABLE, SIGNAL_VARIABLES, (bodies) => {
      const [state, program, phase] = bodies;
      return {
        state: readVariable(state, (body) => body.readTypedString()),
        program: readVariable(program, (body) => body.readTypedString()),
        phase: readVariable(phase, (body) => body.readTypedInt())
      };
    });
  }

  async setSignalState(id: string, state: string): Promise<void> {
    const value = new TraciWriter().writeUnsignedByte(TYPE_STRING).writeString(state);
    await this.setSignalVariable(TL_RED_YELLOW_GREEN_STATE, id, value, "trafficlight.setRedYellowGreenState");
  }

  async setSignalPhase(id: string, phaseIndex: number): Promise<void> {
    const value = new TraciWriter().writeUnsignedByte(TYPE_INTEGER).writeInt(phaseIndex);
    await this.setSignalVariable(TL_PHASE_INDEX, id, value, "trafficlight.setPhase");
  }

  async setSignalProgram(id: string, programId: string): Promise<void> {
    const value = new TraciWriter().writeUnsignedByte(TYPE_STRING).writeString(programId);
    await this.setSignalVariable(TL_PROGRAM, id, value, "trafficlight.setProgram");
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      if (!this.client.isClosed()) {
        const [reply] = await this.client.send([
          { commandId: CMD_CLOSE, content: new Uint8Array(0), reply: "status" }
        ]);
        requireOk(reply, "close");
      }
    } finally {
      this.client.close();
      this.onClose();
    }
  }

  private async getIdList(commandId: number, context: string): Promise<string[]> {
    const [reply] = await this.client.send([getVariableRequest(commandId, ID_LIST, "")]);
    return readVariable(requireBody(reply, context), (body) => body.readTypedStringList());
  }

  private async setSignalVariable(
    variable: number,
    id: string,
    value: TraciWriter,
    context: string
  ): Promise<void> {
    const content = new TraciWriter()
      .writeUnsignedByte(variable)
      .writeString(id)
      .writeBytes(value.toBytes())
      .toBytes();
    const [reply] = await this.client.send([
      { commandId: CMD_SET_TL_VARIABLE, content, reply: "status" }
    ]);
    requireOk(reply, `${context}(${id})`);
  }

  /**
   * Reads several variables for many ids with one message per batch. A
   * failure on any variable of an id fails only that id.
   */
  private async readBatched<T>(
    ids: readonly string[],
    commandId: number,
    variables: readonly number[],
    decode: (bodies: TraciReader[]) => T
  ): Promise<Array<EntityReading<T>>> {
    const readings: Array<EntityReading<T>> = [];
    for (let start = 0; start < ids.length; start += READ_BATCH_SIZE) {
      const batch = ids.slice(start, start + READ_BATCH_SIZE);
      const requests: TraciRequest[] = [];
      for (const id of batch) {
        for (const variable of variables) {
          requests.push(getVariableRequest(commandId, variable, id));
        }
      }
      const replies = await this.client.send(requests);
      batch.forEach((id, index) => {
        const slice = replies.slice(index * variables.length, (index + 1) * variables.length);
        const failed = slice.find((reply) => !reply.ok);
        if (failed) {
          readings.push({ id, ok: false, error: statusError(failed, `read ${id}`).message });
          return;
        }
        try {
          const bodies = slice.map((reply) => requireBody(reply, `read ${id}`));
          readings.push({ id, ok: true, value: decode(bodies) });
        } catch (error) {
          if (!(error instanceof TraciError)) {
            throw error;
          }
          readings.push({ id, ok: false, error: error.message });
        }
      });
    }
    return readings;
  }
}

function requireOk(reply: TraciReply | undefined, context: string): void {
  if (!reply) {
    throw new TraciError(`${context}: missing reply.`);
  }
  if (!reply.ok) {
    throw statusError(reply, context);
  }
}

function requireBody(reply: TraciReply | undefined, context: string): TraciReader {
  if (!reply) {
    throw new TraciError(`${context}: missing reply.`);
  }
  if (!reply.ok) {
    throw statusError(reply, context);
  }
  if (!reply.body) {
    throw new TraciError(`${context}: reply has no result.`);
  }
  return reply.body;
}

/** Skips the variable id and object id that prefix every getter result. */
function readVariable<T>(body: TraciReader, read: (body: TraciReader) => T): T {
  body.readUnsignedByte();
  body.readString();
  return read(body);
}
