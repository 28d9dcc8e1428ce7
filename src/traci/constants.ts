// Command ids
export const CMD_GETVERSION = 0x00;
export const CMD_SIMSTEP = 0x02;
export const CMD_SETORDER = 0x03;
export const CMD_CLOSE = 0x7f;
export const CMD_GET_TL_VARIABLE = 0xa2;
export const CMD_GET_VEHICLE_VARIABLE = 0xa4;
export const CMD_GET_SIM_VARIABLE = 0xab;
export const CMD_SET_TL_VARIABLE = 0xc2;

/** Getter responses come back under the command id plus this offset. */
export const RESPONSE_OFFSET = 0x10;

// Value types
export const POSITION_2D = 0x01;
export const POSITION_3D = 0x03;
export const TYPE_INTEGER = 0x09;
export const TYPE_DOUBLE = 0x0b;
export const TYPE_STRING = 0x0c;
export const TYPE_STRINGLIST = 0x0e;

// Status results
export const RTYPE_OK = 0x00;
export const RTYPE_NOTIMPLEMENTED = 0x01;
export const RTYPE_ERR = 0xff;

// Variables
export const ID_LIST = 0x00;
export const TL_RED_YELLOW_GREEN_STATE = 0x20;
export const TL_PHASE_INDEX = 0x22;
export const TL_PROGRAM = 0x23;
export const TL_CURRENT_PHASE = 0x28;
export const TL_CURRENT_PROGRAM = 0x29;
export const VAR_SPEED = 0x40;
export const VAR_POSITION = 0x42;
export const VAR_TYPE = 0x4f;
export const VAR_ROAD_ID = 0x50;
export const VAR_LANE_ID = 0x51;
export const VAR_LANEPOSITION = 0x56;
export const VAR_TIME = 0x66;

export function describeStatus(result: number): string {
  switch (result) {
    case RTYPE_OK:
      return "OK";
    case RTYPE_NOTIMPLEMENTED:
      return "Not implemented";
    case RTYPE_ERR:
      return "Error";
    default:
      return `Unknown status ${result}`;
  }
}
