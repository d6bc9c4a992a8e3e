/**
 * EBC-Axx protocol constants.
 */

export const INIT_BYTE = 0xfa;
export const END_BYTE = 0xf8;

export const COMMAND_LENGTH = 10;
export const RESPONSE_LENGTH = 19;
export const COMMAND_DATA_LENGTH = 6;

// ---------- Mode nibbles ----------

export const Mode = {
  SYS: 0x0,
  D_CC: 0x0,
  D_CP: 0x1,
  C_NIMH: 0x2,
  C_NICD: 0x3,
  C_LIPO: 0x4,
  C_LIFE: 0x5,
  C_PB: 0x6,
  C_CCCV: 0x7,
} as const;

export type ModeValue = (typeof Mode)[keyof typeof Mode];

/** Chemistries with a built-in charge profile. */
export const PREDEFINED_CHARGE_MODES = [
  Mode.C_NIMH,
  Mode.C_NICD,
  Mode.C_LIPO,
  Mode.C_LIFE,
  Mode.C_PB,
] as const;

export type PredefinedChargeMode = (typeof PREDEFINED_CHARGE_MODES)[number];

export function isPredefinedChargeMode(mode: number): mode is PredefinedChargeMode {
  return PREDEFINED_CHARGE_MODES.some((m) => m === mode);
}

// Mode 0 is shared by SYS and D_CC; responses report it as D_CC.
const MODE_NAMES: Record<number, string> = {
  [Mode.D_CC]: "D_CC",
  [Mode.D_CP]: "D_CP",
  [Mode.C_NIMH]: "C_NIMH",
  [Mode.C_NICD]: "C_NICD",
  [Mode.C_LIPO]: "C_LIPO",
  [Mode.C_LIFE]: "C_LIFE",
  [Mode.C_PB]: "C_PB",
  [Mode.C_CCCV]: "C_CCCV",
};

export function modeName(mode: number): string {
  return MODE_NAMES[mode] ?? `UNKNOWN_${mode}`;
}

// ---------- Command nibbles ----------

export const Command = {
  START: 0x1,
  STOP: 0x2,
  CONNECT: 0x5,
  DISCONNECT: 0x6,
  ADJUST: 0x7,
  CONTINUE: 0x8,
} as const;

export type CommandValue = (typeof Command)[keyof typeof Command];

const COMMAND_NAMES: Record<number, string> = {
  [Command.START]: "START",
  [Command.STOP]: "STOP",
  [Command.CONNECT]: "CONNECT",
  [Command.DISCONNECT]: "DISCONNECT",
  [Command.ADJUST]: "ADJUST",
  [Command.CONTINUE]: "CONTINUE",
};

export function commandName(command: number): string {
  return COMMAND_NAMES[command] ?? `UNKNOWN_${command}`;
}

// ---------- Response state ----------

export const State = {
  IDLE: 0,
  WORKING: 1,
  COMPLETED: 2,
} as const;

export type StateName = keyof typeof State | `UNKNOWN_${number}`;

const STATE_NAMES: Record<number, keyof typeof State> = {
  [State.IDLE]: "IDLE",
  [State.WORKING]: "WORKING",
  [State.COMPLETED]: "COMPLETED",
};

export function stateName(state: number): StateName {
  return STATE_NAMES[state] ?? `UNKNOWN_${state}`;
}

/** IDLE and COMPLETED both mean the device stopped driving current. */
export function isTerminalState(state: StateName): boolean {
  return state === "IDLE" || state === "COMPLETED";
}

// ---------- Units ----------

/** Current travels in mA. */
export const I_MULT = 1000;
/** Voltage travels in 10 mV steps. */
export const V_MULT = 100;
/** Power travels in 10 mW steps. */
export const P_MULT = 100;
