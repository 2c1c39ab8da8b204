/**
 * Control messages exchanged with a ranging accessory
 */

export enum ControlMessageKind {
  // Host → accessory
  INITIALIZE = 'initialize',
  CONFIGURE_AND_START = 'configureAndStart',
  STOP = 'stop',

  // Accessory → host
  CONFIGURATION_DATA = 'configurationData',
  RANGING_STARTED = 'rangingStarted',
  RANGING_STOPPED = 'rangingStopped',
}

export type HostMessage =
  | { kind: ControlMessageKind.INITIALIZE }
  | { kind: ControlMessageKind.CONFIGURE_AND_START; payload: Uint8Array }
  | { kind: ControlMessageKind.STOP };

export type AccessoryMessage =
  | { kind: ControlMessageKind.CONFIGURATION_DATA; payload: Uint8Array }
  | { kind: ControlMessageKind.RANGING_STARTED }
  | { kind: ControlMessageKind.RANGING_STOPPED };

export type ControlMessage = HostMessage | AccessoryMessage;

export enum DecodeErrorKind {
  EMPTY_MESSAGE = 'EmptyMessage',
  UNKNOWN_DISCRIMINANT = 'UnknownDiscriminant',
  EMPTY_CONFIG_PAYLOAD = 'EmptyConfigPayload',
  UNEXPECTED_PAYLOAD = 'UnexpectedPayload',
}

export interface DecodeError {
  kind: DecodeErrorKind;
  message: string;
  /** Byte 0 of the rejected input, when there was one */
  tag?: number;
}

export type DecodeResult =
  | { success: true; message: ControlMessage }
  | { success: false; error: DecodeError };

export const Messages = {
  initialize: (): HostMessage => ({ kind: ControlMessageKind.INITIALIZE }),
  configureAndStart: (payload: Uint8Array): HostMessage => ({
    kind: ControlMessageKind.CONFIGURE_AND_START,
    payload,
  }),
  stop: (): HostMessage => ({ kind: ControlMessageKind.STOP }),
  configurationData: (payload: Uint8Array): AccessoryMessage => ({
    kind: ControlMessageKind.CONFIGURATION_DATA,
    payload,
  }),
  rangingStarted: (): AccessoryMessage => ({ kind: ControlMessageKind.RANGING_STARTED }),
  rangingStopped: (): AccessoryMessage => ({ kind: ControlMessageKind.RANGING_STOPPED }),
} as const;
