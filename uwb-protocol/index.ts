/**
 * UWB Protocol Module - accessory control message codec
 */

export { MessageCodec, formatTag } from './MessageCodec';
export { MESSAGE_TAGS, TAG_NAMES, HEADER_SIZE } from './ProtocolConstants';
export type { MessageTag } from './ProtocolConstants';
export { ControlMessageKind, DecodeErrorKind, Messages } from './ControlMessage';
export type {
  ControlMessage,
  HostMessage,
  AccessoryMessage,
  DecodeError,
  DecodeResult,
} from './ControlMessage';
