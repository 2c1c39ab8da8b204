/**
 * MessageCodec.ts
 *
 * Encodes and decodes accessory control messages. Pure transforms: no logging,
 * no shared state, identical output for identical input.
 *
 * Wire format:
 * - Byte 0: message tag (see MESSAGE_TAGS)
 * - Bytes 1..n: payload, only for ConfigureAndStart and ConfigurationData
 */

import { MESSAGE_TAGS, TAG_NAMES, HEADER_SIZE, MessageTag } from './ProtocolConstants';
import {
  ControlMessage,
  ControlMessageKind,
  DecodeError,
  DecodeErrorKind,
  DecodeResult,
} from './ControlMessage';

const KIND_TO_TAG: Record<ControlMessageKind, MessageTag> = {
  [ControlMessageKind.INITIALIZE]: MESSAGE_TAGS.INITIALIZE,
  [ControlMessageKind.CONFIGURE_AND_START]: MESSAGE_TAGS.CONFIGURE_AND_START,
  [ControlMessageKind.STOP]: MESSAGE_TAGS.STOP,
  [ControlMessageKind.CONFIGURATION_DATA]: MESSAGE_TAGS.CONFIGURATION_DATA,
  [ControlMessageKind.RANGING_STARTED]: MESSAGE_TAGS.RANGING_STARTED,
  [ControlMessageKind.RANGING_STOPPED]: MESSAGE_TAGS.RANGING_STOPPED,
};

const TAG_TO_KIND: ReadonlyMap<number, ControlMessageKind> = new Map(
  Object.values(ControlMessageKind).map(kind => [KIND_TO_TAG[kind], kind] as const)
);

function failure(kind: DecodeErrorKind, message: string, tag?: number): DecodeResult {
  const error: DecodeError = tag === undefined ? { kind, message } : { kind, message, tag };
  return { success: false, error };
}

export function formatTag(tag: number): string {
  return `0x${tag.toString(16).padStart(2, '0')}`;
}

export class MessageCodec {
  /**
   * Encodes a control message to its wire bytes
   */
  static encode(message: ControlMessage): Uint8Array {
    const tag = KIND_TO_TAG[message.kind];

    switch (message.kind) {
      case ControlMessageKind.CONFIGURE_AND_START:
      case ControlMessageKind.CONFIGURATION_DATA: {
        const buffer = new Uint8Array(HEADER_SIZE + message.payload.length);
        buffer[0] = tag;
        buffer.set(message.payload, HEADER_SIZE);
        return buffer;
      }
      default:
        return Uint8Array.of(tag);
    }
  }

  /**
   * Decodes wire bytes. The payload length is validated against the tag
   * before anything is interpreted; returned payloads are copies.
   */
  static decode(bytes: Uint8Array): DecodeResult {
    if (bytes.length === 0) {
      return failure(DecodeErrorKind.EMPTY_MESSAGE, 'Message is empty');
    }

    const tag = bytes[0];
    const kind = TAG_TO_KIND.get(tag);
    if (kind === undefined) {
      return failure(DecodeErrorKind.UNKNOWN_DISCRIMINANT, `Unknown message tag ${formatTag(tag)}`, tag);
    }

    const payload = bytes.slice(HEADER_SIZE);

    switch (kind) {
      case ControlMessageKind.CONFIGURATION_DATA:
      case ControlMessageKind.CONFIGURE_AND_START:
        if (payload.length === 0) {
          return failure(
            DecodeErrorKind.EMPTY_CONFIG_PAYLOAD,
            `${TAG_NAMES[tag]} carries no configuration bytes`,
            tag
          );
        }
        return { success: true, message: { kind, payload } };

      case ControlMessageKind.INITIALIZE:
      case ControlMessageKind.STOP:
      case ControlMessageKind.RANGING_STARTED:
      case ControlMessageKind.RANGING_STOPPED:
        if (payload.length > 0) {
          return failure(
            DecodeErrorKind.UNEXPECTED_PAYLOAD,
            `${TAG_NAMES[tag]} takes no payload, got ${payload.length} byte(s)`,
            tag
          );
        }
        return { success: true, message: { kind } };
    }
  }

  /**
   * Human-readable one-liner for logs
   */
  static describe(message: ControlMessage): string {
    const name = TAG_NAMES[KIND_TO_TAG[message.kind]];
    if ('payload' in message) {
      return `${name} (${message.payload.length} bytes)`;
    }
    return name;
  }
}
