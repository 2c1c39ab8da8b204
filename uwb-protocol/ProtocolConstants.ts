/**
 * UWB accessory control protocol - wire constants
 *
 * Byte 0 of every control message is its tag. Only CONFIGURATION_DATA and
 * CONFIGURE_AND_START carry a payload (bytes 1..n).
 */

export const MESSAGE_TAGS = {
  // Accessory → host
  CONFIGURATION_DATA: 0x01,
  RANGING_STARTED: 0x02,
  RANGING_STOPPED: 0x03,

  // Host → accessory
  INITIALIZE: 0x0a,
  CONFIGURE_AND_START: 0x0b,
  STOP: 0x0c,
} as const;

export type MessageTag = (typeof MESSAGE_TAGS)[keyof typeof MESSAGE_TAGS];

export const TAG_NAMES: Readonly<Record<number, string>> = {
  [MESSAGE_TAGS.CONFIGURATION_DATA]: 'ConfigurationData',
  [MESSAGE_TAGS.RANGING_STARTED]: 'RangingStarted',
  [MESSAGE_TAGS.RANGING_STOPPED]: 'RangingStopped',
  [MESSAGE_TAGS.INITIALIZE]: 'Initialize',
  [MESSAGE_TAGS.CONFIGURE_AND_START]: 'ConfigureAndStart',
  [MESSAGE_TAGS.STOP]: 'Stop',
};

export const HEADER_SIZE = 1;
