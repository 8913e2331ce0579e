export const WIRE_VERSION = 1

export const ValueTag = {
  String: 0x01,
  Integer: 0x02,
  Float: 0x03,
  Boolean: 0x04,
  Null: 0x05,
  List: 0x06,
  Map: 0x07,
} as const

export type ValueTag = (typeof ValueTag)[keyof typeof ValueTag]

export const Presence = {
  Absent: 0x00,
  Present: 0x01,
} as const

export const CauseMarker = {
  None: 0x00,
  Public: 0x01,
  Internal: 0x02,
} as const
