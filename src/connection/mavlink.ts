import fs from 'node:fs';
import defaultMetrics, { type MetricsRegistry } from '../metrics/index.js';

export const MAGIC_V1 = 0xfe;
export const MAGIC_V2 = 0xfd;

const HEADER_LENGTH_V1 = 6;
const HEADER_LENGTH_V2 = 10;
const CHECKSUM_LENGTH = 2;
const SIGNATURE_LENGTH = 13;
const INCOMPAT_FLAG_SIGNED = 0x01;

export const HEARTBEAT_ID = 0;
const HEARTBEAT_CRC_EXTRA = 50;
const MAV_TYPE_GCS = 6;
const MAV_AUTOPILOT_INVALID = 8;
const MAV_STATE_ACTIVE = 4;
const MAVLINK_VERSION = 3;

export type MessageDefinition = {
  id: number;
  name: string;
  crcExtra: number;
};

export type MavlinkFrame = {
  version: 1 | 2;
  sequence: number;
  systemId: number;
  componentId: number;
  messageId: number;
  payload: Buffer;
  signed: boolean;
};

const DEFAULT_TABLE_PATH = new URL('../../data/mavlink-messages.json', import.meta.url);

function isMessageDefinition(value: unknown): value is MessageDefinition {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    Number.isInteger(candidate.id) &&
    typeof candidate.name === 'string' &&
    Number.isInteger(candidate.crcExtra)
  );
}

export class MessageTable {
  private readonly byId = new Map<number, MessageDefinition>();

  constructor(definitions: Iterable<MessageDefinition>) {
    for (const definition of definitions) {
      this.byId.set(definition.id, definition);
    }
  }

  static fromJson(contents: string): MessageTable {
    const parsed: unknown = JSON.parse(contents);
    if (!Array.isArray(parsed)) {
      throw new Error('Message table must be a JSON array');
    }
    const definitions = parsed.map((entry: unknown, index) => {
      if (!isMessageDefinition(entry)) {
        throw new Error(`Invalid message definition at index ${index}`);
      }
      return entry;
    });
    return new MessageTable(definitions);
  }

  static load(filePath: string | URL = DEFAULT_TABLE_PATH): MessageTable {
    return MessageTable.fromJson(fs.readFileSync(filePath, 'utf-8'));
  }

  get(id: number): MessageDefinition | undefined {
    return this.byId.get(id);
  }

  nameOf(id: number): string {
    return this.byId.get(id)?.name ?? `UNKNOWN_${id}`;
  }

  get size(): number {
    return this.byId.size;
  }
}

/** X.25 (MCRF4XX) accumulate step. */
export function crcAccumulate(byte: number, crc: number): number {
  let tmp = (byte ^ (crc & 0xff)) & 0xff;
  tmp = (tmp ^ (tmp << 4)) & 0xff;
  return ((crc >> 8) ^ (tmp << 8) ^ (tmp << 3) ^ (tmp >> 4)) & 0xffff;
}

export function crcCalculate(bytes: Uint8Array, crcExtra: number): number {
  let crc = 0xffff;
  for (const byte of bytes) {
    crc = crcAccumulate(byte, crc);
  }
  return crcAccumulate(crcExtra, crc);
}

export type EncodeFrameInput = {
  version: 1 | 2;
  sequence: number;
  systemId: number;
  componentId: number;
  messageId: number;
  payload: Uint8Array;
};

export function encodeFrame(input: EncodeFrameInput, crcExtra: number): Buffer {
  const { version, payload } = input;
  if (payload.length > 255) {
    throw new Error('MAVLink payload exceeds 255 bytes');
  }

  let header: Buffer;
  if (version === 1) {
    if (input.messageId > 0xff) {
      throw new Error(`Message id ${input.messageId} needs MAVLink 2`);
    }
    header = Buffer.from([
      MAGIC_V1,
      payload.length,
      input.sequence & 0xff,
      input.systemId,
      input.componentId,
      input.messageId
    ]);
  } else {
    header = Buffer.from([
      MAGIC_V2,
      payload.length,
      0,
      0,
      input.sequence & 0xff,
      input.systemId,
      input.componentId,
      input.messageId & 0xff,
      (input.messageId >> 8) & 0xff,
      (input.messageId >> 16) & 0xff
    ]);
  }

  const body = Buffer.concat([header.subarray(1), payload]);
  const checksum = Buffer.alloc(CHECKSUM_LENGTH);
  checksum.writeUInt16LE(crcCalculate(body, crcExtra));
  return Buffer.concat([header, payload, checksum]);
}

export function encodeHeartbeat(input: {
  systemId: number;
  componentId: number;
  sequence: number;
}): Buffer {
  const payload = Buffer.alloc(9);
  payload.writeUInt32LE(0, 0);
  payload.writeUInt8(MAV_TYPE_GCS, 4);
  payload.writeUInt8(MAV_AUTOPILOT_INVALID, 5);
  payload.writeUInt8(0, 6);
  payload.writeUInt8(MAV_STATE_ACTIVE, 7);
  payload.writeUInt8(MAVLINK_VERSION, 8);
  return encodeFrame({ version: 2, messageId: HEARTBEAT_ID, payload, ...input }, HEARTBEAT_CRC_EXTRA);
}

export type MavlinkParserOptions = {
  table: MessageTable;
  /** Frames of known messages with a bad checksum are dropped. */
  verifyChecksums?: boolean;
  metrics?: MetricsRegistry;
};

/**
 * Streaming frame splitter for MAVLink 1 and 2. Partial frames stay
 * buffered until the next chunk; garbage and rejected frames are skipped by
 * resynchronising on the next magic byte.
 *
 * Frames of ids missing from the table cannot be checked, so they are only
 * taken while the stream is in sync (the previous frame passed its checksum).
 */
export class MavlinkParser {
  private readonly table: MessageTable;
  private readonly verifyChecksums: boolean;
  private readonly metrics: MetricsRegistry;
  private pending: Buffer = Buffer.alloc(0);
  private rejected = 0;
  private inSync = false;

  constructor(options: MavlinkParserOptions) {
    this.table = options.table;
    this.verifyChecksums = options.verifyChecksums ?? true;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  get rejectedFrames(): number {
    return this.rejected;
  }

  get bufferedBytes(): number {
    return this.pending.length;
  }

  push(chunk: Uint8Array): MavlinkFrame[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : Buffer.from(chunk);
    const frames: MavlinkFrame[] = [];
    let offset = 0;

    while (offset < data.length) {
      const start = findMagic(data, offset);
      if (start < 0) {
        this.inSync = false;
        offset = data.length;
        break;
      }
      if (start > offset) {
        this.inSync = false;
      }
      offset = start;

      const version = data[offset] === MAGIC_V2 ? 2 : 1;
      const headerLength = version === 2 ? HEADER_LENGTH_V2 : HEADER_LENGTH_V1;
      if (data.length - offset < headerLength) {
        break;
      }

      const payloadLength = data[offset + 1];
      let signed = false;
      if (version === 2) {
        const incompatFlags = data[offset + 2];
        if ((incompatFlags & ~INCOMPAT_FLAG_SIGNED) !== 0) {
          this.reject();
          offset += 1;
          continue;
        }
        signed = (incompatFlags & INCOMPAT_FLAG_SIGNED) !== 0;
      }

      const messageId =
        version === 2
          ? data[offset + 7] | (data[offset + 8] << 8) | (data[offset + 9] << 16)
          : data[offset + 5];
      const definition = this.table.get(messageId);
      if (this.verifyChecksums && !definition && !this.inSync) {
        this.reject();
        offset += 1;
        continue;
      }

      const frameLength =
        headerLength + payloadLength + CHECKSUM_LENGTH + (signed ? SIGNATURE_LENGTH : 0);
      if (data.length - offset < frameLength) {
        break;
      }

      const payloadEnd = offset + headerLength + payloadLength;
      if (this.verifyChecksums && definition) {
        const expected = crcCalculate(data.subarray(offset + 1, payloadEnd), definition.crcExtra);
        if (expected !== data.readUInt16LE(payloadEnd)) {
          this.reject();
          offset += 1;
          continue;
        }
        this.inSync = true;
      }

      frames.push({
        version,
        sequence: data[offset + (version === 2 ? 4 : 2)],
        systemId: data[offset + (version === 2 ? 5 : 3)],
        componentId: data[offset + (version === 2 ? 6 : 4)],
        messageId,
        payload: Buffer.from(data.subarray(offset + headerLength, payloadEnd)),
        signed
      });
      this.metrics.increment('mavlink.frames.decoded');
      offset += frameLength;
    }

    this.pending = Buffer.from(data.subarray(offset));
    return frames;
  }

  private reject() {
    this.inSync = false;
    this.rejected += 1;
    this.metrics.increment('mavlink.frames.rejected');
  }
}

function findMagic(data: Buffer, from: number): number {
  for (let index = from; index < data.length; index += 1) {
    const byte = data[index];
    if (byte === MAGIC_V1 || byte === MAGIC_V2) {
      return index;
    }
  }
  return -1;
}
