import type { Color, ColorCommand } from "../../types";

/**
 * Protocole LAN LIFX (UDP, little‑endian).
 * En‑tête de 36 octets: frame (8) + frame address (16) + protocol header (12).
 */
export const HEADER_SIZE = 36;
export const LIFX_PORT = 56700;
export const PROTOCOL_NUMBER = 1024;
/** Service UDP annoncé dans StateService */
export const SERVICE_UDP = 1;

export const MessageType = {
  GetService: 2,
  StateService: 3,
  GetLabel: 23,
  StateLabel: 25,
  GetVersion: 32,
  StateVersion: 33,
  SetColor: 102,
} as const;

const ADDRESSABLE = 1 << 12;
const TAGGED = 1 << 13;
const RES_REQUIRED = 0x01;
const ACK_REQUIRED = 0x02;
export const LABEL_SIZE = 32;

export interface EncodeOptions {
  type: number;
  source: number;
  sequence: number;
  /** MAC cible ("d0:73:d5:12:34:56"); absent → toutes les ampoules */
  target?: string | null;
  /** Diffusion (GetService): bit tagged positionné */
  tagged?: boolean;
  ackRequired?: boolean;
  resRequired?: boolean;
  payload?: Buffer;
}

export interface LifxPacket {
  size: number;
  tagged: boolean;
  source: number;
  /** MAC de l'émetteur/destinataire, "00:00:00:00:00:00" si non adressé */
  target: string;
  ackRequired: boolean;
  resRequired: boolean;
  sequence: number;
  type: number;
  payload: Buffer;
}

export function macToBytes(mac: string): Buffer {
  const parts = mac.split(":");
  if (parts.length !== 6 || parts.some((p) => !/^[0-9a-f]{2}$/i.test(p))) {
    throw new Error(`Adresse MAC invalide: '${mac}'`);
  }
  return Buffer.from(parts.map((p) => parseInt(p, 16)));
}

export function bytesToMac(bytes: Buffer): string {
  return Array.from(bytes.subarray(0, 6), (b) => b.toString(16).padStart(2, "0")).join(":");
}

export function encodePacket(opts: EncodeOptions): Buffer {
  const payload = opts.payload ?? Buffer.alloc(0);
  const buf = Buffer.alloc(HEADER_SIZE + payload.length);
  buf.writeUInt16LE(buf.length, 0);
  buf.writeUInt16LE(PROTOCOL_NUMBER | ADDRESSABLE | (opts.tagged ? TAGGED : 0), 2);
  buf.writeUInt32LE(opts.source >>> 0, 4);
  if (opts.target) macToBytes(opts.target).copy(buf, 8);
  let flags = 0;
  if (opts.resRequired) flags |= RES_REQUIRED;
  if (opts.ackRequired) flags |= ACK_REQUIRED;
  buf.writeUInt8(flags, 22);
  buf.writeUInt8(opts.sequence & 0xff, 23);
  buf.writeUInt16LE(opts.type, 32);
  payload.copy(buf, HEADER_SIZE);
  return buf;
}

/** Retourne null pour une trame trop courte, tronquée ou d'un autre protocole. */
export function decodePacket(buf: Buffer): LifxPacket | null {
  if (buf.length < HEADER_SIZE) return null;
  const size = buf.readUInt16LE(0);
  if (size < HEADER_SIZE || size > buf.length) return null;
  const flags = buf.readUInt16LE(2);
  if ((flags & 0x0fff) !== PROTOCOL_NUMBER) return null;
  const fa = buf.readUInt8(22);
  return {
    size,
    tagged: (flags & TAGGED) !== 0,
    source: buf.readUInt32LE(4),
    target: bytesToMac(buf.subarray(8, 14)),
    ackRequired: (fa & ACK_REQUIRED) !== 0,
    resRequired: (fa & RES_REQUIRED) !== 0,
    sequence: buf.readUInt8(23),
    type: buf.readUInt16LE(32),
    payload: buf.subarray(HEADER_SIZE, size),
  };
}

function clampU16(v: number): number {
  return Math.max(0, Math.min(0xffff, Math.round(v)));
}

/** HSL (0..360, 0..100, 0..100) → unités LIFX 16 bits. */
export function hslToLifx(color: Color): { hue: number; saturation: number; brightness: number } {
  return {
    hue: clampU16((color.hue * 65535) / 360),
    saturation: clampU16((color.saturation * 65535) / 100),
    brightness: clampU16((color.lightness * 65535) / 100),
  };
}

export function encodeSetColorPayload(cmd: ColorCommand): Buffer {
  const { hue, saturation, brightness } = hslToLifx(cmd.color);
  const buf = Buffer.alloc(13);
  buf.writeUInt8(0, 0);
  buf.writeUInt16LE(hue, 1);
  buf.writeUInt16LE(saturation, 3);
  buf.writeUInt16LE(brightness, 5);
  buf.writeUInt16LE(clampU16(cmd.kelvin), 7);
  buf.writeUInt32LE(Math.max(0, Math.min(0xffffffff, Math.trunc(cmd.durationMs))), 9);
  return buf;
}

export function decodeStateService(payload: Buffer): { service: number; port: number } | null {
  if (payload.length < 5) return null;
  return { service: payload.readUInt8(0), port: payload.readUInt32LE(1) };
}

export function decodeStateLabel(payload: Buffer): string {
  const raw = payload.subarray(0, LABEL_SIZE);
  const end = raw.indexOf(0);
  return raw.subarray(0, end === -1 ? raw.length : end).toString("utf8");
}

/** StateVersion: vendor (u32), product (u32), version (u32, ignoré). */
export function decodeStateVersion(payload: Buffer): { vendor: number; product: number } | null {
  if (payload.length < 8) return null;
  return { vendor: payload.readUInt32LE(0), product: payload.readUInt32LE(4) };
}
