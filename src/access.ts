import { hex } from "./util.js";

export type PciAddress = {
  domain: number;
  bus: number;
  dev: number;
  func: number;
};

export interface PciAccess {
  readonly method: string;
  readonly direct: boolean;
  enumerate(): PciAddress[];
  readBytes(addr: PciAddress, offset: number, length: number): Uint8Array | undefined;
  // uncached; absent functions read as 0xffff
  readWord(addr: PciAddress, reg: number): number;
}

export function slotName(addr: PciAddress): string {
  const prefix = addr.domain ? `${hex(addr.domain, 4)}:` : "";
  return `${prefix}${hex(addr.bus, 2)}:${hex(addr.dev, 2)}.${addr.func}`;
}

export function fullSlotName(addr: PciAddress): string {
  return `${hex(addr.domain, 4)}:${hex(addr.bus, 2)}:${hex(addr.dev, 2)}.${addr.func}`;
}

const SLOT_RE = /^(?:([0-9a-fA-F]{1,8}):)?([0-9a-fA-F]{1,2}):([0-9a-fA-F]{1,2})\.([0-7])/;

export function parseSlotName(text: string): PciAddress | undefined {
  const m = SLOT_RE.exec(text.trim());
  if (!m) return undefined;
  const domain = m[1] ? parseInt(m[1], 16) : 0;
  const dev = parseInt(m[3], 16);
  if (dev > 31) return undefined;
  return { domain, bus: parseInt(m[2], 16), dev, func: parseInt(m[4], 10) };
}

export function addressKey(addr: PciAddress): string {
  return fullSlotName(addr);
}
