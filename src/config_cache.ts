import { PCI_EXT_CONFIG_SIZE } from "./pci_regs.js";

export type ConfigReader = (offset: number, length: number) => Uint8Array | undefined;

export class ConfigCacheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigCacheError";
  }
}

// Each byte has a presence bit; fetch only asks the reader for bytes still missing.
export class ConfigCache {
  private data: Uint8Array;
  private present: Uint8Array;

  constructor(private readonly reader: ConfigReader, initialCapacity = 64) {
    const cap = Math.max(1, Math.min(initialCapacity, PCI_EXT_CONFIG_SIZE));
    this.data = new Uint8Array(cap);
    this.present = new Uint8Array(cap);
  }

  get capacity(): number {
    return this.data.length;
  }

  fetch(offset: number, length: number): boolean {
    if (length <= 0) return true;
    const end = offset + length;
    if (offset < 0 || end > PCI_EXT_CONFIG_SIZE) {
      throw new ConfigCacheError(`config range ${offset}+${length} is outside configuration space`);
    }
    this.grow(end);
    let pos = offset;
    while (pos < end) {
      if (this.present[pos]) {
        pos += 1;
        continue;
      }
      let gapEnd = pos;
      while (gapEnd < end && !this.present[gapEnd]) gapEnd += 1;
      const bytes = this.reader(pos, gapEnd - pos);
      if (!bytes || bytes.length < gapEnd - pos) return false;
      this.data.set(bytes.subarray(0, gapEnd - pos), pos);
      this.present.fill(1, pos, gapEnd);
      pos = gapEnd;
    }
    return true;
  }

  has(offset: number, length = 1): boolean {
    if (offset < 0 || offset + length > this.present.length) return false;
    for (let i = offset; i < offset + length; i += 1) {
      if (!this.present[i]) return false;
    }
    return true;
  }

  prefixLength(): number {
    let n = 0;
    while (n < this.present.length && this.present[n]) n += 1;
    return n;
  }

  byte(pos: number): number {
    if (!this.has(pos)) {
      throw new ConfigCacheError(`config byte ${pos} read before it was fetched`);
    }
    return this.data[pos];
  }

  word(pos: number): number {
    return this.byte(pos) | (this.byte(pos + 1) << 8);
  }

  long(pos: number): number {
    return (this.byte(pos) | (this.byte(pos + 1) << 8) | (this.byte(pos + 2) << 16) | (this.byte(pos + 3) << 24)) >>> 0;
  }

  private grow(end: number): void {
    if (end <= this.data.length) return;
    let cap = this.data.length;
    while (cap < end) cap *= 2;
    cap = Math.min(cap, PCI_EXT_CONFIG_SIZE);
    const data = new Uint8Array(cap);
    const present = new Uint8Array(cap);
    data.set(this.data);
    present.set(this.present);
    this.data = data;
    this.present = present;
  }
}
