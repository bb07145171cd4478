import { PciAccess, PciAddress, addressKey, parseSlotName } from "./access.js";
import { PCI_EXT_CONFIG_SIZE } from "./pci_regs.js";
import { die, readText } from "./util.js";

type DumpedFunction = {
  addr: PciAddress;
  bytes: Uint8Array;
  known: Uint8Array;
};

const DATA_RE = /^([0-9a-fA-F]{2,3}):((?:\s+[0-9a-fA-F]{2})+)\s*$/;

// `pcimap -x` output: a slot line followed by `oo: xx xx ...` rows.
export class DumpAccess implements PciAccess {
  readonly method = "dump";
  readonly direct = false;
  private readonly functions = new Map<string, DumpedFunction>();

  static fromFile(path: string): DumpAccess {
    return DumpAccess.fromText(readText(path), path);
  }

  static fromText(text: string, source = "dump"): DumpAccess {
    const access = new DumpAccess();
    let current: DumpedFunction | undefined;
    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i += 1) {
      const line = lines[i].trimEnd();
      if (!line.trim()) continue;
      const data = DATA_RE.exec(line);
      if (data) {
        if (!current) die(`${source}:${i + 1}: hex data before any device line`);
        let pos = parseInt(data[1], 16);
        for (const tok of data[2].trim().split(/\s+/)) {
          if (pos >= PCI_EXT_CONFIG_SIZE) die(`${source}:${i + 1}: offset beyond configuration space`);
          current.bytes[pos] = parseInt(tok, 16);
          current.known[pos] = 1;
          pos += 1;
        }
        continue;
      }
      const addr = parseSlotName(line);
      if (!addr) die(`${source}:${i + 1}: unrecognized line`);
      current = access.functions.get(addressKey(addr));
      if (!current) {
        current = {
          addr,
          bytes: new Uint8Array(PCI_EXT_CONFIG_SIZE),
          known: new Uint8Array(PCI_EXT_CONFIG_SIZE),
        };
        access.functions.set(addressKey(addr), current);
      }
    }
    return access;
  }

  enumerate(): PciAddress[] {
    return Array.from(this.functions.values(), (f) => ({ ...f.addr }));
  }

  readBytes(addr: PciAddress, offset: number, length: number): Uint8Array | undefined {
    const f = this.functions.get(addressKey(addr));
    if (!f || offset < 0 || offset + length > PCI_EXT_CONFIG_SIZE) return undefined;
    for (let i = offset; i < offset + length; i += 1) {
      if (!f.known[i]) return undefined;
    }
    return f.bytes.slice(offset, offset + length);
  }

  readWord(addr: PciAddress, reg: number): number {
    const b = this.readBytes(addr, reg, 2);
    if (!b) return 0xffff;
    return b[0] | (b[1] << 8);
  }
}
