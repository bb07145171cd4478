import { fileURLToPath } from "url";
import { PciAccess, PciAddress, addressKey } from "../access.js";
import { PCI_CONFIG_SIZE } from "../pci_regs.js";
import { RunContext, createRunContext } from "../run_context.js";

export const TEST_IDS = fileURLToPath(new URL("./fixtures/test.ids", import.meta.url));

export type SpaceInit = {
  vendor?: number;
  device?: number;
  classCode?: number;
  headerType?: number;
  revision?: number;
  progIf?: number;
  command?: number;
  status?: number;
  // primary, secondary, subordinate
  buses?: [number, number, number];
  subsystem?: [number, number];
};

export function space(init: SpaceInit = {}): Uint8Array {
  const b = new Uint8Array(PCI_CONFIG_SIZE);
  const w16 = (pos: number, v: number) => setWord(b, pos, v);
  w16(0x00, init.vendor ?? 0x1234);
  w16(0x02, init.device ?? 0x0001);
  w16(0x04, init.command ?? 0);
  w16(0x06, init.status ?? 0);
  b[0x08] = init.revision ?? 0;
  b[0x09] = init.progIf ?? 0;
  w16(0x0a, init.classCode ?? 0x0200);
  b[0x0e] = init.headerType ?? 0;
  if (init.buses) {
    b[0x18] = init.buses[0];
    b[0x19] = init.buses[1];
    b[0x1a] = init.buses[2];
  }
  if (init.subsystem) {
    const base = (init.headerType ?? 0) & 0x7f ? 0x40 : 0x2c;
    w16(base, init.subsystem[0]);
    w16(base + 2, init.subsystem[1]);
  }
  return b;
}

export function setWord(b: Uint8Array, pos: number, v: number): Uint8Array {
  b[pos] = v & 0xff;
  b[pos + 1] = (v >>> 8) & 0xff;
  return b;
}

export function setLong(b: Uint8Array, pos: number, v: number): Uint8Array {
  setWord(b, pos, v & 0xffff);
  return setWord(b, pos + 2, (v >>> 16) & 0xffff);
}

export function bridgeSpace(primary: number, secondary: number, subordinate: number, init: SpaceInit = {}): Uint8Array {
  return space({ device: 0x0002, classCode: 0x0604, headerType: 1, ...init, buses: [primary, secondary, subordinate] });
}

export type FakeFunction = { addr: PciAddress; bytes: Uint8Array };

export function fn(bus: number, dev: number, func: number, bytes: Uint8Array, domain = 0): FakeFunction {
  return { addr: { domain, bus, dev, func }, bytes };
}

// Functions marked with fail() still answer word reads but refuse block reads.
export class FakeAccess implements PciAccess {
  readonly method = "fake";
  readonly direct = true;
  readonly reads: Array<{ slot: string; offset: number; length: number }> = [];
  readonly failing = new Set<string>();
  private readonly functions = new Map<string, FakeFunction>();

  constructor(functions: FakeFunction[]) {
    for (const f of functions) this.functions.set(addressKey(f.addr), f);
  }

  fail(addr: PciAddress): this {
    this.failing.add(addressKey(addr));
    return this;
  }

  enumerate(): PciAddress[] {
    return Array.from(this.functions.values(), (f) => ({ ...f.addr }));
  }

  readBytes(addr: PciAddress, offset: number, length: number): Uint8Array | undefined {
    const key = addressKey(addr);
    this.reads.push({ slot: key, offset, length });
    const f = this.functions.get(key);
    if (!f || this.failing.has(key) || offset + length > f.bytes.length) return undefined;
    return f.bytes.slice(offset, offset + length);
  }

  readWord(addr: PciAddress, reg: number): number {
    const f = this.functions.get(addressKey(addr));
    if (!f) return 0xffff;
    return f.bytes[reg] | (f.bytes[reg + 1] << 8);
  }
}

export function collectingContext(init: Partial<RunContext> = {}): RunContext & { lines: string[]; warnings: string[] } {
  const lines: string[] = [];
  const warnings: string[] = [];
  const ctx = createRunContext({ ...init, out: (l) => lines.push(l), warn: (l) => warnings.push(l) });
  return Object.assign(ctx, { lines, warnings });
}
