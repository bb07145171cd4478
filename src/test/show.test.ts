import { describe, it, expect } from "vitest";
import { DumpAccess } from "../access_dump.js";
import { Names, loadIds } from "../ids.js";
import { Device, scanDevices } from "../registry.js";
import { hexDumpLines, machineLines, showDevice, terseLine, verboseLines } from "../show.js";
import { FakeAccess, FakeFunction, TEST_IDS, bridgeSpace, fn, setLong, setWord, space } from "./helpers.js";

const names = new Names(loadIds(TEST_IDS));
const numeric = new Names(undefined, true);

function one(f: FakeFunction, access = new FakeAccess([f])): Device {
  return scanDevices(access)[0];
}

const nicSpace = () => space({ vendor: 0x1234, device: 0x0001, classCode: 0x0200, revision: 3, subsystem: [0x1234, 0x0100] });

function windowedBridge(): Uint8Array {
  const bytes = bridgeSpace(0, 1, 1, { command: 0x0002 });
  setLong(bytes, 0x10, 0xfd000000);
  setLong(bytes, 0x14, 0x0000e001);
  bytes[0x1c] = 0x21;
  bytes[0x1d] = 0x31;
  setWord(bytes, 0x20, 0xfe00);
  setWord(bytes, 0x22, 0xfe10);
  setWord(bytes, 0x24, 0xc001);
  setWord(bytes, 0x26, 0xc1f1);
  setLong(bytes, 0x28, 0x00000004);
  setLong(bytes, 0x2c, 0x00000004);
  return bytes;
}

describe("terseLine", () => {
  it("names class, vendor and device", () => {
    expect(terseLine(one(fn(0, 0x1f, 0, nicSpace())), names)).toBe("00:1f.0 Ethernet controller: Acme Devices Widget NIC (rev 03)");
  });

  it("prints numbers with -n", () => {
    expect(terseLine(one(fn(0, 0x1f, 0, nicSpace())), numeric)).toBe("00:1f.0 Class 0200: 1234:0001 (rev 03)");
  });
});

describe("verboseLines", () => {
  it("describes a bridge", () => {
    expect(verboseLines(one(fn(0, 1, 0, bridgeSpace(0, 1, 1))), names, 1)).toEqual([
      "00:01.0 PCI bridge: Acme Devices Bridge Thing (prog-if 00 [Normal decode])",
      "\tFlags: fast devsel",
      "\tBus: primary=00, secondary=01, subordinate=01, sec-latency=0",
      "\tI/O behind bridge: 00000000-00000fff",
      "\tMemory behind bridge: 00000000-000fffff",
      "\tPrefetchable memory behind bridge: 00000000-000fffff",
    ]);
  });

  it("lists the regions and windows a bridge forwards", () => {
    expect(verboseLines(one(fn(0, 1, 0, windowedBridge())), names, 1)).toEqual([
      "00:01.0 PCI bridge: Acme Devices Bridge Thing (prog-if 00 [Normal decode])",
      "\tFlags: fast devsel",
      "\tMemory at fd000000 (32-bit, non-prefetchable)",
      "\tI/O ports at e000 [disabled]",
      "\tBus: primary=00, secondary=01, subordinate=01, sec-latency=0",
      "\tI/O behind bridge: 00002000-00003fff",
      "\tMemory behind bridge: fe000000-fe1fffff",
      "\tPrefetchable memory behind bridge: 00000004c0000000-00000004c1f00000",
    ]);
  });

  it("adds secondary status and bridge control at -vv", () => {
    const bytes = windowedBridge();
    setWord(bytes, 0x1e, 0x0200);
    setWord(bytes, 0x3e, 0x000b);
    expect(verboseLines(one(fn(0, 1, 0, bytes)), names, 2)).toEqual([
      "00:01.0 PCI bridge: Acme Devices Bridge Thing (prog-if 00 [Normal decode])",
      "\tControl: I/O- Mem+ BusMaster- SpecCycle- MemWINV- VGASnoop- ParErr- Stepping- SERR- FastB2B-",
      "\tStatus: Cap- 66Mhz- UDF- FastB2B- ParErr- DEVSEL=fast >TAbort- <TAbort- <MAbort- >SERR- <PERR-",
      "\tRegion 0: Memory at fd000000 (32-bit, non-prefetchable)",
      "\tRegion 1: I/O ports at e000 [disabled]",
      "\tBus: primary=00, secondary=01, subordinate=01, sec-latency=0",
      "\tI/O behind bridge: 00002000-00003fff",
      "\tMemory behind bridge: fe000000-fe1fffff",
      "\tPrefetchable memory behind bridge: 00000004c0000000-00000004c1f00000",
      "\tSecondary status: 66Mhz- FastB2B- ParErr- DEVSEL=medium >TAbort- <TAbort- <MAbort- <SERR- <PERR-",
      "\tBridgeCtl: Parity+ SERR+ NoISA- VGA+ MAbort- >Reset- FastB2B-",
    ]);
  });

  it("shows an empty I/O window only at -vvv", () => {
    const bytes = bridgeSpace(0, 1, 1);
    bytes[0x1c] = 0x10;
    const ioLines = (verbose: number) =>
      verboseLines(one(fn(0, 1, 0, bytes)), names, verbose).filter((l) => l.startsWith("\tI/O behind"));
    expect(ioLines(1)).toEqual([]);
    expect(ioLines(3)).toEqual(["\tI/O behind bridge: 00001000-00000fff"]);
  });

  it("reports window types it cannot decode", () => {
    const bytes = bridgeSpace(0, 1, 1);
    bytes[0x1c] = 0x02;
    bytes[0x1d] = 0x02;
    setWord(bytes, 0x20, 0x0001);
    setWord(bytes, 0x24, 0x0002);
    setWord(bytes, 0x26, 0x0002);
    expect(verboseLines(one(fn(0, 1, 0, bytes)), names, 1).slice(2)).toEqual([
      "\tBus: primary=00, secondary=01, subordinate=01, sec-latency=0",
      "\t!!! Unknown I/O range types 2/2",
      "\t!!! Unknown memory range types 1/0",
      "\t!!! Unknown prefetchable memory range types 2/2",
    ]);
  });

  it("decodes base address registers and the expansion ROM", () => {
    const bytes = space({ command: 0x0003 });
    setLong(bytes, 0x10, 0xf000000c);
    setLong(bytes, 0x14, 0x00000001);
    setLong(bytes, 0x18, 0x0000d001);
    setLong(bytes, 0x24, 0x00000004);
    setLong(bytes, 0x30, 0xfe000000);
    const d = one(fn(0, 2, 0, bytes));
    expect(verboseLines(d, names, 1)).toEqual([
      "00:02.0 Ethernet controller: Acme Devices Widget NIC",
      "\tFlags: fast devsel",
      "\tMemory at 1f0000000 (64-bit, prefetchable)",
      "\tI/O ports at d000",
      "\tMemory at <invalid-64bit-slot> (64-bit, non-prefetchable)",
      "\tExpansion ROM at fe000000 [disabled]",
    ]);
    expect(verboseLines(d, names, 2).filter((l) => l.startsWith("\tRegion"))).toEqual([
      "\tRegion 0: Memory at 1f0000000 (64-bit, prefetchable)",
      "\tRegion 2: I/O ports at d000",
      "\tRegion 5: Memory at <invalid-64bit-slot> (64-bit, non-prefetchable)",
    ]);
  });

  it("describes the windows of a CardBus bridge", () => {
    const bytes = space({ device: 0x0002, classCode: 0x0607, headerType: 2, command: 0x0002, buses: [0, 2, 5] });
    setLong(bytes, 0x1c, 0x10000000);
    setLong(bytes, 0x20, 0x10fff000);
    setLong(bytes, 0x2c, 0x00001000);
    setLong(bytes, 0x30, 0x000010fc);
    setWord(bytes, 0x16, 0x4000);
    setWord(bytes, 0x3e, 0x0100);
    setWord(bytes, 0x44, 0x03e0);
    expect(verboseLines(one(fn(0, 3, 0, bytes)), names, 1)).toEqual([
      "00:03.0 Bridge [0607]: Acme Devices Bridge Thing",
      "\tFlags: fast devsel",
      "\tBus: primary=00, secondary=02, subordinate=05, sec-latency=0",
      "\tMemory window 0: 10000000-10fff000 (prefetchable)",
      "\tI/O window 0: 00001000-000010ff [disabled]",
      "\tI/O window 1: 00000000-00000003 [disabled]",
      "\tSecondary status: SERR",
      "\t16-bit legacy interface ports at 03e0",
    ]);
  });

  it("spells out control and status at -vv", () => {
    const d = one(fn(0, 2, 0, space({ command: 0x0006, status: 0x0010 })));
    expect(verboseLines(d, names, 2)).toEqual([
      "00:02.0 Ethernet controller: Acme Devices Widget NIC",
      "\tControl: I/O- Mem+ BusMaster+ SpecCycle- MemWINV- VGASnoop- ParErr- Stepping- SERR- FastB2B-",
      "\tStatus: Cap+ 66Mhz- UDF- FastB2B- ParErr- DEVSEL=fast >TAbort- <TAbort- <MAbort- >SERR- <PERR-",
      "\tLatency: 0",
    ]);
  });

  it("shows the subsystem", () => {
    expect(verboseLines(one(fn(0, 0x1f, 0, nicSpace())), names, 1)).toEqual([
      "00:1f.0 Ethernet controller: Acme Devices Widget NIC (rev 03)",
      "\tSubsystem: Acme Devices Widget NIC Rev B",
      "\tFlags: fast devsel",
    ]);
  });

  it("flags a bridge class on a normal header", () => {
    expect(verboseLines(one(fn(0, 3, 0, space({ classCode: 0x0604 }))), names, 1)).toEqual([
      "00:03.0 PCI bridge: Acme Devices Widget NIC (prog-if 00 [Normal decode])",
      "\t!!! Invalid class 0604 for header type 00",
      "\tFlags: fast devsel",
    ]);
  });

  it("stops at an unknown header type", () => {
    expect(verboseLines(one(fn(0, 4, 0, space({ headerType: 0x05 }))), numeric, 1)).toEqual([
      "00:04.0 Class 0200: 1234:0001",
      "\t!!! Unknown header type 05",
    ]);
  });
});

describe("machineLines", () => {
  it("quotes each field", () => {
    expect(machineLines(one(fn(0, 0x1f, 0, nicSpace())), names, 0)).toEqual([
      '00:1f.0 "Ethernet controller" "Acme Devices" "Widget NIC" -r03 "Acme Devices" "Widget NIC Rev B"',
    ]);
  });

  it("leaves the subsystem fields empty when there is none", () => {
    expect(machineLines(one(fn(0, 1, 0, space())), numeric, 0)).toEqual(['00:01.0 "Class 0200" "1234" "0001" "" ""']);
  });

  it("uses tagged lines when verbose", () => {
    expect(machineLines(one(fn(0, 0x1f, 0, nicSpace())), names, 1)).toEqual([
      "Device:\t00:1f.0",
      "Class:\tEthernet controller",
      "Vendor:\tAcme Devices",
      "Device:\tWidget NIC",
      "SVendor:\tAcme Devices",
      "SDevice:\tWidget NIC Rev B",
      "Rev:\t03",
    ]);
  });
});

describe("hexDumpLines", () => {
  it("dumps the scanned header", () => {
    const lines = hexDumpLines(one(fn(0, 0x1f, 0, nicSpace())), 1);
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe("00: 34 12 01 00 00 00 00 00 03 00 00 02 00 00 00 00");
  });

  it("fetches the rest of the standard space only once asked", () => {
    const f = fn(0, 0x1f, 0, nicSpace());
    const access = new FakeAccess([f]);
    const d = one(f, access);
    const lines = hexDumpLines(d, 3);
    expect(lines).toHaveLength(16);
    expect(access.reads).toEqual([
      { slot: "0000:00:1f.0", offset: 0, length: 64 },
      { slot: "0000:00:1f.0", offset: 64, length: 192 },
    ]);
  });

  it("keeps the shorter dump when extended space is refused", () => {
    const lines = hexDumpLines(one(fn(0, 0x1f, 0, nicSpace())), 4);
    expect(lines).toHaveLength(16);
    expect(lines[15].startsWith("f0: ")).toBe(true);
  });

  it("writes dumps the dump reader accepts", () => {
    const bytes = nicSpace();
    const d = one(fn(0, 0x1f, 0, bytes));
    const text = ["00:1f.0 Ethernet controller", ...hexDumpLines(d, 3)].join("\n");
    expect(DumpAccess.fromText(text).readBytes(d.addr, 0, 256)).toEqual(bytes);
  });
});

describe("showDevice", () => {
  it("separates verbose entries with a blank line", () => {
    const d = one(fn(0, 1, 0, space()));
    expect(showDevice(d, numeric, { verbose: 0, hex: 0, machine: false })).toEqual(["00:01.0 Class 0200: 1234:0001"]);
    expect(showDevice(d, numeric, { verbose: 1, hex: 0, machine: false })).toEqual([
      "00:01.0 Class 0200: 1234:0001",
      "\tFlags: fast devsel",
      "",
    ]);
  });
});
