import { describe, it, expect } from "vitest";
import { slotName } from "../access.js";
import { classify, headerKind, scanDevice, scanDevices } from "../registry.js";
import { PciError } from "../util.js";
import { FakeAccess, fn, space } from "./helpers.js";

describe("scanDevices", () => {
  it("returns functions sorted by domain, bus, device and function", () => {
    const access = new FakeAccess([
      fn(1, 0, 0, space()),
      fn(0, 3, 0, space(), 1),
      fn(0, 1, 1, space()),
      fn(0, 1, 0, space()),
    ]);
    expect(scanDevices(access).map((d) => slotName(d.addr))).toEqual(["00:01.0", "00:01.1", "01:00.0", "0001:00:03.0"]);
  });

  it("decodes vendor and device ids from the header", () => {
    const [d] = scanDevices(new FakeAccess([fn(0, 2, 0, space({ vendor: 0x8086, device: 0x1234 }))]));
    expect(d.vendorId).toBe(0x8086);
    expect(d.deviceId).toBe(0x1234);
  });

  it("applies the slot filter before reading anything", () => {
    const access = new FakeAccess([fn(0, 1, 0, space()), fn(1, 0, 0, space())]);
    const devices = scanDevices(access, { bus: 1 });
    expect(devices.map((d) => slotName(d.addr))).toEqual(["01:00.0"]);
    expect(access.reads.every((r) => r.slot.startsWith("0000:01:"))).toBe(true);
  });

  it("applies the id filter after the header is read", () => {
    const access = new FakeAccess([fn(0, 1, 0, space({ vendor: 0x1234 })), fn(0, 2, 0, space({ vendor: 0x8086 }))]);
    expect(scanDevices(access, { vendor: 0x8086 }).map((d) => slotName(d.addr))).toEqual(["00:02.0"]);
  });

  it("reads the CardBus extension as a second block", () => {
    const access = new FakeAccess([fn(0, 2, 0, space({ classCode: 0x0607, headerType: 2 }))]);
    scanDevices(access);
    expect(access.reads).toEqual([
      { slot: "0000:00:02.0", offset: 0, length: 64 },
      { slot: "0000:00:02.0", offset: 64, length: 64 },
    ]);
  });
});

describe("scanDevice", () => {
  it("fails hard when the header cannot be read", () => {
    const addr = { domain: 0, bus: 0, dev: 5, func: 0 };
    const access = new FakeAccess([fn(0, 5, 0, space())]).fail(addr);
    expect(() => scanDevice(access, addr)).toThrow(PciError);
    expect(() => scanDevice(access, addr)).toThrow("00:05.0: Unable to read the configuration space header.");
  });

  it("fails hard when the CardBus extension cannot be read", () => {
    const bytes = space({ classCode: 0x0607, headerType: 2 }).slice(0, 64);
    const access = new FakeAccess([fn(0, 2, 0, bytes)]);
    expect(() => scanDevice(access, { domain: 0, bus: 0, dev: 2, func: 0 })).toThrow(
      "00:02.0: Unable to read cardbus bridge extension data.",
    );
  });
});

describe("classify", () => {
  it("splits the header type byte", () => {
    const [d] = scanDevices(new FakeAccess([fn(0, 1, 0, space({ classCode: 0x0604, headerType: 0x81 }))]));
    expect(classify(d)).toEqual({ header: "bridge", headerType: 1, classCode: 0x0604, multifunction: true });
  });

  it("names unknown layouts", () => {
    expect(headerKind(0x00)).toBe("normal");
    expect(headerKind(0x82)).toBe("cardbus");
    expect(headerKind(0x7f)).toBe("unknown");
  });
});
