import { describe, it, expect } from "vitest";
import { Names, loadIds, parseIds } from "../ids.js";
import { TEST_IDS } from "./helpers.js";

describe("parseIds", () => {
  it("reads vendors, devices and subsystems", () => {
    const db = loadIds(TEST_IDS);
    expect(db?.vendors.get(0x1234)).toBe("Acme Devices");
    expect(db?.devices.get("1234:0002")).toBe("Bridge Thing");
    expect(db?.subsystems.get("1234:0001:1234:0100")).toBe("Widget NIC Rev B");
  });

  it("reads classes, subclasses and programming interfaces", () => {
    const db = loadIds(TEST_IDS);
    expect(db?.classes.get(0x06)).toBe("Bridge");
    expect(db?.subclasses.get(0x0604)).toBe("PCI bridge");
    expect(db?.progIfs.get("0604:01")).toBe("Subtractive decode");
  });

  it("skips sections it does not know", () => {
    const db = parseIds("1234  Acme\nX 01  Strange section\n\t01  Child\n");
    expect(db.vendors.size).toBe(1);
    expect(db.devices.size).toBe(0);
  });
});

describe("Names", () => {
  const names = new Names(loadIds(TEST_IDS));

  it("falls back from subclass to class to number", () => {
    expect(names.className(0x0200)).toBe("Ethernet controller");
    expect(names.className(0x0c05)).toBe("Serial bus controller [0c05]");
    expect(names.className(0xff00)).toBe("Class ff00");
  });

  it("names vendor and device together", () => {
    expect(names.vendorDevice(0x1234, 0x0001)).toBe("Acme Devices Widget NIC");
    expect(names.vendorDevice(0x1234, 0x0009)).toBe("Acme Devices Unknown device 0009");
    expect(names.vendorDevice(0xabcd, 0x0001)).toBe("Unknown device abcd:0001");
    expect(names.vendorName(0x9999)).toBe("Unknown vendor 9999");
  });

  it("names subsystems and programming interfaces", () => {
    expect(names.subsystem(0x1234, 0x0001, 0x1234, 0x0100)).toBe("Acme Devices Widget NIC Rev B");
    expect(names.subsystem(0x1234, 0x0001, 0x5678, 0x0009)).toBe("Other Corp Unknown device 0009");
    expect(names.progIf(0x0604, 0x01)).toBe("Subtractive decode");
    expect(names.progIf(0x0200, 0x00)).toBeUndefined();
  });

  it("prints plain numbers in numeric mode", () => {
    const numeric = new Names(loadIds(TEST_IDS), true);
    expect(numeric.className(0x0200)).toBe("Class 0200");
    expect(numeric.vendorDevice(0x1234, 0x0001)).toBe("1234:0001");
    expect(numeric.subsystem(0x1234, 0x0001, 0x1234, 0x0100)).toBe("1234:0100");
    expect(numeric.progIf(0x0604, 0x01)).toBeUndefined();
  });
});
