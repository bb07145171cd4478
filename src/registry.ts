import { PciAccess, PciAddress, slotName } from "./access.js";
import { ConfigCache } from "./config_cache.js";
import { PciFilter, matchesId, matchesSlot } from "./filter.js";
import {
  PCI_CLASS_DEVICE,
  PCI_DEVICE_ID,
  PCI_HEADER_MULTIFUNCTION,
  PCI_HEADER_SIZE,
  PCI_HEADER_TYPE,
  PCI_HEADER_TYPE_BRIDGE,
  PCI_HEADER_TYPE_CARDBUS,
  PCI_HEADER_TYPE_NORMAL,
  PCI_VENDOR_ID,
} from "./pci_regs.js";
import { PciError } from "./util.js";

export type HeaderKind = "normal" | "bridge" | "cardbus" | "unknown";

export type Device = {
  addr: PciAddress;
  vendorId: number;
  deviceId: number;
  config: ConfigCache;
};

export type Classification = {
  header: HeaderKind;
  headerType: number;
  classCode: number;
  multifunction: boolean;
};

export function headerKind(headerType: number): HeaderKind {
  switch (headerType & 0x7f) {
    case PCI_HEADER_TYPE_NORMAL:
      return "normal";
    case PCI_HEADER_TYPE_BRIDGE:
      return "bridge";
    case PCI_HEADER_TYPE_CARDBUS:
      return "cardbus";
    default:
      return "unknown";
  }
}

export function classify(d: Device): Classification {
  const ht = d.config.byte(PCI_HEADER_TYPE);
  return {
    header: headerKind(ht),
    headerType: ht & 0x7f,
    classCode: d.config.word(PCI_CLASS_DEVICE),
    multifunction: (ht & PCI_HEADER_MULTIFUNCTION) !== 0,
  };
}

export function scanDevice(access: PciAccess, addr: PciAddress): Device {
  const config = new ConfigCache((offset, length) => access.readBytes(addr, offset, length));
  if (!config.fetch(0, PCI_HEADER_SIZE)) {
    throw new PciError(`${slotName(addr)}: Unable to read the configuration space header.`);
  }
  // CardBus bridges keep the rest of their standard header in the next 64 bytes.
  if (headerKind(config.byte(PCI_HEADER_TYPE)) === "cardbus" && !config.fetch(PCI_HEADER_SIZE, PCI_HEADER_SIZE)) {
    throw new PciError(`${slotName(addr)}: Unable to read cardbus bridge extension data.`);
  }
  return {
    addr,
    vendorId: config.word(PCI_VENDOR_ID),
    deviceId: config.word(PCI_DEVICE_ID),
    config,
  };
}

export function compareAddresses(a: PciAddress, b: PciAddress): number {
  return a.domain - b.domain || a.bus - b.bus || a.dev - b.dev || a.func - b.func;
}

export function compareDevices(a: Device, b: Device): number {
  return compareAddresses(a.addr, b.addr);
}

export function sortDevices(devices: Device[]): Device[] {
  return [...devices].sort(compareDevices);
}

export function scanDevices(access: PciAccess, filter: PciFilter = {}): Device[] {
  const out: Device[] = [];
  for (const addr of access.enumerate()) {
    if (!matchesSlot(filter, addr)) continue;
    const d = scanDevice(access, addr);
    if (!matchesId(filter, d.vendorId, d.deviceId)) continue;
    out.push(d);
  }
  return sortDevices(out);
}
