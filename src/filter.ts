import { PciAddress } from "./access.js";
import { PCI_MAX_BUS, PCI_MAX_FUNC, PCI_MAX_SLOT } from "./pci_regs.js";
import { die } from "./util.js";

export type PciFilter = {
  domain?: number;
  bus?: number;
  slot?: number;
  func?: number;
  vendor?: number;
  device?: number;
};

function isWild(s: string): boolean {
  return s.length === 0 || s === "*";
}

function parseHexField(s: string, max: number, what: string): number | undefined {
  if (isWild(s)) return undefined;
  if (!/^[0-9a-fA-F]+$/.test(s)) die(`Invalid ${what}`);
  const v = parseInt(s, 16);
  if (v > max) die(`Invalid ${what}`);
  return v;
}

// [[[[<domain>]:]<bus>]:][<slot>][.[<func>]]
export function parseSlotFilter(text: string): PciFilter {
  const out: PciFilter = {};
  let rest = text;
  const colon = rest.lastIndexOf(":");
  if (colon >= 0) {
    let mid = rest.slice(0, colon);
    const colon2 = mid.indexOf(":");
    if (colon2 >= 0) {
      out.domain = parseHexField(mid.slice(0, colon2), 0xffff, "domain number");
      mid = mid.slice(colon2 + 1);
    }
    out.bus = parseHexField(mid, PCI_MAX_BUS, "bus number");
    rest = rest.slice(colon + 1);
  }
  const dot = rest.indexOf(".");
  if (dot >= 0) {
    out.func = parseHexField(rest.slice(dot + 1), PCI_MAX_FUNC, "function number");
    rest = rest.slice(0, dot);
  }
  out.slot = parseHexField(rest, PCI_MAX_SLOT, "slot number");
  return out;
}

// [<vendor>]:[<device>]
export function parseIdFilter(text: string): PciFilter {
  const colon = text.indexOf(":");
  if (colon < 0) die("':' expected");
  return {
    vendor: parseHexField(text.slice(0, colon), 0xffff, "vendor ID"),
    device: parseHexField(text.slice(colon + 1), 0xffff, "device ID"),
  };
}

export function matchesSlot(f: PciFilter, addr: PciAddress): boolean {
  if (f.domain !== undefined && f.domain !== addr.domain) return false;
  if (f.bus !== undefined && f.bus !== addr.bus) return false;
  if (f.slot !== undefined && f.slot !== addr.dev) return false;
  if (f.func !== undefined && f.func !== addr.func) return false;
  return true;
}

export function matchesId(f: PciFilter, vendor: number, device: number): boolean {
  if (f.vendor !== undefined && f.vendor !== vendor) return false;
  if (f.device !== undefined && f.device !== device) return false;
  return true;
}
