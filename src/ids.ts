import fs from "fs";
import { hex, readText } from "./util.js";

export const DEFAULT_IDS_PATHS = ["/usr/share/hwdata/pci.ids", "/usr/share/misc/pci.ids"];

export type IdDatabase = {
  vendors: Map<number, string>;
  devices: Map<string, string>;
  subsystems: Map<string, string>;
  classes: Map<number, string>;
  subclasses: Map<number, string>;
  progIfs: Map<string, string>;
};

const VENDOR_RE = /^([0-9a-fA-F]{4})\s+(.+)$/;
const DEVICE_RE = /^\t([0-9a-fA-F]{4})\s+(.+)$/;
const SUBSYS_RE = /^\t\t([0-9a-fA-F]{4})\s+([0-9a-fA-F]{4})\s+(.+)$/;
const CLASS_RE = /^C\s+([0-9a-fA-F]{2})\s+(.+)$/;
const SUBCLASS_RE = /^\t([0-9a-fA-F]{2})\s+(.+)$/;
const PROGIF_RE = /^\t\t([0-9a-fA-F]{2})\s+(.+)$/;

function h(s: string): number {
  return parseInt(s, 16);
}

export function parseIds(text: string): IdDatabase {
  const db: IdDatabase = {
    vendors: new Map(),
    devices: new Map(),
    subsystems: new Map(),
    classes: new Map(),
    subclasses: new Map(),
    progIfs: new Map(),
  };
  let section: "vendor" | "class" | "other" = "other";
  let vendor = -1;
  let device = -1;
  let cls = -1;
  let sub = -1;
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trimEnd();
    if (!line || line.startsWith("#")) continue;
    let m: RegExpExecArray | null;
    if (!line.startsWith("\t")) {
      if ((m = CLASS_RE.exec(line))) {
        section = "class";
        cls = h(m[1]);
        sub = -1;
        db.classes.set(cls, m[2]);
      } else if ((m = VENDOR_RE.exec(line))) {
        section = "vendor";
        vendor = h(m[1]);
        device = -1;
        db.vendors.set(vendor, m[2]);
      } else {
        // Sections this tool has no use for, such as the device type list.
        section = "other";
      }
      continue;
    }
    if (section === "vendor") {
      if ((m = SUBSYS_RE.exec(line)) && device >= 0) {
        db.subsystems.set(`${hex(vendor, 4)}:${hex(device, 4)}:${m[1].toLowerCase()}:${m[2].toLowerCase()}`, m[3]);
      } else if ((m = DEVICE_RE.exec(line))) {
        device = h(m[1]);
        db.devices.set(`${hex(vendor, 4)}:${hex(device, 4)}`, m[2]);
      }
    } else if (section === "class") {
      if ((m = PROGIF_RE.exec(line)) && sub >= 0) {
        db.progIfs.set(`${hex(cls, 2)}${hex(sub, 2)}:${m[1].toLowerCase()}`, m[2]);
      } else if ((m = SUBCLASS_RE.exec(line))) {
        sub = h(m[1]);
        db.subclasses.set((cls << 8) | sub, m[2]);
      }
    }
  }
  return db;
}

export function loadIds(path?: string): IdDatabase | undefined {
  if (path) return parseIds(readText(path));
  const found = DEFAULT_IDS_PATHS.find((p) => fs.existsSync(p));
  return found ? parseIds(readText(found)) : undefined;
}

export class Names {
  constructor(private readonly db: IdDatabase | undefined, private readonly numeric = false) {}

  className(classCode: number): string {
    if (!this.numeric && this.db) {
      const sub = this.db.subclasses.get(classCode);
      if (sub) return sub;
      const base = this.db.classes.get(classCode >> 8);
      if (base) return `${base} [${hex(classCode, 4)}]`;
    }
    return `Class ${hex(classCode, 4)}`;
  }

  vendorName(vendor: number): string {
    if (this.numeric) return hex(vendor, 4);
    return this.db?.vendors.get(vendor) ?? `Unknown vendor ${hex(vendor, 4)}`;
  }

  deviceName(vendor: number, device: number): string {
    if (this.numeric) return hex(device, 4);
    return this.db?.devices.get(`${hex(vendor, 4)}:${hex(device, 4)}`) ?? `Unknown device ${hex(device, 4)}`;
  }

  vendorDevice(vendor: number, device: number): string {
    if (this.numeric) return `${hex(vendor, 4)}:${hex(device, 4)}`;
    const v = this.db?.vendors.get(vendor);
    if (!v) return `Unknown device ${hex(vendor, 4)}:${hex(device, 4)}`;
    return `${v} ${this.deviceName(vendor, device)}`;
  }

  subsystemVendor(sv: number): string {
    return this.vendorName(sv);
  }

  subsystemDevice(vendor: number, device: number, sv: number, sd: number): string {
    if (this.numeric) return hex(sd, 4);
    const key = `${hex(vendor, 4)}:${hex(device, 4)}:${hex(sv, 4)}:${hex(sd, 4)}`;
    return this.db?.subsystems.get(key) ?? `Unknown device ${hex(sd, 4)}`;
  }

  subsystem(vendor: number, device: number, sv: number, sd: number): string {
    if (this.numeric) return `${hex(sv, 4)}:${hex(sd, 4)}`;
    return `${this.subsystemVendor(sv)} ${this.subsystemDevice(vendor, device, sv, sd)}`;
  }

  progIf(classCode: number, progIf: number): string | undefined {
    if (this.numeric) return undefined;
    return this.db?.progIfs.get(`${hex(classCode, 4)}:${hex(progIf, 2)}`);
  }
}
