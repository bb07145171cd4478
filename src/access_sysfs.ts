import fs from "fs";
import path from "path";
import { PciAccess, PciAddress, fullSlotName, parseSlotName } from "./access.js";
import { die, errorMessage } from "./util.js";

export const DEFAULT_SYSFS_PATH = "/sys/bus/pci/devices";

function isReadFailure(e: unknown): boolean {
  const code = e instanceof Error && "code" in e ? e.code : undefined;
  return code === "ENOENT" || code === "EACCES" || code === "EPERM" || code === "EIO" || code === "EINVAL";
}

export class SysfsAccess implements PciAccess {
  readonly method = "linux-sysfs";
  readonly direct = false;

  constructor(private readonly root = DEFAULT_SYSFS_PATH) {}

  enumerate(): PciAddress[] {
    let names: string[];
    try {
      names = fs.readdirSync(this.root);
    } catch (e) {
      die(`Cannot open ${this.root}: ${errorMessage(e)}`);
    }
    const out: PciAddress[] = [];
    for (const name of names) {
      const addr = parseSlotName(name);
      if (!addr) die(`${this.root}: Invalid name ${name}`);
      out.push(addr);
    }
    return out;
  }

  readBytes(addr: PciAddress, offset: number, length: number): Uint8Array | undefined {
    const file = path.join(this.root, fullSlotName(addr), "config");
    let fd: number | undefined;
    try {
      fd = fs.openSync(file, "r");
      const buf = new Uint8Array(length);
      const n = fs.readSync(fd, buf, 0, length, offset);
      return n === length ? buf : undefined;
    } catch (e) {
      if (isReadFailure(e)) return undefined;
      throw e;
    } finally {
      if (fd !== undefined) fs.closeSync(fd);
    }
  }

  readWord(addr: PciAddress, reg: number): number {
    const b = this.readBytes(addr, reg, 2);
    if (!b) return 0xffff;
    return b[0] | (b[1] << 8);
  }
}
