import { PciAccess, PciAddress } from "./access.js";
import { PciFilter, matchesId } from "./filter.js";
import {
  PCI_CB_CARD_BUS,
  PCI_CB_PRIMARY_BUS,
  PCI_CB_SUBORDINATE_BUS,
  PCI_HEADER_MULTIFUNCTION,
  PCI_HEADER_TYPE,
  PCI_MAX_BUS,
  PCI_MAX_FUNC,
  PCI_MAX_SLOT,
  PCI_PRIMARY_BUS,
  PCI_SECONDARY_BUS,
  PCI_SUBORDINATE_BUS,
  PCI_VENDOR_ID,
} from "./pci_regs.js";
import { Device, classify, scanDevice } from "./registry.js";
import { RunContext, softError } from "./run_context.js";
import { PciError, hex } from "./util.js";

export type BridgeBug = "overlap" | "crossing";

export type BridgeClaim = {
  primary: number;
  dev: number;
  func: number;
  first: number;
  last: number;
  bug?: BridgeBug;
};

export type ProbeRecord = {
  bus: number;
  exists: boolean;
  visited: boolean;
  // most recently discovered first
  bridges: BridgeClaim[];
  via?: BridgeClaim;
};

export type BusMap = ProbeRecord[];

export type ProbeOptions = {
  filter?: PciFilter;
  describe?: (d: Device) => string[];
};

export function createBusMap(): BusMap {
  const map: BusMap = [];
  for (let bus = 0; bus <= PCI_MAX_BUS; bus += 1) {
    map.push({ bus, exists: false, visited: false, bridges: [] });
  }
  return map;
}

function isPresent(vendor: number): boolean {
  return vendor !== 0 && vendor !== 0xffff;
}

function claimBridge(ctx: RunContext, rec: ProbeRecord, d: Device, np: number, ns: number, nl: number): void {
  const { bus, dev, func } = d.addr;
  const claim: BridgeClaim = {
    primary: d.config.byte(np),
    dev,
    func,
    first: d.config.byte(ns),
    last: d.config.byte(nl),
  };
  rec.bridges.unshift(claim);
  ctx.out(`## ${hex(bus, 2)}.${hex(dev, 2)}:${func} is a bridge from ${hex(claim.primary, 2)} to ${hex(claim.first, 2)}-${hex(claim.last, 2)}`);
  if (claim.primary !== bus) ctx.out("!!! Bridge points to invalid primary bus.");
  if (claim.first > claim.last) {
    ctx.out("!!! Bridge points to invalid bus range.");
    claim.last = claim.first;
  }
}

function probeFunction(ctx: RunContext, access: PciAccess, rec: ProbeRecord, addr: PciAddress, opts: ProbeOptions): void {
  if (ctx.debug) ctx.out(`Discovered device ${hex(addr.bus, 2)}:${hex(addr.dev, 2)}.${addr.func}`);
  rec.exists = true;
  let d: Device;
  try {
    d = scanDevice(access, addr);
  } catch (e) {
    if (!(e instanceof PciError)) throw e;
    softError(ctx, e.message);
    return;
  }
  if (opts.filter && !matchesId(opts.filter, d.vendorId, d.deviceId)) {
    if (ctx.debug) ctx.out("But it was filtered out.");
    return;
  }
  for (const line of opts.describe?.(d) ?? []) ctx.out(line);
  switch (classify(d).header) {
    case "bridge":
      claimBridge(ctx, rec, d, PCI_PRIMARY_BUS, PCI_SECONDARY_BUS, PCI_SUBORDINATE_BUS);
      break;
    case "cardbus":
      claimBridge(ctx, rec, d, PCI_CB_PRIMARY_BUS, PCI_CB_CARD_BUS, PCI_CB_SUBORDINATE_BUS);
      break;
    default:
      break;
  }
}

export function probeBus(ctx: RunContext, access: PciAccess, map: BusMap, bus: number, opts: ProbeOptions = {}): void {
  const f = opts.filter ?? {};
  const rec = map[bus];
  if (ctx.debug) ctx.out(`Mapping bus ${hex(bus, 2)}`);
  for (let dev = 0; dev <= PCI_MAX_SLOT; dev += 1) {
    if (f.slot !== undefined && f.slot !== dev) continue;
    let funcLimit = 1;
    for (let func = 0; func < funcLimit; func += 1) {
      if (f.func !== undefined && f.func !== func) continue;
      const addr: PciAddress = { domain: f.domain ?? 0, bus, dev, func };
      if (!isPresent(access.readWord(addr, PCI_VENDOR_ID))) continue;
      if (func === 0 && (access.readWord(addr, PCI_HEADER_TYPE) & PCI_HEADER_MULTIFUNCTION) !== 0) {
        funcLimit = PCI_MAX_FUNC + 1;
      }
      probeFunction(ctx, access, rec, addr, opts);
    }
  }
}

export function probeBuses(ctx: RunContext, access: PciAccess, opts: ProbeOptions = {}): BusMap {
  const map = createBusMap();
  const only = opts.filter?.bus;
  if (only !== undefined) {
    probeBus(ctx, access, map, only, opts);
  } else {
    for (let bus = 0; bus <= PCI_MAX_BUS; bus += 1) probeBus(ctx, access, map, bus, opts);
  }
  return map;
}

type WalkFrame = { bus: number; min: number; max: number; next: number };

// A claim into a visited bus is an overlap; one that leaves its parent's window is a crossing.
function walkFrom(map: BusMap, start: number): void {
  map[start].visited = true;
  const stack: WalkFrame[] = [{ bus: start, min: 0, max: PCI_MAX_BUS, next: 0 }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    const claims = map[top.bus].bridges;
    if (top.next >= claims.length) {
      stack.pop();
      continue;
    }
    const b = claims[top.next];
    top.next += 1;
    if (map[b.first].visited) {
      b.bug = "overlap";
    } else if (b.first < top.min || b.last > top.max) {
      b.bug = "crossing";
    } else {
      map[b.first].via = b;
      map[b.first].visited = true;
      stack.push({ bus: b.first, min: b.first, max: b.last, next: 0 });
    }
  }
}

export function validateBusMap(map: BusMap): BusMap {
  for (const rec of map) {
    if (rec.exists && !rec.visited) walkFrom(map, rec.bus);
  }
  return map;
}

export function summarizeBusMap(map: BusMap): string[] {
  const lines: string[] = [];
  for (const rec of map) {
    if (rec.exists) {
      const via = rec.via;
      if (via) {
        lines.push(`${hex(rec.bus, 2)}: Entered via ${hex(via.primary, 2)}:${hex(via.dev, 2)}.${via.func}`);
      } else if (rec.bus === 0) {
        lines.push(`${hex(rec.bus, 2)}: Primary host bus`);
      } else {
        lines.push(`${hex(rec.bus, 2)}: Secondary host bus (?)`);
      }
    }
    for (const b of rec.bridges) {
      let line = `\t${hex(b.dev, 2)}.${b.func} Bridge to ${hex(b.first, 2)}-${hex(b.last, 2)}`;
      if (b.bug === "overlap") line += " <overlap bug>";
      if (b.bug === "crossing") line += " <crossing bug>";
      lines.push(line);
    }
  }
  return lines;
}

export function mapTheBus(ctx: RunContext, access: PciAccess, opts: ProbeOptions = {}): BusMap {
  if (!access.direct) {
    ctx.out("WARNING: Bus mapping can be reliable only with direct hardware access enabled.");
    ctx.out("");
  }
  const map = validateBusMap(probeBuses(ctx, access, opts));
  ctx.out("");
  ctx.out("Summary of buses:");
  ctx.out("");
  for (const line of summarizeBusMap(map)) ctx.out(line);
  return map;
}
