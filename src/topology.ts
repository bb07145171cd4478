import { slotName } from "./access.js";
import {
  PCI_CB_CARD_BUS,
  PCI_CB_PRIMARY_BUS,
  PCI_CB_SUBORDINATE_BUS,
  PCI_CLASS_BRIDGE_PCI,
  PCI_PRIMARY_BUS,
  PCI_SECONDARY_BUS,
  PCI_SUBORDINATE_BUS,
} from "./pci_regs.js";
import { Device, classify } from "./registry.js";
import { hex } from "./util.js";

export const HOST_ROOT = 0;
export const NO_BUS = -1;
export const ALL_BUSES = Number.POSITIVE_INFINITY;

export type Bridge = {
  index: number;
  domain: number;
  primary: number;
  secondary: number;
  // equals secondary when the bridge reported an inverted range
  subordinate: number;
  device?: Device;
  parent?: number;
  children: number[];
  buses: number[];
};

export type Bus = {
  index: number;
  domain: number;
  number: number;
  bridge: number;
  devices: Device[];
};

export type BridgeAnomalyKind = "invalid-range" | "duplicate-secondary" | "cycle" | "unreachable-bus";

export type BridgeAnomaly = {
  kind: BridgeAnomalyKind;
  bridge: number;
  message: string;
};

export type Topology = {
  bridges: Bridge[];
  buses: Bus[];
  anomalies: BridgeAnomaly[];
  bridgeOf: Map<Device, number>;
};

type BusNumbers = { primary: number; secondary: number; subordinate: number };

function busKey(domain: number, n: number): string {
  return `${domain}:${n}`;
}

function span(b: Bridge): number {
  return b.subordinate - b.primary;
}

export function bridgeBusNumbers(d: Device): BusNumbers | undefined {
  const c = classify(d);
  if (c.classCode !== PCI_CLASS_BRIDGE_PCI) return undefined;
  if (c.header === "bridge") {
    return {
      primary: d.config.byte(PCI_PRIMARY_BUS),
      secondary: d.config.byte(PCI_SECONDARY_BUS),
      subordinate: d.config.byte(PCI_SUBORDINATE_BUS),
    };
  }
  if (c.header === "cardbus") {
    return {
      primary: d.config.byte(PCI_CB_PRIMARY_BUS),
      secondary: d.config.byte(PCI_CB_CARD_BUS),
      subordinate: d.config.byte(PCI_CB_SUBORDINATE_BUS),
    };
  }
  return undefined;
}

export function bridgeLabel(t: Topology, index: number): string {
  const d = t.bridges[index].device;
  return d ? slotName(d.addr) : "host";
}

function collectBridges(t: Topology, devices: Device[]): void {
  t.bridges.push({
    index: HOST_ROOT,
    domain: 0,
    primary: NO_BUS,
    secondary: 0,
    subordinate: ALL_BUSES,
    children: [],
    buses: [],
  });
  for (const d of devices) {
    const nums = bridgeBusNumbers(d);
    if (!nums) continue;
    const index = t.bridges.length;
    let subordinate = nums.subordinate;
    if (nums.secondary > nums.subordinate) {
      subordinate = nums.secondary;
      t.anomalies.push({
        kind: "invalid-range",
        bridge: index,
        message: `${slotName(d.addr)}: bridge points to invalid bus range ${hex(nums.secondary, 2)}-${hex(nums.subordinate, 2)}, using ${hex(nums.secondary, 2)}`,
      });
    }
    t.bridges.push({
      index,
      domain: d.addr.domain,
      primary: nums.primary,
      secondary: nums.secondary,
      subordinate,
      device: d,
      children: [],
      buses: [],
    });
    t.bridgeOf.set(d, index);
  }
}

// Tightest enclosing range wins; on equal spans the earlier bridge keeps it.
function assignParents(t: Topology): void {
  for (const b of t.bridges) {
    if (b.index === HOST_ROOT) continue;
    let best: Bridge | undefined;
    for (const c of t.bridges) {
      if (c === b) continue;
      if (c.index !== HOST_ROOT && c.domain !== b.domain) continue;
      if (b.primary < c.secondary || b.primary > c.subordinate) continue;
      if (!best || span(c) < span(best)) best = c;
    }
    b.parent = best ? best.index : HOST_ROOT;
  }
}

// A parent chain that loops never reaches the host root; the loop is cut at its first bridge.
function breakCycles(t: Topology): void {
  const settled = new Set<number>([HOST_ROOT]);
  for (const b of t.bridges) {
    const path: number[] = [];
    let cur: number | undefined = b.index;
    while (cur !== undefined && !settled.has(cur) && !path.includes(cur)) {
      path.push(cur);
      cur = t.bridges[cur].parent;
    }
    if (cur !== undefined && !settled.has(cur)) {
      t.bridges[cur].parent = HOST_ROOT;
      t.anomalies.push({
        kind: "cycle",
        bridge: cur,
        message: `${bridgeLabel(t, cur)}: bridge ranges form a loop, attached to the host root`,
      });
    }
    for (const i of path) settled.add(i);
  }
  for (const b of t.bridges) {
    if (b.parent !== undefined) t.bridges[b.parent].children.push(b.index);
  }
}

function newBus(t: Topology, byKey: Map<string, number>, bridge: number, domain: number, n: number): Bus {
  const bus: Bus = { index: t.buses.length, domain, number: n, bridge, devices: [] };
  t.buses.push(bus);
  t.bridges[bridge].buses.push(bus.index);
  byKey.set(busKey(domain, n), bus.index);
  return bus;
}

function findBus(t: Topology, b: Bridge, domain: number, n: number): Bus | undefined {
  for (const i of b.buses) {
    const bus = t.buses[i];
    if (bus.domain === domain && bus.number === n) return bus;
  }
  return undefined;
}

function materializeBuses(t: Topology, byKey: Map<string, number>): void {
  for (const b of t.bridges) {
    const owner = byKey.get(busKey(b.domain, b.secondary));
    if (owner === undefined) {
      newBus(t, byKey, b.index, b.domain, b.secondary);
      continue;
    }
    t.anomalies.push({
      kind: "duplicate-secondary",
      bridge: b.index,
      message: `${bridgeLabel(t, b.index)}: secondary bus ${hex(b.domain, 4)}:${hex(b.secondary, 2)} is already behind ${bridgeLabel(t, t.buses[owner].bridge)}`,
    });
  }
}

function locateBus(t: Topology, byKey: Map<string, number>, d: Device): Bus {
  const { domain, bus: n } = d.addr;
  let b = t.bridges[HOST_ROOT];
  // Each step moves to a child, so the walk is bounded by the number of bridges.
  for (let steps = 0; steps < t.bridges.length; steps += 1) {
    const found = findBus(t, b, domain, n);
    if (found) return found;
    const next = b.children
      .map((i) => t.bridges[i])
      .find((c) => c.domain === domain && c.secondary <= n && n <= c.subordinate);
    if (!next) break;
    b = next;
  }
  const existing = byKey.get(busKey(domain, n));
  if (existing !== undefined) return t.buses[existing];
  return newBus(t, byKey, b.index, domain, n);
}

function reachableBuses(t: Topology): Set<number> {
  const seen = new Set<number>();
  const stack = [...t.bridges[HOST_ROOT].buses];
  for (let i = stack.pop(); i !== undefined; i = stack.pop()) {
    if (seen.has(i)) continue;
    seen.add(i);
    for (const d of t.buses[i].devices) {
      const b = t.bridgeOf.get(d);
      if (b !== undefined) stack.push(...t.bridges[b].buses);
    }
  }
  return seen;
}

// Buses stranded behind a bridge loop move under the host root, the one carrying a cut bridge first.
function attachOrphans(t: Topology): void {
  const cut = new Set(t.anomalies.filter((a) => a.kind === "cycle").map((a) => a.bridge));
  for (;;) {
    const seen = reachableBuses(t);
    const orphans = t.buses.filter((b) => !seen.has(b.index));
    if (orphans.length === 0) return;
    const bus =
      orphans.find((b) => b.devices.some((d) => cut.has(t.bridgeOf.get(d) ?? HOST_ROOT))) ?? orphans[0];
    const owner = bus.bridge;
    const from = t.bridges[owner];
    from.buses = from.buses.filter((i) => i !== bus.index);
    bus.bridge = HOST_ROOT;
    t.bridges[HOST_ROOT].buses.push(bus.index);
    t.anomalies.push({
      kind: "unreachable-bus",
      bridge: owner,
      message: `bus ${hex(bus.domain, 4)}:${hex(bus.number, 2)} behind ${bridgeLabel(t, owner)} is not reachable from the host root, attached to it`,
    });
  }
}

// Expects a registry sorted by (domain, bus, dev, func); devices keep that order on their bus.
export function buildTopology(devices: Device[]): Topology {
  const t: Topology = { bridges: [], buses: [], anomalies: [], bridgeOf: new Map() };
  const byKey = new Map<string, number>();
  collectBridges(t, devices);
  assignParents(t);
  breakCycles(t);
  materializeBuses(t, byKey);
  for (const d of devices) locateBus(t, byKey, d).devices.push(d);
  attachOrphans(t);
  return t;
}
