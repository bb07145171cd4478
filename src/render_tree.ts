import { Device } from "./registry.js";
import { Bridge, Bus, HOST_ROOT, Topology } from "./topology.js";
import { hex } from "./util.js";

// Bus numbers are eight bits wide, so no honest tree is deeper than this.
export const MAX_TREE_DEPTH = 256;

export type TreeOptions = {
  describe?: (d: Device) => string;
};

function busTag(bus: Bus): string {
  return `[${hex(bus.domain, 4)}:${hex(bus.number, 2)}]`;
}

function rangeTag(b: Bridge): string {
  if (b.secondary === b.subordinate) return `[${hex(b.domain, 4)}:${hex(b.secondary, 2)}]`;
  return `[${hex(b.domain, 4)}:${hex(b.secondary, 2)}-${hex(b.subordinate, 2)}]`;
}

export function renderTree(t: Topology, opts: TreeOptions = {}): string[] {
  const lines: string[] = [];
  let line = "";

  const put = (p: number, text: string): number => {
    line = line.slice(0, p).padEnd(p) + text;
    return p + text.length;
  };

  // What was written becomes the rail of the next line: `+` and `|` stay as `|`.
  const emit = (p: number): void => {
    const s = line.slice(0, p);
    lines.push(s);
    line = s.replace(/./g, (c) => (c === "+" || c === "|" ? "|" : " "));
  };

  const visitDevice = (d: Device, p: number, depth: number): void => {
    p = put(p, `${hex(d.addr.dev, 2)}.${d.addr.func}`);
    const bi = t.bridgeOf.get(d);
    if (bi !== undefined) {
      const b = t.bridges[bi];
      visitBridge(b, put(p, `-${rangeTag(b)}-`), depth + 1);
      return;
    }
    const extra = opts.describe?.(d);
    if (extra) p = put(p, `  ${extra}`);
    emit(p);
  };

  const visitBus = (bus: Bus, p: number, depth: number): void => {
    const devs = bus.devices;
    if (devs.length === 0) {
      emit(p);
      return;
    }
    if (devs.length === 1) {
      visitDevice(devs[0], put(p, "--"), depth);
      return;
    }
    devs.forEach((d, i) => {
      visitDevice(d, put(p, i === devs.length - 1 ? "\\-" : "+-"), depth);
    });
  };

  const visitBridge = (b: Bridge, p: number, depth: number): void => {
    if (depth >= MAX_TREE_DEPTH) {
      emit(put(p, "..."));
      return;
    }
    p = put(p, "-");
    const buses = b.buses.map((i) => t.buses[i]);
    if (buses.length === 0) {
      emit(p);
      return;
    }
    if (buses.length === 1) {
      if (b.index === HOST_ROOT) p = put(p, `${busTag(buses[0])}-`);
      visitBus(buses[0], p, depth);
      return;
    }
    buses.forEach((bus, i) => {
      const glyph = i === buses.length - 1 ? "\\-" : "+-";
      visitBus(bus, put(p, `${glyph}${busTag(bus)}-`), depth);
    });
  };

  visitBridge(t.bridges[HOST_ROOT], 0, 0);
  return lines;
}
