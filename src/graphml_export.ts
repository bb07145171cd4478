import { XMLBuilder } from "fast-xml-parser";
import { slotName } from "./access.js";
import { Names } from "./ids.js";
import { PCI_CLASS_DEVICE } from "./pci_regs.js";
import { Device } from "./registry.js";
import { Bus, Topology } from "./topology.js";
import { hex } from "./util.js";

type GraphmlData = { "@_key": string; "#text": string };
type GraphmlNode = { "@_id": string; data: GraphmlData[] };
type GraphmlEdge = { "@_id": string; "@_source": string; "@_target": string; data: GraphmlData[] };

const KEYS = [
  { id: "d0", for: "node", name: "label" },
  { id: "d1", for: "node", name: "kind" },
  { id: "d2", for: "node", name: "vendor" },
  { id: "d3", for: "node", name: "device" },
  { id: "d4", for: "node", name: "class" },
  { id: "d5", for: "edge", name: "label" },
];

export function busNodeId(bus: Bus): string {
  return `bus_${hex(bus.domain, 4)}_${hex(bus.number, 2)}`;
}

export function deviceNodeId(d: Device): string {
  const a = d.addr;
  return `dev_${hex(a.domain, 4)}_${hex(a.bus, 2)}_${hex(a.dev, 2)}_${a.func}`;
}

function data(key: string, text: string): GraphmlData {
  return { "@_key": key, "#text": text };
}

export function topologyToGraphml(t: Topology, names: Names): string {
  const nodes: GraphmlNode[] = [];
  const edges: GraphmlEdge[] = [];
  for (const bus of t.buses) {
    nodes.push({
      "@_id": busNodeId(bus),
      data: [data("d0", `[${hex(bus.domain, 4)}:${hex(bus.number, 2)}]`), data("d1", "bus")],
    });
  }
  for (const bus of t.buses) {
    for (const d of bus.devices) {
      const bi = t.bridgeOf.get(d);
      nodes.push({
        "@_id": deviceNodeId(d),
        data: [
          data("d0", slotName(d.addr)),
          data("d1", bi === undefined ? "device" : "bridge"),
          data("d2", names.vendorName(d.vendorId)),
          data("d3", names.deviceName(d.vendorId, d.deviceId)),
          data("d4", names.className(d.config.word(PCI_CLASS_DEVICE))),
        ],
      });
      edges.push({
        "@_id": `e${edges.length}`,
        "@_source": busNodeId(bus),
        "@_target": deviceNodeId(d),
        data: [data("d5", "slot")],
      });
      if (bi === undefined) continue;
      for (const child of t.bridges[bi].buses) {
        edges.push({
          "@_id": `e${edges.length}`,
          "@_source": deviceNodeId(d),
          "@_target": busNodeId(t.buses[child]),
          data: [data("d5", "forwards")],
        });
      }
    }
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });
  const doc = {
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    graphml: {
      "@_xmlns": "http://graphml.graphdrawing.org/xmlns",
      key: KEYS.map((k) => ({ "@_id": k.id, "@_for": k.for, "@_attr.name": k.name, "@_attr.type": "string" })),
      graph: { "@_id": "pci", "@_edgedefault": "directed", node: nodes, edge: edges },
    },
  };
  return builder.build(doc);
}
