#!/usr/bin/env node
import fs from "fs";
import { pathToFileURL } from "url";
import { PciAccess } from "./access.js";
import { DumpAccess } from "./access_dump.js";
import { SysfsAccess } from "./access_sysfs.js";
import { mapTheBus } from "./bus_map.js";
import { AccessMethod, PcimapConfig, loadConfig, parseAccessMethod } from "./config.js";
import { PciFilter, parseIdFilter, parseSlotFilter } from "./filter.js";
import { topologyToGraphml } from "./graphml_export.js";
import { Names, loadIds } from "./ids.js";
import { Device, scanDevices } from "./registry.js";
import { renderTree } from "./render_tree.js";
import { RunContext, createRunContext, exitStatus } from "./run_context.js";
import { ShowOptions, showDevice } from "./show.js";
import { buildTopology } from "./topology.js";
import { PciError, die, writeText } from "./util.js";

export const VERSION = "1.0.0";

export const HELP = `Usage: pcimap [<switches>]

-v\t\tBe verbose (-vv for even more)
-n\t\tShow numeric IDs
-x\t\tShow hex-dump of the standard portion of config space
-xxx\t\tShow hex-dump of the whole config space
-xxxx\t\tShow hex-dump of the 4096-byte extended config space
-s [[[[<domain>]:]<bus>]:][<slot>][.[<func>]]\tShow only devices in selected slots
-d [<vendor>]:[<device>]\tShow only selected devices
-t\t\tShow bus tree
-g <file>\tWrite the bus tree as GraphML
-m\t\tProduce machine-readable output
-i <file>\tUse specified ID database
-M\t\tEnable bus mapping mode
-A <method>\tAccess method: sysfs or dump
-F <file>\tRead configuration space from a hex dump
-c <file>\tRead settings from a YAML file (default ./pcimap.yaml)
-G\t\tPrint debugging messages`;

const OPTIONS = "nvxs:d:tg:i:mMA:F:c:G";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliOptions = {
  verbose: number;
  numeric: boolean;
  hex: number;
  tree: boolean;
  machine: boolean;
  map: boolean;
  debug: boolean;
  version: boolean;
  filter: PciFilter;
  idsFile?: string;
  dumpFile?: string;
  access?: AccessMethod;
  graphml?: string;
  config?: string;
};

function withPrefix<T>(prefix: string, f: () => T): T {
  try {
    return f();
  } catch (e) {
    if (e instanceof PciError) throw new PciError(`${prefix}: ${e.message}`);
    throw e;
  }
}

function applyValue(opts: CliOptions, ch: string, val: string): void {
  switch (ch) {
    case "s":
      opts.filter = { ...opts.filter, ...withPrefix("-s", () => parseSlotFilter(val)) };
      break;
    case "d":
      opts.filter = { ...opts.filter, ...withPrefix("-d", () => parseIdFilter(val)) };
      break;
    case "g":
      opts.graphml = val;
      break;
    case "i":
      opts.idsFile = val;
      break;
    case "A":
      opts.access = withPrefix("-A", () => parseAccessMethod(val));
      break;
    case "F":
      opts.dumpFile = val;
      break;
    case "c":
      opts.config = val;
      break;
    default:
      throw new UsageError(`invalid option -- '${ch}'`);
  }
}

function applyFlag(opts: CliOptions, ch: string): void {
  switch (ch) {
    case "n":
      opts.numeric = true;
      break;
    case "v":
      opts.verbose += 1;
      break;
    case "x":
      opts.hex += 1;
      break;
    case "t":
      opts.tree = true;
      break;
    case "m":
      opts.machine = true;
      break;
    case "M":
      opts.map = true;
      break;
    case "G":
      opts.debug = true;
      break;
    default:
      throw new UsageError(`invalid option -- '${ch}'`);
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    verbose: 0,
    numeric: false,
    hex: 0,
    tree: false,
    machine: false,
    map: false,
    debug: false,
    version: false,
    filter: {},
  };
  if (argv.length === 1 && argv[0] === "--version") {
    opts.version = true;
    return opts;
  }
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    i += 1;
    if (!arg.startsWith("-") || arg.length < 2 || arg.startsWith("--")) {
      throw new UsageError(`unexpected argument '${arg}'`);
    }
    for (let j = 1; j < arg.length; j += 1) {
      const ch = arg[j];
      const k = OPTIONS.indexOf(ch);
      if (ch === ":" || k < 0) throw new UsageError(`invalid option -- '${ch}'`);
      if (OPTIONS[k + 1] !== ":") {
        applyFlag(opts, ch);
        continue;
      }
      let val = arg.slice(j + 1);
      if (!val) {
        if (i >= argv.length) throw new UsageError(`option requires an argument -- '${ch}'`);
        val = argv[i];
        i += 1;
      }
      applyValue(opts, ch, val);
      break;
    }
  }
  return opts;
}

export function openAccess(opts: CliOptions, cfg: PcimapConfig): PciAccess {
  const method = opts.access ?? (opts.dumpFile ? "dump" : cfg.access);
  if (method === "dump") {
    const file = opts.dumpFile ?? cfg.dump_file;
    if (!file) die("The dump access method needs a file (-F <file>)");
    return DumpAccess.fromFile(file);
  }
  return new SysfsAccess(cfg.sysfs_path);
}

export function run(opts: CliOptions, ctx: RunContext, cfg: PcimapConfig = loadConfig(opts.config), access: PciAccess = openAccess(opts, cfg)): number {
  const verbose = opts.verbose || cfg.verbose;
  const numeric = opts.numeric || cfg.numeric;
  const names = new Names(numeric ? undefined : loadIds(opts.idsFile ?? cfg.ids_file), numeric);
  const show: ShowOptions = { verbose, hex: opts.hex, machine: opts.machine };

  if (opts.map) {
    mapTheBus(ctx, access, { filter: opts.filter, describe: (d) => showDevice(d, names, show) });
    return exitStatus(ctx);
  }

  const devices = scanDevices(access, opts.filter);
  if (!opts.tree && !opts.graphml) {
    for (const d of devices) {
      for (const line of showDevice(d, names, show)) ctx.out(line);
    }
    return exitStatus(ctx);
  }

  const topology = buildTopology(devices);
  for (const a of topology.anomalies) ctx.warn(`!!! ${a.message}`);
  if (opts.tree) {
    const describe = verbose ? (d: Device) => names.vendorDevice(d.vendorId, d.deviceId) : undefined;
    for (const line of renderTree(topology, { describe })) ctx.out(line);
  }
  if (opts.graphml) {
    writeText(opts.graphml, topologyToGraphml(topology, names));
    if (ctx.debug) ctx.warn(`GraphML: ${opts.graphml} (buses=${topology.buses.length} devices=${devices.length})`);
  }
  return exitStatus(ctx);
}

function main(): void {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`pcimap: ${e.message}`);
    console.error(HELP);
    process.exit(1);
  }
  if (opts.version) {
    console.log(`pcimap version ${VERSION}`);
    return;
  }
  process.exitCode = run(opts, createRunContext({ debug: opts.debug }));
}

const isMain = !!process.argv[1] && fs.existsSync(process.argv[1]) && import.meta.url === pathToFileURL(fs.realpathSync(process.argv[1])).href;
if (isMain) {
  try {
    main();
  } catch (e) {
    console.error(e instanceof PciError ? `pcimap: ${e.message}` : e);
    process.exit(1);
  }
}
