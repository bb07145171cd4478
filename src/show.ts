import { slotName } from "./access.js";
import { Names } from "./ids.js";
import {
  PCI_BASE_ADDRESS_0,
  PCI_BASE_ADDRESS_MEM_PREFETCH,
  PCI_BASE_ADDRESS_MEM_TYPE_1M,
  PCI_BASE_ADDRESS_MEM_TYPE_32,
  PCI_BASE_ADDRESS_MEM_TYPE_64,
  PCI_BASE_ADDRESS_MEM_TYPE_MASK,
  PCI_BASE_ADDRESS_SPACE_IO,
  PCI_BASE_CLASS_BRIDGE,
  PCI_BIST,
  PCI_BIST_CAPABLE,
  PCI_BIST_CODE_MASK,
  PCI_BIST_START,
  PCI_BRIDGE_CONTROL,
  PCI_BRIDGE_CTL_BUS_RESET,
  PCI_BRIDGE_CTL_FAST_BACK,
  PCI_BRIDGE_CTL_MASTER_ABORT,
  PCI_BRIDGE_CTL_NO_ISA,
  PCI_BRIDGE_CTL_PARITY,
  PCI_BRIDGE_CTL_SERR,
  PCI_BRIDGE_CTL_VGA,
  PCI_CACHE_LINE_SIZE,
  PCI_CB_BRIDGE_CONTROL,
  PCI_CB_BRIDGE_CTL_16BIT_INT,
  PCI_CB_BRIDGE_CTL_CB_RESET,
  PCI_CB_BRIDGE_CTL_ISA,
  PCI_CB_BRIDGE_CTL_MASTER_ABORT,
  PCI_CB_BRIDGE_CTL_PARITY,
  PCI_CB_BRIDGE_CTL_POST_WRITES,
  PCI_CB_BRIDGE_CTL_PREFETCH_MEM0,
  PCI_CB_BRIDGE_CTL_SERR,
  PCI_CB_BRIDGE_CTL_VGA,
  PCI_CB_CARD_BUS,
  PCI_CB_IO_BASE_0,
  PCI_CB_IO_LIMIT_0,
  PCI_CB_LATENCY_TIMER,
  PCI_CB_LEGACY_MODE_BASE,
  PCI_CB_MEMORY_BASE_0,
  PCI_CB_MEMORY_LIMIT_0,
  PCI_CB_PRIMARY_BUS,
  PCI_CB_SEC_STATUS,
  PCI_CB_SUBORDINATE_BUS,
  PCI_CB_SUBSYSTEM_ID,
  PCI_CB_SUBSYSTEM_VENDOR_ID,
  PCI_CLASS_BRIDGE_PCI,
  PCI_CLASS_DEVICE,
  PCI_CLASS_PROG,
  PCI_COMMAND,
  PCI_COMMAND_FAST_BACK,
  PCI_COMMAND_INVALIDATE,
  PCI_COMMAND_IO,
  PCI_COMMAND_MASTER,
  PCI_COMMAND_MEMORY,
  PCI_COMMAND_PARITY,
  PCI_COMMAND_SERR,
  PCI_COMMAND_SPECIAL,
  PCI_COMMAND_VGA_PALETTE,
  PCI_COMMAND_WAIT,
  PCI_CONFIG_SIZE,
  PCI_EXT_CONFIG_SIZE,
  PCI_INTERRUPT_LINE,
  PCI_INTERRUPT_PIN,
  PCI_IO_BASE,
  PCI_IO_BASE_UPPER16,
  PCI_IO_LIMIT,
  PCI_IO_LIMIT_UPPER16,
  PCI_IO_RANGE_TYPE_16,
  PCI_IO_RANGE_TYPE_32,
  PCI_IO_RANGE_TYPE_MASK,
  PCI_LATENCY_TIMER,
  PCI_MAX_LAT,
  PCI_MEMORY_BASE,
  PCI_MEMORY_LIMIT,
  PCI_MEMORY_RANGE_TYPE_MASK,
  PCI_MIN_GNT,
  PCI_PREF_BASE_UPPER32,
  PCI_PREF_LIMIT_UPPER32,
  PCI_PREF_MEMORY_BASE,
  PCI_PREF_MEMORY_LIMIT,
  PCI_PREF_RANGE_TYPE_32,
  PCI_PREF_RANGE_TYPE_64,
  PCI_PREF_RANGE_TYPE_MASK,
  PCI_PRIMARY_BUS,
  PCI_REVISION_ID,
  PCI_ROM_ADDRESS,
  PCI_ROM_ADDRESS1,
  PCI_ROM_ADDRESS_ENABLE,
  PCI_SECONDARY_BUS,
  PCI_SEC_LATENCY_TIMER,
  PCI_SEC_STATUS,
  PCI_STATUS,
  PCI_STATUS_66MHZ,
  PCI_STATUS_CAP_LIST,
  PCI_STATUS_DETECTED_PARITY,
  PCI_STATUS_DEVSEL_FAST,
  PCI_STATUS_DEVSEL_MASK,
  PCI_STATUS_DEVSEL_MEDIUM,
  PCI_STATUS_DEVSEL_SLOW,
  PCI_STATUS_FAST_BACK,
  PCI_STATUS_PARITY,
  PCI_STATUS_REC_MASTER_ABORT,
  PCI_STATUS_REC_TARGET_ABORT,
  PCI_STATUS_SIG_SYSTEM_ERROR,
  PCI_STATUS_SIG_TARGET_ABORT,
  PCI_STATUS_UDF,
  PCI_SUBORDINATE_BUS,
  PCI_SUBSYSTEM_ID,
  PCI_SUBSYSTEM_VENDOR_ID,
} from "./pci_regs.js";
import { Device, classify } from "./registry.js";
import { hex } from "./util.js";

export type ShowOptions = {
  verbose: number;
  // 1: standard header, 3: 256 bytes, 4: extended 4096 bytes
  hex: number;
  machine: boolean;
};

function flag(v: number, bit: number): string {
  return v & bit ? "+" : "-";
}

function devsel(status: number): string {
  switch (status & PCI_STATUS_DEVSEL_MASK) {
    case PCI_STATUS_DEVSEL_SLOW:
      return "slow";
    case PCI_STATUS_DEVSEL_MEDIUM:
      return "medium";
    case PCI_STATUS_DEVSEL_FAST:
      return "fast";
    default:
      return "??";
  }
}

function subsystemIds(d: Device): { sv: number; sd: number } {
  switch (classify(d).header) {
    case "normal":
      return { sv: d.config.word(PCI_SUBSYSTEM_VENDOR_ID), sd: d.config.word(PCI_SUBSYSTEM_ID) };
    case "cardbus":
      return { sv: d.config.word(PCI_CB_SUBSYSTEM_VENDOR_ID), sd: d.config.word(PCI_CB_SUBSYSTEM_ID) };
    default:
      return { sv: 0, sd: 0 };
  }
}

function hasSubsystem(sv: number): boolean {
  return sv !== 0 && sv !== 0xffff;
}

export function terseLine(d: Device, names: Names, verbose = 0): string {
  const cls = d.config.word(PCI_CLASS_DEVICE);
  let line = `${slotName(d.addr)} ${names.className(cls)}: ${names.vendorDevice(d.vendorId, d.deviceId)}`;
  const rev = d.config.byte(PCI_REVISION_ID);
  if (rev) line += ` (rev ${hex(rev, 2)})`;
  if (verbose) {
    const pi = d.config.byte(PCI_CLASS_PROG);
    const name = names.progIf(cls, pi);
    if (pi || name) line += ` (prog-if ${hex(pi, 2)}${name ? ` [${name}]` : ""})`;
  }
  return line;
}

function controlLines(d: Device, cmd: number, status: number): string[] {
  const lines = [
    `\tControl: I/O${flag(cmd, PCI_COMMAND_IO)} Mem${flag(cmd, PCI_COMMAND_MEMORY)} BusMaster${flag(cmd, PCI_COMMAND_MASTER)} SpecCycle${flag(cmd, PCI_COMMAND_SPECIAL)} MemWINV${flag(cmd, PCI_COMMAND_INVALIDATE)} VGASnoop${flag(cmd, PCI_COMMAND_VGA_PALETTE)} ParErr${flag(cmd, PCI_COMMAND_PARITY)} Stepping${flag(cmd, PCI_COMMAND_WAIT)} SERR${flag(cmd, PCI_COMMAND_SERR)} FastB2B${flag(cmd, PCI_COMMAND_FAST_BACK)}`,
    `\tStatus: Cap${flag(status, PCI_STATUS_CAP_LIST)} 66Mhz${flag(status, PCI_STATUS_66MHZ)} UDF${flag(status, PCI_STATUS_UDF)} FastB2B${flag(status, PCI_STATUS_FAST_BACK)} ParErr${flag(status, PCI_STATUS_PARITY)} DEVSEL=${devsel(status)} >TAbort${flag(status, PCI_STATUS_SIG_TARGET_ABORT)} <TAbort${flag(status, PCI_STATUS_REC_TARGET_ABORT)} <MAbort${flag(status, PCI_STATUS_REC_MASTER_ABORT)} >SERR${flag(status, PCI_STATUS_SIG_SYSTEM_ERROR)} <PERR${flag(status, PCI_STATUS_DETECTED_PARITY)}`,
  ];
  const normal = classify(d).header === "normal";
  if (cmd & PCI_COMMAND_MASTER) {
    const minGnt = normal ? d.config.byte(PCI_MIN_GNT) : 0;
    const maxLat = normal ? d.config.byte(PCI_MAX_LAT) : 0;
    let line = `\tLatency: ${d.config.byte(PCI_LATENCY_TIMER)}`;
    if (minGnt || maxLat) {
      const parts: string[] = [];
      if (minGnt) parts.push(`${minGnt * 250}ns min`);
      if (maxLat) parts.push(`${maxLat * 250}ns max`);
      line += ` (${parts.join(", ")})`;
    }
    const cacheLine = d.config.byte(PCI_CACHE_LINE_SIZE);
    if (cacheLine) line += `, Cache Line Size ${hex(cacheLine, 2)}`;
    lines.push(line);
  }
  const pin = normal ? d.config.byte(PCI_INTERRUPT_PIN) : 0;
  const irq = normal ? d.config.byte(PCI_INTERRUPT_LINE) : 0;
  if (pin || irq) lines.push(`\tInterrupt: pin ${pin ? String.fromCharCode(0x40 + pin) : "?"} routed to IRQ ${irq}`);
  return lines;
}

function flagsLine(d: Device, cmd: number, status: number): string {
  const parts: string[] = [];
  if (cmd & PCI_COMMAND_MASTER) parts.push("bus master");
  if (cmd & PCI_COMMAND_VGA_PALETTE) parts.push("VGA palette snoop");
  if (cmd & PCI_COMMAND_WAIT) parts.push("stepping");
  if (cmd & PCI_COMMAND_FAST_BACK) parts.push("fast Back2Back");
  if (status & PCI_STATUS_66MHZ) parts.push("66Mhz");
  if (status & PCI_STATUS_UDF) parts.push("user-definable features");
  let line = `\tFlags: ${[...parts, `${devsel(status)} devsel`].join(", ")}`;
  if (cmd & PCI_COMMAND_MASTER) line += `, latency ${d.config.byte(PCI_LATENCY_TIMER)}`;
  const irq = classify(d).header === "normal" ? d.config.byte(PCI_INTERRUPT_LINE) : 0;
  if (irq) line += `, IRQ ${irq}`;
  return line;
}

function regionLines(d: Device, cmd: number, count: number, verbose: number): string[] {
  const lines: string[] = [];
  for (let i = 0; i < count; i += 1) {
    let flg = d.config.long(PCI_BASE_ADDRESS_0 + 4 * i);
    if (flg === 0xffffffff) flg = 0;
    if (!flg) continue;
    let line = verbose > 1 ? `\tRegion ${i}: ` : "\t";
    if (flg & PCI_BASE_ADDRESS_SPACE_IO) {
      const a = (flg & ~0x03) >>> 0;
      line += `I/O ports at ${a ? hex(a, 4) : "<unassigned>"}`;
      if (!(cmd & PCI_COMMAND_IO)) line += " [disabled]";
      lines.push(line);
      continue;
    }
    const t = flg & PCI_BASE_ADDRESS_MEM_TYPE_MASK;
    const low = (flg & ~0x0f) >>> 0;
    line += "Memory at ";
    if (t === PCI_BASE_ADDRESS_MEM_TYPE_64 && i >= count - 1) {
      line += "<invalid-64bit-slot>";
    } else {
      let high = 0;
      if (t === PCI_BASE_ADDRESS_MEM_TYPE_64) {
        i += 1;
        high = d.config.long(PCI_BASE_ADDRESS_0 + 4 * i);
      }
      if (high) line += `${high.toString(16)}${hex(low, 8)}`;
      else line += low ? hex(low, 8) : "<unassigned>";
    }
    let kind = "type 3";
    if (t === PCI_BASE_ADDRESS_MEM_TYPE_32) kind = "32-bit";
    else if (t === PCI_BASE_ADDRESS_MEM_TYPE_64) kind = "64-bit";
    else if (t === PCI_BASE_ADDRESS_MEM_TYPE_1M) kind = "low-1M";
    line += ` (${kind}, ${flg & PCI_BASE_ADDRESS_MEM_PREFETCH ? "" : "non-"}prefetchable)`;
    if (!(cmd & PCI_COMMAND_MEMORY)) line += " [disabled]";
    lines.push(line);
  }
  return lines;
}

function romLines(d: Device, reg: number): string[] {
  const rom = d.config.long(reg);
  if (!rom) return [];
  const a = (rom & ~0x7ff) >>> 0;
  let line = `\tExpansion ROM at ${a ? hex(a, 8) : "<unassigned>"}`;
  if (!(rom & PCI_ROM_ADDRESS_ENABLE)) line += " [disabled]";
  return [line];
}

function normalLines(d: Device, cmd: number, verbose: number): string[] {
  return [...regionLines(d, cmd, 6, verbose), ...romLines(d, PCI_ROM_ADDRESS)];
}

function bridgeWindowLines(d: Device, verbose: number): string[] {
  const lines: string[] = [];
  const all = verbose > 2;

  const ioBase = d.config.byte(PCI_IO_BASE);
  const ioLimit = d.config.byte(PCI_IO_LIMIT);
  const ioType = ioBase & PCI_IO_RANGE_TYPE_MASK;
  if (ioType !== (ioLimit & PCI_IO_RANGE_TYPE_MASK) || (ioType !== PCI_IO_RANGE_TYPE_16 && ioType !== PCI_IO_RANGE_TYPE_32)) {
    lines.push(`\t!!! Unknown I/O range types ${ioBase.toString(16)}/${ioLimit.toString(16)}`);
  } else {
    let base = (ioBase & 0xf0) << 8;
    let limit = (ioLimit & 0xf0) << 8;
    if (ioType === PCI_IO_RANGE_TYPE_32) {
      base += d.config.word(PCI_IO_BASE_UPPER16) * 0x10000;
      limit += d.config.word(PCI_IO_LIMIT_UPPER16) * 0x10000;
    }
    if (base <= limit || all) lines.push(`\tI/O behind bridge: ${hex(base, 8)}-${hex(limit + 0xfff, 8)}`);
  }

  const memBase = d.config.word(PCI_MEMORY_BASE);
  const memLimit = d.config.word(PCI_MEMORY_LIMIT);
  const memType = memBase & PCI_MEMORY_RANGE_TYPE_MASK;
  if (memType !== (memLimit & PCI_MEMORY_RANGE_TYPE_MASK) || memType) {
    lines.push(`\t!!! Unknown memory range types ${memBase.toString(16)}/${memLimit.toString(16)}`);
  } else {
    const base = (memBase & 0xfff0) * 0x10000;
    const limit = (memLimit & 0xfff0) * 0x10000;
    if (base <= limit || all) lines.push(`\tMemory behind bridge: ${hex(base, 8)}-${hex(limit + 0xfffff, 8)}`);
  }

  const prefBase = d.config.word(PCI_PREF_MEMORY_BASE);
  const prefLimit = d.config.word(PCI_PREF_MEMORY_LIMIT);
  const prefType = prefBase & PCI_PREF_RANGE_TYPE_MASK;
  if (prefType !== (prefLimit & PCI_PREF_RANGE_TYPE_MASK) || (prefType !== PCI_PREF_RANGE_TYPE_32 && prefType !== PCI_PREF_RANGE_TYPE_64)) {
    lines.push(`\t!!! Unknown prefetchable memory range types ${prefBase.toString(16)}/${prefLimit.toString(16)}`);
  } else {
    const base = (prefBase & 0xfff0) * 0x10000;
    const limit = (prefLimit & 0xfff0) * 0x10000;
    if (base <= limit || all) {
      if (prefType === PCI_PREF_RANGE_TYPE_32) {
        lines.push(`\tPrefetchable memory behind bridge: ${hex(base, 8)}-${hex(limit + 0xfffff, 8)}`);
      } else {
        const baseHigh = d.config.long(PCI_PREF_BASE_UPPER32);
        const limitHigh = d.config.long(PCI_PREF_LIMIT_UPPER32);
        lines.push(`\tPrefetchable memory behind bridge: ${hex(baseHigh, 8)}${hex(base, 8)}-${hex(limitHigh, 8)}${hex(limit, 8)}`);
      }
    }
  }
  return lines;
}

function bridgeLines(d: Device, cmd: number, verbose: number): string[] {
  const lines = regionLines(d, cmd, 2, verbose);
  lines.push(`\tBus: primary=${hex(d.config.byte(PCI_PRIMARY_BUS), 2)}, secondary=${hex(d.config.byte(PCI_SECONDARY_BUS), 2)}, subordinate=${hex(d.config.byte(PCI_SUBORDINATE_BUS), 2)}, sec-latency=${d.config.byte(PCI_SEC_LATENCY_TIMER)}`);
  lines.push(...bridgeWindowLines(d, verbose));
  if (verbose > 1) {
    const sec = d.config.word(PCI_SEC_STATUS);
    lines.push(
      `\tSecondary status: 66Mhz${flag(sec, PCI_STATUS_66MHZ)} FastB2B${flag(sec, PCI_STATUS_FAST_BACK)} ParErr${flag(sec, PCI_STATUS_PARITY)} DEVSEL=${devsel(sec)} >TAbort${flag(sec, PCI_STATUS_SIG_TARGET_ABORT)} <TAbort${flag(sec, PCI_STATUS_REC_TARGET_ABORT)} <MAbort${flag(sec, PCI_STATUS_REC_MASTER_ABORT)} <SERR${flag(sec, PCI_STATUS_SIG_SYSTEM_ERROR)} <PERR${flag(sec, PCI_STATUS_DETECTED_PARITY)}`,
    );
  }
  lines.push(...romLines(d, PCI_ROM_ADDRESS1));
  if (verbose > 1) {
    const brc = d.config.word(PCI_BRIDGE_CONTROL);
    lines.push(
      `\tBridgeCtl: Parity${flag(brc, PCI_BRIDGE_CTL_PARITY)} SERR${flag(brc, PCI_BRIDGE_CTL_SERR)} NoISA${flag(brc, PCI_BRIDGE_CTL_NO_ISA)} VGA${flag(brc, PCI_BRIDGE_CTL_VGA)} MAbort${flag(brc, PCI_BRIDGE_CTL_MASTER_ABORT)} >Reset${flag(brc, PCI_BRIDGE_CTL_BUS_RESET)} FastB2B${flag(brc, PCI_BRIDGE_CTL_FAST_BACK)}`,
    );
  }
  return lines;
}

function cardbusLines(d: Device, cmd: number, verbose: number): string[] {
  const lines = regionLines(d, cmd, 1, verbose);
  const brc = d.config.word(PCI_CB_BRIDGE_CONTROL);
  const all = verbose > 2;
  lines.push(`\tBus: primary=${hex(d.config.byte(PCI_CB_PRIMARY_BUS), 2)}, secondary=${hex(d.config.byte(PCI_CB_CARD_BUS), 2)}, subordinate=${hex(d.config.byte(PCI_CB_SUBORDINATE_BUS), 2)}, sec-latency=${d.config.byte(PCI_CB_LATENCY_TIMER)}`);
  for (let i = 0; i < 2; i += 1) {
    const base = d.config.long(PCI_CB_MEMORY_BASE_0 + 8 * i);
    const limit = d.config.long(PCI_CB_MEMORY_LIMIT_0 + 8 * i);
    if (limit > base || all) {
      let line = `\tMemory window ${i}: ${hex(base, 8)}-${hex(limit, 8)}`;
      if (!(cmd & PCI_COMMAND_MEMORY)) line += " [disabled]";
      if (brc & (PCI_CB_BRIDGE_CTL_PREFETCH_MEM0 << i)) line += " (prefetchable)";
      lines.push(line);
    }
  }
  for (let i = 0; i < 2; i += 1) {
    let base = d.config.long(PCI_CB_IO_BASE_0 + 8 * i);
    let limit = d.config.long(PCI_CB_IO_LIMIT_0 + 8 * i);
    if (!(base & PCI_IO_RANGE_TYPE_32)) {
      base &= 0xffff;
      limit &= 0xffff;
    }
    base = (base & ~0x03) >>> 0;
    limit = ((limit & ~0x03) >>> 0) + 3;
    if (base <= limit || all) {
      lines.push(`\tI/O window ${i}: ${hex(base, 8)}-${hex(limit, 8)}${cmd & PCI_COMMAND_IO ? "" : " [disabled]"}`);
    }
  }
  if (d.config.word(PCI_CB_SEC_STATUS) & PCI_STATUS_SIG_SYSTEM_ERROR) lines.push("\tSecondary status: SERR");
  if (verbose > 1) {
    lines.push(
      `\tBridgeCtl: Parity${flag(brc, PCI_CB_BRIDGE_CTL_PARITY)} SERR${flag(brc, PCI_CB_BRIDGE_CTL_SERR)} ISA${flag(brc, PCI_CB_BRIDGE_CTL_ISA)} VGA${flag(brc, PCI_CB_BRIDGE_CTL_VGA)} MAbort${flag(brc, PCI_CB_BRIDGE_CTL_MASTER_ABORT)} >Reset${flag(brc, PCI_CB_BRIDGE_CTL_CB_RESET)} 16bInt${flag(brc, PCI_CB_BRIDGE_CTL_16BIT_INT)} PostWrite${flag(brc, PCI_CB_BRIDGE_CTL_POST_WRITES)}`,
    );
  }
  const legacy = d.config.word(PCI_CB_LEGACY_MODE_BASE);
  if (legacy) lines.push(`\t16-bit legacy interface ports at ${hex(legacy, 4)}`);
  return lines;
}

export function verboseLines(d: Device, names: Names, verbose: number): string[] {
  const lines = [terseLine(d, names, verbose)];
  const c = classify(d);
  switch (c.header) {
    case "normal":
      if (c.classCode === PCI_CLASS_BRIDGE_PCI) lines.push(`\t!!! Invalid class ${hex(c.classCode, 4)} for header type ${hex(c.headerType, 2)}`);
      break;
    case "bridge":
    case "cardbus":
      if (c.classCode >> 8 !== PCI_BASE_CLASS_BRIDGE) lines.push(`\t!!! Invalid class ${hex(c.classCode, 4)} for header type ${hex(c.headerType, 2)}`);
      break;
    default:
      lines.push(`\t!!! Unknown header type ${hex(c.headerType, 2)}`);
      return lines;
  }
  const { sv, sd } = subsystemIds(d);
  if (hasSubsystem(sv)) lines.push(`\tSubsystem: ${names.subsystem(d.vendorId, d.deviceId, sv, sd)}`);

  const cmd = d.config.word(PCI_COMMAND);
  const status = d.config.word(PCI_STATUS);
  if (verbose > 1) lines.push(...controlLines(d, cmd, status));
  else lines.push(flagsLine(d, cmd, status));

  const bist = d.config.byte(PCI_BIST);
  if (bist & PCI_BIST_CAPABLE) {
    if (bist & PCI_BIST_START) lines.push("\tBIST is running");
    else lines.push(`\tBIST result: ${hex(bist & PCI_BIST_CODE_MASK, 2)}`);
  }

  if (c.header === "normal") lines.push(...normalLines(d, cmd, verbose));
  else if (c.header === "bridge") lines.push(...bridgeLines(d, cmd, verbose));
  else lines.push(...cardbusLines(d, cmd, verbose));
  return lines;
}

export function machineLines(d: Device, names: Names, verbose: number): string[] {
  const cls = d.config.word(PCI_CLASS_DEVICE);
  const rev = d.config.byte(PCI_REVISION_ID);
  const pi = d.config.byte(PCI_CLASS_PROG);
  const { sv, sd } = subsystemIds(d);
  if (verbose) {
    const lines = [
      `Device:\t${slotName(d.addr)}`,
      `Class:\t${names.className(cls)}`,
      `Vendor:\t${names.vendorName(d.vendorId)}`,
      `Device:\t${names.deviceName(d.vendorId, d.deviceId)}`,
    ];
    if (hasSubsystem(sv)) {
      lines.push(`SVendor:\t${names.subsystemVendor(sv)}`);
      lines.push(`SDevice:\t${names.subsystemDevice(d.vendorId, d.deviceId, sv, sd)}`);
    }
    if (rev) lines.push(`Rev:\t${hex(rev, 2)}`);
    if (pi) lines.push(`ProgIf:\t${hex(pi, 2)}`);
    return lines;
  }
  let line = `${slotName(d.addr)} "${names.className(cls)}" "${names.vendorName(d.vendorId)}" "${names.deviceName(d.vendorId, d.deviceId)}"`;
  if (rev) line += ` -r${hex(rev, 2)}`;
  if (pi) line += ` -p${hex(pi, 2)}`;
  if (hasSubsystem(sv)) {
    line += ` "${names.subsystemVendor(sv)}" "${names.subsystemDevice(d.vendorId, d.deviceId, sv, sd)}"`;
  } else {
    line += ` "" ""`;
  }
  return [line];
}

// A refused read of the bytes past the scanned header keeps the shorter dump.
export function hexDumpLines(d: Device, level: number): string[] {
  let cnt = d.config.prefixLength();
  if (level >= 3 && d.config.fetch(cnt, PCI_CONFIG_SIZE - cnt)) {
    cnt = PCI_CONFIG_SIZE;
    if (level >= 4 && d.config.fetch(PCI_CONFIG_SIZE, PCI_EXT_CONFIG_SIZE - PCI_CONFIG_SIZE)) cnt = PCI_EXT_CONFIG_SIZE;
  }
  const lines: string[] = [];
  for (let row = 0; row < cnt; row += 16) {
    const bytes: string[] = [];
    for (let i = row; i < Math.min(row + 16, cnt); i += 1) bytes.push(hex(d.config.byte(i), 2));
    lines.push(`${hex(row, 2)}: ${bytes.join(" ")}`);
  }
  return lines;
}

export function showDevice(d: Device, names: Names, opts: ShowOptions): string[] {
  let lines: string[];
  if (opts.machine) lines = machineLines(d, names, opts.verbose);
  else if (opts.verbose) lines = verboseLines(d, names, opts.verbose);
  else lines = [terseLine(d, names)];
  if (opts.hex) lines.push(...hexDumpLines(d, opts.hex));
  if (opts.verbose || opts.hex) lines.push("");
  return lines;
}
