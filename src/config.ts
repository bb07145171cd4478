import fs from "fs";
import yaml from "js-yaml";
import { DEFAULT_SYSFS_PATH } from "./access_sysfs.js";
import { asBool, asNum, die, errorMessage, isRecord, readText } from "./util.js";

export const DEFAULT_CONFIG_FILE = "pcimap.yaml";

export type AccessMethod = "sysfs" | "dump";

export type PcimapConfig = {
  access: AccessMethod;
  sysfs_path: string;
  dump_file?: string;
  ids_file?: string;
  numeric: boolean;
  verbose: number;
};

export const defaultConfig: PcimapConfig = {
  access: "sysfs",
  sysfs_path: DEFAULT_SYSFS_PATH,
  numeric: false,
  verbose: 0,
};

function asString(v: unknown): string | undefined {
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : undefined;
}

export function parseAccessMethod(v: string): AccessMethod {
  if (v === "sysfs" || v === "linux-sysfs") return "sysfs";
  if (v === "dump") return "dump";
  die(`Unknown access method: ${v}`);
}

export function mergeConfig(raw: unknown): PcimapConfig {
  if (raw === undefined || raw === null) return { ...defaultConfig };
  if (!isRecord(raw)) die("Configuration must be a mapping");
  const access = asString(raw.access);
  const dumpFile = asString(raw.dump_file);
  const idsFile = asString(raw.ids_file);
  return {
    access: access ? parseAccessMethod(access) : dumpFile ? "dump" : defaultConfig.access,
    sysfs_path: asString(raw.sysfs_path) ?? defaultConfig.sysfs_path,
    ...(dumpFile ? { dump_file: dumpFile } : {}),
    ...(idsFile ? { ids_file: idsFile } : {}),
    numeric: asBool(raw.numeric) ?? defaultConfig.numeric,
    verbose: Math.max(0, Math.trunc(asNum(raw.verbose) ?? defaultConfig.verbose)),
  };
}

export function parseConfig(text: string, source = DEFAULT_CONFIG_FILE): PcimapConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    die(`${source}: ${errorMessage(e)}`);
  }
  return mergeConfig(raw);
}

export function loadConfig(path?: string): PcimapConfig {
  if (path) {
    if (!fs.existsSync(path)) die(`Configuration file not found: ${path}`);
    return parseConfig(readText(path), path);
  }
  if (!fs.existsSync(DEFAULT_CONFIG_FILE)) return { ...defaultConfig };
  return parseConfig(readText(DEFAULT_CONFIG_FILE), DEFAULT_CONFIG_FILE);
}
