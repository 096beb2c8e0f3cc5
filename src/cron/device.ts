import fs from "node:fs";
import path from "node:path";
import type { DeviceResolver } from "./compiler.js";

export interface MountEntry {
  device: string;
  mountPoint: string;
}

// /proc/mounts escapes blanks as octal sequences
function unescapeMount(field: string): string {
  return field.replace(/\\([0-7]{3})/g, (_, oct: string) => String.fromCharCode(Number.parseInt(oct, 8)));
}

export function parseMounts(text: string): MountEntry[] {
  return text.split("\n").map((line) => line.trim().split(/\s+/)).filter((f) => f.length >= 2)
    .map(([device, mountPoint]) => ({ device: unescapeMount(device), mountPoint: unescapeMount(mountPoint) }));
}

/** Entry with the longest mount point containing `target`. */
export function mountFor(target: string, mounts: MountEntry[]): MountEntry | null {
  let best: MountEntry | null = null;
  for (const m of mounts) {
    const inside = target === m.mountPoint || target.startsWith(m.mountPoint.endsWith("/") ? m.mountPoint : `${m.mountPoint}/`);
    if (inside && (!best || m.mountPoint.length > best.mountPoint.length)) best = m;
  }
  return best;
}

export interface LinuxDeviceResolverOptions {
  mountsFile?: string;
  byUuidDir?: string;
}

/** Looks the destination's block device up in /proc/mounts and matches it against /dev/disk/by-uuid. */
export class LinuxDeviceResolver implements DeviceResolver {
  private readonly mountsFile: string;
  private readonly byUuidDir: string;

  constructor(opts: LinuxDeviceResolverOptions = {}) {
    this.mountsFile = opts.mountsFile ?? "/proc/mounts";
    this.byUuidDir = opts.byUuidDir ?? "/dev/disk/by-uuid";
  }

  uuidFromPath(target: string): string | null {
    if (!target) return null;
    let device: string;
    try {
      const mount = mountFor(fs.realpathSync(target), parseMounts(fs.readFileSync(this.mountsFile, "utf8")));
      if (!mount || !mount.device.startsWith("/")) return null;
      device = fs.realpathSync(mount.device);
    } catch {
      // destination not mounted or not present
      return null;
    }
    return this.uuidForDevice(device);
  }

  private uuidForDevice(device: string): string | null {
    let entries: string[];
    try {
      entries = fs.readdirSync(this.byUuidDir);
    } catch {
      return null;
    }
    for (const uuid of entries) {
      try {
        if (fs.realpathSync(path.join(this.byUuidDir, uuid)) === device) return uuid;
      } catch {
        continue;
      }
    }
    return null;
  }
}
