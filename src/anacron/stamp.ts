import fs from "node:fs";
import path from "node:path";
import { ensureDir, safeFilename } from "../utils/helpers.js";

const STAMP_RE = /^(\d{4})(\d{2})(\d{2}) (\d{2})(\d{2})$/;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

export function formatTimestamp(d: Date): string {
  return `${pad(d.getFullYear(), 4)}${pad(d.getMonth() + 1)}${pad(d.getDate())} ${pad(d.getHours())}${pad(d.getMinutes())}`;
}

export function parseTimestamp(text: string): Date | null {
  const m = STAMP_RE.exec(text.trim());
  if (!m) return null;
  const [year, month, day, hour, minute] = m.slice(1).map(Number);
  const d = new Date(year, month - 1, day, hour, minute);
  // reject rolled-over values such as month 13
  if (d.getMonth() !== month - 1 || d.getDate() !== day || d.getHours() !== hour) return null;
  return d;
}

/** "Main profile" of profile 1 becomes "1_Main_profile". */
export function jobIdentity(profileId: string, profileName: string): string {
  return safeFilename(`${profileId}_${profileName.replace(/ /g, "_")}`);
}

export interface ProfileRef {
  id: string;
  name: string;
}

/** Last-run timestamps, one file per profile. */
export class DueStateStore {
  constructor(private readonly spoolDir: string) {}

  fileFor(profile: ProfileRef): string {
    return path.join(this.spoolDir, jobIdentity(profile.id, profile.name));
  }

  /** Null when the profile never ran or its record cannot be read. */
  lastRun(profile: ProfileRef): Date | null {
    try {
      return parseTimestamp(fs.readFileSync(this.fileFor(profile), "utf8"));
    } catch {
      return null;
    }
  }

  /** Call only once the backup has completed. */
  record(profile: ProfileRef, when: Date = new Date()): string {
    ensureDir(this.spoolDir);
    const file = this.fileFor(profile);
    fs.writeFileSync(file, `${formatTimestamp(when)}\n`, "utf8");
    return file;
  }
}
