import fs from "node:fs";
import path from "node:path";
import os from "node:os";

const UNSAFE = /[<>:"/\\|?*]/g;

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getDataPath(): string {
  const override = process.env.BACKTIDE_DATA_DIR;
  if (override && override.trim()) return path.resolve(expandHome(override.trim()));
  return path.join(os.homedir(), ".backtide");
}

export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

export function safeFilename(name: string): string {
  return name.replace(UNSAFE, "_").trim();
}
