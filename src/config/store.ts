export type ConfigValue = string | number | boolean;

export type ListField = { name: string; type: "str" | "int" };
export type ListItem = Record<string, string | number>;

export const DEFAULT_PROFILE_ID = "1";
export const DEFAULT_PROFILE_NAME = "Main profile";

/**
 * Flat key/value settings with per-profile namespacing.
 *
 * Profile keys live under `profile<N>.`; lists are flattened into
 * `<key>.size` and `<key>.<i>.<field>` entries, `i` counting from 1.
 */
export class ConfigStore {
  private values: Map<string, ConfigValue>;

  constructor(values: Record<string, ConfigValue> = {}) {
    this.values = new Map(Object.entries(values));
  }

  toJSON(): Record<string, ConfigValue> {
    return Object.fromEntries([...this.values.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  raw(key: string): ConfigValue | undefined {
    return this.values.get(key);
  }

  setRaw(key: string, value: ConfigValue): void {
    this.values.set(key, value);
  }

  remove(key: string): boolean {
    return this.values.delete(key);
  }

  strValue(key: string, fallback = ""): string {
    const v = this.values.get(key);
    return v === undefined ? fallback : String(v);
  }

  intValue(key: string, fallback = 0): number {
    const v = this.values.get(key);
    if (v === undefined || typeof v === "boolean") return fallback;
    const n = typeof v === "number" ? v : Number.parseInt(v.trim(), 10);
    return Number.isInteger(n) ? n : fallback;
  }

  boolValue(key: string, fallback = false): boolean {
    const v = this.values.get(key);
    if (v === undefined) return fallback;
    if (typeof v === "boolean") return v;
    if (typeof v === "number") return v !== 0;
    const s = v.trim().toLowerCase();
    if (["true", "1", "yes", "on"].includes(s)) return true;
    if (["false", "0", "no", "off", ""].includes(s)) return false;
    return fallback;
  }

  setStrValue(key: string, value: string): void { this.values.set(key, value); }
  setIntValue(key: string, value: number): void { this.values.set(key, Math.trunc(value)); }
  setBoolValue(key: string, value: boolean): void { this.values.set(key, value); }

  removeKeysStartsWith(prefix: string): string[] {
    const removed = this.keys().filter((k) => k.startsWith(prefix));
    for (const k of removed) this.values.delete(k);
    return removed;
  }

  remapKeyRegex(pattern: RegExp, replacement: string): string[] {
    const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
    const re = new RegExp(pattern.source, flags);
    const renamed: string[] = [];
    for (const key of this.keys()) {
      const next = key.replace(re, replacement);
      if (next === key) continue;
      const value = this.values.get(key);
      this.values.delete(key);
      if (value !== undefined) this.values.set(next, value);
      renamed.push(next);
    }
    return renamed;
  }

  // --- profiles ---

  profiles(): string[] {
    const ids = this.strValue("profiles", DEFAULT_PROFILE_ID).split(":").map((s) => s.trim()).filter(Boolean);
    return ids.length ? ids : [DEFAULT_PROFILE_ID];
  }

  setProfiles(ids: string[]): void {
    this.setStrValue("profiles", ids.join(":"));
  }

  profileName(profileId: string): string {
    const fallback = profileId === DEFAULT_PROFILE_ID ? DEFAULT_PROFILE_NAME : `Profile ${profileId}`;
    return this.strValue(this.profileKey("name", profileId), fallback);
  }

  setProfileName(name: string, profileId: string): void {
    this.setStrValue(this.profileKey("name", profileId), name);
  }

  profileKey(key: string, profileId: string): string {
    return `profile${profileId}.${key}`;
  }

  hasProfileKey(key: string, profileId: string): boolean {
    return this.has(this.profileKey(key, profileId));
  }

  profileStrValue(key: string, fallback: string, profileId: string): string {
    return this.strValue(this.profileKey(key, profileId), fallback);
  }

  profileIntValue(key: string, fallback: number, profileId: string): number {
    return this.intValue(this.profileKey(key, profileId), fallback);
  }

  profileBoolValue(key: string, fallback: boolean, profileId: string): boolean {
    return this.boolValue(this.profileKey(key, profileId), fallback);
  }

  setProfileStrValue(key: string, value: string, profileId: string): void {
    this.setStrValue(this.profileKey(key, profileId), value);
  }

  setProfileIntValue(key: string, value: number, profileId: string): void {
    this.setIntValue(this.profileKey(key, profileId), value);
  }

  setProfileBoolValue(key: string, value: boolean, profileId: string): void {
    this.setBoolValue(this.profileKey(key, profileId), value);
  }

  removeProfileKey(key: string, profileId: string): boolean {
    return this.remove(this.profileKey(key, profileId));
  }

  /** Moves a profile key to a new name, keeping value and type. Missing keys are left alone. */
  remapProfileKey(oldKey: string, newKey: string, profileId: string): boolean {
    const from = this.profileKey(oldKey, profileId);
    const value = this.values.get(from);
    if (value === undefined) return false;
    this.values.delete(from);
    this.values.set(this.profileKey(newKey, profileId), value);
    return true;
  }

  profileListValue(key: string, fields: ListField[], fallback: ListItem[], profileId: string): ListItem[] {
    const base = this.profileKey(key, profileId);
    if (!this.has(`${base}.size`)) return fallback.map((item) => ({ ...item }));
    const size = this.intValue(`${base}.size`, 0);
    const items: ListItem[] = [];
    for (let i = 1; i <= size; i++) {
      const first = fields[0];
      if (!first || !this.has(`${base}.${i}.${first.name}`)) continue;
      const item: ListItem = {};
      for (const field of fields) {
        const k = `${base}.${i}.${field.name}`;
        item[field.name] = field.type === "int" ? this.intValue(k, 0) : this.strValue(k, "");
      }
      items.push(item);
    }
    return items;
  }

  setProfileListValue(key: string, fields: ListField[], items: ListItem[], profileId: string): void {
    const base = this.profileKey(key, profileId);
    const entry = new RegExp(`^${escapeRegex(base)}\\.(size|\\d+\\.[^.]+)$`);
    for (const k of this.keys()) if (entry.test(k)) this.values.delete(k);
    this.setIntValue(`${base}.size`, items.length);
    items.forEach((item, idx) => {
      for (const field of fields) {
        const v = item[field.name];
        if (v === undefined) continue;
        this.values.set(`${base}.${idx + 1}.${field.name}`, field.type === "int" ? Number(v) : String(v));
      }
    });
  }
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
