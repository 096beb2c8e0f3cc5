import { describe, expect, test } from "vitest";
import { ConfigStore } from "../src/config/store.js";
import { excludeList, includeList, setExcludeList, setIncludeList } from "../src/config/schema.js";

describe("config store", () => {
  test("typed values fall back on missing or malformed entries", () => {
    const store = new ConfigStore({ a: "12", b: "x", c: "true", d: 0 });
    expect(store.intValue("a")).toBe(12);
    expect(store.intValue("b", 7)).toBe(7);
    expect(store.intValue("missing", 3)).toBe(3);
    expect(store.boolValue("c")).toBe(true);
    expect(store.boolValue("d", true)).toBe(false);
  });

  test("profiles default to the main profile", () => {
    const store = new ConfigStore();
    expect(store.profiles()).toEqual(["1"]);
    expect(store.profileName("1")).toBe("Main profile");
    store.setProfiles(["1", "2"]);
    store.setProfileName("Usb disk", "2");
    expect(store.profiles()).toEqual(["1", "2"]);
    expect(store.profileName("2")).toBe("Usb disk");
  });

  test("lists are flattened with a size key", () => {
    const store = new ConfigStore();
    setIncludeList(store, [{ path: "/home", type: 0 }, { path: "/etc/fstab", type: 1 }], "1");
    expect(store.raw("profile1.snapshots.include.size")).toBe(2);
    expect(store.raw("profile1.snapshots.include.2.value")).toBe("/etc/fstab");
    expect(includeList(store, "1")).toEqual([{ path: "/home", type: 0 }, { path: "/etc/fstab", type: 1 }]);
  });

  test("rewriting a list keeps sibling keys sharing its prefix", () => {
    const store = new ConfigStore({ "profile1.snapshots.exclude.bysize.enabled": true });
    setExcludeList(store, ["a", "b", "c"], "1");
    setExcludeList(store, ["z"], "1");
    expect(excludeList(store, "1")).toEqual(["z"]);
    expect(store.has("profile1.snapshots.exclude.3.value")).toBe(false);
    expect(store.raw("profile1.snapshots.exclude.bysize.enabled")).toBe(true);
  });

  test("remapProfileKey keeps value and type", () => {
    const store = new ConfigStore({ "profile2.old": 25 });
    expect(store.remapProfileKey("old", "new", "2")).toBe(true);
    expect(store.raw("profile2.new")).toBe(25);
    expect(store.has("profile2.old")).toBe(false);
    expect(store.remapProfileKey("old", "new", "2")).toBe(false);
  });

  test("bulk rename and removal", () => {
    const store = new ConfigStore({ "qt4.main_window.x": 10, "gnome.close": true, "kde.x": "1", keep: "y" });
    store.remapKeyRegex(/qt4/, "qt");
    store.removeKeysStartsWith("gnome");
    expect(store.toJSON()).toEqual({ "kde.x": "1", keep: "y", "qt.main_window.x": 10 });
  });
});
