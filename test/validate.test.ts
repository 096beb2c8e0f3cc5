import { describe, expect, test } from "vitest";
import { setIncludeList } from "../src/config/schema.js";
import { ConfigStore } from "../src/config/store.js";
import { validateProfile, validateValue } from "../src/config/validate.js";

function configured(values: Record<string, string | number | boolean>): ConfigStore {
  const store = new ConfigStore({ "profile1.snapshots.path": "/media/backup", ...values });
  setIncludeList(store, [{ path: "/home/u", type: 0 }], "1");
  return store;
}

describe("profile validation", () => {
  test("a configured profile with defaults is valid", () => {
    expect(validateProfile(configured({ "profile1.schedule.mode": 20, "profile1.schedule.time": 1345 }), "1")).toEqual([]);
  });

  test("bad time and an unconfigured profile", () => {
    const store = new ConfigStore({ "profile1.schedule.mode": 20, "profile1.schedule.time": 1375 });
    expect(validateProfile(store, "1")).toEqual([
      "schedule.time minutes must be <= 59",
      "profile is scheduled but has no snapshot path or nothing to back up",
    ]);
  });

  test("custom hours format", () => {
    const store = configured({ "profile1.schedule.mode": 19, "profile1.schedule.custom_time": "25" });
    expect(validateProfile(store, "1")).toEqual(["schedule.custom_time has an invalid format"]);
    store.setProfileStrValue("schedule.custom_time", "*/3", "1");
    expect(validateProfile(store, "1")).toEqual([]);
  });

  test("rules for disabled features are skipped", () => {
    const store = configured({ "profile1.schedule.mode": 0, "profile1.schedule.day": 99 });
    expect(validateProfile(store, "1")).toEqual([]);
  });

  test("range checks and ssh argument length", () => {
    const store = new ConfigStore({
      "profile1.snapshots.min_free_inodes.value": "20",
      "profile1.snapshots.ssh.max_arg_length": 100,
    });
    expect(validateProfile(store, "1")).toEqual([
      "snapshots.min_free_inodes.value must be <= 15",
      "SSH max arg length 100 is too low to run commands",
    ]);
  });

  test("type mismatch", () => {
    const store = new ConfigStore({ "profile1.schedule.mode": "often" });
    expect(validateProfile(store, "1")).toEqual(["schedule.mode should be integer"]);
  });

  test("the snapshot folder and folders inside it cannot be included", () => {
    const store = new ConfigStore({ "profile1.snapshots.path": "/media/backup/" });
    setIncludeList(store, [
      { path: "/media/backup", type: 0 },
      { path: "/media/backup/inner", type: 0 },
      { path: "/media/backup/notes.txt", type: 1 },
      { path: "/media/backup-old", type: 0 },
    ], "1");
    expect(validateProfile(store, "1")).toEqual([
      "backup folder cannot be included: /media/backup",
      "backup sub-folder cannot be included: /media/backup/inner",
    ]);
  });

  test("validateValue", () => {
    expect(validateValue(5, { type: "integer", enum: [1, 2] }, "x")).toEqual(["x must be one of [1,2]"]);
    expect(validateValue(0, { type: "integer", minimum: 1, maximum: 3 }, "y")).toEqual(["y must be >= 1"]);
    expect(validateValue("a", { type: "integer" }, "z")).toEqual(["z should be integer"]);
  });
});
