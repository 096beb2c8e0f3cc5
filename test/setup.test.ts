import { describe, expect, test } from "vitest";
import { setIncludeList } from "../src/config/schema.js";
import { ConfigStore } from "../src/config/store.js";
import { buildTriggerSet, type TriggerSetContext } from "../src/cron/setup.js";
import { UdevRules } from "../src/cron/udev.js";
import type { Notifier } from "../src/utils/notify.js";

function collectingNotifier(): Notifier & { errors: string[] } {
  const errors: string[] = [];
  return {
    errors,
    error: (message) => errors.push(message),
    warn: () => undefined,
    info: () => undefined,
    debug: () => undefined,
  };
}

function threeProfiles(): ConfigStore {
  const store = new ConfigStore({
    profiles: "1:2:3",
    "profile1.schedule.mode": 20,
    "profile1.schedule.time": 130,
    "profile1.snapshots.path": "/backup",
    "profile2.name": "Remote",
    "profile2.schedule.mode": 27,
    "profile2.snapshots.mode": "ssh",
    "profile2.snapshots.path": "/srv/backup",
    "profile3.name": "Usb",
    "profile3.schedule.mode": 27,
    "profile3.snapshots.path": "/media/usb",
  });
  for (const id of ["1", "2", "3"]) setIncludeList(store, [{ path: "/home/u", type: 0 }], id);
  return store;
}

function context(store: ConfigStore, notifier: Notifier, overrides: Partial<TriggerSetContext> = {}): TriggerSetContext {
  return {
    store,
    executable: "/usr/bin/backtide",
    resolver: { uuidFromPath: (p) => (p === "/media/usb" ? "abcd-1234" : null) },
    udev: new UdevRules(),
    notifier,
    findBinary: (name) => `/usr/bin/${name}`,
    ...overrides,
  };
}

describe("trigger set", () => {
  test("one failing profile does not stop the others", () => {
    const store = threeProfiles();
    const notifier = collectingNotifier();
    const udev = new UdevRules();
    const result = buildTriggerSet(context(store, notifier, { udev }));

    expect(result.lines).toEqual([
      "30 1 * * * /usr/bin/nice -n19 /usr/bin/ionice -c2 -n7 /usr/bin/backtide backup-job >/dev/null 2>&1",
    ]);
    expect(result.failed).toEqual(["2"]);
    expect(notifier.errors).toEqual(['Profile "Remote": Schedule on device connect doesn\'t work with mode ssh']);
    expect(result.entries.map((e) => e.profileId)).toEqual(["1", "3"]);
    expect(udev.count).toBe(1);
    expect(udev.render()).toContain(
      `ENV{ID_FS_UUID}=="abcd-1234", RUN+="/bin/sh -c '/usr/bin/nice -n19 /usr/bin/ionice -c2 -n7 /usr/bin/backtide --profile-id 3 backup-job >/dev/null 2>&1'"`,
    );
    expect(store.raw("profile3.snapshots.path.uuid")).toBe("abcd-1234");
  });

  test("invalid settings leave out only their own profile", () => {
    const store = new ConfigStore({
      profiles: "1:2",
      "profile1.schedule.mode": 20,
      "profile1.schedule.time": 1345,
      "profile1.snapshots.path": "/backup",
      "profile2.schedule.mode": 30,
      "profile2.schedule.weekday": 9,
      "profile2.snapshots.path": "/backup2",
    });
    setIncludeList(store, [{ path: "/home/u", type: 0 }], "1");
    setIncludeList(store, [{ path: "/home/u", type: 0 }], "2");
    const notifier = collectingNotifier();
    const result = buildTriggerSet(context(store, notifier, { findBinary: () => null }));

    expect(result.lines).toEqual(["45 13 * * * /usr/bin/backtide backup-job >/dev/null 2>&1"]);
    expect(result.failed).toEqual(["2"]);
    expect(notifier.errors).toEqual(['Profile "Profile 2": schedule.weekday must be <= 7']);
  });

  test("an empty custom hour list never reaches the crontab", () => {
    const store = threeProfiles();
    store.setProfiles(["1"]);
    store.setProfileIntValue("schedule.mode", 19, "1");
    store.setProfileStrValue("schedule.custom_time", "", "1");
    const notifier = collectingNotifier();
    const result = buildTriggerSet(context(store, notifier));

    expect(result.lines).toEqual([]);
    expect(result.failed).toEqual(["1"]);
    expect(notifier.errors).toEqual(['Profile "Main profile": schedule.custom_time has an invalid format']);
  });

  test("priorities are left out when disabled or not installed", () => {
    const store = threeProfiles();
    store.setProfiles(["1"]);
    store.setProfileBoolValue("snapshots.cron.nice", false, "1");
    const result = buildTriggerSet(context(store, collectingNotifier(), { configPath: "/etc/backtide.json", findBinary: () => null }));
    expect(result.lines).toEqual(["30 1 * * * /usr/bin/backtide --config /etc/backtide.json backup-job >/dev/null 2>&1"]);
  });
});
