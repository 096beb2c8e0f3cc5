import { describe, expect, test } from "vitest";
import { CrontabService, MARKER, stripManagedEntries, type CrontabRunner } from "../src/cron/crontab.js";
import { UdevRules, udevRulesFileName } from "../src/cron/udev.js";
import { ScheduleError } from "../src/errors.js";

class MemoryCrontab implements CrontabRunner {
  writes = 0;
  constructor(public lines: string[] = []) {}
  async read(): Promise<string[]> {
    return [...this.lines];
  }
  async write(lines: string[]): Promise<void> {
    this.writes++;
    this.lines = [...lines];
  }
}

describe("crontab", () => {
  test("user lines survive and managed entries are replaced", async () => {
    const runner = new MemoryCrontab(["MAILTO=me", MARKER, "0 * * * * old", "5 4 * * * user-job"]);
    const service = new CrontabService(runner);
    expect(await service.install(["*/15 * * * * new"])).toBe(true);
    expect(runner.lines).toEqual(["MAILTO=me", "5 4 * * * user-job", MARKER, "*/15 * * * * new"]);
    expect(await service.managedEntries()).toEqual(["*/15 * * * * new"]);
  });

  test("installing the same entries again writes nothing", async () => {
    const runner = new MemoryCrontab();
    const service = new CrontabService(runner);
    await service.install(["@reboot job"]);
    expect(await service.install(["@reboot job"])).toBe(false);
    expect(runner.writes).toBe(1);
  });

  test("empty entry list removes every managed line", async () => {
    const runner = new MemoryCrontab([MARKER, "@reboot job", "# mine"]);
    await new CrontabService(runner).install([]);
    expect(runner.lines).toEqual(["# mine"]);
  });

  test("stripManagedEntries tolerates surrounding blanks", () => {
    expect(stripManagedEntries([`  ${MARKER}  `, "x", "y"])).toEqual(["y"]);
  });
});

describe("udev rules", () => {
  test("rules render with a header", () => {
    const udev = new UdevRules();
    expect(udev.render()).toBe("");
    const rule = udev.addRule("/usr/bin/backtide backup-job >/dev/null", "1234-ABCD");
    expect(rule).toBe(`ACTION=="add|change", ENV{ID_FS_UUID}=="1234-ABCD", RUN+="/bin/sh -c '/usr/bin/backtide backup-job >/dev/null'"`);
    expect(udev.render()).toBe(`# Written by backtide. Install with root permissions.\n${rule}\n`);
    udev.clean();
    expect(udev.isEmpty).toBe(true);
  });

  test("commands that would break quoting are refused", () => {
    const udev = new UdevRules();
    expect(() => udev.addRule("/usr/bin/backtide --config '/a b' backup-job", "1234")).toThrow(ScheduleError);
    expect(() => udev.addRule("cmd", "bad uuid")).toThrow(ScheduleError);
    expect(udev.count).toBe(0);
  });

  test("file name carries the user", () => {
    expect(udevRulesFileName("alice")).toBe("99-backtide-alice.rules");
  });
});
