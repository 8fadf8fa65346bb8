import { describe, it, expect } from "vitest";
import { DEFAULT_DOSE_TABLE, buildDoseTable } from "./doseTable";
import { DoseTableStore } from "./doseTableStore";

describe("DoseTableStore", () => {
  const replacement = buildDoseTable([
    { algorithm: "iv", level: 1, min: 0, max: 1000, dose: 9 },
    { algorithm: "basal_bolus", level: 1, min: 0, max: 1000, dose: 9 },
  ]);

  it("publishes the initial table until reloaded", () => {
    const store = new DoseTableStore(DEFAULT_DOSE_TABLE, async () => ({ table: replacement, source: "file" }));
    expect(store.current()).toBe(DEFAULT_DOSE_TABLE);
  });

  it("swaps the reference on reload and leaves earlier readers untouched", async () => {
    const store = new DoseTableStore(DEFAULT_DOSE_TABLE, async () => ({ table: replacement, source: "file" }));
    const before = store.current();

    const loaded = await store.reload();

    expect(loaded.source).toBe("file");
    expect(store.current()).toBe(replacement);
    expect(before).toBe(DEFAULT_DOSE_TABLE);
    expect([...before.iv.keys()]).toEqual([1, 2, 3, 4, 5]);
  });

  it("keeps serving the old table while a reload is pending", async () => {
    let finish: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      finish = resolve;
    });
    const store = new DoseTableStore(DEFAULT_DOSE_TABLE, async () => {
      await gate;
      return { table: replacement, source: "file" };
    });

    const pending = store.reload();
    expect(store.current()).toBe(DEFAULT_DOSE_TABLE);
    finish();
    await pending;
    expect(store.current()).toBe(replacement);
  });

  it("publishes the newest reload when two finish out of order", async () => {
    const older = buildDoseTable([
      { algorithm: "iv", level: 1, min: 0, max: 1000, dose: 3 },
      { algorithm: "basal_bolus", level: 1, min: 0, max: 1000, dose: 3 },
    ]);
    const releases: (() => void)[] = [];
    const results = [older, replacement];
    let calls = 0;
    const store = new DoseTableStore(DEFAULT_DOSE_TABLE, async () => {
      const table = results[calls++];
      await new Promise<void>((resolve) => releases.push(resolve));
      return { table, source: "file" };
    });

    const first = store.reload();
    const second = store.reload();
    await Promise.resolve();

    // The newer read lands first, then the older one.
    releases[1]();
    expect((await second).published).toBe(true);
    releases[0]();
    expect((await first).published).toBe(false);

    expect(store.current()).toBe(replacement);
  });
});
