import { describe, it, expect } from "vitest";
import { nextCheckHours } from "./timing";
import { snapshot } from "./testing";

describe("nextCheckHours", () => {
  it("checks IV patients every 2 hours once the last four readings are in 140-180", () => {
    const s = snapshot({ route: "iv", dietOrder: "NPO", glucose: [160, 165, 170, 175, 0] });
    expect(nextCheckHours(s, "iv")).toBe(2);
    expect(nextCheckHours({ ...s, glucose: [140, 180, 140, 180, 400] }, "iv")).toBe(2);
  });

  it("checks IV patients hourly otherwise", () => {
    const s = snapshot({ route: "iv", glucose: [160, 165, 170, 181, 0] });
    expect(nextCheckHours(s, "iv")).toBe(1);
    expect(nextCheckHours({ ...s, glucose: [139, 165, 170, 175, 0] }, "iv")).toBe(1);
    expect(nextCheckHours({ ...s, glucose: [160, 0, 170, 175, 0] }, "iv")).toBe(1);
  });

  it("uses diet order for basal-bolus", () => {
    expect(nextCheckHours(snapshot({ dietOrder: "NPO" }), "basal_bolus")).toBe(4);
    expect(nextCheckHours(snapshot({ dietOrder: "others" }), "basal_bolus")).toBe(6);
  });
});
