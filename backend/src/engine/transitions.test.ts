import { describe, it, expect } from "vitest";
import { applyTransition, basalBolusMove, ivMove } from "./transitions";

describe("ivMove", () => {
  it("moves up when above 150 and rising", () => {
    expect(ivMove([200, 180, 0, 0, 0])).toBe("up");
  });

  it("moves up when above 150 and falling by at most 60", () => {
    expect(ivMove([200, 260, 0, 0, 0])).toBe("up");
  });

  it("holds when above 150 but falling by more than 60", () => {
    expect(ivMove([200, 261, 0, 0, 0])).toBe("hold");
  });

  it("moves down below 110", () => {
    expect(ivMove([109, 120, 0, 0, 0])).toBe("down");
  });

  it("holds inside 110-150", () => {
    expect(ivMove([110, 300, 0, 0, 0])).toBe("hold");
    expect(ivMove([150, 100, 0, 0, 0])).toBe("hold");
  });

  it("holds with fewer than two readings", () => {
    expect(ivMove([400])).toBe("hold");
  });
});

describe("basalBolusMove", () => {
  it("moves up with two readings above 180", () => {
    expect(basalBolusMove([200, 190, 150, 150, 150])).toBe("up");
  });

  it("prefers moving up over moving down", () => {
    expect(basalBolusMove([200, 190, 100, 0, 0])).toBe("up");
  });

  it("moves down with any nonzero reading below 140", () => {
    expect(basalBolusMove([150, 130, 0, 0, 0])).toBe("down");
  });

  it("does not count missing readings as low", () => {
    expect(basalBolusMove([150, 160, 0, 0, 0])).toBe("hold");
    expect(basalBolusMove([200, 150, 150, 150, 150])).toBe("hold");
  });
});

describe("applyTransition", () => {
  it("clamps IV between 1 and 5", () => {
    expect(applyTransition("iv", 3, [200, 180])).toEqual({ level: 4, move: "up" });
    expect(applyTransition("iv", 5, [200, 180])).toEqual({ level: 5, move: "up" });
    expect(applyTransition("iv", 1, [100, 180])).toEqual({ level: 1, move: "down" });
  });

  it("leaves IV levels above 5 alone unless moving up", () => {
    expect(applyTransition("iv", 8, [130, 130])).toEqual({ level: 8, move: "hold" });
    expect(applyTransition("iv", 8, [100, 130])).toEqual({ level: 7, move: "down" });
    expect(applyTransition("iv", 8, [200, 180])).toEqual({ level: 5, move: "up" });
  });

  it("clamps basal-bolus between 1 and 7", () => {
    expect(applyTransition("basal_bolus", 7, [200, 190, 0, 0, 0])).toEqual({ level: 7, move: "up" });
    expect(applyTransition("basal_bolus", 1, [130, 150, 0, 0, 0])).toEqual({ level: 1, move: "down" });
    expect(applyTransition("basal_bolus", 4, [150, 160, 0, 0, 0])).toEqual({ level: 4, move: "hold" });
  });

  it("holds or steps down basal-bolus levels above 7", () => {
    expect(applyTransition("basal_bolus", 9, [150, 160, 150, 150, 150])).toEqual({ level: 9, move: "hold" });
    expect(applyTransition("basal_bolus", 9, [150, 130, 150, 150, 150])).toEqual({ level: 8, move: "down" });
    expect(applyTransition("basal_bolus", 9, [200, 190, 150, 150, 150])).toEqual({ level: 7, move: "up" });
  });
});
