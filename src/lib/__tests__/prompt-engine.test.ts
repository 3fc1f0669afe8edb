import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { interpretNumWeeks, interpretStartDate, promptHorizon } from "@/lib/prompt-engine";

function answers(...replies: string[]) {
  const queue = [...replies];
  return vi.fn(async (_question: string) => queue.shift() ?? "");
}

describe("promptHorizon", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps defaults on empty answers", async () => {
    const ask = answers("", "");
    await expect(promptHorizon({ startDate: "2024-01-01", numWeeks: 12 }, ask)).resolves.toEqual({
      startDate: "2024-01-01",
      numWeeks: 12,
    });
    expect(ask).toHaveBeenNthCalledWith(1, "Start date (YYYY-MM-DD) [2024-01-01]: ");
    expect(ask).toHaveBeenNthCalledWith(2, "Number of weeks [12]: ");
  });

  it("uses valid answers", async () => {
    await expect(promptHorizon({ startDate: "2024-01-01", numWeeks: 12 }, answers("2024-03-04", "6"))).resolves.toEqual({
      startDate: "2024-03-04",
      numWeeks: 6,
    });
  });

  it("falls back to defaults on invalid answers", async () => {
    await expect(promptHorizon({ startDate: "2024-01-01", numWeeks: 12 }, answers("03/04/2024", "-2"))).resolves.toEqual({
      startDate: "2024-01-01",
      numWeeks: 12,
    });
    expect(console.log).toHaveBeenCalledWith('Invalid date "03/04/2024", using 2024-01-01');
    expect(console.log).toHaveBeenCalledWith('Invalid number of weeks "-2", using 12');
  });
});

describe("interpret helpers", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("accepts zero weeks like the settings layer does", () => {
    expect(interpretNumWeeks("0", 12)).toBe(0);
  });

  it("rejects negative and non-numeric week counts", () => {
    expect(interpretNumWeeks("-3", 12)).toBe(12);
    expect(interpretNumWeeks("abc", 12)).toBe(12);
    expect(interpretNumWeeks(" 26 ", 12)).toBe(26);
  });

  it("trims date answers", () => {
    expect(interpretStartDate(" 2024-05-06 ", "2024-01-01")).toBe("2024-05-06");
  });
});
