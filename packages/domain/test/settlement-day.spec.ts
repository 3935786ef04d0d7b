import { describe, expect, it } from "vitest";

import { ConfigurationError, Duration, SettlementDay } from "../src";

describe("SettlementDay", () => {
  it("splits a local day into two settlement windows", () => {
    const windows = SettlementDay.fromIsoDate("2025-03-01").windows();
    expect(windows).toHaveLength(2);
    expect(windows[0]).toEqual({settlementDate: "2025-02-28", settlementPeriods: [47, 48]});
    expect(windows[1]?.settlementDate).toBe("2025-03-01");
    expect(windows[1]?.settlementPeriods).toHaveLength(46);
    expect(windows[1]?.settlementPeriods[45]).toBe(46);
  });

  it("crosses year boundaries", () => {
    expect(SettlementDay.fromIsoDate("2025-01-01").previous().date).toBe("2024-12-31");
  });

  it("derives today from a UTC instant", () => {
    expect(SettlementDay.today(Date.parse("2025-05-20T23:59:00Z")).date).toBe("2025-05-20");
  });

  it("rejects malformed or impossible dates", () => {
    expect(() => SettlementDay.fromIsoDate("20250301")).toThrow(ConfigurationError);
    expect(() => SettlementDay.fromIsoDate("2025-02-30")).toThrow("no such calendar day");
  });
});

describe("Duration", () => {
  it("clamps waits that are already due to zero", () => {
    expect(Duration.until(10_000, 4_000).isZero()).toBe(true);
    expect(Duration.until(4_000, 10_000).milliseconds).toBe(6_000);
  });

  it("formats as hours, minutes and seconds", () => {
    expect(Duration.fromMinutes(90).add(Duration.fromSeconds(5)).toString()).toBe("01:30:05");
  });

  it("refuses negative values", () => {
    expect(() => Duration.fromSeconds(-1)).toThrow(RangeError);
  });
});
