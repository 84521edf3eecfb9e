import {
  formatPollingWindow,
  isWithinPollingWindow,
  minutesSinceMidnightInTimezone,
} from "./date.util";
import { PollingWindow } from "../../config/polling.config";

describe("date utils", () => {
  describe("minutesSinceMidnightInTimezone", () => {
    it("should use summer time in Warsaw", () => {
      // UTC+2 in July
      expect(
        minutesSinceMidnightInTimezone(
          new Date("2024-07-01T04:30:00Z"),
          "Europe/Warsaw",
        ),
      ).toBe(390);
    });

    it("should use winter time in Warsaw", () => {
      // UTC+1 in January
      expect(
        minutesSinceMidnightInTimezone(
          new Date("2024-01-15T04:30:00Z"),
          "Europe/Warsaw",
        ),
      ).toBe(330);
    });
  });

  describe("isWithinPollingWindow", () => {
    const daytime: PollingWindow = {
      startMinute: 360,
      endMinute: 1320,
      timezone: "Europe/Warsaw",
    };

    it.each([
      ["2024-07-01T04:00:00Z", true], // 06:00, opening minute
      ["2024-07-01T03:59:00Z", false], // 05:59
      ["2024-07-01T20:00:00Z", true], // 22:00, closing minute
      ["2024-07-01T20:01:00Z", false], // 22:01
      ["2024-07-01T10:00:00Z", true], // 12:00
    ])("%s inside the day window: %s", (iso, expected) => {
      expect(isWithinPollingWindow(new Date(iso), daytime)).toBe(expected);
    });

    it("should handle windows that wrap past midnight", () => {
      const overnight: PollingWindow = {
        startMinute: 1320,
        endMinute: 120,
        timezone: "UTC",
      };

      expect(
        isWithinPollingWindow(new Date("2024-07-01T23:30:00Z"), overnight),
      ).toBe(true);
      expect(
        isWithinPollingWindow(new Date("2024-07-01T01:00:00Z"), overnight),
      ).toBe(true);
      expect(
        isWithinPollingWindow(new Date("2024-07-01T12:00:00Z"), overnight),
      ).toBe(false);
    });
  });

  it("should format a window as HH:mm-HH:mm", () => {
    expect(
      formatPollingWindow({ startMinute: 360, endMinute: 1320, timezone: "UTC" }),
    ).toBe("06:00-22:00");
  });
});
