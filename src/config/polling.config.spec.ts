import { Logger } from "@nestjs/common";
import {
  DEFAULT_OCCUPANCY_LABEL,
  DEFAULT_SOURCE_URL,
  getExtractionConfig,
  getPollingConfig,
  parsePollingWindow,
} from "./polling.config";

describe("polling config", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest
      .spyOn(Logger.prototype, "warn")
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("getPollingConfig", () => {
    it("should apply defaults for an empty environment", () => {
      expect(getPollingConfig({})).toEqual({
        enabled: true,
        intervalMs: 300_000,
        sourceUrl: DEFAULT_SOURCE_URL,
        fetchTimeoutMs: 10_000,
        window: { startMinute: 360, endMinute: 1320, timezone: "Europe/Warsaw" },
        dedupWindowMs: 240_000,
      });
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("should read all variables", () => {
      const config = getPollingConfig({
        POLLING_INTERVAL_MINUTES: "10",
        POOL_SOURCE_URL: "https://pool.test/status",
        FETCH_TIMEOUT_SECONDS: "2.5",
        POLLING_WINDOW: "07:30-21:00",
        POLLING_TIMEZONE: "Europe/Berlin",
        DEDUP_WINDOW_MINUTES: "0",
        INGESTION_ENABLED: "false",
      });

      expect(config).toEqual({
        enabled: false,
        intervalMs: 600_000,
        sourceUrl: "https://pool.test/status",
        fetchTimeoutMs: 2_500,
        window: { startMinute: 450, endMinute: 1260, timezone: "Europe/Berlin" },
        dedupWindowMs: 0,
      });
    });

    it.each(["0", "-5", "abc", "2.5"])(
      "should fall back to 5 minutes for POLLING_INTERVAL_MINUTES=%s",
      (value) => {
        const config = getPollingConfig({ POLLING_INTERVAL_MINUTES: value });

        expect(config.intervalMs).toBe(300_000);
        expect(warnSpy).toHaveBeenCalledWith(
          `⚠️  Invalid POLLING_INTERVAL_MINUTES="${value}", using default of 5`,
        );
      },
    );

    it("should disable the window when POLLING_WINDOW is empty", () => {
      expect(getPollingConfig({ POLLING_WINDOW: "" }).window).toBeNull();
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it("should poll around the clock with a warning for a malformed window", () => {
      expect(getPollingConfig({ POLLING_WINDOW: "morning" }).window).toBeNull();
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("parsePollingWindow", () => {
    it("should parse a window wrapping past midnight", () => {
      expect(parsePollingWindow("22:00-02:30", "UTC")).toEqual({
        startMinute: 1320,
        endMinute: 150,
        timezone: "UTC",
      });
    });

    it("should tolerate single-digit hours and spaces", () => {
      expect(parsePollingWindow(" 6:00 - 22:00 ", "UTC")?.startMinute).toBe(360);
    });

    it("should reject impossible times", () => {
      expect(parsePollingWindow("24:00-25:00", "UTC")).toBeNull();
      expect(parsePollingWindow("06:60-22:00", "UTC")).toBeNull();
    });
  });

  describe("getExtractionConfig", () => {
    it("should apply defaults", () => {
      expect(getExtractionConfig({})).toEqual({
        occupancyLabel: DEFAULT_OCCUPANCY_LABEL,
        statusLabel: null,
        maxOccupancy: 1000,
      });
    });

    it("should read labels and the maximum", () => {
      expect(
        getExtractionConfig({
          OCCUPANCY_LABEL: "Osób na hali",
          STATUS_LABEL: "Status",
          MAX_OCCUPANCY: "250",
        }),
      ).toEqual({
        occupancyLabel: "Osób na hali",
        statusLabel: "Status",
        maxOccupancy: 250,
      });
    });
  });
});
