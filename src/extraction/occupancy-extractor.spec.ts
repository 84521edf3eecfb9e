import { readFileSync } from "fs";
import { join } from "path";
import { extractOccupancy, OccupancyExtractor } from "./occupancy-extractor";
import { RawPage } from "../external-apis/pool-page/pool-page.types";
import {
  DEFAULT_OCCUPANCY_LABEL,
  ExtractionConfig,
} from "../config/polling.config";

const FIXTURES = join(__dirname, "../../test/fixtures/pages");

const config: ExtractionConfig = {
  occupancyLabel: DEFAULT_OCCUPANCY_LABEL,
  statusLabel: null,
  maxOccupancy: 1000,
};

const fetchedAt = new Date("2024-07-01T10:15:42.250Z");

function pageFromBody(
  body: Buffer,
  contentType: string | null = "text/html",
): RawPage {
  return {
    url: "http://pool.test/occupancy",
    status: 200,
    body,
    contentType,
    fetchedAt,
  };
}

function fixture(name: string): RawPage {
  return pageFromBody(readFileSync(join(FIXTURES, name)));
}

function html(body: string): RawPage {
  return pageFromBody(
    Buffer.from(`<html><body>${body}</body></html>`, "utf-8"),
    "text/html; charset=utf-8",
  );
}

describe("extractOccupancy", () => {
  describe("valid pages", () => {
    it("should read occupancy and capacity from the table layout", () => {
      const result = extractOccupancy(
        fixture("occupancy-with-capacity.html"),
        config,
      );

      expect(result).toEqual({
        ok: true,
        value: {
          timestamp: new Date("2024-07-01T10:15:42.000Z"),
          occupancy: 37,
          capacity: 80,
          rawStatus: null,
        },
      });
    });

    it("should leave capacity null when only a count is shown", () => {
      const result = extractOccupancy(
        fixture("occupancy-count-only.html"),
        config,
      );

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.occupancy).toBe(37);
        expect(result.value.capacity).toBeNull();
      }
    });

    it("should not join the count with the opening hours below it", () => {
      const result = extractOccupancy(
        fixture("occupancy-followed-by-hours.html"),
        config,
      );

      expect(result.ok && result.value).toEqual({
        timestamp: new Date("2024-07-01T10:15:42.000Z"),
        occupancy: 37,
        capacity: null,
        rawStatus: null,
      });
    });

    it("should not join numbers split across lines", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: 37\n800 m</p>"),
        config,
      );

      expect(result.ok && result.value.occupancy).toBe(37);
    });

    it("should read counts with grouping separators", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: 1\u00a0050 / 1 200</p>"),
        { ...config, maxOccupancy: 2000 },
      );

      expect(result.ok && result.value.occupancy).toBe(1050);
      expect(result.ok && result.value.capacity).toBe(1200);
    });

    it("should prefer the content over a menu link carrying the label", () => {
      const result = extractOccupancy(
        fixture("occupancy-behind-menu-link.html"),
        config,
      );

      expect(result.ok && result.value.occupancy).toBe(37);
      expect(result.ok && result.value.capacity).toBe(80);
    });

    it("should match the label regardless of case and spacing", () => {
      const result = extractOccupancy(
        html("<p>aktualna   liczba\nosób na basenie - 5/80</p>"),
        config,
      );

      expect(result.ok && result.value.occupancy).toBe(5);
    });

    it("should read a page encoded as windows-1250", () => {
      // Ó is 0xD3 in both latin1 and windows-1250
      const body = Buffer.from(
        '<html><head><meta http-equiv="Content-Type" content="text/html; charset=windows-1250"></head>' +
          "<body><p>AKTUALNA LICZBA OSÓB NA BASENIE: 21/80</p></body></html>",
        "latin1",
      );

      const result = extractOccupancy(pageFromBody(body, "text/html"), config);

      expect(result.ok && result.value.occupancy).toBe(21);
      expect(result.ok && result.value.capacity).toBe(80);
    });

    it("should read a configured status label", () => {
      const result = extractOccupancy(fixture("occupancy-with-status.html"), {
        ...config,
        statusLabel: "Status",
      });

      expect(result).toEqual({
        ok: true,
        value: {
          timestamp: new Date("2024-07-01T10:15:42.000Z"),
          occupancy: 12,
          capacity: 80,
          rawStatus: "otwarte",
        },
      });
    });

    it("should leave rawStatus null when the status label is missing", () => {
      const result = extractOccupancy(fixture("occupancy-count-only.html"), {
        ...config,
        statusLabel: "STATUS",
      });

      expect(result.ok && result.value.rawStatus).toBeNull();
    });

    it("should accept occupancy slightly above capacity", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: 90/80</p>"),
        config,
      );

      expect(result.ok && result.value.occupancy).toBe(90);
    });
  });

  describe("drifted pages", () => {
    it("should report StructureNotFound when the label is gone", () => {
      const result = extractOccupancy(
        fixture("redesigned-without-label.html"),
        config,
      );

      expect(result).toEqual({
        ok: false,
        error: {
          family: "ExtractError",
          kind: "StructureNotFound",
          locator: "AKTUALNA LICZBA OSÓB NA BASENIE",
        },
      });
    });

    it("should report StructureNotFound for an empty body", () => {
      const result = extractOccupancy(pageFromBody(Buffer.alloc(0)), config);

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.kind).toBe("StructureNotFound");
    });

    it("should report NonNumericValue when no number follows the label", () => {
      const result = extractOccupancy(
        fixture("occupancy-unavailable.html"),
        config,
      );

      expect(result).toEqual({
        ok: false,
        error: {
          family: "ExtractError",
          kind: "NonNumericValue",
          text: ": brak danych",
        },
      });
    });

    it("should report OutOfRange for a negative count", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: -5</p>"),
        config,
      );

      expect(result).toEqual({
        ok: false,
        error: {
          family: "ExtractError",
          kind: "OutOfRange",
          value: -5,
          min: 0,
          max: 1000,
        },
      });
    });

    it("should report OutOfRange above the sane maximum", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: 5000</p>"),
        config,
      );

      expect(!result.ok && result.error).toEqual({
        family: "ExtractError",
        kind: "OutOfRange",
        value: 5000,
        min: 0,
        max: 1000,
      });
    });

    it("should report OutOfRange when occupancy far exceeds capacity", () => {
      const result = extractOccupancy(
        html("<p>AKTUALNA LICZBA OSÓB NA BASENIE: 150/80</p>"),
        config,
      );

      expect(!result.ok && result.error).toEqual({
        family: "ExtractError",
        kind: "OutOfRange",
        value: 150,
        min: 0,
        max: 120,
      });
    });

    it("should never throw on malformed bytes", () => {
      const garbage = Buffer.from([0xff, 0xfe, 0x00, 0x3c, 0x80, 0x81, 0x3e]);

      expect(() => extractOccupancy(pageFromBody(garbage), config)).not.toThrow();
      expect(extractOccupancy(pageFromBody(garbage), config).ok).toBe(false);
    });
  });
});

describe("OccupancyExtractor", () => {
  it("should extract with the injected configuration", () => {
    const extractor = new OccupancyExtractor({
      ...config,
      occupancyLabel: "Osób w obiekcie",
    });

    const result = extractor.extract(html("<p>Osób w obiekcie: 7</p>"));

    expect(result.ok && result.value.occupancy).toBe(7);
  });
});
