import { Test, TestingModule } from "@nestjs/testing";
import { Logger } from "@nestjs/common";
import { getDataSourceToken } from "@nestjs/typeorm";
import { TimescaleInitService } from "./timescale-init.service";

describe("TimescaleInitService", () => {
  const query = jest.fn();
  let service: TimescaleInitService;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, "log").mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
    query.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TimescaleInitService,
        { provide: getDataSourceToken(), useValue: { query } },
      ],
    }).compile();

    service = module.get<TimescaleInitService>(TimescaleInitService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const statements = (): string[] =>
    query.mock.calls.map((call) => String(call[0]).replace(/\s+/g, " ").trim());

  it("should leave a plain table alone without the extension", async () => {
    query.mockResolvedValueOnce([{ installed: false }]);

    await service.initializeHypertable();

    expect(query).toHaveBeenCalledTimes(1);
  });

  it("should convert the samples table and add a compression policy", async () => {
    query
      .mockResolvedValueOnce([{ installed: true }])
      .mockResolvedValueOnce([{ is_hypertable: false }])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([{ compression_enabled: false }])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([]);

    await service.initializeHypertable();

    const sql = statements();
    expect(sql[2]).toBe(
      "SELECT create_hypertable('occupancy_samples', 'timestamp', chunk_time_interval => INTERVAL '1 day', if_not_exists => TRUE, migrate_data => TRUE);",
    );
    expect(sql[4]).toBe(
      "ALTER TABLE occupancy_samples SET (timescaledb.compress);",
    );
    expect(sql[6]).toBe(
      "SELECT add_compression_policy('occupancy_samples', INTERVAL '30 days');",
    );
  });

  it("should skip conversion and policy when both exist", async () => {
    query
      .mockResolvedValueOnce([{ installed: true }])
      .mockResolvedValueOnce([{ is_hypertable: true }])
      .mockResolvedValueOnce([{ compression_enabled: true }])
      .mockResolvedValueOnce([{ job_id: 1000 }]);

    await service.initializeHypertable();

    expect(query).toHaveBeenCalledTimes(4);
    expect(statements().some((sql) => sql.includes("create_hypertable"))).toBe(
      false,
    );
  });

  it("should only warn when compression fails", async () => {
    query
      .mockResolvedValueOnce([{ installed: true }])
      .mockResolvedValueOnce([{ is_hypertable: true }])
      .mockRejectedValueOnce(new Error("compression not supported"));

    await expect(service.initializeHypertable()).resolves.toBeUndefined();
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      "  ⚠️  Failed to enable compression on occupancy_samples: compression not supported",
    );
  });
});
