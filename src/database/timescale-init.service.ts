import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource } from "typeorm";

const SAMPLES_TABLE = "occupancy_samples";

/**
 * TimescaleDB Initialization Service
 *
 * Converts occupancy_samples to a hypertable (1-day chunks) and compresses
 * chunks older than 30 days. Existing rows are migrated in place, never
 * truncated.
 *
 * Without the timescaledb extension the table stays a plain PostgreSQL table
 * and everything else works the same.
 */
@Injectable()
export class TimescaleInitService implements OnModuleInit {
  private readonly logger = new Logger(TimescaleInitService.name);

  constructor(@InjectDataSource() private dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    // Run async, don't block startup
    this.initializeHypertable().catch((err) => {
      this.logger.error("Failed to initialize TimescaleDB hypertable", err);
    });
  }

  async initializeHypertable(): Promise<void> {
    const hasTimescale = await this.checkTimescaleExtension();
    if (!hasTimescale) {
      this.logger.warn(
        "⚠️  TimescaleDB extension not found. Using a plain table for samples.",
      );
      return;
    }

    if (await this.isHypertable(SAMPLES_TABLE)) {
      this.logger.debug(`  ✓ ${SAMPLES_TABLE} is already a hypertable`);
    } else {
      await this.dataSource.query(
        `SELECT create_hypertable('${SAMPLES_TABLE}', 'timestamp', chunk_time_interval => INTERVAL '1 day', if_not_exists => TRUE, migrate_data => TRUE);`,
      );
      this.logger.log(`🕒 Created hypertable: ${SAMPLES_TABLE}`);
    }

    await this.enableCompression(SAMPLES_TABLE, 30);
  }

  private async checkTimescaleExtension(): Promise<boolean> {
    const result: Array<{ installed: boolean }> = await this.dataSource.query(
      `SELECT EXISTS(SELECT 1 FROM pg_extension WHERE extname = 'timescaledb') as installed;`,
    );
    return result[0]?.installed ?? false;
  }

  private async isHypertable(tableName: string): Promise<boolean> {
    const result: Array<{ is_hypertable: boolean }> =
      await this.dataSource.query(
        `SELECT EXISTS(
          SELECT 1 FROM timescaledb_information.hypertables
          WHERE hypertable_name = $1
        ) as is_hypertable;`,
        [tableName],
      );
    return result[0]?.is_hypertable ?? false;
  }

  /**
   * Compression is an optimisation only; failures are logged, not thrown.
   */
  private async enableCompression(
    tableName: string,
    compressAfterDays: number,
  ): Promise<void> {
    try {
      const compressionCheck: Array<{ compression_enabled: boolean }> =
        await this.dataSource.query(
          `SELECT compression_enabled FROM timescaledb_information.hypertables WHERE hypertable_name = $1;`,
          [tableName],
        );

      if (!compressionCheck[0]?.compression_enabled) {
        await this.dataSource.query(
          `ALTER TABLE ${tableName} SET (timescaledb.compress);`,
        );
        this.logger.debug(`  ✓ Enabled compression on ${tableName}`);
      }

      const policyCheck: unknown[] = await this.dataSource.query(
        `SELECT job_id FROM timescaledb_information.jobs
         WHERE hypertable_name = $1 AND proc_name = 'policy_compression';`,
        [tableName],
      );

      if (policyCheck.length === 0) {
        await this.dataSource.query(
          `SELECT add_compression_policy('${tableName}', INTERVAL '${compressAfterDays} days');`,
        );
        this.logger.debug(
          `  ✓ ${tableName}: Compress after ${compressAfterDays} days`,
        );
      }
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `  ⚠️  Failed to enable compression on ${tableName}: ${errorMessage}`,
      );
    }
  }
}
