import { Module } from "@nestjs/common";
import { TimescaleInitService } from "./timescale-init.service";

/**
 * Database Module
 *
 * Database-specific initialization (TimescaleDB hypertable setup).
 * The schema itself is created by the TypeORM migrations in ./migrations.
 */
@Module({
  providers: [TimescaleInitService],
  exports: [TimescaleInitService],
})
export class DatabaseModule {}
