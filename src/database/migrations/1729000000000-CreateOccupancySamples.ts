import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateOccupancySamples1729000000000 implements MigrationInterface {
  name = "CreateOccupancySamples1729000000000";

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "occupancy_samples" (
        "timestamp" TIMESTAMPTZ NOT NULL,
        "occupancy" INTEGER NOT NULL CHECK ("occupancy" >= 0),
        "capacity" INTEGER,
        "raw_status" TEXT,
        CONSTRAINT "PK_occupancy_samples" PRIMARY KEY ("timestamp")
      );
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "occupancy_samples";`);
  }
}
