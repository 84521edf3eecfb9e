import { Entity, PrimaryColumn, Column } from "typeorm";

/**
 * Occupancy Sample Entity
 *
 * One reading of the pool occupancy page. Rows are append-only: the ingestion
 * pipeline inserts them and nothing updates or deletes them.
 *
 * The timestamp is the primary key, which both rejects duplicate readings for the
 * same second and serves as the index for range scans.
 */
@Entity("occupancy_samples")
export class OccupancySample {
  // Second precision, UTC
  @PrimaryColumn({ type: "timestamptz" })
  timestamp!: Date;

  @Column({ type: "integer" })
  occupancy!: number;

  @Column({ type: "integer", nullable: true })
  capacity!: number | null;

  @Column({ type: "text", name: "raw_status", nullable: true })
  rawStatus!: string | null;
}
