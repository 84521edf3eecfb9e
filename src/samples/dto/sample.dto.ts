import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Sample, occupancyPercentage } from "../sample.types";

/**
 * One occupancy reading as returned by the API
 */
export class SampleDto {
  @ApiProperty({ description: "Reading time (ISO 8601, UTC)" })
  timestamp!: string;

  @ApiProperty({ description: "People present at the pool", minimum: 0 })
  occupancy!: number;

  @ApiPropertyOptional({
    description: "Maximum capacity, when the source page exposes it",
    type: Number,
    nullable: true,
  })
  capacity!: number | null;

  @ApiPropertyOptional({
    description: "Status label as shown on the source page",
    type: String,
    nullable: true,
  })
  rawStatus!: string | null;

  @ApiPropertyOptional({
    description: "occupancy / capacity in percent (one decimal)",
    type: Number,
    nullable: true,
  })
  percentage!: number | null;

  static fromSample(sample: Sample): SampleDto {
    const dto = new SampleDto();
    dto.timestamp = sample.timestamp.toISOString();
    dto.occupancy = sample.occupancy;
    dto.capacity = sample.capacity;
    dto.rawStatus = sample.rawStatus;
    dto.percentage = occupancyPercentage(sample);
    return dto;
  }
}
