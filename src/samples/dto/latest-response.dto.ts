import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { SampleDto } from "./sample.dto";

/**
 * Response DTO for GET /v1/occupancy/latest
 * An empty store is reported as status "no-data", not as an error.
 */
export class LatestResponseDto {
  @ApiProperty({ enum: ["ok", "no-data"] })
  status!: "ok" | "no-data";

  @ApiPropertyOptional({ type: SampleDto, nullable: true })
  sample!: SampleDto | null;
}
