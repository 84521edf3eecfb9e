import { ApiProperty } from "@nestjs/swagger";
import { SampleDto } from "./sample.dto";

/**
 * Response DTO for GET /v1/occupancy/history
 */
export class HistoryResponseDto {
  @ApiProperty({ description: "Requested window size in hours" })
  hours!: number;

  @ApiProperty({ description: "Window start (ISO 8601, inclusive)" })
  from!: string;

  @ApiProperty({ description: "Window end (ISO 8601)" })
  to!: string;

  @ApiProperty({
    description: "Samples in the window, oldest first",
    type: [SampleDto],
  })
  samples!: SampleDto[];
}
