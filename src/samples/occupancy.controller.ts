import { Controller, Get, Query } from "@nestjs/common";
import {
  ApiOkResponse,
  ApiOperation,
  ApiBadRequestResponse,
  ApiTags,
} from "@nestjs/swagger";
import { OccupancyQueryService } from "./occupancy-query.service";
import { HistoryQueryDto } from "./dto/history-query.dto";
import { HistoryResponseDto } from "./dto/history-response.dto";
import { LatestResponseDto } from "./dto/latest-response.dto";

@ApiTags("occupancy")
@Controller("occupancy")
export class OccupancyController {
  constructor(private readonly occupancyQueryService: OccupancyQueryService) {}

  /**
   * GET /v1/occupancy/history?hours=24
   */
  @Get("history")
  @ApiOperation({
    summary: "Occupancy history",
    description: "Samples from the last N hours (default 24), oldest first.",
  })
  @ApiOkResponse({ type: HistoryResponseDto })
  @ApiBadRequestResponse({ description: "hours is not a positive number" })
  async getHistory(
    @Query() query: HistoryQueryDto,
  ): Promise<HistoryResponseDto> {
    return this.occupancyQueryService.getHistory(query.hours);
  }

  /**
   * GET /v1/occupancy/latest
   */
  @Get("latest")
  @ApiOperation({
    summary: "Latest occupancy",
    description: 'Most recent sample, or status "no-data" before the first one.',
  })
  @ApiOkResponse({ type: LatestResponseDto })
  async getLatest(): Promise<LatestResponseDto> {
    return this.occupancyQueryService.getLatest();
  }
}
