import { ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
  IsIn,
  IsNumber,
  IsOptional,
  IsPositive,
  Max,
} from "class-validator";

export const DEFAULT_HISTORY_HOURS = 24;
export const MAX_HISTORY_HOURS = 8784;

export class HistoryQueryDto {
  @ApiPropertyOptional({
    description: "Size of the window ending now, in hours",
    default: DEFAULT_HISTORY_HOURS,
    maximum: MAX_HISTORY_HOURS,
  })
  @IsOptional()
  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  @Max(MAX_HISTORY_HOURS)
  hours?: number;

  // Consumed by ExcludeNullInterceptor
  @IsOptional()
  @IsIn(["true", "false"])
  debug?: string;
}
