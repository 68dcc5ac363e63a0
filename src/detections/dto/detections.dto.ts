import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export const HOARDER_SORTS = ['hoarder_score', 'age', 'value_rank'] as const;
export type HoarderSort = (typeof HOARDER_SORTS)[number];

const toBoolean = ({ value }: { value: unknown }) =>
  value === true || value === 'true' || value === '1';

export class HoarderTabsQueryDto {
  @IsString() @IsNotEmpty() user_id!: string;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(365) lookback_days?: number;
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) min_score?: number;
  @IsOptional() @Type(() => Number) @IsNumber() @Min(0) age_min?: number;
  @IsOptional() @IsString() domain?: string;
  @IsOptional() @IsString() exclude_domains?: string;
  @IsOptional() @Type(() => Number) @IsInt() limit?: number;
  @IsOptional() @IsIn(HOARDER_SORTS) sort_by?: HoarderSort;
}

export class SerialOpenersQueryDto {
  @IsString() @IsNotEmpty() user_id!: string;
  @IsOptional() @IsString() period?: string;
  @IsOptional() @IsString() start_date?: string;
  @IsOptional() @IsString() end_date?: string;
  @IsOptional() @Transform(toBoolean) @IsBoolean() include_comparison?: boolean;
}

export class ResearchSessionsQueryDto {
  @IsString() @IsNotEmpty() user_id!: string;
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(365) lookback_days?: number;
  @IsOptional() @Type(() => Number) @IsInt() @Min(2) @Max(100) min_tabs?: number;
  /** Minutes from the first tab within which the rest must be opened. */
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(240) time_window?: number;
  /** Minimum minutes between the first and last tab. */
  @IsOptional() @Type(() => Number) @IsInt() @Min(0) @Max(240) min_duration?: number;
}
