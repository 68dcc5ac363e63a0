import { Type } from 'class-transformer';
import { IsDateString, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class RecentActivityQueryDto {
  @IsString() @IsNotEmpty() user_id!: string;
  @IsOptional() @Type(() => Number) @IsInt() limit?: number;
  @IsOptional() @IsDateString() since?: string;
}
