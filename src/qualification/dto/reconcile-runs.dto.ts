import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';

export class ReconcileRunsDto {
  @ApiPropertyOptional({
    description: 'Runs still running after this many minutes are marked failed',
    example: 30,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10080)
  olderThanMinutes?: number;
}
