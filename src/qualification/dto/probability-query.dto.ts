import { IsIn, IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  Confederation,
  CONFEDERATIONS,
  QUALIFICATION_STATUSES,
  QualificationStatus,
} from '../types/qualification.types';

export class ProbabilityQueryDto {
  @ApiPropertyOptional({ enum: CONFEDERATIONS })
  @IsOptional()
  @IsIn(CONFEDERATIONS)
  confederation?: Confederation;

  @ApiPropertyOptional({ enum: QUALIFICATION_STATUSES })
  @IsOptional()
  @IsIn(QUALIFICATION_STATUSES)
  status?: QualificationStatus;
}
