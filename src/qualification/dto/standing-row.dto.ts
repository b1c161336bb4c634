import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Confederation, CONFEDERATIONS } from '../types/qualification.types';

/**
 * Shape of one standings row as submitted by the standings source. Only
 * types are checked here; value rules (status, negative counters) belong
 * to the blender so that they are reported as invalid rather than malformed.
 */
export class StandingRowDto {
  @ApiProperty({ example: 'Japan' })
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: 'team must not be blank' })
  team!: string;

  @ApiProperty({ enum: CONFEDERATIONS, example: 'AFC' })
  @IsIn(CONFEDERATIONS)
  confederation!: Confederation;

  @ApiProperty({ example: 'Group C' })
  @IsString()
  @IsNotEmpty()
  @Matches(/\S/, { message: 'group must not be blank' })
  group!: string;

  @ApiPropertyOptional({ example: 'Third Round - Group C' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  stage?: string;

  @ApiPropertyOptional({ type: Number, nullable: true, example: 1 })
  @IsOptional()
  @IsInt()
  rank?: number | null;

  @ApiProperty({ example: 16 })
  @IsInt()
  points!: number;

  @ApiProperty({ example: 6 })
  @IsInt()
  played!: number;

  @ApiProperty({ example: 12 })
  @IsInt()
  goalDiff!: number;

  @ApiPropertyOptional({ example: 'InProgress' })
  @IsOptional()
  @IsString()
  qualificationStatus?: string;

  @ApiPropertyOptional({ example: 'Qualifies for the final tournament' })
  @IsOptional()
  @IsString()
  note?: string;
}
