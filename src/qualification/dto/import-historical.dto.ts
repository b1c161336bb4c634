import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Confederation, CONFEDERATIONS } from '../types/qualification.types';

export class HistoricalStandingDto {
  @ApiProperty({ example: 2022 })
  @IsInt()
  @Min(1930)
  @Max(2100)
  season!: number;

  @ApiProperty({ enum: CONFEDERATIONS, example: 'CONMEBOL' })
  @IsIn(CONFEDERATIONS)
  confederation!: Confederation;

  @ApiProperty({ example: 'Qualifying Group Stage' })
  @IsString()
  @IsNotEmpty()
  stage!: string;

  @ApiProperty({ example: 'Standings' })
  @IsString()
  @IsNotEmpty()
  group!: string;

  @ApiProperty({ example: 'Uruguay' })
  @IsString()
  @IsNotEmpty()
  team!: string;

  @ApiPropertyOptional({ type: Number, nullable: true, example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  rank?: number | null;

  @ApiProperty({ example: 28 })
  @IsInt()
  @Min(0)
  points!: number;

  @ApiProperty({ example: 18 })
  @IsInt()
  @Min(0)
  played!: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(0)
  wins?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(0)
  draws?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(0)
  losses?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(0)
  goalsFor?: number;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(0)
  goalsAgainst?: number;

  @ApiProperty({ example: 8 })
  @IsInt()
  goalDiff!: number;

  @ApiProperty({ example: true })
  @IsBoolean()
  qualified!: boolean;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  note?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  sourceUrl?: string;
}

export class ImportHistoricalDto {
  @ApiProperty({ type: [HistoricalStandingDto] })
  @IsArray()
  @ArrayMaxSize(20000)
  @ValidateNested({ each: true })
  @Type(() => HistoricalStandingDto)
  standings!: HistoricalStandingDto[];

  @ApiPropertyOptional({ description: 'Rebuild the lookup table after the import', default: true })
  @IsOptional()
  @IsBoolean()
  rebuild?: boolean;

  @ApiPropertyOptional({ example: 'analyst' })
  @IsOptional()
  @IsString()
  requestedBy?: string;
}
