import { ArrayMaxSize, IsArray, IsBoolean, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({
    description:
      'Raw standings rows. Each row is parsed on its own; rows that cannot be read are recorded on the run instead of rejecting the request.',
    type: 'array',
    items: { type: 'object' },
    example: [
      {
        team: 'Japan',
        confederation: 'AFC',
        group: 'Group C',
        rank: 1,
        points: 16,
        played: 6,
        goalDiff: 18,
        qualificationStatus: 'InProgress',
      },
    ],
  })
  @IsArray()
  @ArrayMaxSize(5000)
  rows!: unknown[];

  @ApiPropertyOptional({ description: 'Where the standings came from', example: 'fifa-standings' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  source?: string;

  @ApiPropertyOptional({ example: 'ops' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  requestedBy?: string;

  @ApiPropertyOptional({ description: 'Recompute even if identical input was already processed' })
  @IsOptional()
  @IsBoolean()
  force?: boolean;
}
