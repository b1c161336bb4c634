import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { StandingRowDto } from '../dto/standing-row.dto';
import { MalformedStandingError } from '../errors/qualification.errors';
import { QualificationStatus, StandingRow } from '../types/qualification.types';

/** Field names used by the standings source, mapped to ours. */
const FIELD_ALIASES: Readonly<Record<string, keyof StandingRowDto>> = {
  goal_diff: 'goalDiff',
  goal_difference: 'goalDiff',
  games_played: 'played',
  qualification_status: 'qualificationStatus',
  current_group: 'group',
  position: 'rank',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const target = FIELD_ALIASES[key] ?? key;
    if (normalized[target] === undefined) {
      normalized[target] = value;
    }
  }
  return normalized;
}

/**
 * A note such as "Qualifies for the final tournament" marks a team as
 * qualified; anything else leaves it in progress.
 */
export function statusFromNote(note: string | undefined): QualificationStatus {
  const text = (note ?? '').toLowerCase();
  return text.includes('qualifies') || text.includes('qualified') ? 'Qualified' : 'InProgress';
}

/**
 * Reads one raw standings row.
 *
 * @throws MalformedStandingError when the row is not an object or a field
 * has the wrong type
 */
export function parseStandingRow(raw: unknown, defaultStage: string): StandingRow {
  if (!isRecord(raw)) {
    throw new MalformedStandingError('Standing row must be an object');
  }

  const dto = plainToInstance(StandingRowDto, normalizeKeys(raw));
  const errors = validateSync(dto, { forbidUnknownValues: false });

  if (errors.length > 0) {
    const [first] = errors;
    const message = Object.values(first.constraints ?? {})[0] ?? `${first.property} is invalid`;
    throw new MalformedStandingError(message, first.property);
  }

  return {
    team: dto.team.trim(),
    confederation: dto.confederation,
    group: dto.group.trim(),
    stage: dto.stage?.trim() || defaultStage,
    rank: dto.rank ?? null,
    points: dto.points,
    played: dto.played,
    goalDiff: dto.goalDiff,
    qualificationStatus: dto.qualificationStatus ?? statusFromNote(dto.note),
    ...(dto.note !== undefined ? { note: dto.note } : {}),
  };
}

/** Natural key of a standing: one current row per team, confederation and group. */
export function standingKey(row: Pick<StandingRow, 'team' | 'confederation' | 'group'>): string {
  return `${row.confederation}|${row.group}|${row.team}`;
}
