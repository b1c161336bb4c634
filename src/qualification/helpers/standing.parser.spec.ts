import { parseStandingRow, standingKey, statusFromNote } from './standing.parser';
import { MalformedStandingError } from '../errors/qualification.errors';

const DEFAULT_STAGE = 'Qualifying Group Stage';

describe('standing parser', () => {
  const raw = {
    team: 'Japan',
    confederation: 'AFC',
    group: 'Group C',
    rank: 1,
    points: 16,
    played: 6,
    goalDiff: 18,
    qualificationStatus: 'InProgress',
  };

  describe('parseStandingRow', () => {
    it('should read a well-formed row and apply the default stage', () => {
      expect(parseStandingRow(raw, DEFAULT_STAGE)).toEqual({
        team: 'Japan',
        confederation: 'AFC',
        group: 'Group C',
        stage: DEFAULT_STAGE,
        rank: 1,
        points: 16,
        played: 6,
        goalDiff: 18,
        qualificationStatus: 'InProgress',
      });
    });

    it('should accept the standings source field names', () => {
      const parsed = parseStandingRow(
        {
          team: 'Morocco',
          confederation: 'CAF',
          current_group: 'Group E',
          position: 2,
          points: 12,
          games_played: 5,
          goal_diff: 7,
          qualification_status: 'InProgress',
          stage: 'Second Round',
        },
        DEFAULT_STAGE,
      );

      expect(parsed).toMatchObject({
        group: 'Group E',
        rank: 2,
        played: 5,
        goalDiff: 7,
        stage: 'Second Round',
      });
    });

    it('should read a missing rank as unranked', () => {
      const { rank: _rank, ...withoutRank } = raw;

      expect(parseStandingRow(withoutRank, DEFAULT_STAGE).rank).toBeNull();
      expect(parseStandingRow({ ...raw, rank: null }, DEFAULT_STAGE).rank).toBeNull();
    });

    it('should derive the status from the note when none is given', () => {
      const { qualificationStatus: _status, ...withoutStatus } = raw;

      const parsed = parseStandingRow(
        { ...withoutStatus, note: 'Qualifies for the final tournament' },
        DEFAULT_STAGE,
      );

      expect(parsed.qualificationStatus).toBe('Qualified');
      expect(parsed.note).toBe('Qualifies for the final tournament');
    });

    it('should keep an explicit status even if it is not a known one', () => {
      expect(
        parseStandingRow({ ...raw, qualificationStatus: 'Eliminated' }, DEFAULT_STAGE)
          .qualificationStatus,
      ).toBe('Eliminated');
    });

    it('should not coerce numeric strings', () => {
      expect(() => parseStandingRow({ ...raw, points: '16' }, DEFAULT_STAGE)).toThrow(
        new MalformedStandingError('points must be an integer number', 'points'),
      );
    });

    it.each([
      ['team', 'team must not be blank'],
      ['group', 'group must not be blank'],
    ])('should reject a blank %s', (field, message) => {
      expect(() => parseStandingRow({ ...raw, [field]: '   ' }, DEFAULT_STAGE)).toThrow(
        new MalformedStandingError(message, field),
      );
    });

    it('should reject an unknown confederation', () => {
      try {
        parseStandingRow({ ...raw, confederation: 'FIFA' }, DEFAULT_STAGE);
        throw new Error('expected a malformed row');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedStandingError);
        expect(error).toHaveProperty('field', 'confederation');
      }
    });

    it.each([null, 'Japan', 42, [raw]])('should reject %p as not an object', (value) => {
      expect(() => parseStandingRow(value, DEFAULT_STAGE)).toThrow(
        'Standing row must be an object',
      );
    });
  });

  describe('statusFromNote', () => {
    it.each([
      ['Qualified for the World Cup', 'Qualified'],
      ['QUALIFIES', 'Qualified'],
      ['Advances to the play-off', 'InProgress'],
      [undefined, 'InProgress'],
    ])('should read %p as %s', (note, expected) => {
      expect(statusFromNote(note)).toBe(expected);
    });
  });

  describe('standingKey', () => {
    it('should identify a row by team, confederation and group', () => {
      expect(standingKey({ team: 'Japan', confederation: 'AFC', group: 'Group C' })).toBe(
        'AFC|Group C|Japan',
      );
    });
  });
});
