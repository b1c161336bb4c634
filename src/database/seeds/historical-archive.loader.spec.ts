import { parseHistoricalArchive } from './historical-archive.loader';

const row = {
  season: 2022,
  confederation: 'CONMEBOL',
  stage: 'Qualifying Group Stage',
  group: 'Standings',
  team: 'Uruguay',
  rank: 3,
  points: 28,
  played: 18,
  goalDiff: 0,
  qualified: true,
};

describe('parseHistoricalArchive', () => {
  it('should accept a wrapped standings list', () => {
    const standings = parseHistoricalArchive(JSON.stringify({ standings: [row] }));

    expect(standings).toHaveLength(1);
    expect(standings[0]).toMatchObject({ team: 'Uruguay', rank: 3, points: 28 });
  });

  it('should accept a bare array and default a missing rank to null', () => {
    const { rank: _rank, ...withoutRank } = row;

    const [standing] = parseHistoricalArchive(JSON.stringify([withoutRank]));

    expect(standing.rank).toBeNull();
  });

  it('should report the path of every invalid field', () => {
    const content = JSON.stringify([{ ...row, confederation: 'FIFA', played: -1 }]);

    expect(() => parseHistoricalArchive(content)).toThrow(
      'Invalid historical archive: standings.0.confederation: confederation must be one of the following values: UEFA, CAF, AFC, CONMEBOL, CONCACAF, OFC; standings.0.played: played must not be less than 0',
    );
  });

  it('should reject fields the import does not know', () => {
    expect(() => parseHistoricalArchive(JSON.stringify([{ ...row, coach: 'n/a' }]))).toThrow(
      'standings.0.coach: property coach should not exist',
    );
  });
});
