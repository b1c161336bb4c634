import configuration, { parseConfederationMultipliers, parseHostNations } from './configuration';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('parseConfederationMultipliers', () => {
    it('should return the defaults when nothing is set', () => {
      expect(parseConfederationMultipliers(undefined)).toEqual({
        UEFA: 1,
        CONMEBOL: 1,
        AFC: 0.95,
        CAF: 0.95,
        CONCACAF: 0.9,
        OFC: 0.7,
      });
    });

    it('should override only the confederations it can parse', () => {
      const multipliers = parseConfederationMultipliers('ofc=0.5, UEFA=abc, FIFA=2');

      expect(multipliers.OFC).toBe(0.5);
      expect(multipliers.UEFA).toBe(1);
      expect(multipliers).not.toHaveProperty('FIFA');
    });
  });

  describe('parseHostNations', () => {
    it('should keep entries with a known confederation and a team', () => {
      expect(
        parseHostNations('CONCACAF:United States, concacaf:Canada, Mexico, XYZ:Atlantis, UEFA:'),
      ).toEqual([
        { confederation: 'CONCACAF', team: 'United States' },
        { confederation: 'CONCACAF', team: 'Canada' },
      ]);
    });

    it('should return no hosts when unset', () => {
      expect(parseHostNations(undefined)).toEqual([]);
    });
  });

  it('should read blender weights and fall back on unparsable numbers', () => {
    process.env.BLENDER_FORM_WEIGHT = '0.7';
    process.env.BLENDER_HISTORICAL_WEIGHT = 'heavy';
    process.env.RUN_DEDUP_ENABLED = 'false';

    const config = configuration();

    expect(config.blender.formWeight).toBe(0.7);
    expect(config.blender.historicalWeight).toBe(0.4);
    expect(config.qualification.dedupEnabled).toBe(false);
    expect(config.rabbitmq.queue).toBe('qualification.run');
  });

  it('should split the metrics allow list', () => {
    process.env.METRICS_ALLOWED_IPS = '10.0.0.0/8, 127.0.0.1,';

    expect(configuration().metrics.allowedIps).toEqual(['10.0.0.0/8', '127.0.0.1']);
  });
});
