import { AdaptiveThresholdCalculator } from './adaptive-threshold.calculator';
import { InvalidArgumentError } from './errors';

describe('AdaptiveThresholdCalculator', () => {
  it('uses the weekly baselines for a 7-day window', () => {
    const calc = new AdaptiveThresholdCalculator(7);
    expect(calc.minVisitsFor('regular')).toBe(10);
    expect(calc.minVisitsFor('frequent')).toBe(20);
    expect(calc.minVisitsFor('compulsive')).toBe(50);
    expect(calc.minSerialOpenerVisits()).toBe(3);
    expect(calc.maxSerialOpenerEngagementSeconds()).toBe(300);
  });

  it('scales linearly for a 30-day window', () => {
    const calc = new AdaptiveThresholdCalculator(30);
    expect(calc.minVisitsFor('regular')).toBe(43);
    expect(calc.minVisitsFor('frequent')).toBe(86);
    expect(calc.minVisitsFor('compulsive')).toBe(214);
    expect(calc.minSerialOpenerVisits()).toBe(13);
    expect(calc.maxSerialOpenerEngagementSeconds()).toBe(1286);
  });

  it('keeps the serial opener floor of two visits on a single day', () => {
    const calc = new AdaptiveThresholdCalculator(1);
    expect(calc.minSerialOpenerVisits()).toBe(2);
    expect(calc.maxSerialOpenerEngagementSeconds()).toBe(43);
  });

  it.each([0.1, 0.5, 1, 2, 3.5, 7, 14, 30, 90])(
    'keeps compulsive > frequent > regular for %p days',
    (days) => {
      const calc = new AdaptiveThresholdCalculator(days);
      expect(calc.minVisitsFor('compulsive')).toBeGreaterThan(
        calc.minVisitsFor('frequent'),
      );
      expect(calc.minVisitsFor('frequent')).toBeGreaterThan(
        calc.minVisitsFor('regular'),
      );
    },
  );

  it('forces tier order when rounding would collapse it', () => {
    const calc = new AdaptiveThresholdCalculator(0.1);
    expect(calc.minVisitsFor('regular')).toBe(1);
    expect(calc.minVisitsFor('frequent')).toBe(2);
    expect(calc.minVisitsFor('compulsive')).toBe(3);
  });

  it('throws on an unknown tier', () => {
    const calc = new AdaptiveThresholdCalculator(7);
    expect(() => calc.minVisitsFor('weekly')).toThrow(InvalidArgumentError);
    expect(() => calc.minVisitsFor('weekly')).toThrow('Unknown behavior tier: weekly');
  });

  describe('qualifiesAsSerialOpener', () => {
    const calc = new AdaptiveThresholdCalculator(7);

    it('compares visits per day with 0.43', () => {
      expect(calc.qualifiesAsSerialOpener(3, 7)).toBe(false);
      expect(calc.qualifiesAsSerialOpener(4, 7)).toBe(true);
      expect(calc.qualifiesAsSerialOpener(43, 100)).toBe(true);
      expect(calc.qualifiesAsSerialOpener(42, 100)).toBe(false);
    });

    it('is false for a non-positive window', () => {
      expect(calc.qualifiesAsSerialOpener(10, 0)).toBe(false);
      expect(calc.qualifiesAsSerialOpener(10, -2)).toBe(false);
    });

    it('falls back to the calculator window, which may be empty', () => {
      expect(calc.qualifiesAsSerialOpener(4)).toBe(true);
      expect(new AdaptiveThresholdCalculator(0).qualifiesAsSerialOpener(10, null)).toBe(
        false,
      );
    });
  });

  describe('classification', () => {
    const calc = new AdaptiveThresholdCalculator(7);

    it('classifies by hours between visits', () => {
      expect(calc.classifyByFrequency(0.25)).toBe('compulsive_checking');
      expect(calc.classifyByFrequency(1)).toBe('frequent_monitoring');
      expect(calc.classifyByFrequency(4)).toBe('regular_reference');
      expect(calc.classifyByFrequency(12)).toBe('periodic_revisit');
      expect(calc.classifyByFrequency(null)).toBe('periodic_revisit');
      expect(calc.classifyByFrequency(0)).toBe('periodic_revisit');
    });

    it('classifies by visit count', () => {
      expect(calc.classifyByVisitCount(50)).toBe('compulsive_checking');
      expect(calc.classifyByVisitCount(20)).toBe('frequent_monitoring');
      expect(calc.classifyByVisitCount(10)).toBe('regular_reference');
      expect(calc.classifyByVisitCount(9)).toBe('periodic_revisit');
    });

    it('classifies engagement per visit', () => {
      expect(calc.classifyEngagement(null)).toBe('quick_glance');
      expect(calc.classifyEngagement(0)).toBe('quick_glance');
      expect(calc.classifyEngagement(4.9)).toBe('quick_glance');
      expect(calc.classifyEngagement(5)).toBe('brief_check');
      expect(calc.classifyEngagement(30)).toBe('scan');
      expect(calc.classifyEngagement(60)).toBe('shallow_work');
    });
  });
});
