import { Test, TestingModule } from '@nestjs/testing';
import { SerialOpenersService } from './serial-openers.service';
import { VisitsRepository } from '../visits/visits.repository';
import { DAY_MS } from '../analysis/date-range';
import { InvalidDateRangeError } from '../analysis/errors';
import { NOW, makeVisit } from '../testing/fixtures';
import { VisitRecord } from '../shared/types';

const HOUR = 3_600_000;

const current: VisitRecord[] = Array.from({ length: 10 }, (_, i) =>
  makeVisit({
    id: `c${i}`,
    url: `https://notion.so/page-abc?v=${i + 1}`,
    domain: 'notion.so',
    title: 'Roadmap',
    visited_at: NOW - 6 * DAY_MS + i * 12 * HOUR,
    active_duration_seconds: 8,
  }),
);

const previous: VisitRecord[] = Array.from({ length: 5 }, (_, i) =>
  makeVisit({
    id: `p${i}`,
    url: 'https://example.com/old',
    visited_at: NOW - 13 * DAY_MS + i * DAY_MS,
    active_duration_seconds: 2,
  }),
);

describe('SerialOpenersService', () => {
  let service: SerialOpenersService;
  const listInRange = jest.fn(async (_user: string, from: number) =>
    from === NOW - 7 * DAY_MS ? current : previous,
  );

  beforeEach(async () => {
    listInRange.mockClear();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SerialOpenersService,
        { provide: VisitsRepository, useValue: { listInRange } },
      ],
    }).compile();

    service = module.get<SerialOpenersService>(SerialOpenersService);
  });

  it('detects openers over the requested week', async () => {
    const r = await service.detect('u1', { period: 'week' }, new Date(NOW));
    expect(listInRange).toHaveBeenCalledTimes(1);
    expect(r.period).toBe('week');
    expect(r.date_range).toEqual({ start: '2025-10-13', end: '2025-10-20', days: 7 });
    expect(r.criteria).toEqual({
      min_visits_per_day: 0.43,
      effective_min_visits: 3,
      max_total_engagement_seconds: 300,
    });
    expect(r.count).toBe(1);
    expect(r.serial_openers[0].normalized_url).toBe('https://notion.so/page-abc');
    expect(r.comparison).toBeUndefined();
  });

  it('compares with the previous window when asked', async () => {
    const r = await service.detect(
      'u1',
      { period: 'week', include_comparison: true },
      new Date(NOW),
    );
    expect(listInRange).toHaveBeenLastCalledWith('u1', NOW - 14 * DAY_MS, NOW - 7 * DAY_MS);
    expect(r.comparison?.previous_period).toEqual({
      start: '2025-10-06',
      end: '2025-10-13',
      count: 1,
    });
    expect(r.comparison?.by_resource.map((c) => [c.url, c.status])).toEqual([
      ['https://notion.so/page-abc', 'new'],
      ['https://example.com/old', 'resolved'],
    ]);
  });

  it('leaves the comparison out when the previous window cannot be read', async () => {
    listInRange
      .mockImplementationOnce(async () => current)
      .mockImplementationOnce(async () => {
        throw new Error('database is locked');
      });
    const r = await service.detect(
      'u1',
      { period: 'week', include_comparison: true },
      new Date(NOW),
    );
    expect(r.count).toBe(1);
    expect(r.comparison).toBeUndefined();
  });

  it('rejects an inverted custom range before reading', async () => {
    await expect(
      service.detect('u1', { start_date: '2025-10-15', end_date: '2025-10-01' }),
    ).rejects.toBeInstanceOf(InvalidDateRangeError);
    expect(listInRange).not.toHaveBeenCalled();
  });
});
