import { Test, TestingModule } from '@nestjs/testing';
import { InternalServerErrorException } from '@nestjs/common';
import { ActivityController } from './activity.controller';
import { ActivityService } from './activity.service';

describe('ActivityController', () => {
  let controller: ActivityController;
  const recent = jest.fn();

  beforeEach(async () => {
    recent.mockReset();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ActivityController],
      providers: [{ provide: ActivityService, useValue: { recent } }],
    }).compile();

    controller = module.get<ActivityController>(ActivityController);
  });

  it('returns the sessions from the service', async () => {
    recent.mockResolvedValue({ activities: [] });
    await expect(
      controller.recent({ user_id: 'u1', limit: 5, since: '2025-10-20T00:00:00Z' }),
    ).resolves.toEqual({ activities: [] });
    expect(recent).toHaveBeenCalledWith('u1', { limit: 5, since: '2025-10-20T00:00:00Z' });
  });

  it('maps failures to a 500', async () => {
    recent.mockRejectedValue(new Error('SQLITE_BUSY'));
    await expect(controller.recent({ user_id: 'u1' })).rejects.toBeInstanceOf(
      InternalServerErrorException,
    );
  });
});
