import type { TestingModule } from '@nestjs/testing';
import { Test } from '@nestjs/testing';
import { GreetingController } from './greeting.controller';
import { GreetingService } from './greeting.service';

describe('GreetingController', () => {
  let controller: GreetingController;
  let service: GreetingService;

  const mockResponse = {
    message: 'Hola mundo',
    timestamp: '2026-03-01T12:00:00.000Z',
    service: 'backend',
    hostname: 'backend-7d9c5b6f4-x2x9k',
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [GreetingController],
      providers: [
        {
          provide: GreetingService,
          useValue: { getGreeting: jest.fn().mockReturnValue(mockResponse) },
        },
      ],
    }).compile();

    controller = module.get<GreetingController>(GreetingController);
    service = module.get<GreetingService>(GreetingService);
  });

  it('returns the greeting from the service', () => {
    expect(controller.getGreeting()).toEqual(mockResponse);
    expect(service.getGreeting).toHaveBeenCalledTimes(1);
  });
});
