import { hostname } from 'os';
import { GreetingService } from './greeting.service';

describe('GreetingService', () => {
  let service: GreetingService;

  beforeEach(() => {
    service = new GreetingService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('greets with the fixed message', () => {
    expect(service.getGreeting().message).toBe('Hola mundo');
  });

  it('identifies the service', () => {
    expect(service.getGreeting().service).toBe('backend');
  });

  it('reports the host name', () => {
    expect(service.getGreeting().hostname).toBe(hostname());
  });

  it('stamps the current time', () => {
    jest.useFakeTimers().setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
    expect(service.getGreeting().timestamp).toBe('2026-03-01T12:00:00.000Z');
  });

  it('returns exactly message, timestamp, service and hostname in that order', () => {
    expect(Object.keys(service.getGreeting())).toEqual([
      'message',
      'timestamp',
      'service',
      'hostname',
    ]);
  });
});
