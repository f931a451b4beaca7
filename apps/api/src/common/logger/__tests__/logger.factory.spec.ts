import * as winston from 'winston';
import { buildWinstonTransports, resolveLogLevel } from '../logger.factory';

function onlyConsoleTransport(nodeEnv: 'development' | 'production' | 'test') {
  const transports = buildWinstonTransports(nodeEnv);
  expect(transports).toHaveLength(1);
  const [transport] = transports;
  if (!(transport instanceof winston.transports.Console)) {
    throw new Error('expected a console transport');
  }
  return transport;
}

describe('buildWinstonTransports', () => {
  it('silences output under test', () => {
    expect(onlyConsoleTransport('test').silent).toBe(true);
  });

  it.each(['development', 'production'] as const)(
    'routes only the error level to stderr in %s',
    (nodeEnv) => {
      const transport = onlyConsoleTransport(nodeEnv);
      expect(transport.silent).toBeFalsy();
      expect(Object.keys(transport.stderrLevels)).toEqual(['error']);
    },
  );
});

describe('resolveLogLevel', () => {
  it('logs info and above in production', () => {
    expect(resolveLogLevel('production')).toBe('info');
  });

  it('logs debug and above elsewhere', () => {
    expect(resolveLogLevel('development')).toBe('debug');
    expect(resolveLogLevel('test')).toBe('debug');
  });
});
