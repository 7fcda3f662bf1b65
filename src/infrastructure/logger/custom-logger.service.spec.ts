import { ConsoleLogger } from '@nestjs/common';
import { LoggerService } from './custom-logger.service';

describe('LoggerService', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(ConsoleLogger.prototype, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(ConsoleLogger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render metadata as JSON after the message', () => {
    new LoggerService('Registry').log('Breaker registered', { breaker: 'billing', storage: 'redis' });

    expect(logSpy).toHaveBeenCalledWith('Breaker registered {"breaker":"billing","storage":"redis"}');
  });

  it('should keep plain NestJS context arguments', () => {
    new LoggerService().log('Mapped route', 'RouterExplorer');

    expect(logSpy).toHaveBeenCalledWith('Mapped route', 'RouterExplorer');
  });

  it('should print the message alone for empty metadata', () => {
    new LoggerService().log('Started', {});

    expect(logSpy).toHaveBeenCalledWith('Started');
  });

  it('should move a stack field out of the metadata', () => {
    new LoggerService('Filter').error('Internal error', { path: '/health', stack: 'Error: boom\n    at x' });

    expect(errorSpy).toHaveBeenCalledWith('Internal error {"path":"/health"}', 'Error: boom\n    at x', 'Filter');
  });

  it('should pass stack and context through for NestJS style calls', () => {
    new LoggerService().error('Crashed', 'Error: boom', 'ExceptionsHandler');

    expect(errorSpy).toHaveBeenCalledWith('Crashed', 'Error: boom', 'ExceptionsHandler');
  });

  it('should survive metadata that cannot be serialized', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    new LoggerService().log('Odd', circular);

    expect(logSpy).toHaveBeenCalledWith('Odd [unserializable metadata]');
  });
});
