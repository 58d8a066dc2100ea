import { TaskCancelledError } from '../../../src/domain/errors/AppErrors';
import { setGlobalLoggerConfig } from '../../../src/infrastructure/logging';
import { GracefulShutdown, onShutdown } from '../../../src/infrastructure/shutdown/GracefulShutdown';

describe('GracefulShutdown', () => {
  let shutdown: GracefulShutdown;
  let exit: jest.Mock<void, [number]>;

  beforeAll(() => {
    setGlobalLoggerConfig({ customHandler: () => undefined });
  });

  afterAll(() => {
    setGlobalLoggerConfig({});
  });

  beforeEach(() => {
    GracefulShutdown.reset();
    shutdown = GracefulShutdown.getInstance();
    exit = jest.fn<void, [number]>();
    shutdown.setExit(exit);
  });

  it('should run handlers newest first, once', async () => {
    const order: string[] = [];
    shutdown.registerHandler(async () => {
      order.push('close browser');
    });
    onShutdown(async () => {
      order.push('save state');
    });

    await shutdown.runHandlers();
    await shutdown.runHandlers();

    expect(order).toEqual(['save state', 'close browser']);
  });

  it('should keep going when a handler fails', async () => {
    const ran = jest.fn<Promise<void>, []>(async () => undefined);
    shutdown.registerHandler(ran);
    shutdown.registerHandler(async () => {
      throw new Error('disk full');
    });

    await shutdown.runHandlers();

    expect(ran).toHaveBeenCalledTimes(1);
  });

  it('should skip removed handlers', async () => {
    const handler = jest.fn<Promise<void>, []>(async () => undefined);
    shutdown.registerHandler(handler);
    shutdown.removeHandler(handler);

    await shutdown.runHandlers();

    expect(handler).not.toHaveBeenCalled();
  });

  it('should cancel the task and exit with 130 on a signal', async () => {
    const { signal } = shutdown;

    await shutdown.shutdown('SIGINT');

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(TaskCancelledError);
    expect(signal.reason).toHaveProperty('message', 'task cancelled (SIGINT)');
    expect(exit).toHaveBeenCalledWith(130);
    expect(shutdown.isInProgress()).toBe(true);
  });

  it('should only exit for signals or an explicit code', async () => {
    await shutdown.shutdown('finished');

    expect(exit).not.toHaveBeenCalled();
  });

  it('should use the given exit code', async () => {
    await shutdown.shutdown('fatal', 1);

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('should ignore a second shutdown', async () => {
    const handler = jest.fn<Promise<void>, []>(async () => undefined);
    shutdown.registerHandler(handler);

    await shutdown.shutdown('SIGTERM');
    shutdown.registerHandler(handler);
    await shutdown.shutdown('SIGTERM');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });
});
