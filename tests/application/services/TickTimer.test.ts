import { TickTimer } from '../../../src/application/services/TickTimer';
import { Logger } from '../../../src/application/interfaces/Logger';

describe('TickTimer', () => {
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    jest.useFakeTimers();
    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run the tick once the delay has passed', async () => {
    const onTick = jest.fn().mockResolvedValue(undefined);
    const timer = new TickTimer(onTick, mockLogger);

    timer.start(1000);
    jest.advanceTimersByTime(999);
    expect(onTick).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    expect(onTick).toHaveBeenCalledTimes(1);

    await timer.dispose();
  });

  it('should fire only once per start', async () => {
    const onTick = jest.fn().mockResolvedValue(undefined);
    const timer = new TickTimer(onTick, mockLogger);

    timer.start(100);
    jest.advanceTimersByTime(1000);

    expect(onTick).toHaveBeenCalledTimes(1);
    await timer.dispose();
  });

  it('should not run after being disposed', async () => {
    const onTick = jest.fn().mockResolvedValue(undefined);
    const timer = new TickTimer(onTick, mockLogger);

    timer.start(1000);
    await timer.dispose();
    jest.advanceTimersByTime(1000);

    expect(onTick).not.toHaveBeenCalled();
    expect(timer.isArmed).toBe(false);
  });

  it('should refuse to start once disposed', async () => {
    const timer = new TickTimer(jest.fn().mockResolvedValue(undefined), mockLogger);

    await timer.dispose();

    expect(() => timer.start(10)).toThrow('Cannot start a disposed timer');
  });

  it('should wait for a tick in flight when disposed', async () => {
    let finishTick: () => void = () => undefined;
    const onTick = jest.fn(
      () =>
        new Promise<void>(resolve => {
          finishTick = resolve;
        })
    );
    const timer = new TickTimer(onTick, mockLogger);

    timer.start(10);
    jest.advanceTimersByTime(10);
    expect(timer.isRunning).toBe(true);

    let disposed = false;
    const disposal = timer.dispose().then(() => {
      disposed = true;
    });
    await Promise.resolve();
    expect(disposed).toBe(false);

    finishTick();
    await disposal;

    expect(disposed).toBe(true);
    expect(timer.isRunning).toBe(false);
  });

  it('should never overlap ticks', async () => {
    let finishTick: () => void = () => undefined;
    const onTick = jest.fn(
      () =>
        new Promise<void>(resolve => {
          finishTick = resolve;
        })
    );
    const timer = new TickTimer(onTick, mockLogger);

    timer.start(10);
    jest.advanceTimersByTime(10);
    timer.start(10);
    jest.advanceTimersByTime(10);

    expect(onTick).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith('Previous tick still running; skipping');

    finishTick();
    await timer.dispose();
  });

  it('should log a failing tick instead of rejecting', async () => {
    const timer = new TickTimer(jest.fn().mockRejectedValue(new Error('boom')), mockLogger);

    timer.start(5);
    jest.advanceTimersByTime(5);
    await timer.dispose();

    expect(mockLogger.error).toHaveBeenCalledWith('Unhandled error in timer tick', { error: 'boom' });
  });
});
