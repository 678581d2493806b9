import { DEADLINE_CHECK_INTERVAL_MS, DeadlineScheduler } from '../bot/scheduler';

describe('DeadlineScheduler', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('runs immediately on start and then every 24 hours', async () => {
    const task = jest.fn().mockResolvedValue(undefined);
    const scheduler = new DeadlineScheduler({ task });

    scheduler.start();
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(DEADLINE_CHECK_INTERVAL_MS - 1);
    expect(task).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);

    await jest.advanceTimersByTimeAsync(DEADLINE_CHECK_INTERVAL_MS);
    expect(task).toHaveBeenCalledTimes(3);

    scheduler.stop();
  });

  it('starts only once', () => {
    const task = jest.fn().mockResolvedValue(undefined);
    const scheduler = new DeadlineScheduler({ task, intervalMs: 1000 });

    scheduler.start();
    scheduler.start();

    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.running).toBe(true);
    scheduler.stop();
    expect(scheduler.running).toBe(false);
  });

  it('stops firing after stop()', async () => {
    const task = jest.fn().mockResolvedValue(undefined);
    const scheduler = new DeadlineScheduler({ task, intervalMs: 1000 });

    scheduler.start();
    scheduler.stop();
    await jest.advanceTimersByTimeAsync(5000);

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('drops a tick while the previous run is in flight', async () => {
    let release: () => void = () => undefined;
    const task = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const scheduler = new DeadlineScheduler({ task, intervalMs: 1000 });

    scheduler.start();
    await jest.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.busy).toBe(true);

    release();
    await jest.advanceTimersByTimeAsync(1000);
    expect(task).toHaveBeenCalledTimes(2);

    release();
    scheduler.stop();
  });

  it('survives a task that throws', async () => {
    const task = jest.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue(undefined);
    const scheduler = new DeadlineScheduler({ task, intervalMs: 1000 });

    await scheduler.tick();
    await scheduler.tick();

    expect(task).toHaveBeenCalledTimes(2);
    expect(scheduler.busy).toBe(false);
  });
});
