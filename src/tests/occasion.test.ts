import {
  CHEAP_BETWEEN_OCCASIONS_MS,
  INITIAL_BETWEEN_OCCASIONS_MS,
  OccasionThrottle,
} from "../occasion.js";

function fakeClock(start = 0) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("OccasionThrottle", () => {
  test("does not fire before the initial interval has elapsed", async () => {
    const clock = fakeClock();
    const onOccasion = jest.fn();
    const throttle = new OccasionThrottle({ onOccasion, clock: clock.now });

    clock.advance(INITIAL_BETWEEN_OCCASIONS_MS);
    expect(await throttle.maybeFire()).toBe(false);
    clock.advance(1);
    expect(await throttle.maybeFire()).toBe(true);
    expect(onOccasion).toHaveBeenCalledTimes(1);
    expect(await throttle.maybeFire()).toBe(false);
  });

  test("a cheap occasion sets the interval to a minute", async () => {
    const clock = fakeClock();
    const throttle = new OccasionThrottle({
      clock: clock.now,
      onOccasion: () => clock.advance(1_999),
    });
    clock.advance(INITIAL_BETWEEN_OCCASIONS_MS + 1);
    await throttle.maybeFire();
    expect(throttle.intervalMs).toBe(CHEAP_BETWEEN_OCCASIONS_MS);
  });

  test("an expensive occasion scales the interval by 25", async () => {
    const clock = fakeClock();
    const throttle = new OccasionThrottle({
      clock: clock.now,
      onOccasion: async () => {
        await Promise.resolve();
        clock.advance(4_000);
      },
    });
    clock.advance(INITIAL_BETWEEN_OCCASIONS_MS + 1);
    await throttle.maybeFire();
    expect(throttle.intervalMs).toBe(100_000);

    // measured from the start of the last occasion
    clock.advance(96_000);
    expect(throttle.isDue()).toBe(false);
    clock.advance(1);
    expect(throttle.isDue()).toBe(true);
  });

  test("callers skip while another occasion is in progress", async () => {
    const clock = fakeClock();
    let release: () => void = () => {};
    const onOccasion = jest.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const throttle = new OccasionThrottle({
      onOccasion,
      clock: clock.now,
      betweenOccasionsMs: 0,
    });
    clock.advance(1);

    const first = throttle.maybeFire();
    expect(await throttle.maybeFire()).toBe(false);
    expect(onOccasion).toHaveBeenCalledTimes(1);

    release();
    expect(await first).toBe(true);
    expect(throttle.occasions).toBe(1);
  });

  test("a failing callback releases the lock", async () => {
    const clock = fakeClock();
    const throttle = new OccasionThrottle({
      clock: clock.now,
      betweenOccasionsMs: 0,
      onOccasion: () => {
        throw new Error("disk full");
      },
    });
    clock.advance(1);
    await expect(throttle.maybeFire()).rejects.toThrow("disk full");
    clock.advance(1);
    await expect(throttle.maybeFire()).rejects.toThrow("disk full");
    expect(throttle.occasions).toBe(2);
  });
});
