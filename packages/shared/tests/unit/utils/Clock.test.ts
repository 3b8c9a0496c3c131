import { ManualClock, SystemClock } from "../../../src/utils/time/Clock";

describe("ManualClock", () => {
    it("should advance virtual time on sleep", async () => {
        const clock = new ManualClock(500);

        await clock.sleep(1500);

        expect(clock.now()).toBe(2000);
        expect(clock.date().getTime()).toBe(2000);
        expect(clock.getSleeps()).toEqual([1500]);
    });

    it("should not advance when the signal is already aborted", async () => {
        const clock = new ManualClock(0);
        const controller = new AbortController();
        controller.abort();

        await clock.sleep(5000, controller.signal);

        expect(clock.now()).toBe(0);
    });

    it("should refuse to move backwards", () => {
        const clock = new ManualClock(100);
        expect(() => clock.setTime(50)).toThrow("Cannot move time backwards");
    });
});

describe("SystemClock", () => {
    it("should resolve early when aborted", async () => {
        const clock = new SystemClock();
        const controller = new AbortController();
        const started = Date.now();

        const sleeping = clock.sleep(60_000, controller.signal);
        controller.abort();
        await sleeping;

        expect(Date.now() - started).toBeLessThan(1000);
    });

    it("should resolve immediately for non-positive durations", async () => {
        await expect(new SystemClock().sleep(0)).resolves.toBeUndefined();
    });
});
