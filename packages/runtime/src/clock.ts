/**
 * Source of the current time. Injected so tests can pin or advance it.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * A clock that only moves when told to.
 */
export function createManualClock(start: Date | string): Clock & {
  advance(ms: number): void;
  set(time: Date | string): void;
} {
  let current = new Date(start).getTime();

  const clock = () => new Date(current);
  clock.advance = (ms: number) => {
    current += ms;
  };
  clock.set = (time: Date | string) => {
    current = new Date(time).getTime();
  };
  return clock;
}
