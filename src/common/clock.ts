export interface Clock {
  now: () => number; // milliseconds epoch
  toISOString: (ts: number) => string;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  toISOString: (ts) => new Date(ts).toISOString(),
};

export function fixedClock(ts: number): Clock {
  return {
    now: () => ts,
    toISOString: (value) => new Date(value).toISOString(),
  };
}
