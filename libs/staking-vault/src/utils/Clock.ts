export interface Clock {
  /** Current unix time in seconds. */
  nowSec(): bigint;
}

export class SystemClock implements Clock {
  nowSec(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export const systemClock = new SystemClock();
