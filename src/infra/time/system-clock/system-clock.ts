import type { Clock } from "../../../core/ports/clock.types";

export function createSystemClock(): Clock {
  return {
    now() {
      return new Date();
    },
    nowUnixSeconds() {
      return Math.floor(Date.now() / 1000);
    },
  };
}
