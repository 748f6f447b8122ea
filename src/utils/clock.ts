/**
 * Abstracted clock for testability. Only log lines read it; exported files
 * never carry a timestamp.
 */
export const clock = {
  now(): Date {
    return new Date();
  },
  isoNow(): string {
    return clock.now().toISOString();
  },
};
