// Fatal before any week is scheduled: empty roster, bad week count, bad settings
export class ScheduleConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScheduleConfigError";
  }
}
