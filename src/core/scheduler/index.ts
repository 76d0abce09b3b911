export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export { Scheduler, type ScheduleStatus } from "./daemon";
