/**
 * Scheduler daemon: fires category snapshots on their cron schedules
 */

import type { ShelfkeeperConfig, SnapshotCategory } from "../../types";
import { SNAPSHOT_CATEGORIES } from "../../types";
import { createLogger } from "../../utils/logger";
import type { BackupManager } from "../backup";
import { errorMessage } from "../errors";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

const logger = createLogger("scheduler");

interface ScheduleState {
  category: SnapshotCategory;
  cron: ParsedCron;
  lastRun: Date | null;
}

export interface ScheduleStatus {
  category: SnapshotCategory;
  cron: string;
  lastRun: Date | null;
  nextRun: Date;
}

const CHECK_INTERVAL_MS = 60 * 1000;

export class Scheduler {
  private readonly manager: BackupManager;
  private readonly schedules = new Map<SnapshotCategory, ScheduleState>();
  private readonly now: () => Date;
  private running = false;
  private checkInterval: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(config: ShelfkeeperConfig, manager: BackupManager, now: () => Date = () => new Date()) {
    this.manager = manager;
    this.now = now;

    for (const category of SNAPSHOT_CATEGORIES) {
      const schedule = config.schedules[category];
      if (!schedule) continue;

      try {
        this.schedules.set(category, {
          category,
          cron: parseCron(schedule.cron, schedule.timezone),
          lastRun: null,
        });
        logger.debug(`Parsed schedule "${category}": ${schedule.cron}`);
      } catch (err) {
        logger.error(`Failed to parse schedule "${category}": ${errorMessage(err)}`);
      }
    }
  }

  get size(): number {
    return this.schedules.size;
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    logger.info(`Scheduler started (${this.schedules.size} schedule(s))`);

    this.tick();
    this.checkInterval = setInterval(() => this.tick(), CHECK_INTERVAL_MS);
  }

  /**
   * Stop the timer and wait for a snapshot that is already running
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;

    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
    }

    if (this.inFlight) {
      await this.inFlight;
    }

    logger.info("Scheduler stopped");
  }

  private tick(): void {
    if (this.inFlight) {
      logger.debug("Previous scheduled run still in progress, skipping check");
      return;
    }

    this.inFlight = this.checkSchedules()
      .catch((err: unknown) => {
        logger.error("Schedule check failed:", err);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }

  /**
   * Run every schedule due in the current minute, at most once per minute
   */
  async checkSchedules(): Promise<void> {
    const now = this.now();
    now.setSeconds(0, 0);

    for (const state of this.schedules.values()) {
      if (!matchesCron(state.cron, now)) {
        continue;
      }

      if (state.lastRun && state.lastRun.getTime() === now.getTime()) {
        continue;
      }

      logger.info(`Schedule "${state.category}" triggered`);
      state.lastRun = now;

      const outcome = await this.manager.create(state.category);
      if (outcome.success) {
        logger.info(`Scheduled ${state.category} backup completed: ${outcome.value.file_name}`);
      } else {
        logger.error(`Schedule "${state.category}" failed: ${outcome.error.message}`);
      }
    }
  }

  getStatus(): ScheduleStatus[] {
    const from = this.now();
    return [...this.schedules.values()].map((state) => ({
      category: state.category,
      cron: state.cron.expression,
      lastRun: state.lastRun,
      nextRun: getNextRun(state.cron, from),
    }));
  }
}
