/**
 * Backup routes
 *
 * POST /backups           manual snapshot
 * POST /backups/events    snapshot before a bulk change, not awaited
 * GET  /backups           every snapshot, newest first
 * GET  /backups/status    counts and recent snapshots
 * POST /backups/restore   replace the library database with a snapshot
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { errorMessage } from "../../core/errors";
import { createLogger } from "../../utils/logger";
import type { Container } from "../container";
import { sendServiceError } from "../errors";

const logger = createLogger("http");

export const MANUAL_BACKUP_DESCRIPTION = "user_initiated";

const CreateBackupSchema = z
  .object({
    description: z.string().max(200).optional(),
  })
  .strict();

const EventBackupSchema = z.object({
  description: z.string().min(1, "description is required").max(200),
});

const RestoreSchema = z.object({
  backup_file: z.string().min(1, "No backup file specified"),
});

export async function backupRoutes(
  fastify: FastifyInstance,
  { container }: { container: Container },
): Promise<void> {
  const { backups } = container;

  fastify.post("/backups", async (request, reply) => {
    const parseResult = CreateBackupSchema.safeParse(request.body ?? {});
    if (!parseResult.success) {
      return reply.status(400).send({
        success: false,
        error: "Validation failed",
        details: parseResult.error.flatten().fieldErrors,
      });
    }

    const outcome = await backups.create(
      "manual",
      parseResult.data.description ?? MANUAL_BACKUP_DESCRIPTION,
    );
    if (!outcome.success) {
      return sendServiceError(reply, outcome.error);
    }

    return reply.status(201).send({
      success: true,
      message: "Backup created successfully",
      backup: outcome.value,
    });
  });

  fastify.post("/backups/events", async (request, reply) => {
    const parseResult = EventBackupSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        success: false,
        error: "Validation failed",
        details: parseResult.error.flatten().fieldErrors,
      });
    }

    backups.triggerAsync("events", parseResult.data.description);

    return reply.status(202).send({ success: true, message: "Backup scheduled" });
  });

  fastify.get("/backups", async () => {
    return { success: true, backups: await backups.list() };
  });

  fastify.get("/backups/status", async () => {
    return { success: true, status: await backups.status() };
  });

  fastify.post("/backups/restore", async (request, reply) => {
    const parseResult = RestoreSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        success: false,
        error: "Validation failed",
        details: parseResult.error.flatten().fieldErrors,
      });
    }

    // The connection keeps the old file open, so it is closed around the swap
    container.closeDatabase();
    const outcome = await backups.restore(parseResult.data.backup_file);

    try {
      await container.openDatabase();
    } catch (err) {
      logger.error(`Could not reopen database after restore: ${errorMessage(err)}`);
      return reply.status(500).send({
        success: false,
        error: `Database could not be reopened: ${errorMessage(err)}`,
        kind: "StorageError",
        retryable: false,
      });
    }

    if (!outcome.success) {
      return sendServiceError(reply, outcome.error);
    }

    return reply.send({
      success: true,
      message: outcome.value.message,
      restored_from: outcome.value.restoredFrom,
      safety_backup: outcome.value.safetySnapshot,
    });
  });
}
