/**
 * Cover image route
 *
 * GET /api/book/:localnumber/cover
 */

import type { FastifyInstance } from "fastify";
import type { Container } from "../container";
import { sendServiceError } from "../errors";

// Stored covers never change, so browsers may keep them for a year
const COVER_CACHE_CONTROL = "public, max-age=31536000";

export async function coverRoutes(
  fastify: FastifyInstance,
  { container }: { container: Container },
): Promise<void> {
  const { covers } = container;

  fastify.get<{ Params: { localnumber: string } }>(
    "/api/book/:localnumber/cover",
    async (request, reply) => {
      const outcome = await covers.get(request.params.localnumber);
      if (!outcome.success) {
        return sendServiceError(reply, outcome.error);
      }

      return reply
        .header("Content-Type", "image/jpeg")
        .header("Cache-Control", COVER_CACHE_CONTROL)
        .send(outcome.value.data);
    },
  );
}
