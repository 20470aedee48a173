/**
 * Credential pool status (secrets never leave the pool) and operator reset.
 */

import type { Request, Response } from "express";
import type { CredentialPool } from "../../src/lib/credentials/credentialPool.js";
import { paramId, sendData, sendError } from "./respond.js";

export function credentialHandlers(pool: CredentialPool) {
  return {
    async statusGet(_req: Request, res: Response): Promise<void> {
      try {
        sendData(res, pool.services().map((s) => pool.status(s)));
      } catch (e) {
        sendError(res, e);
      }
    },

    /** Re-enables every credential of a service, or one when `id` is given in the body. */
    async resetPost(req: Request, res: Response): Promise<void> {
      try {
        const service = paramId(req, "service");
        const body: unknown = req.body;
        const id = typeof body === "object" && body !== null && "id" in body && typeof body.id === "string" ? body.id : undefined;
        pool.reset(service, id);
        sendData(res, pool.status(service));
      } catch (e) {
        sendError(res, e);
      }
    },
  };
}
